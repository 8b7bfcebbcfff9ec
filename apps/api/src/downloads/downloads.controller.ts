import { Controller, Get, Logger, Param, StreamableFile } from '@nestjs/common';
import { RetrievalService } from './retrieval.service';

/**
 * Routes:
 *   GET /download/:jobId/:filename
 *
 * Streams a page image with its content type, or 404 { ok: false, error }.
 */
@Controller('download')
export class DownloadsController {
  private readonly logger = new Logger(DownloadsController.name);

  constructor(private readonly retrievalService: RetrievalService) {}

  @Get(':jobId/:filename')
  async download(
    @Param('jobId') jobId: string,
    @Param('filename') filename: string,
  ): Promise<StreamableFile> {
    const file = await this.retrievalService.open(jobId, filename);

    this.logger.debug(
      `Serving ${jobId}/${file.filename} (${file.size} bytes, ${file.contentType})`,
    );

    return new StreamableFile(file.stream, {
      type: file.contentType,
      length: file.size,
      disposition: `inline; filename="${file.filename}"`,
    });
  }
}
