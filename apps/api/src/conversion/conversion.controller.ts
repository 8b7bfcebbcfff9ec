import {
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Query,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { Readable } from 'stream';
import { ConversionService } from './conversion.service';
import { ConvertQueryDto } from './dto/convert-query.dto';
import { ConversionResponseDto } from './dto/conversion-response.dto';
import { UploadedDocument } from './interfaces/uploaded-document.interface';

/**
 * Routes:
 *   POST /pdf-to-images?fmt=png|jpeg&dpi=72..600
 *
 * Multipart body with the document in the "pdf" field.
 *
 * Error responses ({ ok: false, error }):
 *   400 — missing file, not a .pdf, bad fmt/dpi
 *   413 — file exceeds size limit
 *   422 — engine rejected the document, or it produced no pages
 *   500 — workspace I/O failure
 *   503 — pdftoppm not installed
 *   504 — rasterization timed out
 */
@Controller()
export class ConversionController {
  private readonly logger = new Logger(ConversionController.name);

  constructor(private readonly conversionService: ConversionService) {}

  @Post('pdf-to-images')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor('pdf'))
  async convert(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Query() query: ConvertQueryDto,
  ): Promise<ConversionResponseDto> {
    this.logger.log(
      `Conversion request: file="${file?.originalname ?? 'none'}", ` +
        `size=${file?.size ?? 0}, fmt=${query.fmt}, dpi=${query.dpi}`,
    );

    const upload: UploadedDocument | undefined = file
      ? {
          originalName: file.originalname,
          size: file.size,
          content: Readable.from(file.buffer),
        }
      : undefined;

    const manifest = await this.conversionService.convert(upload, {
      format: query.fmt,
      dpi: query.dpi,
    });

    return ConversionResponseDto.fromManifest(manifest);
  }
}
