import { Injectable, Logger } from '@nestjs/common';
import { FileHandle, open } from 'fs/promises';
import { extname } from 'path';
import {
  InvalidFilenameError,
  WorkspaceNotFoundError,
  WorkspaceService,
} from '@pdfimg/workspace';
import { DownloadableFile } from './interfaces/downloadable-file.interface';
import { FileNotFoundException } from './exceptions/download.exceptions';

const CONTENT_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

export function contentTypeFor(filename: string): string {
  return CONTENT_TYPES[extname(filename).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * RetrievalService — serves page images back out of a job workspace.
 *
 * The file is opened before the stream is handed out, so a cleanup racing
 * with a download either wins (404) or lets the open descriptor finish
 * the transfer. Bytes are streamed as stored, never decoded or re-encoded.
 */
@Injectable()
export class RetrievalService {
  private readonly logger = new Logger(RetrievalService.name);

  constructor(private readonly workspace: WorkspaceService) {}

  async open(jobId: string, filename: string): Promise<DownloadableFile> {
    const path = await this.resolve(jobId, filename);

    let handle: FileHandle;
    try {
      handle = await open(path, 'r');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Open failed for ${jobId}/${filename}: ${message}`);
      throw new FileNotFoundException();
    }

    try {
      const { size } = await handle.stat();
      return {
        filename,
        contentType: contentTypeFor(filename),
        size,
        stream: handle.createReadStream(),
      };
    } catch (error) {
      await handle.close();
      throw error;
    }
  }

  // ── Helpers ────────────────────────────────────────────────

  private async resolve(jobId: string, filename: string): Promise<string> {
    try {
      return await this.workspace.resolve(jobId, filename);
    } catch (error) {
      if (error instanceof InvalidFilenameError) {
        this.logger.warn(`Download rejected: ${error.message}`);
        throw new FileNotFoundException();
      }
      if (error instanceof WorkspaceNotFoundError) {
        this.logger.debug(`Download miss: ${error.message}`);
        throw new FileNotFoundException();
      }
      throw error;
    }
  }
}
