import { HttpException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createWriteStream } from 'fs';
import { rename, rm } from 'fs/promises';
import { join } from 'path';
import { pipeline } from 'stream/promises';
import { types } from 'util';
import {
  MAX_DPI,
  MIN_DPI,
  RASTER_FORMATS,
  RasterEngineFailureError,
  RasterEngineUnavailableError,
  RasterFormat,
  RasterizationTimeoutError,
  RasterizerService,
  extensionFor,
  isRasterFormat,
  isValidDpi,
} from '@pdfimg/rasterizer';
import {
  JobWorkspace,
  PageFile,
  WorkspaceService,
  pageFileName,
  parsePageFile,
} from '@pdfimg/workspace';
import { Manifest } from './interfaces/manifest.interface';
import {
  ConversionParams,
  UploadedDocument,
} from './interfaces/uploaded-document.interface';
import {
  ConversionTimeoutException,
  DocumentRasterizationException,
  EngineUnavailableException,
  FileTooLargeException,
  InvalidParameterException,
  MissingFileException,
  NoPagesProducedException,
  WorkspaceIoException,
} from './exceptions/conversion.exceptions';
import { BYTES_PER_MB, maxUploadBytes } from './upload-limits';

/** Fixed name of the uploaded document inside its workspace */
export const SOURCE_FILENAME = 'source.pdf';

/**
 * ConversionService — orchestrates one PDF → images conversion.
 *
 * Happy path:
 *   1. Validate format, dpi and the upload (no disk or process work yet)
 *   2. Create a fresh job workspace
 *   3. Stream the upload into {workspace}/source.pdf
 *   4. Rasterize into the same workspace
 *   5. Collect page files, renumber them page-1..page-N, drop source.pdf
 *   6. Return the manifest
 *
 * Failure invariants:
 *   - Validation failures → 4xx, no workspace created
 *   - Any failure in 3–5 → workspace deleted, job marked failed, one typed
 *     HttpException raised; no manifest is ever returned alongside an error
 *   - Nothing is retried here; retry is the caller's decision
 */
@Injectable()
export class ConversionService {
  private readonly logger = new Logger(ConversionService.name);
  private readonly maxFileSizeBytes: number;

  constructor(
    private readonly workspace: WorkspaceService,
    private readonly rasterizer: RasterizerService,
    private readonly configService: ConfigService,
  ) {
    this.maxFileSizeBytes = maxUploadBytes(this.configService);
  }

  async convert(
    upload: UploadedDocument | undefined,
    params: ConversionParams,
  ): Promise<Manifest> {
    // ── Step 1: Validate ───────────────────────────────────
    const { format, dpi } = this.validateParams(params);
    const document = this.validateUpload(upload);

    // ── Step 2: Allocate workspace ─────────────────────────
    const job = await this.createWorkspace();
    this.logger.log(
      `Job ${job.jobId}: converting "${document.originalName}" ` +
        `(${document.size} bytes) → ${format} @ ${dpi} dpi`,
    );

    try {
      // ── Step 3: Persist upload ───────────────────────────
      const sourcePath = join(job.path, SOURCE_FILENAME);
      await pipeline(
        document.content,
        createWriteStream(sourcePath, { flags: 'wx' }),
      );

      // ── Step 4: Rasterize ────────────────────────────────
      this.workspace.markRasterizing(job.jobId);
      await this.rasterizer.rasterize({
        documentPath: sourcePath,
        outputDir: job.path,
        format,
        dpi,
      });

      // ── Step 5: Collect and normalize pages ──────────────
      const files = await this.collectPages(job, format);
      await rm(sourcePath, { force: true });

      this.workspace.markReady(job.jobId);
      this.logger.log(`Job ${job.jobId} ready: ${files.length} page(s)`);

      // ── Step 6: Manifest ─────────────────────────────────
      return {
        jobId: job.jobId,
        format,
        dpi,
        count: files.length,
        files,
        downloadBase: `/download/${job.jobId}/`,
      };
    } catch (error) {
      const exception = this.toHttpException(error);
      await this.discard(job.jobId, exception);
      throw exception;
    }
  }

  // ── Private methods ──────────────────────────────────────

  private validateParams(params: ConversionParams): {
    format: RasterFormat;
    dpi: number;
  } {
    if (!isRasterFormat(params.format)) {
      throw new InvalidParameterException(
        `fmt must be one of: ${RASTER_FORMATS.join(', ')}`,
      );
    }
    if (!isValidDpi(params.dpi)) {
      throw new InvalidParameterException(
        `dpi must be an integer between ${MIN_DPI} and ${MAX_DPI}`,
      );
    }
    return { format: params.format, dpi: params.dpi };
  }

  private validateUpload(upload: UploadedDocument | undefined): UploadedDocument {
    if (!upload || upload.size === 0) {
      throw new MissingFileException();
    }

    const name = upload.originalName.trim();
    if (name.length === 0) {
      throw new InvalidParameterException('No filename provided');
    }
    if (!name.toLowerCase().endsWith('.pdf')) {
      throw new InvalidParameterException('File must be a PDF');
    }

    if (upload.size > this.maxFileSizeBytes) {
      throw new FileTooLargeException(this.maxFileSizeBytes / BYTES_PER_MB);
    }

    return upload;
  }

  private async createWorkspace(): Promise<JobWorkspace> {
    try {
      return await this.workspace.create();
    } catch (error) {
      const cause = types.isNativeError(error) ? error : new Error(String(error));
      this.logger.error(`Failed to create job workspace: ${cause.message}`);
      throw new WorkspaceIoException(cause);
    }
  }

  /**
   * Enumerates the engine's page files, checks they number 1..N without
   * gaps, and renames pdftoppm's zero-padded names (page-01.png) to the
   * unpadded form (page-1.png).
   */
  private async collectPages(
    job: JobWorkspace,
    format: RasterFormat,
  ): Promise<string[]> {
    const extension = extensionFor(format);
    const pages = (await this.workspace.list(job.jobId))
      .map(parsePageFile)
      .filter(
        (page): page is PageFile =>
          page !== null && page.extension === extension,
      );

    if (pages.length === 0) {
      throw new NoPagesProducedException();
    }

    const files: string[] = [];
    for (const [index, page] of pages.entries()) {
      const expected = index + 1;
      if (page.page !== expected) {
        throw new RasterEngineFailureError(
          `Engine produced non-contiguous pages: expected page ${expected}, found ${page.name}`,
          null,
        );
      }

      const target = pageFileName(expected, extension);
      if (page.name !== target) {
        await rename(join(job.path, page.name), join(job.path, target));
      }
      files.push(target);
    }

    return files;
  }

  private toHttpException(error: unknown): HttpException {
    if (error instanceof HttpException) return error;

    if (error instanceof RasterizationTimeoutError) {
      return new ConversionTimeoutException(error.timeoutMs, error);
    }
    if (error instanceof RasterEngineFailureError) {
      return new DocumentRasterizationException(error.diagnostic, error);
    }
    if (error instanceof RasterEngineUnavailableError) {
      return new EngineUnavailableException(error);
    }

    const cause = types.isNativeError(error) ? error : new Error(String(error));
    return new WorkspaceIoException(cause);
  }

  /**
   * Cleanup-on-failure. Best effort: a failing delete is logged and never
   * replaces the original error.
   */
  private async discard(jobId: string, reason: HttpException): Promise<void> {
    const cause = reason.cause instanceof Error ? reason.cause : reason;
    const log = `Job ${jobId} failed (${reason.getStatus()}): ${cause.message}`;
    if (reason.getStatus() >= 500) {
      this.logger.error(log);
    } else {
      this.logger.warn(log);
    }

    try {
      this.workspace.markFailed(jobId);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Could not mark job ${jobId} failed: ${message}`);
    }

    try {
      await this.workspace.delete(jobId);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Failed to remove workspace of failed job ${jobId}: ${message}`,
      );
    }
  }
}
