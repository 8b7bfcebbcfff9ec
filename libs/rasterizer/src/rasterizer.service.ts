import { Inject, Injectable, Logger } from '@nestjs/common';
import { access, constants, stat } from 'fs/promises';
import pLimit from 'p-limit';
import { RASTER_ENGINE, RASTERIZER_OPTIONS } from './rasterizer.constants';
import {
  EngineProbe,
  RasterEngine,
  RasterizeRequest,
  RasterizeResult,
  RasterizerOptions,
} from './rasterizer.interfaces';
import { InvalidRasterRequestError } from './rasterizer.errors';
import { MAX_DPI, MIN_DPI, isRasterFormat, isValidDpi } from './raster-format';

/**
 * RasterizerService — the entry point callers use to rasterize a document.
 *
 * Responsibilities:
 * 1. Check the request (document readable, output dir present, format, dpi)
 * 2. Admit at most `maxConcurrency` engine processes at once; further
 *    requests wait in FIFO order
 * 3. Delegate to the bound RasterEngine and log the outcome
 *
 * Errors from the engine propagate unchanged (RasterizationError family).
 */
@Injectable()
export class RasterizerService {
  private readonly logger = new Logger(RasterizerService.name);
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(
    @Inject(RASTER_ENGINE)
    private readonly engine: RasterEngine,

    @Inject(RASTERIZER_OPTIONS)
    private readonly options: RasterizerOptions,
  ) {
    this.limit = pLimit(options.maxConcurrency);
  }

  /** Engine processes currently running */
  get activeCount(): number {
    return this.limit.activeCount;
  }

  /** Requests waiting for an engine slot */
  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  async rasterize(request: RasterizeRequest): Promise<RasterizeResult> {
    await this.assertUsable(request);

    if (this.limit.activeCount >= this.options.maxConcurrency) {
      this.logger.debug(
        `Engine slots full (${this.limit.activeCount}/${this.options.maxConcurrency}); ` +
          `queueing ${request.documentPath}`,
      );
    }

    return this.limit(async () => {
      this.logger.log(
        `Rasterizing ${request.documentPath} → ${request.format} @ ${request.dpi} dpi`,
      );

      try {
        const result = await this.engine.rasterize(request);
        this.logger.log(
          `Rasterized ${request.documentPath} in ${result.durationMs} ms`,
        );
        return result;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `Rasterization of ${request.documentPath} failed: ${message}`,
        );
        throw error;
      }
    });
  }

  /** Engine availability for health reporting. Never throws. */
  async probe(): Promise<EngineProbe> {
    try {
      return await this.engine.probe();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { available: false, detail: message };
    }
  }

  async isEngineAvailable(): Promise<boolean> {
    const probe = await this.probe();
    return probe.available;
  }

  // ── Helpers ────────────────────────────────────────────────

  private async assertUsable(request: RasterizeRequest): Promise<void> {
    if (!isRasterFormat(request.format)) {
      throw new InvalidRasterRequestError(
        `Unsupported format "${String(request.format)}"`,
      );
    }
    if (!isValidDpi(request.dpi)) {
      throw new InvalidRasterRequestError(
        `dpi must be an integer between ${MIN_DPI} and ${MAX_DPI}`,
      );
    }

    try {
      await access(request.documentPath, constants.R_OK);
    } catch {
      throw new InvalidRasterRequestError(
        `Document ${request.documentPath} does not exist or is not readable`,
      );
    }

    const outputDir = await stat(request.outputDir).catch(() => null);
    if (!outputDir?.isDirectory()) {
      throw new InvalidRasterRequestError(
        `Output directory ${request.outputDir} does not exist`,
      );
    }
  }
}
