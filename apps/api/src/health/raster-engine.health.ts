import { Injectable } from '@nestjs/common';
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { RasterizerService } from '@pdfimg/rasterizer';

/**
 * Terminus indicator for the page rasterization engine.
 *
 * Healthy when `pdftoppm -v` runs; reports the engine version and the
 * admission gate's current load alongside.
 */
@Injectable()
export class RasterEngineHealthIndicator extends HealthIndicator {
  constructor(private readonly rasterizer: RasterizerService) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const probe = await this.rasterizer.probe();
    const result = this.getStatus(key, probe.available, {
      version: probe.version ?? null,
      activeProcesses: this.rasterizer.activeCount,
      queued: this.rasterizer.pendingCount,
      ...(probe.detail ? { detail: probe.detail } : {}),
    });

    if (probe.available) {
      return result;
    }
    throw new HealthCheckError('Raster engine unavailable', result);
  }
}
