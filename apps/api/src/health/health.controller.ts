import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';
import { RasterizerService } from '@pdfimg/rasterizer';
import { WorkspaceService } from '@pdfimg/workspace';
import { RasterEngineHealthIndicator } from './raster-engine.health';
import { HealthStatusDto } from './dto/health-status.dto';

@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly engine: RasterEngineHealthIndicator,
    private readonly rasterizer: RasterizerService,
    private readonly workspace: WorkspaceService,
  ) {}

  /** Always 200; `degraded` when the engine binary cannot be run */
  @Get()
  async status(): Promise<HealthStatusDto> {
    const engineAvailable = await this.rasterizer.isEngineAvailable();
    return {
      status: engineAvailable ? 'healthy' : 'degraded',
      engine_available: engineAvailable,
      workspace_root: this.workspace.root,
    };
  }

  /** Readiness probe: 503 when the engine is unavailable */
  @Get('ready')
  @HealthCheck()
  ready(): Promise<HealthCheckResult> {
    return this.health.check([() => this.engine.isHealthy('rasterEngine')]);
  }
}
