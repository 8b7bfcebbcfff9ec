import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { RasterEngineHealthIndicator } from './raster-engine.health';

@Module({
  imports: [TerminusModule],
  controllers: [HealthController],
  providers: [RasterEngineHealthIndicator],
})
export class HealthModule {}
