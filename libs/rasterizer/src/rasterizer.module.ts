import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  DEFAULT_JPEG_QUALITY,
  DEFAULT_MAX_CONCURRENCY,
  DEFAULT_TIMEOUT_MS,
  RASTER_ENGINE,
  RASTERIZER_OPTIONS,
} from './rasterizer.constants';
import { RasterizerOptions } from './rasterizer.interfaces';
import { PdftoppmEngine } from './pdftoppm.engine';
import { RasterizerService } from './rasterizer.service';

/**
 * RasterizerModule — wires the rasterization capability.
 *
 * Usage:
 *   RasterizerModule.forRoot()  — in AppModule
 *
 * Reads RASTER_ENGINE_BINARY, RASTER_TIMEOUT_MS, RASTER_MAX_CONCURRENCY and
 * RASTER_JPEG_QUALITY. The module is global so the single admission gate in
 * RasterizerService is shared by every consumer.
 */
@Module({})
export class RasterizerModule {
  static forRoot(): DynamicModule {
    const optionsProvider: Provider = {
      provide: RASTERIZER_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): RasterizerOptions => ({
        binary: configService.get<string>('RASTER_ENGINE_BINARY', 'pdftoppm'),
        timeoutMs: Number(
          configService.get<number>('RASTER_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),
        ),
        maxConcurrency: Math.max(
          1,
          Number(
            configService.get<number>(
              'RASTER_MAX_CONCURRENCY',
              DEFAULT_MAX_CONCURRENCY,
            ),
          ),
        ),
        jpegQuality: Number(
          configService.get<number>('RASTER_JPEG_QUALITY', DEFAULT_JPEG_QUALITY),
        ),
      }),
    };

    const engineProvider: Provider = {
      provide: RASTER_ENGINE,
      useClass: PdftoppmEngine,
    };

    return {
      module: RasterizerModule,
      imports: [ConfigModule],
      providers: [optionsProvider, engineProvider, RasterizerService],
      exports: [RasterizerService],
      global: true,
    };
  }
}
