import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { RasterizerModule } from '@pdfimg/rasterizer';
import { WorkspaceModule } from '@pdfimg/workspace';
import { ConversionModule } from './conversion/conversion.module';
import { DownloadsModule } from './downloads/downloads.module';
import { CleanupModule } from './cleanup/cleanup.module';
import { HealthModule } from './health/health.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
    }),

    // ── Shared Infrastructure ─────────────────────────────
    WorkspaceModule.forRoot(),
    RasterizerModule.forRoot(),

    // ── Feature Modules ───────────────────────────────────
    ConversionModule,
    DownloadsModule,
    CleanupModule,
    HealthModule,
  ],
})
export class AppModule {}
