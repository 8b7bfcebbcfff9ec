import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CleanupController } from './cleanup.controller';
import { CleanupService } from './cleanup.service';

/**
 * CleanupModule — explicit job deletion plus the background retention
 * sweep (RETENTION_MAX_AGE_MS, RETENTION_SWEEP_INTERVAL_MS).
 */
@Module({
  imports: [ConfigModule],
  controllers: [CleanupController],
  providers: [CleanupService],
  exports: [CleanupService],
})
export class CleanupModule {}
