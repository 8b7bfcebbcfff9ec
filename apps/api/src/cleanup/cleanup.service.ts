import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DeleteOutcome,
  WorkspaceEntry,
  WorkspaceNotFoundError,
  WorkspaceService,
} from '@pdfimg/workspace';
import { CleanupAck, SweepReport } from './interfaces/cleanup.interfaces';
import { JobNotFoundException } from './exceptions/cleanup.exceptions';

/** Workspaces older than this are purged (1 hour) */
const DEFAULT_RETENTION_MS = 60 * 60 * 1000;

/** How often the background sweep runs (10 minutes) */
const DEFAULT_SWEEP_INTERVAL_MS = 10 * 60 * 1000;

/**
 * CleanupService — job workspace lifecycle after conversion.
 *
 * 1. cleanup(jobId) — explicit, immediate deletion of one workspace
 * 2. sweep()        — deletes every workspace older than RETENTION_MAX_AGE_MS
 * 3. A background timer runs sweep() every RETENTION_SWEEP_INTERVAL_MS
 *    (0 disables it)
 *
 * The sweep never touches a job whose conversion is still in progress, and
 * the retention period is far longer than the engine timeout, so a
 * workspace is never deleted while it is being written.
 */
@Injectable()
export class CleanupService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CleanupService.name);
  private readonly retentionMs: number;
  private readonly sweepIntervalMs: number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private sweepInFlight: Promise<SweepReport> | null = null;

  constructor(
    private readonly workspace: WorkspaceService,
    private readonly configService: ConfigService,
  ) {
    this.retentionMs = Number(
      this.configService.get<number>('RETENTION_MAX_AGE_MS', DEFAULT_RETENTION_MS),
    );
    this.sweepIntervalMs = Number(
      this.configService.get<number>(
        'RETENTION_SWEEP_INTERVAL_MS',
        DEFAULT_SWEEP_INTERVAL_MS,
      ),
    );
  }

  onModuleInit(): void {
    if (this.sweepIntervalMs <= 0) {
      this.logger.log('Background retention sweep disabled');
      return;
    }

    this.sweepTimer = setInterval(() => {
      this.sweep().catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`Retention sweep failed: ${message}`);
      });
    }, this.sweepIntervalMs);
    // Do not keep the process alive just for the sweep
    this.sweepTimer.unref();

    this.logger.log(
      `Retention sweep every ${this.sweepIntervalMs} ms, max age ${this.retentionMs} ms`,
    );
  }

  onModuleDestroy(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /**
   * Deletes one job's workspace.
   * @throws JobNotFoundException when there is nothing to delete
   */
  async cleanup(jobId: string): Promise<CleanupAck> {
    let outcome: DeleteOutcome;
    try {
      outcome = await this.workspace.delete(jobId);
    } catch (error) {
      if (error instanceof WorkspaceNotFoundError) {
        throw new JobNotFoundException(jobId);
      }
      throw error;
    }

    if (outcome === 'absent') {
      throw new JobNotFoundException(jobId);
    }

    this.logger.log(`Job ${jobId} cleaned up`);
    return { jobId, message: `Job ${jobId} cleaned up` };
  }

  /**
   * Purges workspaces past the retention period. A sweep already running is
   * shared with concurrent callers instead of starting a second pass.
   */
  sweep(): Promise<SweepReport> {
    if (!this.sweepInFlight) {
      this.sweepInFlight = this.runSweep().finally(() => {
        this.sweepInFlight = null;
      });
    }
    return this.sweepInFlight;
  }

  // ── Private helpers ──────────────────────────────────────

  private async runSweep(): Promise<SweepReport> {
    const entries = await this.workspace.listJobs();
    const report: SweepReport = {
      scanned: entries.length,
      deleted: [],
      retained: 0,
      active: 0,
      failed: [],
    };

    for (const entry of entries) {
      if (this.isActive(entry)) {
        report.active++;
        continue;
      }
      if (entry.ageMs <= this.retentionMs) {
        report.retained++;
        continue;
      }

      try {
        await this.workspace.delete(entry.jobId);
        report.deleted.push(entry.jobId);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Could not purge job ${entry.jobId}: ${message}`);
        report.failed.push(entry.jobId);
      }
    }

    if (report.deleted.length > 0 || report.failed.length > 0) {
      this.logger.log(
        `Retention sweep: scanned=${report.scanned}, deleted=${report.deleted.length}, ` +
          `failed=${report.failed.length}, active=${report.active}`,
      );
    }

    return report;
  }

  private isActive(entry: WorkspaceEntry): boolean {
    return entry.status === 'created' || entry.status === 'rasterizing';
  }
}
