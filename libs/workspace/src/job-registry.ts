import { Inject, Injectable, Logger } from '@nestjs/common';
import { WORKSPACE_CLOCK } from './workspace.constants';
import { JobRecord, JobStatus, WorkspaceClock } from './workspace.interfaces';

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  created: ['rasterizing', 'failed'],
  rasterizing: ['ready', 'failed'],
  ready: [],
  failed: [],
};

/**
 * JobRegistry — in-memory status record per job.
 *
 * Lifecycle:  created → rasterizing → ready
 *                                   ↘ failed
 *
 * Entries live for as long as the job's workspace does and are not
 * persisted; after a restart only the directories remain.
 */
@Injectable()
export class JobRegistry {
  private readonly logger = new Logger(JobRegistry.name);
  private readonly jobs = new Map<string, JobRecord>();

  constructor(
    @Inject(WORKSPACE_CLOCK)
    private readonly clock: WorkspaceClock,
  ) {}

  register(jobId: string): JobRecord {
    const record: JobRecord = {
      jobId,
      status: 'created',
      startedAt: this.clock.monotonic(),
      createdAt: new Date(this.clock.now()),
    };
    this.jobs.set(jobId, record);
    return record;
  }

  get(jobId: string): JobRecord | undefined {
    return this.jobs.get(jobId);
  }

  transition(jobId: string, next: JobStatus): void {
    const record = this.jobs.get(jobId);
    if (!record) {
      this.logger.warn(`Ignoring ${next} transition for unknown job ${jobId}`);
      return;
    }

    if (!ALLOWED_TRANSITIONS[record.status].includes(next)) {
      throw new Error(
        `Invalid job transition for ${jobId}: ${record.status} → ${next}`,
      );
    }

    record.status = next;
    this.logger.verbose(`Job ${jobId} → ${next}`);
  }

  /** Milliseconds since the job was registered, by the monotonic clock */
  ageOf(jobId: string): number | undefined {
    const record = this.jobs.get(jobId);
    return record ? this.clock.monotonic() - record.startedAt : undefined;
  }

  forget(jobId: string): void {
    this.jobs.delete(jobId);
  }

  get size(): number {
    return this.jobs.size;
  }
}
