export type JobStatus = 'created' | 'rasterizing' | 'ready' | 'failed';

export interface JobRecord {
  readonly jobId: string;
  status: JobStatus;
  /** Monotonic clock reading taken when the workspace was created */
  readonly startedAt: number;
  readonly createdAt: Date;
}

export interface JobWorkspace {
  jobId: string;
  /** Absolute path of the job's directory */
  path: string;
}

/** `absent` means the job directory was already gone */
export type DeleteOutcome = 'deleted' | 'absent';

export interface WorkspaceEntry {
  jobId: string;
  path: string;
  ageMs: number;
  /** Unknown for directories left over from a previous process */
  status?: JobStatus;
}

export interface WorkspaceOptions {
  root: string;
}

export interface WorkspaceClock {
  /** Monotonic milliseconds, used for job ages within this process */
  monotonic(): number;
  /** Wall-clock epoch milliseconds, compared with directory mtimes */
  now(): number;
}
