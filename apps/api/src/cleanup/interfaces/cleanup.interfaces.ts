export interface CleanupAck {
  jobId: string;
  message: string;
}

/**
 * Outcome of one retention sweep.
 *
 *   scanned  — job directories found under the root
 *   deleted  — job ids removed because they outlived the retention period
 *   retained — younger than the retention period
 *   active   — still created/rasterizing, never touched regardless of age
 *   failed   — deletion attempted and failed (logged, retried next sweep)
 */
export interface SweepReport {
  scanned: number;
  deleted: string[];
  retained: number;
  active: number;
  failed: string[];
}
