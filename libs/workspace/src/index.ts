/**
 * @pdfimg/workspace
 *
 * Per-job directory management for the conversion service.
 *
 * Exports:
 *   - WorkspaceModule.forRoot()  — import once in AppModule
 *   - WorkspaceService           — create / resolve / list / delete / listJobs
 *   - JobRegistry                — in-memory job status
 *   - page file helpers          — page-<n>.<ext> naming and ordering
 */
export { WorkspaceModule, systemClock } from './workspace.module';
export { WorkspaceService } from './workspace.service';
export { JobRegistry } from './job-registry';
export { generateJobId, isJobId } from './job-id';
export { pageFileName, parsePageFile, comparePageFiles } from './page-files';
export type { PageFile, PageExtension } from './page-files';
export {
  WORKSPACE_OPTIONS,
  WORKSPACE_CLOCK,
  DEFAULT_ROOT_DIRNAME,
} from './workspace.constants';
export type {
  DeleteOutcome,
  JobRecord,
  JobStatus,
  JobWorkspace,
  WorkspaceClock,
  WorkspaceEntry,
  WorkspaceOptions,
} from './workspace.interfaces';
export {
  WorkspaceError,
  WorkspaceNotFoundError,
  InvalidFilenameError,
} from './workspace.errors';
