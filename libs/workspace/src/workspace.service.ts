import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { lstat, mkdir, readdir, rm, stat } from 'fs/promises';
import { isAbsolute, join, relative, resolve, sep } from 'path';
import { generateJobId, isJobId } from './job-id';
import { JobRegistry } from './job-registry';
import { comparePageFiles } from './page-files';
import { WORKSPACE_CLOCK, WORKSPACE_OPTIONS } from './workspace.constants';
import {
  DeleteOutcome,
  JobWorkspace,
  WorkspaceClock,
  WorkspaceEntry,
  WorkspaceOptions,
} from './workspace.interfaces';
import {
  InvalidFilenameError,
  WorkspaceNotFoundError,
} from './workspace.errors';

/**
 * fs errors are not always `instanceof Error` in the caller's realm (Jest
 * runs modules in a separate VM context), so match on the code alone.
 */
function isMissingPath(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * WorkspaceService — owns every job directory under the workspace root.
 *
 * Layout:  {root}/{jobId}/{source.pdf | page-<n>.<ext>}
 *
 * Concurrency safety comes from partitioning alone: each job id is a fresh
 * UUID and its directory is created with a non-recursive mkdir, so two jobs
 * can never end up sharing a directory.
 */
@Injectable()
export class WorkspaceService implements OnModuleInit {
  private readonly logger = new Logger(WorkspaceService.name);
  readonly root: string;

  constructor(
    @Inject(WORKSPACE_OPTIONS)
    options: WorkspaceOptions,

    @Inject(WORKSPACE_CLOCK)
    private readonly clock: WorkspaceClock,

    private readonly registry: JobRegistry,
  ) {
    this.root = resolve(options.root);
  }

  async onModuleInit(): Promise<void> {
    await mkdir(this.root, { recursive: true });
    this.logger.log(`Workspace root ready at ${this.root}`);
  }

  /**
   * Allocates a new job id and its empty directory.
   * mkdir fails with EEXIST rather than reuse an existing directory.
   */
  async create(): Promise<JobWorkspace> {
    const jobId = generateJobId();
    const path = join(this.root, jobId);

    await mkdir(this.root, { recursive: true });
    await mkdir(path);
    this.registry.register(jobId);

    this.logger.debug(`Created workspace ${path}`);
    return { jobId, path };
  }

  /**
   * Absolute path of the job directory. Does not touch the filesystem.
   * @throws WorkspaceNotFoundError when `jobId` is not a job id
   */
  pathOf(jobId: string): string {
    if (!isJobId(jobId)) {
      throw new WorkspaceNotFoundError(jobId);
    }
    return join(this.root, jobId);
  }

  /**
   * Resolves `filename` to an existing regular file inside the job directory.
   *
   * @throws InvalidFilenameError  — empty name, separators, `..`, absolute
   *                                 path, or a path escaping the job directory
   * @throws WorkspaceNotFoundError — unknown job, missing file, or not a
   *                                 regular file (symlinks included)
   */
  async resolve(jobId: string, filename: string): Promise<string> {
    const jobPath = this.pathOf(jobId);
    this.assertSafeFilename(jobId, filename);

    const target = resolve(jobPath, filename);
    const rel = relative(jobPath, target);
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel) || rel.includes(sep)) {
      throw new InvalidFilenameError(jobId, filename, 'escapes job directory');
    }

    await this.assertJobExists(jobId, jobPath);

    const entry = await lstat(target).catch((error: unknown) => {
      if (isMissingPath(error)) return null;
      throw error;
    });
    if (!entry?.isFile()) {
      throw new WorkspaceNotFoundError(jobId, filename);
    }

    return target;
  }

  /** Filenames present in the job directory, page files in page order first */
  async list(jobId: string): Promise<string[]> {
    const jobPath = this.pathOf(jobId);

    try {
      const names = await readdir(jobPath);
      return names.sort(comparePageFiles);
    } catch (error) {
      if (isMissingPath(error)) throw new WorkspaceNotFoundError(jobId);
      throw error;
    }
  }

  /**
   * Recursively removes the job directory. Idempotent: a job that is
   * already gone yields `'absent'` instead of an error.
   */
  async delete(jobId: string): Promise<DeleteOutcome> {
    const jobPath = this.pathOf(jobId);
    const exists = await this.directoryExists(jobPath);

    this.registry.forget(jobId);
    if (!exists) return 'absent';

    await rm(jobPath, { recursive: true, force: true });
    this.logger.debug(`Deleted workspace ${jobPath}`);
    return 'deleted';
  }

  /**
   * Every job directory under the root with its age.
   *
   * Jobs created by this process are aged by the monotonic clock from their
   * registration; leftovers from an earlier process by directory mtime.
   * Entries whose name is not a job id are skipped.
   */
  async listJobs(): Promise<WorkspaceEntry[]> {
    const names = await readdir(this.root).catch((error: unknown) => {
      if (isMissingPath(error)) return [];
      throw error;
    });

    const entries: WorkspaceEntry[] = [];
    for (const jobId of names) {
      if (!isJobId(jobId)) continue;

      const path = join(this.root, jobId);
      const record = this.registry.get(jobId);
      if (record) {
        entries.push({
          jobId,
          path,
          ageMs: this.clock.monotonic() - record.startedAt,
          status: record.status,
        });
        continue;
      }

      const info = await stat(path).catch(() => null);
      if (!info?.isDirectory()) continue;
      entries.push({
        jobId,
        path,
        ageMs: Math.max(0, this.clock.now() - info.mtimeMs),
      });
    }

    return entries;
  }

  markRasterizing(jobId: string): void {
    this.registry.transition(jobId, 'rasterizing');
  }

  markReady(jobId: string): void {
    this.registry.transition(jobId, 'ready');
  }

  markFailed(jobId: string): void {
    this.registry.transition(jobId, 'failed');
  }

  // ── Helpers ────────────────────────────────────────────────

  private assertSafeFilename(jobId: string, filename: string): void {
    if (filename.length === 0) {
      throw new InvalidFilenameError(jobId, filename, 'empty');
    }
    if (/[/\\\0]/.test(filename)) {
      throw new InvalidFilenameError(jobId, filename, 'contains a path separator');
    }
    if (filename.includes('..')) {
      throw new InvalidFilenameError(jobId, filename, 'contains ".."');
    }
    if (isAbsolute(filename) || /^[a-zA-Z]:/.test(filename)) {
      throw new InvalidFilenameError(jobId, filename, 'absolute path');
    }
  }

  private async assertJobExists(jobId: string, jobPath: string): Promise<void> {
    if (!(await this.directoryExists(jobPath))) {
      throw new WorkspaceNotFoundError(jobId);
    }
  }

  private async directoryExists(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isDirectory();
    } catch (error) {
      if (isMissingPath(error)) return false;
      throw error;
    }
  }
}
