import { ConfigService } from '@nestjs/config';
import { mkdtemp, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  JobRegistry,
  WorkspaceClock,
  WorkspaceService,
} from '@pdfimg/workspace';
import { CleanupService } from './cleanup.service';
import { JobNotFoundException } from './exceptions/cleanup.exceptions';

const HOUR = 60 * 60 * 1000;

describe('CleanupService', () => {
  let root: string;
  let monotonic: number;
  let workspace: WorkspaceService;
  let service: CleanupService;

  function createService(config: Record<string, number>): CleanupService {
    return new CleanupService(workspace, new ConfigService(config));
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'cleanup-spec-'));
    monotonic = 0;
    const clock: WorkspaceClock = {
      monotonic: () => monotonic,
      now: () => Date.now(),
    };
    workspace = new WorkspaceService({ root }, clock, new JobRegistry(clock));
    service = createService({
      RETENTION_MAX_AGE_MS: HOUR,
      RETENTION_SWEEP_INTERVAL_MS: 0,
    });
  });

  afterEach(async () => {
    service.onModuleDestroy();
    await rm(root, { recursive: true, force: true });
  });

  describe('cleanup', () => {
    it('deletes the job workspace and acknowledges', async () => {
      const { jobId } = await workspace.create();

      await expect(service.cleanup(jobId)).resolves.toEqual({
        jobId,
        message: `Job ${jobId} cleaned up`,
      });
      expect(await readdir(root)).toEqual([]);
    });

    it('reports a job that is already gone as not found', async () => {
      const { jobId } = await workspace.create();
      await service.cleanup(jobId);

      await expect(service.cleanup(jobId)).rejects.toThrow(JobNotFoundException);
    });

    it('reports a malformed job id as not found', async () => {
      await expect(service.cleanup('../..')).rejects.toThrow('Job ../.. not found');
    });
  });

  describe('sweep', () => {
    it('purges finished jobs past the retention period only', async () => {
      const old = await workspace.create();
      workspace.markRasterizing(old.jobId);
      workspace.markReady(old.jobId);

      monotonic += HOUR + 1;
      const recent = await workspace.create();
      workspace.markRasterizing(recent.jobId);
      workspace.markReady(recent.jobId);

      const report = await service.sweep();

      expect(report).toEqual({
        scanned: 2,
        deleted: [old.jobId],
        retained: 1,
        active: 0,
        failed: [],
      });
      expect(await readdir(root)).toEqual([recent.jobId]);
    });

    it('never deletes a job that is still converting', async () => {
      const running = await workspace.create();
      workspace.markRasterizing(running.jobId);
      const created = await workspace.create();

      monotonic += 10 * HOUR;
      const report = await service.sweep();

      expect(report.active).toBe(2);
      expect(report.deleted).toEqual([]);
      expect((await readdir(root)).sort()).toEqual(
        [running.jobId, created.jobId].sort(),
      );
    });

    it('keeps going when one deletion fails', async () => {
      const first = await workspace.create();
      const second = await workspace.create();
      for (const job of [first, second]) {
        workspace.markRasterizing(job.jobId);
        workspace.markReady(job.jobId);
      }
      monotonic += HOUR + 1;

      const realDelete = workspace.delete.bind(workspace);
      jest.spyOn(workspace, 'delete').mockImplementation(async (jobId) => {
        if (jobId === first.jobId) throw new Error('EACCES');
        return realDelete(jobId);
      });

      const report = await service.sweep();

      expect(report.failed).toEqual([first.jobId]);
      expect(report.deleted).toEqual([second.jobId]);
    });

    it('shares one pass between concurrent callers', async () => {
      const listJobs = jest.spyOn(workspace, 'listJobs');

      const [a, b] = await Promise.all([service.sweep(), service.sweep()]);

      expect(a).toBe(b);
      expect(listJobs).toHaveBeenCalledTimes(1);
    });
  });

  describe('background sweep', () => {
    afterEach(() => {
      jest.useRealTimers();
    });

    it('runs on the configured interval until the module is destroyed', () => {
      jest.useFakeTimers();
      const periodic = createService({
        RETENTION_MAX_AGE_MS: HOUR,
        RETENTION_SWEEP_INTERVAL_MS: 1_000,
      });
      const sweep = jest
        .spyOn(periodic, 'sweep')
        .mockResolvedValue({ scanned: 0, deleted: [], retained: 0, active: 0, failed: [] });

      periodic.onModuleInit();
      jest.advanceTimersByTime(3_000);
      periodic.onModuleDestroy();
      jest.advanceTimersByTime(3_000);

      expect(sweep).toHaveBeenCalledTimes(3);
    });

    it('does not schedule anything when the interval is 0', () => {
      jest.useFakeTimers();
      const sweep = jest.spyOn(service, 'sweep');

      service.onModuleInit();
      jest.advanceTimersByTime(HOUR);

      expect(sweep).not.toHaveBeenCalled();
    });
  });
});
