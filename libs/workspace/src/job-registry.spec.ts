import { JobRegistry } from './job-registry';
import { WorkspaceClock } from './workspace.interfaces';

describe('JobRegistry', () => {
  let monotonic: number;
  let registry: JobRegistry;

  beforeEach(() => {
    monotonic = 1_000;
    const clock: WorkspaceClock = {
      monotonic: () => monotonic,
      now: () => 1_700_000_000_000,
    };
    registry = new JobRegistry(clock);
  });

  it('registers jobs as created with their start time', () => {
    const record = registry.register('job-a');

    expect(record).toEqual({
      jobId: 'job-a',
      status: 'created',
      startedAt: 1_000,
      createdAt: new Date(1_700_000_000_000),
    });
    expect(registry.get('job-a')).toBe(record);
  });

  it('follows created → rasterizing → ready', () => {
    registry.register('job-a');

    registry.transition('job-a', 'rasterizing');
    registry.transition('job-a', 'ready');

    expect(registry.get('job-a')?.status).toBe('ready');
  });

  it('allows failure from created and rasterizing', () => {
    registry.register('job-a');
    registry.register('job-b');
    registry.transition('job-b', 'rasterizing');

    registry.transition('job-a', 'failed');
    registry.transition('job-b', 'failed');

    expect(registry.get('job-a')?.status).toBe('failed');
    expect(registry.get('job-b')?.status).toBe('failed');
  });

  it('rejects transitions out of a terminal state', () => {
    registry.register('job-a');
    registry.transition('job-a', 'rasterizing');
    registry.transition('job-a', 'ready');

    expect(() => registry.transition('job-a', 'failed')).toThrow(
      'Invalid job transition for job-a: ready → failed',
    );
  });

  it('ignores transitions for jobs it does not know', () => {
    expect(() => registry.transition('ghost', 'ready')).not.toThrow();
    expect(registry.get('ghost')).toBeUndefined();
  });

  it('ages jobs by the monotonic clock and forgets them', () => {
    registry.register('job-a');
    monotonic += 2_500;

    expect(registry.ageOf('job-a')).toBe(2_500);

    registry.forget('job-a');
    expect(registry.ageOf('job-a')).toBeUndefined();
    expect(registry.size).toBe(0);
  });
});
