import { describe, it, expect, vi } from 'vitest';
import { silentLogger } from '../logging';
import { CurationScheduler, type CronTask } from './scheduler';
import type { CurationResult } from './types';

const result: CurationResult = {
  stats: { listed: 1, inProgress: 1, infoMissing: 0, authorsCreated: 0, skipped: 0, errors: 0 },
  report: {
    startedAt: '2024-05-01T08:00:00.000Z',
    finishedAt: '2024-05-01T08:01:00.000Z',
    passed: ['p1'],
    skipped: [],
    failed: [],
  },
};

function fakeSchedule() {
  const callbacks: Array<() => void> = [];
  const task = { start: vi.fn(), stop: vi.fn() };
  const scheduleFn = vi.fn((_expression: string, callback: () => void): CronTask => {
    callbacks.push(callback);
    return task;
  });
  return { callbacks, task, scheduleFn };
}

describe('CurationScheduler', () => {
  it('does not schedule anything when the internal cron is disabled', () => {
    const { scheduleFn } = fakeSchedule();
    const scheduler = new CurationScheduler({
      enableInternalCron: false,
      cronExpression: '*/30 * * * *',
      jobRunner: async () => result,
      scheduleFn,
      logger: silentLogger,
    });
    expect(scheduler.start()).toBeNull();
    expect(scheduleFn).not.toHaveBeenCalled();
  });

  it('registers the cron expression once and stops the task', () => {
    const { scheduleFn, task } = fakeSchedule();
    const scheduler = new CurationScheduler({
      enableInternalCron: true,
      cronExpression: '*/30 * * * *',
      jobRunner: async () => result,
      scheduleFn,
      logger: silentLogger,
    });

    scheduler.start();
    scheduler.start();
    scheduler.stop();

    expect(scheduleFn).toHaveBeenCalledTimes(1);
    expect(scheduleFn.mock.calls[0][0]).toBe('*/30 * * * *');
    expect(task.start).toHaveBeenCalledTimes(1);
    expect(task.stop).toHaveBeenCalledTimes(1);
  });

  it('skips a tick while the previous run is still going', async () => {
    const { scheduleFn, callbacks } = fakeSchedule();
    let release: () => void = () => undefined;
    const jobRunner = vi.fn(
      () =>
        new Promise<CurationResult>((resolve) => {
          release = () => resolve(result);
        }),
    );
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const scheduler = new CurationScheduler({
      enableInternalCron: true,
      cronExpression: '* * * * *',
      jobRunner,
      scheduleFn,
      logger,
    });

    scheduler.start();
    callbacks[0]();
    callbacks[0]();
    expect(jobRunner).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('curation.run.overlap', { cron: '* * * * *' });

    release();
    await vi.waitFor(() => expect(logger.info).toHaveBeenCalledWith('curation.run.complete', result.stats));
    callbacks[0]();
    expect(jobRunner).toHaveBeenCalledTimes(2);
  });

  it('logs and rethrows a failed run', async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const scheduler = new CurationScheduler({
      enableInternalCron: false,
      cronExpression: '* * * * *',
      jobRunner: async () => {
        throw new Error('workspace unreachable');
      },
      logger,
    });

    await expect(scheduler.runOnce()).rejects.toThrow('workspace unreachable');
    expect(logger.error).toHaveBeenCalledWith(
      'curation.run.failed',
      expect.objectContaining({ error: 'workspace unreachable' }),
    );
  });
});
