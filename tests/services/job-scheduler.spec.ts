import { describe, it, expect, vi, afterEach } from 'vitest';
import { JobScheduler } from '../../src/services/job-scheduler.js';

describe('JobScheduler', () => {
  const scheduler = new JobScheduler();

  afterEach(() => {
    for (const job of scheduler.listJobs()) {
      scheduler.unregister(job.id);
    }
  });

  it('runs a job on demand and records the run', async () => {
    const handler = vi.fn();
    scheduler.register({ id: 'tick', cronExpression: '*/30 * * * * *', description: 'Tick', handler, autoStart: false });

    await scheduler.runNow('tick');

    expect(handler).toHaveBeenCalledTimes(1);
    expect(scheduler.listJobs()).toMatchObject([
      { id: 'tick', cronExpression: '*/30 * * * * *', status: 'stopped', runCount: 1, lastError: null },
    ]);
  });

  it('isolates a failing handler and records the error', async () => {
    scheduler.register({
      id: 'broken',
      cronExpression: '0 * * * * *',
      description: 'Always fails',
      quiet: true,
      autoStart: false,
      handler: () => {
        throw new Error('boom');
      },
    });

    await expect(scheduler.runNow('broken')).resolves.toBeUndefined();

    expect(scheduler.listJobs()).toMatchObject([{ id: 'broken', status: 'error', lastError: 'boom', runCount: 1 }]);
  });

  it('rejects duplicate ids and invalid expressions', () => {
    scheduler.register({ id: 'once', cronExpression: '0 * * * * *', description: 'Once', handler: () => undefined, autoStart: false });

    expect(() =>
      scheduler.register({ id: 'once', cronExpression: '0 * * * * *', description: 'Again', handler: () => undefined }),
    ).toThrow("Job 'once' is already registered.");
    expect(() =>
      scheduler.register({ id: 'bad', cronExpression: 'not a cron', description: 'Bad', handler: () => undefined }),
    ).toThrow('Invalid cron expression');
  });

  it('marks jobs stopped by stopAll', () => {
    scheduler.register({ id: 'live', cronExpression: '0 * * * * *', description: 'Live', handler: () => undefined });

    scheduler.stopAll();

    expect(scheduler.listJobs()).toMatchObject([{ id: 'live', status: 'stopped', runCount: 0 }]);
  });

  it('forgets a job once unregistered', async () => {
    scheduler.register({ id: 'gone', cronExpression: '0 * * * * *', description: 'Gone', handler: () => undefined, autoStart: false });

    expect(scheduler.unregister('gone')).toBe(true);
    expect(scheduler.unregister('gone')).toBe(false);
    expect(scheduler.has('gone')).toBe(false);
    await expect(scheduler.runNow('gone')).rejects.toThrow("Job 'gone' is not registered.");
  });
});
