import { afterEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logEvent: vi.fn(async () => undefined),
}));

import { isValidCronExpression, JobScheduler, logScheduleEvent } from '../../src/services/job-scheduler.js';
import type { ScheduleEvent } from '../../src/types/scheduler.js';
import { logEvent } from '../../src/utils/logger.js';

const AT = new Date('2026-03-01T04:00:00.000Z');

describe('JobScheduler', () => {
  const schedulers: JobScheduler[] = [];

  afterEach(() => {
    for (const scheduler of schedulers.splice(0)) {
      scheduler.stopAll();
    }
  });

  function createScheduler(events: ScheduleEvent[] = []): JobScheduler {
    const scheduler = new JobScheduler({ onEvent: (event) => events.push(event), now: () => AT });
    schedulers.push(scheduler);
    return scheduler;
  }

  it('validates cron expressions', () => {
    expect(isValidCronExpression('0 4 * * *')).toBe(true);
    expect(isValidCronExpression('every night')).toBe(false);
  });

  it('rejects invalid expressions and duplicate ids', () => {
    const scheduler = createScheduler();
    const run = async () => undefined;
    expect(() => scheduler.register({ id: 'fleet-update', cronExpression: 'nope', run })).toThrow(
      "[JobScheduler] Invalid cron expression for job 'fleet-update': nope",
    );

    scheduler.register({ id: 'fleet-update', cronExpression: '0 4 * * *', run });
    expect(() => scheduler.register({ id: 'fleet-update', cronExpression: '0 4 * * *', run })).toThrow(
      "[JobScheduler] Job 'fleet-update' is already registered.",
    );
  });

  it('reports a successful run', async () => {
    const events: ScheduleEvent[] = [];
    const scheduler = createScheduler(events);
    scheduler.register({ id: 'fleet-update', cronExpression: '0 4 * * *', run: async () => undefined });

    await expect(scheduler.runNow('fleet-update')).resolves.toBe('done');
    expect(events).toEqual([
      { type: 'job:start', jobId: 'fleet-update', at: AT },
      { type: 'job:done', jobId: 'fleet-update', at: AT },
    ]);
  });

  it('reports failures from the job', async () => {
    const events: ScheduleEvent[] = [];
    const scheduler = createScheduler(events);
    scheduler.register({
      id: 'fleet-update',
      cronExpression: '0 4 * * *',
      run: async () => {
        throw new Error('panel unreachable');
      },
    });

    await expect(scheduler.runNow('fleet-update')).resolves.toBe('error');
    expect(events[1]).toEqual({ type: 'job:error', jobId: 'fleet-update', at: AT, error: 'panel unreachable' });
  });

  it('skips a tick while the previous run is still going', async () => {
    const events: ScheduleEvent[] = [];
    const scheduler = createScheduler(events);
    let released = false;
    const run = vi.fn(async () => {
      while (!released) {
        await new Promise((resolve) => setTimeout(resolve, 1));
      }
    });
    scheduler.register({ id: 'fleet-update', cronExpression: '0 4 * * *', run });

    const first = scheduler.runNow('fleet-update');
    await expect(scheduler.runNow('fleet-update')).resolves.toBe('skipped');
    released = true;
    await expect(first).resolves.toBe('done');

    expect(run).toHaveBeenCalledTimes(1);
    expect(events.map((event) => event.type)).toEqual(['job:start', 'job:skipped', 'job:done']);
    await expect(scheduler.runNow('fleet-update')).resolves.toBe('done');
  });

  it('rejects runs of unknown or stopped jobs', async () => {
    const scheduler = createScheduler();
    scheduler.register({ id: 'fleet-update', cronExpression: '0 4 * * *', run: async () => undefined });
    scheduler.stopAll();

    await expect(scheduler.runNow('fleet-update')).rejects.toThrow("[JobScheduler] Job 'fleet-update' is not registered.");
  });

  it('logs events by default', () => {
    vi.mocked(logEvent).mockClear();

    logScheduleEvent({ type: 'job:error', jobId: 'fleet-update', at: AT, error: 'panel unreachable' });

    expect(vi.mocked(logEvent)).toHaveBeenCalledWith("[JobScheduler] 'fleet-update' failed: panel unreachable", 'error');
  });
});
