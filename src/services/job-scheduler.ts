import cron, { type ScheduledTask } from 'node-cron';
import { errorMessage } from '../core/errors.js';
import { logEvent } from '../utils/logger.js';
import type { JobRunResult, ScheduledJob, ScheduleEvent, ScheduleListener } from '../types/scheduler.js';

export interface JobSchedulerOptions {
    /** Receives every tick's lifecycle events. Defaults to the update log. */
    onEvent?: ScheduleListener;
    now?: () => Date;
}

interface Registration {
    job: ScheduledJob;
    task: ScheduledTask;
}

export function isValidCronExpression(expression: string): boolean {
    return cron.validate(expression);
}

/** Writes scheduler events to the update log. */
export function logScheduleEvent(event: ScheduleEvent): void {
    switch (event.type) {
        case 'job:start':
            void logEvent(`[JobScheduler] Running '${event.jobId}'.`);
            return;
        case 'job:done':
            void logEvent(`[JobScheduler] '${event.jobId}' finished.`);
            return;
        case 'job:skipped':
            void logEvent(`[JobScheduler] Skipping '${event.jobId}': previous run still in progress.`, 'warn');
            return;
        case 'job:error':
            void logEvent(`[JobScheduler] '${event.jobId}' failed: ${event.error}`, 'error');
            return;
    }
}

/**
 * Runs update jobs on cron schedules. A job never overlaps itself: a tick
 * that fires while the previous run is still going is skipped.
 */
export class JobScheduler {
    readonly #registrations = new Map<string, Registration>();
    readonly #inFlight = new Set<string>();
    readonly #onEvent: ScheduleListener;
    readonly #now: () => Date;

    constructor(options: JobSchedulerOptions = {}) {
        this.#onEvent = options.onEvent ?? logScheduleEvent;
        this.#now = options.now ?? (() => new Date());
    }

    /** Validate and start a job. Throws on a bad expression or a duplicate id. */
    register(job: ScheduledJob): void {
        if (this.#registrations.has(job.id)) {
            throw new Error(`[JobScheduler] Job '${job.id}' is already registered.`);
        }
        if (!isValidCronExpression(job.cronExpression)) {
            throw new Error(`[JobScheduler] Invalid cron expression for job '${job.id}': ${job.cronExpression}`);
        }

        const task = cron.schedule(job.cronExpression, () => {
            void this.runNow(job.id);
        });
        this.#registrations.set(job.id, { job, task });
    }

    /** Run a registered job outside its schedule, with the same overlap guard. */
    async runNow(jobId: string): Promise<JobRunResult> {
        const registration = this.#registrations.get(jobId);
        if (!registration) {
            throw new Error(`[JobScheduler] Job '${jobId}' is not registered.`);
        }

        if (this.#inFlight.has(jobId)) {
            this.#emit({ type: 'job:skipped', jobId, at: this.#now() });
            return 'skipped';
        }

        this.#inFlight.add(jobId);
        this.#emit({ type: 'job:start', jobId, at: this.#now() });
        try {
            await registration.job.run();
            this.#emit({ type: 'job:done', jobId, at: this.#now() });
            return 'done';
        } catch (err) {
            this.#emit({ type: 'job:error', jobId, at: this.#now(), error: errorMessage(err) });
            return 'error';
        } finally {
            this.#inFlight.delete(jobId);
        }
    }

    stopAll(): void {
        for (const { task } of this.#registrations.values()) {
            task.stop();
        }
        this.#registrations.clear();
    }

    #emit(event: ScheduleEvent): void {
        try {
            this.#onEvent(event);
        } catch (err) {
            void logEvent(`[JobScheduler] Event listener threw: ${errorMessage(err)}`, 'error');
        }
    }
}
