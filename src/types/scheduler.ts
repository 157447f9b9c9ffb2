/** A named job run on a cron schedule. */
export interface ScheduledJob {
    id: string;
    /** node-cron expression, e.g. `0 4 * * *`. */
    cronExpression: string;
    run: () => Promise<void>;
}

/** How a single tick ended. */
export type JobRunResult = 'done' | 'error' | 'skipped';

export type ScheduleEvent =
    | { type: 'job:start' | 'job:done' | 'job:skipped'; jobId: string; at: Date }
    | { type: 'job:error'; jobId: string; at: Date; error: string };

export type ScheduleListener = (event: ScheduleEvent) => void;
