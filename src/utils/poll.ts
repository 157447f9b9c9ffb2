import type { Sleeper } from '../types/control-plane.js';

/** Configuration for the polling helper. */
export interface PollOptions {
    /** Fixed delay between checks in ms. */
    intervalMs: number;
    /** Give up once this much time has been spent waiting. */
    timeoutMs: number;
    sleep?: Sleeper;
    now?: () => number;
}

export interface PollResult {
    ok: boolean;
    attempts: number;
    elapsedMs: number;
}

/**
 * Sleep, then check, until `check` resolves true or the timeout elapses.
 *
 * Elapsed time is the larger of the wall clock and the sum of the intervals
 * slept, so an injected no-op `sleep` still terminates.
 */
export async function pollUntil(check: () => Promise<boolean>, options: PollOptions): Promise<PollResult> {
    const sleepFn = options.sleep ?? sleep;
    const now = options.now ?? Date.now;
    const start = now();
    let waited = 0;
    let attempts = 0;

    const elapsed = (): number => Math.max(now() - start, waited);

    while (elapsed() < options.timeoutMs) {
        await sleepFn(options.intervalMs);
        waited += options.intervalMs;
        attempts += 1;
        if (await check()) {
            return { ok: true, attempts, elapsedMs: elapsed() };
        }
    }

    return { ok: false, attempts, elapsedMs: elapsed() };
}

export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
