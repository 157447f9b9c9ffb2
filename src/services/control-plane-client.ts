import { TransientRemoteError, errorMessage } from '../core/errors.js';
import type {
    ControlPlane,
    FetchLike,
    InstanceStats,
    InstanceTargetState,
    Sleeper,
} from '../types/control-plane.js';
import type { Instance } from '../types/instance.js';
import { isObjectRecord } from '../utils/guards.js';
import { logEvent } from '../utils/logger.js';
import { pollUntil } from '../utils/poll.js';

const REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_POLL_INTERVAL_MS = 2_000;

export interface ControlPlaneClientOptions {
    baseUrl: string;
    apiToken: string;
    pollIntervalMs?: number;
    fetchImpl?: FetchLike;
    sleep?: Sleeper;
    now?: () => number;
}

/**
 * HTTP client for the Crafty Controller v2 API.
 *
 * `stop` and `start` are idempotent: when the server already reports the
 * requested state no action is posted. Otherwise the action is posted and the
 * stats endpoint is polled at a fixed interval until the state is reached or
 * the timeout elapses.
 */
export class ControlPlaneClient implements ControlPlane {
    readonly #baseUrl: string;
    readonly #apiToken: string;
    readonly #pollIntervalMs: number;
    readonly #fetch: FetchLike;
    readonly #sleep: Sleeper | undefined;
    readonly #now: (() => number) | undefined;

    constructor(options: ControlPlaneClientOptions) {
        this.#baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.#apiToken = options.apiToken;
        this.#pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
        this.#fetch = options.fetchImpl ?? ((input, init) => fetch(input, init));
        this.#sleep = options.sleep;
        this.#now = options.now;
    }

    async stop(instance: Instance, timeoutMs: number): Promise<void> {
        await this.#transition(instance, 'stopped', timeoutMs);
    }

    async start(instance: Instance, timeoutMs: number): Promise<void> {
        await this.#transition(instance, 'running', timeoutMs);
    }

    async isRunning(instance: Instance): Promise<boolean | null> {
        try {
            const stats = await this.status(instance);
            return stats.running;
        } catch (err) {
            void logEvent(
                `[ControlPlane] Could not determine status of '${instance.name}': ${errorMessage(err)}`,
                'warn',
            );
            return null;
        }
    }

    async status(instance: Instance): Promise<InstanceStats> {
        const body = await this.#request('GET', `api/v2/servers/${encodeURIComponent(instance.remoteId)}/stats`);
        return parseStats(body);
    }

    async testConnectivity(): Promise<boolean> {
        try {
            await this.#request('GET', 'api/v2/servers');
            await logEvent(`[ControlPlane] Connected to ${this.#baseUrl}.`);
            return true;
        } catch (err) {
            await logEvent(`[ControlPlane] Connectivity check failed: ${errorMessage(err)}`, 'error');
            return false;
        }
    }

    async #transition(instance: Instance, target: InstanceTargetState, timeoutMs: number): Promise<void> {
        const wantRunning = target === 'running';
        const current = await this.isRunning(instance);
        if (current === wantRunning) {
            await logEvent(`[ControlPlane] '${instance.name}' is already ${target}.`, 'debug');
            return;
        }

        const action = wantRunning ? 'start_server' : 'stop_server';
        await logEvent(`[ControlPlane] Requesting ${action} for '${instance.name}'.`);
        await this.#request('POST', `api/v2/servers/${encodeURIComponent(instance.remoteId)}/action/${action}`);

        const reached = await pollUntil(async () => (await this.isRunning(instance)) === wantRunning, {
            intervalMs: this.#pollIntervalMs,
            timeoutMs,
            sleep: this.#sleep,
            now: this.#now,
        });

        if (!reached.ok) {
            throw new TransientRemoteError(
                `'${instance.name}' did not reach state '${target}' within ${Math.round(timeoutMs / 1000)}s.`,
            );
        }

        await logEvent(`[ControlPlane] '${instance.name}' is ${target} after ${reached.attempts} check(s).`);
    }

    async #request(method: 'GET' | 'POST', endpoint: string): Promise<unknown> {
        const url = `${this.#baseUrl}/${endpoint}`;
        let response: Response;
        try {
            response = await this.#fetch(url, {
                method,
                headers: {
                    Authorization: `Bearer ${this.#apiToken}`,
                    'Content-Type': 'application/json',
                },
                signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
            });
        } catch (err) {
            throw new TransientRemoteError(`${method} ${endpoint} failed: ${errorMessage(err)}`, { cause: err });
        }

        if (!response.ok) {
            throw new TransientRemoteError(`${method} ${endpoint} returned HTTP ${response.status}.`, {
                status: response.status,
            });
        }

        const text = await response.text();
        if (text.trim().length === 0) {
            return {};
        }
        try {
            return JSON.parse(text);
        } catch (err) {
            throw new TransientRemoteError(`${method} ${endpoint} returned invalid JSON.`, { cause: err });
        }
    }
}

export function parseStats(body: unknown): InstanceStats {
    if (!isObjectRecord(body) || !isObjectRecord(body.data)) {
        throw new TransientRemoteError('Server stats response has no data object.');
    }
    const { running, version } = body.data;
    if (typeof running !== 'boolean') {
        throw new TransientRemoteError('Server stats response has no boolean running field.');
    }
    return {
        running,
        version: typeof version === 'string' && version.trim().length > 0 ? version.trim() : null,
    };
}

/**
 * In-memory panel used in offline/dev mode. Every instance starts in the
 * running state; transitions are immediate.
 */
export class OfflineControlPlaneClient implements ControlPlane {
    readonly #running = new Map<string, boolean>();
    readonly #versions = new Map<string, string>();

    setVersion(instance: Instance, version: string): void {
        this.#versions.set(instance.remoteId, version);
    }

    async stop(instance: Instance): Promise<void> {
        this.#running.set(instance.remoteId, false);
        await logEvent(`[ControlPlane:offline] '${instance.name}' stopped.`);
    }

    async start(instance: Instance): Promise<void> {
        this.#running.set(instance.remoteId, true);
        await logEvent(`[ControlPlane:offline] '${instance.name}' started.`);
    }

    async isRunning(instance: Instance): Promise<boolean> {
        return this.#running.get(instance.remoteId) ?? true;
    }

    async status(instance: Instance): Promise<InstanceStats> {
        return {
            running: await this.isRunning(instance),
            version: this.#versions.get(instance.remoteId) ?? null,
        };
    }

    async testConnectivity(): Promise<boolean> {
        await logEvent('[ControlPlane:offline] Connectivity check skipped in offline mode.');
        return true;
    }
}
