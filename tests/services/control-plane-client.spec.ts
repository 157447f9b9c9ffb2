import { describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  logEvent: vi.fn(async () => undefined),
}));

import { TransientRemoteError } from '../../src/core/errors.js';
import {
  ControlPlaneClient,
  OfflineControlPlaneClient,
  parseStats,
} from '../../src/services/control-plane-client.js';
import type { Instance } from '../../src/types/instance.js';

const INSTANCE: Instance = { name: 'alpha', remoteId: '7', directoryPath: '/srv/alpha' };

interface RecordedCall {
  method: string;
  url: string;
  authorization: string | null;
}

/** Fake panel: each stats request consumes the next running state; the last one repeats. */
function createPanel(runningStates: boolean[], options: { failStatus?: number } = {}) {
  const calls: RecordedCall[] = [];
  const states = [...runningStates];
  const fetchImpl = vi.fn(async (input: string, init?: RequestInit) => {
    const method = init?.method ?? 'GET';
    calls.push({ method, url: input, authorization: new Headers(init?.headers).get('Authorization') });
    if (options.failStatus) {
      return new Response('error', { status: options.failStatus });
    }
    if (input.endsWith('/stats')) {
      const running = states.length > 1 ? states.shift() : states[0];
      return new Response(JSON.stringify({ status: 'ok', data: { running, version: '1.21.131.1' } }));
    }
    return new Response('', { status: 200 });
  });
  return { calls, fetchImpl };
}

function createClient(fetchImpl: (input: string, init?: RequestInit) => Promise<Response>) {
  const sleep = vi.fn(async () => undefined);
  const client = new ControlPlaneClient({
    baseUrl: 'https://panel.test/',
    apiToken: 'test-token',
    pollIntervalMs: 500,
    fetchImpl,
    sleep,
    now: () => 0,
  });
  return { client, sleep };
}

describe('ControlPlaneClient', () => {
  it('does not post a stop action when the server is already stopped', async () => {
    const panel = createPanel([false]);
    const { client, sleep } = createClient(panel.fetchImpl);

    await client.stop(INSTANCE, 30_000);

    expect(panel.calls.map((call) => call.method)).toEqual(['GET']);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('posts the action and polls until the target state is reached', async () => {
    const panel = createPanel([true, true, false]);
    const { client, sleep } = createClient(panel.fetchImpl);

    await client.stop(INSTANCE, 30_000);

    expect(panel.calls.map((call) => `${call.method} ${call.url}`)).toEqual([
      'GET https://panel.test/api/v2/servers/7/stats',
      'POST https://panel.test/api/v2/servers/7/action/stop_server',
      'GET https://panel.test/api/v2/servers/7/stats',
      'GET https://panel.test/api/v2/servers/7/stats',
    ]);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(500);
    expect(panel.calls.every((call) => call.authorization === 'Bearer test-token')).toBe(true);
  });

  it('starts a stopped server', async () => {
    const panel = createPanel([false, true]);
    const { client } = createClient(panel.fetchImpl);

    await client.start(INSTANCE, 30_000);

    expect(panel.calls[1]).toEqual({
      method: 'POST',
      url: 'https://panel.test/api/v2/servers/7/action/start_server',
      authorization: 'Bearer test-token',
    });
  });

  it('times out when the server never reaches the target state', async () => {
    const panel = createPanel([true]);
    const { client, sleep } = createClient(panel.fetchImpl);

    await expect(client.stop(INSTANCE, 3_000)).rejects.toThrow("'alpha' did not reach state 'stopped' within 3s.");
    expect(sleep).toHaveBeenCalledTimes(6);
  });

  it('raises a TransientRemoteError carrying the HTTP status', async () => {
    const panel = createPanel([true], { failStatus: 502 });
    const { client } = createClient(panel.fetchImpl);

    const error = await client.status(INSTANCE).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransientRemoteError);
    expect(error).toMatchObject({ status: 502, message: 'GET api/v2/servers/7/stats returned HTTP 502.' });
  });

  it('reports an indeterminate state instead of throwing', async () => {
    const { client } = createClient(async () => {
      throw new Error('connect ECONNREFUSED');
    });

    await expect(client.isRunning(INSTANCE)).resolves.toBeNull();
  });

  it('checks connectivity against the server list endpoint', async () => {
    const panel = createPanel([true]);
    const { client } = createClient(panel.fetchImpl);

    await expect(client.testConnectivity()).resolves.toBe(true);
    expect(panel.calls[0].url).toBe('https://panel.test/api/v2/servers');

    const down = createClient(createPanel([true], { failStatus: 401 }).fetchImpl);
    await expect(down.client.testConnectivity()).resolves.toBe(false);
  });
});

describe('parseStats', () => {
  it('reads the running flag and version', () => {
    expect(parseStats({ data: { running: true, version: ' 1.21.131.1 ' } })).toEqual({
      running: true,
      version: '1.21.131.1',
    });
    expect(parseStats({ data: { running: false, version: '' } })).toEqual({ running: false, version: null });
  });

  it('rejects bodies without a usable data object', () => {
    expect(() => parseStats({ status: 'ok' })).toThrow('Server stats response has no data object.');
    expect(() => parseStats({ data: { running: 'yes' } })).toThrow(
      'Server stats response has no boolean running field.',
    );
  });
});

describe('OfflineControlPlaneClient', () => {
  it('tracks state in memory, with every server running at first', async () => {
    const client = new OfflineControlPlaneClient();
    client.setVersion(INSTANCE, '1.21.0.1');

    expect(await client.isRunning(INSTANCE)).toBe(true);
    await client.stop(INSTANCE);
    expect(await client.status(INSTANCE)).toEqual({ running: false, version: '1.21.0.1' });
    await client.start(INSTANCE);
    expect(await client.isRunning(INSTANCE)).toBe(true);
    expect(await client.testConnectivity()).toBe(true);
  });
});
