import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

vi.mock('../../src/utils/logger.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../src/utils/logger.js')>()),
  logEvent: vi.fn(async () => undefined),
}));

import {
  loadEnvironment,
  loadUpdaterConfig,
  parseServerRegistry,
} from '../../src/config/updater-config.js';
import { ConfigError } from '../../src/core/errors.js';
import { logEvent } from '../../src/utils/logger.js';

function configErrorOf(action: () => unknown): ConfigError {
  try {
    action();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('parseServerRegistry', () => {
  it('builds instances and a normalized policy', () => {
    const registry = parseServerRegistry(
      {
        servers: [
          { name: 'survival', id: 1, path: 'survival' },
          { name: 'creative', id: 'b7e1', path: '/srv/other/creative' },
        ],
        preserve_files: ['server.properties', './permissions.json'],
        preserve_directories: ['worlds/'],
        update_files: ['bedrock_server', 'behavior_packs/vanilla/manifest.json'],
      },
      '/srv/bedrock',
    );

    expect(registry.instances).toEqual([
      { name: 'survival', remoteId: '1', directoryPath: path.resolve('/srv/bedrock', 'survival') },
      { name: 'creative', remoteId: 'b7e1', directoryPath: path.resolve('/srv/other/creative') },
    ]);
    expect(registry.policy).toEqual({
      preserveFiles: ['server.properties', 'permissions.json'],
      preserveDirectories: ['worlds'],
      updateFiles: ['bedrock_server', 'behavior_packs/vanilla/manifest.json'],
    });
    expect(Object.isFrozen(registry.policy)).toBe(true);
  });

  it('rejects update entries that overlap preserved paths', () => {
    const error = configErrorOf(() =>
      parseServerRegistry(
        {
          servers: [{ name: 'survival', id: 1, path: 'survival' }],
          preserve_directories: ['worlds'],
          update_files: ['bedrock_server', 'worlds/level.dat'],
        },
        '/srv/bedrock',
      ),
    );

    expect(error.issues).toEqual([
      "update_files entry 'worlds/level.dat' is also preserved by preserve_files or preserve_directories.",
    ]);
  });

  it('collects every issue before failing', () => {
    const error = configErrorOf(() =>
      parseServerRegistry(
        {
          servers: [
            { name: 'alpha', id: '1', path: 'a' },
            { name: 'alpha', id: '2', path: 'b' },
            { name: 'bad name', id: '3', path: 'c' },
          ],
          update_files: ['../etc/passwd'],
        },
        '/srv/bedrock',
      ),
    );

    expect(error.message).toBe('Server list is invalid (4 issue(s)).');
    expect(error.issues).toEqual([
      "servers[1].name 'alpha' is declared more than once.",
      "servers[2].name must be letters, digits, '.', '_' or '-'.",
      "update_files: '../etc/passwd' must be a relative path inside the server directory.",
      'update_files must list at least one file.',
    ]);
  });

  it('rejects a document without servers', () => {
    expect(configErrorOf(() => parseServerRegistry({ servers: [], update_files: ['bedrock_server'] }, '/srv')).issues).toEqual([
      'servers must be a non-empty array.',
    ]);
  });
});

describe('loading from disk', () => {
  let workspace = '';

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(os.tmpdir(), 'updater-config-'));
    vi.mocked(logEvent).mockClear();
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('layers known process variables over the env file', async () => {
    await writeFile(path.join(workspace, '.env'), 'BACKUP_DIR=./backups\nCRAFTY_API_TOKEN=from-file\n');
    await chmod(path.join(workspace, '.env'), 0o600);

    const { env, envFile } = await loadEnvironment({
      cwd: workspace,
      processEnv: { CRAFTY_API_TOKEN: 'from-process', HOME: '/root' },
    });

    expect(envFile).toBe(path.join(workspace, '.env'));
    expect(env).toEqual({ BACKUP_DIR: './backups', CRAFTY_API_TOKEN: 'from-process' });
    expect(vi.mocked(logEvent)).not.toHaveBeenCalled();
  });

  it('warns when the env file is readable by others', async () => {
    await writeFile(path.join(workspace, '.env'), 'LOG_DIR=./logs\n');
    await chmod(path.join(workspace, '.env'), 0o644);

    await loadEnvironment({ cwd: workspace, processEnv: {} });

    expect(vi.mocked(logEvent)).toHaveBeenCalledWith(
      `[Config] ${path.join(workspace, '.env')} is readable by other users (mode 644); consider chmod 600.`,
      'warn',
    );
  });

  it('tolerates a missing default env file but not an explicit one', async () => {
    await expect(loadEnvironment({ cwd: workspace, processEnv: {} })).resolves.toEqual({ env: {}, envFile: null });
    await expect(loadEnvironment({ cwd: workspace, envFile: 'prod.env', processEnv: {} })).rejects.toThrow(
      `Env file not found: ${path.join(workspace, 'prod.env')}`,
    );
  });

  it('builds the frozen configuration with defaults and converted units', async () => {
    await writeFile(
      path.join(workspace, '.env'),
      ['DEV_MODE=true', 'BACKUP_DIR=backups', 'LOG_DIR=logs', 'SERVER_TIMEOUT=45', 'SERVER_LIST_FILE=servers.json'].join('\n'),
    );
    await chmod(path.join(workspace, '.env'), 0o600);
    await writeFile(
      path.join(workspace, 'servers.json'),
      JSON.stringify({
        servers: [{ name: 'survival', id: 1, path: 'survival' }],
        preserve_files: ['server.properties'],
        update_files: ['bedrock_server'],
      }),
    );

    const config = await loadUpdaterConfig({ cwd: workspace, processEnv: {} });

    expect(config.devMode).toBe(true);
    expect(config.timeouts).toEqual({ serverMs: 45_000, startWaitMs: 20_000, downloadMs: 300_000, pollIntervalMs: 2_000 });
    expect(config.retention).toEqual({ backupDays: 7, logDays: 30 });
    expect(config.paths.backupDir).toBe(path.join(workspace, 'backups'));
    expect(config.paths.scratchDir).toBe(os.tmpdir());
    expect(config.releaseFeed.platformKey).toBe('serverBedrockLinux');
    expect(config.updateCron).toBe('0 4 * * *');
    expect(config.email).toBeNull();
    expect(config.instances).toEqual([
      { name: 'survival', remoteId: '1', directoryPath: path.join(workspace, 'survival') },
    ]);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('lists every environment problem in one error', async () => {
    await writeFile(path.join(workspace, '.env'), 'DEV_MODE=true\nBACKUP_DIR=backups\n');
    await chmod(path.join(workspace, '.env'), 0o600);

    const error = await loadUpdaterConfig({ cwd: workspace, processEnv: {} }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      message: 'Configuration is invalid (1 issue(s)).',
      issues: [
        "Required config key 'LOG_DIR' is missing. Directory that holds the daily update logs. Set LOG_DIR to a writable directory.",
      ],
    });
  });
});
