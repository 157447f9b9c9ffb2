import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { copyFile, cp, mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

vi.mock('../../src/utils/logger.js', () => ({
  logEvent: vi.fn(async () => undefined),
  pruneLogFiles: vi.fn(async () => 0),
}));

import { FileProjector, type ProjectionResult, type Projector } from '../../src/services/file-projector.js';
import { SnapshotStore } from '../../src/services/snapshot-store.js';
import { describeOutcome, UpdateOrchestrator, type OrchestratorSettings } from '../../src/services/update-orchestrator.js';
import type { ControlPlane, InstanceStats } from '../../src/types/control-plane.js';
import type { FileProtectionPolicy, Instance } from '../../src/types/instance.js';
import type { NotificationChannel, UpdateNotification } from '../../src/types/notification.js';
import type {
  ArtifactSource,
  CurrentVersion,
  DownloadResult,
  ExtractResult,
  ReleaseInfo,
  ReleaseSource,
  ReleaseVersion,
} from '../../src/types/release.js';
import type { Snapshot, SnapshotRepository } from '../../src/types/snapshot.js';

const ALPHA: Instance = { name: 'alpha', remoteId: '1', directoryPath: '/srv/bedrock/alpha' };
const BETA: Instance = { name: 'beta', remoteId: '2', directoryPath: '/srv/bedrock/beta' };
const OLD_VERSION: ReleaseVersion = [1, 21, 120, 4];
const NEW_VERSION: ReleaseVersion = [1, 21, 131, 1];
const DOWNLOAD_URL = 'https://downloads.example.test/bin-linux/bedrock-server-1.21.131.1.zip';
const CLOCK = () => new Date('2026-03-01T04:00:00.000Z');

const POLICY: FileProtectionPolicy = {
  preserveFiles: ['server.properties'],
  preserveDirectories: ['worlds'],
  updateFiles: ['bedrock_server'],
};

// ── Fakes ────────────────────────────────────────────────────────────────────

class FakePanel implements ControlPlane {
  readonly running = new Map<string, boolean>();
  readonly stopFailures = new Set<string>();
  readonly startFailures = new Set<string>();
  /** Start succeeds but the server is down again by the time it is checked. */
  readonly staysDown = new Set<string>();
  reachable: boolean | Promise<boolean> = true;

  constructor(private readonly calls: string[]) {}

  async stop(instance: Instance): Promise<void> {
    this.calls.push(`stop:${instance.name}`);
    if (this.stopFailures.has(instance.name)) throw new Error('timed out');
    this.running.set(instance.name, false);
  }

  async start(instance: Instance): Promise<void> {
    this.calls.push(`start:${instance.name}`);
    if (this.startFailures.has(instance.name)) throw new Error('timed out');
    this.running.set(instance.name, !this.staysDown.has(instance.name));
  }

  async isRunning(instance: Instance): Promise<boolean | null> {
    return this.running.get(instance.name) ?? true;
  }

  async status(instance: Instance): Promise<InstanceStats> {
    return { running: (await this.isRunning(instance)) === true, version: null };
  }

  async testConnectivity(): Promise<boolean> {
    return this.reachable;
  }
}

class FakeReleases implements ReleaseSource {
  current: CurrentVersion = { known: true, version: OLD_VERSION, source: 'control-plane' };
  latest: ReleaseInfo | Error = { version: NEW_VERSION, downloadUrl: DOWNLOAD_URL };

  async currentVersion(): Promise<CurrentVersion> {
    return this.current;
  }

  async latestRelease(): Promise<ReleaseInfo> {
    if (this.latest instanceof Error) throw this.latest;
    return this.latest;
  }
}

class FakeArtifacts implements ArtifactSource {
  downloadError: Error | null = null;
  destinations: string[] = [];

  constructor(private readonly calls: string[]) {}

  async download(_location: string, destination: string): Promise<DownloadResult> {
    this.calls.push('download');
    this.destinations.push(destination);
    if (this.downloadError) throw this.downloadError;
    return { path: destination, bytes: 1, entryCount: 1, durationMs: 0 };
  }

  async extract(_archivePath: string, destinationDir: string): Promise<ExtractResult> {
    this.calls.push('extract');
    return { directory: destinationDir, entryCount: 1, executableMarked: true };
  }
}

class FakeSnapshots implements SnapshotRepository {
  readonly stored = new Map<string, Snapshot>();
  readonly createFailures = new Set<string>();
  readonly corrupt = new Set<string>();

  constructor(private readonly calls: string[]) {}

  async create(instanceName: string): Promise<Snapshot> {
    this.calls.push(`snapshot:${instanceName}`);
    if (this.createFailures.has(instanceName)) throw new Error('disk full');
    const snapshot = { instanceName, createdAt: CLOCK(), archivePath: `/backups/backup-${instanceName}.tar.gz` };
    this.stored.set(instanceName, snapshot);
    return snapshot;
  }

  async verify(snapshot: Snapshot): Promise<boolean> {
    this.calls.push(`verify:${snapshot.instanceName}`);
    return !this.corrupt.has(snapshot.instanceName);
  }

  async restore(snapshot: Snapshot): Promise<void> {
    this.calls.push(`restore:${snapshot.instanceName}`);
  }

  async latest(instanceName: string): Promise<Snapshot | null> {
    return this.stored.get(instanceName) ?? null;
  }

  async list(): Promise<Snapshot[]> {
    return [...this.stored.values()];
  }

  async pruneOlderThan(): Promise<number> {
    this.calls.push('prune');
    return 0;
  }
}

class FakeProjector implements Projector {
  readonly failures = new Set<string>();

  constructor(private readonly calls: string[]) {}

  async apply(_extractedDir: string, instanceDir: string): Promise<ProjectionResult> {
    const name = path.basename(instanceDir);
    this.calls.push(`apply:${name}`);
    if (this.failures.has(name)) throw new Error('disk full');
    return { appliedCount: 1, applied: ['bedrock_server'], skipped: [] };
  }
}

// ── Harness ──────────────────────────────────────────────────────────────────

describe('UpdateOrchestrator', () => {
  let workspace = '';
  let calls: string[] = [];
  let notifications: UpdateNotification[] = [];
  let panel: FakePanel;
  let releases: FakeReleases;
  let artifacts: FakeArtifacts;
  let snapshots: FakeSnapshots;
  let projector: FakeProjector;
  let orchestrator: UpdateOrchestrator;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(os.tmpdir(), 'updater-orchestrator-'));
    calls = [];
    notifications = [];
    panel = new FakePanel(calls);
    releases = new FakeReleases();
    artifacts = new FakeArtifacts(calls);
    snapshots = new FakeSnapshots(calls);
    projector = new FakeProjector(calls);

    const settings: OrchestratorSettings = {
      instances: [ALPHA, BETA],
      policy: POLICY,
      timeouts: { serverMs: 1_000, startWaitMs: 0, downloadMs: 1_000, pollIntervalMs: 10 },
      retention: { backupDays: 7, logDays: 30 },
      paths: {
        backupDir: path.join(workspace, 'backups'),
        logDir: path.join(workspace, 'logs'),
        scratchDir: path.join(workspace, 'scratch'),
      },
    };
    const notifier: NotificationChannel = {
      name: 'test',
      notify: async (notification) => {
        notifications.push(notification);
      },
      sendTest: async () => undefined,
    };

    orchestrator = new UpdateOrchestrator({
      settings,
      controlPlane: panel,
      releases,
      artifacts,
      snapshots,
      projector,
      notifier,
      historyFile: path.join(workspace, 'logs', 'update-history.jsonl'),
      sleep: async () => undefined,
      now: CLOCK,
      pruneLogs: async () => 0,
    });
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('updates every instance in order and records the run', async () => {
    const report = await orchestrator.run();

    expect(report.outcome).toEqual({
      kind: 'success',
      oldVersion: '1.21.120.4',
      newVersion: '1.21.131.1',
      backupsSkipped: false,
      instances: ['alpha', 'beta'],
    });
    expect(report.exitCode).toBe(0);
    expect(report.phases).toEqual([
      'initializing',
      'checking-version',
      'stopping-instances',
      'backing-up',
      'downloading',
      'applying',
      'starting-instances',
      'verifying',
      'cleaning-up',
      'done',
    ]);
    expect(calls).toEqual([
      'stop:alpha',
      'stop:beta',
      'snapshot:alpha',
      'snapshot:beta',
      'download',
      'extract',
      'apply:alpha',
      'apply:beta',
      'start:alpha',
      'start:beta',
      'prune',
    ]);
    expect(path.basename(artifacts.destinations[0])).toBe('bedrock-server-1.21.131.1.zip');
    expect(await readdir(path.join(workspace, 'scratch'))).toEqual([]);
    expect(notifications.map((notification) => notification.kind)).toEqual(['success']);

    const history = (await readFile(path.join(workspace, 'logs', 'update-history.jsonl'), 'utf8')).trimEnd().split('\n');
    expect(history).toHaveLength(1);
    expect(JSON.parse(history[0])).toMatchObject({
      outcome: { kind: 'success' },
      exitCode: 0,
      durationMs: 0,
      recordedAt: '2026-03-01T04:00:00.000Z',
    });
  });

  it('does nothing further once the fleet is on the latest version', async () => {
    await orchestrator.run();
    releases.current = { known: true, version: NEW_VERSION, source: 'release-notes' };
    calls.length = 0;

    const report = await orchestrator.run();

    expect(report.outcome).toEqual({
      kind: 'no-update-needed',
      currentVersion: '1.21.131.1',
      latestVersion: '1.21.131.1',
    });
    expect(report.phases).toEqual(['initializing', 'checking-version', 'done']);
    expect(calls).toEqual([]);
  });

  it('updates anyway when forced', async () => {
    releases.current = { known: true, version: NEW_VERSION, source: 'control-plane' };

    const report = await orchestrator.run({ force: true });

    expect(report.outcome.kind).toBe('success');
    expect(calls).toContain('apply:beta');
  });

  it('treats an unknown current version as older than any release', async () => {
    releases.current = { known: false, reason: 'no version evidence found' };

    const report = await orchestrator.run({ dryRun: true });

    expect(report.outcome).toEqual({
      kind: 'dry-run-stopped-before-change',
      currentVersion: 'unknown',
      latestVersion: '1.21.131.1',
    });
  });

  it('stops before any change on a dry run', async () => {
    const report = await orchestrator.run({ dryRun: true });

    expect(report.outcome.kind).toBe('dry-run-stopped-before-change');
    expect(report.exitCode).toBe(0);
    expect(calls).toEqual([]);
    expect(notifications.map((notification) => notification.kind)).toEqual(['warning']);
  });

  it('fails fast when the panel is unreachable', async () => {
    panel.reachable = false;

    const report = await orchestrator.run();

    expect(report.outcome).toEqual({
      kind: 'failed',
      phase: 'initializing',
      reason: 'Control panel is not reachable.',
      instances: [],
      rollback: 'not-needed',
    });
    expect(report.exitCode).toBe(1);
  });

  it('fails the version check when the release feed is down', async () => {
    releases.latest = new Error('HTTP 503');

    const report = await orchestrator.run();

    expect(report.outcome).toMatchObject({
      kind: 'failed',
      phase: 'checking-version',
      reason: 'Latest release lookup failed: HTTP 503',
    });
    expect(report.exitCode).toBe(3);
  });

  it('restarts already-stopped instances when a stop fails', async () => {
    panel.stopFailures.add('beta');

    const report = await orchestrator.run();

    expect(report.outcome).toEqual({
      kind: 'failed',
      phase: 'stopping-instances',
      reason: "Failed to stop 'beta': timed out",
      instances: ['beta'],
      rollback: 'not-needed',
    });
    expect(report.exitCode).toBe(4);
    expect(calls).toEqual(['stop:alpha', 'stop:beta', 'start:alpha']);
  });

  it('restarts every instance when a backup fails, without downloading', async () => {
    snapshots.createFailures.add('beta');

    const report = await orchestrator.run();

    expect(report.outcome).toEqual({
      kind: 'failed',
      phase: 'backing-up',
      reason: "Backup of 'beta' failed: disk full",
      instances: ['beta'],
      rollback: 'not-needed',
    });
    expect(report.exitCode).toBe(2);
    expect(calls).toEqual(['stop:alpha', 'stop:beta', 'snapshot:alpha', 'snapshot:beta', 'start:alpha', 'start:beta']);
  });

  it('restarts every instance when the download fails', async () => {
    artifacts.downloadError = new Error('Download failed: HTTP 500');

    const report = await orchestrator.run();

    expect(report.outcome).toEqual({
      kind: 'failed',
      phase: 'downloading',
      reason: 'Download failed: HTTP 500',
      instances: [],
      rollback: 'not-needed',
    });
    expect(report.exitCode).toBe(3);
    expect(calls.slice(-3)).toEqual(['download', 'start:alpha', 'start:beta']);
    expect(await readdir(path.join(workspace, 'scratch'))).toEqual([]);
  });

  it('rolls every instance back when applying fails on a later instance', async () => {
    projector.failures.add('beta');

    const report = await orchestrator.run();

    expect(report.outcome).toEqual({
      kind: 'rolled-back',
      phase: 'applying',
      reason: "Apply failed for 'beta': disk full",
      instances: ['beta'],
    });
    expect(report.exitCode).toBe(4);
    expect(calls.slice(calls.indexOf('apply:alpha'))).toEqual([
      'apply:alpha',
      'apply:beta',
      'verify:alpha',
      'verify:beta',
      'restore:alpha',
      'restore:beta',
      'start:alpha',
      'start:beta',
    ]);
    expect(report.phases.slice(-3)).toEqual(['applying', 'rolling-back', 'done']);
    expect(notifications.map((notification) => notification.kind)).toEqual(['rollback']);
  });

  it('rolls back when a server is not running after the update', async () => {
    panel.staysDown.add('beta');

    const report = await orchestrator.run();

    expect(report.outcome).toEqual({
      kind: 'rolled-back',
      phase: 'verifying',
      reason: 'Not running after update: beta',
      instances: ['beta'],
    });
    expect(report.exitCode).toBe(5);
    expect(calls.slice(calls.indexOf('start:beta') + 1)).toEqual([
      'stop:alpha',
      'verify:alpha',
      'verify:beta',
      'restore:alpha',
      'restore:beta',
      'start:alpha',
      'start:beta',
    ]);
  });

  it('restores nothing when any snapshot fails its integrity check', async () => {
    projector.failures.add('alpha');
    snapshots.corrupt.add('beta');

    const report = await orchestrator.run();

    expect(report.outcome).toEqual({
      kind: 'failed',
      phase: 'applying',
      reason:
        "Apply failed for 'alpha': disk full. Snapshot for 'beta' failed its integrity check: /backups/backup-beta.tar.gz",
      instances: ['alpha', 'beta'],
      rollback: 'integrity-failed',
    });
    expect(calls.filter((call) => call.startsWith('restore:'))).toEqual([]);
    expect(calls.slice(-2)).toEqual(['start:alpha', 'start:beta']);
    expect(notifications[0].subject).toBe('[Bedrock Updater] CRITICAL: Update failed during applying');
  });

  it('reports an incomplete rollback when a restart fails', async () => {
    projector.failures.add('alpha');
    panel.startFailures.add('beta');

    const report = await orchestrator.run();

    expect(report.outcome).toEqual({
      kind: 'failed',
      phase: 'applying',
      reason: "Apply failed for 'alpha': disk full. Rollback incomplete: restart failed for beta.",
      instances: ['alpha', 'beta'],
      rollback: 'failed',
    });
  });

  it('cannot roll back when backups were skipped', async () => {
    projector.failures.add('alpha');

    const report = await orchestrator.run({ skipBackup: true });

    expect(report.outcome).toEqual({
      kind: 'failed',
      phase: 'applying',
      reason: "Apply failed for 'alpha': disk full. Backups were skipped; nothing to roll back to.",
      instances: ['alpha'],
      rollback: 'unavailable',
    });
    expect(report.phases).toContain('backing-up');
    expect(calls.filter((call) => call.startsWith('snapshot:') || call.startsWith('restore:'))).toEqual([]);
  });

  it('flags skipped backups on success and leaves old snapshots alone', async () => {
    const report = await orchestrator.run({ skipBackup: true });

    expect(report.outcome).toMatchObject({ kind: 'success', backupsSkipped: true });
    expect(calls).not.toContain('prune');
  });

  it('restores selected instances on a manual rollback', async () => {
    snapshots.stored.set('alpha', {
      instanceName: 'alpha',
      createdAt: CLOCK(),
      archivePath: '/backups/backup-alpha.tar.gz',
    });

    const report = await orchestrator.rollback(['alpha']);

    expect(report.outcome).toEqual({
      kind: 'rolled-back',
      phase: 'rolling-back',
      reason: 'Manual rollback requested',
      instances: ['alpha'],
    });
    expect(calls).toEqual(['stop:alpha', 'verify:alpha', 'restore:alpha', 'start:alpha']);
  });

  it('rejects a manual rollback of unknown instances', async () => {
    const report = await orchestrator.rollback(['gamma']);

    expect(report.outcome).toEqual({
      kind: 'failed',
      phase: 'rolling-back',
      reason: 'Unknown instance(s): gamma',
      instances: ['gamma'],
      rollback: 'not-needed',
    });
    expect(calls).toEqual([]);
  });

  it('refuses to start a second run while one is active', async () => {
    let open: (value: boolean) => void = () => undefined;
    panel.reachable = new Promise<boolean>((resolve) => {
      open = resolve;
    });

    const first = orchestrator.run();
    expect(orchestrator.active).toBe(true);
    await expect(orchestrator.run()).rejects.toThrow('Cannot start update: another run is already in progress.');

    open(false);
    await first;
    expect(orchestrator.active).toBe(false);
  });
});

describe('describeOutcome', () => {
  it('summarizes outcomes in one line', () => {
    expect(
      describeOutcome({ kind: 'failed', phase: 'downloading', reason: 'HTTP 500', instances: [], rollback: 'not-needed' }),
    ).toBe('failed during downloading (rollback: not-needed): HTTP 500');
    expect(describeOutcome({ kind: 'success', oldVersion: '1.0', newVersion: '1.1', backupsSkipped: false, instances: [] })).toBe(
      'updated 1.0 -> 1.1',
    );
  });
});

describe('UpdateOrchestrator with real snapshots and projection', () => {
  let workspace = '';

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(os.tmpdir(), 'updater-rollback-'));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  async function readTree(root: string, prefix = ''): Promise<Record<string, string>> {
    const files: Record<string, string> = {};
    for (const entry of await readdir(path.join(root, prefix), { withFileTypes: true })) {
      const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        Object.assign(files, await readTree(root, relative));
      } else {
        files[relative] = await readFile(path.join(root, relative), 'utf8');
      }
    }
    return files;
  }

  async function writeInstance(directory: string, name: string): Promise<void> {
    await mkdir(path.join(directory, 'worlds', 'Bedrock level'), { recursive: true });
    await writeFile(path.join(directory, 'bedrock_server'), `${name} binary 1.21.120.4`);
    await writeFile(path.join(directory, 'server.properties'), `server-name=${name}\n`);
    await writeFile(path.join(directory, 'worlds', 'Bedrock level', 'level.dat'), `${name} world`);
  }

  it('restores every instance byte for byte when the copy fails on the second one', async () => {
    const alpha: Instance = { name: 'alpha', remoteId: '1', directoryPath: path.join(workspace, 'servers', 'alpha') };
    const beta: Instance = { name: 'beta', remoteId: '2', directoryPath: path.join(workspace, 'servers', 'beta') };
    await writeInstance(alpha.directoryPath, 'alpha');
    await writeInstance(beta.directoryPath, 'beta');
    const alphaBefore = await readTree(alpha.directoryPath);
    const betaBefore = await readTree(beta.directoryPath);

    const releaseDir = path.join(workspace, 'release-source');
    await mkdir(releaseDir, { recursive: true });
    await writeFile(path.join(releaseDir, 'bedrock_server'), 'binary 1.21.131.1');
    await writeFile(path.join(releaseDir, 'bedrock_server_how_to.html'), '<p>Version: 1.21.131.1</p>');

    const calls: string[] = [];
    const artifacts: ArtifactSource = {
      download: async (_location, destination) => ({ path: destination, bytes: 1, entryCount: 2, durationMs: 0 }),
      extract: async (_archivePath, destinationDir) => {
        await cp(releaseDir, destinationDir, { recursive: true });
        return { directory: destinationDir, entryCount: 2, executableMarked: true };
      },
    };
    const projector = new FileProjector({
      copyFile: async (source, destination) => {
        if (destination === path.join(beta.directoryPath, 'bedrock_server')) {
          await writeFile(destination, 'half written');
          throw new Error('disk full');
        }
        await copyFile(source, destination);
      },
    });

    const orchestrator = new UpdateOrchestrator({
      settings: {
        instances: [alpha, beta],
        policy: {
          preserveFiles: ['server.properties'],
          preserveDirectories: ['worlds'],
          updateFiles: ['bedrock_server', 'bedrock_server_how_to.html'],
        },
        timeouts: { serverMs: 1_000, startWaitMs: 0, downloadMs: 1_000, pollIntervalMs: 10 },
        retention: { backupDays: 7, logDays: 30 },
        paths: {
          backupDir: path.join(workspace, 'backups'),
          logDir: path.join(workspace, 'logs'),
          scratchDir: path.join(workspace, 'scratch'),
        },
      },
      controlPlane: new FakePanel(calls),
      releases: new FakeReleases(),
      artifacts,
      snapshots: new SnapshotStore({ backupDir: path.join(workspace, 'backups'), now: CLOCK }),
      projector,
      notifier: { name: 'test', notify: async () => undefined, sendTest: async () => undefined },
      sleep: async () => undefined,
      now: CLOCK,
      pruneLogs: async () => 0,
    });

    const report = await orchestrator.run();

    expect(report.outcome).toEqual({
      kind: 'rolled-back',
      phase: 'applying',
      reason: "Apply failed for 'beta': Failed to update bedrock_server: disk full",
      instances: ['beta'],
    });
    expect(report.exitCode).toBe(4);
    expect(await readTree(alpha.directoryPath)).toEqual(alphaBefore);
    expect(await readTree(beta.directoryPath)).toEqual(betaBefore);
    expect(calls.slice(-2)).toEqual(['start:alpha', 'start:beta']);
  });
});
