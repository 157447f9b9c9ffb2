import { appendFile, mkdir, mkdtemp, rm } from 'node:fs/promises';
import path from 'node:path';
import { RollbackIntegrityError, VerificationError, errorMessage, exitCodeForOutcome } from '../core/errors.js';
import type { UpdaterConfig } from '../types/config.js';
import type { ControlPlane, Sleeper } from '../types/control-plane.js';
import type { Instance } from '../types/instance.js';
import type { NotificationChannel } from '../types/notification.js';
import type {
  PhaseListener,
  RollbackDisposition,
  RunOptions,
  RunOutcome,
  RunReport,
  UpdatePhase,
} from '../types/orchestration.js';
import type { ArtifactSource, ReleaseInfo, ReleaseSource } from '../types/release.js';
import type { Snapshot, SnapshotRepository } from '../types/snapshot.js';
import { logEvent, pruneLogFiles } from '../utils/logger.js';
import { sleep } from '../utils/poll.js';
import type { Projector } from './file-projector.js';
import { notificationForOutcome } from './notifier.js';
import { compareVersions, formatVersion } from './release-locator.js';

export type OrchestratorSettings = Pick<UpdaterConfig, 'instances' | 'policy' | 'timeouts' | 'retention' | 'paths'>;

export interface UpdateOrchestratorOptions {
  settings: OrchestratorSettings;
  controlPlane: ControlPlane;
  releases: ReleaseSource;
  artifacts: ArtifactSource;
  snapshots: SnapshotRepository;
  projector: Projector;
  notifier: NotificationChannel;
  /** JSON-lines file that receives one record per run; `null` disables it. */
  historyFile?: string | null;
  sleep?: Sleeper;
  now?: () => Date;
  pruneLogs?: (logDir: string, retentionDays: number) => Promise<number>;
  onPhase?: PhaseListener;
}

interface RunContext {
  phases: UpdatePhase[];
  stopped: Instance[];
  snapshots: Map<string, Snapshot>;
  scratchDir: string | null;
  mutated: boolean;
}

const MINIMUM_VERSION = [0];

function nowIso(now: () => Date): string {
  return now().toISOString();
}

/**
 * Drives one update of the whole fleet:
 * check → stop → back up → download → apply → start → verify → clean up.
 *
 * Instances are handled one at a time, in registry order. The first failure in
 * a phase ends it. Failures before any instance was modified restart the fleet
 * and report `failed`; failures after that roll every instance back to its
 * snapshot. Each run produces exactly one outcome and one notification.
 */
export class UpdateOrchestrator {
  readonly #settings: OrchestratorSettings;
  readonly #controlPlane: ControlPlane;
  readonly #releases: ReleaseSource;
  readonly #artifacts: ArtifactSource;
  readonly #snapshots: SnapshotRepository;
  readonly #projector: Projector;
  readonly #notifier: NotificationChannel;
  readonly #historyFile: string | null;
  readonly #sleep: Sleeper;
  readonly #now: () => Date;
  readonly #pruneLogs: (logDir: string, retentionDays: number) => Promise<number>;
  readonly #onPhase: PhaseListener | undefined;
  #active = false;

  constructor(options: UpdateOrchestratorOptions) {
    this.#settings = options.settings;
    this.#controlPlane = options.controlPlane;
    this.#releases = options.releases;
    this.#artifacts = options.artifacts;
    this.#snapshots = options.snapshots;
    this.#projector = options.projector;
    this.#notifier = options.notifier;
    this.#historyFile = options.historyFile ?? null;
    this.#sleep = options.sleep ?? sleep;
    this.#now = options.now ?? (() => new Date());
    this.#pruneLogs = options.pruneLogs ?? ((logDir, days) => pruneLogFiles(logDir, days, this.#now));
    this.#onPhase = options.onPhase;
  }

  /** True while a run or a manual rollback is in progress. */
  get active(): boolean {
    return this.#active;
  }

  async run(options: RunOptions = {}): Promise<RunReport> {
    return this.#guarded('update', (ctx) => this.#execute(ctx, options));
  }

  /**
   * Restore instances from their latest snapshots outside of an update run.
   * Defaults to every configured instance.
   */
  async rollback(instanceNames?: string[]): Promise<RunReport> {
    const targets = instanceNames
      ? this.#settings.instances.filter((instance) => instanceNames.includes(instance.name))
      : [...this.#settings.instances];
    const unknown = (instanceNames ?? []).filter(
      (name) => !this.#settings.instances.some((instance) => instance.name === name),
    );

    return this.#guarded('rollback', async (ctx) => {
      if (unknown.length > 0 || targets.length === 0) {
        return {
          kind: 'failed',
          phase: 'rolling-back',
          reason: `Unknown instance(s): ${unknown.join(', ') || '(none selected)'}`,
          instances: unknown,
          rollback: 'not-needed',
        };
      }
      return this.#rollBack(ctx, targets, 'rolling-back', 'Manual rollback requested', {
        skipBackup: false,
      });
    });
  }

  async #guarded(label: string, body: (ctx: RunContext) => Promise<RunOutcome>): Promise<RunReport> {
    if (this.#active) {
      throw new Error(`Cannot start ${label}: another run is already in progress.`);
    }
    this.#active = true;

    const startedAt = this.#now();
    const ctx: RunContext = { phases: [], stopped: [], snapshots: new Map(), scratchDir: null, mutated: false };
    let outcome: RunOutcome;

    try {
      try {
        outcome = await body(ctx);
      } catch (err) {
        const phase = ctx.phases[ctx.phases.length - 1] ?? 'initializing';
        await logEvent(`[Orchestrator] Unexpected error during ${phase}: ${errorMessage(err)}`, 'error');
        outcome = {
          kind: 'failed',
          phase,
          reason: errorMessage(err),
          instances: this.#names(this.#settings.instances),
          rollback: ctx.mutated ? 'failed' : 'not-needed',
        };
      } finally {
        await this.#removeScratch(ctx);
      }

      this.#enter(ctx, 'done');
      await this.#notify(outcome);

      const completedAt = this.#now();
      const report: RunReport = {
        outcome,
        exitCode: exitCodeForOutcome(outcome),
        startedAt: startedAt.toISOString(),
        completedAt: completedAt.toISOString(),
        durationMs: completedAt.getTime() - startedAt.getTime(),
        phases: ctx.phases,
      };
      await this.#recordHistory(report);
      await logEvent(`[Orchestrator] ${label} finished: ${describeOutcome(outcome)} (exit code ${report.exitCode}).`);
      return report;
    } finally {
      this.#active = false;
    }
  }

  async #execute(ctx: RunContext, options: RunOptions): Promise<RunOutcome> {
    const instances = [...this.#settings.instances];
    const names = this.#names(instances);
    const { timeouts } = this.#settings;

    // ── initializing ──────────────────────────────────────────────────────────
    this.#enter(ctx, 'initializing');
    if (!(await this.#controlPlane.testConnectivity())) {
      return this.#failed('initializing', 'Control panel is not reachable.', [], 'not-needed');
    }

    // ── checking-version ─────────────────────────────────────────────────────
    this.#enter(ctx, 'checking-version');
    const currentLabel = await this.#currentVersionLabel(instances[0]);
    let latest: ReleaseInfo;
    try {
      latest = await this.#releases.latestRelease();
    } catch (err) {
      return this.#failed('checking-version', `Latest release lookup failed: ${errorMessage(err)}`, [], 'not-needed');
    }

    const latestLabel = formatVersion(latest.version);
    const current = currentLabel.version ?? MINIMUM_VERSION;
    await logEvent(`[Orchestrator] Current version ${currentLabel.label}, latest ${latestLabel}.`);

    if (compareVersions(latest.version, current) <= 0) {
      if (!options.force) {
        return { kind: 'no-update-needed', currentVersion: currentLabel.label, latestVersion: latestLabel };
      }
      await logEvent('[Orchestrator] Already up to date; update forced by operator.', 'warn');
    }

    if (options.dryRun) {
      await logEvent(`[Orchestrator] Dry run: would update ${currentLabel.label} -> ${latestLabel}.`);
      return { kind: 'dry-run-stopped-before-change', currentVersion: currentLabel.label, latestVersion: latestLabel };
    }

    // ── stopping-instances ───────────────────────────────────────────────────
    this.#enter(ctx, 'stopping-instances');
    for (const instance of instances) {
      try {
        await this.#controlPlane.stop(instance, timeouts.serverMs);
        ctx.stopped.push(instance);
      } catch (err) {
        const restartFailures = await this.#startAll(ctx.stopped);
        return this.#failed(
          'stopping-instances',
          withRestartNote(`Failed to stop '${instance.name}': ${errorMessage(err)}`, restartFailures),
          [instance.name, ...restartFailures],
          'not-needed',
        );
      }
    }

    // ── backing-up ───────────────────────────────────────────────────────────
    this.#enter(ctx, 'backing-up');
    if (options.skipBackup) {
      await logEvent(
        '[Orchestrator] Backups skipped by operator. A failed update cannot be rolled back.',
        'warn',
      );
    } else {
      for (const instance of instances) {
        try {
          ctx.snapshots.set(instance.name, await this.#snapshots.create(instance.name, instance.directoryPath));
        } catch (err) {
          const restartFailures = await this.#startAll(instances);
          return this.#failed(
            'backing-up',
            withRestartNote(`Backup of '${instance.name}' failed: ${errorMessage(err)}`, restartFailures),
            [instance.name, ...restartFailures],
            'not-needed',
          );
        }
      }
    }

    // ── downloading ──────────────────────────────────────────────────────────
    this.#enter(ctx, 'downloading');
    let extractedDir: string;
    try {
      await mkdir(this.#settings.paths.scratchDir, { recursive: true });
      ctx.scratchDir = await mkdtemp(path.join(this.#settings.paths.scratchDir, 'bedrock-update-'));
      const archivePath = path.join(ctx.scratchDir, `bedrock-server-${latestLabel}.zip`);
      await this.#artifacts.download(latest.downloadUrl, archivePath, timeouts.downloadMs);
      extractedDir = (await this.#artifacts.extract(archivePath, path.join(ctx.scratchDir, 'release'))).directory;
    } catch (err) {
      const restartFailures = await this.#startAll(instances);
      return this.#failed(
        'downloading',
        withRestartNote(errorMessage(err), restartFailures),
        restartFailures,
        'not-needed',
      );
    }

    // ── applying ─────────────────────────────────────────────────────────────
    this.#enter(ctx, 'applying');
    for (const instance of instances) {
      try {
        ctx.mutated = true;
        await this.#projector.apply(extractedDir, instance.directoryPath, this.#settings.policy);
      } catch (err) {
        return this.#rollBack(ctx, instances, 'applying', `Apply failed for '${instance.name}': ${errorMessage(err)}`, {
          skipBackup: options.skipBackup === true,
          affected: [instance.name],
        });
      }
    }

    // ── starting-instances ───────────────────────────────────────────────────
    this.#enter(ctx, 'starting-instances');
    for (const instance of instances) {
      try {
        await this.#controlPlane.start(instance, timeouts.serverMs);
      } catch (err) {
        return this.#rollBack(
          ctx,
          instances,
          'starting-instances',
          `Failed to start '${instance.name}': ${errorMessage(err)}`,
          { skipBackup: options.skipBackup === true, affected: [instance.name] },
        );
      }
    }

    // ── verifying ────────────────────────────────────────────────────────────
    this.#enter(ctx, 'verifying');
    if (timeouts.startWaitMs > 0) {
      await logEvent(`[Orchestrator] Waiting ${Math.round(timeouts.startWaitMs / 1000)}s for servers to settle.`);
      await this.#sleep(timeouts.startWaitMs);
    }
    try {
      await this.#verifyRunning(instances);
    } catch (err) {
      const affected = err instanceof VerificationError ? err.failedInstances : names;
      return this.#rollBack(ctx, instances, 'verifying', errorMessage(err), {
        skipBackup: options.skipBackup === true,
        affected,
      });
    }

    // ── cleaning-up ──────────────────────────────────────────────────────────
    this.#enter(ctx, 'cleaning-up');
    await this.#cleanUp(!options.skipBackup);

    return {
      kind: 'success',
      oldVersion: currentLabel.label,
      newVersion: latestLabel,
      backupsSkipped: options.skipBackup === true,
      instances: names,
    };
  }

  async #verifyRunning(instances: readonly Instance[]): Promise<void> {
    const notRunning: string[] = [];
    for (const instance of instances) {
      if ((await this.#controlPlane.isRunning(instance)) !== true) {
        notRunning.push(instance.name);
      }
    }
    if (notRunning.length > 0) {
      throw new VerificationError(`Not running after update: ${notRunning.join(', ')}`, notRunning);
    }
  }

  /**
   * Stop, verify every snapshot, restore, start. Snapshots are all verified
   * before the first restore so a corrupt archive never leaves the fleet half
   * restored.
   */
  async #rollBack(
    ctx: RunContext,
    instances: Instance[],
    phase: UpdatePhase,
    reason: string,
    options: { skipBackup: boolean; affected?: string[] },
  ): Promise<RunOutcome> {
    this.#enter(ctx, 'rolling-back');
    const affected = options.affected ?? this.#names(instances);
    await logEvent(`[Orchestrator] Rolling back after ${phase}: ${reason}`, 'error');

    if (options.skipBackup) {
      const restartFailures = await this.#startAll(instances);
      return this.#failed(
        phase,
        withRestartNote(`${reason}. Backups were skipped; nothing to roll back to.`, restartFailures),
        unique([...affected, ...restartFailures]),
        'unavailable',
      );
    }

    const stopFailures: string[] = [];
    for (const instance of instances) {
      if ((await this.#controlPlane.isRunning(instance)) === false) continue;
      try {
        await this.#controlPlane.stop(instance, this.#settings.timeouts.serverMs);
      } catch (err) {
        await logEvent(`[Orchestrator] Rollback could not stop '${instance.name}': ${errorMessage(err)}`, 'error');
        stopFailures.push(instance.name);
      }
    }
    if (stopFailures.length > 0) {
      await this.#startAll(instances);
      return this.#failed(
        phase,
        `${reason}. Rollback aborted: could not stop ${stopFailures.join(', ')}.`,
        unique([...affected, ...stopFailures]),
        'failed',
      );
    }

    const plan: Array<{ instance: Instance; snapshot: Snapshot }> = [];
    for (const instance of instances) {
      const snapshot = ctx.snapshots.get(instance.name) ?? (await this.#snapshots.latest(instance.name));
      if (!snapshot || !(await this.#snapshots.verify(snapshot))) {
        const integrityError = new RollbackIntegrityError(instance.name, snapshot?.archivePath ?? null);
        await logEvent(`[Orchestrator] ${integrityError.message} Operator intervention required.`, 'error');
        await this.#startAll(instances);
        return this.#failed(
          phase,
          `${reason}. ${integrityError.message}`,
          unique([...affected, instance.name]),
          'integrity-failed',
        );
      }
      plan.push({ instance, snapshot });
    }

    const restoreFailures: string[] = [];
    for (const { instance, snapshot } of plan) {
      try {
        await this.#snapshots.restore(snapshot, instance.directoryPath);
      } catch (err) {
        await logEvent(`[Orchestrator] Restore of '${instance.name}' failed: ${errorMessage(err)}`, 'error');
        restoreFailures.push(instance.name);
      }
    }

    const startFailures = await this.#startAll(instances);
    if (restoreFailures.length > 0 || startFailures.length > 0) {
      const details = [
        restoreFailures.length > 0 ? `restore failed for ${restoreFailures.join(', ')}` : null,
        startFailures.length > 0 ? `restart failed for ${startFailures.join(', ')}` : null,
      ].filter((detail): detail is string => detail !== null);
      return this.#failed(
        phase,
        `${reason}. Rollback incomplete: ${details.join('; ')}.`,
        unique([...affected, ...restoreFailures, ...startFailures]),
        'failed',
      );
    }

    await logEvent(`[Orchestrator] Rollback complete; ${plan.length} instance(s) restored and running.`);
    return { kind: 'rolled-back', phase, reason, instances: affected };
  }

  /** Start each instance, continuing past failures. Returns the names that failed. */
  async #startAll(instances: readonly Instance[]): Promise<string[]> {
    const failures: string[] = [];
    for (const instance of instances) {
      try {
        await this.#controlPlane.start(instance, this.#settings.timeouts.serverMs);
      } catch (err) {
        await logEvent(`[Orchestrator] Could not start '${instance.name}': ${errorMessage(err)}`, 'error');
        failures.push(instance.name);
      }
    }
    return failures;
  }

  async #currentVersionLabel(instance: Instance): Promise<{ version: readonly number[] | null; label: string }> {
    try {
      const current = await this.#releases.currentVersion(instance);
      if (current.known) {
        return { version: current.version, label: formatVersion(current.version) };
      }
      await logEvent(`[Orchestrator] Current version unknown (${current.reason}); treating as oldest.`, 'warn');
    } catch (err) {
      await logEvent(`[Orchestrator] Current version lookup failed: ${errorMessage(err)}`, 'warn');
    }
    return { version: null, label: 'unknown' };
  }

  async #cleanUp(pruneSnapshots: boolean): Promise<void> {
    if (pruneSnapshots) {
      try {
        await this.#snapshots.pruneOlderThan(this.#settings.retention.backupDays);
      } catch (err) {
        await logEvent(`[Orchestrator] Snapshot pruning failed: ${errorMessage(err)}`, 'warn');
      }
    }
    try {
      const removed = await this.#pruneLogs(this.#settings.paths.logDir, this.#settings.retention.logDays);
      if (removed > 0) {
        await logEvent(`[Orchestrator] Removed ${removed} old log file(s).`);
      }
    } catch (err) {
      await logEvent(`[Orchestrator] Log pruning failed: ${errorMessage(err)}`, 'warn');
    }
  }

  async #removeScratch(ctx: RunContext): Promise<void> {
    if (!ctx.scratchDir) return;
    try {
      await rm(ctx.scratchDir, { recursive: true, force: true });
    } catch (err) {
      await logEvent(`[Orchestrator] Could not remove scratch directory ${ctx.scratchDir}: ${errorMessage(err)}`, 'warn');
    }
  }

  async #notify(outcome: RunOutcome): Promise<void> {
    const notification = notificationForOutcome(outcome, {
      now: this.#now,
      instances: this.#names(this.#settings.instances),
    });
    try {
      await this.#notifier.notify(notification);
    } catch (err) {
      await logEvent(`[Orchestrator] Notification via ${this.#notifier.name} failed: ${errorMessage(err)}`, 'error');
    }
  }

  async #recordHistory(report: RunReport): Promise<void> {
    if (!this.#historyFile) return;
    try {
      await mkdir(path.dirname(this.#historyFile), { recursive: true });
      await appendFile(this.#historyFile, `${JSON.stringify({ ...report, recordedAt: nowIso(this.#now) })}\n`, 'utf8');
    } catch (err) {
      await logEvent(`[Orchestrator] Could not write run history: ${errorMessage(err)}`, 'warn');
    }
  }

  #failed(
    phase: UpdatePhase,
    reason: string,
    instances: string[],
    rollback: RollbackDisposition,
  ): RunOutcome {
    void logEvent(`[Orchestrator] ${phase} failed: ${reason}`, 'error');
    return { kind: 'failed', phase, reason, instances, rollback };
  }

  #enter(ctx: RunContext, phase: UpdatePhase): void {
    ctx.phases.push(phase);
    void logEvent(`[Orchestrator] Phase: ${phase}`, 'debug');
    this.#onPhase?.(phase);
  }

  #names(instances: readonly Instance[]): string[] {
    return instances.map((instance) => instance.name);
  }
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

function withRestartNote(reason: string, restartFailures: string[]): string {
  return restartFailures.length > 0 ? `${reason} (restart also failed for ${restartFailures.join(', ')})` : reason;
}

export function describeOutcome(outcome: RunOutcome): string {
  switch (outcome.kind) {
    case 'no-update-needed':
      return `no update needed (${outcome.currentVersion})`;
    case 'dry-run-stopped-before-change':
      return `dry run, ${outcome.currentVersion} -> ${outcome.latestVersion} available`;
    case 'success':
      return `updated ${outcome.oldVersion} -> ${outcome.newVersion}`;
    case 'rolled-back':
      return `rolled back after ${outcome.phase}: ${outcome.reason}`;
    case 'failed':
      return `failed during ${outcome.phase} (rollback: ${outcome.rollback}): ${outcome.reason}`;
  }
}
