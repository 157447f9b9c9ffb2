export type UpdatePhase =
  | 'initializing'
  | 'checking-version'
  | 'stopping-instances'
  | 'backing-up'
  | 'downloading'
  | 'applying'
  | 'starting-instances'
  | 'verifying'
  | 'cleaning-up'
  | 'rolling-back'
  | 'done';

/**
 * What happened to the fleet after a failure.
 * - 'not-needed'       nothing was mutated
 * - 'unavailable'      mutation happened but backups were skipped
 * - 'failed'           rollback ran but a restore or restart failed
 * - 'integrity-failed' a snapshot was corrupt or missing; nothing was restored
 */
export type RollbackDisposition = 'not-needed' | 'unavailable' | 'failed' | 'integrity-failed';

export type RunOutcome =
  | { kind: 'no-update-needed'; currentVersion: string; latestVersion: string }
  | { kind: 'dry-run-stopped-before-change'; currentVersion: string; latestVersion: string }
  | { kind: 'success'; oldVersion: string; newVersion: string; backupsSkipped: boolean; instances: string[] }
  | {
      kind: 'failed';
      phase: UpdatePhase;
      reason: string;
      instances: string[];
      rollback: RollbackDisposition;
    }
  | { kind: 'rolled-back'; phase: UpdatePhase; reason: string; instances: string[] };

export interface RunOptions {
  dryRun?: boolean;
  force?: boolean;
  skipBackup?: boolean;
}

export interface RunReport {
  outcome: RunOutcome;
  exitCode: number;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  /** Phases entered, in order. */
  phases: UpdatePhase[];
}

export interface PhaseListener {
  (phase: UpdatePhase): void;
}
