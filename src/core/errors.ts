import type { RunOutcome, UpdatePhase } from '../types/orchestration.js';

export type UpdaterErrorCode =
    | 'CONFIG_INVALID'
    | 'REMOTE_UNAVAILABLE'
    | 'BACKUP_FAILED'
    | 'DOWNLOAD_FAILED'
    | 'APPLY_FAILED'
    | 'VERIFICATION_FAILED'
    | 'ROLLBACK_INTEGRITY';

/** Base class for every failure the update workflow knows how to classify. */
export class UpdaterError extends Error {
    readonly code: UpdaterErrorCode;

    constructor(code: UpdaterErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'UpdaterError';
        this.code = code;
    }
}

export class ConfigError extends UpdaterError {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super('CONFIG_INVALID', message);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

/** A control-plane request failed, returned a non-2xx status, or a poll timed out. */
export class TransientRemoteError extends UpdaterError {
    readonly status?: number;

    constructor(message: string, options?: { status?: number; cause?: unknown }) {
        super('REMOTE_UNAVAILABLE', message, { cause: options?.cause });
        this.name = 'TransientRemoteError';
        this.status = options?.status;
    }
}

export class BackupError extends UpdaterError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('BACKUP_FAILED', message, options);
        this.name = 'BackupError';
    }
}

export class DownloadError extends UpdaterError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('DOWNLOAD_FAILED', message, options);
        this.name = 'DownloadError';
    }
}

export class ApplyError extends UpdaterError {
    readonly relativePath?: string;

    constructor(message: string, options?: { relativePath?: string; cause?: unknown }) {
        super('APPLY_FAILED', message, { cause: options?.cause });
        this.name = 'ApplyError';
        this.relativePath = options?.relativePath;
    }
}

export class VerificationError extends UpdaterError {
    readonly failedInstances: string[];

    constructor(message: string, failedInstances: string[]) {
        super('VERIFICATION_FAILED', message);
        this.name = 'VerificationError';
        this.failedInstances = failedInstances;
    }
}

/** A snapshot failed its integrity scan while a rollback needed it. Requires an operator. */
export class RollbackIntegrityError extends UpdaterError {
    readonly instanceName: string;
    readonly archivePath: string | null;

    constructor(instanceName: string, archivePath: string | null) {
        super(
            'ROLLBACK_INTEGRITY',
            archivePath
                ? `Snapshot for '${instanceName}' failed its integrity check: ${archivePath}`
                : `No snapshot available for '${instanceName}'.`,
        );
        this.name = 'RollbackIntegrityError';
        this.instanceName = instanceName;
        this.archivePath = archivePath;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

const EXIT_CODE_BY_PHASE: Record<UpdatePhase, number> = {
    'initializing': 1,
    'checking-version': 3,
    'stopping-instances': 4,
    'backing-up': 2,
    'downloading': 3,
    'applying': 4,
    'starting-instances': 5,
    'verifying': 5,
    'cleaning-up': 0,
    'rolling-back': 5,
    'done': 0,
};

/** 0 for success, no-update and dry run; otherwise the code of the phase that failed. */
export function exitCodeForOutcome(outcome: RunOutcome): number {
    switch (outcome.kind) {
        case 'no-update-needed':
        case 'dry-run-stopped-before-change':
        case 'success':
            return 0;
        case 'failed':
        case 'rolled-back':
            return EXIT_CODE_BY_PHASE[outcome.phase];
    }
}
