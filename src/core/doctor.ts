import { constants } from 'node:fs';
import { access, mkdir } from 'node:fs/promises';
import { isValidCronExpression } from '../services/job-scheduler.js';
import type { UpdaterConfig } from '../types/config.js';
import type { ControlPlane } from '../types/control-plane.js';
import type { DoctorReport, HealthCheckResult, ReadinessLevel } from '../types/health-doctor.js';
import type { SnapshotRepository } from '../types/snapshot.js';
import { isDirectory } from '../utils/fs.js';
import { errorMessage } from './errors.js';

export interface DoctorDeps {
    config: UpdaterConfig;
    controlPlane: ControlPlane;
    snapshots: SnapshotRepository;
    now?: () => Date;
}

/**
 * Pre-flight diagnostics for an update run: directories, instance paths,
 * panel reachability, snapshot coverage, notifications and schedule.
 *
 * Output never contains secret values.
 */
export class DoctorService {
    readonly #deps: DoctorDeps;

    constructor(deps: DoctorDeps) {
        this.#deps = deps;
    }

    async runAll(): Promise<DoctorReport> {
        const { config } = this.#deps;
        const checks: HealthCheckResult[] = [];

        checks.push(
            await checkWritableDirectory('backup_directory', 'Backup Directory', config.paths.backupDir, 'critical'),
            await checkWritableDirectory('log_directory', 'Log Directory', config.paths.logDir, 'warning'),
            await checkWritableDirectory('scratch_directory', 'Scratch Directory', config.paths.scratchDir, 'critical'),
            await checkInstanceDirectories(config),
            await this.#checkControlPlane(),
            await this.#checkSnapshotCoverage(),
            checkNotifications(config),
            checkSchedule(config),
        );

        return buildReport(checks, this.#deps.now ?? (() => new Date()));
    }

    async #checkControlPlane(): Promise<HealthCheckResult> {
        const { config, controlPlane } = this.#deps;
        if (config.devMode) {
            return {
                id: 'control_plane',
                name: 'Control Panel',
                severity: 'warning',
                message: 'DEV_MODE is on; the in-memory panel is used and no server is touched.',
                remediation: 'Unset DEV_MODE for production runs.',
            };
        }

        if (await controlPlane.testConnectivity()) {
            return {
                id: 'control_plane',
                name: 'Control Panel',
                severity: 'ok',
                message: `Reachable at ${config.controlPlane.baseUrl}.`,
            };
        }

        return {
            id: 'control_plane',
            name: 'Control Panel',
            severity: 'critical',
            message: `Could not reach ${config.controlPlane.baseUrl}.`,
            remediation: 'Check CRAFTY_API_URL, CRAFTY_API_TOKEN and that the panel is running.',
        };
    }

    async #checkSnapshotCoverage(): Promise<HealthCheckResult> {
        const { config, snapshots } = this.#deps;
        const uncovered: string[] = [];
        for (const instance of config.instances) {
            if (!(await snapshots.latest(instance.name))) {
                uncovered.push(instance.name);
            }
        }

        if (uncovered.length > 0) {
            return {
                id: 'snapshot_coverage',
                name: 'Snapshots',
                severity: 'warning',
                message: `No snapshot on disk yet for: ${uncovered.join(', ')}.`,
                remediation: 'A snapshot is taken automatically before every update; manual rollback needs one.',
            };
        }

        return {
            id: 'snapshot_coverage',
            name: 'Snapshots',
            severity: 'ok',
            message: `Every instance has at least one snapshot in ${config.paths.backupDir}.`,
        };
    }
}

// ── Individual Checks ────────────────────────────────────────────────────────

async function checkWritableDirectory(
    id: string,
    name: string,
    directory: string,
    failureSeverity: 'warning' | 'critical',
): Promise<HealthCheckResult> {
    try {
        await mkdir(directory, { recursive: true });
        await access(directory, constants.W_OK);
        return { id, name, severity: 'ok', message: `${directory} is writable.` };
    } catch (err) {
        return {
            id,
            name,
            severity: failureSeverity,
            message: `${directory} is not writable: ${errorMessage(err)}`,
            remediation: `Create ${directory} and grant the updater's user write access.`,
        };
    }
}

async function checkInstanceDirectories(config: UpdaterConfig): Promise<HealthCheckResult> {
    const missing: string[] = [];
    for (const instance of config.instances) {
        if (!(await isDirectory(instance.directoryPath))) {
            missing.push(`${instance.name} (${instance.directoryPath})`);
        }
    }

    if (missing.length > 0) {
        return {
            id: 'instance_directories',
            name: 'Instance Directories',
            severity: config.devMode ? 'warning' : 'critical',
            message: `Missing server directories: ${missing.join(', ')}.`,
            remediation: `Fix the paths in ${config.serverListFile}.`,
        };
    }

    return {
        id: 'instance_directories',
        name: 'Instance Directories',
        severity: 'ok',
        message: `${config.instances.length} server director${config.instances.length === 1 ? 'y' : 'ies'} found.`,
    };
}

function checkNotifications(config: UpdaterConfig): HealthCheckResult {
    if (!config.email) {
        return {
            id: 'notifications',
            name: 'Notifications',
            severity: 'warning',
            message: 'Email is not configured; notifications are written to the log only.',
            remediation: 'Set SMTP_HOST, SMTP_FROM and SMTP_TO to receive update emails.',
        };
    }
    return {
        id: 'notifications',
        name: 'Notifications',
        severity: 'ok',
        message: `Email via ${config.email.host}:${config.email.port} to ${config.email.to.length} recipient(s).`,
    };
}

function checkSchedule(config: UpdaterConfig): HealthCheckResult {
    if (!isValidCronExpression(config.updateCron)) {
        return {
            id: 'schedule',
            name: 'Schedule',
            severity: 'critical',
            message: `UPDATE_CRON '${config.updateCron}' is not a valid cron expression.`,
            remediation: 'Use a five- or six-field cron expression, e.g. "0 4 * * *".',
        };
    }
    return { id: 'schedule', name: 'Schedule', severity: 'ok', message: `Scheduled runs use '${config.updateCron}'.` };
}

export function buildReport(checks: HealthCheckResult[], now: () => Date): DoctorReport {
    const critical = checks.filter((check) => check.severity === 'critical').length;
    const warnings = checks.filter((check) => check.severity === 'warning').length;
    const level: ReadinessLevel = critical > 0 ? 'not_ready' : warnings > 0 ? 'degraded' : 'ready';

    return {
        readiness: {
            level,
            totalChecks: checks.length,
            passed: checks.length - critical - warnings,
            warnings,
            critical,
            evaluatedAt: now().toISOString(),
        },
        checks,
    };
}
