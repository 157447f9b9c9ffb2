/**
 * - `ok`       Check passed.
 * - `warning`  Updates can run, but something needs attention.
 * - `critical` An update run would fail; fix before scheduling.
 */
export type HealthCheckSeverity = 'ok' | 'warning' | 'critical';

export type ReadinessLevel = 'ready' | 'degraded' | 'not_ready';

export interface HealthCheckResult {
    /** Stable machine-readable identifier (e.g. `backup_directory`). */
    id: string;
    name: string;
    severity: HealthCheckSeverity;
    message: string;
    /** Present when severity is not `ok`. */
    remediation?: string;
}

export interface ReadinessSummary {
    level: ReadinessLevel;
    totalChecks: number;
    passed: number;
    warnings: number;
    critical: number;
    evaluatedAt: string;
}

export interface DoctorReport {
    readiness: ReadinessSummary;
    checks: HealthCheckResult[];
}
