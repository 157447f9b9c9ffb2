import { stat } from 'node:fs/promises';
import path from 'node:path';
import { readValue } from '../config/env-validator.js';
import { loadEnvironment, loadUpdaterConfig } from '../config/updater-config.js';
import { JobScheduler } from '../services/job-scheduler.js';
import { describeOutcome } from '../services/update-orchestrator.js';
import type { UpdaterConfig } from '../types/config.js';
import type { DoctorReport, HealthCheckResult } from '../types/health-doctor.js';
import type { RunReport } from '../types/orchestration.js';
import { configureLogger, logEvent } from '../utils/logger.js';
import { DoctorService } from './doctor.js';
import { ConfigError, errorMessage } from './errors.js';
import { handleLogsCli } from './logs-cli.js';
import { createRuntime, type UpdaterRuntime } from './runtime.js';

// ── Help text ────────────────────────────────────────────────────────────────

export const HELP_TEXT = `
Usage: bedrock-fleet-updater [command] [options]

Commands:
  run                 Check for a new release and update every server (default)
  rollback            Restore servers from their latest snapshot
  backups             List snapshots on disk
  doctor              Check configuration, directories and panel access
  test-email          Send a test notification email
  logs                Print today's log (--follow to keep watching)
  schedule            Run updates on the UPDATE_CRON schedule until stopped

Options:
  --dry-run           Check versions only; change nothing
  --force             Update even when already on the latest version
  --skip-backup       Do not snapshot servers first (rollback becomes impossible)
  --server <name>     Limit rollback/backups to one server (repeatable)
  --env-file <path>   Env file to load (default: .env)
  --servers <path>    Server list file (overrides SERVER_LIST_FILE)
  --json              Machine-readable output (run, rollback, backups, doctor)
  --follow, -f        Keep printing new log lines (logs only)
  --verbose, -v       Log debug output
  --help, -h          Show this help message

Exit codes:
  0 success or no update needed   3 version lookup or download error
  1 configuration error           4 stop or apply error
  2 backup error                  5 start or verify error
`.trim();

export const KNOWN_COMMANDS = ['run', 'rollback', 'backups', 'doctor', 'test-email', 'logs', 'schedule'] as const;

export type CommandName = (typeof KNOWN_COMMANDS)[number];

export interface ParsedArgs {
    command: string;
    dryRun: boolean;
    force: boolean;
    skipBackup: boolean;
    verbose: boolean;
    json: boolean;
    follow: boolean;
    help: boolean;
    envFile?: string;
    serversFile?: string;
    servers: string[];
    errors: string[];
}

const VALUE_FLAGS = new Set(['--env-file', '--servers', '--server']);

export function parseArgs(argv: string[]): ParsedArgs {
    const parsed: ParsedArgs = {
        command: 'run',
        dryRun: false,
        force: false,
        skipBackup: false,
        verbose: false,
        json: false,
        follow: false,
        help: false,
        servers: [],
        errors: [],
    };

    let commandSeen = false;
    for (let index = 0; index < argv.length; index += 1) {
        const token = argv[index];

        if (VALUE_FLAGS.has(token)) {
            const next = argv[index + 1];
            if (next === undefined || next.startsWith('-')) {
                parsed.errors.push(`${token} requires a value.`);
                continue;
            }
            index += 1;
            if (token === '--env-file') parsed.envFile = next;
            else if (token === '--servers') parsed.serversFile = next;
            else parsed.servers.push(next);
            continue;
        }

        switch (token) {
            case '--dry-run':
                parsed.dryRun = true;
                break;
            case '--force':
                parsed.force = true;
                break;
            case '--skip-backup':
                parsed.skipBackup = true;
                break;
            case '--verbose':
            case '-v':
                parsed.verbose = true;
                break;
            case '--json':
                parsed.json = true;
                break;
            case '--follow':
            case '-f':
                parsed.follow = true;
                break;
            case '--help':
            case '-h':
                parsed.help = true;
                break;
            default:
                if (token.startsWith('-')) {
                    parsed.errors.push(`Unknown option: '${token}'`);
                } else if (!commandSeen) {
                    parsed.command = token;
                    commandSeen = true;
                } else {
                    parsed.errors.push(`Unexpected argument: '${token}'`);
                }
        }
    }

    return parsed;
}

export function isKnownCommand(command: string): command is CommandName {
    return KNOWN_COMMANDS.some((known) => known === command);
}

/** Seams the command handlers use to build their collaborators. */
export interface CliContext {
    loadConfig(args: ParsedArgs): Promise<UpdaterConfig>;
    createRuntime(config: UpdaterConfig, args: ParsedArgs): UpdaterRuntime;
}

export const defaultCliContext: CliContext = {
    loadConfig: (args) => loadUpdaterConfig({ envFile: args.envFile, serverListFile: args.serversFile }),
    createRuntime: (config, args) => createRuntime(config, { verbose: args.verbose }),
};

// ── Output helpers ───────────────────────────────────────────────────────────

function printJson(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
}

function printRunReport(report: RunReport, asJson: boolean): void {
    if (asJson) {
        printJson(report);
        return;
    }
    console.log(`Result:    ${describeOutcome(report.outcome)}`);
    console.log(`Phases:    ${report.phases.join(' -> ')}`);
    console.log(`Duration:  ${(report.durationMs / 1000).toFixed(1)}s`);
    console.log(`Exit code: ${report.exitCode}`);
}

const SEVERITY_ICONS: Record<HealthCheckResult['severity'], string> = {
    ok: '✓',
    warning: '⚠',
    critical: '✗',
};

export function formatDoctorReport(report: DoctorReport): string {
    const lines = ['', 'Bedrock Updater Doctor', '══════════════════════════════════════'];
    for (const check of report.checks) {
        lines.push(`  ${SEVERITY_ICONS[check.severity]} [${check.severity.toUpperCase().padEnd(8)}] ${check.name}: ${check.message}`);
        if (check.remediation && check.severity !== 'ok') {
            lines.push(`          → ${check.remediation}`);
        }
    }
    const { readiness } = report;
    lines.push('──────────────────────────────────────');
    lines.push(
        `Readiness: ${readiness.level.toUpperCase()}  ` +
            `(${readiness.passed} ok, ${readiness.warnings} warning, ${readiness.critical} critical)`,
    );
    return lines.join('\n');
}

function reportConfigError(err: ConfigError): void {
    console.error(`[Config] ${err.message}`);
    for (const issue of err.issues) {
        console.error(`  - ${issue}`);
    }
    process.exitCode = 1;
}

// ── Command handlers ─────────────────────────────────────────────────────────

async function withRuntime(
    args: ParsedArgs,
    context: CliContext,
    body: (runtime: UpdaterRuntime) => Promise<void>,
): Promise<void> {
    let runtime: UpdaterRuntime;
    try {
        const config = await context.loadConfig(args);
        runtime = context.createRuntime(config, args);
    } catch (err) {
        if (err instanceof ConfigError) {
            reportConfigError(err);
            return;
        }
        throw err;
    }
    await body(runtime);
}

export async function handleRunCommand(args: ParsedArgs, context: CliContext = defaultCliContext): Promise<void> {
    await withRuntime(args, context, async ({ config, orchestrator }) => {
        const report = await orchestrator.run({
            dryRun: args.dryRun || config.dryRun,
            force: args.force,
            skipBackup: args.skipBackup,
        });
        printRunReport(report, args.json);
        process.exitCode = report.exitCode;
    });
}

export async function handleRollbackCommand(args: ParsedArgs, context: CliContext = defaultCliContext): Promise<void> {
    await withRuntime(args, context, async ({ orchestrator }) => {
        const report = await orchestrator.rollback(args.servers.length > 0 ? args.servers : undefined);
        printRunReport(report, args.json);
        process.exitCode = report.outcome.kind === 'rolled-back' ? 0 : report.exitCode || 1;
    });
}

export async function handleBackupsCommand(args: ParsedArgs, context: CliContext = defaultCliContext): Promise<void> {
    await withRuntime(args, context, async ({ snapshots }) => {
        const all = await snapshots.list();
        const selected = args.servers.length > 0 ? all.filter((s) => args.servers.includes(s.instanceName)) : all;
        const rows = await Promise.all(
            selected.map(async (snapshot) => ({
                instance: snapshot.instanceName,
                createdAt: snapshot.createdAt.toISOString(),
                bytes: (await stat(snapshot.archivePath)).size,
                path: snapshot.archivePath,
            })),
        );

        if (args.json) {
            printJson(rows);
        } else if (rows.length === 0) {
            console.log(`No snapshots in ${snapshots.backupDir}.`);
        } else {
            for (const row of rows) {
                const sizeMb = (row.bytes / 1024 / 1024).toFixed(1);
                console.log(`${row.instance.padEnd(20)} ${row.createdAt}  ${sizeMb.padStart(8)} MB  ${path.basename(row.path)}`);
            }
        }
        process.exitCode = 0;
    });
}

export async function handleDoctorCommand(args: ParsedArgs, context: CliContext = defaultCliContext): Promise<void> {
    await withRuntime(args, context, async ({ config, controlPlane, snapshots }) => {
        const report = await new DoctorService({ config, controlPlane, snapshots }).runAll();
        if (args.json) {
            printJson(report);
        } else {
            console.log(formatDoctorReport(report));
        }
        process.exitCode = report.readiness.level === 'not_ready' ? 1 : 0;
    });
}

export async function handleTestEmailCommand(args: ParsedArgs, context: CliContext = defaultCliContext): Promise<void> {
    await withRuntime(args, context, async ({ notifier }) => {
        try {
            await notifier.sendTest();
            console.log(`[Notify] Test notification sent via ${notifier.name}.`);
            process.exitCode = 0;
        } catch (err) {
            console.error(`[Notify] Test notification failed: ${errorMessage(err)}`);
            process.exitCode = 1;
        }
    });
}

export async function handleScheduleCommand(args: ParsedArgs, context: CliContext = defaultCliContext): Promise<void> {
    await withRuntime(args, context, async ({ config, orchestrator }) => {
        const scheduler = new JobScheduler();
        scheduler.register({
            id: 'fleet-update',
            cronExpression: config.updateCron,
            run: async () => {
                const report = await orchestrator.run({ dryRun: args.dryRun || config.dryRun });
                if (report.exitCode !== 0) {
                    throw new Error(describeOutcome(report.outcome));
                }
            },
        });

        await logEvent(`[Schedule] Updates scheduled with '${config.updateCron}'. Press Ctrl+C to stop.`);

        const shutdown = (signal: string): void => {
            scheduler.stopAll();
            void logEvent(`[Schedule] Received ${signal}; scheduler stopped.`);
        };
        process.once('SIGINT', () => shutdown('SIGINT'));
        process.once('SIGTERM', () => shutdown('SIGTERM'));
    });
}

async function resolveLogDir(args: ParsedArgs): Promise<string> {
    const { env } = await loadEnvironment({ envFile: args.envFile });
    return path.resolve(readValue(env, 'LOG_DIR') ?? 'logs');
}

/**
 * Entry point for the command line. Every path sets `process.exitCode`;
 * nothing here calls `process.exit`, so pending log writes complete.
 */
export async function runCli(argv: string[], context: CliContext = defaultCliContext): Promise<void> {
    const args = parseArgs(argv);

    if (args.help) {
        console.log(HELP_TEXT);
        process.exitCode = 0;
        return;
    }

    if (!isKnownCommand(args.command)) {
        console.error(`Unknown command: '${args.command}'`);
        console.error(`Run 'bedrock-fleet-updater --help' to see available commands.`);
        process.exitCode = 1;
        return;
    }

    if (args.errors.length > 0) {
        for (const error of args.errors) {
            console.error(error);
        }
        process.exitCode = 1;
        return;
    }

    if (args.verbose) {
        configureLogger({ level: 'debug' });
    }

    try {
        switch (args.command) {
            case 'run':
                await handleRunCommand(args, context);
                break;
            case 'rollback':
                await handleRollbackCommand(args, context);
                break;
            case 'backups':
                await handleBackupsCommand(args, context);
                break;
            case 'doctor':
                await handleDoctorCommand(args, context);
                break;
            case 'test-email':
                await handleTestEmailCommand(args, context);
                break;
            case 'logs':
                await handleLogsCli(await resolveLogDir(args), { follow: args.follow });
                break;
            case 'schedule':
                await handleScheduleCommand(args, context);
                break;
        }
    } catch (err) {
        if (err instanceof ConfigError) {
            reportConfigError(err);
            return;
        }
        console.error(`[Updater] ${errorMessage(err)}`);
        process.exitCode = 1;
    }
}
