import { appendFile, mkdir, readdir, rm, stat } from 'node:fs/promises';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

const LOG_FILE_PATTERN = /^update-(\d{4}-\d{2}-\d{2})\.log$/;

interface LoggerSettings {
    logDir: string | null;
    level: LogLevel;
    console: boolean;
}

const settings: LoggerSettings = {
    logDir: null,
    level: 'info',
    console: true,
};

const registeredSecrets = new Set<string>();

const SENSITIVE_ASSIGNMENT =
    /\b([A-Z0-9_]*(?:TOKEN|PASSWORD|SECRET|API_KEY)[A-Z0-9_]*)\s*[=:]\s*("[^"]*"|'[^']*'|\S+)/gi;
const BEARER_TOKEN = /\bBearer\s+[A-Za-z0-9._~+/=-]+/g;
const URL_CREDENTIALS = /(\b[a-z][a-z0-9+.-]*:\/\/)[^/\s:@]+:[^/\s@]+@/gi;

export function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

export function configureLogger(options: Partial<LoggerSettings>): void {
    if (options.logDir !== undefined) settings.logDir = options.logDir;
    if (options.level !== undefined) settings.level = options.level;
    if (options.console !== undefined) settings.console = options.console;
}

export function getLogDir(): string | null {
    return settings.logDir;
}

/** Values registered here are replaced with `[REDACTED]` wherever they appear in log output. */
export function registerSecret(value: string | null | undefined): void {
    if (value && value.trim().length >= 4) {
        registeredSecrets.add(value);
    }
}

export function scrubSensitiveText(text: string): string {
    let scrubbed = text;
    for (const secret of registeredSecrets) {
        scrubbed = scrubbed.split(secret).join('[REDACTED]');
    }
    return scrubbed
        .replace(BEARER_TOKEN, 'Bearer [REDACTED]')
        .replace(URL_CREDENTIALS, '$1[REDACTED]@')
        .replace(SENSITIVE_ASSIGNMENT, (_match, key: string) => `${key}=[REDACTED]`);
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

function formatDate(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function formatTimestamp(date: Date): string {
    return `${formatDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function logFileName(date: Date): string {
    return `update-${formatDate(date)}.log`;
}

export function formatLogLine(message: string, level: LogLevel, at: Date): string {
    return `[${formatTimestamp(at)}] [${level.toUpperCase()}] ${scrubSensitiveText(message)}`;
}

/**
 * Append one line to today's log file and echo it to the console.
 * Lines below the configured level are dropped. Write failures go to stderr
 * and never reach the caller.
 */
export async function logEvent(message: string, level: LogLevel = 'info'): Promise<void> {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[settings.level]) {
        return;
    }

    const now = new Date();
    const line = formatLogLine(message, level, now);

    if (settings.console) {
        if (level === 'error' || level === 'warn') {
            console.error(line);
        } else {
            console.log(line);
        }
    }

    if (!settings.logDir) {
        return;
    }

    try {
        await mkdir(settings.logDir, { recursive: true });
        await appendFile(path.join(settings.logDir, logFileName(now)), `${line}\n`, 'utf8');
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        console.error(`[Logger] Failed to write log file: ${reason}`);
    }
}

/** Delete dated log files whose modification time is older than `retentionDays`. */
export async function pruneLogFiles(
    logDir: string,
    retentionDays: number,
    now: () => Date = () => new Date(),
): Promise<number> {
    let entries: string[];
    try {
        entries = await readdir(logDir);
    } catch {
        return 0;
    }

    const cutoff = now().getTime() - retentionDays * 24 * 60 * 60 * 1000;
    let removed = 0;

    for (const entry of entries) {
        if (!LOG_FILE_PATTERN.test(entry)) continue;
        const filePath = path.join(logDir, entry);
        const info = await stat(filePath);
        if (info.mtimeMs < cutoff) {
            await rm(filePath, { force: true });
            removed += 1;
        }
    }

    return removed;
}
