import { readFile, stat } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import dotenv from 'dotenv';
import { ConfigError } from '../core/errors.js';
import { isPreservedPath, normalizePolicyPath } from '../services/file-projector.js';
import { DEFAULT_RELEASE_FEED_URL } from '../services/release-locator.js';
import type { SmtpSettings, UpdaterConfig } from '../types/config.js';
import type { FileProtectionPolicy, Instance } from '../types/instance.js';
import { isNodeError } from '../utils/fs.js';
import { isObjectRecord, isStringArray } from '../utils/guards.js';
import { isLogLevel, logEvent, registerSecret, type LogLevel } from '../utils/logger.js';
import { CONFIG_KEYS, CONFIG_SCHEMA } from './env-schema.js';
import { parseBoolean, readValue, validateEnvironment, type EnvMap } from './env-validator.js';

const DEFAULT_ENV_FILE = '.env';
const INSTANCE_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export interface LoadConfigOptions {
  /** Explicit env file; a missing explicit file is an error, a missing default is not. */
  envFile?: string;
  /** Overrides SERVER_LIST_FILE. */
  serverListFile?: string;
  /** Process environment; values for known keys override the env file. */
  processEnv?: EnvMap;
  cwd?: string;
}

export interface ServerRegistry {
  instances: Instance[];
  policy: FileProtectionPolicy;
}

export interface LoadedEnvironment {
  env: Record<string, string>;
  envFile: string | null;
}

/**
 * Read the env file with dotenv without touching `process.env`, then layer the
 * known keys from the process environment over it.
 */
export async function loadEnvironment(options: LoadConfigOptions = {}): Promise<LoadedEnvironment> {
  const cwd = options.cwd ?? process.cwd();
  const envFile = path.resolve(cwd, options.envFile ?? DEFAULT_ENV_FILE);
  const merged: Record<string, string> = {};
  let loadedFrom: string | null = null;

  try {
    const raw = await readFile(envFile);
    Object.assign(merged, dotenv.parse(raw));
    loadedFrom = envFile;
    await warnOnLoosePermissions(envFile);
  } catch (err) {
    if (!isNodeError(err) || err.code !== 'ENOENT') {
      throw new ConfigError(`Cannot read env file ${envFile}: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (options.envFile !== undefined) {
      throw new ConfigError(`Env file not found: ${envFile}`);
    }
  }

  const processEnv = options.processEnv ?? process.env;
  for (const key of CONFIG_KEYS) {
    const value = processEnv[key];
    if (typeof value === 'string' && value.trim().length > 0) {
      merged[key] = value;
    }
  }

  return { env: merged, envFile: loadedFrom };
}

async function warnOnLoosePermissions(envFile: string): Promise<void> {
  if (process.platform === 'win32') return;
  const { mode } = await stat(envFile);
  if ((mode & 0o077) !== 0) {
    await logEvent(
      `[Config] ${envFile} is readable by other users (mode ${(mode & 0o777).toString(8)}); consider chmod 600.`,
      'warn',
    );
  }
}

// ── Server registry ───────────────────────────────────────────────────────────

function checkRelativePaths(field: string, values: string[], issues: string[]): string[] {
  const normalized: string[] = [];
  for (const value of values) {
    const candidate = normalizePolicyPath(value);
    if (
      candidate.length === 0 ||
      candidate === '.' ||
      path.posix.isAbsolute(candidate) ||
      path.win32.isAbsolute(value) ||
      candidate === '..' ||
      candidate.startsWith('../')
    ) {
      issues.push(`${field}: '${value}' must be a relative path inside the server directory.`);
      continue;
    }
    normalized.push(candidate);
  }
  return normalized;
}

function readPathList(document: Record<string, unknown>, field: string, issues: string[]): string[] {
  const value = document[field];
  if (value === undefined) return [];
  if (!isStringArray(value)) {
    issues.push(`${field} must be an array of strings.`);
    return [];
  }
  return checkRelativePaths(field, value, issues);
}

/** Validate a parsed server-list document. Relative server paths resolve against `baseDir`. */
export function parseServerRegistry(document: unknown, baseDir: string): ServerRegistry {
  const issues: string[] = [];
  if (!isObjectRecord(document)) {
    throw new ConfigError('Server list must be a JSON object.', ['root is not an object']);
  }

  const instances: Instance[] = [];
  if (!Array.isArray(document.servers) || document.servers.length === 0) {
    issues.push('servers must be a non-empty array.');
  } else {
    const seenNames = new Set<string>();
    const seenPaths = new Set<string>();
    document.servers.forEach((entry: unknown, index: number) => {
      if (!isObjectRecord(entry)) {
        issues.push(`servers[${index}] must be an object.`);
        return;
      }
      const { name, id, path: directory } = entry;
      if (typeof name !== 'string' || !INSTANCE_NAME.test(name)) {
        issues.push(`servers[${index}].name must be letters, digits, '.', '_' or '-'.`);
        return;
      }
      if ((typeof id !== 'string' || id.trim().length === 0) && typeof id !== 'number') {
        issues.push(`servers[${index}].id must be a non-empty string or a number.`);
        return;
      }
      if (typeof directory !== 'string' || directory.trim().length === 0) {
        issues.push(`servers[${index}].path must be a non-empty string.`);
        return;
      }
      const directoryPath = path.resolve(baseDir, directory);
      if (seenNames.has(name)) {
        issues.push(`servers[${index}].name '${name}' is declared more than once.`);
        return;
      }
      if (seenPaths.has(directoryPath)) {
        issues.push(`servers[${index}].path '${directory}' is used by more than one server.`);
        return;
      }
      seenNames.add(name);
      seenPaths.add(directoryPath);
      instances.push({ name, remoteId: String(id).trim(), directoryPath });
    });
  }

  const preserveFiles = readPathList(document, 'preserve_files', issues);
  const preserveDirectories = readPathList(document, 'preserve_directories', issues);
  const updateFiles = readPathList(document, 'update_files', issues);
  if (document.update_files === undefined || updateFiles.length === 0) {
    issues.push('update_files must list at least one file.');
  }

  const policy: FileProtectionPolicy = { preserveFiles, preserveDirectories, updateFiles };
  for (const file of updateFiles) {
    if (isPreservedPath(file, policy)) {
      issues.push(`update_files entry '${file}' is also preserved by preserve_files or preserve_directories.`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigError(`Server list is invalid (${issues.length} issue(s)).`, issues);
  }

  return {
    instances: instances.map((instance) => Object.freeze(instance)),
    policy: Object.freeze({
      preserveFiles: Object.freeze(preserveFiles),
      preserveDirectories: Object.freeze(preserveDirectories),
      updateFiles: Object.freeze(updateFiles),
    }),
  };
}

export async function loadServerRegistry(filePath: string): Promise<ServerRegistry> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch {
    throw new ConfigError(`Server list not found: ${filePath}`);
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Server list is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  return parseServerRegistry(document, path.dirname(filePath));
}

// ── Assembly ──────────────────────────────────────────────────────────────────

function valueOrDefault(env: EnvMap, key: string): string {
  const value = readValue(env, key);
  if (value !== undefined) return value;
  const spec = CONFIG_SCHEMA.find((entry) => entry.key === key);
  return spec?.defaultValue ?? '';
}

function integer(env: EnvMap, key: string): number {
  return Number.parseInt(valueOrDefault(env, key), 10);
}

function flag(env: EnvMap, key: string): boolean {
  return parseBoolean(valueOrDefault(env, key)) ?? false;
}

function smtpSettings(env: EnvMap): SmtpSettings | null {
  const host = readValue(env, 'SMTP_HOST');
  if (!host) return null;
  return {
    host,
    port: integer(env, 'SMTP_PORT'),
    secure: flag(env, 'SMTP_SECURE'),
    user: readValue(env, 'SMTP_USER') ?? null,
    password: readValue(env, 'SMTP_PASSWORD') ?? null,
    from: valueOrDefault(env, 'SMTP_FROM'),
    to: valueOrDefault(env, 'SMTP_TO')
      .split(',')
      .map((address) => address.trim())
      .filter((address) => address.length > 0),
  };
}

/** Combine a validated environment and registry into the frozen run configuration. */
export function buildUpdaterConfig(
  env: EnvMap,
  registry: ServerRegistry,
  context: { envFile: string | null; serverListFile: string; cwd: string },
): UpdaterConfig {
  const resolve = (value: string): string => path.resolve(context.cwd, value);
  const level = valueOrDefault(env, 'LOG_LEVEL').toLowerCase();
  const logLevel: LogLevel = isLogLevel(level) ? level : 'info';
  const manifestFile = readValue(env, 'RELEASE_MANIFEST_FILE');
  const scratchDir = readValue(env, 'SCRATCH_DIR');

  const config: UpdaterConfig = {
    envFile: context.envFile,
    serverListFile: context.serverListFile,
    controlPlane: {
      baseUrl: valueOrDefault(env, 'CRAFTY_API_URL'),
      apiToken: valueOrDefault(env, 'CRAFTY_API_TOKEN'),
    },
    releaseFeed: {
      manifestUrl: readValue(env, 'RELEASE_FEED_URL') ?? DEFAULT_RELEASE_FEED_URL,
      platformKey: valueOrDefault(env, 'RELEASE_PLATFORM'),
      manifestFile: manifestFile ? resolve(manifestFile) : null,
    },
    paths: {
      backupDir: resolve(valueOrDefault(env, 'BACKUP_DIR')),
      logDir: resolve(valueOrDefault(env, 'LOG_DIR')),
      scratchDir: scratchDir ? resolve(scratchDir) : os.tmpdir(),
    },
    timeouts: {
      serverMs: integer(env, 'SERVER_TIMEOUT') * 1000,
      startWaitMs: integer(env, 'SERVER_START_WAIT') * 1000,
      downloadMs: integer(env, 'DOWNLOAD_TIMEOUT') * 1000,
      pollIntervalMs: integer(env, 'POLL_INTERVAL_MS'),
    },
    retention: {
      backupDays: integer(env, 'BACKUP_RETENTION_DAYS'),
      logDays: integer(env, 'LOG_RETENTION_DAYS'),
    },
    logLevel,
    minArtifactBytes: integer(env, 'MIN_ARTIFACT_BYTES'),
    devMode: flag(env, 'DEV_MODE'),
    dryRun: flag(env, 'DRY_RUN'),
    updateCron: valueOrDefault(env, 'UPDATE_CRON'),
    email: smtpSettings(env),
    notifyOnNoUpdate: flag(env, 'NOTIFY_ON_NO_UPDATE'),
    instances: Object.freeze([...registry.instances]),
    policy: registry.policy,
  };

  return Object.freeze(config);
}

/**
 * Load, validate and freeze the configuration. Throws ConfigError listing every
 * issue found; secret values are registered with the logger for redaction.
 */
export async function loadUpdaterConfig(options: LoadConfigOptions = {}): Promise<UpdaterConfig> {
  const cwd = options.cwd ?? process.cwd();
  const { env, envFile } = await loadEnvironment(options);

  for (const spec of CONFIG_SCHEMA) {
    if (spec.type === 'secret') {
      registerSecret(env[spec.key]);
    }
  }

  const validation = validateEnvironment(env);
  if (!validation.ok) {
    throw new ConfigError(
      `Configuration is invalid (${validation.fatalIssues.length} issue(s)).`,
      validation.fatalIssues.map((issue) => `${issue.message} ${issue.remediation}`),
    );
  }

  const serverListFile = path.resolve(cwd, options.serverListFile ?? valueOrDefault(env, 'SERVER_LIST_FILE'));
  const registry = await loadServerRegistry(serverListFile);

  return buildUpdaterConfig(env, registry, { envFile, serverListFile, cwd });
}
