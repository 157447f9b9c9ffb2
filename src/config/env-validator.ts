/**
 * Validates the merged environment against `CONFIG_SCHEMA`.
 *
 * Produces structured, redaction-safe diagnostics for:
 *   - Missing required config keys.
 *   - Active features whose conditional keys are absent.
 *   - Format violations on present keys.
 *
 * Secret values never appear in the output.
 */

import { isLogLevel } from '../utils/logger.js';
import { CONFIG_SCHEMA } from './env-schema.js';
import type { ConfigCondition, ConfigKeySpec } from './env-schema.js';

// ── Public types ──────────────────────────────────────────────────────────────

export type ConfigIssueClass = 'missing_required' | 'missing_conditional' | 'format_error';

export interface ConfigIssue {
  key: string;
  class: ConfigIssueClass;
  message: string;
  remediation: string;
}

export interface ConfigValidationResult {
  /** true when no issue prevents a run. */
  ok: boolean;
  presentKeys: string[];
  issues: ConfigIssue[];
  activeFeatures: ConfigCondition[];
  fatalIssues: ConfigIssue[];
  validatedAt: string;
}

export type EnvMap = Readonly<Record<string, string | undefined>>;

const EMAIL_ADDRESS = /^[^\s@]+@[^\s@]+$/;

// ── Internal helpers ─────────────────────────────────────────────────────────

export function readValue(env: EnvMap, key: string): string | undefined {
  const raw = env[key];
  if (typeof raw !== 'string') return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function parseBoolean(raw: string): boolean | null {
  const value = raw.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(value)) return true;
  if (['false', '0', 'no', 'off'].includes(value)) return false;
  return null;
}

function formatError(spec: ConfigKeySpec, raw: string): string | null {
  switch (spec.format) {
    case 'url':
      if (!/^https?:\/\/\S+$/i.test(raw)) {
        return `${spec.key} must be an http(s) URL.`;
      }
      return null;
    case 'positive-integer': {
      const parsed = Number(raw);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        return `${spec.key} must be a positive integer, got '${raw}'.`;
      }
      return null;
    }
    case 'non-negative-integer': {
      const parsed = Number(raw);
      if (!Number.isInteger(parsed) || parsed < 0) {
        return `${spec.key} must be a non-negative integer, got '${raw}'.`;
      }
      return null;
    }
    case 'port': {
      const parsed = Number(raw);
      if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
        return `${spec.key} must be an integer in range 1-65535, got '${raw}'.`;
      }
      return null;
    }
    case 'boolean':
      return parseBoolean(raw) === null ? `${spec.key} must be true or false, got '${raw}'.` : null;
    case 'log-level':
      return isLogLevel(raw.toLowerCase())
        ? null
        : `${spec.key} must be one of debug, info, warn, error, got '${raw}'.`;
    case 'email-list': {
      const addresses = raw.split(',').map((part) => part.trim()).filter((part) => part.length > 0);
      if (addresses.length === 0 || !addresses.every((address) => EMAIL_ADDRESS.test(address))) {
        return `${spec.key} must be a comma-separated list of email addresses.`;
      }
      return null;
    }
    case 'text':
      return null;
  }
}

function detectActiveFeatures(env: EnvMap): Set<ConfigCondition> {
  const active = new Set<ConfigCondition>();
  if (readValue(env, 'SMTP_HOST')) {
    active.add('notify:email');
  }
  const devMode = readValue(env, 'DEV_MODE');
  if (!devMode || parseBoolean(devMode) !== true) {
    active.add('panel:online');
  }
  return active;
}

// ── Public API ───────────────────────────────────────────────────────────────

export function validateEnvironment(env: EnvMap, now: () => Date = () => new Date()): ConfigValidationResult {
  const issues: ConfigIssue[] = [];
  const presentKeys: string[] = [];
  const activeFeatures = detectActiveFeatures(env);

  for (const spec of CONFIG_SCHEMA) {
    const raw = readValue(env, spec.key);

    if (raw !== undefined) {
      presentKeys.push(spec.key);
      const formatErr = formatError(spec, raw);
      if (formatErr) {
        issues.push({ key: spec.key, class: 'format_error', message: formatErr, remediation: spec.remediation });
      }
      continue;
    }

    if (spec.class === 'required') {
      issues.push({
        key: spec.key,
        class: 'missing_required',
        message: `Required config key '${spec.key}' is missing. ${spec.description}`,
        remediation: spec.remediation,
      });
      continue;
    }

    if (spec.class === 'conditional' && spec.condition && activeFeatures.has(spec.condition)) {
      issues.push({
        key: spec.key,
        class: 'missing_conditional',
        message: `'${spec.key}' is required when ${describeCondition(spec.condition)}. ${spec.description}`,
        remediation: spec.remediation,
      });
    }
  }

  return {
    ok: issues.length === 0,
    presentKeys,
    issues,
    activeFeatures: [...activeFeatures],
    fatalIssues: issues,
    validatedAt: now().toISOString(),
  };
}

function describeCondition(condition: ConfigCondition): string {
  switch (condition) {
    case 'notify:email':
      return 'email notifications are enabled (SMTP_HOST is set)';
    case 'panel:online':
      return 'DEV_MODE is off';
  }
}
