import type { LogLevel } from '../utils/logger.js';
import type { FileProtectionPolicy, Instance } from './instance.js';

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string | null;
  password: string | null;
  from: string;
  to: string[];
}

export interface ReleaseFeedSettings {
  manifestUrl: string;
  /** `downloadType` of the manifest link to use, e.g. `serverBedrockLinux`. */
  platformKey: string;
  /** Local manifest file read instead of the feed in dev mode. */
  manifestFile: string | null;
}

/** Immutable configuration built once at startup and passed to every component. */
export interface UpdaterConfig {
  envFile: string | null;
  serverListFile: string;
  controlPlane: {
    baseUrl: string;
    apiToken: string;
  };
  releaseFeed: ReleaseFeedSettings;
  paths: {
    backupDir: string;
    logDir: string;
    scratchDir: string;
  };
  timeouts: {
    serverMs: number;
    startWaitMs: number;
    downloadMs: number;
    pollIntervalMs: number;
  };
  retention: {
    backupDays: number;
    logDays: number;
  };
  logLevel: LogLevel;
  minArtifactBytes: number;
  devMode: boolean;
  dryRun: boolean;
  updateCron: string;
  email: SmtpSettings | null;
  notifyOnNoUpdate: boolean;
  instances: readonly Instance[];
  policy: FileProtectionPolicy;
}
