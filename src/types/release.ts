import type { Instance } from './instance.js';

/** Numeric components of a dotted version, e.g. `1.21.131.1` → `[1, 21, 131, 1]`. */
export type ReleaseVersion = readonly number[];

export type VersionComparison = -1 | 0 | 1;

export type CurrentVersion =
  | { known: true; version: ReleaseVersion; source: 'control-plane' | 'release-notes' | 'how-to-page' }
  | { known: false; reason: string };

export interface ReleaseInfo {
  version: ReleaseVersion;
  downloadUrl: string;
}

/** One entry of the upstream download manifest. */
export interface ManifestLink {
  downloadType: string;
  downloadUrl: string;
}

/** Yields the raw upstream manifest document. */
export interface ManifestSource {
  readonly description: string;
  fetchManifest(): Promise<unknown>;
}

export interface ReleaseSource {
  currentVersion(instance: Instance): Promise<CurrentVersion>;
  latestRelease(): Promise<ReleaseInfo>;
}

export interface ArtifactSource {
  download(location: string, destination: string, timeoutMs: number): Promise<DownloadResult>;
  extract(archivePath: string, destinationDir: string): Promise<ExtractResult>;
}

export interface DownloadResult {
  path: string;
  bytes: number;
  entryCount: number;
  durationMs: number;
}

export interface ExtractResult {
  directory: string;
  entryCount: number;
  executableMarked: boolean;
}
