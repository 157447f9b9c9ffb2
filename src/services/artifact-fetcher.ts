import { createWriteStream } from 'node:fs';
import { chmod, mkdir, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import AdmZip from 'adm-zip';
import { DownloadError, errorMessage } from '../core/errors.js';
import type { FetchLike } from '../types/control-plane.js';
import type { ArtifactSource, DownloadResult, ExtractResult } from '../types/release.js';
import { pathExists } from '../utils/fs.js';
import { logEvent } from '../utils/logger.js';

export const SERVER_EXECUTABLE = 'bedrock_server';
export const DEFAULT_MIN_ARTIFACT_BYTES = 1_000_000;

export interface ArtifactFetcherOptions {
  /** Smaller downloads are treated as truncated or as an error page. */
  minArtifactBytes?: number;
  fetchImpl?: FetchLike;
  now?: () => number;
}

/** Mark the server binary executable, if the directory has one. */
export async function markServerExecutable(directory: string): Promise<boolean> {
  const executable = path.join(directory, SERVER_EXECUTABLE);
  if (!(await pathExists(executable))) {
    return false;
  }
  await chmod(executable, 0o755);
  return true;
}

/**
 * Open the archive and read every entry. Throws when the file is not a zip,
 * has no entries, or an entry fails to decompress.
 */
export function validateZipArchive(archivePath: string): number {
  const zip = new AdmZip(archivePath);
  const entries = zip.getEntries();
  if (entries.length === 0) {
    throw new Error('archive contains no entries');
  }
  for (const entry of entries) {
    if (!entry.isDirectory) {
      entry.getData();
    }
  }
  return entries.length;
}

export class ArtifactFetcher implements ArtifactSource {
  readonly #minArtifactBytes: number;
  readonly #fetch: FetchLike;
  readonly #now: () => number;

  constructor(options: ArtifactFetcherOptions = {}) {
    this.#minArtifactBytes = options.minArtifactBytes ?? DEFAULT_MIN_ARTIFACT_BYTES;
    this.#fetch = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.#now = options.now ?? Date.now;
  }

  async download(location: string, destination: string, timeoutMs: number): Promise<DownloadResult> {
    const startedAt = this.#now();
    await mkdir(path.dirname(destination), { recursive: true });
    await logEvent(`[ArtifactFetcher] Downloading ${location}`);

    try {
      const signal = AbortSignal.timeout(timeoutMs);
      const response = await this.#fetch(location, { signal });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      if (!response.body) {
        throw new Error('response has no body');
      }
      await pipeline(Readable.fromWeb(response.body), createWriteStream(destination), { signal });

      const { size } = await stat(destination);
      if (size < this.#minArtifactBytes) {
        throw new Error(`file is only ${size} bytes, expected at least ${this.#minArtifactBytes}`);
      }

      let entryCount: number;
      try {
        entryCount = validateZipArchive(destination);
      } catch (err) {
        throw new Error(`not a valid zip archive (${errorMessage(err)})`);
      }

      const durationMs = this.#now() - startedAt;
      await logEvent(`[ArtifactFetcher] Downloaded ${size} bytes, ${entryCount} entries in ${durationMs}ms.`);
      return { path: destination, bytes: size, entryCount, durationMs };
    } catch (err) {
      await rm(destination, { force: true });
      const reason = isTimeout(err) ? `timed out after ${Math.round(timeoutMs / 1000)}s` : errorMessage(err);
      throw new DownloadError(`Download of ${location} failed: ${reason}`, { cause: err });
    }
  }

  async extract(archivePath: string, destinationDir: string): Promise<ExtractResult> {
    try {
      await mkdir(destinationDir, { recursive: true });
      const zip = new AdmZip(archivePath);
      const entryCount = zip.getEntries().length;
      zip.extractAllTo(destinationDir, true);
      const executableMarked = await markServerExecutable(destinationDir);
      await logEvent(`[ArtifactFetcher] Extracted ${entryCount} entries to ${destinationDir}.`);
      return { directory: destinationDir, entryCount, executableMarked };
    } catch (err) {
      throw new DownloadError(`Extraction of ${archivePath} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}
