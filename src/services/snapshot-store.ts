import { mkdir, readdir, rename, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import * as tar from 'tar';
import { BackupError, errorMessage } from '../core/errors.js';
import type { Snapshot, SnapshotRepository } from '../types/snapshot.js';
import { compactTimestamp, isDirectory, movePath, pathExists, snapshotTimestamp } from '../utils/fs.js';
import { logEvent } from '../utils/logger.js';
import { markServerExecutable } from './artifact-fetcher.js';

const ARCHIVE_EXTENSION = '.tar.gz';
const TIMESTAMP_SUFFIX = /^(\d{4})-(\d{2})-(\d{2})-(\d{2})(\d{2})(\d{2})$/;

export interface SnapshotStoreOptions {
  backupDir: string;
  now?: () => Date;
}

export function snapshotFileName(instanceName: string, createdAt: Date): string {
  return `backup-${instanceName}-${snapshotTimestamp(createdAt)}${ARCHIVE_EXTENSION}`;
}

/**
 * Split `backup-<instance>-<YYYY-MM-DD-HHmmss>.tar.gz`. Instance names may
 * contain dashes, so the timestamp is matched from the end.
 */
export function parseSnapshotFileName(fileName: string): { instanceName: string; createdAt: Date } | null {
  if (!fileName.startsWith('backup-') || !fileName.endsWith(ARCHIVE_EXTENSION)) {
    return null;
  }
  const stem = fileName.slice('backup-'.length, -ARCHIVE_EXTENSION.length);
  const timestamp = stem.slice(-17);
  const match = TIMESTAMP_SUFFIX.exec(timestamp);
  if (!match || stem.length < 19 || stem[stem.length - 18] !== '-') {
    return null;
  }
  const [, year, month, day, hours, minutes, seconds] = match.map(Number);
  return {
    instanceName: stem.slice(0, -18),
    createdAt: new Date(year, month - 1, day, hours, minutes, seconds),
  };
}

/**
 * Gzip tar snapshots of whole instance directories. The archive root is the
 * directory's own name, so a restore extracts into the parent directory.
 */
export class SnapshotStore implements SnapshotRepository {
  readonly #backupDir: string;
  readonly #now: () => Date;

  constructor(options: SnapshotStoreOptions) {
    this.#backupDir = path.resolve(options.backupDir);
    this.#now = options.now ?? (() => new Date());
  }

  get backupDir(): string {
    return this.#backupDir;
  }

  async create(instanceName: string, sourceDir: string): Promise<Snapshot> {
    const source = path.resolve(sourceDir);
    if (!(await isDirectory(source))) {
      throw new BackupError(`Cannot back up '${instanceName}': ${source} is not a directory.`);
    }

    await mkdir(this.#backupDir, { recursive: true });
    const createdAt = this.#now();
    const archivePath = path.join(this.#backupDir, snapshotFileName(instanceName, createdAt));
    const tempPath = `${archivePath}.tmp`;

    await logEvent(`[SnapshotStore] Creating snapshot of '${instanceName}' at ${archivePath}`);

    try {
      await tar.create(
        { gzip: true, file: tempPath, cwd: path.dirname(source), portable: true },
        [path.basename(source)],
      );
      await rename(tempPath, archivePath);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw new BackupError(`Snapshot of '${instanceName}' failed: ${errorMessage(err)}`, { cause: err });
    }

    const { size } = await stat(archivePath);
    await logEvent(`[SnapshotStore] Snapshot of '${instanceName}' written (${size} bytes).`);
    return { instanceName, createdAt, archivePath };
  }

  /** List the archive without extracting it. */
  async verify(snapshot: Snapshot): Promise<boolean> {
    let entries = 0;
    try {
      await tar.list({
        file: snapshot.archivePath,
        strict: true,
        onentry: () => {
          entries += 1;
        },
      });
    } catch (err) {
      await logEvent(
        `[SnapshotStore] Integrity check failed for ${snapshot.archivePath}: ${errorMessage(err)}`,
        'error',
      );
      return false;
    }

    if (entries === 0) {
      await logEvent(`[SnapshotStore] Snapshot ${snapshot.archivePath} contains no entries.`, 'error');
      return false;
    }

    await logEvent(`[SnapshotStore] Snapshot ${snapshot.archivePath} verified (${entries} entries).`, 'debug');
    return true;
  }

  /**
   * Replace `targetDir` with the snapshot's contents. The existing directory is
   * moved aside first and only removed once extraction succeeded; on failure it
   * is moved back.
   */
  async restore(snapshot: Snapshot, targetDir: string): Promise<void> {
    const target = path.resolve(targetDir);
    const parent = path.dirname(target);
    const sidePath = `${target}.pre-restore-${compactTimestamp(this.#now)}`;
    const hadExisting = await pathExists(target);

    await logEvent(`[SnapshotStore] Restoring '${snapshot.instanceName}' from ${snapshot.archivePath}`);

    await mkdir(parent, { recursive: true });
    if (hadExisting) {
      await movePath(target, sidePath);
    }

    try {
      await tar.extract({
        file: snapshot.archivePath,
        cwd: parent,
        strict: true,
        preservePaths: false,
        filter: (entryPath) => isInsideRoot(entryPath, path.basename(target)),
      });
      if (!(await isDirectory(target))) {
        throw new Error(`archive did not contain '${path.basename(target)}'`);
      }
      await markServerExecutable(target);
    } catch (err) {
      await rm(target, { recursive: true, force: true });
      if (hadExisting) {
        await movePath(sidePath, target);
      }
      throw new BackupError(`Restore of '${snapshot.instanceName}' failed: ${errorMessage(err)}`, { cause: err });
    }

    if (hadExisting) {
      await rm(sidePath, { recursive: true, force: true });
    }
    await logEvent(`[SnapshotStore] Restored '${snapshot.instanceName}' into ${target}.`);
  }

  async latest(instanceName: string): Promise<Snapshot | null> {
    const [newest] = await this.list(instanceName);
    return newest ?? null;
  }

  /** Snapshots newest first, optionally for one instance. */
  async list(instanceName?: string): Promise<Snapshot[]> {
    let files: string[];
    try {
      files = await readdir(this.#backupDir);
    } catch {
      return [];
    }

    const snapshots: Snapshot[] = [];
    for (const file of files) {
      const parsed = parseSnapshotFileName(file);
      if (!parsed || (instanceName !== undefined && parsed.instanceName !== instanceName)) {
        continue;
      }
      snapshots.push({ ...parsed, archivePath: path.join(this.#backupDir, file) });
    }

    return snapshots.sort(
      (a, b) => b.createdAt.getTime() - a.createdAt.getTime() || a.instanceName.localeCompare(b.instanceName),
    );
  }

  async pruneOlderThan(retentionDays: number): Promise<number> {
    const cutoff = this.#now().getTime() - retentionDays * 24 * 60 * 60 * 1000;
    let removed = 0;

    for (const snapshot of await this.list()) {
      const { mtimeMs } = await stat(snapshot.archivePath);
      if (mtimeMs < cutoff) {
        await rm(snapshot.archivePath, { force: true });
        removed += 1;
      }
    }

    if (removed > 0) {
      await logEvent(`[SnapshotStore] Pruned ${removed} snapshot(s) older than ${retentionDays} day(s).`);
    }
    return removed;
  }
}

function isInsideRoot(entryPath: string, root: string): boolean {
  const normalized = entryPath.replace(/^\.\//, '');
  return normalized === root || normalized === `${root}/` || normalized.startsWith(`${root}/`);
}
