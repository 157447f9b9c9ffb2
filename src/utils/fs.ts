import { cp, mkdir, rename, rm, stat } from 'node:fs/promises';
import path from 'node:path';

export async function pathExists(targetPath: string): Promise<boolean> {
    try {
        await stat(targetPath);
        return true;
    } catch {
        return false;
    }
}

export async function isDirectory(targetPath: string): Promise<boolean> {
    try {
        return (await stat(targetPath)).isDirectory();
    } catch {
        return false;
    }
}

/** Rename, falling back to copy + remove when source and destination sit on different devices. */
export async function movePath(sourcePath: string, destinationPath: string): Promise<void> {
    await mkdir(path.dirname(destinationPath), { recursive: true });
    try {
        await rename(sourcePath, destinationPath);
    } catch (err) {
        if (!isNodeError(err) || err.code !== 'EXDEV') {
            throw err;
        }
        await cp(sourcePath, destinationPath, { recursive: true, preserveTimestamps: true });
        await rm(sourcePath, { recursive: true, force: true });
    }
}

export function isNodeError(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/** Local-time `YYYY-MM-DD-HHmmss`, the suffix used in snapshot file names. */
export function snapshotTimestamp(date: Date): string {
    return (
        `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}-` +
        `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
}

export function compactTimestamp(now: () => Date): string {
    return now().toISOString().replace(/[-:.TZ]/g, '').slice(0, 14);
}
