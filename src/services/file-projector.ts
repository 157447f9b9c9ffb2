import { createHash } from 'node:crypto';
import { chmod, copyFile, mkdir, readFile, rename, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import { ApplyError, errorMessage } from '../core/errors.js';
import type { FileProtectionPolicy } from '../types/instance.js';
import { pathExists } from '../utils/fs.js';
import { logEvent } from '../utils/logger.js';
import { SERVER_EXECUTABLE } from './artifact-fetcher.js';

const ASIDE_SUFFIX = '.old';

export interface ProjectionResult {
    appliedCount: number;
    applied: string[];
    skipped: string[];
}

export interface Projector {
    apply(extractedDir: string, instanceDir: string, policy: FileProtectionPolicy): Promise<ProjectionResult>;
}

export interface FileProjectorOptions {
    /** Replaceable copy step, used for the aside copy and the release copy. */
    copyFile?: (source: string, destination: string) => Promise<void>;
}

/** Normalize a policy path to a relative POSIX path without leading `./` or trailing `/`. */
export function normalizePolicyPath(relativePath: string): string {
    return path.posix.normalize(relativePath.replace(/\\/g, '/')).replace(/^\.\//, '').replace(/\/+$/, '');
}

export function isPreservedPath(relativePath: string, policy: FileProtectionPolicy): boolean {
    const candidate = normalizePolicyPath(relativePath);
    if (policy.preserveFiles.some((file) => normalizePolicyPath(file) === candidate)) {
        return true;
    }
    return policy.preserveDirectories.some((directory) => {
        const root = normalizePolicyPath(directory);
        return candidate === root || candidate.startsWith(`${root}/`);
    });
}

async function isFile(targetPath: string): Promise<boolean> {
    try {
        return (await stat(targetPath)).isFile();
    } catch {
        return false;
    }
}

async function checksum(filePath: string): Promise<string> {
    return createHash('sha256').update(await readFile(filePath)).digest('hex');
}

/**
 * Copies the allow-listed files of an extracted release onto an instance.
 * Nothing outside `policy.updateFiles` is written, and nothing preserved is
 * touched.
 */
export class FileProjector implements Projector {
    readonly #copyFile: (source: string, destination: string) => Promise<void>;

    constructor(options: FileProjectorOptions = {}) {
        this.#copyFile = options.copyFile ?? ((source, destination) => copyFile(source, destination));
    }

    async apply(extractedDir: string, instanceDir: string, policy: FileProtectionPolicy): Promise<ProjectionResult> {
        const before = await this.#preservedChecksums(instanceDir, policy);
        const applied: string[] = [];
        const skipped: string[] = [];

        for (const entry of policy.updateFiles) {
            const relativePath = normalizePolicyPath(entry);

            if (isPreservedPath(relativePath, policy)) {
                void logEvent(`[FileProjector] Refusing to overwrite preserved path: ${relativePath}`, 'warn');
                skipped.push(relativePath);
                continue;
            }

            const source = path.join(extractedDir, relativePath);
            if (!(await isFile(source))) {
                void logEvent(`[FileProjector] File not found in new release: ${relativePath}`, 'warn');
                skipped.push(relativePath);
                continue;
            }

            await this.#replaceFile(source, path.join(instanceDir, relativePath), relativePath);
            applied.push(relativePath);
        }

        await this.#assertPreservedUnchanged(instanceDir, before);

        await logEvent(`[FileProjector] Updated ${applied.length} file(s) in ${instanceDir}.`);
        return { appliedCount: applied.length, applied, skipped };
    }

    async #replaceFile(source: string, destination: string, relativePath: string): Promise<void> {
        const aside = `${destination}${ASIDE_SUFFIX}`;
        const hadExisting = await isFile(destination);
        // Only a completed aside copy may ever be renamed over the destination.
        let asideReady = false;

        try {
            await mkdir(path.dirname(destination), { recursive: true });
            if (hadExisting) {
                await this.#copyFile(destination, aside);
                asideReady = true;
            }
            await this.#copyFile(source, destination);
            if (path.posix.basename(relativePath) === SERVER_EXECUTABLE) {
                await chmod(destination, 0o755);
            }
        } catch (err) {
            if (asideReady) {
                await rename(aside, destination);
                void logEvent(`[FileProjector] Restored original file: ${relativePath}`, 'warn');
            } else if (await pathExists(aside)) {
                await rm(aside, { force: true });
            }
            throw new ApplyError(`Failed to update ${relativePath}: ${errorMessage(err)}`, {
                relativePath,
                cause: err,
            });
        }

        if (hadExisting) {
            await rm(aside, { force: true });
        }
        await logEvent(`[FileProjector] Updated ${relativePath}`, 'debug');
    }

    async #preservedChecksums(instanceDir: string, policy: FileProtectionPolicy): Promise<Map<string, string>> {
        const checksums = new Map<string, string>();
        for (const entry of policy.preserveFiles) {
            const relativePath = normalizePolicyPath(entry);
            const filePath = path.join(instanceDir, relativePath);
            if (await isFile(filePath)) {
                checksums.set(relativePath, await checksum(filePath));
            }
        }
        return checksums;
    }

    async #assertPreservedUnchanged(instanceDir: string, before: Map<string, string>): Promise<void> {
        for (const [relativePath, expected] of before) {
            const filePath = path.join(instanceDir, relativePath);
            const actual = (await isFile(filePath)) ? await checksum(filePath) : null;
            if (actual !== expected) {
                throw new ApplyError(`Preserved file changed during update: ${relativePath}`, { relativePath });
            }
        }
    }
}
