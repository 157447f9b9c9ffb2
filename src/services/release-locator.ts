import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { errorMessage } from '../core/errors.js';
import type { ControlPlane, FetchLike } from '../types/control-plane.js';
import type { Instance } from '../types/instance.js';
import type {
    CurrentVersion,
    ManifestLink,
    ManifestSource,
    ReleaseInfo,
    ReleaseSource,
    ReleaseVersion,
    VersionComparison,
} from '../types/release.js';
import { isDirectory } from '../utils/fs.js';
import { isObjectRecord } from '../utils/guards.js';
import { logEvent } from '../utils/logger.js';

export const DEFAULT_RELEASE_FEED_URL =
    'https://net-secondary.web.minecraft-services.net/api/v1.0/download/links';
export const DEFAULT_PLATFORM_KEY = 'serverBedrockLinux';

const RELEASE_NOTES_FILE = 'release-notes.txt';
const RELEASE_NOTES_SCAN_LINES = 50;
const RELEASE_NOTES_TOKEN = /\b\d+\.\d+\.\d+(?:\.\d+)?\b/;
const HOW_TO_FILE = 'bedrock_server_how_to.html';
const HOW_TO_TOKEN = /Version[:\s]+(\d+\.\d+\.\d+(?:\.\d+)?)/;
const ARTIFACT_FILENAME = /^bedrock-server-(\d+(?:\.\d+)*)\.zip$/;
const DOTTED_VERSION = /^\d+(?:\.\d+)*$/;

/** Parse a dotted numeric version such as `1.21.131.1`. Returns `null` for anything else. */
export function parseVersion(text: string): ReleaseVersion | null {
    const trimmed = text.trim();
    if (!DOTTED_VERSION.test(trimmed)) {
        return null;
    }
    return trimmed.split('.').map((part) => Number.parseInt(part, 10));
}

export function formatVersion(version: ReleaseVersion): string {
    return version.join('.');
}

/**
 * Component-wise numeric comparison; missing trailing components count as 0,
 * so `1.2.0.0` equals `1.2`.
 */
export function compareVersions(a: ReleaseVersion, b: ReleaseVersion): VersionComparison {
    const length = Math.max(a.length, b.length);
    for (let index = 0; index < length; index += 1) {
        const left = a[index] ?? 0;
        const right = b[index] ?? 0;
        if (left < right) return -1;
        if (left > right) return 1;
    }
    return 0;
}

/** The version token is taken from the artifact file name, e.g. `bedrock-server-1.21.131.1.zip`. */
export function versionFromArtifactUrl(downloadUrl: string): ReleaseVersion | null {
    let pathname: string;
    try {
        pathname = new URL(downloadUrl).pathname;
    } catch {
        return null;
    }
    const match = ARTIFACT_FILENAME.exec(path.posix.basename(pathname));
    return match ? parseVersion(match[1]) : null;
}

function parseManifestLinks(manifest: unknown): ManifestLink[] {
    if (!isObjectRecord(manifest) || !isObjectRecord(manifest.result) || !Array.isArray(manifest.result.links)) {
        throw new Error('Release manifest has an unexpected shape: missing result.links.');
    }

    const links: ManifestLink[] = [];
    for (const candidate of manifest.result.links) {
        if (
            isObjectRecord(candidate) &&
            typeof candidate.downloadType === 'string' &&
            typeof candidate.downloadUrl === 'string'
        ) {
            links.push({ downloadType: candidate.downloadType, downloadUrl: candidate.downloadUrl });
        }
    }
    return links;
}

/** Resolve the release for one platform out of a manifest document. */
export function selectRelease(manifest: unknown, platformKey: string): ReleaseInfo {
    const link = parseManifestLinks(manifest).find((entry) => entry.downloadType === platformKey);
    if (!link) {
        throw new Error(`Release manifest has no download link for platform '${platformKey}'.`);
    }

    const version = versionFromArtifactUrl(link.downloadUrl);
    if (!version) {
        throw new Error(`Could not extract a version from download URL: ${link.downloadUrl}`);
    }

    return { version, downloadUrl: link.downloadUrl };
}

export class HttpManifestSource implements ManifestSource {
    readonly description: string;
    readonly #url: string;
    readonly #fetch: FetchLike;
    readonly #timeoutMs: number;

    constructor(url: string, options: { fetchImpl?: FetchLike; timeoutMs?: number } = {}) {
        this.description = url;
        this.#url = url;
        this.#fetch = options.fetchImpl ?? ((input, init) => fetch(input, init));
        this.#timeoutMs = options.timeoutMs ?? 30_000;
    }

    async fetchManifest(): Promise<unknown> {
        const response = await this.#fetch(this.#url, {
            headers: { Accept: 'application/json' },
            signal: AbortSignal.timeout(this.#timeoutMs),
        });
        if (!response.ok) {
            throw new Error(`Release feed responded with HTTP ${response.status}.`);
        }
        return response.json();
    }
}

/** Reads the manifest from disk; used in offline/dev mode. */
export class FileManifestSource implements ManifestSource {
    readonly description: string;
    readonly #filePath: string;

    constructor(filePath: string) {
        this.description = filePath;
        this.#filePath = filePath;
    }

    async fetchManifest(): Promise<unknown> {
        const raw = await readFile(this.#filePath, 'utf8');
        return JSON.parse(raw);
    }
}

export interface ReleaseLocatorOptions {
    manifestSource: ManifestSource;
    platformKey?: string;
    /** Source of panel-reported versions; omitted when the panel is not consulted. */
    controlPlane?: Pick<ControlPlane, 'status'>;
}

export class ReleaseLocator implements ReleaseSource {
    readonly #manifestSource: ManifestSource;
    readonly #platformKey: string;
    readonly #controlPlane: Pick<ControlPlane, 'status'> | null;

    constructor(options: ReleaseLocatorOptions) {
        this.#manifestSource = options.manifestSource;
        this.#platformKey = options.platformKey ?? DEFAULT_PLATFORM_KEY;
        this.#controlPlane = options.controlPlane ?? null;
    }

    async currentVersion(instance: Instance): Promise<CurrentVersion> {
        if (this.#controlPlane) {
            try {
                const stats = await this.#controlPlane.status(instance);
                const reported = stats.version ? parseVersion(stats.version) : null;
                if (reported) {
                    return { known: true, version: reported, source: 'control-plane' };
                }
            } catch (err) {
                void logEvent(
                    `[ReleaseLocator] Panel did not report a version for '${instance.name}': ${errorMessage(err)}`,
                    'debug',
                );
            }
        }

        if (!(await isDirectory(instance.directoryPath))) {
            void logEvent(
                `[ReleaseLocator] Instance directory does not exist: ${instance.directoryPath}`,
                'warn',
            );
            return { known: false, reason: `directory missing: ${instance.directoryPath}` };
        }

        const fromNotes = await this.#readReleaseNotes(instance.directoryPath);
        if (fromNotes) {
            return { known: true, version: fromNotes, source: 'release-notes' };
        }

        const fromHowTo = await this.#readHowToPage(instance.directoryPath);
        if (fromHowTo) {
            return { known: true, version: fromHowTo, source: 'how-to-page' };
        }

        return { known: false, reason: 'no version evidence found' };
    }

    async latestRelease(): Promise<ReleaseInfo> {
        const manifest = await this.#manifestSource.fetchManifest();
        const release = selectRelease(manifest, this.#platformKey);
        await logEvent(
            `[ReleaseLocator] Latest release ${formatVersion(release.version)} from ${this.#manifestSource.description}.`,
        );
        await logEvent(`[ReleaseLocator] Download URL: ${release.downloadUrl}`, 'debug');
        return release;
    }

    async #readReleaseNotes(directoryPath: string): Promise<ReleaseVersion | null> {
        let contents: string;
        try {
            contents = await readFile(path.join(directoryPath, RELEASE_NOTES_FILE), 'utf8');
        } catch {
            return null;
        }

        const head = contents.split(/\r?\n/).slice(0, RELEASE_NOTES_SCAN_LINES);
        for (const line of head) {
            const match = RELEASE_NOTES_TOKEN.exec(line);
            if (match) {
                return parseVersion(match[0]);
            }
        }
        return null;
    }

    /** The bundled how-to page carries `Version: x.y.z` near its title. */
    async #readHowToPage(directoryPath: string): Promise<ReleaseVersion | null> {
        let contents: string;
        try {
            contents = await readFile(path.join(directoryPath, HOW_TO_FILE), 'utf8');
        } catch {
            return null;
        }

        const match = HOW_TO_TOKEN.exec(contents);
        return match ? parseVersion(match[1]) : null;
    }
}
