import path from 'node:path';
import { ArtifactFetcher } from '../services/artifact-fetcher.js';
import { ControlPlaneClient, OfflineControlPlaneClient } from '../services/control-plane-client.js';
import { FileProjector } from '../services/file-projector.js';
import { createNotifier } from '../services/notifier.js';
import { FileManifestSource, HttpManifestSource, ReleaseLocator } from '../services/release-locator.js';
import { SnapshotStore } from '../services/snapshot-store.js';
import { UpdateOrchestrator } from '../services/update-orchestrator.js';
import type { UpdaterConfig } from '../types/config.js';
import type { ControlPlane } from '../types/control-plane.js';
import type { NotificationChannel } from '../types/notification.js';
import type { ManifestSource } from '../types/release.js';
import { configureLogger } from '../utils/logger.js';

export const HISTORY_FILE_NAME = 'update-history.jsonl';

/** Every collaborator of a run, wired from one configuration. */
export interface UpdaterRuntime {
    config: UpdaterConfig;
    controlPlane: ControlPlane;
    releases: ReleaseLocator;
    artifacts: ArtifactFetcher;
    snapshots: SnapshotStore;
    projector: FileProjector;
    notifier: NotificationChannel;
    orchestrator: UpdateOrchestrator;
}

export function createRuntime(config: UpdaterConfig, options: { verbose?: boolean } = {}): UpdaterRuntime {
    configureLogger({ logDir: config.paths.logDir, level: options.verbose ? 'debug' : config.logLevel });

    const controlPlane: ControlPlane = config.devMode
        ? new OfflineControlPlaneClient()
        : new ControlPlaneClient({
              baseUrl: config.controlPlane.baseUrl,
              apiToken: config.controlPlane.apiToken,
              pollIntervalMs: config.timeouts.pollIntervalMs,
          });

    const manifestSource: ManifestSource =
        config.devMode && config.releaseFeed.manifestFile
            ? new FileManifestSource(config.releaseFeed.manifestFile)
            : new HttpManifestSource(config.releaseFeed.manifestUrl);

    const releases = new ReleaseLocator({
        manifestSource,
        platformKey: config.releaseFeed.platformKey,
        controlPlane,
    });
    const artifacts = new ArtifactFetcher({ minArtifactBytes: config.minArtifactBytes });
    const snapshots = new SnapshotStore({ backupDir: config.paths.backupDir });
    const projector = new FileProjector();
    const notifier = createNotifier(config.email, config.notifyOnNoUpdate);

    const orchestrator = new UpdateOrchestrator({
        settings: config,
        controlPlane,
        releases,
        artifacts,
        snapshots,
        projector,
        notifier,
        historyFile: path.join(config.paths.logDir, HISTORY_FILE_NAME),
    });

    return { config, controlPlane, releases, artifacts, snapshots, projector, notifier, orchestrator };
}
