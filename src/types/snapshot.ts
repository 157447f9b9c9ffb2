export interface Snapshot {
  instanceName: string;
  createdAt: Date;
  archivePath: string;
}

export interface SnapshotRepository {
  create(instanceName: string, sourceDir: string): Promise<Snapshot>;
  verify(snapshot: Snapshot): Promise<boolean>;
  restore(snapshot: Snapshot, targetDir: string): Promise<void>;
  latest(instanceName: string): Promise<Snapshot | null>;
  list(instanceName?: string): Promise<Snapshot[]>;
  pruneOlderThan(retentionDays: number): Promise<number>;
}
