import type { Instance } from './instance.js';

export type InstanceTargetState = 'running' | 'stopped';

/** The subset of the panel's server stats the updater relies on. */
export interface InstanceStats {
  running: boolean;
  version: string | null;
}

export interface ControlPlane {
  stop(instance: Instance, timeoutMs: number): Promise<void>;
  start(instance: Instance, timeoutMs: number): Promise<void>;
  /** `null` when the status could not be determined. */
  isRunning(instance: Instance): Promise<boolean | null>;
  status(instance: Instance): Promise<InstanceStats>;
  testConnectivity(): Promise<boolean>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type Sleeper = (ms: number) => Promise<void>;
