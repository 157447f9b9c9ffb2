/** One managed server installation, as declared in the instance registry. */
export interface Instance {
  /** Operator-facing name, unique within the registry. */
  name: string;
  /** Opaque identifier the control panel uses for this server. */
  remoteId: string;
  directoryPath: string;
}

/** Relative POSIX paths that decide what a release may overwrite. */
export interface FileProtectionPolicy {
  preserveFiles: readonly string[];
  preserveDirectories: readonly string[];
  /** Exhaustive allow-list: nothing outside it is ever written. */
  updateFiles: readonly string[];
}
