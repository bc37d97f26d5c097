import type { BinaryEntry, FileEntry, PackageManagerName } from './config.js';
import type { ManagedBinary, ManagedFile } from './applied-state.js';

export interface PackagePlan {
  /** Desired but not recorded as managed; the installer still probes live status */
  toInstall: string[];
  /** Recorded as managed but no longer desired */
  toRemove: string[];
  /** Desired and already managed */
  unchanged: string[];
}

export interface NamedEntry<T> {
  name: string;
  entry: T;
}

/**
 * Per-run change summary handed to the presentation layer.
 */
export interface Plan {
  packages: Record<PackageManagerName, PackagePlan>;
  files: {
    toDeploy: NamedEntry<FileEntry>[];
    toRemove: ManagedFile[];
  };
  binaries: {
    toDeploy: NamedEntry<BinaryEntry>[];
    toRemove: ManagedBinary[];
  };
}
