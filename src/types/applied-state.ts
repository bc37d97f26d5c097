import type { PackageManagerName } from './config.js';

export type DeploymentKind = 'link' | 'copy';

export interface ManagedResource {
  /** Entry name from the configuration */
  name: string;
  destinationPath: string;
  deploymentKind: DeploymentKind;
  backupPath?: string;
}

export type ManagedFile = ManagedResource;

export interface ManagedBinary extends ManagedResource {
  /** Where the binary was fetched from */
  source?: string;
}

/**
 * Durable record of what hostform last installed or deployed.
 */
export interface AppliedState {
  version: string;
  lastUpdated: string;
  managedPackages: Record<PackageManagerName, string[]>;
  managedFiles: ManagedFile[];
  managedBinaries: ManagedBinary[];
}
