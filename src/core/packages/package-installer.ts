import type { PackageManagerName } from '../../types/index.js';

/**
 * Capability for one package manager. Implementations probe and change the
 * live system; failures surface as PackageManagerError.
 */
export interface PackageInstaller {
  readonly manager: PackageManagerName;
  isInstalled(name: string): Promise<boolean>;
  install(names: string[], flags: string[]): Promise<void>;
  remove(names: string[]): Promise<void>;
}

export type PackageInstallers = Record<PackageManagerName, PackageInstaller>;
