import type {
  AppliedState,
  LogicalConfig,
  NamedEntry,
  PackageManagerName,
  PackagePlan,
  Plan
} from '../../types/index.js';

function uniqueInOrder(names: Iterable<string>): string[] {
  return [...new Set(names)];
}

/**
 * Set difference over package names. Install decisions still go through a
 * live probe downstream; removal decisions come from this diff alone.
 */
export function diffPackages(desired: readonly string[], applied: readonly string[]): PackagePlan {
  const desiredNames = uniqueInOrder(desired);
  const appliedNames = uniqueInOrder(applied);
  const desiredSet = new Set(desiredNames);
  const appliedSet = new Set(appliedNames);

  return {
    toInstall: desiredNames.filter(name => !appliedSet.has(name)),
    toRemove: appliedNames.filter(name => !desiredSet.has(name)),
    unchanged: desiredNames.filter(name => appliedSet.has(name))
  };
}

function hasEntry(map: Readonly<Record<string, unknown>>, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, name);
}

function entriesOf<T>(map: Readonly<Record<string, T>>): NamedEntry<T>[] {
  return Object.entries(map).map(([name, entry]) => ({ name, entry }));
}

/**
 * Compute the change set between the desired model and what the previous run
 * recorded. Every desired file and binary is deployed; the deployer decides
 * per resource whether anything needs to change.
 */
export function diff(desired: LogicalConfig, applied: AppliedState): Plan {
  const packagePlan = (manager: PackageManagerName): PackagePlan =>
    diffPackages(
      desired.packages[manager].map(entry => entry.name),
      applied.managedPackages[manager]
    );

  return {
    packages: {
      apt: packagePlan('apt'),
      flatpak: packagePlan('flatpak'),
      snap: packagePlan('snap')
    },
    files: {
      toDeploy: entriesOf(desired.files),
      toRemove: applied.managedFiles.filter(file => !hasEntry(desired.files, file.name))
    },
    binaries: {
      toDeploy: entriesOf(desired.binaries),
      toRemove: applied.managedBinaries.filter(binary => !hasEntry(desired.binaries, binary.name))
    }
  };
}
