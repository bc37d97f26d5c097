import type {
  AppliedState,
  HostformDirectories,
  LogicalConfig,
  ManagedBinary,
  ManagedFile,
  ManagedResource,
  PackageEntry,
  PackageManagerName,
  Plan
} from '../../types/index.js';
import { PACKAGE_MANAGERS } from '../../types/index.js';
import { RECORD_VERSIONS } from '../../constants/index.js';
import { ConfigCache } from '../cache/config-cache.js';
import { CachedPackageInstaller, SystemStateCache } from '../cache/system-state-cache.js';
import { assertValid, validateConfig } from '../config/config-validation.js';
import type { SystemFacts } from '../config/include-conditions.js';
import { IncludeResolver } from '../config/include-resolver.js';
import { getEffectiveFlags } from '../config/package-entry.js';
import { ConflictResolver } from '../conflict/conflict-resolver.js';
import type { RemovalSafetyOptions } from '../conflict/removal-safety.js';
import { BinaryFetcher, type FetchFunction } from '../deploy/binary-fetcher.js';
import { LocalResourceDeployer, type ResourceDeployer } from '../deploy/resource-deployer.js';
import {
  deployBinary,
  deployFile,
  removeResource,
  type DeploymentContext,
  type DeployOutcome,
  type RemovalOutcome
} from '../deploy/resource-deployment.js';
import { getDownloadsDirectory } from '../directory.js';
import type { DconfWriter } from '../packages/dconf-writer.js';
import type { PackageInstaller, PackageInstallers } from '../packages/package-installer.js';
import type { ConflictPrompt, ResourceKind } from '../ports/conflict-prompt.js';
import { consoleOutput } from '../ports/console-output.js';
import type { OutputPort } from '../ports/output.js';
import { diff } from '../reconcile/state-reconciler.js';
import { AppliedStateStore } from '../state/applied-state-store.js';
import { getHomeDirectory } from '../../utils/home-directory.js';
import { logger } from '../../utils/logger.js';
import { resolveDeclaredPath } from '../../utils/paths.js';
import { loadConfig } from './config-loader.js';

export interface ConvergenceOptions {
  /** Absolute path of the root configuration document */
  configPath: string;
  directories: HostformDirectories;
  installers: PackageInstallers;
  dconf: DconfWriter;
  /** Present only when the session can prompt */
  prompt?: ConflictPrompt;
  output?: OutputPort;
  deployer?: ResourceDeployer;
  facts?: SystemFacts;
  fetchImpl?: FetchFunction;
  /** Report what would change without touching the system, the state or the caches */
  dryRun?: boolean;
  /** Remove packages and resources that are no longer declared (default true) */
  remove?: boolean;
  /** Use the fingerprint and system-state caches (default true) */
  useCache?: boolean;
  /** Prompt on every conflict instead of only for entries marked interactive */
  interactive?: boolean;
  cwd?: string;
  homeDir?: string;
  now?: () => Date;
  safety?: RemovalSafetyOptions;
}

export interface PackageSummary {
  manager: PackageManagerName;
  /** Installed by this run (or would be, in a dry run) */
  installed: string[];
  alreadyInstalled: string[];
  /** Removed by this run (or would be, in a dry run) */
  removed: string[];
}

export interface ResourceSummary<T extends ManagedResource> {
  deployments: DeployOutcome<T>[];
  removals: RemovalOutcome[];
}

export interface DconfChange {
  key: string;
  value: string;
  previous: string | null;
}

export interface DconfSummary {
  changed: DconfChange[];
  unchanged: string[];
}

export interface ConvergenceSummaries {
  packages: PackageSummary[];
  files: ResourceSummary<ManagedFile>;
  binaries: ResourceSummary<ManagedBinary>;
  dconf: DconfSummary;
}

export interface ConvergenceResult {
  plan: Plan;
  /** The state this run recorded, or would record in a dry run */
  appliedState: AppliedState;
  configPaths: string[];
  fromCache: boolean;
  dryRun: boolean;
  summaries: ConvergenceSummaries;
}

/**
 * Resolve, merge and validate the configuration, then compute the plan
 * against the previously applied state. Nothing on the system is changed.
 */
export async function planConvergence(options: ConvergenceOptions): Promise<{
  config: LogicalConfig;
  applied: AppliedState;
  plan: Plan;
  configPaths: string[];
  fromCache: boolean;
}> {
  const output = options.output ?? consoleOutput;
  const homeDir = options.homeDir ?? getHomeDirectory();
  const useCache = options.useCache ?? true;

  const resolver = new IncludeResolver({ homeDir, ...(options.facts && { facts: options.facts }) });
  const { config, paths, fromCache } = await loadConfig(options.configPath, {
    resolver,
    ...(useCache && { cache: new ConfigCache(options.directories) }),
    readOnly: options.dryRun ?? false
  });

  const validation = await validateConfig(config, { homeDir });
  for (const warning of validation.warnings) {
    output.warn(`${warning.field}: ${warning.message}`);
  }
  assertValid(validation);

  const applied = await new AppliedStateStore(options.directories).load();
  return { config, applied, plan: diff(config, applied), configPaths: paths, fromCache };
}

/**
 * One convergence pass: packages, then files, then binaries, then dconf.
 * Every step runs sequentially in declaration order. The applied state is
 * written once at the end, so a cancelled run leaves the previous record.
 */
export async function runConvergence(options: ConvergenceOptions): Promise<ConvergenceResult> {
  const dryRun = options.dryRun ?? false;
  const removeStale = options.remove ?? true;
  const useCache = options.useCache ?? true;
  const homeDir = options.homeDir ?? getHomeDirectory();
  const now = options.now ?? (() => new Date());

  const { config, applied, plan, configPaths, fromCache } = await planConvergence(options);

  const systemCache = useCache ? new SystemStateCache(options.directories) : undefined;
  if (systemCache) {
    await systemCache.load();
  }

  const packages: PackageSummary[] = [];
  const managedPackages: AppliedState['managedPackages'] = { apt: [], flatpak: [], snap: [] };
  for (const manager of PACKAGE_MANAGERS) {
    const installer = systemCache
      ? new CachedPackageInstaller(options.installers[manager], systemCache)
      : options.installers[manager];
    const toRemove = plan.packages[manager].toRemove;

    packages.push(await convergePackages(installer, config, toRemove, { dryRun, removeStale }));

    const desired = uniqueNames(config.packages[manager]);
    managedPackages[manager] = removeStale ? desired : [...desired, ...toRemove];
  }

  const deployer = options.deployer ?? new LocalResourceDeployer();
  const context: DeploymentContext = {
    deployer,
    resolver: new ConflictResolver({ deployer, now, ...(options.prompt && { prompt: options.prompt }) }),
    fetcher: new BinaryFetcher({
      downloadsDir: getDownloadsDirectory(options.directories),
      ...(options.fetchImpl && { fetchImpl: options.fetchImpl })
    }),
    ...(options.prompt && { prompt: options.prompt }),
    interactiveRun: options.interactive ?? false,
    dryRun,
    homeDir,
    cwd: options.cwd ?? process.cwd(),
    ...(options.safety && { safety: options.safety })
  };

  const files: ResourceSummary<ManagedFile> = { deployments: [], removals: [] };
  const managedFiles: ManagedFile[] = [];
  for (const { name, entry } of plan.files.toDeploy) {
    const previous = findPrevious(applied.managedFiles, plan.files.toRemove, name, entry.destination, context);
    const outcome = await deployFile(name, entry, context, previous);
    files.deployments.push(outcome);
    if (outcome.managed) {
      managedFiles.push(outcome.managed);
    }
  }
  files.removals = await removeStaleResources(
    unclaimed(plan.files.toRemove, files.deployments),
    'file',
    context,
    removeStale,
    managedFiles
  );

  const binaries: ResourceSummary<ManagedBinary> = { deployments: [], removals: [] };
  const managedBinaries: ManagedBinary[] = [];
  for (const { name, entry } of plan.binaries.toDeploy) {
    const previous = findPrevious(applied.managedBinaries, plan.binaries.toRemove, name, entry.destination, context);
    const outcome = await deployBinary(name, entry, context, previous);
    binaries.deployments.push(outcome);
    if (outcome.managed) {
      managedBinaries.push(outcome.managed);
    }
  }
  binaries.removals = await removeStaleResources(
    unclaimed(plan.binaries.toRemove, binaries.deployments),
    'binary',
    context,
    removeStale,
    managedBinaries
  );

  const dconf = await convergeDconf(options.dconf, config.dconf.settings, dryRun);

  const appliedState: AppliedState = {
    version: RECORD_VERSIONS.APPLIED_STATE,
    lastUpdated: now().toISOString(),
    managedPackages,
    managedFiles,
    managedBinaries
  };

  if (!dryRun) {
    await new AppliedStateStore(options.directories).save(appliedState);
    if (systemCache) {
      await systemCache.flush();
    }
  }

  return {
    plan,
    appliedState,
    configPaths,
    fromCache,
    dryRun,
    summaries: { packages, files, binaries, dconf }
  };
}

function uniqueNames(entries: readonly PackageEntry[]): string[] {
  return [...new Set(entries.map(entry => entry.name))];
}

/**
 * The previous record for an entry: the one under the same name, or a stale
 * record at the same destination when the entry was renamed.
 */
function findPrevious<T extends ManagedResource>(
  records: readonly T[],
  stale: readonly T[],
  name: string,
  destination: string,
  context: DeploymentContext
): T | undefined {
  const byName = records.find(record => record.name === name);
  if (byName) {
    return byName;
  }
  const destinationPath = resolveDeclaredPath(destination, context.cwd, context.homeDir);
  const renamed = stale.find(record => record.destinationPath === destinationPath);
  return renamed && { ...renamed, name };
}

/**
 * Stale records whose destination this run deployed to again belong to the
 * new entry now; removing them would delete what was just placed.
 */
function unclaimed<T extends ManagedResource>(
  stale: readonly T[],
  deployments: readonly DeployOutcome<ManagedResource>[]
): T[] {
  const claimed = new Set(deployments.map(outcome => outcome.destination));
  return stale.filter(record => !claimed.has(record.destinationPath));
}

async function convergePackages(
  installer: PackageInstaller,
  config: LogicalConfig,
  toRemove: string[],
  options: { dryRun: boolean; removeStale: boolean }
): Promise<PackageSummary> {
  const { manager } = installer;
  const summary: PackageSummary = { manager, installed: [], alreadyInstalled: [], removed: [] };

  // Entries needing the same flags are installed in one call
  const groups = new Map<string, { flags: string[]; names: string[] }>();
  const seen = new Set<string>();
  for (const entry of config.packages[manager]) {
    if (seen.has(entry.name)) {
      continue;
    }
    seen.add(entry.name);

    if (await installer.isInstalled(entry.name)) {
      summary.alreadyInstalled.push(entry.name);
      continue;
    }
    const flags = getEffectiveFlags(entry, manager, config.packageDefaults);
    const key = flags.join('\u0000');
    const group = groups.get(key) ?? { flags, names: [] };
    group.names.push(entry.name);
    groups.set(key, group);
  }

  for (const { flags, names } of groups.values()) {
    if (!options.dryRun) {
      await installer.install(names, flags);
    }
    summary.installed.push(...names);
  }

  if (options.removeStale && toRemove.length > 0) {
    if (!options.dryRun) {
      await installer.remove(toRemove);
    }
    summary.removed.push(...toRemove);
  }

  return summary;
}

/**
 * With removal disabled the stale records are carried into the new state.
 * Otherwise they are dropped, including the ones whose removal was refused.
 */
async function removeStaleResources<T extends ManagedResource>(
  stale: readonly T[],
  kind: ResourceKind,
  context: DeploymentContext,
  removeStale: boolean,
  managed: T[]
): Promise<RemovalOutcome[]> {
  if (!removeStale) {
    managed.push(...stale);
    return [];
  }

  const outcomes: RemovalOutcome[] = [];
  for (const resource of stale) {
    outcomes.push(await removeResource(resource, kind, context));
  }
  return outcomes;
}

async function convergeDconf(
  writer: DconfWriter,
  settings: Readonly<Record<string, string>>,
  dryRun: boolean
): Promise<DconfSummary> {
  const summary: DconfSummary = { changed: [], unchanged: [] };
  for (const [key, value] of Object.entries(settings)) {
    const previous = await writer.read(key);
    if (previous === value) {
      summary.unchanged.push(key);
      continue;
    }
    if (!dryRun) {
      await writer.write(key, value);
      logger.info(`dconf: set ${key} = ${value}`);
    }
    summary.changed.push({ key, value, previous });
  }
  return summary;
}
