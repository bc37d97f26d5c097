import { join } from 'path';
import type { HostformDirectories, PackageManagerName } from '../../types/index.js';
import { PACKAGE_MANAGERS } from '../../types/index.js';
import { FILE_PATTERNS, RECORD_VERSIONS, SYSTEM_STATE_TTL_MS } from '../../constants/index.js';
import type { PackageInstaller } from '../packages/package-installer.js';
import { getErrorMessage } from '../../utils/errors.js';
import { exists, readTextFile, writeJsonFileAtomic } from '../../utils/fs.js';
import { isRecord, parseJson } from '../../utils/json-guards.js';
import { logger } from '../../utils/logger.js';

export interface PackageProbeEntry {
  installed: boolean;
  lastChecked: string;
}

export interface SystemStateRecord {
  version: string;
  lastChecked: string;
  packages: Record<PackageManagerName, Record<string, PackageProbeEntry>>;
}

export interface SystemStateCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

function emptyPackages(): SystemStateRecord['packages'] {
  return { apt: {}, flatpak: {}, snap: {} };
}

function readProbeEntries(value: unknown): Record<string, PackageProbeEntry> {
  const entries: Record<string, PackageProbeEntry> = {};
  if (!isRecord(value)) {
    return entries;
  }
  for (const [name, entry] of Object.entries(value)) {
    if (isRecord(entry) && typeof entry.installed === 'boolean' && typeof entry.lastChecked === 'string') {
      entries[name] = { installed: entry.installed, lastChecked: entry.lastChecked };
    }
  }
  return entries;
}

/**
 * Remembers package probe results for a fixed window. Package status is
 * external state with no change signal, so entries simply expire.
 */
export class SystemStateCache {
  private readonly recordPath: string;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private packages = emptyPackages();
  private dirty = false;

  constructor(directories: HostformDirectories, options: SystemStateCacheOptions = {}) {
    this.recordPath = join(directories.cache, FILE_PATTERNS.SYSTEM_STATE_CACHE);
    this.ttlMs = options.ttlMs ?? SYSTEM_STATE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Read the record from disk. Anything unreadable leaves the cache empty.
   */
  async load(): Promise<void> {
    this.packages = emptyPackages();
    this.dirty = false;

    try {
      if (!(await exists(this.recordPath))) {
        logger.debug('No system state cache found');
        return;
      }
      const record = parseJson(await readTextFile(this.recordPath));
      if (!isRecord(record) || record.version !== RECORD_VERSIONS.SYSTEM_STATE_CACHE || !isRecord(record.packages)) {
        logger.debug(`Ignoring unreadable system state cache: ${this.recordPath}`);
        return;
      }
      for (const manager of PACKAGE_MANAGERS) {
        this.packages[manager] = readProbeEntries(record.packages[manager]);
      }
    } catch (error) {
      logger.debug(`System state cache unavailable: ${getErrorMessage(error)}`);
    }
  }

  /**
   * The cached probe result, or undefined when absent or older than the TTL
   */
  get(manager: PackageManagerName, name: string): boolean | undefined {
    const entry = this.packages[manager][name];
    if (!entry) {
      return undefined;
    }
    const checkedAt = Date.parse(entry.lastChecked);
    if (Number.isNaN(checkedAt) || this.now() - checkedAt > this.ttlMs) {
      return undefined;
    }
    return entry.installed;
  }

  set(manager: PackageManagerName, name: string, installed: boolean): void {
    this.packages[manager][name] = { installed, lastChecked: new Date(this.now()).toISOString() };
    this.dirty = true;
  }

  /**
   * Persist pending changes. A failed write is logged, not thrown.
   */
  async flush(): Promise<void> {
    if (!this.dirty) {
      return;
    }
    const record: SystemStateRecord = {
      version: RECORD_VERSIONS.SYSTEM_STATE_CACHE,
      lastChecked: new Date(this.now()).toISOString(),
      packages: this.packages
    };
    try {
      await writeJsonFileAtomic(this.recordPath, record);
      this.dirty = false;
    } catch (error) {
      logger.warn(`Failed to write system state cache: ${getErrorMessage(error)}`);
    }
  }
}

/**
 * PackageInstaller decorator that answers isInstalled from fresh cached
 * "installed" results and records every probe, install and removal.
 */
export class CachedPackageInstaller implements PackageInstaller {
  readonly manager: PackageManagerName;

  constructor(
    private readonly inner: PackageInstaller,
    private readonly cache: SystemStateCache
  ) {
    this.manager = inner.manager;
  }

  async isInstalled(name: string): Promise<boolean> {
    if (this.cache.get(this.manager, name) === true) {
      logger.debug(`${this.manager}: ${name} installed (cached)`);
      return true;
    }
    const installed = await this.inner.isInstalled(name);
    this.cache.set(this.manager, name, installed);
    return installed;
  }

  async install(names: string[], flags: string[]): Promise<void> {
    await this.inner.install(names, flags);
    for (const name of names) {
      this.cache.set(this.manager, name, true);
    }
  }

  async remove(names: string[]): Promise<void> {
    await this.inner.remove(names);
    for (const name of names) {
      this.cache.set(this.manager, name, false);
    }
  }
}
