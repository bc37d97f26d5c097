import { join } from 'path';
import { promises as fs } from 'fs';
import type { BinaryEntry, ConfigDocument, FileEntry, HostformDirectories, LogicalConfig, PackageEntry, PackageLists } from '../../types/index.js';
import { PACKAGE_MANAGERS } from '../../types/index.js';
import { RECORD_VERSIONS } from '../../constants/index.js';
import { freezeConfig } from '../config/config-merger.js';
import { getConfigCacheDirectory } from '../directory.js';
import { CacheError, getErrorMessage } from '../../utils/errors.js';
import { exists, getModTimeNs, readTextFile, remove, walkEntries, writeJsonFileAtomic, getStats } from '../../utils/fs.js';
import { hashString } from '../../utils/hash-utils.js';
import { isOptionalString, isRecord, isStringArray, isStringRecord, parseJson, type JsonRecord } from '../../utils/json-guards.js';
import { logger } from '../../utils/logger.js';

/**
 * Persisted resolution result, keyed by the ordered list of source documents.
 */
export interface ConfigCacheRecord {
  version: string;
  configHash: string;
  sourcePaths: string[];
  /** Nanosecond modification times as decimal strings */
  sourceModTimes: Record<string, string>;
  cachedAt: string;
  resolvedModel: LogicalConfig;
}

export interface CacheStats {
  cacheDir: string;
  totalFiles: number;
  totalSize: number;
  lastModified: Date | null;
}

function readPackageEntries(value: unknown): PackageEntry[] | null {
  if (!Array.isArray(value)) {
    return null;
  }
  const entries: PackageEntry[] = [];
  for (const item of value) {
    if (!isRecord(item) || typeof item.name !== 'string' || !isStringArray(item.flags)) {
      return null;
    }
    entries.push({ name: item.name, flags: item.flags });
  }
  return entries;
}

function readOptionalFields(item: JsonRecord): Pick<FileEntry, 'owner' | 'group' | 'mode'> | null {
  if (!isOptionalString(item.owner) || !isOptionalString(item.group) || !isOptionalString(item.mode)) {
    return null;
  }
  return {
    ...(item.owner !== undefined && { owner: item.owner }),
    ...(item.group !== undefined && { group: item.group }),
    ...(item.mode !== undefined && { mode: item.mode })
  };
}

function readFileEntries(value: unknown): Record<string, FileEntry> | null {
  if (!isRecord(value)) {
    return null;
  }
  const files: Record<string, FileEntry> = {};
  for (const [name, item] of Object.entries(value)) {
    if (
      !isRecord(item) ||
      typeof item.source !== 'string' ||
      typeof item.destination !== 'string' ||
      typeof item.sourceDir !== 'string' ||
      typeof item.copy !== 'boolean' ||
      typeof item.backup !== 'boolean' ||
      typeof item.interactive !== 'boolean'
    ) {
      return null;
    }
    const optional = readOptionalFields(item);
    if (optional === null) {
      return null;
    }
    files[name] = {
      source: item.source,
      destination: item.destination,
      sourceDir: item.sourceDir,
      copy: item.copy,
      backup: item.backup,
      interactive: item.interactive,
      ...optional
    };
  }
  return files;
}

function readBinaryEntries(value: unknown): Record<string, BinaryEntry> | null {
  if (!isRecord(value)) {
    return null;
  }
  const binaries: Record<string, BinaryEntry> = {};
  for (const [name, item] of Object.entries(value)) {
    if (
      !isRecord(item) ||
      typeof item.source !== 'string' ||
      typeof item.destination !== 'string' ||
      typeof item.sourceDir !== 'string' ||
      typeof item.backup !== 'boolean' ||
      typeof item.interactive !== 'boolean'
    ) {
      return null;
    }
    const optional = readOptionalFields(item);
    if (optional === null) {
      return null;
    }
    binaries[name] = {
      source: item.source,
      destination: item.destination,
      sourceDir: item.sourceDir,
      backup: item.backup,
      interactive: item.interactive,
      ...optional
    };
  }
  return binaries;
}

/**
 * Rebuild a LogicalConfig from untrusted JSON; any shape mismatch yields null.
 */
export function readLogicalConfig(value: unknown): LogicalConfig | null {
  if (!isRecord(value) || typeof value.version !== 'string') {
    return null;
  }

  if (!isRecord(value.packageDefaults)) {
    return null;
  }
  const packageDefaults: Record<string, string[]> = {};
  for (const [manager, flags] of Object.entries(value.packageDefaults)) {
    if (!isStringArray(flags)) {
      return null;
    }
    packageDefaults[manager] = flags;
  }

  if (!isRecord(value.packages)) {
    return null;
  }
  const packages: PackageLists = { apt: [], flatpak: [], snap: [] };
  for (const manager of PACKAGE_MANAGERS) {
    const entries = readPackageEntries(value.packages[manager]);
    if (entries === null) {
      return null;
    }
    packages[manager] = entries;
  }

  const files = readFileEntries(value.files);
  const binaries = readBinaryEntries(value.binaries);
  if (files === null || binaries === null) {
    return null;
  }

  if (!isRecord(value.dconf) || !isStringRecord(value.dconf.settings)) {
    return null;
  }

  return {
    version: value.version,
    packageDefaults,
    packages,
    files,
    binaries,
    dconf: { settings: { ...value.dconf.settings } }
  };
}

function readCacheRecord(value: unknown): ConfigCacheRecord | null {
  if (
    !isRecord(value) ||
    value.version !== RECORD_VERSIONS.CONFIG_CACHE ||
    typeof value.configHash !== 'string' ||
    !isStringArray(value.sourcePaths) ||
    !isStringRecord(value.sourceModTimes) ||
    typeof value.cachedAt !== 'string'
  ) {
    return null;
  }
  const resolvedModel = readLogicalConfig(value.resolvedModel);
  if (resolvedModel === null) {
    return null;
  }
  return {
    version: value.version,
    configHash: value.configHash,
    sourcePaths: value.sourcePaths,
    sourceModTimes: value.sourceModTimes,
    cachedAt: value.cachedAt,
    resolvedModel
  };
}

function samePathList(stored: readonly string[], current: readonly string[]): boolean {
  return stored.length === current.length && stored.every((path, index) => path === current[index]);
}

/**
 * Caches merged models across runs. A record is only served when the ordered
 * list of source documents is unchanged and none of them has a different
 * modification time. Every failure reading a record is a miss; every failure
 * writing one is logged and ignored.
 */
export class ConfigCache {
  private readonly cacheDir: string;

  constructor(directories: HostformDirectories) {
    this.cacheDir = getConfigCacheDirectory(directories);
  }

  async getRecordPath(paths: readonly string[]): Promise<string> {
    const digest = await hashString(paths.join('\n'));
    return join(this.cacheDir, `${digest.slice(0, 16)}.json`);
  }

  async load(paths: readonly string[]): Promise<LogicalConfig | null> {
    try {
      const record = await this.readRecord(paths);
      if (record === null) {
        return null;
      }
      if (!(await this.isFresh(record, paths))) {
        return null;
      }
      logger.debug(`Using cached configuration (${paths.length} document(s))`, { cachedAt: record.cachedAt });
      return freezeConfig(record.resolvedModel);
    } catch (error) {
      logger.debug('Configuration cache unavailable, resolving from source', {
        error: new CacheError(getErrorMessage(error), { error })
      });
      return null;
    }
  }

  /**
   * Remember the model merged from `documents`, stamped with the modification
   * times taken when each document was read. Nothing is written when a
   * document changed on disk since it was read, or was never read from disk.
   */
  async store(model: LogicalConfig, documents: readonly Pick<ConfigDocument, 'path' | 'modTimeNs'>[]): Promise<void> {
    try {
      const paths = documents.map(document => document.path);
      const sourceModTimes: Record<string, string> = {};
      for (const { path, modTimeNs } of documents) {
        if (modTimeNs === undefined) {
          logger.debug(`Not caching configuration: ${path} was not read from disk`);
          return;
        }
        if ((await getModTimeNs(path)).toString() !== modTimeNs) {
          logger.debug(`Not caching configuration: ${path} changed while it was being resolved`);
          return;
        }
        sourceModTimes[path] = modTimeNs;
      }

      const record: ConfigCacheRecord = {
        version: RECORD_VERSIONS.CONFIG_CACHE,
        configHash: await hashString(JSON.stringify({ model, sourceModTimes })),
        sourcePaths: [...paths],
        sourceModTimes,
        cachedAt: new Date().toISOString(),
        resolvedModel: model
      };

      await writeJsonFileAtomic(await this.getRecordPath(paths), record);
      logger.debug('Stored configuration cache record', { configHash: record.configHash });
    } catch (error) {
      logger.warn(`Failed to write configuration cache: ${getErrorMessage(error)}`);
    }
  }

  private async readRecord(paths: readonly string[]): Promise<ConfigCacheRecord | null> {
    const recordPath = await this.getRecordPath(paths);
    if (!(await exists(recordPath))) {
      logger.debug(`No configuration cache record at ${recordPath}`);
      return null;
    }

    const record = readCacheRecord(parseJson(await readTextFile(recordPath)));
    if (record === null) {
      logger.debug(`Ignoring unreadable configuration cache record: ${recordPath}`);
    }
    return record;
  }

  private async isFresh(record: ConfigCacheRecord, paths: readonly string[]): Promise<boolean> {
    if (!samePathList(record.sourcePaths, paths)) {
      logger.debug('Configuration cache miss: document list changed');
      return false;
    }

    for (const path of paths) {
      const current = (await getModTimeNs(path)).toString();
      if (record.sourceModTimes[path] !== current) {
        logger.debug(`Configuration cache miss: ${path} was modified`);
        return false;
      }
    }

    return true;
  }
}

/**
 * Summarise everything under the cache root
 */
export async function getCacheStats(directories: HostformDirectories): Promise<CacheStats> {
  const stats: CacheStats = { cacheDir: directories.cache, totalFiles: 0, totalSize: 0, lastModified: null };
  if (!(await exists(directories.cache))) {
    return stats;
  }

  for await (const entry of walkEntries(directories.cache)) {
    if (entry.isDirectory) {
      continue;
    }
    const fileStats = await getStats(entry.path);
    stats.totalFiles += 1;
    stats.totalSize += fileStats.size;
    if (stats.lastModified === null || fileStats.mtime > stats.lastModified) {
      stats.lastModified = fileStats.mtime;
    }
  }

  return stats;
}

/**
 * Delete every cache record; the next run resolves and probes from scratch
 */
export async function clearCache(directories: HostformDirectories): Promise<void> {
  logger.info(`Clearing cache data in ${directories.cache}`);
  if (!(await exists(directories.cache))) {
    return;
  }
  for (const name of await fs.readdir(directories.cache)) {
    await remove(join(directories.cache, name));
  }
}
