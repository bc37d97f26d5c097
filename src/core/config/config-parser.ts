import type {
  BinaryEntry,
  ConfigDocument,
  ConfigFragment,
  DocumentMap,
  DocumentValue,
  FileEntry,
  PackageEntry,
  PackageLists
} from '../../types/index.js';
import { PACKAGE_MANAGERS, type PackageManagerName } from '../../types/index.js';
import { ConfigError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { isDocumentMap, isStringArray, readString } from './document-values.js';
import { parsePackageEntry } from './package-entry.js';

const KNOWN_TOP_LEVEL_KEYS = new Set([
  'version',
  'includes',
  'package_defaults',
  'packages',
  'files',
  'binaries',
  'dconf'
]);

function isPackageManagerName(value: string): value is PackageManagerName {
  return PACKAGE_MANAGERS.some(manager => manager === value);
}

function readFlag(entry: DocumentMap, key: string, context: string): boolean {
  const value = entry[key];
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${context}: '${key}' must be true or false`, { context, key });
  }
  return value;
}

function readOptionalString(entry: DocumentMap, key: string, context: string): string | undefined {
  const value = entry[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  const text = readString(entry, key);
  if (text === undefined) {
    throw new ConfigError(`${context}: '${key}' must be a string`, { context, key });
  }
  return text;
}

function requireMap(value: DocumentValue, context: string): DocumentMap {
  if (!isDocumentMap(value)) {
    throw new ConfigError(`${context} must be a mapping`, { context });
  }
  return value;
}

function parsePackageDefaults(raw: DocumentValue, context: string): Record<string, string[]> {
  const section = requireMap(raw, `${context}: package_defaults`);
  const defaults: Record<string, string[]> = {};
  for (const [manager, flags] of Object.entries(section)) {
    if (!isStringArray(flags)) {
      throw new ConfigError(`${context}: package_defaults.${manager} must be a list of strings`, { context, manager });
    }
    defaults[manager] = [...flags];
  }
  return defaults;
}

function parsePackages(raw: DocumentValue, context: string): Partial<PackageLists> {
  const section = requireMap(raw, `${context}: packages`);
  const packages: Partial<PackageLists> = {};
  for (const [manager, entries] of Object.entries(section)) {
    if (!isPackageManagerName(manager)) {
      throw new ConfigError(
        `${context}: unsupported package manager '${manager}' (supported: ${PACKAGE_MANAGERS.join(', ')})`,
        { context, manager }
      );
    }
    if (entries === null) {
      packages[manager] = [];
      continue;
    }
    if (!Array.isArray(entries)) {
      throw new ConfigError(`${context}: packages.${manager} must be a list`, { context, manager });
    }
    const parsed: PackageEntry[] = entries.map((entry, index) =>
      parsePackageEntry(entry, `${context}: packages.${manager}[${index}]`)
    );
    packages[manager] = parsed;
  }
  return packages;
}

function parseFileEntry(name: string, raw: DocumentValue, document: ConfigDocument): FileEntry {
  const context = `${document.path}: files.${name}`;
  const entry = requireMap(raw, context);
  const owner = readOptionalString(entry, 'owner', context);
  const group = readOptionalString(entry, 'group', context);
  const mode = readOptionalString(entry, 'mode', context);
  return {
    source: readOptionalString(entry, 'source', context) ?? '',
    destination: readOptionalString(entry, 'destination', context) ?? '',
    sourceDir: document.dir,
    copy: readFlag(entry, 'copy', context),
    backup: readFlag(entry, 'backup', context),
    interactive: readFlag(entry, 'interactive', context),
    ...(owner !== undefined && { owner }),
    ...(group !== undefined && { group }),
    ...(mode !== undefined && { mode })
  };
}

function parseBinaryEntry(name: string, raw: DocumentValue, document: ConfigDocument): BinaryEntry {
  const context = `${document.path}: binaries.${name}`;
  const entry = requireMap(raw, context);
  const owner = readOptionalString(entry, 'owner', context);
  const group = readOptionalString(entry, 'group', context);
  const mode = readOptionalString(entry, 'mode', context);
  return {
    source: readOptionalString(entry, 'source', context) ?? '',
    destination: readOptionalString(entry, 'destination', context) ?? '',
    sourceDir: document.dir,
    backup: readFlag(entry, 'backup', context),
    interactive: readFlag(entry, 'interactive', context),
    ...(owner !== undefined && { owner }),
    ...(group !== undefined && { group }),
    ...(mode !== undefined && { mode })
  };
}

function parseDconfSettings(raw: DocumentValue, context: string): Record<string, string> {
  const section = requireMap(raw, `${context}: dconf`);
  const rawSettings = section.settings;
  if (rawSettings === undefined || rawSettings === null) {
    return {};
  }
  const settings: Record<string, string> = {};
  for (const [key, value] of Object.entries(requireMap(rawSettings, `${context}: dconf.settings`))) {
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
      throw new ConfigError(`${context}: dconf setting '${key}' must be a scalar value`, { context, key });
    }
    settings[key] = String(value);
  }
  return settings;
}

/**
 * Extract the fields a document declares. Absent sections stay absent so the
 * merger can tell "not declared" from "declared empty".
 */
export function parseConfigDocument(document: ConfigDocument): ConfigFragment {
  const { data, path } = document;
  const fragment: ConfigFragment = {};

  for (const key of Object.keys(data)) {
    if (!KNOWN_TOP_LEVEL_KEYS.has(key)) {
      logger.debug(`Ignoring unrecognised section '${key}' in ${path}`);
    }
  }

  if (data.version !== undefined && data.version !== null) {
    const version = readString(data, 'version');
    if (version === undefined) {
      throw new ConfigError(`${path}: version must be a string`, { path });
    }
    fragment.version = version;
  }

  if (data.package_defaults !== undefined && data.package_defaults !== null) {
    fragment.packageDefaults = parsePackageDefaults(data.package_defaults, path);
  }

  if (data.packages !== undefined && data.packages !== null) {
    fragment.packages = parsePackages(data.packages, path);
  }

  if (data.files !== undefined && data.files !== null) {
    const files: Record<string, FileEntry> = {};
    for (const [name, entry] of Object.entries(requireMap(data.files, `${path}: files`))) {
      files[name] = parseFileEntry(name, entry, document);
    }
    fragment.files = files;
  }

  if (data.binaries !== undefined && data.binaries !== null) {
    const binaries: Record<string, BinaryEntry> = {};
    for (const [name, entry] of Object.entries(requireMap(data.binaries, `${path}: binaries`))) {
      binaries[name] = parseBinaryEntry(name, entry, document);
    }
    fragment.binaries = binaries;
  }

  if (data.dconf !== undefined && data.dconf !== null) {
    fragment.dconfSettings = parseDconfSettings(data.dconf, path);
  }

  return fragment;
}
