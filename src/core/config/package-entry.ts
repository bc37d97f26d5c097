import type { DocumentValue, PackageEntry } from '../../types/index.js';
import { DEFAULT_PACKAGE_FLAGS } from '../../constants/index.js';
import { ConfigError } from '../../utils/errors.js';
import { isDocumentMap, isStringArray } from './document-values.js';

/**
 * Parse a package list entry. Two shapes are accepted:
 *
 *   - git
 *   - code:
 *       flags: [--classic]
 */
export function parsePackageEntry(raw: DocumentValue, context: string): PackageEntry {
  if (typeof raw === 'string') {
    return { name: raw, flags: [] };
  }

  if (!isDocumentMap(raw)) {
    throw new ConfigError(`${context}: package entry must be a name or a single-key mapping`, { context });
  }

  const keys = Object.keys(raw);
  if (keys.length !== 1) {
    throw new ConfigError(`${context}: package entry must have exactly one key, found ${keys.length}`, { context });
  }

  const name = keys[0];
  const settings = raw[name];
  if (settings === null) {
    return { name, flags: [] };
  }
  if (!isDocumentMap(settings)) {
    throw new ConfigError(`${context}: settings for package '${name}' must be a mapping`, { context, name });
  }

  const flags = settings.flags ?? [];
  if (!isStringArray(flags)) {
    throw new ConfigError(`${context}: flags for package '${name}' must be a list of strings`, { context, name });
  }

  return { name, flags: [...flags] };
}

/**
 * Flags for an install: the entry's own flags, else the configured defaults
 * for the manager (even an empty list), else the built-in defaults.
 */
export function getEffectiveFlags(
  entry: PackageEntry,
  manager: string,
  packageDefaults: Readonly<Record<string, readonly string[]>> = {}
): string[] {
  if (entry.flags.length > 0) {
    return [...entry.flags];
  }
  if (Object.prototype.hasOwnProperty.call(packageDefaults, manager)) {
    return [...packageDefaults[manager]];
  }
  return [...(DEFAULT_PACKAGE_FLAGS[manager] ?? [])];
}

export function formatPackageEntry(entry: PackageEntry): string {
  return entry.flags.length === 0 ? entry.name : `${entry.name} (flags: ${entry.flags.join(' ')})`;
}
