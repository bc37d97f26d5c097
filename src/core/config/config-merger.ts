import type { ConfigDocument, ConfigFragment, LogicalConfig } from '../../types/index.js';
import { PACKAGE_MANAGERS } from '../../types/index.js';
import { parseConfigDocument } from './config-parser.js';

export const DEFAULT_CONFIG_VERSION = '1.0';

export function createEmptyConfig(): LogicalConfig {
  return {
    version: DEFAULT_CONFIG_VERSION,
    packageDefaults: {},
    packages: { apt: [], flatpak: [], snap: [] },
    files: {},
    binaries: {},
    dconf: { settings: {} }
  };
}

/**
 * Fold one fragment into the accumulated model. Scalars and keyed entries
 * are overwritten; package lists are appended.
 */
function applyFragment(target: LogicalConfig, fragment: ConfigFragment): void {
  if (fragment.version !== undefined) {
    target.version = fragment.version;
  }

  if (fragment.packageDefaults) {
    Object.assign(target.packageDefaults, fragment.packageDefaults);
  }

  if (fragment.packages) {
    for (const manager of PACKAGE_MANAGERS) {
      const entries = fragment.packages[manager];
      if (entries) {
        target.packages[manager].push(...entries);
      }
    }
  }

  if (fragment.files) {
    Object.assign(target.files, fragment.files);
  }

  if (fragment.binaries) {
    Object.assign(target.binaries, fragment.binaries);
  }

  if (fragment.dconfSettings) {
    Object.assign(target.dconf.settings, fragment.dconfSettings);
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Merge resolved documents into one model. The root document (first in
 * resolution order) is applied last, so it overrides everything it includes;
 * the includes apply in resolution order before it.
 */
export function mergeDocuments(documents: readonly ConfigDocument[]): LogicalConfig {
  const merged = createEmptyConfig();
  if (documents.length === 0) {
    return deepFreeze(merged);
  }

  const [root, ...includes] = documents;
  for (const document of [...includes, root]) {
    applyFragment(merged, parseConfigDocument(document));
  }

  return deepFreeze(merged);
}

/**
 * Freeze a model that did not come out of mergeDocuments, e.g. one read back from the cache.
 */
export function freezeConfig(config: LogicalConfig): LogicalConfig {
  return deepFreeze(config);
}
