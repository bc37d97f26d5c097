import type { LogicalConfig } from '../../types/index.js';
import type { ConfigCache } from '../cache/config-cache.js';
import { mergeDocuments } from '../config/config-merger.js';
import type { IncludeResolver } from '../config/include-resolver.js';
import { logger } from '../../utils/logger.js';

export interface LoadedConfig {
  config: LogicalConfig;
  /** Source documents in resolution order, root first */
  paths: string[];
  fromCache: boolean;
}

export interface LoadConfigOptions {
  resolver: IncludeResolver;
  /** Omit to always merge from source */
  cache?: ConfigCache;
  /** Do not write a cache record */
  readOnly?: boolean;
}

/**
 * Resolve the include graph, then serve the merged model from the
 * fingerprint cache or merge it and remember the result.
 */
export async function loadConfig(rootPath: string, options: LoadConfigOptions): Promise<LoadedConfig> {
  const resolved = await options.resolver.resolve(rootPath);
  const paths = [...resolved.paths];

  const cached = options.cache ? await options.cache.load(paths) : null;
  if (cached) {
    return { config: cached, paths, fromCache: true };
  }

  const config = mergeDocuments(resolved.documents);
  logger.debug(`Merged ${resolved.documents.length} configuration document(s)`);

  if (options.cache && !options.readOnly) {
    await options.cache.store(config, resolved.documents);
  }
  return { config, paths, fromCache: false };
}
