import * as path from 'path';
import { HostformDirectories } from '../types/index.js';
import { APP_NAME, CACHE_DIRS, ENV_VARS } from '../constants/index.js';
import { ensureDir } from '../utils/fs.js';
import { getHomeDirectory } from '../utils/home-directory.js';
import { logger } from '../utils/logger.js';

/**
 * Directory resolution following the XDG base directory convention
 */

type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Resolve the config and cache roots. HOSTFORM_CONFIG_DIR / HOSTFORM_CACHE_DIR
 * win over XDG_CONFIG_HOME / XDG_CACHE_HOME, which win over ~/.config and ~/.cache.
 */
export function getHostformDirectories(
  env: Environment = process.env,
  homeDir: string = getHomeDirectory()
): HostformDirectories {
  const configBase = env.XDG_CONFIG_HOME || path.join(homeDir, '.config');
  const cacheBase = env.XDG_CACHE_HOME || path.join(homeDir, '.cache');

  return {
    config: env[ENV_VARS.CONFIG_DIR] || path.join(configBase, APP_NAME),
    cache: env[ENV_VARS.CACHE_DIR] || path.join(cacheBase, APP_NAME)
  };
}

/**
 * Ensure both roots exist
 */
export async function ensureHostformDirectories(
  directories: HostformDirectories = getHostformDirectories()
): Promise<HostformDirectories> {
  try {
    await ensureDir(directories.config);
    await ensureDir(directories.cache);
    logger.debug('hostform directories ensured', { directories });
    return directories;
  } catch (error) {
    logger.error('Failed to create hostform directories', { error, directories });
    throw error;
  }
}

/**
 * Get the cache directory for a specific type of cache
 */
export function getCacheDirectory(directories: HostformDirectories, cacheType: string): string {
  return path.join(directories.cache, cacheType);
}

export function getConfigCacheDirectory(directories: HostformDirectories): string {
  return getCacheDirectory(directories, CACHE_DIRS.CONFIG);
}

export function getDownloadsDirectory(directories: HostformDirectories): string {
  return getCacheDirectory(directories, CACHE_DIRS.DOWNLOADS);
}
