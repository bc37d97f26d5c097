import { CONFIG_SEARCH_PATHS } from '../../constants/index.js';
import { ConfigError } from '../../utils/errors.js';
import { isFile } from '../../utils/fs.js';
import { getHomeDirectory } from '../../utils/home-directory.js';
import { logger } from '../../utils/logger.js';
import { resolveDeclaredPath } from '../../utils/paths.js';

export interface ConfigLocatorOptions {
  cwd?: string;
  homeDir?: string;
  searchPaths?: readonly string[];
}

/**
 * Find the root configuration document. An explicit path must exist; otherwise
 * the conventional locations are tried in order and the first file wins.
 */
export async function findConfigFile(explicit: string | undefined, options: ConfigLocatorOptions = {}): Promise<string> {
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? getHomeDirectory();

  if (explicit !== undefined) {
    const candidate = resolveDeclaredPath(explicit, cwd, homeDir);
    if (!(await isFile(candidate))) {
      throw new ConfigError(`Configuration file not found: ${candidate}`, { path: candidate });
    }
    return candidate;
  }

  const searchPaths = options.searchPaths ?? CONFIG_SEARCH_PATHS;
  const tried: string[] = [];
  for (const searchPath of searchPaths) {
    const candidate = resolveDeclaredPath(searchPath, cwd, homeDir);
    tried.push(candidate);
    if (await isFile(candidate)) {
      logger.debug(`Using configuration ${candidate}`);
      return candidate;
    }
  }

  throw new ConfigError(
    `No configuration file found. Looked at:\n${tried.map(path => `  ${path}`).join('\n')}`,
    { tried }
  );
}
