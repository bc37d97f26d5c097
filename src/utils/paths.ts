import { extname, isAbsolute, resolve } from 'path';
import { FILE_PATTERNS } from '../constants/index.js';
import { expandTilde } from './home-directory.js';

/**
 * Path utility functions for consistent path handling across hostform.
 */

/**
 * Resolve a path declared inside a document: `~/` expands to the home
 * directory, absolute paths are kept, relative paths resolve against baseDir.
 */
export function resolveDeclaredPath(declared: string, baseDir: string, homeDir?: string): string {
  const expanded = expandTilde(declared, homeDir);
  if (isAbsolute(expanded)) {
    return resolve(expanded);
  }
  return resolve(baseDir, expanded);
}

/**
 * Whether a path ends in one of the recognised YAML extensions
 */
export function hasYamlExtension(path: string): boolean {
  const ext = extname(path).toLowerCase();
  return FILE_PATTERNS.YAML_EXTENSIONS.some(yamlExt => yamlExt === ext);
}

/**
 * Whether a path carries any extension at all
 */
export function hasExtension(path: string): boolean {
  return extname(path) !== '';
}

/**
 * Include paths containing glob metacharacters are expanded rather than opened
 */
export function isGlobPattern(path: string): boolean {
  return /[*?[]/.test(path);
}

/**
 * Whether a source is fetched over the network rather than read from disk
 */
export function isRemoteSource(source: string): boolean {
  return /^https?:\/\//i.test(source);
}
