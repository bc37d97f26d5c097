/**
 * Home Directory Utilities
 *
 * Centralized module for home directory expansion and display normalization.
 */

import { homedir } from 'os';
import { resolve, normalize } from 'path';

/**
 * Get the home directory path.
 */
export function getHomeDirectory(): string {
  return homedir();
}

/**
 * Convert home directory path to tilde notation for display.
 *
 * Only converts if the path is exactly the home directory or
 * a subdirectory of it. Other paths are returned unchanged.
 */
export function normalizePathWithTilde(path: string, homeDir: string = getHomeDirectory()): string {
  const normalizedPath = normalize(resolve(path));
  const normalizedHome = normalize(homeDir);

  if (normalizedPath === normalizedHome) {
    return '~/';
  }

  if (normalizedPath.startsWith(normalizedHome + '/')) {
    return '~/' + normalizedPath.slice(normalizedHome.length + 1);
  }

  return normalizedPath;
}

/**
 * Expand tilde notation to full home directory path.
 *
 * @param path - Path that may start with ~/
 * @returns Path with ~/ expanded to home directory
 */
export function expandTilde(path: string, homeDir: string = getHomeDirectory()): string {
  if (path === '~' || path === '~/') {
    return homeDir;
  }

  if (path.startsWith('~/')) {
    return resolve(homeDir, path.slice(2));
  }

  return path;
}
