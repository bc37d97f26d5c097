/**
 * Shared constants for the hostform CLI application
 * This file provides a single source of truth for directory names,
 * file patterns, and other constants used throughout the application.
 */

export const APP_NAME = 'hostform';

export const FILE_PATTERNS = {
  ROOT_CONFIG: 'hostform.yaml',
  /** Conventional file loaded when an include points at a directory */
  DEFAULT_INCLUDE: 'default.yaml',
  DEFAULT_EXTENSION: '.yaml',
  YAML_EXTENSIONS: ['.yaml', '.yml'],
  STATE_FILE: 'state.json',
  SYSTEM_STATE_CACHE: 'system_state.json'
} as const;

export const CACHE_DIRS = {
  CONFIG: 'config',
  DOWNLOADS: 'downloads'
} as const;

export const ENV_VARS = {
  VERBOSE: 'HOSTFORM_VERBOSE',
  CONFIG_DIR: 'HOSTFORM_CONFIG_DIR',
  CACHE_DIR: 'HOSTFORM_CACHE_DIR'
} as const;

export const RECORD_VERSIONS = {
  APPLIED_STATE: '1.0',
  CONFIG_CACHE: '1.0',
  SYSTEM_STATE_CACHE: '1.0'
} as const;

/** Probe results older than this are re-checked. */
export const SYSTEM_STATE_TTL_MS = 60 * 60 * 1000;

/** Copied files modified more recently than this are treated as untouched on removal. */
export const RECENT_DEPLOYMENT_WINDOW_MS = 5 * 60 * 1000;

export const PROCESS_TIMEOUTS = {
  PROBE_MS: 30 * 1000,
  INSTALL_MS: 10 * 60 * 1000,
  DOWNLOAD_MS: 5 * 60 * 1000
} as const;

/** Link targets under these prefixes are never removed. */
export const PROTECTED_LINK_PREFIXES = ['/etc/', '/usr/', '/bin/'] as const;

export const SYSTEM_DESTINATION_PREFIXES = ['/etc/', '/usr/', '/bin/', '/sbin/', '/opt/'] as const;

/** Built-in flags used when neither the entry nor package_defaults set any. */
export const DEFAULT_PACKAGE_FLAGS: Readonly<Record<string, readonly string[]>> = {
  apt: ['-y', '--no-install-recommends'],
  snap: [],
  flatpak: ['--system', '--assumeyes']
};

export const CONFIG_SEARCH_PATHS = [
  `./${FILE_PATTERNS.ROOT_CONFIG}`,
  `~/.config/${APP_NAME}/${FILE_PATTERNS.ROOT_CONFIG}`,
  `~/${FILE_PATTERNS.ROOT_CONFIG}`,
  `/etc/${APP_NAME}/${FILE_PATTERNS.ROOT_CONFIG}`
] as const;
