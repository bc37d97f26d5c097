import { join } from 'path';
import type { AppliedState, DeploymentKind, HostformDirectories, ManagedBinary, ManagedFile } from '../../types/index.js';
import { PACKAGE_MANAGERS } from '../../types/index.js';
import { FILE_PATTERNS, RECORD_VERSIONS } from '../../constants/index.js';
import { getErrorMessage, StateLoadError } from '../../utils/errors.js';
import { exists, readTextFile, writeJsonFileAtomic } from '../../utils/fs.js';
import { isOptionalString, isRecord, isStringArray, parseJson } from '../../utils/json-guards.js';
import { logger } from '../../utils/logger.js';

export function createEmptyAppliedState(): AppliedState {
  return {
    version: RECORD_VERSIONS.APPLIED_STATE,
    lastUpdated: new Date(0).toISOString(),
    managedPackages: { apt: [], flatpak: [], snap: [] },
    managedFiles: [],
    managedBinaries: []
  };
}

function isDeploymentKind(value: unknown): value is DeploymentKind {
  return value === 'link' || value === 'copy';
}

function sanitizeManagedResource(value: unknown, field: string, index: number): ManagedBinary {
  if (
    !isRecord(value) ||
    typeof value.name !== 'string' ||
    typeof value.destinationPath !== 'string' ||
    !isDeploymentKind(value.deploymentKind) ||
    !isOptionalString(value.backupPath) ||
    !isOptionalString(value.source)
  ) {
    throw new StateLoadError(`${field}[${index}] is malformed`, { field, index });
  }
  return {
    name: value.name,
    destinationPath: value.destinationPath,
    deploymentKind: value.deploymentKind,
    ...(value.backupPath !== undefined && { backupPath: value.backupPath }),
    ...(value.source !== undefined && { source: value.source })
  };
}

function sanitizeResourceList(value: unknown, field: string): ManagedBinary[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new StateLoadError(`${field} must be a list`, { field });
  }
  return value.map((item, index) => sanitizeManagedResource(item, field, index));
}

/**
 * Validate a parsed state record. Unknown fields are ignored.
 */
export function sanitizeAppliedState(value: unknown): AppliedState {
  if (!isRecord(value)) {
    throw new StateLoadError('state record must be an object');
  }
  if (typeof value.version !== 'string' || typeof value.lastUpdated !== 'string') {
    throw new StateLoadError('state record is missing version or lastUpdated');
  }

  const state = createEmptyAppliedState();
  state.version = value.version;
  state.lastUpdated = value.lastUpdated;

  if (value.managedPackages !== undefined) {
    if (!isRecord(value.managedPackages)) {
      throw new StateLoadError('managedPackages must be an object');
    }
    for (const manager of PACKAGE_MANAGERS) {
      const names = value.managedPackages[manager] ?? [];
      if (!isStringArray(names)) {
        throw new StateLoadError(`managedPackages.${manager} must be a list of names`, { manager });
      }
      state.managedPackages[manager] = names;
    }
  }

  state.managedFiles = sanitizeResourceList(value.managedFiles, 'managedFiles').map(
    ({ name, destinationPath, deploymentKind, backupPath }): ManagedFile => ({
      name,
      destinationPath,
      deploymentKind,
      ...(backupPath !== undefined && { backupPath })
    })
  );
  state.managedBinaries = sanitizeResourceList(value.managedBinaries, 'managedBinaries');

  return state;
}

/**
 * Durable record of what the last successful run installed and deployed.
 */
export class AppliedStateStore {
  readonly statePath: string;

  constructor(directories: HostformDirectories) {
    this.statePath = join(directories.config, FILE_PATTERNS.STATE_FILE);
  }

  /**
   * Load the last applied state. A missing, unreadable or malformed record is
   * treated as "nothing previously managed".
   */
  async load(): Promise<AppliedState> {
    if (!(await exists(this.statePath))) {
      logger.debug(`No applied state at ${this.statePath}; starting fresh`);
      return createEmptyAppliedState();
    }

    try {
      const parsed = parseJson(await readTextFile(this.statePath));
      if (parsed === null) {
        throw new StateLoadError(`${this.statePath} is not valid JSON`);
      }
      return sanitizeAppliedState(parsed);
    } catch (error) {
      logger.warn(`Ignoring unreadable applied state (${getErrorMessage(error)}); treating as empty`);
      return createEmptyAppliedState();
    }
  }

  /**
   * Replace the record atomically; readers see the old or the new state, never a mix.
   */
  async save(state: AppliedState): Promise<void> {
    await writeJsonFileAtomic(this.statePath, state);
    logger.debug(`Saved applied state to ${this.statePath}`);
  }
}
