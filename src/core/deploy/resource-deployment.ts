import type { BinaryEntry, DeploymentKind, FileEntry, ManagedBinary, ManagedFile, ManagedResource } from '../../types/index.js';
import type { ConflictPrompt, ConflictInfo, ResourceKind } from '../ports/conflict-prompt.js';
import type { ConflictResolver, Decision } from '../conflict/conflict-resolver.js';
import { checkRemovalSafety, type RemovalCheck, type RemovalSafetyOptions } from '../conflict/removal-safety.js';
import type { ResourceDeployer } from './resource-deployer.js';
import type { BinaryFetcher } from './binary-fetcher.js';
import { DeploymentError, getErrorMessage, SafetyViolationError, UserCancellationError } from '../../utils/errors.js';
import { exists, remove, renamePath } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { isRemoteSource, resolveDeclaredPath } from '../../utils/paths.js';

export const DEFAULT_BINARY_MODE = '755';

export interface DeploymentContext {
  deployer: ResourceDeployer;
  resolver: ConflictResolver;
  fetcher: BinaryFetcher;
  /** Present only when the session can prompt */
  prompt?: ConflictPrompt;
  /** Prompt for every conflict, not only for entries marked interactive */
  interactiveRun: boolean;
  dryRun: boolean;
  homeDir: string;
  /** Relative destinations resolve against this directory */
  cwd: string;
  safety?: RemovalSafetyOptions;
}

export type DeployStatus = 'deployed' | 'unchanged' | 'skipped' | 'planned';

export interface DeployOutcome<T extends ManagedResource> {
  name: string;
  status: DeployStatus;
  decision: Decision;
  destination: string;
  /** Record for the applied state; absent when nothing is managed at the destination */
  managed?: T;
}

export type RemovalStatus = 'removed' | 'absent' | 'refused' | 'planned';

export interface RemovalOutcome {
  name: string;
  status: RemovalStatus;
  destination: string;
  restoredBackup: boolean;
  reason?: string;
}

interface DeployRequest {
  name: string;
  resourceKind: ResourceKind;
  source: string;
  destination: string;
  deploymentKind: DeploymentKind;
  backup: boolean;
  interactive: boolean;
  fileMode?: string;
  owner?: string;
  group?: string;
  /** Record from the previous run, carried forward when nothing changes */
  previous?: ManagedResource;
}

function resolveDestination(destination: string, context: DeploymentContext): string {
  return resolveDeclaredPath(destination, context.cwd, context.homeDir);
}

async function deploy(request: DeployRequest, context: DeploymentContext): Promise<DeployOutcome<ManagedResource>> {
  const conflict: ConflictInfo = {
    name: request.name,
    resourceKind: request.resourceKind,
    source: request.source,
    destination: request.destination,
    deploymentKind: request.deploymentKind,
    backupAvailable: request.backup
  };

  // A dry run never prompts; the decision it reports is the non-interactive one
  const decision = await context.resolver.resolve(conflict, {
    backupEnabled: request.backup,
    interactive: !context.dryRun && (request.interactive || context.interactiveRun)
  });

  const managedRecord = (backupPath?: string): ManagedResource => ({
    name: request.name,
    destinationPath: request.destination,
    deploymentKind: request.deploymentKind,
    ...(backupPath !== undefined && { backupPath })
  });
  const outcome = (status: DeployStatus, managed?: ManagedResource): DeployOutcome<ManagedResource> => ({
    name: request.name,
    status,
    decision,
    destination: request.destination,
    ...(managed && { managed })
  });

  if (decision.type === 'abort') {
    if (decision.reason === 'quit') {
      throw new UserCancellationError(`Stopped at ${request.name}`);
    }
    logger.info(`Skipped ${request.name}: left ${request.destination} unchanged`);
    return outcome('skipped', request.previous);
  }

  if (decision.type === 'skip-noop') {
    return outcome('unchanged', managedRecord(request.previous?.backupPath));
  }

  if (context.dryRun) {
    return outcome('planned', managedRecord(request.previous?.backupPath));
  }

  try {
    await context.resolver.applyDecision(decision, request.destination);
    await context.deployer.place(request.source, request.destination, request.deploymentKind, {
      ...(request.fileMode !== undefined && { fileMode: request.fileMode }),
      ...(request.owner !== undefined && { owner: request.owner }),
      ...(request.group !== undefined && { group: request.group })
    });
  } catch (error) {
    throw new DeploymentError(request.name, getErrorMessage(error), { destination: request.destination, error });
  }

  const backupPath = decision.type === 'backup' ? decision.backupPath : request.previous?.backupPath;
  logger.info(`Deployed ${request.name} -> ${request.destination}`);
  return outcome('deployed', managedRecord(backupPath));
}

export async function deployFile(
  name: string,
  entry: FileEntry,
  context: DeploymentContext,
  previous?: ManagedFile
): Promise<DeployOutcome<ManagedFile>> {
  return deploy(
    {
      name,
      resourceKind: 'file',
      source: resolveDeclaredPath(entry.source, entry.sourceDir, context.homeDir),
      destination: resolveDestination(entry.destination, context),
      deploymentKind: entry.copy ? 'copy' : 'link',
      backup: entry.backup,
      interactive: entry.interactive,
      ...(entry.copy && entry.mode !== undefined && { fileMode: entry.mode }),
      ...(entry.owner !== undefined && { owner: entry.owner }),
      ...(entry.group !== undefined && { group: entry.group }),
      ...(previous && { previous })
    },
    context
  );
}

export async function deployBinary(
  name: string,
  entry: BinaryEntry,
  context: DeploymentContext,
  previous?: ManagedBinary
): Promise<DeployOutcome<ManagedBinary>> {
  const destination = resolveDestination(entry.destination, context);
  const remote = isRemoteSource(entry.source);

  if (remote && context.dryRun) {
    return {
      name,
      status: 'planned',
      decision: { type: 'proceed' },
      destination,
      managed: { name, destinationPath: destination, deploymentKind: 'copy', source: entry.source }
    };
  }

  const source = remote
    ? await context.fetcher.download(name, entry.source)
    : resolveDeclaredPath(entry.source, entry.sourceDir, context.homeDir);

  try {
    const result = await deploy(
      {
        name,
        resourceKind: 'binary',
        source,
        destination,
        deploymentKind: 'copy',
        backup: entry.backup,
        interactive: entry.interactive,
        fileMode: entry.mode ?? DEFAULT_BINARY_MODE,
        ...(entry.owner !== undefined && { owner: entry.owner }),
        ...(entry.group !== undefined && { group: entry.group }),
        ...(previous && { previous })
      },
      context
    );
    return {
      ...result,
      ...(result.managed && { managed: { ...result.managed, source: entry.source } })
    };
  } finally {
    if (remote) {
      await context.fetcher.discard(source);
    }
  }
}

/**
 * Remove a resource the previous run deployed and the configuration no
 * longer declares. Safety refusals are logged and reported, never thrown.
 */
export async function removeResource(
  resource: ManagedResource,
  resourceKind: ResourceKind,
  context: DeploymentContext
): Promise<RemovalOutcome> {
  const base = { name: resource.name, destination: resource.destinationPath, restoredBackup: false };

  let check: RemovalCheck;
  try {
    check = await checkRemovalSafety(resource, resourceKind, context.safety);
  } catch (error) {
    if (error instanceof SafetyViolationError) {
      logger.warn(`Not removing ${resource.name}: ${error.message}`);
      return { ...base, status: 'refused', reason: error.message };
    }
    throw error;
  }

  if (check === 'absent') {
    logger.debug(`${resource.name} already gone from ${resource.destinationPath}`);
    return { ...base, status: 'absent' };
  }

  if (context.dryRun) {
    return { ...base, status: 'planned' };
  }

  await remove(resource.destinationPath);
  logger.info(`Removed ${resource.name} from ${resource.destinationPath}`);

  const restoredBackup = await offerBackupRestore(resource, context);
  return { ...base, status: 'removed', restoredBackup };
}

async function offerBackupRestore(resource: ManagedResource, context: DeploymentContext): Promise<boolean> {
  const { backupPath } = resource;
  if (backupPath === undefined || !(await exists(backupPath))) {
    return false;
  }
  if (!context.prompt) {
    logger.info(`Backup for ${resource.name} kept at ${backupPath}`);
    return false;
  }

  const restore = await context.prompt.confirmRestore({
    name: resource.name,
    destination: resource.destinationPath,
    backupPath
  });
  if (!restore) {
    return false;
  }

  await renamePath(backupPath, resource.destinationPath);
  logger.info(`Restored ${resource.destinationPath} from ${backupPath}`);
  return true;
}
