import type { ManagedResource } from '../../types/index.js';
import { PROTECTED_LINK_PREFIXES, RECENT_DEPLOYMENT_WINDOW_MS } from '../../constants/index.js';
import type { ResourceKind } from '../ports/conflict-prompt.js';
import { SafetyViolationError } from '../../utils/errors.js';
import { lstatOrNull, readLink } from '../../utils/fs.js';

export type RemovalCheck = 'absent' | 'safe';

export interface RemovalSafetyOptions {
  now?: () => number;
  recentWindowMs?: number;
}

/**
 * Decide whether a previously managed resource may be removed. Anything that
 * could hold user data throws SafetyViolationError; the caller logs it and
 * leaves the resource in place.
 *
 * Copies only count as untouched inside a short window after deployment.
 * Older copies are assumed possibly modified.
 */
export async function checkRemovalSafety(
  resource: ManagedResource,
  resourceKind: ResourceKind,
  options: RemovalSafetyOptions = {}
): Promise<RemovalCheck> {
  const { destinationPath } = resource;
  const stats = await lstatOrNull(destinationPath);
  if (stats === null) {
    return 'absent';
  }

  if (resourceKind === 'binary') {
    if (!stats.isFile()) {
      throw new SafetyViolationError('not-regular-file', `${destinationPath} is not a regular file`, { destinationPath });
    }
    if ((stats.mode & 0o111) === 0) {
      throw new SafetyViolationError('not-executable', `${destinationPath} is not executable`, { destinationPath });
    }
    return 'safe';
  }

  const isLink = stats.isSymbolicLink();
  if (isLink !== (resource.deploymentKind === 'link')) {
    throw new SafetyViolationError(
      'type-mismatch',
      `${destinationPath} was deployed as a ${resource.deploymentKind} but is now ${isLink ? 'a link' : 'a regular file'}`,
      { destinationPath, deploymentKind: resource.deploymentKind }
    );
  }

  if (isLink) {
    const target = await readLink(destinationPath);
    if (PROTECTED_LINK_PREFIXES.some(prefix => target.startsWith(prefix))) {
      throw new SafetyViolationError('system-target', `${destinationPath} points into a system directory (${target})`, {
        destinationPath,
        target
      });
    }
    return 'safe';
  }

  if (!stats.isFile()) {
    throw new SafetyViolationError('type-mismatch', `${destinationPath} is no longer a regular file`, { destinationPath });
  }

  const now = options.now ?? Date.now;
  const windowMs = options.recentWindowMs ?? RECENT_DEPLOYMENT_WINDOW_MS;
  if (now() - stats.mtimeMs >= windowMs) {
    throw new SafetyViolationError('possibly-modified', `${destinationPath} may have been modified since deployment`, {
      destinationPath
    });
  }
  return 'safe';
}
