import { dirname, resolve } from 'path';
import type { DeploymentKind } from '../../types/index.js';
import { chmod, copyFile, createSymlink, lstatOrNull, readLink } from '../../utils/fs.js';
import { FileSystemError } from '../../utils/errors.js';
import { hashFile } from '../../utils/hash-utils.js';
import { logger } from '../../utils/logger.js';
import { runCommand } from '../../utils/process.js';
import { PROCESS_TIMEOUTS } from '../../constants/index.js';
import type { CommandRunner } from '../packages/command-installers.js';

export interface PlaceOptions {
  /** Octal permission string such as '644' applied to copies */
  fileMode?: string;
  /** User name or id the placed resource should belong to */
  owner?: string;
  group?: string;
}

/**
 * Places resources on disk and tells whether an existing destination already
 * holds the desired resource.
 */
export interface ResourceDeployer {
  place(source: string, destination: string, kind: DeploymentKind, options?: PlaceOptions): Promise<void>;
  identical(destination: string, source: string, kind: DeploymentKind): Promise<boolean>;
}

/**
 * Resolve a symlink's target the way the kernel would: relative to the link's directory
 */
export async function resolveLinkTarget(linkPath: string): Promise<string> {
  return resolve(dirname(linkPath), await readLink(linkPath));
}

/**
 * chown argument for the requested owner and group: `owner`, `owner:group` or `:group`
 */
export function formatOwnership(owner?: string, group?: string): string | null {
  if (owner === undefined && group === undefined) {
    return null;
  }
  return group === undefined ? owner ?? null : `${owner ?? ''}:${group}`;
}

export class LocalResourceDeployer implements ResourceDeployer {
  constructor(private readonly run: CommandRunner = runCommand) {}

  async place(source: string, destination: string, kind: DeploymentKind, options: PlaceOptions = {}): Promise<void> {
    if (kind === 'link') {
      await createSymlink(source, destination);
    } else {
      await copyFile(source, destination);
      if (options.fileMode !== undefined) {
        await chmod(destination, parseInt(options.fileMode, 8));
      }
      logger.debug(`Copied ${source} -> ${destination}`, { fileMode: options.fileMode });
    }

    await this.setOwnership(destination, kind, options);
  }

  private async setOwnership(destination: string, kind: DeploymentKind, options: PlaceOptions): Promise<void> {
    const ownership = formatOwnership(options.owner, options.group);
    if (ownership === null) {
      return;
    }

    // -h changes the link itself, not the file it points at
    const args = kind === 'link' ? ['-h', ownership, destination] : [ownership, destination];
    const output = await this.run('chown', args, { timeoutMs: PROCESS_TIMEOUTS.PROBE_MS });
    if (output.exitCode !== 0) {
      throw new FileSystemError(`chown ${ownership} ${destination} failed: ${output.stderr.trim()}`, {
        destination,
        ownership
      });
    }
    logger.debug(`Set ownership of ${destination} to ${ownership}`);
  }

  async identical(destination: string, source: string, kind: DeploymentKind): Promise<boolean> {
    const stats = await lstatOrNull(destination);
    if (stats === null) {
      return false;
    }

    if (kind === 'link') {
      return stats.isSymbolicLink() && (await resolveLinkTarget(destination)) === resolve(source);
    }

    if (!stats.isFile()) {
      return false;
    }
    const sourceStats = await lstatOrNull(source);
    if (sourceStats === null) {
      return false;
    }
    return (await hashFile(destination)) === (await hashFile(source));
  }
}
