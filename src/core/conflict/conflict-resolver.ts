import type { ConflictChoice, ConflictInfo, ConflictPrompt } from '../ports/conflict-prompt.js';
import type { ResourceDeployer } from '../deploy/resource-deployer.js';
import { lstatOrNull, remove, renamePath } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { renderDiff, type DiffRenderer } from './diff-view.js';

export type AbortReason = 'skip' | 'quit';

/**
 * Outcome for one destination.
 *   proceed    nothing is there; place the resource
 *   skip-noop  the desired resource is already in place
 *   backup     move the existing resource to backupPath, then place
 *   overwrite  remove the existing resource, then place
 *   abort      leave it alone; 'quit' also ends the run
 */
export type Decision =
  | { type: 'proceed' }
  | { type: 'skip-noop' }
  | { type: 'backup'; backupPath: string }
  | { type: 'overwrite' }
  | { type: 'abort'; reason: AbortReason };

export interface ConflictPolicy {
  backupEnabled: boolean;
  /** The entry or the run asked for prompts */
  interactive: boolean;
}

export interface ConflictResolverOptions {
  deployer: ResourceDeployer;
  /** Omitted in sessions that cannot prompt */
  prompt?: ConflictPrompt;
  now?: () => Date;
  diffRenderer?: DiffRenderer;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time stamp in the form YYYYMMDD-HHmmss
 */
export function formatBackupTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Pick a backup path next to the destination that does not exist yet
 */
export async function createBackupPath(destination: string, now: Date): Promise<string> {
  const base = `${destination}.backup.${formatBackupTimestamp(now)}`;
  let candidate = base;
  for (let attempt = 1; (await lstatOrNull(candidate)) !== null; attempt++) {
    candidate = `${base}-${attempt}`;
  }
  return candidate;
}

/**
 * Decides, per destination that may already be occupied, whether to place,
 * skip, back up, overwrite or abort.
 */
export class ConflictResolver {
  private readonly deployer: ResourceDeployer;
  private readonly prompt?: ConflictPrompt;
  private readonly now: () => Date;
  private readonly diffRenderer: DiffRenderer;

  constructor(options: ConflictResolverOptions) {
    this.deployer = options.deployer;
    this.prompt = options.prompt;
    this.now = options.now ?? (() => new Date());
    this.diffRenderer = options.diffRenderer ?? renderDiff;
  }

  async resolve(conflict: ConflictInfo, policy: ConflictPolicy): Promise<Decision> {
    if ((await lstatOrNull(conflict.destination)) === null) {
      return { type: 'proceed' };
    }

    if (await this.deployer.identical(conflict.destination, conflict.source, conflict.deploymentKind)) {
      logger.debug(`${conflict.name}: already in place at ${conflict.destination}`);
      return { type: 'skip-noop' };
    }

    if (this.prompt && policy.interactive) {
      return this.ask(this.prompt, { ...conflict, backupAvailable: policy.backupEnabled });
    }

    if (policy.backupEnabled) {
      return { type: 'backup', backupPath: await createBackupPath(conflict.destination, this.now()) };
    }
    return { type: 'overwrite' };
  }

  /**
   * Make room for placement according to the decision. Returns whether the
   * resource should now be placed.
   */
  async applyDecision(decision: Decision, destination: string): Promise<boolean> {
    switch (decision.type) {
      case 'proceed':
        return true;
      case 'skip-noop':
      case 'abort':
        return false;
      case 'backup':
        await renamePath(destination, decision.backupPath);
        logger.info(`Backed up ${destination} to ${decision.backupPath}`);
        return true;
      case 'overwrite':
        await remove(destination);
        return true;
    }
  }

  private async ask(prompt: ConflictPrompt, conflict: ConflictInfo): Promise<Decision> {
    for (;;) {
      const choice: ConflictChoice = await prompt.ask(conflict);
      switch (choice) {
        case 'view-diff':
          await prompt.showDiff(conflict, await this.diffRenderer(conflict.destination, conflict.source));
          continue;
        case 'skip':
          return { type: 'abort', reason: 'skip' };
        case 'quit':
          return { type: 'abort', reason: 'quit' };
        case 'overwrite':
          return { type: 'overwrite' };
        case 'backup':
          if (!conflict.backupAvailable) {
            logger.warn(`Backups are disabled for ${conflict.name}; choose another option`);
            continue;
          }
          return { type: 'backup', backupPath: await createBackupPath(conflict.destination, this.now()) };
      }
    }
  }
}
