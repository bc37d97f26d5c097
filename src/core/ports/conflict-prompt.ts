/**
 * Conflict Prompt Port
 *
 * Asks the user what to do when a destination already holds something other
 * than the desired resource. Only consulted in interactive sessions.
 *
 * Implementations:
 *   - ClackConflictPrompt (CLI): routes to @clack/prompts
 *   - test fakes returning scripted answers
 */

import type { DeploymentKind } from '../../types/index.js';

export type ConflictChoice = 'skip' | 'overwrite' | 'backup' | 'view-diff' | 'quit';

export type ResourceKind = 'file' | 'binary';

export interface ConflictInfo {
  /** Entry name from the configuration */
  name: string;
  resourceKind: ResourceKind;
  source: string;
  destination: string;
  deploymentKind: DeploymentKind;
  /** Whether 'backup' may be chosen */
  backupAvailable: boolean;
}

export interface RestoreInfo {
  name: string;
  destination: string;
  backupPath: string;
}

export interface ConflictPrompt {
  /** Pick how to handle an existing destination */
  ask(conflict: ConflictInfo): Promise<ConflictChoice>;

  /** Display a rendered diff between the destination and the desired source */
  showDiff(conflict: ConflictInfo, diff: string): Promise<void>;

  /** Offer to move a backup back into place after its resource was removed */
  confirmRestore(restore: RestoreInfo): Promise<boolean>;
}
