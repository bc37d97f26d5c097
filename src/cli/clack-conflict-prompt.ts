/**
 * Clack Conflict Prompt
 *
 * CLI implementation of the ConflictPrompt port on top of @clack/prompts.
 * Cancelling a prompt (Ctrl+C) ends the run like choosing "quit".
 */

import * as clack from '@clack/prompts';
import type { ConflictChoice, ConflictInfo, ConflictPrompt, RestoreInfo } from '../core/ports/index.js';
import { UserCancellationError } from '../utils/errors.js';
import { normalizePathWithTilde } from '../utils/home-directory.js';

const CONFLICT_CHOICES: readonly ConflictChoice[] = ['skip', 'overwrite', 'backup', 'view-diff', 'quit'];

function isConflictChoice(value: unknown): value is ConflictChoice {
  return typeof value === 'string' && CONFLICT_CHOICES.some(choice => choice === value);
}

function choiceOptions(conflict: ConflictInfo): Array<{ value: ConflictChoice; label: string; hint?: string }> {
  return [
    { value: 'skip', label: 'Skip', hint: 'leave the existing file in place' },
    { value: 'overwrite', label: 'Overwrite', hint: 'replace it without a backup' },
    ...(conflict.backupAvailable
      ? [{ value: 'backup' as const, label: 'Back up and replace', hint: 'keep the old file next to it' }]
      : []),
    { value: 'view-diff', label: 'View diff' },
    { value: 'quit', label: 'Quit', hint: 'stop without recording this run' }
  ];
}

export function createClackConflictPrompt(): ConflictPrompt {
  return {
    async ask(conflict: ConflictInfo): Promise<ConflictChoice> {
      const result = await clack.select({
        message:
          `${conflict.resourceKind === 'binary' ? 'Binary' : 'File'} ${conflict.name}: ` +
          `${normalizePathWithTilde(conflict.destination)} already exists and differs`,
        options: choiceOptions(conflict)
      });
      if (clack.isCancel(result)) {
        return 'quit';
      }
      return isConflictChoice(result) ? result : 'skip';
    },

    async showDiff(conflict: ConflictInfo, diff: string): Promise<void> {
      clack.note(diff.trimEnd() || '(no textual differences)', `${conflict.name}: existing vs desired`);
    },

    async confirmRestore(restore: RestoreInfo): Promise<boolean> {
      const result = await clack.confirm({
        message: `Restore ${normalizePathWithTilde(restore.destination)} from ${normalizePathWithTilde(restore.backupPath)}?`,
        initialValue: true
      });
      if (clack.isCancel(result)) {
        clack.cancel('Operation cancelled.');
        throw new UserCancellationError('Operation cancelled by user');
      }
      return result;
    }
  };
}
