import { getErrorMessage } from '../../utils/errors.js';
import { readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { runCommand } from '../../utils/process.js';
import { PROCESS_TIMEOUTS } from '../../constants/index.js';

export type DiffRenderer = (current: string, desired: string) => Promise<string>;

/**
 * Line-by-line comparison used when `diff` is unavailable. Lines are paired by
 * position, so an insertion shows every following line as changed.
 */
export function compareLines(currentText: string, desiredText: string): string[] {
  const current = currentText.split('\n');
  const desired = desiredText.split('\n');
  const output: string[] = [];

  for (let i = 0; i < Math.max(current.length, desired.length); i++) {
    const before = current[i] ?? '';
    const after = desired[i] ?? '';
    if (before === after) {
      continue;
    }
    if (before !== '') {
      output.push(`-${before}`);
    }
    if (after !== '') {
      output.push(`+${after}`);
    }
  }

  return output;
}

/**
 * Render what replacing `current` with `desired` would change, preferring `diff -u`.
 */
export const renderDiff: DiffRenderer = async (current, desired) => {
  try {
    const result = await runCommand('diff', ['-u', current, desired], { timeoutMs: PROCESS_TIMEOUTS.PROBE_MS });
    // diff exits 1 when the files differ
    if (result.exitCode === 0 || result.exitCode === 1) {
      return result.stdout;
    }
    logger.debug(`diff exited with ${result.exitCode}, using built-in comparison`, { stderr: result.stderr });
  } catch (error) {
    logger.debug(`diff unavailable (${getErrorMessage(error)}), using built-in comparison`);
  }

  const lines = compareLines(await readTextFile(current), await readTextFile(desired));
  return [`--- ${current}`, `+++ ${desired}`, ...lines].join('\n');
};
