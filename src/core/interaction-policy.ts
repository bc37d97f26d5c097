/**
 * Interaction Policy
 *
 * Single source of truth for whether the CLI can prompt the user.
 * Created once at command entry and threaded through the run.
 *
 * Conflict prompts:
 *   never  - no prompts; conflicts resolve to backup or overwrite
 *   auto   - prompts only for entries marked `interactive: true`
 *   always - prompts for every conflict (--interactive)
 */

export type InteractionMode = 'never' | 'auto' | 'always';

export interface InteractionPolicy {
  readonly mode: InteractionMode;
  readonly isTTY: boolean;
  /** A prompt may be shown at all */
  canPrompt(): boolean;
  /** Every conflict prompts, not only entries marked interactive */
  promptsEveryConflict(): boolean;
}

export interface InteractionEnvironment {
  isTTY: boolean;
  ci: boolean;
}

function detectEnvironment(): InteractionEnvironment {
  return {
    isTTY: process.stdin.isTTY === true,
    ci: process.env.CI === 'true'
  };
}

/**
 * Create an interaction policy from command options.
 *
 * Mode resolution:
 *   --dry-run            → 'never', even with --interactive
 *   --interactive + TTY  → 'always'
 *   --interactive + !TTY → throws (user explicitly asked for interactive)
 *   CI=true or !TTY      → 'never'
 *   default TTY          → 'auto'
 */
export function createInteractionPolicy(
  options: { interactive?: boolean; dryRun?: boolean },
  environment: InteractionEnvironment = detectEnvironment()
): InteractionPolicy {
  const { isTTY } = environment;

  let mode: InteractionMode;
  if (options.dryRun) {
    mode = 'never';
  } else if (options.interactive) {
    if (!isTTY) {
      throw new Error('--interactive requires an interactive terminal (TTY).');
    }
    mode = 'always';
  } else if (!isTTY || environment.ci) {
    mode = 'never';
  } else {
    mode = 'auto';
  }

  return {
    mode,
    isTTY,
    canPrompt(): boolean {
      return mode !== 'never';
    },
    promptsEveryConflict(): boolean {
      return mode === 'always';
    }
  };
}
