/**
 * CLI Context Factory
 *
 * Picks the CLI-specific port implementations (Clack output, Clack conflict
 * prompt) for a command from its interaction policy. Command handlers should
 * use this instead of choosing ports themselves.
 */

import { createInteractionPolicy, type InteractionPolicy } from '../core/interaction-policy.js';
import { consoleOutput, type ConflictPrompt, type OutputPort } from '../core/ports/index.js';
import { createClackOutput } from './clack-output-adapter.js';
import { createClackConflictPrompt } from './clack-conflict-prompt.js';

export interface CliContextOptions {
  interactive?: boolean;
  dryRun?: boolean;
}

export interface CliContext {
  policy: InteractionPolicy;
  output: OutputPort;
  /** Absent when the session cannot prompt */
  prompt?: ConflictPrompt;
}

/** Cached port singletons for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;
let cachedClackPrompt: ConflictPrompt | undefined;

/**
 * In an interactive terminal: Clack for output and prompts.
 * Otherwise (CI, piped, dry run): plain console output and no prompt.
 */
export function createCliContext(options: CliContextOptions = {}): CliContext {
  const policy = createInteractionPolicy(options);

  if (!policy.canPrompt()) {
    return { policy, output: consoleOutput };
  }

  cachedClackOutput ??= createClackOutput();
  cachedClackPrompt ??= createClackConflictPrompt();
  return { policy, output: cachedClackOutput, prompt: cachedClackPrompt };
}
