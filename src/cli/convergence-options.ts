import { resolve } from 'path';
import type { Command } from 'commander';
import type { ConvergenceOptions } from '../core/apply/convergence.js';
import { findConfigFile } from '../core/apply/config-locator.js';
import { ensureHostformDirectories, getHostformDirectories } from '../core/directory.js';
import { createCommandInstallers } from '../core/packages/command-installers.js';
import { CommandDconfWriter } from '../core/packages/dconf-writer.js';
import type { CliContext } from './context.js';

/**
 * Options shared by apply, plan and validate
 */
export interface RunCommandOptions {
  dryRun?: boolean;
  /** commander sets this to false for --no-remove */
  remove?: boolean;
  /** commander sets this to false for --no-cache */
  cache?: boolean;
  interactive?: boolean;
}

/**
 * Working directory from the global --cwd option, else the process cwd
 */
export function resolveCommandCwd(command: Command): string {
  const { cwd } = command.optsWithGlobals();
  return typeof cwd === 'string' ? resolve(process.cwd(), cwd) : process.cwd();
}

/**
 * Assemble everything a convergence run needs from command-line options:
 * the located root document, the state and cache roots, and the
 * command-line package installers and dconf writer.
 */
export async function buildConvergenceOptions(
  configArg: string | undefined,
  options: RunCommandOptions,
  cli: CliContext,
  cwd: string
): Promise<ConvergenceOptions> {
  const configPath = await findConfigFile(configArg, { cwd });
  const directories = await ensureHostformDirectories(getHostformDirectories());

  return {
    configPath,
    directories,
    installers: createCommandInstallers(),
    dconf: new CommandDconfWriter(),
    output: cli.output,
    ...(cli.prompt && { prompt: cli.prompt }),
    dryRun: options.dryRun ?? false,
    remove: options.remove ?? true,
    useCache: options.cache ?? true,
    interactive: cli.policy.promptsEveryConflict(),
    cwd
  };
}
