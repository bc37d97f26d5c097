import { Command } from 'commander';
import type { CommandResult } from '../types/index.js';
import { runConvergence, type ConvergenceResult } from '../core/apply/convergence.js';
import { createCliContext } from '../cli/context.js';
import { buildConvergenceOptions, resolveCommandCwd, type RunCommandOptions } from '../cli/convergence-options.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatConvergenceSummary, formatPathForDisplay } from '../utils/formatters.js';

/**
 * Main apply command handler
 */
async function applyCommand(
  configArg: string | undefined,
  options: RunCommandOptions,
  cwd: string
): Promise<CommandResult<ConvergenceResult>> {
  const cli = createCliContext(options);
  const convergenceOptions = await buildConvergenceOptions(configArg, options, cli, cwd);

  cli.output.step(
    `${options.dryRun ? 'Planning' : 'Applying'} ${formatPathForDisplay(convergenceOptions.configPath, cwd)}`
  );
  const result = await runConvergence(convergenceOptions);

  cli.output.note(formatConvergenceSummary(result).join('\n'), result.dryRun ? 'Dry run' : 'Summary');
  cli.output.success(result.dryRun ? 'Dry run complete; nothing was changed' : 'System converged');
  return { success: true, data: result };
}

/**
 * Setup apply command
 */
export function setupApplyCommand(program: Command): void {
  program
    .command('apply')
    .description('Converge this machine to the configuration: packages, files, binaries and dconf settings')
    .argument('[config]', 'root configuration file (default: searched in the usual locations)')
    .option('--dry-run', 'report what would change without changing anything')
    .option('--no-remove', 'keep packages and files that are no longer declared')
    .option('--no-cache', 'resolve from source and re-probe every package')
    .option('-i, --interactive', 'ask before replacing any existing file')
    .action(
      withErrorHandling(async (configArg: string | undefined, options: RunCommandOptions, command: Command) => {
        const result = await applyCommand(configArg, options, resolveCommandCwd(command));
        if (!result.success) {
          throw new Error(result.error || 'Apply operation failed');
        }
      })
    );
}
