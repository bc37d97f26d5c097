import { Command } from 'commander';
import type { CommandResult, Plan } from '../types/index.js';
import { planConvergence } from '../core/apply/convergence.js';
import { createCliContext } from '../cli/context.js';
import { buildConvergenceOptions, resolveCommandCwd, type RunCommandOptions } from '../cli/convergence-options.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatCount, formatPlan } from '../utils/formatters.js';

/**
 * Resolve the configuration and print the change set against the applied
 * state. Live package status is not probed.
 */
async function planCommand(configArg: string | undefined, options: RunCommandOptions, cwd: string): Promise<CommandResult<Plan>> {
  const cli = createCliContext({ dryRun: true });
  const convergenceOptions = await buildConvergenceOptions(configArg, { ...options, dryRun: true }, cli, cwd);

  const { plan, configPaths, fromCache } = await planConvergence(convergenceOptions);

  cli.output.info(
    `Resolved ${formatCount(configPaths.length, 'document')}${fromCache ? ' (cached)' : ''}`
  );
  cli.output.note(formatPlan(plan, cwd), 'Plan');
  return { success: true, data: plan };
}

/**
 * Setup plan command
 */
export function setupPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('Show what apply would change, compared with the last applied state')
    .argument('[config]', 'root configuration file (default: searched in the usual locations)')
    .option('--no-cache', 'resolve from source')
    .action(
      withErrorHandling(async (configArg: string | undefined, options: RunCommandOptions, command: Command) => {
        const result = await planCommand(configArg, options, resolveCommandCwd(command));
        if (!result.success) {
          throw new Error(result.error || 'Plan failed');
        }
      })
    );
}
