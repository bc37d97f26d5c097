import { Command } from 'commander';
import type { CommandResult } from '../types/index.js';
import { loadConfig } from '../core/apply/config-loader.js';
import { findConfigFile } from '../core/apply/config-locator.js';
import { validateConfig, type ValidationResult } from '../core/config/config-validation.js';
import { IncludeResolver } from '../core/config/include-resolver.js';
import { consoleOutput } from '../core/ports/index.js';
import { resolveCommandCwd } from '../cli/convergence-options.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatCount, formatPathForDisplay, formatValidationIssues } from '../utils/formatters.js';

/**
 * Resolve, merge and validate without touching caches or state
 */
async function validateCommand(configArg: string | undefined, cwd: string): Promise<CommandResult<ValidationResult>> {
  const output = consoleOutput;
  const configPath = await findConfigFile(configArg, { cwd });
  const { config, paths } = await loadConfig(configPath, { resolver: new IncludeResolver() });
  const result = await validateConfig(config);

  output.info(`Checked ${formatPathForDisplay(configPath, cwd)} (${formatCount(paths.length, 'document')})`);
  const issues = [...result.errors, ...result.warnings];
  if (issues.length > 0) {
    output.message(formatValidationIssues(issues));
  }

  if (!result.valid) {
    return {
      success: false,
      error: `Configuration is invalid: ${formatCount(result.errors.length, 'error')}`,
      data: result
    };
  }

  output.success(
    result.warnings.length > 0
      ? `Configuration is valid (${formatCount(result.warnings.length, 'warning')})`
      : 'Configuration is valid'
  );
  return { success: true, data: result };
}

/**
 * Setup validate command
 */
export function setupValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check the configuration and its includes for errors')
    .argument('[config]', 'root configuration file (default: searched in the usual locations)')
    .action(
      withErrorHandling(async (configArg: string | undefined, _options: Record<string, never>, command: Command) => {
        const result = await validateCommand(configArg, resolveCommandCwd(command));
        if (!result.success) {
          throw new Error(result.error || 'Validation failed');
        }
      })
    );
}
