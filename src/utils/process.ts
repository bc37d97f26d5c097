import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger } from './logger.js';

const execFileAsync = promisify(execFile);

export interface CommandOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

function readOutput(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf8');
  }
  return '';
}

/**
 * Run a command without a shell and report its exit status. A non-zero exit
 * is returned rather than thrown; failing to start the command (missing
 * binary, timeout) is thrown.
 */
export async function runCommand(command: string, args: string[], options: RunCommandOptions = {}): Promise<CommandOutput> {
  logger.debug(`Running: ${command} ${args.join(' ')}`);
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      timeout: options.timeoutMs,
      env: options.env,
      maxBuffer: 16 * 1024 * 1024
    });
    return { exitCode: 0, stdout, stderr };
  } catch (error) {
    if (error instanceof Error && 'code' in error && typeof error.code === 'number') {
      return {
        exitCode: error.code,
        stdout: 'stdout' in error ? readOutput(error.stdout) : '',
        stderr: 'stderr' in error ? readOutput(error.stderr) : ''
      };
    }
    throw error;
  }
}
