import { PROCESS_TIMEOUTS } from '../../constants/index.js';
import { PackageManagerError } from '../../utils/errors.js';
import { runCommand } from '../../utils/process.js';
import type { CommandRunner } from './command-installers.js';

/**
 * Reads and writes dconf keys. Values are GVariant text, e.g. "'Adwaita-dark'".
 */
export interface DconfWriter {
  /** Current value, or null when the key is unset */
  read(key: string): Promise<string | null>;
  write(key: string, value: string): Promise<void>;
}

export class CommandDconfWriter implements DconfWriter {
  constructor(private readonly run: CommandRunner = runCommand) {}

  async read(key: string): Promise<string | null> {
    const output = await this.run('dconf', ['read', key], { timeoutMs: PROCESS_TIMEOUTS.PROBE_MS });
    if (output.exitCode !== 0) {
      throw new PackageManagerError('dconf', `read ${key} failed: ${output.stderr.trim()}`, { key });
    }
    const value = output.stdout.trim();
    return value === '' ? null : value;
  }

  async write(key: string, value: string): Promise<void> {
    const output = await this.run('dconf', ['write', key, value], { timeoutMs: PROCESS_TIMEOUTS.PROBE_MS });
    if (output.exitCode !== 0) {
      throw new PackageManagerError('dconf', `write ${key} failed: ${output.stderr.trim()}`, { key, value });
    }
  }
}
