import type { PackageManagerName } from '../../types/index.js';
import { PROCESS_TIMEOUTS } from '../../constants/index.js';
import { PackageManagerError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { runCommand, type CommandOutput } from '../../utils/process.js';
import type { PackageInstaller, PackageInstallers } from './package-installer.js';

export type CommandRunner = (command: string, args: string[], options?: { timeoutMs?: number }) => Promise<CommandOutput>;

/**
 * Command lines for one package manager
 */
interface ManagerCommands {
  probe(name: string): [string, string[]];
  isInstalledOutput(output: CommandOutput): boolean;
  /** One command per name when the tool only takes a single package */
  install(names: string[], flags: string[]): Array<[string, string[]]>;
  remove(names: string[]): Array<[string, string[]]>;
}

const APT_COMMANDS: ManagerCommands = {
  probe: name => ['dpkg', ['-s', name]],
  isInstalledOutput: output => output.exitCode === 0 && output.stdout.includes('Status: install ok installed'),
  install: (names, flags) => [['apt', ['install', ...flags, ...names]]],
  remove: names => [['apt', ['remove', '-y', ...names]]]
};

const FLATPAK_COMMANDS: ManagerCommands = {
  probe: name => ['flatpak', ['info', name]],
  isInstalledOutput: output => output.exitCode === 0,
  install: (names, flags) => [['flatpak', ['install', ...flags, ...names]]],
  remove: names => names.map((name): [string, string[]] => ['flatpak', ['uninstall', '--assumeyes', name]])
};

const SNAP_COMMANDS: ManagerCommands = {
  probe: name => ['snap', ['list', name]],
  isInstalledOutput: output => output.exitCode === 0,
  install: (names, flags) => names.map((name): [string, string[]] => ['snap', ['install', ...flags, name]]),
  remove: names => names.map((name): [string, string[]] => ['snap', ['remove', name]])
};

/**
 * Drives a package manager through its command-line tool
 */
export class CommandPackageInstaller implements PackageInstaller {
  constructor(
    readonly manager: PackageManagerName,
    private readonly commands: ManagerCommands,
    private readonly run: CommandRunner = runCommand
  ) {}

  async isInstalled(name: string): Promise<boolean> {
    const [command, args] = this.commands.probe(name);
    try {
      const output = await this.run(command, args, { timeoutMs: PROCESS_TIMEOUTS.PROBE_MS });
      return this.commands.isInstalledOutput(output);
    } catch (error) {
      throw new PackageManagerError(this.manager, `failed to check whether ${name} is installed`, { name, error });
    }
  }

  async install(names: string[], flags: string[]): Promise<void> {
    if (names.length === 0) {
      return;
    }
    for (const [command, args] of this.commands.install(names, flags)) {
      await this.execute(command, args, 'install');
    }
    logger.info(`${this.manager}: installed ${names.join(', ')}`);
  }

  async remove(names: string[]): Promise<void> {
    if (names.length === 0) {
      return;
    }
    for (const [command, args] of this.commands.remove(names)) {
      await this.execute(command, args, 'remove');
    }
    logger.info(`${this.manager}: removed ${names.join(', ')}`);
  }

  private async execute(command: string, args: string[], action: string): Promise<void> {
    let output: CommandOutput;
    try {
      output = await this.run(command, args, { timeoutMs: PROCESS_TIMEOUTS.INSTALL_MS });
    } catch (error) {
      throw new PackageManagerError(this.manager, `could not run ${command}`, { command, args, error });
    }
    if (output.exitCode !== 0) {
      throw new PackageManagerError(
        this.manager,
        `${action} failed (exit ${output.exitCode}): ${output.stderr.trim() || output.stdout.trim()}`,
        { command, args, exitCode: output.exitCode }
      );
    }
  }
}

export function createCommandInstallers(run: CommandRunner = runCommand): PackageInstallers {
  return {
    apt: new CommandPackageInstaller('apt', APT_COMMANDS, run),
    flatpak: new CommandPackageInstaller('flatpak', FLATPAK_COMMANDS, run),
    snap: new CommandPackageInstaller('snap', SNAP_COMMANDS, run)
  };
}
