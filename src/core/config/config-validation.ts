import type { BinaryEntry, FileEntry, LogicalConfig, PackageEntry } from '../../types/index.js';
import { PACKAGE_MANAGERS, type PackageManagerName } from '../../types/index.js';
import { SYSTEM_DESTINATION_PREFIXES } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';
import { exists } from '../../utils/fs.js';
import { expandTilde } from '../../utils/home-directory.js';
import { isRemoteSource, resolveDeclaredPath } from '../../utils/paths.js';

export type ValidationSeverity = 'error' | 'warning';

export interface ValidationIssue {
  severity: ValidationSeverity;
  /** Dotted path of the offending field, e.g. files.vimrc.mode */
  field: string;
  message: string;
  help?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

export interface ValidateConfigOptions {
  homeDir?: string;
}

const PACKAGE_NAME_RULES: Record<PackageManagerName, { pattern: RegExp; help: string }> = {
  apt: {
    pattern: /^[a-z0-9][a-z0-9\-.+]*$/,
    help: 'use only lowercase letters, numbers, hyphens, dots and plus signs'
  },
  flatpak: {
    pattern: /^[a-zA-Z0-9][a-zA-Z0-9\-._]*[a-zA-Z0-9]$/,
    help: 'use reverse domain notation like org.app.Name'
  },
  snap: {
    pattern: /^[a-z0-9][a-z0-9-]*$/,
    help: 'use only lowercase letters, numbers and hyphens'
  }
};

const DANGEROUS_FLAGS: Record<string, string> = {
  '--allow-unauthenticated': 'installs packages without authentication',
  '--force': 'bypasses safety checks',
  '--dangerous': 'bypasses snap security'
};

class IssueCollector {
  readonly errors: ValidationIssue[] = [];
  readonly warnings: ValidationIssue[] = [];

  error(field: string, message: string, help?: string): void {
    this.errors.push({ severity: 'error', field, message, ...(help && { help }) });
  }

  warn(field: string, message: string, help?: string): void {
    this.warnings.push({ severity: 'warning', field, message, ...(help && { help }) });
  }

  result(): ValidationResult {
    return { valid: this.errors.length === 0, errors: this.errors, warnings: this.warnings };
  }
}

function isLocalDebPath(name: string): boolean {
  return name.endsWith('.deb') && name.includes('/') && !name.includes('..') && !name.endsWith('/.deb');
}

function isValidPackageName(name: string, manager: PackageManagerName): boolean {
  if (manager === 'apt' && name.endsWith('.deb')) {
    return isLocalDebPath(name);
  }
  return PACKAGE_NAME_RULES[manager].pattern.test(name);
}

export function isValidFileMode(mode: string): boolean {
  return /^[0-7]{3,4}$/.test(mode);
}

function isWorldWritable(mode: string): boolean {
  const others = Number(mode[mode.length - 1]);
  return (others & 2) === 2;
}

function checkFlags(flags: readonly string[], field: string, manager: string, issues: IssueCollector): void {
  for (const flag of flags) {
    const danger = DANGEROUS_FLAGS[flag];
    if (danger) {
      issues.warn(field, `flag '${flag}' ${danger}`, 'ensure you understand the security implications');
    }
  }
  if (manager === 'flatpak' && flags.includes('--user') && flags.includes('--system')) {
    issues.error(field, 'conflicting flags: --user and --system', 'choose either --user or --system, not both');
  }
}

function checkPackages(
  manager: PackageManagerName,
  entries: readonly PackageEntry[],
  seen: Map<string, PackageManagerName>,
  issues: IssueCollector
): void {
  const field = `packages.${manager}`;
  for (const entry of entries) {
    if (entry.name.trim().length === 0) {
      issues.error(field, 'package name cannot be empty', 'remove empty entries');
      continue;
    }
    if (!isValidPackageName(entry.name, manager)) {
      issues.error(field, `invalid package name '${entry.name}'`, PACKAGE_NAME_RULES[manager].help);
    }
    const previous = seen.get(entry.name);
    if (previous !== undefined) {
      issues.warn(field, `package '${entry.name}' is already listed in ${previous}`);
    } else {
      seen.set(entry.name, manager);
    }
    checkFlags(entry.flags, field, manager, issues);
  }
}

function checkMode(mode: string | undefined, field: string, issues: IssueCollector): void {
  if (mode === undefined) {
    return;
  }
  if (!isValidFileMode(mode)) {
    issues.error(`${field}.mode`, `file mode '${mode}' must be 3 or 4 octal digits`, "e.g. '644' or '755'");
    return;
  }
  if (isWorldWritable(mode)) {
    issues.warn(`${field}.mode`, `file mode '${mode}' allows write access for others`);
  }
}

function checkDestination(destination: string, field: string, homeDir: string | undefined, issues: IssueCollector): void {
  if (destination.trim().length === 0) {
    issues.error(`${field}.destination`, 'destination path is required');
    return;
  }
  if (destination.split('/').includes('..')) {
    issues.error(`${field}.destination`, "destination path contains '..' which is not allowed");
  }
  const expanded = expandTilde(destination, homeDir);
  if (SYSTEM_DESTINATION_PREFIXES.some(prefix => expanded.startsWith(prefix))) {
    issues.warn(`${field}.destination`, `destination ${expanded} is in a system directory and may require elevated permissions`);
  }
}

async function checkFile(name: string, entry: FileEntry, homeDir: string | undefined, issues: IssueCollector): Promise<void> {
  const field = `files.${name}`;
  if (entry.source.trim().length === 0) {
    issues.error(`${field}.source`, 'source file path is required');
  } else {
    const sourcePath = resolveDeclaredPath(entry.source, entry.sourceDir, homeDir);
    if (!(await exists(sourcePath))) {
      issues.error(`${field}.source`, `source file does not exist (looked for ${sourcePath})`);
    }
  }
  checkDestination(entry.destination, field, homeDir, issues);
  checkMode(entry.mode, field, issues);
}

async function checkBinary(name: string, entry: BinaryEntry, homeDir: string | undefined, issues: IssueCollector): Promise<void> {
  const field = `binaries.${name}`;
  if (entry.source.trim().length === 0) {
    issues.error(`${field}.source`, 'binary source is required');
  } else if (!isRemoteSource(entry.source)) {
    const sourcePath = resolveDeclaredPath(entry.source, entry.sourceDir, homeDir);
    if (!(await exists(sourcePath))) {
      issues.error(`${field}.source`, `binary source must be an http(s) URL or an existing file (looked for ${sourcePath})`);
    }
  }
  checkDestination(entry.destination, field, homeDir, issues);
  checkMode(entry.mode, field, issues);
}

function checkDconf(settings: Readonly<Record<string, string>>, issues: IssueCollector): void {
  for (const key of Object.keys(settings)) {
    const field = `dconf.settings["${key}"]`;
    if (!key.startsWith('/')) {
      issues.error(field, "dconf path must start with '/'", `use "/${key}"`);
    } else if (key.includes('//')) {
      issues.warn(field, 'dconf path contains double slashes');
    }
  }
}

/**
 * Check a merged model for problems that would make convergence fail or
 * behave surprisingly. Errors block `apply`; warnings are informational.
 */
export async function validateConfig(config: LogicalConfig, options: ValidateConfigOptions = {}): Promise<ValidationResult> {
  const issues = new IssueCollector();

  for (const [manager, flags] of Object.entries(config.packageDefaults)) {
    const field = `package_defaults.${manager}`;
    if (!PACKAGE_MANAGERS.some(known => known === manager)) {
      issues.error(field, `'${manager}' is not a supported package manager`, `use one of: ${PACKAGE_MANAGERS.join(', ')}`);
    }
    checkFlags(flags, field, manager, issues);
  }

  const seen = new Map<string, PackageManagerName>();
  for (const manager of PACKAGE_MANAGERS) {
    checkPackages(manager, config.packages[manager], seen, issues);
  }

  for (const [name, entry] of Object.entries(config.files)) {
    await checkFile(name, entry, options.homeDir, issues);
  }

  for (const [name, entry] of Object.entries(config.binaries)) {
    await checkBinary(name, entry, options.homeDir, issues);
  }

  checkDconf(config.dconf.settings, issues);

  return issues.result();
}

/**
 * Throw when validation found errors; the issues travel in the error details.
 */
export function assertValid(result: ValidationResult): void {
  if (result.valid) {
    return;
  }
  const summary = result.errors.map(issue => `  ${issue.field}: ${issue.message}`).join('\n');
  throw new ValidationError(`configuration has ${result.errors.length} error(s)\n${summary}`, {
    errors: result.errors
  });
}
