import { isAbsolute, relative } from 'path';
import type { ManagedResource, PackageManagerName, Plan } from '../types/index.js';
import { PACKAGE_MANAGERS } from '../types/index.js';
import type { ValidationIssue } from '../core/config/config-validation.js';
import type { ConvergenceResult, ResourceSummary } from '../core/apply/convergence.js';
import type { DeployStatus } from '../core/deploy/resource-deployment.js';
import type { CacheStats } from '../core/cache/config-cache.js';
import { normalizePathWithTilde } from './home-directory.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display to the user: tilde notation under
 * the home directory, relative inside cwd, absolute otherwise.
 *
 * @example
 * formatPathForDisplay('/home/user/.bashrc', '/tmp', '/home/user') // => '~/.bashrc'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd(), homeDir?: string): string {
  if (path.startsWith('~') || !isAbsolute(path)) {
    return path;
  }

  const tildePath = normalizePathWithTilde(path, homeDir);
  if (tildePath.startsWith('~')) {
    return tildePath;
  }

  const relativePath = relative(cwd, path);
  if (relativePath && !relativePath.startsWith('..')) {
    return relativePath;
  }
  return path;
}

/**
 * Format a count with a singular or plural noun
 */
export function formatCount(count: number, singular: string, plural: string = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

/**
 * Format file size in appropriate units (B, KB or MB)
 */
export function formatFileSize(bytes: number): string {
  const mb = bytes / (1024 * 1024);
  if (mb >= 1) {
    return `${mb.toFixed(2)}MB`;
  }
  if (bytes < 1024) {
    return `${bytes}B`;
  }
  return `${(bytes / 1024).toFixed(2)}KB`;
}

function packageLines(manager: PackageManagerName, plan: Plan): string[] {
  const { toInstall, toRemove, unchanged } = plan.packages[manager];
  const lines: string[] = [];
  if (toInstall.length > 0) {
    lines.push(`  + ${manager}: ${toInstall.join(', ')}`);
  }
  if (toRemove.length > 0) {
    lines.push(`  - ${manager}: ${toRemove.join(', ')}`);
  }
  if (unchanged.length > 0) {
    lines.push(`  = ${manager}: ${formatCount(unchanged.length, 'package')} already managed`);
  }
  return lines;
}

/**
 * Render a plan as indented lines; `+` adds, `-` removes, `=` leaves alone.
 */
export function formatPlan(plan: Plan, cwd?: string, homeDir?: string): string {
  const lines: string[] = [];

  const packages = PACKAGE_MANAGERS.flatMap(manager => packageLines(manager, plan));
  if (packages.length > 0) {
    lines.push('Packages:', ...packages);
  }

  const files = [
    ...plan.files.toDeploy.map(({ name, entry }) => `  + ${name} -> ${entry.destination}`),
    ...plan.files.toRemove.map(file => `  - ${file.name} (${formatPathForDisplay(file.destinationPath, cwd, homeDir)})`)
  ];
  if (files.length > 0) {
    lines.push('Files:', ...files);
  }

  const binaries = [
    ...plan.binaries.toDeploy.map(({ name, entry }) => `  + ${name} -> ${entry.destination}`),
    ...plan.binaries.toRemove.map(
      binary => `  - ${binary.name} (${formatPathForDisplay(binary.destinationPath, cwd, homeDir)})`
    )
  ];
  if (binaries.length > 0) {
    lines.push('Binaries:', ...binaries);
  }

  return lines.length > 0 ? lines.join('\n') : 'Nothing to do';
}

/**
 * One line per validation issue, with the hint indented below it
 */
export function formatValidationIssues(issues: readonly ValidationIssue[]): string {
  return issues
    .map(issue => {
      const line = `${issue.severity === 'error' ? '✗' : '⚠'} ${issue.field}: ${issue.message}`;
      return issue.help ? `${line}\n    ${issue.help}` : line;
    })
    .join('\n');
}

function formatResourceLine(label: string, summary: ResourceSummary<ManagedResource>, dryRun: boolean): string {
  const count = (status: DeployStatus): number =>
    summary.deployments.filter(outcome => outcome.status === status).length;
  const removed = summary.removals.filter(outcome => outcome.status === (dryRun ? 'planned' : 'removed')).length;
  const refused = summary.removals.filter(outcome => outcome.status === 'refused').length;

  return (
    `${label}: ${count(dryRun ? 'planned' : 'deployed')} ${dryRun ? 'to deploy' : 'deployed'}, ` +
    `${count('unchanged')} unchanged, ${count('skipped')} skipped, ` +
    `${removed} ${dryRun ? 'to remove' : 'removed'}` +
    (refused > 0 ? `, ${refused} kept (unsafe to remove)` : '')
  );
}

/**
 * Summary lines for a finished (or dry) convergence run
 */
export function formatConvergenceSummary(result: ConvergenceResult): string[] {
  const verb = (done: string, planned: string): string => (result.dryRun ? planned : done);
  const { packages, files, binaries, dconf } = result.summaries;
  const lines: string[] = [];

  const installed = packages.reduce((sum, summary) => sum + summary.installed.length, 0);
  const removed = packages.reduce((sum, summary) => sum + summary.removed.length, 0);
  lines.push(
    `Packages: ${formatCount(installed, 'package')} ${verb('installed', 'to install')}, ` +
      `${removed} ${verb('removed', 'to remove')}`
  );

  lines.push(formatResourceLine('Files', files, result.dryRun));
  lines.push(formatResourceLine('Binaries', binaries, result.dryRun));

  if (dconf.changed.length > 0 || dconf.unchanged.length > 0) {
    lines.push(`dconf: ${formatCount(dconf.changed.length, 'key')} ${verb('written', 'to write')}, ${dconf.unchanged.length} unchanged`);
  }

  return lines;
}

/**
 * Cache statistics for `cache stats`
 */
export function formatCacheStats(stats: CacheStats, homeDir?: string): string {
  return [
    `Directory: ${normalizePathWithTilde(stats.cacheDir, homeDir)}`,
    `Files: ${stats.totalFiles}`,
    `Size: ${formatFileSize(stats.totalSize)}`,
    `Last modified: ${stats.lastModified ? stats.lastModified.toISOString() : 'never'}`
  ].join('\n');
}
