import { hostname, platform } from 'os';
import type { IncludeCondition, ConditionOperator } from '../../types/index.js';
import { exists, isDirectory } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { resolveDeclaredPath } from '../../utils/paths.js';

/**
 * Facts about the running machine that include conditions are evaluated against.
 * Injected so resolution can be exercised with a fixed host.
 */
export interface SystemFacts {
  /** linux, darwin or windows */
  os: string;
  hostname: string;
  env: Readonly<Record<string, string | undefined>>;
  pathExists(path: string): Promise<boolean>;
  directoryExists(path: string): Promise<boolean>;
}

function normalizeOsName(name: NodeJS.Platform): string {
  return name === 'win32' ? 'windows' : name;
}

export function createSystemFacts(): SystemFacts {
  return {
    os: normalizeOsName(platform()),
    hostname: hostname(),
    env: process.env,
    pathExists: exists,
    directoryExists: isDirectory
  };
}

function compareValues(actual: string, expected: string, operator: ConditionOperator): boolean {
  switch (operator) {
    case 'equals':
      return actual === expected;
    case 'not_equals':
      return actual !== expected;
    case 'contains':
      return actual.includes(expected);
    case 'not_contains':
      return !actual.includes(expected);
    case 'matches':
      try {
        return new RegExp(expected).test(actual);
      } catch (error) {
        logger.debug(`Invalid pattern in include condition: ${expected}`, { error });
        return false;
      }
  }
}

/**
 * Evaluate a single condition. Filesystem conditions resolve their value
 * against the declaring document's directory.
 */
export async function evaluateCondition(
  condition: IncludeCondition,
  facts: SystemFacts,
  baseDir: string
): Promise<boolean> {
  switch (condition.type) {
    case 'os':
      return compareValues(facts.os, condition.value, condition.operator);
    case 'hostname':
      return compareValues(facts.hostname, condition.value, condition.operator);
    case 'env': {
      const separator = condition.value.indexOf('=');
      if (separator === -1) {
        // Bare NAME tests that the variable is set
        return facts.env[condition.value] !== undefined;
      }
      const name = condition.value.slice(0, separator);
      const expected = condition.value.slice(separator + 1);
      return compareValues(facts.env[name] ?? '', expected, condition.operator);
    }
    case 'file_exists':
      return facts.pathExists(resolveDeclaredPath(condition.value, baseDir));
    case 'dir_exists':
      return facts.directoryExists(resolveDeclaredPath(condition.value, baseDir));
  }
}

/**
 * All conditions must hold; an empty list always holds.
 */
export async function evaluateConditions(
  conditions: readonly IncludeCondition[],
  facts: SystemFacts,
  baseDir: string
): Promise<boolean> {
  for (const condition of conditions) {
    if (!(await evaluateCondition(condition, facts, baseDir))) {
      return false;
    }
  }
  return true;
}
