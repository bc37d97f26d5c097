/**
 * Include directive parsing.
 *
 * Accepted shapes under the `includes` key:
 *
 *   includes:
 *     - base                       # plain path (directory, file, or extensionless)
 *     - path: desktop/
 *       optional: true
 *       conditions:
 *         - type: env
 *           value: XDG_CURRENT_DESKTOP=GNOME
 *     - glob: hosts/*.yaml         # explicit glob; a `path` with * ? [ is a glob too
 *       optional: true
 */

import type {
  ConditionOperator,
  ConditionType,
  DocumentValue,
  IncludeCondition,
  IncludeDirective
} from '../../types/index.js';
import { IncludeError } from '../../utils/errors.js';
import { isGlobPattern } from '../../utils/paths.js';
import { isDocumentMap } from './document-values.js';

export const CONDITION_TYPES: readonly ConditionType[] = ['os', 'hostname', 'env', 'file_exists', 'dir_exists'];

export const CONDITION_OPERATORS: readonly ConditionOperator[] = [
  'equals',
  'not_equals',
  'contains',
  'not_contains',
  'matches'
];

function isConditionType(value: string): value is ConditionType {
  return CONDITION_TYPES.some(type => type === value);
}

function isConditionOperator(value: string): value is ConditionOperator {
  return CONDITION_OPERATORS.some(operator => operator === value);
}

function invalid(documentPath: string, index: number, reason: string): IncludeError {
  return new IncludeError('InvalidDirective', `${documentPath}: include #${index + 1} ${reason}`, {
    documentPath,
    index
  });
}

function parseCondition(raw: DocumentValue, documentPath: string, index: number): IncludeCondition {
  if (!isDocumentMap(raw)) {
    throw invalid(documentPath, index, 'has a condition that is not a mapping');
  }

  const type = raw.type;
  if (typeof type !== 'string' || !isConditionType(type)) {
    throw invalid(
      documentPath,
      index,
      `has an invalid condition type '${String(type)}' (valid types: ${CONDITION_TYPES.join(', ')})`
    );
  }

  const operator = raw.operator ?? 'equals';
  if (typeof operator !== 'string' || !isConditionOperator(operator)) {
    throw invalid(
      documentPath,
      index,
      `has an invalid condition operator '${String(operator)}' (valid operators: ${CONDITION_OPERATORS.join(', ')})`
    );
  }

  const value = raw.value;
  if ((typeof value !== 'string' && typeof value !== 'number') || String(value).length === 0) {
    throw invalid(documentPath, index, `has a '${type}' condition without a value`);
  }

  return { type, operator, value: String(value) };
}

function parseDirective(raw: DocumentValue, documentPath: string, index: number): IncludeDirective {
  if (typeof raw === 'string') {
    if (raw.trim().length === 0) {
      throw invalid(documentPath, index, 'is an empty path');
    }
    return isGlobPattern(raw)
      ? { kind: 'glob', pattern: raw, optional: false, conditions: [] }
      : { kind: 'path', path: raw, optional: false, conditions: [] };
  }

  if (!isDocumentMap(raw)) {
    throw invalid(documentPath, index, 'must be a path string or a mapping');
  }

  const optional = raw.optional ?? false;
  if (typeof optional !== 'boolean') {
    throw invalid(documentPath, index, "has a non-boolean 'optional'");
  }

  const rawConditions = raw.conditions ?? [];
  if (!Array.isArray(rawConditions)) {
    throw invalid(documentPath, index, "has 'conditions' that is not a list");
  }
  const conditions = rawConditions.map(condition => parseCondition(condition, documentPath, index));

  const description = typeof raw.description === 'string' ? raw.description : undefined;

  const hasPath = raw.path !== undefined;
  const hasGlob = raw.glob !== undefined;
  if (hasPath === hasGlob) {
    throw invalid(documentPath, index, "must declare exactly one of 'path' or 'glob'");
  }

  const target = hasGlob ? raw.glob : raw.path;
  if (typeof target !== 'string' || target.trim().length === 0) {
    throw invalid(documentPath, index, `has an empty or non-string '${hasGlob ? 'glob' : 'path'}'`);
  }

  if (hasGlob || isGlobPattern(target)) {
    return { kind: 'glob', pattern: target, optional, conditions, ...(description && { description }) };
  }
  return { kind: 'path', path: target, optional, conditions, ...(description && { description }) };
}

/**
 * Parse the `includes` section of a document. Absent means no includes.
 */
export function parseIncludeDirectives(raw: DocumentValue | undefined, documentPath: string): IncludeDirective[] {
  if (raw === undefined || raw === null) {
    return [];
  }
  if (!Array.isArray(raw)) {
    throw new IncludeError('InvalidDirective', `${documentPath}: 'includes' must be a list`, { documentPath });
  }
  return raw.map((entry, index) => parseDirective(entry, documentPath, index));
}

export function describeDirective(directive: IncludeDirective): string {
  return directive.kind === 'glob' ? directive.pattern : directive.path;
}
