import type { DocumentMap, DocumentValue } from '../../types/index.js';

/**
 * Narrowing helpers over parsed document trees.
 */

export function isDocumentMap(value: DocumentValue | undefined): value is DocumentMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert the loose output of a YAML parser into a DocumentValue tree.
 * Timestamps become ISO strings; values with no tree representation
 * (functions, symbols, undefined) are reported through the returned path.
 */
export function toDocumentValue(value: unknown, path: string = '$'): DocumentValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toDocumentValue(item, `${path}[${index}]`));
  }
  if (typeof value === 'object') {
    const result: DocumentMap = {};
    for (const [key, child] of Object.entries(value)) {
      result[key] = toDocumentValue(child, `${path}.${key}`);
    }
    return result;
  }
  throw new TypeError(`Unsupported value at ${path}: ${typeof value}`);
}

export function readString(map: DocumentMap, key: string): string | undefined {
  const value = map[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

export function isStringArray(value: DocumentValue | undefined): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}
