import { isAbsolute, join, resolve, sep } from 'path';
import { minimatch } from 'minimatch';
import type { ConfigDocument, GlobIncludeDirective, IncludeDirective, PathIncludeDirective, ResolvedConfigSet } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { IncludeError } from '../../utils/errors.js';
import { isDirectory, isFile, walkEntries } from '../../utils/fs.js';
import { getHomeDirectory } from '../../utils/home-directory.js';
import { logger } from '../../utils/logger.js';
import { hasYamlExtension, isGlobPattern, resolveDeclaredPath } from '../../utils/paths.js';
import { FileDocumentStore, type DocumentStore } from './document-store.js';
import { createSystemFacts, evaluateConditions, type SystemFacts } from './include-conditions.js';
import { describeDirective } from './include-directives.js';

export interface IncludeResolverOptions {
  store?: DocumentStore;
  facts?: SystemFacts;
  homeDir?: string;
}

/**
 * One document on the traversal stack: the directives still to visit and the
 * concrete targets of the directive currently being expanded.
 */
interface TraversalFrame {
  document: ConfigDocument;
  nextDirective: number;
  pendingTargets: string[];
}

/**
 * Expands include directives into the ordered, de-duplicated list of documents
 * to merge. Depth-first and pre-order: a document's own includes are expanded
 * before its next sibling. A path reached twice is skipped without error, which
 * terminates cycles and collapses diamond-shaped include graphs.
 */
export class IncludeResolver {
  private readonly store: DocumentStore;
  private readonly facts: SystemFacts;
  private readonly homeDir: string;

  constructor(options: IncludeResolverOptions = {}) {
    this.store = options.store ?? new FileDocumentStore();
    this.facts = options.facts ?? createSystemFacts();
    this.homeDir = options.homeDir ?? getHomeDirectory();
  }

  async resolve(rootPath: string): Promise<ResolvedConfigSet> {
    const root = await this.store.load(resolve(rootPath));
    const visited = new Set<string>([root.path]);
    const documents: ConfigDocument[] = [root];
    const stack: TraversalFrame[] = [{ document: root, nextDirective: 0, pendingTargets: [] }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];

      const target = frame.pendingTargets.shift();
      if (target !== undefined) {
        if (visited.has(target)) {
          logger.debug(`Include already resolved, skipping: ${target}`, { from: frame.document.path });
          continue;
        }
        visited.add(target);
        const document = await this.store.load(target);
        documents.push(document);
        stack.push({ document, nextDirective: 0, pendingTargets: [] });
        continue;
      }

      if (frame.nextDirective >= frame.document.includes.length) {
        stack.pop();
        continue;
      }

      const directive = frame.document.includes[frame.nextDirective];
      frame.nextDirective += 1;
      frame.pendingTargets = await this.expandDirective(directive, frame.document);
    }

    logger.debug(`Resolved ${documents.length} configuration document(s)`, {
      paths: documents.map(document => document.path)
    });

    return {
      paths: documents.map(document => document.path),
      documents,
      visited
    };
  }

  private async expandDirective(directive: IncludeDirective, from: ConfigDocument): Promise<string[]> {
    if (!(await evaluateConditions(directive.conditions, this.facts, from.dir))) {
      logger.debug(`Include conditions not met, skipping: ${describeDirective(directive)}`, { from: from.path });
      return [];
    }

    return directive.kind === 'glob'
      ? this.expandGlob(directive, from)
      : this.expandPath(directive, from);
  }

  private async expandPath(directive: PathIncludeDirective, from: ConfigDocument): Promise<string[]> {
    const resolved = resolveDeclaredPath(directive.path, from.dir, this.homeDir);
    const target = await findDocumentFile(resolved);

    if (target === null) {
      if (directive.optional) {
        logger.debug(`Optional include not found, skipping: ${directive.path}`, { from: from.path });
        return [];
      }
      throw new IncludeError('NotFound', `${from.path}: include '${directive.path}' not found (looked at ${resolved})`, {
        documentPath: from.path,
        include: directive.path,
        resolved
      });
    }

    return [target];
  }

  private async expandGlob(directive: GlobIncludeDirective, from: ConfigDocument): Promise<string[]> {
    const pattern = resolveDeclaredPath(directive.pattern, from.dir, this.homeDir);
    const matches = await matchGlob(pattern);

    const targets: string[] = [];
    for (const match of matches) {
      if (await isDirectory(match)) {
        const defaultFile = join(match, FILE_PATTERNS.DEFAULT_INCLUDE);
        if (await isFile(defaultFile)) {
          targets.push(defaultFile);
        }
      } else if (hasYamlExtension(match)) {
        targets.push(match);
      }
    }

    if (targets.length === 0 && !directive.optional) {
      throw new IncludeError('UnresolvedGlob', `${from.path}: no configuration files match '${directive.pattern}'`, {
        documentPath: from.path,
        pattern: directive.pattern
      });
    }

    return targets;
  }
}

/**
 * Map a resolved include path to the document file it denotes: a directory
 * means its default.yaml, a path without a YAML extension may omit `.yaml`.
 */
export async function findDocumentFile(resolved: string): Promise<string | null> {
  if (await isDirectory(resolved)) {
    const defaultFile = join(resolved, FILE_PATTERNS.DEFAULT_INCLUDE);
    return (await isFile(defaultFile)) ? defaultFile : null;
  }

  if (await isFile(resolved)) {
    return resolved;
  }

  if (!hasYamlExtension(resolved)) {
    const withExtension = resolved + FILE_PATTERNS.DEFAULT_EXTENSION;
    if (await isFile(withExtension)) {
      return withExtension;
    }
  }

  return null;
}

/**
 * The longest leading directory of an absolute pattern that holds no glob
 * syntax, and how many levels below it the pattern can reach
 */
function splitGlob(pattern: string): { base: string; maxDepth?: number } {
  const segments = pattern.split(sep);
  const literal: string[] = [];
  for (const segment of segments) {
    if (isGlobPattern(segment)) {
      break;
    }
    literal.push(segment);
  }
  const joined = literal.join(sep);
  const base = joined === '' && isAbsolute(pattern) ? sep : joined;
  const rest = segments.slice(literal.length);
  return rest.some(segment => segment.includes('**')) ? { base } : { base, maxDepth: rest.length };
}

/**
 * Absolute paths matching the pattern, sorted lexicographically.
 * Directories the pattern cannot reach are not read; unreadable ones match nothing.
 */
export async function matchGlob(pattern: string): Promise<string[]> {
  const { base, maxDepth } = splitGlob(pattern);
  if (!(await isDirectory(base))) {
    return [];
  }

  const matches: string[] = [];
  for await (const entry of walkEntries(base, { skipUnreadable: true, ...(maxDepth !== undefined && { maxDepth }) })) {
    if (minimatch(entry.path, pattern)) {
      matches.push(entry.path);
    }
  }

  return matches.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}
