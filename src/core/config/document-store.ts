import { dirname, resolve } from 'path';
import yaml from 'js-yaml';
import type { ConfigDocument, DocumentMap } from '../../types/index.js';
import { ConfigError, getErrorMessage, IncludeError } from '../../utils/errors.js';
import { getModTimeNs, readTextFile, isFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { isDocumentMap, toDocumentValue } from './document-values.js';
import { parseIncludeDirectives } from './include-directives.js';

/**
 * Loads single configuration documents from disk.
 */
export interface DocumentStore {
  load(path: string): Promise<ConfigDocument>;
}

/**
 * Parse document text into a ConfigDocument. Exposed separately from the
 * store so content that never touched disk can be parsed the same way.
 */
export function parseDocument(path: string, raw: string): ConfigDocument {
  let parsed: unknown;
  try {
    parsed = yaml.load(raw, { filename: path });
  } catch (error) {
    throw new ConfigError(`Failed to parse ${path}: ${getErrorMessage(error)}`, { path, error });
  }

  // An empty file is an empty document
  const tree = toDocumentValue(parsed ?? {});
  if (!isDocumentMap(tree)) {
    throw new ConfigError(`${path}: top level must be a mapping`, { path });
  }

  const data: DocumentMap = tree;
  return {
    path,
    dir: dirname(path),
    raw,
    data,
    includes: parseIncludeDirectives(data.includes, path)
  };
}

export class FileDocumentStore implements DocumentStore {
  async load(path: string): Promise<ConfigDocument> {
    const absolutePath = resolve(path);
    if (!(await isFile(absolutePath))) {
      throw new IncludeError('NotFound', `configuration file not found: ${absolutePath}`, { path: absolutePath });
    }

    // Taken before the read; an edit during the read leaves a newer mtime than this
    const modTimeNs = (await getModTimeNs(absolutePath)).toString();
    const raw = await readTextFile(absolutePath);
    logger.debug(`Loaded configuration document: ${absolutePath}`);
    return { ...parseDocument(absolutePath, raw), modTimeNs };
  }
}
