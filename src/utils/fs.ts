import { promises as fs, constants as fsConstants, Stats, BigIntStats } from 'fs';
import { join, dirname, basename } from 'path';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError, isErrnoException } from './errors.js';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a path is a file
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * lstat that reports a missing path as null instead of throwing
 */
export async function lstatOrNull(path: string): Promise<Stats | null> {
  try {
    return await fs.lstat(path);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw new FileSystemError(`Failed to inspect: ${path}`, { path, error });
  }
}

/**
 * Modification time in nanoseconds; exact enough to compare bit-for-bit
 */
export async function getModTimeNs(path: string): Promise<bigint> {
  try {
    const stats: BigIntStats = await fs.stat(path, { bigint: true });
    return stats.mtimeNs;
  } catch (error) {
    throw new FileSystemError(`Failed to get stats for: ${path}`, { path, error });
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text next to the target and rename it into place, so readers only
 * ever see the previous content or the complete new content.
 */
export async function writeTextFileAtomic(path: string, content: string): Promise<void> {
  const tempPath = join(dirname(path), `.${basename(path)}.${process.pid}.${Date.now()}.tmp`);
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.rename(tempPath, path);
    logger.debug(`Wrote file atomically: ${path}`);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Write object to JSON file atomically
 */
export async function writeJsonFileAtomic(path: string, data: unknown, indent: number = 2): Promise<void> {
  await writeTextFileAtomic(path, JSON.stringify(data, null, indent) + '\n');
}

/**
 * Copy a file from source to destination
 */
export async function copyFile(src: string, dest: string): Promise<void> {
  try {
    await ensureDir(dirname(dest));
    await fs.copyFile(src, dest);
    logger.debug(`Copied file: ${src} -> ${dest}`);
  } catch (error) {
    throw new FileSystemError(`Failed to copy file: ${src} -> ${dest}`, { src, dest, error });
  }
}

/**
 * Create a symbolic link at dest pointing to src
 */
export async function createSymlink(src: string, dest: string): Promise<void> {
  try {
    await ensureDir(dirname(dest));
    await fs.symlink(src, dest);
    logger.debug(`Linked: ${dest} -> ${src}`);
  } catch (error) {
    throw new FileSystemError(`Failed to create symlink: ${dest} -> ${src}`, { src, dest, error });
  }
}

export async function readLink(path: string): Promise<string> {
  try {
    return await fs.readlink(path);
  } catch (error) {
    throw new FileSystemError(`Failed to read symlink: ${path}`, { path, error });
  }
}

/**
 * Remove a file, link or directory; a missing path is not an error
 */
export async function remove(path: string): Promise<void> {
  try {
    const stats = await fs.lstat(path);
    if (stats.isDirectory()) {
      await fs.rm(path, { recursive: true });
    } else {
      await fs.unlink(path);
    }
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      // File doesn't exist, which is fine
      return;
    }
    throw new FileSystemError(`Failed to remove: ${path}`, { path, error });
  }
}

/**
 * Rename a file (or link) from source path to destination path.
 */
export async function renamePath(srcPath: string, destPath: string): Promise<void> {
  try {
    await ensureDir(dirname(destPath));
    await fs.rename(srcPath, destPath);
    logger.debug(`Renamed: ${srcPath} -> ${destPath}`);
  } catch (error) {
    throw new FileSystemError(`Failed to rename: ${srcPath} -> ${destPath}`, { srcPath, destPath, error });
  }
}

export async function chmod(path: string, mode: number): Promise<void> {
  try {
    await fs.chmod(path, mode);
  } catch (error) {
    throw new FileSystemError(`Failed to set permissions on: ${path}`, { path, mode, error });
  }
}

export interface WalkOptions {
  /** Levels below the starting directory to descend into; entries directly inside it are level 1 */
  maxDepth?: number;
  /** Treat directories that cannot be read as empty instead of failing */
  skipUnreadable?: boolean;
}

/**
 * Recursively walk through a directory and yield all files and directories
 */
export async function* walkEntries(
  dirPath: string,
  options: WalkOptions = {}
): AsyncGenerator<{ path: string; isDirectory: boolean }> {
  yield* walkLevel(dirPath, 1, options);
}

async function* walkLevel(
  dirPath: string,
  depth: number,
  options: WalkOptions
): AsyncGenerator<{ path: string; isDirectory: boolean }> {
  if (options.maxDepth !== undefined && depth > options.maxDepth) {
    return;
  }

  let entries;
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    if (options.skipUnreadable) {
      logger.debug(`Skipping unreadable directory: ${dirPath}`);
      return;
    }
    throw new FileSystemError(`Failed to walk directory: ${dirPath}`, { dirPath, error });
  }

  for (const entry of entries) {
    // Filter out junk files like .DS_Store, Thumbs.db, etc.
    if (isJunk(entry.name)) {
      continue;
    }

    const fullPath = join(dirPath, entry.name);
    if (entry.isDirectory()) {
      yield { path: fullPath, isDirectory: true };
      yield* walkLevel(fullPath, depth + 1, options);
    } else if (entry.isFile() || entry.isSymbolicLink()) {
      yield { path: fullPath, isDirectory: false };
    }
  }
}

/**
 * Get file stats
 */
export async function getStats(path: string): Promise<Stats> {
  try {
    return await fs.stat(path);
  } catch (error) {
    throw new FileSystemError(`Failed to get stats for: ${path}`, { path, error });
  }
}
