/**
 * Hash Utilities Module
 * Utility functions for content hashing and comparison
 */

import { promises as fs } from 'fs';
import { sha256 } from 'hash-wasm';
import { FileSystemError } from './errors.js';

/**
 * Calculate the sha256 of a string
 */
export async function hashString(content: string): Promise<string> {
  return await sha256(content);
}

/**
 * Calculate the sha256 of a file's bytes
 */
export async function hashFile(path: string): Promise<string> {
  let content: Buffer;
  try {
    content = await fs.readFile(path);
  } catch (error) {
    throw new FileSystemError(`Failed to read file for hashing: ${path}`, { path, error });
  }
  return await sha256(content);
}
