/**
 * Core Ports
 *
 * Re-exports all port interfaces and default implementations.
 * These ports define the boundary between core logic and the terminal.
 */

export type { OutputPort } from './output.js';
export type { ConflictChoice, ConflictInfo, ConflictPrompt, ResourceKind, RestoreInfo } from './conflict-prompt.js';
export { consoleOutput } from './console-output.js';
