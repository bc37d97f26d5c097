/**
 * Common types and interfaces for the hostform CLI application
 */

export * from './config.js';
export * from './applied-state.js';
export * from './plan.js';

// Core application types
export interface HostformDirectories {
  /** Holds the applied-state record */
  config: string;
  /** Holds the fingerprint and system-state caches */
  cache: string;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class HostformError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'HostformError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  INCLUDE_ERROR = 'INCLUDE_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CACHE_ERROR = 'CACHE_ERROR',
  STATE_LOAD_ERROR = 'STATE_LOAD_ERROR',
  SAFETY_VIOLATION = 'SAFETY_VIOLATION',
  PACKAGE_MANAGER_ERROR = 'PACKAGE_MANAGER_ERROR',
  DEPLOYMENT_ERROR = 'DEPLOYMENT_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
