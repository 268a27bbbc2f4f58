// Core types for the aapp CLI

export * from './execution-context.js';

/**
 * Root directories used by a single invocation.
 * Computed once from the privilege context; never persisted.
 */
export interface RootDirectories {
  /** Scratch workspace (`/usr/share/aapp-cli/temp` or `~/.aapp-cli/tmp`) */
  tempDir: string;
  /** Bundle store (`/usr/apps` or `~/.apps`) */
  bundleDir: string;
  /** Directory searched for `config.jsonc` / `config.json` */
  configDir: string;
}

/**
 * On-disk metadata record of a bundle (metadata.json).
 */
export interface BundleMetadata {
  name: string;
  bin: string;
  version: string;
  description: string;
}

/**
 * Metadata as read back from disk. Known fields are kept only when they
 * hold strings; anything else the record carries lands in `extra`.
 */
export interface StoredBundleMetadata {
  name?: string;
  bin?: string;
  version?: string;
  description?: string;
  extra: Record<string, unknown>;
}

export type MetadataReadResult =
  | { status: 'ok'; path: string; metadata: StoredBundleMetadata }
  | { status: 'not-found'; path: string }
  | { status: 'corrupt'; path: string; reason: string };

/**
 * Rules used by the source-scan branch of entry-point inference.
 */
export interface EntryPointRules {
  /** File extensions (with leading dot) whose contents are inspected */
  extensions: string[];
  /** Substring identifying a canonical entry-point declaration */
  marker: string;
}

export interface ProviderConfig {
  command: string;
  /** Argument template; `{package}` and `{target}` are substituted */
  args: string[];
}

export interface AappConfig {
  provider: ProviderConfig;
  entryPoint: EntryPointRules;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

/**
 * Outcome of a lifecycle operation. Failures carry the error code of the
 * failure kind so the CLI can map it to an exit code.
 */
export type OperationResult<T> =
  | { success: true; data: T }
  | { success: false; code: ErrorCodes; error: string };

// Error types
export class AappError extends Error {
  public code: ErrorCodes;
  public details?: unknown;

  constructor(message: string, code: ErrorCodes, details?: unknown) {
    super(message);
    this.name = 'AappError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  INVALID_NAME = 'INVALID_NAME',
  FETCH_FAILED = 'FETCH_FAILED',
  NO_ENTRY_POINT = 'NO_ENTRY_POINT',
  BUNDLE_NOT_FOUND = 'BUNDLE_NOT_FOUND',
  METADATA_MISSING = 'METADATA_MISSING',
  METADATA_CORRUPT = 'METADATA_CORRUPT',
  EXECUTABLE_MISSING = 'EXECUTABLE_MISSING',
  EXECUTION_FAILED = 'EXECUTION_FAILED',
  DELETE_FAILED = 'DELETE_FAILED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
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
