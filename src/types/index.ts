/**
 * Common types and interfaces for flowpack
 */

export * from './json.js';
export * from './flows.js';
export * from './components.js';
export * from './pack.js';

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class FlowpackError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'FlowpackError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  COMPONENT_NOT_FOUND = 'COMPONENT_NOT_FOUND',
  MANIFEST_INVALID = 'MANIFEST_INVALID',
  MISSING_FLOW_NODE = 'MISSING_FLOW_NODE',
  MISSING_EXEC_PAYLOAD = 'MISSING_EXEC_PAYLOAD',
  INVALID_COMPONENT_REF = 'INVALID_COMPONENT_REF',
  SCHEMA_VALIDATION_FAILED = 'SCHEMA_VALIDATION_FAILED',
  NON_DETERMINISTIC_BUILD = 'NON_DETERMINISTIC_BUILD',
  ARCHIVE_ASSEMBLY_FAILED = 'ARCHIVE_ASSEMBLY_FAILED',
  FLOW_VALIDATION_ERROR = 'FLOW_VALIDATION_ERROR',
  PACK_META_INVALID = 'PACK_META_INVALID',
  PATH_ESCAPE = 'PATH_ESCAPE',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR'
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
