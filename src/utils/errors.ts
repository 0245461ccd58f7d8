import { FlowpackError, ErrorCodes, CommandResult, NodeSchemaError } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for each way a pack build can fail
 */

export class ComponentNotFoundError extends FlowpackError {
  constructor(
    componentName: string,
    details: {
      versionReq: string;
      searchPath: string[];
      availableVersions?: string[];
    }
  ) {
    const msg = `No component '${componentName}' satisfies '${details.versionReq}'${details.availableVersions?.length ? `. Available: ${details.availableVersions.join(', ')}` : ` in ${details.searchPath.join(', ') || '(empty search path)'}`}`;
    super(msg, ErrorCodes.COMPONENT_NOT_FOUND, { componentName, ...details });
    this.name = 'ComponentNotFoundError';
  }
}

export class ManifestInvalidError extends FlowpackError {
  constructor(manifestPath: string, reason: string) {
    super(`Invalid component manifest ${manifestPath}: ${reason}`, ErrorCodes.MANIFEST_INVALID, { manifestPath, reason });
    this.name = 'ManifestInvalidError';
  }
}

export class MissingFlowNodeError extends FlowpackError {
  constructor(nodeId: string) {
    super(`Node '${nodeId}' missing from flow document`, ErrorCodes.MISSING_FLOW_NODE, { nodeId });
    this.name = 'MissingFlowNodeError';
  }
}

export class MissingExecPayloadError extends FlowpackError {
  constructor(nodeId: string, reason: string) {
    super(`component.exec node '${nodeId}' ${reason}`, ErrorCodes.MISSING_EXEC_PAYLOAD, { nodeId });
    this.name = 'MissingExecPayloadError';
  }
}

export class InvalidComponentRefError extends FlowpackError {
  constructor(reference: string, reason: string) {
    super(`Invalid component reference '${reference}': ${reason}`, ErrorCodes.INVALID_COMPONENT_REF, { reference });
    this.name = 'InvalidComponentRefError';
  }
}

export class SchemaValidationFailedError extends FlowpackError {
  public readonly errors: readonly NodeSchemaError[];

  constructor(errors: readonly NodeSchemaError[]) {
    const lines = errors.map(
      err => `- node \`${err.nodeId}\` (${err.component}) ${err.pointer}: ${err.message}`
    );
    super(
      `Component schema validation failed (${errors.length} error${errors.length === 1 ? '' : 's'}):\n${lines.join('\n')}`,
      ErrorCodes.SCHEMA_VALIDATION_FAILED,
      { count: errors.length }
    );
    this.name = 'SchemaValidationFailedError';
    this.errors = errors;
  }
}

export class NonDeterministicBuildError extends FlowpackError {
  constructor(details: { primary: string; rebuild: string; firstDifference: number; primarySize: number; rebuildSize: number }) {
    super(
      `Non-deterministic pack output: rebuild differs from ${details.primary} at byte ${details.firstDifference} ` +
      `(${details.primarySize} vs ${details.rebuildSize} bytes)`,
      ErrorCodes.NON_DETERMINISTIC_BUILD,
      details
    );
    this.name = 'NonDeterministicBuildError';
  }
}

export class ArchiveAssemblyFailedError extends FlowpackError {
  constructor(outputPath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Pack build failed (assemble stage) for ${outputPath}: ${reason}`, ErrorCodes.ARCHIVE_ASSEMBLY_FAILED, { outputPath, reason });
    this.name = 'ArchiveAssemblyFailedError';
  }
}

export class FlowValidationError extends FlowpackError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Flow validation failed: ${message}`, ErrorCodes.FLOW_VALIDATION_ERROR, details);
    this.name = 'FlowValidationError';
  }
}

export class PackMetaInvalidError extends FlowpackError {
  constructor(metaPath: string, reason: string) {
    super(`Invalid pack metadata ${metaPath}: ${reason}`, ErrorCodes.PACK_META_INVALID, { metaPath, reason });
    this.name = 'PackMetaInvalidError';
  }
}

export class PathEscapeError extends FlowpackError {
  constructor(root: string, candidate: string) {
    super(`Path escapes root (${root}): ${candidate}`, ErrorCodes.PATH_ESCAPE, { root, candidate });
    this.name = 'PathEscapeError';
  }
}

export class FileSystemError extends FlowpackError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof FlowpackError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
