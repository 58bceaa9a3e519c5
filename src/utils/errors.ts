import { RcForgeError, ErrorCodes, CommandResult, NotFoundKind } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the four failure kinds a build can surface.
 * Callers branch on `code`; the subclasses only fix the code and details shape.
 */

export class ValidationError extends RcForgeError<ErrorCodes.VALIDATION_ERROR> {
  constructor(message: string, details: { names?: string[]; path?: string } = {}) {
    super(message, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class CircularDependencyError extends RcForgeError<ErrorCodes.CIRCULAR_DEPENDENCY> {
  constructor(modules: string[]) {
    super(
      `circular dependency detected among modules: ${modules.join(', ')}`,
      ErrorCodes.CIRCULAR_DEPENDENCY,
      { modules }
    );
    this.name = 'CircularDependencyError';
  }
}

export class NotFoundError extends RcForgeError<ErrorCodes.NOT_FOUND> {
  constructor(kind: NotFoundKind, name: string, message: string = `${kind} '${name}' not found`) {
    super(message, ErrorCodes.NOT_FOUND, { kind, name });
    this.name = 'NotFoundError';
  }
}

export class FileSystemError extends RcForgeError<ErrorCodes.FILE_SYSTEM_ERROR> {
  constructor(operation: string, path: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`failed to ${operation} ${path}${reason}`, ErrorCodes.FILE_SYSTEM_ERROR, { operation, path }, { cause });
    this.name = 'FileSystemError';
  }
}

/**
 * Narrow an unknown error to an RcForgeError, optionally of one code.
 */
export function isRcForgeError<C extends ErrorCodes>(error: unknown, code: C): error is RcForgeError<C>;
export function isRcForgeError(error: unknown): error is RcForgeError;
export function isRcForgeError(error: unknown, code?: ErrorCodes): boolean {
  return error instanceof RcForgeError && (code === undefined || error.code === code);
}

/**
 * Prefix an error with the stage it crossed. Library errors keep their code and
 * details so callers can still branch on them after wrapping.
 */
export function wrapError(context: string, error: unknown): Error {
  if (error instanceof RcForgeError) {
    return new RcForgeError(`${context}: ${error.message}`, error.code, error.details, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new Error(`${context}: ${message}`, { cause: error });
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof RcForgeError) {
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
