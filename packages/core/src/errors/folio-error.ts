/**
 * FolioError - Enhanced error class with structured error information
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a FolioError
 */
export interface FolioErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a FolioError
 */
export interface SerializedFolioError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
  cause?: SerializedFolioError | { name: string; message: string; stack?: string };
}

/**
 * Enhanced error class for Folio with structured error information.
 *
 * FolioError provides:
 * - Unique error codes for categorization
 * - Helpful suggestions for resolution
 * - Context information for debugging
 * - Proper error chaining with cause
 *
 * @example
 * ```typescript
 * throw new FolioError({
 *   code: 'FOLIO_V100',
 *   context: { issues: ['userId: Required'] }
 * });
 * ```
 */
export class FolioError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: FolioErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'FolioError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FolioError);
    }
  }

  /**
   * Create a FolioError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): FolioError {
    return new FolioError({ code, context });
  }

  /**
   * Wrap an existing error with a FolioError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): FolioError {
    return new FolioError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  /**
   * Check if an error is a FolioError
   */
  static isFolioError(error: unknown): error is FolioError {
    return error instanceof FolioError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return FolioError.isFolioError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return FolioError.isFolioError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedFolioError {
    const result: SerializedFolioError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause) {
      if (FolioError.isFolioError(this.cause)) {
        result.cause = this.cause.toJSON();
      } else {
        result.cause = {
          name: this.cause.name,
          message: this.cause.message,
          stack: this.cause.stack,
        };
      }
    }

    return result;
  }
}

/**
 * Failure of the embedded object store. Any storage error leaves the local
 * state untrusted, so the sync engine treats it as fatal.
 */
export class StorageError extends FolioError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code: 'FOLIO_S300', message, context, cause });
    this.name = 'StorageError';
  }
}

/**
 * An object received from the backend does not satisfy the local schema
 */
export class SchemaError extends FolioError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code: 'FOLIO_V110', message, context, cause });
    this.name = 'SchemaError';
  }
}

/**
 * A backend response could not be decoded
 */
export class ParsingError extends FolioError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code: 'FOLIO_V120', message, context, cause });
    this.name = 'ParsingError';
  }
}

/**
 * Helper function to ensure errors are FolioErrors
 */
export function ensureFolioError(error: unknown, defaultCode: ErrorCode = 'FOLIO_X900'): FolioError {
  if (FolioError.isFolioError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return FolioError.wrap(error, defaultCode);
  }

  return new FolioError({
    code: defaultCode,
    message: String(error),
  });
}
