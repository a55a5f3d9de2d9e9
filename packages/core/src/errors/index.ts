/**
 * Folio Error System
 *
 * Structured error handling with unique error codes, suggestions,
 * categorization and error chaining.
 *
 * @example
 * ```typescript
 * import { FolioError, StorageError } from '@folio/core';
 *
 * try {
 *   await store.perform(request);
 * } catch (error) {
 *   if (error instanceof StorageError) {
 *     console.log('Local store failed:', error.format());
 *   }
 * }
 * ```
 *
 * @module errors
 */

// Error codes
export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

// Error classes
export {
  FolioError,
  ParsingError,
  SchemaError,
  StorageError,
  ensureFolioError,
  type FolioErrorOptions,
  type SerializedFolioError,
} from './folio-error.js';
