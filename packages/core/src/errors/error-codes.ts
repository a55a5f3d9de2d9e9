/**
 * Folio Error Codes
 *
 * Error codes are structured as FOLIO_[CATEGORY][NUMBER]:
 * - V: Validation errors (V100-V199)
 * - S: Storage errors (S300-S399)
 * - C: Connection/Sync errors (C500-C599)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Validation errors (V100-V199)
  FOLIO_V100: {
    code: 'FOLIO_V100',
    message: 'Invalid configuration',
    suggestion: 'Check the listed configuration issues and fix the offending options.',
  },
  FOLIO_V110: {
    code: 'FOLIO_V110',
    message: 'Schema validation failed',
    suggestion: 'The object does not match the current schema. Update the schema and resync.',
  },
  FOLIO_V120: {
    code: 'FOLIO_V120',
    message: 'Response could not be parsed',
    suggestion: 'The backend returned a payload the client does not understand.',
  },

  // Storage errors (S300-S399)
  FOLIO_S300: {
    code: 'FOLIO_S300',
    message: 'Local store operation failed',
    suggestion: 'The local database is unusable. Restart the app or reset the local store.',
  },
  FOLIO_S301: {
    code: 'FOLIO_S301',
    message: 'Local store transaction failed',
    suggestion: 'A write request could not be committed. The sync will be aborted.',
  },

  // Connection/Sync errors (C500-C599)
  FOLIO_C500: {
    code: 'FOLIO_C500',
    message: 'Sync error',
    suggestion: 'Inspect the attached sync error for the affected library and objects.',
  },
  FOLIO_C510: {
    code: 'FOLIO_C510',
    message: 'Sync action failed',
    suggestion: 'An individual sync action reported a failure. See the reason for details.',
  },

  // Internal errors (X900-X999)
  FOLIO_X900: {
    code: 'FOLIO_X900',
    message: 'Internal error',
    suggestion: 'This is an unexpected error. Please report it with reproduction steps.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'validation' | 'storage' | 'connection' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(6);
  switch (letter) {
    case 'V':
      return 'validation';
    case 'S':
      return 'storage';
    case 'C':
      return 'connection';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
