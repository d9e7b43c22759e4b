/**
 * Stackline Error Codes
 *
 * Error codes are structured as STACKLINE_[CATEGORY][NUMBER]:
 * - K: Record/key errors (K100-K199)
 * - C: Configuration errors (C200-C299)
 * - N: Navigation errors (N300-N399)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Record errors (K100-K199)
  STACKLINE_K100: {
    code: 'STACKLINE_K100',
    message: 'Duplicate record key',
    suggestion:
      'Each record on a back stack needs its own key. Push the bare destination to mint a fresh key, or supply a unique one.',
  },
  STACKLINE_K101: {
    code: 'STACKLINE_K101',
    message: 'Invalid record',
    suggestion:
      'pushRecord() takes an object with a string `key` and a `destination`. Use pushDestination() for bare destinations.',
  },

  // Configuration errors (C200-C299)
  STACKLINE_C200: {
    code: 'STACKLINE_C200',
    message: 'Invalid configuration',
    suggestion: 'Check the options passed to the back stack or navigator factory.',
  },

  // Navigation errors (N300-N399)
  STACKLINE_N300: {
    code: 'STACKLINE_N300',
    message: 'Navigator has been destroyed',
    suggestion: 'Create a new navigator instead of reusing one after destroy().',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'record' | 'config' | 'navigation';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  if (code.startsWith('STACKLINE_K')) return 'record';
  if (code.startsWith('STACKLINE_C')) return 'config';
  return 'navigation';
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
