/**
 * Stackline Error System
 *
 * @example
 * ```typescript
 * import { StacklineError } from '@stackline/core';
 *
 * try {
 *   stack.push(record);
 * } catch (error) {
 *   if (StacklineError.isCode(error, 'STACKLINE_K100')) {
 *     console.log('Key already on the stack');
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  ConfigurationError,
  DuplicateRecordKeyError,
  InvalidRecordError,
  StacklineError,
  type StacklineErrorOptions,
} from './stackline-error.js';
