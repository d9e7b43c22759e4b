/**
 * StacklineError - coded errors raised by back stacks and navigators
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a StacklineError
 */
export interface StacklineErrorOptions {
  code: ErrorCode;
  /** Overrides the code's default message */
  message?: string;
  /** The record key, option name or operation involved */
  context?: Record<string, unknown>;
}

/**
 * Error raised by Stackline, carrying a code, its category and a suggestion.
 *
 * @example
 * ```typescript
 * try {
 *   navigator.goTo(screen);
 * } catch (error) {
 *   if (StacklineError.isCode(error, 'STACKLINE_N300')) {
 *     navigator = createNavigator(stack);
 *   }
 * }
 * ```
 */
export class StacklineError extends Error {
  readonly code: ErrorCode;
  readonly suggestion: string;
  readonly category: ErrorCategory;
  readonly context: Record<string, unknown>;

  constructor(options: StacklineErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    super(options.message ?? errorInfo.message);

    this.name = 'StacklineError';
    this.code = options.code;
    this.suggestion = errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
  }

  static isStacklineError(error: unknown): error is StacklineError {
    return error instanceof StacklineError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return StacklineError.isStacklineError(error) && error.code === code;
  }
}

/**
 * Thrown when a record is pushed whose key is already live in the stack and
 * the stack was configured with `duplicateKeyPolicy: 'throw'`.
 */
export class DuplicateRecordKeyError extends StacklineError {
  /** The key that was already present */
  readonly key: string;

  constructor(key: string) {
    super({
      code: 'STACKLINE_K100',
      message: `A record with key "${key}" is already on the back stack`,
      context: { key },
    });

    this.name = 'DuplicateRecordKeyError';
    this.key = key;
  }
}

/**
 * Thrown by `pushRecord` when the value lacks a string `key` or a
 * `destination`.
 */
export class InvalidRecordError extends StacklineError {
  constructor(reason: string) {
    super({
      code: 'STACKLINE_K101',
      message: `Invalid record: ${reason}`,
      context: { reason },
    });

    this.name = 'InvalidRecordError';
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends StacklineError {
  /** Name of the offending option */
  readonly option: string;

  constructor(option: string, message: string, context?: Record<string, unknown>) {
    super({
      code: 'STACKLINE_C200',
      message,
      context: { ...context, option },
    });

    this.name = 'ConfigurationError';
    this.option = option;
  }
}
