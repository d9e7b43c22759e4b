/**
 * Back stack records.
 *
 * @module record/record
 */

import { generateRecordKey } from './record-key.js';

/**
 * A keyed entry on a back stack.
 *
 * Any object exposing a stable `key` and a `destination` qualifies, so callers
 * can attach their own fields (arguments, timestamps) by extending this
 * interface.
 *
 * @typeParam D - Destination descriptor type. Opaque to the stack.
 */
export interface BackStackRecord<D = unknown> {
  /**
   * Identifies this record, even when it shares its destination with another
   * record. Consumers may use it to associate presentation state with the
   * record across re-renders.
   *
   * Must not change for the life of the record, and must be unique among the
   * records live on the same stack.
   */
  readonly key: string;

  /** What should be presented for this record */
  readonly destination: D;
}

/**
 * Wrap a destination in a record.
 *
 * When `key` is omitted a fresh one is minted with {@link generateRecordKey}.
 * Uniqueness of a caller-supplied key is not checked here.
 */
export function createRecord<D>(destination: D, key: string = generateRecordKey()): BackStackRecord<D> {
  return Object.freeze({ key, destination });
}

/**
 * Why `value` is not a record, or `null` if it is one. A record is a non-null
 * object with a string `key` and a `destination`, own or inherited, so class
 * instances exposing `destination` through a getter qualify.
 */
export function describeRecordProblem(value: unknown): string | null {
  if (typeof value !== 'object' || value === null) return 'expected an object';
  if (!('key' in value) || typeof value.key !== 'string') return 'key must be a string';
  if (!('destination' in value)) return 'destination is missing';
  return null;
}

/** Structural check for the record capability */
export function isBackStackRecord(value: unknown): value is BackStackRecord {
  return describeRecordProblem(value) === null;
}
