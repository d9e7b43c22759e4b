import type { StacklineLogger } from '../observability/logger.js';
import type { BackStackRecord, KeyGenerator } from '../record/index.js';

/**
 * A caller-owned stack of records for presentation by a navigator.
 *
 * Iteration order is top-first: the first element yielded is the top of the
 * stack and the last one is the root.
 *
 * @typeParam D - Destination type accepted by `push(destination)`
 * @typeParam R - Record type held by the stack
 */
export interface BackStack<D, R extends BackStackRecord<D> = BackStackRecord<D>>
  extends Iterable<R> {
  /** Number of records an iterator will see */
  readonly size: number;

  /** The top-most record, or `null` if the stack is empty */
  readonly topRecord: R | null;

  /**
   * Push a record, or a bare destination which is first wrapped in a record
   * with a freshly minted key. The record becomes the new top.
   *
   * Records are told apart from destinations by shape; use `pushRecord` or
   * `pushDestination` when a destination itself has a `key` and a
   * `destination`.
   */
  push(recordOrDestination: R | D): R;

  /** Push `record` as is */
  pushRecord(record: R): R;

  /** Wrap `destination` in a record with a freshly minted key and push it */
  pushDestination(destination: D): R;

  /** Pop the top record, returning it, or `null` if the stack is empty */
  pop(): R | null;

  /**
   * Pop records off the top until one matches `predicate` or the stack is
   * empty. Returns the popped records in pop order.
   */
  popUntil(predicate: (record: R) => boolean): R[];
}

/** The two primitives {@link popUntil} is written against */
export interface PoppableStack<R> {
  readonly topRecord: R | null;
  pop(): R | null;
}

/** Anything with a record count */
export interface SizedStack {
  readonly size: number;
}

/** Policy applied when a pushed record's key is already live on the stack */
export type DuplicateKeyPolicy = 'ignore' | 'warn' | 'throw';

/** Immutable view of a back stack published after each change */
export interface BackStackSnapshot<R> {
  /** Starts at 0 and increments once per published change */
  readonly version: number;
  readonly size: number;
  readonly topRecord: R | null;
  /** Records top-first */
  readonly records: readonly R[];
}

/** Event types emitted by a back stack */
export type BackStackEventType = 'push' | 'pop' | 'pop_until';

/** Back stack mutation event */
export type BackStackEvent<R> =
  | { type: 'push'; timestamp: number; record: R; size: number }
  | { type: 'pop'; timestamp: number; record: R; size: number }
  | { type: 'pop_until'; timestamp: number; popped: R[]; size: number };

/** Configuration for a back stack */
export interface BackStackConfig<D, R extends BackStackRecord<D> = BackStackRecord<D>> {
  /** Wraps a bare destination pushed onto the stack in a record */
  recordFactory: (destination: D, key: string) => R;
  /** Mints keys for records created by `recordFactory` (default: generateRecordKey) */
  keyGenerator?: KeyGenerator;
  /** What to do when a pushed record reuses a live key (default: 'ignore') */
  duplicateKeyPolicy?: DuplicateKeyPolicy;
  /** Records or destinations to seed the stack with, root first */
  initial?: Iterable<R | D>;
  /** Logger for stack diagnostics */
  logger?: StacklineLogger;
}

/** Options accepted by `createBackStack` when plain records are used */
export type BackStackOptions<D> = Omit<BackStackConfig<D>, 'recordFactory'>;
