/**
 * SimpleBackStack - Observable in-memory back stack
 *
 * @module back-stack
 *
 * @example
 * ```typescript
 * import { createBackStack } from '@stackline/core';
 *
 * type Screen = { name: 'home' } | { name: 'details'; id: string };
 *
 * const stack = createBackStack<Screen>({ initial: [{ name: 'home' }] });
 *
 * stack.push({ name: 'details', id: 'pet-1' });
 * stack.push({ name: 'details', id: 'pet-2' });
 *
 * stack.state.subscribe((snapshot) => render(snapshot.topRecord));
 *
 * stack.popUntil((record) => record.destination.name === 'home');
 * stack.isAtRoot; // true
 *
 * stack.destroy();
 * ```
 */

import { BehaviorSubject, type Observable, Subject } from 'rxjs';
import { DuplicateRecordKeyError, InvalidRecordError } from '../errors/stackline-error.js';
import type { StacklineLogger } from '../observability/logger.js';
import {
  type BackStackRecord,
  type KeyGenerator,
  createRecord,
  describeRecordProblem,
  isBackStackRecord,
} from '../record/index.js';
import { resolveBackStackConfig } from './config.js';
import { popUntil } from './operations.js';
import type {
  BackStack,
  BackStackConfig,
  BackStackEvent,
  BackStackOptions,
  BackStackSnapshot,
  DuplicateKeyPolicy,
} from './types.js';

/**
 * In-memory {@link BackStack} publishing a consistent snapshot after every
 * change.
 *
 * Records are held bottom-first internally so push and pop are O(1); every
 * public view (iteration, `toArray`, snapshots) is top-first.
 *
 * Key uniqueness is the caller's responsibility. `duplicateKeyPolicy` can
 * turn a reused key into a warning or a {@link DuplicateRecordKeyError}.
 */
export class SimpleBackStack<D, R extends BackStackRecord<D> = BackStackRecord<D>>
  implements BackStack<D, R>
{
  private readonly records: R[] = [];
  private readonly liveKeys = new Map<string, number>();

  private readonly recordFactory: (destination: D, key: string) => R;
  private readonly keyGenerator: KeyGenerator;
  private readonly duplicateKeyPolicy: DuplicateKeyPolicy;
  private readonly logger: StacklineLogger;

  private readonly state$: BehaviorSubject<BackStackSnapshot<R>>;
  private readonly events$ = new Subject<BackStackEvent<R>>();

  private snapshot: BackStackSnapshot<R>;
  private version = 0;
  private batchDepth = 0;
  private publishing = false;
  private pendingChange = false;
  private pendingEvents: BackStackEvent<R>[] = [];
  private destroyed = false;

  constructor(config: BackStackConfig<D, R>) {
    const resolved = resolveBackStackConfig(config);
    this.recordFactory = resolved.recordFactory;
    this.keyGenerator = resolved.keyGenerator;
    this.duplicateKeyPolicy = resolved.duplicateKeyPolicy;
    this.logger = resolved.logger;

    for (const entry of resolved.initial) {
      this.insert(this.toRecord(entry));
    }

    this.snapshot = this.buildSnapshot();
    this.state$ = new BehaviorSubject<BackStackSnapshot<R>>(this.snapshot);
  }

  // ---- BackStack --------------------------------------------------------

  get size(): number {
    return this.records.length;
  }

  get topRecord(): R | null {
    return this.records[this.records.length - 1] ?? null;
  }

  /** `true` if the stack holds no records */
  get isEmpty(): boolean {
    return this.records.length === 0;
  }

  /** `true` if the stack holds exactly one record */
  get isAtRoot(): boolean {
    return this.records.length === 1;
  }

  *[Symbol.iterator](): Iterator<R> {
    for (let i = this.records.length - 1; i >= 0; i--) {
      const record = this.records[i];
      if (record !== undefined) yield record;
    }
  }

  push(recordOrDestination: R | D): R {
    return this.pushResolved(this.toRecord(recordOrDestination));
  }

  /**
   * Push `record` as is, whatever its shape suggests.
   *
   * @throws {InvalidRecordError} If `record` lacks a string `key` or a
   * `destination` (possible for values that bypassed the type checker)
   */
  pushRecord(record: R): R {
    const problem = describeRecordProblem(record);
    if (problem !== null) {
      throw new InvalidRecordError(problem);
    }
    return this.pushResolved(record);
  }

  pushDestination(destination: D): R {
    return this.pushResolved(this.recordFactory(destination, this.keyGenerator()));
  }

  pop(): R | null {
    const record = this.records.pop();
    if (record === undefined) return null;

    this.releaseKey(record.key);

    this.logger.debug('pop', { key: record.key, size: this.records.length });
    this.changed({ type: 'pop', timestamp: Date.now(), record, size: this.records.length });

    return record;
  }

  popUntil(predicate: (record: R) => boolean): R[] {
    const popped = popUntil(this, predicate);

    if (popped.length > 0) {
      this.changed({
        type: 'pop_until',
        timestamp: Date.now(),
        popped,
        size: this.records.length,
      });
    }

    return popped;
  }

  // ---- Batching ---------------------------------------------------------

  /**
   * Run `fn` with snapshot publication deferred until it returns, so
   * subscribers see one snapshot for the whole group of mutations. Events
   * raised inside the batch are emitted after that snapshot. Batches nest.
   */
  batch<T>(fn: () => T): T {
    this.batchDepth++;
    try {
      return fn();
    } finally {
      this.batchDepth--;
      if (this.batchDepth === 0) {
        this.flush();
      }
    }
  }

  // ---- Query helpers ----------------------------------------------------

  /** Records top-first */
  toArray(): R[] {
    return Array.from(this);
  }

  /** `true` if a record with `key` is on the stack */
  hasKey(key: string): boolean {
    return this.liveKeys.has(key);
  }

  /**
   * The current snapshot. Kept up to date after `destroy()`, although
   * nothing is published any more.
   */
  getSnapshot(): BackStackSnapshot<R> {
    return this.snapshot;
  }

  // ---- Observables ------------------------------------------------------

  /**
   * Observable emitting the current snapshot on subscription and a new one
   * after every change.
   */
  get state(): Observable<BackStackSnapshot<R>> {
    return this.state$.asObservable();
  }

  /** Observable of mutation events */
  get events(): Observable<BackStackEvent<R>> {
    return this.events$.asObservable();
  }

  // ---- Lifecycle --------------------------------------------------------

  /**
   * Complete the observables. The stack itself stays usable and
   * `getSnapshot()` keeps tracking it, but nothing is published afterwards.
   */
  destroy(): void {
    this.destroyed = true;
    this.pendingEvents = [];
    this.state$.complete();
    this.events$.complete();
  }

  // ---- Private ----------------------------------------------------------

  private pushResolved(record: R): R {
    this.insert(record);

    this.logger.debug('push', { key: record.key, size: this.records.length });
    this.changed({ type: 'push', timestamp: Date.now(), record, size: this.records.length });

    return record;
  }

  private isRecord(value: R | D): value is R {
    return isBackStackRecord(value);
  }

  private toRecord(recordOrDestination: R | D): R {
    if (this.isRecord(recordOrDestination)) {
      return recordOrDestination;
    }
    return this.recordFactory(recordOrDestination, this.keyGenerator());
  }

  private insert(record: R): void {
    const count = this.liveKeys.get(record.key) ?? 0;
    if (count > 0) {
      this.onDuplicateKey(record.key);
    }

    this.records.push(record);
    this.liveKeys.set(record.key, count + 1);
  }

  private releaseKey(key: string): void {
    const count = this.liveKeys.get(key) ?? 0;
    if (count <= 1) {
      this.liveKeys.delete(key);
    } else {
      this.liveKeys.set(key, count - 1);
    }
  }

  private onDuplicateKey(key: string): void {
    switch (this.duplicateKeyPolicy) {
      case 'throw':
        throw new DuplicateRecordKeyError(key);
      case 'warn':
        this.logger.warn('Duplicate record key pushed', { key });
        break;
      case 'ignore':
        break;
    }
  }

  private changed(event: BackStackEvent<R>): void {
    // pop_until summarizes pops that were already recorded individually
    if (event.type !== 'pop_until') {
      this.pendingChange = true;
    }
    this.pendingEvents.push(event);

    if (this.batchDepth === 0) {
      this.flush();
    }
  }

  /**
   * Publish pending changes. Changes made by a subscriber while a snapshot
   * is being delivered are queued and published after it, in order.
   */
  private flush(): void {
    if (this.publishing) return;
    this.publishing = true;

    try {
      while (this.pendingChange || this.pendingEvents.length > 0) {
        const events = this.pendingEvents;
        const changed = this.pendingChange;
        this.pendingEvents = [];
        this.pendingChange = false;

        if (changed) {
          this.version++;
          this.snapshot = this.buildSnapshot();
        }
        if (this.destroyed) continue;

        if (changed) {
          this.state$.next(this.snapshot);
        }
        for (const event of events) {
          this.events$.next(event);
        }
      }
    } finally {
      this.publishing = false;
    }
  }

  private buildSnapshot(): BackStackSnapshot<R> {
    const records = Object.freeze(this.toArray());
    return Object.freeze({
      version: this.version,
      size: records.length,
      topRecord: records[0] ?? null,
      records,
    });
  }
}

/**
 * Create a back stack of plain records.
 *
 * For a custom record type, construct {@link SimpleBackStack} with a
 * `recordFactory` instead.
 *
 * @example
 * ```typescript
 * const stack = createBackStack<string>({ initial: ['home'] });
 * stack.push('settings');
 * ```
 */
export function createBackStack<D>(options: BackStackOptions<D> = {}): SimpleBackStack<D> {
  return new SimpleBackStack<D>({
    ...options,
    recordFactory: (destination, key) => createRecord(destination, key),
  });
}
