/**
 * Per-record state keyed by record key.
 *
 * Lets presentation layers keep data (scroll position, form drafts,
 * presenter instances) for a record across re-renders and drop it once the
 * record leaves the stack.
 *
 * @module record-state
 *
 * @example
 * ```typescript
 * const registry = createRecordStateRegistry<ScrollState>({
 *   onRelease: (key) => console.log('released', key),
 * });
 * const subscription = registry.attach(stack);
 *
 * const top = stack.topRecord;
 * if (top) {
 *   const scroll = registry.getOrCreate(top.key, () => ({ offset: 0 }));
 * }
 *
 * stack.pop(); // the popped record's state is released
 *
 * subscription.unsubscribe();
 * ```
 */

import type { Observable, Subscription } from 'rxjs';
import type { BackStackSnapshot } from '../back-stack/types.js';
import { type StacklineLogger, createLogger } from '../observability/logger.js';
import type { BackStackRecord } from '../record/index.js';

/** Configuration for a record state registry */
export interface RecordStateRegistryConfig<V> {
  /** Called for every entry released by pruning, `delete` or `clear` */
  onRelease?: (key: string, value: V) => void;
  logger?: StacklineLogger;
}

/** Anything publishing back stack snapshots */
export interface SnapshotSource<R extends BackStackRecord> {
  readonly state: Observable<BackStackSnapshot<R>>;
}

/**
 * Holds one value per record key and releases values whose record is no
 * longer on the stack.
 */
export class RecordStateRegistry<V> {
  // Boxed so a stored `undefined` is told apart from a missing entry
  private readonly entries = new Map<string, { readonly value: V }>();
  private readonly onRelease?: (key: string, value: V) => void;
  private readonly logger: StacklineLogger;

  constructor(config: RecordStateRegistryConfig<V> = {}) {
    this.onRelease = config.onRelease;
    this.logger = config.logger ?? createLogger({ module: 'stackline:record-state' });
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    return this.entries.get(key)?.value;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  set(key: string, value: V): void {
    this.entries.set(key, { value });
  }

  /**
   * Return the value stored for `key`, creating it with `factory` on first
   * access.
   */
  getOrCreate(key: string, factory: () => V): V {
    const existing = this.entries.get(key);
    if (existing) return existing.value;

    const value = factory();
    this.entries.set(key, { value });
    return value;
  }

  /** Release the value stored for `key`. Returns `false` if there was none. */
  delete(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) return false;

    this.entries.delete(key);
    this.onRelease?.(key, entry.value);
    return true;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Release every entry whose key is not in `liveKeys`.
   *
   * @returns The released keys
   */
  retain(liveKeys: Iterable<string>): string[] {
    const live = new Set(liveKeys);
    const released: string[] = [];

    for (const key of [...this.entries.keys()]) {
      if (!live.has(key)) {
        this.delete(key);
        released.push(key);
      }
    }

    if (released.length > 0) {
      this.logger.debug('Released record state', { keys: released });
    }

    return released;
  }

  /**
   * Prune entries against every snapshot `stack` publishes, including the
   * current one.
   */
  attach<R extends BackStackRecord>(stack: SnapshotSource<R>): Subscription {
    return stack.state.subscribe((snapshot) => {
      this.retain(snapshot.records.map((record) => record.key));
    });
  }

  /** Release every entry */
  clear(): void {
    this.retain([]);
  }
}

/**
 * Create a record state registry
 */
export function createRecordStateRegistry<V>(
  config?: RecordStateRegistryConfig<V>
): RecordStateRegistry<V> {
  return new RecordStateRegistry<V>(config);
}
