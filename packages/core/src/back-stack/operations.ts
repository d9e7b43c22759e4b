/**
 * Stack helpers written against the public back stack surface only.
 *
 * @module back-stack/operations
 */

import type { PoppableStack, SizedStack } from './types.js';

/**
 * Pop records off the top of `stack` until the top matches `predicate`.
 *
 * The predicate is evaluated on the current top before every pop. The loop
 * ends as soon as it matches or the stack is empty, so a predicate that never
 * matches drains the stack and returns. Nothing is popped from an empty stack.
 *
 * @returns The popped records, in pop order
 *
 * @example
 * ```typescript
 * // A, B, C pushed in that order
 * popUntil(stack, (record) => record === a); // [C, B]
 * ```
 */
export function popUntil<R>(stack: PoppableStack<R>, predicate: (record: R) => boolean): R[] {
  const popped: R[] = [];
  let top = stack.topRecord;
  while (top !== null && !predicate(top)) {
    const record = stack.pop();
    if (record === null) break;
    popped.push(record);
    top = stack.topRecord;
  }
  return popped;
}

/** `true` if the stack holds no records */
export function isEmpty(stack: SizedStack): boolean {
  return stack.size === 0;
}

/** `true` if the stack holds exactly one record */
export function isAtRoot(stack: SizedStack): boolean {
  return stack.size === 1;
}

/** The bottom record of the stack, or `null` if it is empty */
export function rootRecord<R>(stack: Iterable<R>): R | null {
  let root: R | null = null;
  for (const record of stack) {
    root = record;
  }
  return root;
}

/** Destinations of the stack's records, top-first */
export function destinations<D>(stack: Iterable<{ readonly destination: D }>): D[] {
  return Array.from(stack, (record) => record.destination);
}

/** `true` if a record with `key` is on the stack */
export function containsKey(stack: Iterable<{ readonly key: string }>, key: string): boolean {
  for (const record of stack) {
    if (record.key === key) return true;
  }
  return false;
}
