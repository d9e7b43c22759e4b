/**
 * Record key minting.
 *
 * @module record/record-key
 */

/** Produces a key for a record created from a bare destination */
export type KeyGenerator = () => string;

let fallbackSequence = 0;

/**
 * Generate a new record key.
 *
 * Uses `crypto.randomUUID` when available. The fallback combines a timestamp,
 * a process-wide counter and a random suffix, so two keys from this function
 * never share the counter segment.
 */
export function generateRecordKey(): string {
  if (typeof crypto !== 'undefined' && crypto.randomUUID) {
    return crypto.randomUUID();
  }
  fallbackSequence += 1;
  const timestamp = Date.now().toString(36);
  const randomPart = Math.random().toString(36).substring(2, 10);
  return `${timestamp}-${fallbackSequence.toString(36)}-${randomPart}`;
}

/**
 * Create a deterministic key generator yielding `${prefix}-1`, `${prefix}-2`, ...
 *
 * @example
 * ```typescript
 * const nextKey = createSequentialKeyGenerator('screen');
 * nextKey(); // 'screen-1'
 * nextKey(); // 'screen-2'
 * ```
 */
export function createSequentialKeyGenerator(prefix = 'record'): KeyGenerator {
  let sequence = 0;
  return () => {
    sequence += 1;
    return `${prefix}-${sequence}`;
  };
}
