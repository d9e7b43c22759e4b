import { ConfigurationError } from '../errors/stackline-error.js';
import { type StacklineLogger, createLogger } from '../observability/logger.js';
import { type BackStackRecord, type KeyGenerator, generateRecordKey } from '../record/index.js';
import type { BackStackConfig, DuplicateKeyPolicy } from './types.js';

/** Defaults applied to every back stack */
export const DEFAULT_BACK_STACK_CONFIG = {
  keyGenerator: generateRecordKey,
  duplicateKeyPolicy: 'ignore',
} as const satisfies {
  keyGenerator: KeyGenerator;
  duplicateKeyPolicy: DuplicateKeyPolicy;
};

const DUPLICATE_KEY_POLICIES: readonly string[] = ['ignore', 'warn', 'throw'];

/** Back stack configuration with defaults applied */
export interface ResolvedBackStackConfig<D, R extends BackStackRecord<D>> {
  recordFactory: (destination: D, key: string) => R;
  keyGenerator: KeyGenerator;
  duplicateKeyPolicy: DuplicateKeyPolicy;
  initial: Iterable<R | D>;
  logger: StacklineLogger;
}

/**
 * Merge `config` with {@link DEFAULT_BACK_STACK_CONFIG} and validate it.
 *
 * @throws ConfigurationError when an option has an unusable value
 */
export function resolveBackStackConfig<D, R extends BackStackRecord<D>>(
  config: BackStackConfig<D, R>
): ResolvedBackStackConfig<D, R> {
  if (typeof config.recordFactory !== 'function') {
    throw new ConfigurationError('recordFactory', 'recordFactory must be a function');
  }

  if (config.keyGenerator !== undefined && typeof config.keyGenerator !== 'function') {
    throw new ConfigurationError('keyGenerator', 'keyGenerator must be a function');
  }

  const duplicateKeyPolicy = config.duplicateKeyPolicy ?? DEFAULT_BACK_STACK_CONFIG.duplicateKeyPolicy;
  if (!DUPLICATE_KEY_POLICIES.includes(duplicateKeyPolicy)) {
    throw new ConfigurationError(
      'duplicateKeyPolicy',
      `Unknown duplicate key policy "${String(duplicateKeyPolicy)}"`,
      { allowed: DUPLICATE_KEY_POLICIES }
    );
  }

  return {
    recordFactory: config.recordFactory,
    keyGenerator: config.keyGenerator ?? DEFAULT_BACK_STACK_CONFIG.keyGenerator,
    duplicateKeyPolicy,
    initial: config.initial ?? [],
    logger: config.logger ?? createLogger({ module: 'stackline:back-stack' }),
  };
}
