export { SimpleBackStack, createBackStack } from './back-stack.js';
export {
  DEFAULT_BACK_STACK_CONFIG,
  resolveBackStackConfig,
  type ResolvedBackStackConfig,
} from './config.js';
export {
  containsKey,
  destinations,
  isAtRoot,
  isEmpty,
  popUntil,
  rootRecord,
} from './operations.js';
export type {
  BackStack,
  BackStackConfig,
  BackStackEvent,
  BackStackEventType,
  BackStackOptions,
  BackStackSnapshot,
  DuplicateKeyPolicy,
  PoppableStack,
  SizedStack,
} from './types.js';
