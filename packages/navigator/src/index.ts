/**
 * @stackline/navigator - Navigation controller and render hooks over a back stack
 *
 * @example
 * ```typescript
 * import { createBackStack } from '@stackline/core';
 * import { createNavigator } from '@stackline/navigator';
 *
 * const stack = createBackStack<string>({ initial: ['home'] });
 * const navigator = createNavigator(stack);
 *
 * navigator.goTo('about');
 * navigator.peek(); // 'about'
 * navigator.onNavEvent({ type: 'pop' });
 * navigator.peek(); // 'home'
 * ```
 */

// Types
export type {
  NavEvent,
  NavEventType,
  Navigator,
  NavigatorConfig,
  NavigatorState,
  ObservableNavigator,
} from './types.js';

// Navigator
export { StackNavigator, createNavigator } from './navigator.js';

// Hooks
export type { ReactHooks, UseBackStackReturn, UseNavigatorReturn } from './hooks.js';

export { createUseBackStackHook, createUseNavigatorHook } from './hooks.js';
