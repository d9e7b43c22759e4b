/**
 * React hooks for back stacks and navigators
 */

import type { BackStackRecord, BackStackSnapshot, SimpleBackStack } from '@stackline/core';
import type { NavigatorState, ObservableNavigator } from './types.js';

/**
 * React hooks interface for dependency injection
 */
export interface ReactHooks {
  useState<T>(initial: T | (() => T)): [T, (value: T | ((prev: T) => T)) => void];
  useCallback<T extends (...args: never[]) => unknown>(fn: T, deps: unknown[]): T;
  useEffect(fn: () => undefined | (() => void), deps?: unknown[]): void;
  useMemo<T>(fn: () => T, deps: unknown[]): T;
}

/**
 * Return type for useBackStack hook
 */
export interface UseBackStackReturn<D, R extends BackStackRecord<D>> extends BackStackSnapshot<R> {
  isEmpty: boolean;
  isAtRoot: boolean;
  /** Destination of the top record, or `null` when the stack is empty */
  topDestination: D | null;
}

/**
 * Return type for useNavigator hook
 */
export interface UseNavigatorReturn<D> {
  topDestination: D | null;
  canPop: boolean;
  /** Destinations top-first */
  destinations: D[];
  goTo: (destination: D) => void;
  pop: () => D | null;
  resetRoot: (newRoot: D) => D[];
}

/**
 * Factory to create useBackStack hook
 *
 * @example
 * ```typescript
 * import * as React from 'react';
 *
 * const useBackStack = createUseBackStackHook(React);
 *
 * function Content({ stack }) {
 *   const { topDestination } = useBackStack(stack);
 *   return topDestination ? renderScreen(topDestination) : null;
 * }
 * ```
 */
export function createUseBackStackHook(React: ReactHooks) {
  return function useBackStack<D, R extends BackStackRecord<D>>(
    stack: SimpleBackStack<D, R>
  ): UseBackStackReturn<D, R> {
    const [snapshot, setSnapshot] = React.useState<BackStackSnapshot<R>>(() =>
      stack.getSnapshot()
    );

    React.useEffect(() => {
      const subscription = stack.state.subscribe((next) => setSnapshot(next));
      return () => subscription.unsubscribe();
    }, [stack]);

    return React.useMemo(
      () => ({
        ...snapshot,
        isEmpty: snapshot.size === 0,
        isAtRoot: snapshot.size === 1,
        topDestination: snapshot.topRecord?.destination ?? null,
      }),
      [snapshot]
    );
  };
}

/**
 * Factory to create useNavigator hook
 */
export function createUseNavigatorHook(React: ReactHooks) {
  return function useNavigator<D, R extends BackStackRecord<D>>(
    navigator: ObservableNavigator<D, R>
  ): UseNavigatorReturn<D> {
    const [state, setState] = React.useState<NavigatorState<D, R>>(() => navigator.getState());

    React.useEffect(() => {
      const subscription = navigator.state.subscribe((next) => setState(next));
      return () => subscription.unsubscribe();
    }, [navigator]);

    const goTo = React.useCallback((destination: D) => navigator.goTo(destination), [navigator]);
    const pop = React.useCallback(() => navigator.pop(), [navigator]);
    const resetRoot = React.useCallback((newRoot: D) => navigator.resetRoot(newRoot), [navigator]);

    const destinations = React.useMemo(
      () => state.snapshot.records.map((record) => record.destination),
      [state.snapshot]
    );

    return {
      topDestination: state.topDestination,
      canPop: state.canPop,
      destinations,
      goTo,
      pop,
      resetRoot,
    };
  };
}
