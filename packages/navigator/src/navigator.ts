/**
 * Stack Navigator - Navigation controller over a back stack
 *
 * @module navigator
 *
 * @example
 * ```typescript
 * import { createBackStack } from '@stackline/core';
 * import { createNavigator } from '@stackline/navigator';
 *
 * type Screen = { name: 'list' } | { name: 'details'; id: string } | { name: 'about' };
 *
 * const stack = createBackStack<Screen>({ initial: [{ name: 'list' }] });
 * const navigator = createNavigator(stack, { onRootPop: () => window.close() });
 *
 * navigator.goTo({ name: 'details', id: 'pet-7' });
 * navigator.pop(); // { name: 'details', id: 'pet-7' }
 * navigator.pop(); // null, onRootPop was called
 *
 * // From an event sink
 * navigator.onNavEvent({ type: 'resetRoot', root: { name: 'about' } });
 * ```
 */

import {
  type BackStackRecord,
  type BackStackSnapshot,
  type SimpleBackStack,
  type StacklineLogger,
  StacklineError,
  createLogger,
} from '@stackline/core';
import { type Observable, map } from 'rxjs';
import type {
  NavEvent,
  NavigatorConfig,
  NavigatorState,
  ObservableNavigator,
} from './types.js';

function toNavigatorState<D, R extends BackStackRecord<D>>(
  snapshot: BackStackSnapshot<R>
): NavigatorState<D, R> {
  return {
    snapshot,
    topDestination: snapshot.topRecord?.destination ?? null,
    canPop: snapshot.size > 1,
  };
}

/**
 * {@link Navigator} backed by a {@link SimpleBackStack}. The root record is
 * never popped by the navigator; popping at the root is reported through
 * `onRootPop` instead.
 */
export class StackNavigator<D, R extends BackStackRecord<D> = BackStackRecord<D>>
  implements ObservableNavigator<D, R>
{
  private readonly onRootPop?: () => void;
  private readonly logger: StacklineLogger;
  private destroyed = false;

  constructor(
    private readonly stack: SimpleBackStack<D, R>,
    config: NavigatorConfig = {}
  ) {
    this.onRootPop = config.onRootPop;
    this.logger = config.logger ?? createLogger({ module: 'stackline:navigator' });
  }

  /** The back stack this navigator drives */
  get backStack(): SimpleBackStack<D, R> {
    return this.stack;
  }

  goTo(destination: D): void {
    this.assertUsable('goTo');
    const record = this.stack.pushDestination(destination);
    this.logger.debug('goTo', { key: record.key, size: this.stack.size });
  }

  pop(): D | null {
    this.assertUsable('pop');

    if (this.stack.size <= 1) {
      this.logger.debug('pop at root', { size: this.stack.size });
      this.onRootPop?.();
      return null;
    }

    const record = this.stack.pop();
    this.logger.debug('pop', { key: record?.key, size: this.stack.size });
    return record ? record.destination : null;
  }

  popUntil(predicate: (destination: D) => boolean): D[] {
    this.assertUsable('popUntil');

    const popped = this.stack.popUntil(
      (record) => this.stack.size <= 1 || predicate(record.destination)
    );
    this.logger.debug('popUntil', { popped: popped.length, size: this.stack.size });

    return popped.map((record) => record.destination);
  }

  resetRoot(newRoot: D): D[] {
    this.assertUsable('resetRoot');

    const end = this.logger.time('resetRoot');
    const removed = this.stack.batch(() => {
      const popped = this.stack.popUntil(() => false);
      this.stack.pushDestination(newRoot);
      return popped;
    });
    end({ removed: removed.length });

    return removed.map((record) => record.destination);
  }

  peek(): D | null {
    return this.stack.topRecord?.destination ?? null;
  }

  peekBackStack(): D[] {
    return this.stack.toArray().map((record) => record.destination);
  }

  onNavEvent(event: NavEvent<D>): void {
    switch (event.type) {
      case 'goTo':
        this.goTo(event.destination);
        break;
      case 'pop':
        this.pop();
        break;
      case 'resetRoot':
        this.resetRoot(event.root);
        break;
    }
  }

  /** Observable of navigator state, one emission per back stack snapshot */
  get state(): Observable<NavigatorState<D, R>> {
    return this.stack.state.pipe(map((snapshot) => toNavigatorState<D, R>(snapshot)));
  }

  getState(): NavigatorState<D, R> {
    return toNavigatorState<D, R>(this.stack.getSnapshot());
  }

  /**
   * Stop accepting navigation. The back stack is left untouched and remains
   * owned by the caller.
   */
  destroy(): void {
    this.destroyed = true;
  }

  private assertUsable(operation: string): void {
    if (this.destroyed) {
      throw new StacklineError({
        code: 'STACKLINE_N300',
        context: { operation },
      });
    }
  }
}

/**
 * Create a navigator over `stack`
 */
export function createNavigator<D, R extends BackStackRecord<D> = BackStackRecord<D>>(
  stack: SimpleBackStack<D, R>,
  config?: NavigatorConfig
): StackNavigator<D, R> {
  return new StackNavigator<D, R>(stack, config);
}
