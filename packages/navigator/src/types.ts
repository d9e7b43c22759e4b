import type { BackStackRecord, BackStackSnapshot, StacklineLogger } from '@stackline/core';
import type { Observable } from 'rxjs';

/** A navigation intent raised by a presenter or UI event sink */
export type NavEvent<D> =
  | { type: 'goTo'; destination: D }
  | { type: 'pop' }
  | { type: 'resetRoot'; root: D };

/** Navigation event type names */
export type NavEventType = NavEvent<unknown>['type'];

/**
 * Translates navigation intents into back stack operations.
 *
 * @typeParam D - Destination type
 */
export interface Navigator<D> {
  /** Navigate to `destination`, making it the top of the stack */
  goTo(destination: D): void;

  /**
   * Go back one destination. At the root nothing is popped and `null` is
   * returned.
   */
  pop(): D | null;

  /**
   * Go back until the top destination matches `predicate`, stopping at the
   * root. Returns the popped destinations in pop order.
   */
  popUntil(predicate: (destination: D) => boolean): D[];

  /**
   * Replace the whole history with `newRoot`. Returns the removed
   * destinations, top-first.
   */
  resetRoot(newRoot: D): D[];

  /** The current destination, or `null` if there is none */
  peek(): D | null;

  /** Every destination on the stack, top-first */
  peekBackStack(): D[];

  /** Dispatch a {@link NavEvent} to the matching method */
  onNavEvent(event: NavEvent<D>): void;
}

/** Configuration for a stack navigator */
export interface NavigatorConfig {
  /**
   * Called when `pop` is requested at the root. Hosts typically finish the
   * activity or close the window here.
   */
  onRootPop?: () => void;
  logger?: StacklineLogger;
}

/** Navigator state published alongside each back stack snapshot */
export interface NavigatorState<D, R extends BackStackRecord<D> = BackStackRecord<D>> {
  readonly snapshot: BackStackSnapshot<R>;
  readonly topDestination: D | null;
  /** `true` if `pop` would remove a record */
  readonly canPop: boolean;
}

/** Anything a navigator state can be observed from */
export interface ObservableNavigator<D, R extends BackStackRecord<D> = BackStackRecord<D>>
  extends Navigator<D> {
  readonly state: Observable<NavigatorState<D, R>>;
  getState(): NavigatorState<D, R>;
}
