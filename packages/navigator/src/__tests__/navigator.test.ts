import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { firstValueFrom } from 'rxjs';
import {
  type LogEntry,
  type SimpleBackStack,
  StacklineError,
  createBackStack,
  createLogger,
  createSequentialKeyGenerator,
} from '@stackline/core';
import { StackNavigator, createNavigator } from '../navigator.js';
import type { NavigatorState } from '../types.js';

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

type Screen =
  | { name: 'list' }
  | { name: 'details'; id: string }
  | { name: 'photo'; id: string }
  | { name: 'about' };

const LIST: Screen = { name: 'list' };
const ABOUT: Screen = { name: 'about' };

function details(id: string): Screen {
  return { name: 'details', id };
}

function photo(id: string): Screen {
  return { name: 'photo', id };
}

/* ================================================================== */
/*  StackNavigator                                                     */
/* ================================================================== */

describe('StackNavigator', () => {
  let stack: SimpleBackStack<Screen>;
  let navigator: StackNavigator<Screen>;
  let onRootPop: () => void;

  beforeEach(() => {
    stack = createBackStack<Screen>({
      initial: [LIST],
      keyGenerator: createSequentialKeyGenerator('nav'),
    });
    onRootPop = vi.fn();
    navigator = createNavigator(stack, { onRootPop });
  });

  afterEach(() => {
    navigator.destroy();
    stack.destroy();
  });

  it('should be created by the factory over the given stack', () => {
    expect(navigator).toBeInstanceOf(StackNavigator);
    expect(navigator.backStack).toBe(stack);
  });

  /* ---- goTo ------------------------------------------------------ */

  describe('goTo', () => {
    it('should push the destination', () => {
      navigator.goTo(details('pet-1'));

      expect(stack.size).toBe(2);
      expect(navigator.peek()).toEqual(details('pet-1'));
      expect(stack.topRecord?.key).toBe('nav-2');
    });
  });

  /* ---- pop ------------------------------------------------------- */

  describe('pop', () => {
    it('should pop and return the previous top destination', () => {
      navigator.goTo(details('pet-1'));

      expect(navigator.pop()).toEqual(details('pet-1'));
      expect(navigator.peek()).toEqual(LIST);
      expect(onRootPop).not.toHaveBeenCalled();
    });

    it('should keep the root and report the root pop', () => {
      expect(navigator.pop()).toBeNull();

      expect(stack.size).toBe(1);
      expect(onRootPop).toHaveBeenCalledTimes(1);
    });

    it('should report a root pop on an empty stack', () => {
      stack.pop();

      expect(navigator.pop()).toBeNull();
      expect(onRootPop).toHaveBeenCalledTimes(1);
    });

    it('should not require an onRootPop callback', () => {
      const bare = createNavigator(stack);
      expect(bare.pop()).toBeNull();
      expect(stack.size).toBe(1);
    });
  });

  /* ---- popUntil -------------------------------------------------- */

  describe('popUntil', () => {
    it('should pop down to the matching destination', () => {
      navigator.goTo(details('pet-1'));
      navigator.goTo(photo('pet-1'));
      navigator.goTo(details('pet-2'));

      const popped = navigator.popUntil((screen) => screen.name === 'photo');

      expect(popped).toEqual([details('pet-2')]);
      expect(navigator.peek()).toEqual(photo('pet-1'));
    });

    it('should stop at the root when nothing matches', () => {
      navigator.goTo(details('pet-1'));
      navigator.goTo(details('pet-2'));

      const popped = navigator.popUntil(() => false);

      expect(popped).toEqual([details('pet-2'), details('pet-1')]);
      expect(stack.size).toBe(1);
      expect(navigator.peek()).toEqual(LIST);
      expect(onRootPop).not.toHaveBeenCalled();
    });
  });

  /* ---- resetRoot ------------------------------------------------- */

  describe('resetRoot', () => {
    it('should replace the history with the new root', () => {
      navigator.goTo(details('pet-1'));

      const removed = navigator.resetRoot(ABOUT);

      expect(removed).toEqual([details('pet-1'), LIST]);
      expect(navigator.peekBackStack()).toEqual([ABOUT]);
      expect(stack.isAtRoot).toBe(true);
    });

    it('should publish a single snapshot', () => {
      navigator.goTo(details('pet-1'));
      const sizes: number[] = [];
      const subscription = stack.state.subscribe((s) => sizes.push(s.size));

      navigator.resetRoot(ABOUT);
      subscription.unsubscribe();

      expect(sizes).toEqual([2, 1]);
    });

    it('should work on an empty stack', () => {
      stack.pop();
      expect(navigator.resetRoot(ABOUT)).toEqual([]);
      expect(navigator.peek()).toEqual(ABOUT);
    });
  });

  /* ---- Queries --------------------------------------------------- */

  describe('peek', () => {
    it('should return null when the stack is empty', () => {
      stack.pop();
      expect(navigator.peek()).toBeNull();
      expect(navigator.peekBackStack()).toEqual([]);
    });

    it('should list destinations top-first', () => {
      navigator.goTo(details('pet-1'));
      navigator.goTo(photo('pet-1'));
      expect(navigator.peekBackStack()).toEqual([photo('pet-1'), details('pet-1'), LIST]);
    });
  });

  /* ---- onNavEvent ------------------------------------------------ */

  describe('onNavEvent', () => {
    it('should dispatch each event type', () => {
      navigator.onNavEvent({ type: 'goTo', destination: details('pet-3') });
      expect(navigator.peek()).toEqual(details('pet-3'));

      navigator.onNavEvent({ type: 'pop' });
      expect(navigator.peek()).toEqual(LIST);

      navigator.onNavEvent({ type: 'pop' });
      expect(onRootPop).toHaveBeenCalledTimes(1);

      navigator.onNavEvent({ type: 'resetRoot', root: ABOUT });
      expect(navigator.peekBackStack()).toEqual([ABOUT]);
    });
  });

  /* ---- State ----------------------------------------------------- */

  describe('state', () => {
    it('should derive navigator state from the stack snapshot', async () => {
      navigator.goTo(details('pet-1'));

      const state = await firstValueFrom(navigator.state);

      expect(state.topDestination).toEqual(details('pet-1'));
      expect(state.canPop).toBe(true);
      expect(state.snapshot).toBe(stack.getSnapshot());
    });

    it('should emit after every navigation', () => {
      const states: NavigatorState<Screen>[] = [];
      const subscription = navigator.state.subscribe((s) => states.push(s));

      navigator.goTo(ABOUT);
      navigator.pop();
      subscription.unsubscribe();

      expect(states.map((s) => s.canPop)).toEqual([false, true, false]);
      expect(states.map((s) => s.topDestination)).toEqual([LIST, ABOUT, LIST]);
    });

    it('should report getState synchronously', () => {
      expect(navigator.getState()).toMatchObject({ topDestination: LIST, canPop: false });
    });

    it('should report the current stack from getState after the stack is destroyed', () => {
      stack.destroy();
      stack.push(ABOUT);

      expect(navigator.getState()).toMatchObject({ topDestination: ABOUT, canPop: true });
    });
  });

  /* ---- Logging --------------------------------------------------- */

  it('should log navigation at debug level', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ module: 'nav', level: 'debug', handler: (e) => entries.push(e) });
    const logged = createNavigator(stack, { logger });

    logged.goTo(ABOUT);
    logged.pop();

    expect(entries.map((e) => e.message)).toEqual(['goTo', 'pop']);
    expect(entries[0]!.context).toEqual({ key: 'nav-2', size: 2 });
  });

  /* ---- Lifecycle ------------------------------------------------- */

  describe('destroy', () => {
    it('should reject navigation after destroy', () => {
      navigator.destroy();

      expect(() => navigator.goTo(ABOUT)).toThrow(StacklineError);
      try {
        navigator.pop();
      } catch (error) {
        expect(StacklineError.isCode(error, 'STACKLINE_N300')).toBe(true);
      }
      expect(stack.size).toBe(1);
    });
  });
});
