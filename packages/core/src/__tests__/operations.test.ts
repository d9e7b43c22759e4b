import { describe, it, expect } from 'vitest';
import { createBackStack } from '../back-stack/back-stack.js';
import {
  containsKey,
  destinations,
  isAtRoot,
  isEmpty,
  popUntil,
  rootRecord,
} from '../back-stack/operations.js';
import type { PoppableStack } from '../back-stack/types.js';
import { createRecord } from '../record/index.js';

/** Array-backed stack exposing only the two primitives popUntil needs */
function primitiveStack<R>(items: R[]): PoppableStack<R> & { items: R[] } {
  return {
    items,
    get topRecord() {
      return items[items.length - 1] ?? null;
    },
    pop() {
      return items.pop() ?? null;
    },
  };
}

describe('popUntil', () => {
  it('should work against topRecord and pop alone', () => {
    const stack = primitiveStack(['root', 'list', 'details', 'photo']);

    const popped = popUntil(stack, (screen) => screen === 'list');

    expect(popped).toEqual(['photo', 'details']);
    expect(stack.items).toEqual(['root', 'list']);
  });

  it('should drain the stack when the predicate never matches', () => {
    const stack = primitiveStack([1, 2, 3]);

    expect(popUntil(stack, () => false)).toEqual([3, 2, 1]);
    expect(stack.topRecord).toBeNull();
  });

  it('should return immediately on an empty stack', () => {
    const stack = primitiveStack<string>([]);
    expect(popUntil(stack, () => false)).toEqual([]);
  });

  it('should stop if pop yields nothing while a top is still reported', () => {
    const stuck: PoppableStack<string> = {
      topRecord: 'frozen',
      pop: () => null,
    };
    expect(popUntil(stuck, () => false)).toEqual([]);
  });
});

describe('isEmpty / isAtRoot', () => {
  it('should derive from size', () => {
    expect(isEmpty({ size: 0 })).toBe(true);
    expect(isEmpty({ size: 1 })).toBe(false);
    expect(isAtRoot({ size: 1 })).toBe(true);
    expect(isAtRoot({ size: 0 })).toBe(false);
    expect(isAtRoot({ size: 2 })).toBe(false);
  });

  it('should apply to back stacks', () => {
    const stack = createBackStack<string>({ initial: ['home'] });
    expect(isAtRoot(stack)).toBe(true);
    stack.pop();
    expect(isEmpty(stack)).toBe(true);
    stack.destroy();
  });
});

describe('rootRecord', () => {
  it('should return the bottom record', () => {
    const root = createRecord('home', 'root');
    const stack = createBackStack<string>({ initial: [root, 'list', 'details'] });

    expect(rootRecord(stack)).toBe(root);
    stack.destroy();
  });

  it('should return null for an empty stack', () => {
    expect(rootRecord(createBackStack<string>())).toBeNull();
  });
});

describe('destinations', () => {
  it('should list destinations top-first', () => {
    const stack = createBackStack<string>({ initial: ['home', 'list', 'details'] });
    expect(destinations(stack)).toEqual(['details', 'list', 'home']);
    stack.destroy();
  });
});

describe('containsKey', () => {
  it('should find live keys only', () => {
    const stack = createBackStack<string>();
    stack.push(createRecord('home', 'k-home'));
    stack.push(createRecord('list', 'k-list'));
    stack.pop();

    expect(containsKey(stack, 'k-home')).toBe(true);
    expect(containsKey(stack, 'k-list')).toBe(false);
    stack.destroy();
  });
});
