/**
 * Tests for the Element Stack
 */

import { ElementStack } from '../src/core/element-stack';

describe('ElementStack', () => {
  test('starts empty at depth zero', () => {
    const stack = new ElementStack();
    expect(stack.isEmpty()).toBe(true);
    expect(stack.depth).toBe(0);
    expect(stack.peek()).toBeNull();
    expect(stack.pop()).toBeNull();
  });

  test('pushes and pops in LIFO order', () => {
    const stack = new ElementStack();
    stack.push('a');
    stack.push('b');

    expect(stack.depth).toBe(2);
    expect(stack.peek()).toBe('b');
    expect(stack.pop()).toBe('b');
    expect(stack.pop()).toBe('a');
    expect(stack.isEmpty()).toBe(true);
  });

  test('lists names innermost first without changing the stack', () => {
    const stack = new ElementStack();
    stack.push('html');
    stack.push('body');
    stack.push('div');

    expect(stack.names()).toEqual(['div', 'body', 'html']);
    expect(stack.depth).toBe(3);
    expect(stack.peek()).toBe('div');
  });
});
