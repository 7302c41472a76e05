/**
 * FLOAT instruction tests
 */

import { describe, it, expect } from 'vitest';
import { floatInstructions } from './float.js';
import { PushState } from '../push/state.js';
import { resolveConfiguration } from '../push/configuration.js';

function execute(name: string, state: PushState): void {
  floatInstructions[name](state, []);
}

function withFloats(...values: number[]): PushState {
  const state = new PushState();
  for (const value of values) state.float.push(value);
  return state;
}

describe('FLOAT arithmetic', () => {
  it('should use the second item as the left operand', () => {
    const state = withFloats(7.5, 2.5);
    execute('FLOAT.-', state);
    expect(state.float.toString()).toBe('1:5;');
  });

  it('should divide', () => {
    const state = withFloats(1, 4);
    execute('FLOAT./', state);
    expect(state.float.toString()).toBe('1:0.25;');
  });

  it('should leave both operands on division by zero', () => {
    const state = withFloats(1.5, 0);
    execute('FLOAT./', state);
    expect(state.float.toString()).toBe('1:0; 2:1.5;');
    execute('FLOAT.%', state);
    expect(state.float.toString()).toBe('1:0; 2:1.5;');
  });

  it('should discard overflowing results', () => {
    const state = withFloats(1e308, 10);
    execute('FLOAT.*', state);
    expect(state.float.size()).toBe(2);
  });

  it('should apply trigonometric functions', () => {
    const state = withFloats(0);
    execute('FLOAT.COS', state);
    expect(state.float.toString()).toBe('1:1;');
    execute('FLOAT.SIN', state);
    expect(state.float.pop()).toBeCloseTo(Math.sin(1));
  });

  it('should compare onto BOOLEAN', () => {
    const state = withFloats(1.5, 2.5);
    execute('FLOAT.<', state);
    expect(state.boolean.toString()).toBe('1:true;');
    expect(state.float.isEmpty()).toBe(true);
  });

  it('should pick the maximum and minimum', () => {
    const state = withFloats(-1, 3);
    execute('FLOAT.MAX', state);
    expect(state.float.toString()).toBe('1:3;');
  });
});

describe('FLOAT conversions', () => {
  it('should convert from BOOLEAN and INTEGER', () => {
    const state = new PushState();
    state.boolean.push(true);
    state.integer.push(3);
    execute('FLOAT.FROMBOOLEAN', state);
    execute('FLOAT.FROMINTEGER', state);
    expect(state.float.toString()).toBe('1:3; 2:1;');
  });

  it('should draw random floats within the configured range', () => {
    const state = new PushState(resolveConfiguration({ seed: 11, minRandomFloat: 2, maxRandomFloat: 3 }));
    execute('FLOAT.RAND', state);
    const value = state.float.pop();
    expect(value).toBeGreaterThanOrEqual(2);
    expect(value).toBeLessThan(3);
  });

  it('should push its stack id', () => {
    const state = new PushState();
    execute('FLOAT.ID', state);
    expect(state.integer.toString()).toBe('1:5;');
  });
});
