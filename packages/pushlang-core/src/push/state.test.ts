/**
 * Interpreter state tests
 */

import { describe, it, expect } from 'vitest';
import { PushState } from './state.js';
import { floatItem, intItem, intVectorItem, listItem } from './item.js';
import { makeVector } from './vector.js';

describe('PushState', () => {
  it('should route literals by type', () => {
    const state = new PushState();
    state.pushLiteral(intItem(3));
    state.pushLiteral(floatItem(0.5));
    state.pushLiteral(intVectorItem(makeVector([1, 2])));
    expect(state.integer.toString()).toBe('1:3;');
    expect(state.float.toString()).toBe('1:0.5;');
    expect(state.intVector.toString()).toBe('1:[1,2];');
  });

  it('should print non-empty stacks in label order', () => {
    const state = new PushState();
    state.name.push('X');
    state.integer.push(1);
    state.exec.push(intItem(2));
    state.boolean.push(true);
    expect(state.toString()).toBe('BOOLEAN: 1:true;\nEXEC: 1:Literal(2);\nINTEGER: 1:1;\nNAME: 1:X;');
  });

  it('should print nothing for an empty state', () => {
    expect(new PushState().toString()).toBe('');
  });

  it('should count points across stacks', () => {
    const state = new PushState();
    state.exec.push(listItem([intItem(1), intItem(2)]));
    state.code.push(intItem(3));
    state.integer.push(4);
    state.name.push('N');
    expect(state.points()).toBe(6);
  });
});
