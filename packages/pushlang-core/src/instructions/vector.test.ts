/**
 * Vector instruction tests
 */

import { describe, it, expect } from 'vitest';
import { boolVectorInstructions, floatVectorInstructions, intVectorInstructions } from './vector.js';
import { intVectorItem } from '../push/item.js';
import { PushState } from '../push/state.js';
import { resolveConfiguration } from '../push/configuration.js';
import { makeVector } from '../push/vector.js';

describe('ZEROS', () => {
  it('should push a vector of zeros', () => {
    const state = new PushState();
    state.integer.push(3);
    intVectorInstructions['INTVECTOR.ZEROS'](state, []);
    expect(state.intVector.toString()).toBe('1:[0,0,0];');
    expect(state.integer.isEmpty()).toBe(true);
  });

  it('should use FALSE for boolean vectors', () => {
    const state = new PushState();
    state.integer.push(2);
    boolVectorInstructions['BOOLVECTOR.ZEROS'](state, []);
    expect(state.boolVector.toString()).toBe('1:[false,false];');
  });

  it('should clamp the length', () => {
    const state = new PushState(resolveConfiguration({ maxVectorLength: 2 }));
    state.integer.push(-1);
    state.integer.push(5);
    floatVectorInstructions['FLOATVECTOR.ZEROS'](state, []);
    floatVectorInstructions['FLOATVECTOR.ZEROS'](state, []);
    expect(state.floatVector.toString()).toBe('1:[]; 2:[0,0];');
  });
});

describe('FROM<SCALAR>S', () => {
  it('should collect integers with the deepest first', () => {
    const state = new PushState();
    state.integer.push(1);
    state.integer.push(2);
    state.integer.push(3);
    state.integer.push(3);
    intVectorInstructions['INTVECTOR.FROMINTEGERS'](state, []);
    expect(state.intVector.toString()).toBe('1:[1,2,3];');
    expect(state.integer.isEmpty()).toBe(true);
  });

  it('should collect booleans', () => {
    const state = new PushState();
    state.boolean.push(true);
    state.boolean.push(false);
    state.integer.push(2);
    boolVectorInstructions['BOOLVECTOR.FROMBOOLEANS'](state, []);
    expect(state.boolVector.toString()).toBe('1:[true,false];');
  });

  it('should do nothing when too few scalars are available', () => {
    const state = new PushState();
    state.float.push(1.5);
    state.integer.push(2);
    floatVectorInstructions['FLOATVECTOR.FROMFLOATS'](state, []);
    expect(state.floatVector.isEmpty()).toBe(true);
    expect(state.integer.toString()).toBe('1:2;');
    expect(state.float.toString()).toBe('1:1.5;');
  });
});

describe('GET and SET', () => {
  it('should push the element at the index', () => {
    const state = new PushState();
    state.intVector.push(makeVector([4, 5, 6]));
    state.integer.push(1);
    intVectorInstructions['INTVECTOR.GET'](state, []);
    expect(state.integer.toString()).toBe('1:5;');
  });

  it('should clamp the index', () => {
    const state = new PushState();
    state.intVector.push(makeVector([4, 5, 6]));
    state.integer.push(10);
    intVectorInstructions['INTVECTOR.GET'](state, []);
    expect(state.integer.toString()).toBe('1:6;');
  });

  it('should leave an empty vector alone', () => {
    const state = new PushState();
    state.intVector.push(makeVector<number>([]));
    state.integer.push(0);
    intVectorInstructions['INTVECTOR.GET'](state, []);
    expect(state.integer.toString()).toBe('1:0;');
    expect(state.intVector.size()).toBe(1);
  });

  it('should replace an element in a copy', () => {
    const original = makeVector([4, 5, 6]);
    const state = new PushState();
    state.intVector.push(original);
    state.integer.push(9); // value
    state.integer.push(0); // index
    intVectorInstructions['INTVECTOR.SET'](state, []);
    expect(state.intVector.toString()).toBe('1:[9,5,6];');
    expect(original.toString()).toBe('[4,5,6]');
    expect(state.integer.isEmpty()).toBe(true);
  });

  it('should take the element from the matching scalar stack', () => {
    const state = new PushState();
    state.boolVector.push(makeVector([false, false]));
    state.boolean.push(true);
    state.integer.push(1);
    boolVectorInstructions['BOOLVECTOR.SET'](state, []);
    expect(state.boolVector.toString()).toBe('1:[false,true];');
  });
});

describe('Vector stack instructions', () => {
  it('should push the length', () => {
    const state = new PushState();
    state.floatVector.push(makeVector([0.5]));
    floatVectorInstructions['FLOATVECTOR.LENGTH'](state, []);
    expect(state.integer.toString()).toBe('1:1;');
  });

  it('should compare element-wise', () => {
    const state = new PushState();
    state.floatVector.push(makeVector([0.5, 1]));
    state.floatVector.push(makeVector([0.5, 1]));
    floatVectorInstructions['FLOATVECTOR.='](state, []);
    expect(state.boolean.toString()).toBe('1:true;');
  });

  it('should bind a vector with DEFINE', () => {
    const vector = makeVector([1, 2]);
    const state = new PushState();
    state.intVector.push(vector);
    state.name.push('V');
    intVectorInstructions['INTVECTOR.DEFINE'](state, []);
    expect(state.bindings.get('V')).toEqual(intVectorItem(vector));
  });

  it('should push its stack id', () => {
    const state = new PushState();
    boolVectorInstructions['BOOLVECTOR.ID'](state, []);
    expect(state.integer.toString()).toBe('1:2;');
  });
});
