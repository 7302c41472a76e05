/**
 * BOOLVECTOR, INTVECTOR and FLOATVECTOR instructions
 *
 * The three groups are built from one table. Element operands come from the
 * matching scalar stack, indices and sizes from INTEGER.
 */

import {
  type Item,
  boolVectorItem,
  floatVectorItem,
  intVectorItem,
} from '../push/item.js';
import type { InstructionFunction, InstructionGroup } from '../push/instructions.js';
import type { Stack } from '../push/stack.js';
import { type PushState, StackId } from '../push/state.js';
import { type PushVector, makeVector } from '../push/vector.js';
import { clampIndex, popDepth, stackInstructions } from './common.js';

interface VectorDescriptor<T extends boolean | number> {
  prefix: string;
  /** Name of the scalar type in FROM<SCALAR>S, e.g. 'INTEGER' */
  scalar: string;
  id: StackId;
  zero: T;
  stack: (state: PushState) => Stack<PushVector<T>>;
  elements: (state: PushState) => Stack<T>;
  toItem: (value: PushVector<T>) => Item;
}

function vectorInstructions<T extends boolean | number>(descriptor: VectorDescriptor<T>): InstructionGroup {
  const { prefix, scalar, zero, stack, elements } = descriptor;

  /**
   * ZEROS: Pushes a vector of n zero elements, n clamped to
   * [0, maxVectorLength].
   */
  const zeros: InstructionFunction = state => {
    const n = state.integer.pop();
    if (n === undefined) return;
    const length = Math.max(0, Math.min(n, state.configuration.maxVectorLength));
    stack(state).push(makeVector(new Array<T>(length).fill(zero)));
  };

  /**
   * FROM<SCALAR>S: Pops a count n, then n scalars; the deepest popped scalar
   * becomes element 0.
   */
  const fromScalars: InstructionFunction = state => {
    const source = elements(state);
    const n = state.integer.copy(0);
    if (n === undefined || n < 0 || n > state.configuration.maxVectorLength) return;
    const available = source.size() - (Object.is(source, state.integer) ? 1 : 0);
    if (available < n) return;
    state.integer.pop();
    const values = source.popVec(n);
    if (values) stack(state).push(makeVector(values));
  };

  const get: InstructionFunction = state => {
    const vector = stack(state).copy(0);
    if (vector === undefined || vector.length === 0) return;
    const index = state.integer.pop();
    if (index === undefined) return;
    stack(state).pop();
    const value = vector.get(clampIndex(index, vector.length));
    if (value !== undefined) elements(state).push(value);
  };

  /**
   * SET: Pops an index and then a scalar and replaces that element in a copy
   * of the top vector.
   */
  const set: InstructionFunction = state => {
    const vector = stack(state).copy(0);
    if (vector === undefined || vector.length === 0) return;
    const source = elements(state);
    const index = popDepth(state, source, 1);
    if (index === undefined) return;
    const value = source.pop();
    if (value === undefined) return;
    stack(state).replace(0, vector.with(clampIndex(index, vector.length), value));
  };

  const length: InstructionFunction = state => {
    const vector = stack(state).pop();
    if (vector !== undefined) state.integer.push(vector.length);
  };

  return {
    ...stackInstructions<PushVector<T>>({
      prefix,
      id: descriptor.id,
      stack,
      equals: (a, b) => a.equals(b),
      toItem: descriptor.toItem,
    }),
    [`${prefix}.ZEROS`]: zeros,
    [`${prefix}.FROM${scalar}S`]: fromScalars,
    [`${prefix}.GET`]: get,
    [`${prefix}.SET`]: set,
    [`${prefix}.LENGTH`]: length,
  };
}

export const boolVectorInstructions = vectorInstructions<boolean>({
  prefix: 'BOOLVECTOR',
  scalar: 'BOOLEAN',
  id: StackId.BoolVector,
  zero: false,
  stack: state => state.boolVector,
  elements: state => state.boolean,
  toItem: boolVectorItem,
});

export const intVectorInstructions = vectorInstructions<number>({
  prefix: 'INTVECTOR',
  scalar: 'INTEGER',
  id: StackId.IntVector,
  zero: 0,
  stack: state => state.intVector,
  elements: state => state.integer,
  toItem: intVectorItem,
});

export const floatVectorInstructions = vectorInstructions<number>({
  prefix: 'FLOATVECTOR',
  scalar: 'FLOAT',
  id: StackId.FloatVector,
  zero: 0,
  stack: state => state.floatVector,
  elements: state => state.float,
  toItem: floatVectorItem,
});
