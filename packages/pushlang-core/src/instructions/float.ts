/**
 * FLOAT instructions
 *
 * Operand order follows INTEGER: second item on the left, top on the right.
 * A result that is not finite is discarded and the operands stay.
 */

import { floatItem } from '../push/item.js';
import type { InstructionFunction, InstructionGroup } from '../push/instructions.js';
import { randomFloat } from '../push/random.js';
import { StackId } from '../push/state.js';
import { stackInstructions } from './common.js';

function arithmetic(op: (a: number, b: number) => number): InstructionFunction {
  return state => {
    const operands = state.float.copyVec(2);
    if (!operands) return;
    const result = op(operands[0], operands[1]);
    if (!Number.isFinite(result)) return;
    state.float.popVec(2);
    state.float.push(result);
  };
}

function unary(op: (a: number) => number): InstructionFunction {
  return state => {
    const value = state.float.copy(0);
    if (value === undefined) return;
    const result = op(value);
    if (!Number.isFinite(result)) return;
    state.float.pop();
    state.float.push(result);
  };
}

function comparison(op: (a: number, b: number) => boolean): InstructionFunction {
  return state => {
    const operands = state.float.popVec(2);
    if (!operands) return;
    state.boolean.push(op(operands[0], operands[1]));
  };
}

const floatFromBoolean: InstructionFunction = state => {
  const value = state.boolean.pop();
  if (value !== undefined) state.float.push(value ? 1 : 0);
};

const floatFromInteger: InstructionFunction = state => {
  const value = state.integer.pop();
  if (value !== undefined) state.float.push(value);
};

const floatRand: InstructionFunction = state => {
  const { minRandomFloat, maxRandomFloat } = state.configuration;
  state.float.push(randomFloat(state.random, minRandomFloat, maxRandomFloat));
};

export const floatInstructions: InstructionGroup = {
  ...stackInstructions<number>({
    prefix: 'FLOAT',
    id: StackId.Float,
    stack: state => state.float,
    equals: (a, b) => a === b,
    toItem: floatItem,
  }),
  'FLOAT.+': arithmetic((a, b) => a + b),
  'FLOAT.-': arithmetic((a, b) => a - b),
  'FLOAT.*': arithmetic((a, b) => a * b),
  // x / 0 and x % 0 are not finite
  'FLOAT./': arithmetic((a, b) => a / b),
  'FLOAT.%': arithmetic((a, b) => a % b),
  'FLOAT.<': comparison((a, b) => a < b),
  'FLOAT.>': comparison((a, b) => a > b),
  'FLOAT.MAX': arithmetic((a, b) => Math.max(a, b)),
  'FLOAT.MIN': arithmetic((a, b) => Math.min(a, b)),
  'FLOAT.COS': unary(Math.cos),
  'FLOAT.SIN': unary(Math.sin),
  'FLOAT.TAN': unary(Math.tan),
  'FLOAT.FROMBOOLEAN': floatFromBoolean,
  'FLOAT.FROMINTEGER': floatFromInteger,
  'FLOAT.RAND': floatRand,
};
