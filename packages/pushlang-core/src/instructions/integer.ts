/**
 * INTEGER instructions
 *
 * Integers are 32-bit signed; arithmetic wraps. For the binary operators
 * the second item is the left operand and the top item the right one, so
 * `7 2 INTEGER.-` leaves 5.
 */

import { intItem } from '../push/item.js';
import type { InstructionFunction, InstructionGroup } from '../push/instructions.js';
import { randomInt } from '../push/random.js';
import { StackId } from '../push/state.js';
import { stackInstructions } from './common.js';

/**
 * Binary operator; a null result leaves both operands in place
 */
function arithmetic(op: (a: number, b: number) => number | null): InstructionFunction {
  return state => {
    const operands = state.integer.copyVec(2);
    if (!operands) return;
    const result = op(operands[0], operands[1]);
    if (result === null) return;
    state.integer.popVec(2);
    state.integer.push(result);
  };
}

function comparison(op: (a: number, b: number) => boolean): InstructionFunction {
  return state => {
    const operands = state.integer.popVec(2);
    if (!operands) return;
    state.boolean.push(op(operands[0], operands[1]));
  };
}

const integerFromBoolean: InstructionFunction = state => {
  const value = state.boolean.pop();
  if (value !== undefined) state.integer.push(value ? 1 : 0);
};

const integerFromFloat: InstructionFunction = state => {
  const value = state.float.pop();
  if (value !== undefined) state.integer.push(Math.trunc(value) | 0);
};

const integerRand: InstructionFunction = state => {
  const { minRandomInteger, maxRandomInteger } = state.configuration;
  state.integer.push(randomInt(state.random, minRandomInteger, maxRandomInteger));
};

export const integerInstructions: InstructionGroup = {
  ...stackInstructions<number>({
    prefix: 'INTEGER',
    id: StackId.Integer,
    stack: state => state.integer,
    equals: (a, b) => a === b,
    toItem: intItem,
  }),
  'INTEGER.+': arithmetic((a, b) => (a + b) | 0),
  'INTEGER.-': arithmetic((a, b) => (a - b) | 0),
  'INTEGER.*': arithmetic((a, b) => Math.imul(a, b)),
  'INTEGER./': arithmetic((a, b) => (b === 0 ? null : Math.trunc(a / b) | 0)),
  'INTEGER.%': arithmetic((a, b) => (b === 0 ? null : (a % b) | 0)),
  'INTEGER.<': comparison((a, b) => a < b),
  'INTEGER.>': comparison((a, b) => a > b),
  'INTEGER.MAX': arithmetic((a, b) => Math.max(a, b)),
  'INTEGER.MIN': arithmetic((a, b) => Math.min(a, b)),
  'INTEGER.FROMBOOLEAN': integerFromBoolean,
  'INTEGER.FROMFLOAT': integerFromFloat,
  'INTEGER.RAND': integerRand,
};
