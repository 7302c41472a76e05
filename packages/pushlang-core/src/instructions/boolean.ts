/**
 * BOOLEAN instructions
 */

import { boolItem } from '../push/item.js';
import type { InstructionFunction, InstructionGroup } from '../push/instructions.js';
import { StackId } from '../push/state.js';
import { stackInstructions } from './common.js';

function binary(op: (a: boolean, b: boolean) => boolean): InstructionFunction {
  return state => {
    const operands = state.boolean.popVec(2);
    if (!operands) return;
    state.boolean.push(op(operands[0], operands[1]));
  };
}

const booleanNot: InstructionFunction = state => {
  const value = state.boolean.pop();
  if (value !== undefined) state.boolean.push(!value);
};

const booleanFromFloat: InstructionFunction = state => {
  const value = state.float.pop();
  if (value !== undefined) state.boolean.push(value !== 0);
};

const booleanFromInteger: InstructionFunction = state => {
  const value = state.integer.pop();
  if (value !== undefined) state.boolean.push(value !== 0);
};

const booleanRand: InstructionFunction = state => {
  state.boolean.push(state.random.next() < 0.5);
};

export const booleanInstructions: InstructionGroup = {
  ...stackInstructions<boolean>({
    prefix: 'BOOLEAN',
    id: StackId.Boolean,
    stack: state => state.boolean,
    equals: (a, b) => a === b,
    toItem: boolItem,
  }),
  'BOOLEAN.AND': binary((a, b) => a && b),
  'BOOLEAN.OR': binary((a, b) => a || b),
  'BOOLEAN.NOT': booleanNot,
  'BOOLEAN.FROMFLOAT': booleanFromFloat,
  'BOOLEAN.FROMINTEGER': booleanFromInteger,
  'BOOLEAN.RAND': booleanRand,
};
