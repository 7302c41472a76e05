/**
 * NAME instructions
 */

import type { InstructionFunction, InstructionGroup } from '../push/instructions.js';
import { randomElement, randomInt } from '../push/random.js';
import { StackId } from '../push/state.js';
import { stackInstructions } from './common.js';

/**
 * NAME.QUOTE: The next identifier executed is pushed onto NAME, even when it
 * is bound.
 */
const nameQuote: InstructionFunction = state => {
  state.quoteNextName = true;
};

/**
 * NAME.RAND: Pushes a generated name.
 */
const nameRand: InstructionFunction = state => {
  state.name.push(`n${randomInt(state.random, 0, 0x7fffffff)}`);
};

/**
 * NAME.RANDBOUNDNAME: Pushes one of the currently bound names.
 */
const nameRandBoundName: InstructionFunction = state => {
  const bound = [...state.bindings.keys()].sort();
  const name = randomElement(state.random, bound);
  if (name !== undefined) state.name.push(name);
};

export const nameInstructions: InstructionGroup = {
  ...stackInstructions<string>({
    prefix: 'NAME',
    id: StackId.Name,
    stack: state => state.name,
    equals: (a, b) => a === b,
  }),
  'NAME.QUOTE': nameQuote,
  'NAME.RAND': nameRand,
  'NAME.RANDBOUNDNAME': nameRandBoundName,
};
