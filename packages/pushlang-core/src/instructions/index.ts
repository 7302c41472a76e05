/**
 * Standard instruction groups
 */

import { InstructionSet, type InstructionGroup } from '../push/instructions.js';
import { booleanInstructions } from './boolean.js';
import { codeInstructions } from './code.js';
import { execInstructions } from './execution.js';
import { floatInstructions } from './float.js';
import { integerInstructions } from './integer.js';
import { listInstructions } from './list.js';
import { nameInstructions } from './name.js';
import { boolVectorInstructions, floatVectorInstructions, intVectorInstructions } from './vector.js';

export const standardInstructionGroups: readonly InstructionGroup[] = [
  booleanInstructions,
  boolVectorInstructions,
  codeInstructions,
  execInstructions,
  floatInstructions,
  floatVectorInstructions,
  integerInstructions,
  intVectorInstructions,
  listInstructions,
  nameInstructions,
];

/**
 * Instruction set holding NOOP and every standard group
 */
export function createInstructionSet(): InstructionSet {
  const set = new InstructionSet();
  set.load(standardInstructionGroups);
  return set;
}

export {
  booleanInstructions,
  boolVectorInstructions,
  codeInstructions,
  execInstructions,
  floatInstructions,
  floatVectorInstructions,
  integerInstructions,
  intVectorInstructions,
  listInstructions,
  nameInstructions,
};
export { randomCode } from './code.js';
export { clampIndex, popDepth, stackInstructions, type StackDescriptor } from './common.js';
