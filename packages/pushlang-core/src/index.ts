/**
 * pushlang core - interpreter for the Push stack-based language
 *
 * This is the core library containing:
 * - Item model, typed stacks and interpreter state
 * - Parser for Push source
 * - Execution loop with step and growth budgets
 * - Standard instruction groups
 * - Grid topology used by LIST.NEIGHBORS
 */

export * from './push/item.js';
export * from './push/vector.js';
export { Stack, type Renderer } from './push/stack.js';
export { PushState, StackId } from './push/state.js';
export {
  InstructionSet,
  type InstructionCache,
  type InstructionFunction,
  type InstructionGroup,
} from './push/instructions.js';
export { PushParseError, Parser, classifyToken, parse, parseProgram, loadProgram } from './push/parser.js';
export { PushInterpreter, type RunOptions, type RunResult, type RunStatus } from './push/interpreter.js';
export {
  type InitialStacks,
  type PushConfiguration,
  type UnboundIdentifierPolicy,
  defaultConfiguration,
  resolveConfiguration,
  loadConfiguration,
} from './push/configuration.js';
export { type RandomSource, createRandomSource, randomInt, randomFloat, randomElement } from './push/random.js';
export { findNeighbors, hypercubeExtent, toCoordinates, toIndex } from './push/topology.js';

export * from './instructions/index.js';
