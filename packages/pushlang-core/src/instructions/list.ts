/**
 * LIST instructions
 *
 * Lists are CODE items assembled from the tops of other stacks. The stacks
 * to draw from are named by an INTVECTOR of stack ids, so
 * `[ 7 7 1 ]` builds a list of two integers and a boolean.
 */

import {
  type Item,
  boolItem,
  boolVectorItem,
  floatItem,
  floatVectorItem,
  identifierItem,
  intItem,
  intVectorItem,
  listItem,
} from '../push/item.js';
import type { InstructionFunction, InstructionGroup } from '../push/instructions.js';
import type { Stack } from '../push/stack.js';
import { type PushState, StackId } from '../push/state.js';
import { findNeighbors } from '../push/topology.js';
import type { IntVector } from '../push/vector.js';
import { clampIndex } from './common.js';

interface ItemSource {
  size: (state: PushState) => number;
  take: (state: PushState) => Item | undefined;
}

function source<T>(stack: (state: PushState) => Stack<T>, toItem: (value: T) => Item): ItemSource {
  return {
    size: state => stack(state).size(),
    take: state => {
      const value = stack(state).pop();
      return value === undefined ? undefined : toItem(value);
    },
  };
}

const sources: ReadonlyMap<number, ItemSource> = new Map<number, ItemSource>([
  [StackId.Boolean, source(state => state.boolean, boolItem)],
  [StackId.BoolVector, source(state => state.boolVector, boolVectorItem)],
  [StackId.Code, source(state => state.code, item => item)],
  [StackId.Exec, source(state => state.exec, item => item)],
  [StackId.Float, source(state => state.float, floatItem)],
  [StackId.FloatVector, source(state => state.floatVector, floatVectorItem)],
  [StackId.Integer, source(state => state.integer, intItem)],
  [StackId.IntVector, source(state => state.intVector, intVectorItem)],
  [StackId.Name, source(state => state.name, identifierItem)],
]);

/**
 * Whether every stack named in `ids` holds enough items. `reserved` counts
 * operands the caller is about to pop from a stack itself.
 */
function canGenerate(state: PushState, ids: IntVector, reserved: ReadonlyMap<number, number>): boolean {
  const demand = new Map<number, number>();
  for (const id of ids.values) {
    if (sources.has(id)) demand.set(id, (demand.get(id) ?? 0) + 1);
  }
  for (const [id, count] of demand) {
    const entry = sources.get(id);
    if (!entry) continue;
    const available = entry.size(state) - (reserved.get(id) ?? 0);
    if (available < count) return false;
  }
  return true;
}

/**
 * Pop one item per id, in vector order; unknown ids are skipped
 */
function generateList(state: PushState, ids: IntVector): Item {
  const items: Item[] = [];
  for (const id of ids.values) {
    const item = sources.get(id)?.take(state);
    if (item !== undefined) items.push(item);
  }
  return listItem(items);
}

/**
 * LIST.ADD: Pushes a list built from the stacks named by the top INTVECTOR
 * onto CODE.
 */
const listAdd: InstructionFunction = state => {
  const ids = state.intVector.copy(0);
  if (ids === undefined) return;
  if (!canGenerate(state, ids, new Map<number, number>([[StackId.IntVector, 1]]))) return;
  state.intVector.pop();
  state.code.push(generateList(state, ids));
};

/**
 * LIST.GET: Pushes a copy of the CODE item at the clamped INTEGER index onto
 * EXEC.
 */
const listGet: InstructionFunction = state => {
  if (state.code.isEmpty()) return;
  const index = state.integer.pop();
  if (index === undefined) return;
  const item = state.code.copy(clampIndex(index, state.code.size()));
  if (item !== undefined) state.exec.push(item);
};

/**
 * LIST.SET: Replaces the CODE item at the clamped INTEGER index with a list
 * built from the stacks named by the top INTVECTOR.
 */
const listSet: InstructionFunction = state => {
  if (state.code.isEmpty() || state.integer.isEmpty()) return;
  const ids = state.intVector.copy(0);
  if (ids === undefined) return;
  const reserved = new Map<number, number>([[StackId.IntVector, 1], [StackId.Integer, 1]]);
  if (!canGenerate(state, ids, reserved)) return;
  const index = state.integer.pop();
  state.intVector.pop();
  if (index === undefined) return;
  const list = generateList(state, ids);
  // CODE items drawn into the list shift the stack, so clamp afterwards
  if (state.code.isEmpty()) {
    state.code.push(list);
    return;
  }
  state.code.replace(clampIndex(index, state.code.size()), list);
};

/**
 * LIST.NEIGHBORS: Pushes the indices within FLOAT radius of an index in a
 * grid. INTEGER holds dimensions, index and size, size on top.
 *
 * A neighborhood that would take the state past the configured growth cap
 * is a no-op.
 */
const listNeighbors: InstructionFunction = state => {
  const topology = state.integer.copyVec(3);
  const radius = state.float.copy(0);
  if (!topology || radius === undefined) return;
  const [dimensions, index, size] = topology;
  // the four operands are popped before the result is pushed
  const budget = state.configuration.growthCap - (state.points() - 4);
  const neighbors = findNeighbors(size, dimensions, index, radius, Math.max(budget, 0));
  if (neighbors === undefined) return;
  state.integer.popVec(3);
  state.float.pop();
  for (const neighbor of neighbors) {
    state.integer.push(neighbor);
  }
};

export const listInstructions: InstructionGroup = {
  'LIST.ADD': listAdd,
  'LIST.GET': listGet,
  'LIST.SET': listSet,
  'LIST.NEIGHBORS': listNeighbors,
};
