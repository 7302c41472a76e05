/**
 * Stack-manipulation instructions shared by every typed stack
 *
 * X.=, X.DEFINE, X.DUP, X.FLUSH, X.ID, X.POP, X.ROT, X.SHOVE,
 * X.STACKDEPTH, X.SWAP, X.YANK, X.YANKDUP
 *
 * Depth operands come from the INTEGER stack. When X is INTEGER itself the
 * depth is popped first and the operation applies to what remains.
 * Instructions whose operands are missing leave every stack untouched.
 */

import type { Item } from '../push/item.js';
import type { InstructionFunction, InstructionGroup } from '../push/instructions.js';
import type { Stack } from '../push/stack.js';
import type { PushState, StackId } from '../push/state.js';

export interface StackDescriptor<T> {
  /** Instruction prefix, e.g. 'INTEGER' */
  prefix: string;
  id: StackId;
  stack: (state: PushState) => Stack<T>;
  equals: (a: T, b: T) => boolean;
  /** Item bound by X.DEFINE; omitted for stacks without a DEFINE */
  toItem?: (value: T) => Item;
}

/**
 * Pop an INTEGER depth operand, but only if `required` values would remain
 * on the target stack once it is gone
 */
export function popDepth<T>(state: PushState, target: Stack<T>, required: number): number | undefined {
  const ownStack = Object.is(target, state.integer);
  const available = target.size() - (ownStack ? 1 : 0);
  if (state.integer.isEmpty() || available < required) {
    return undefined;
  }
  return state.integer.pop();
}

/**
 * Clamp an index into [0, size - 1]; size must be positive
 */
export function clampIndex(index: number, size: number): number {
  return Math.max(Math.min(size - 1, index), 0);
}

export function stackInstructions<T>(descriptor: StackDescriptor<T>): InstructionGroup {
  const { prefix, stack, equals, toItem } = descriptor;
  const group: Record<string, InstructionFunction> = {};

  group[`${prefix}.=`] = state => {
    const values = stack(state).copyVec(2);
    if (!values) return;
    stack(state).popVec(2);
    state.boolean.push(equals(values[0], values[1]));
  };

  if (toItem) {
    group[`${prefix}.DEFINE`] = state => {
      const s = stack(state);
      if (state.name.isEmpty() || s.isEmpty()) return;
      const name = state.name.pop();
      const value = s.pop();
      if (name === undefined || value === undefined) return;
      state.bindings.set(name, toItem(value));
    };
  }

  group[`${prefix}.DUP`] = state => {
    const s = stack(state);
    const top = s.copy(0);
    if (top !== undefined) s.push(top);
  };

  group[`${prefix}.FLUSH`] = state => {
    stack(state).flush();
  };

  group[`${prefix}.ID`] = state => {
    state.integer.push(descriptor.id);
  };

  group[`${prefix}.POP`] = state => {
    stack(state).pop();
  };

  group[`${prefix}.ROT`] = state => {
    const s = stack(state);
    if (s.size() >= 3) s.yank(2);
  };

  group[`${prefix}.SHOVE`] = state => {
    const s = stack(state);
    const depth = popDepth(state, s, 1);
    if (depth !== undefined) s.shove(depth);
  };

  group[`${prefix}.STACKDEPTH`] = state => {
    state.integer.push(stack(state).size());
  };

  group[`${prefix}.SWAP`] = state => {
    const s = stack(state);
    if (s.size() >= 2) s.shove(1);
  };

  group[`${prefix}.YANK`] = state => {
    const s = stack(state);
    const depth = popDepth(state, s, 1);
    if (depth !== undefined) s.yank(depth);
  };

  group[`${prefix}.YANKDUP`] = state => {
    const s = stack(state);
    const depth = popDepth(state, s, 1);
    if (depth !== undefined) s.yankDup(depth);
  };

  return group;
}
