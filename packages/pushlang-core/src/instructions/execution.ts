/**
 * EXEC instructions
 *
 * The EXEC stack is the live program: whatever is on it runs next. These
 * instructions rewrite it, which is how Push expresses conditionals, loops
 * and recursion. Loops are macros that expand into EXEC.DO*RANGE calls.
 */

import {
  instructionItem,
  intItem,
  listItem,
  renderItem,
} from '../push/item.js';
import type { InstructionFunction, InstructionGroup } from '../push/instructions.js';
import { StackId } from '../push/state.js';
import { popDepth } from './common.js';

const DO_RANGE = instructionItem('EXEC.DO*RANGE');
const EXEC_Y = instructionItem('EXEC.Y');
const INTEGER_POP = instructionItem('INTEGER.POP');

/**
 * EXEC.=: Pushes TRUE onto BOOLEAN if the top two EXEC items render the
 * same. Neither item is removed.
 */
const execEq: InstructionFunction = state => {
  const items = state.exec.copyVec(2);
  if (!items) return;
  state.boolean.push(renderItem(items[0]) === renderItem(items[1]));
};

/**
 * EXEC.DEFINE: Binds the top NAME to the top EXEC item.
 */
const execDefine: InstructionFunction = state => {
  if (state.name.isEmpty() || state.exec.isEmpty()) return;
  const name = state.name.pop();
  const item = state.exec.pop();
  if (name === undefined || item === undefined) return;
  state.bindings.set(name, item);
};

/**
 * EXEC.DO*COUNT: Runs the top EXEC item n times (n from INTEGER), with the
 * counter 0 .. n-1 pushed before each iteration. Non-positive n is a NOOP.
 *
 * Expands into ( 0 <n - 1> EXEC.DO*RANGE <body> )
 */
const execDoCount: InstructionFunction = state => {
  const count = state.integer.copy(0);
  if (count === undefined || state.exec.isEmpty() || count <= 0) return;
  state.integer.pop();
  const body = state.exec.pop();
  if (body === undefined) return;
  state.exec.push(listItem([intItem(0), intItem(count - 1), DO_RANGE, body]));
};

/**
 * EXEC.DO*RANGE: Counted loop over an inclusive range. The top INTEGER is
 * the destination index, the one beneath it the current index, the top
 * EXEC item is the body.
 *
 * The current index is pushed onto INTEGER. If it equals the destination,
 * the body is pushed once; otherwise a continuation with the index moved one
 * step towards the destination is pushed, then the body on top of it.
 */
const execDoRange: InstructionFunction = state => {
  if (state.exec.isEmpty()) return;
  const indices = state.integer.popVec(2);
  if (!indices) return;
  const body = state.exec.pop();
  if (body === undefined) return;

  const [current, destination] = indices;
  state.integer.push(current);

  if (current === destination) {
    state.exec.push(body);
    return;
  }

  const next = current < destination ? current + 1 : current - 1;
  state.exec.push(listItem([intItem(next), intItem(destination), DO_RANGE, body]));
  state.exec.push(body);
};

/**
 * EXEC.DO*TIMES: Like EXEC.DO*RANGE, but the loop counter is popped before
 * the body runs.
 *
 * Expands into ( <current> <destination> EXEC.DO*RANGE ( INTEGER.POP <body> ) )
 */
const execDoTimes: InstructionFunction = state => {
  if (state.exec.isEmpty()) return;
  const indices = state.integer.popVec(2);
  if (!indices) return;
  const body = state.exec.pop();
  if (body === undefined) return;

  const [current, destination] = indices;
  state.exec.push(listItem([
    intItem(current),
    intItem(destination),
    DO_RANGE,
    listItem([INTEGER_POP, body]),
  ]));
};

/**
 * EXEC.DUP: Duplicates the top EXEC item ("do twice").
 */
const execDup: InstructionFunction = state => {
  const top = state.exec.copy(0);
  if (top !== undefined) state.exec.push(top);
};

/**
 * EXEC.FLUSH: Empties EXEC ("halt").
 */
const execFlush: InstructionFunction = state => {
  state.exec.flush();
};

/**
 * EXEC.IF: With TRUE on BOOLEAN the second EXEC item is dropped and the top
 * one runs; with FALSE the top item is dropped. Needs two EXEC items and a
 * BOOLEAN.
 */
const execIf: InstructionFunction = state => {
  if (state.exec.size() < 2 || state.boolean.isEmpty()) return;
  const branches = state.exec.popVec(2);
  const condition = state.boolean.pop();
  if (!branches || condition === undefined) return;
  const [second, top] = branches;
  state.exec.push(condition ? top : second);
};

/**
 * EXEC.K: K combinator - drops the second EXEC item.
 */
const execK: InstructionFunction = state => {
  const items = state.exec.popVec(2);
  if (!items) return;
  state.exec.push(items[1]);
};

/**
 * EXEC.POP: Drops the top EXEC item ("don't").
 */
const execPop: InstructionFunction = state => {
  state.exec.pop();
};

/**
 * EXEC.ROT: Pulls the third EXEC item to the top; same as 2 EXEC.YANK.
 */
const execRot: InstructionFunction = state => {
  state.exec.yank(2);
};

/**
 * EXEC.S: S combinator. Pops A (top), B and C, then pushes ( B C ), C and A,
 * so A runs first.
 */
const execS: InstructionFunction = state => {
  const items = state.exec.popVec(3);
  if (!items) return;
  const [c, b, a] = items;
  state.exec.push(listItem([b, c]));
  state.exec.push(c);
  state.exec.push(a);
};

/**
 * EXEC.SHOVE: Moves the top EXEC item down to the depth on INTEGER
 * ("do later").
 */
const execShove: InstructionFunction = state => {
  const depth = popDepth(state, state.exec, 1);
  if (depth !== undefined) state.exec.shove(depth);
};

/**
 * EXEC.STACKDEPTH: Pushes the EXEC size onto INTEGER.
 */
const execStackDepth: InstructionFunction = state => {
  state.integer.push(state.exec.size());
};

/**
 * EXEC.SWAP: Swaps the top two EXEC items.
 */
const execSwap: InstructionFunction = state => {
  if (state.exec.size() >= 2) state.exec.shove(1);
};

/**
 * EXEC.Y: Y combinator. Inserts ( EXEC.Y <top> ) beneath the top item, so the
 * top item can recurse for as long as it leaves the wrapper in place.
 */
const execY: InstructionFunction = state => {
  const top = state.exec.copy(0);
  if (top === undefined) return;
  state.exec.push(listItem([EXEC_Y, top]));
  state.exec.shove(1);
};

/**
 * EXEC.YANK: Pulls the item at the INTEGER depth to the top ("do sooner").
 */
const execYank: InstructionFunction = state => {
  const depth = popDepth(state, state.exec, 1);
  if (depth !== undefined) state.exec.yank(depth);
};

/**
 * EXEC.YANKDUP: Copies the item at the INTEGER depth to the top.
 */
const execYankDup: InstructionFunction = state => {
  const depth = popDepth(state, state.exec, 1);
  if (depth !== undefined) state.exec.yankDup(depth);
};

const execId: InstructionFunction = state => {
  state.integer.push(StackId.Exec);
};

export const execInstructions: InstructionGroup = {
  'EXEC.=': execEq,
  'EXEC.DEFINE': execDefine,
  'EXEC.DO*COUNT': execDoCount,
  'EXEC.DO*RANGE': execDoRange,
  'EXEC.DO*TIMES': execDoTimes,
  'EXEC.DUP': execDup,
  'EXEC.FLUSH': execFlush,
  'EXEC.ID': execId,
  'EXEC.IF': execIf,
  'EXEC.K': execK,
  'EXEC.POP': execPop,
  'EXEC.ROT': execRot,
  'EXEC.S': execS,
  'EXEC.SHOVE': execShove,
  'EXEC.STACKDEPTH': execStackDepth,
  'EXEC.SWAP': execSwap,
  'EXEC.Y': execY,
  'EXEC.YANK': execYank,
  'EXEC.YANKDUP': execYankDup,
};
