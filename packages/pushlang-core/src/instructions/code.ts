/**
 * CODE instructions
 *
 * The CODE stack holds programs as inert data. These instructions take code
 * apart, build new code, and move code to EXEC to run it. Wherever a list is
 * expected an atom is treated as a one-element list.
 */

import {
  type Item,
  boolItem,
  containsItem,
  floatItem,
  identifierItem,
  instructionItem,
  intItem,
  itemAtPoint,
  itemPoints,
  itemsEqual,
  listItem,
  renderItem,
  replacePoint,
} from '../push/item.js';
import type { InstructionCache, InstructionFunction, InstructionGroup } from '../push/instructions.js';
import { type RandomSource, randomFloat, randomInt } from '../push/random.js';
import { type PushState, StackId } from '../push/state.js';
import { stackInstructions } from './common.js';

const CODE_POP = instructionItem('CODE.POP');
const CODE_QUOTE = instructionItem('CODE.QUOTE');
const CODE_DO_RANGE = instructionItem('CODE.DO*RANGE');
const INTEGER_POP = instructionItem('INTEGER.POP');

function asList(item: Item): readonly Item[] {
  return item.kind === 'list' ? item.items : [item];
}

/**
 * |n| mod m, for index operands that must land inside a collection
 */
function wrapIndex(n: number, m: number): number {
  return Math.abs(n) % m;
}

/**
 * Pop one code item and push a derived one
 */
function transform(fn: (item: Item) => Item): InstructionFunction {
  return state => {
    const item = state.code.pop();
    if (item !== undefined) state.code.push(fn(item));
  };
}

/**
 * Pop one code item and push a BOOLEAN about it
 */
function predicate(fn: (item: Item) => boolean): InstructionFunction {
  return state => {
    const item = state.code.pop();
    if (item !== undefined) state.boolean.push(fn(item));
  };
}

/**
 * Pop two code items (second, top) and push a derived one
 */
function combine(fn: (second: Item, top: Item) => Item): InstructionFunction {
  return state => {
    const items = state.code.popVec(2);
    if (items) state.code.push(fn(items[0], items[1]));
  };
}

// ============ Execution ============

/**
 * CODE.QUOTE: Moves the next EXEC item onto CODE instead of running it.
 */
const codeQuote: InstructionFunction = state => {
  const item = state.exec.pop();
  if (item !== undefined) state.code.push(item);
};

/**
 * CODE.DO: Runs the top CODE item, then pops it from CODE.
 */
const codeDo: InstructionFunction = state => {
  const item = state.code.copy(0);
  if (item === undefined) return;
  state.exec.push(CODE_POP);
  state.exec.push(item);
};

/**
 * CODE.DO*: Pops the top CODE item and runs it.
 */
const codeDoStar: InstructionFunction = state => {
  const item = state.code.pop();
  if (item !== undefined) state.exec.push(item);
};

/**
 * CODE.DO*COUNT: Counted loop over the top CODE item, counter 0 .. n-1.
 * Expands into ( 0 <n - 1> CODE.QUOTE <body> CODE.DO*RANGE )
 */
const codeDoCount: InstructionFunction = state => {
  const count = state.integer.copy(0);
  if (count === undefined || state.code.isEmpty() || count <= 0) return;
  state.integer.pop();
  const body = state.code.pop();
  if (body === undefined) return;
  state.exec.push(listItem([intItem(0), intItem(count - 1), CODE_QUOTE, body, CODE_DO_RANGE]));
};

/**
 * CODE.DO*RANGE: CODE form of EXEC.DO*RANGE; the body is re-quoted in the
 * continuation.
 */
const codeDoRange: InstructionFunction = state => {
  if (state.code.isEmpty()) return;
  const indices = state.integer.popVec(2);
  if (!indices) return;
  const body = state.code.pop();
  if (body === undefined) return;

  const [current, destination] = indices;
  state.integer.push(current);

  if (current === destination) {
    state.exec.push(body);
    return;
  }

  const next = current < destination ? current + 1 : current - 1;
  state.exec.push(listItem([intItem(next), intItem(destination), CODE_QUOTE, body, CODE_DO_RANGE]));
  state.exec.push(body);
};

/**
 * CODE.DO*TIMES: CODE.DO*RANGE without the loop counter.
 */
const codeDoTimes: InstructionFunction = state => {
  if (state.code.isEmpty()) return;
  const indices = state.integer.popVec(2);
  if (!indices) return;
  const body = state.code.pop();
  if (body === undefined) return;

  const [current, destination] = indices;
  state.exec.push(listItem([
    intItem(current),
    intItem(destination),
    CODE_QUOTE,
    listItem([INTEGER_POP, body]),
    CODE_DO_RANGE,
  ]));
};

/**
 * CODE.IF: With TRUE the second CODE item runs, with FALSE the top one.
 * Both are popped.
 */
const codeIf: InstructionFunction = state => {
  if (state.code.size() < 2 || state.boolean.isEmpty()) return;
  const branches = state.code.popVec(2);
  const condition = state.boolean.pop();
  if (!branches || condition === undefined) return;
  const [second, top] = branches;
  state.exec.push(condition ? second : top);
};

// ============ Construction & inspection ============

/**
 * CODE.EXTRACT: Replaces the top CODE item with its sub-expression at the
 * INTEGER point index (|n| mod points, depth first, 0 = whole item).
 */
const codeExtract: InstructionFunction = state => {
  const item = state.code.copy(0);
  if (item === undefined || state.integer.isEmpty()) return;
  const n = state.integer.pop();
  if (n === undefined) return;
  const extracted = itemAtPoint(item, wrapIndex(n, itemPoints(item)));
  if (extracted === undefined) return;
  state.code.pop();
  state.code.push(extracted);
};

/**
 * CODE.INSERT: Puts the second CODE item into the top one at the INTEGER
 * point index, replacing what was there.
 */
const codeInsert: InstructionFunction = state => {
  if (state.code.size() < 2 || state.integer.isEmpty()) return;
  const n = state.integer.pop();
  const items = state.code.popVec(2);
  if (n === undefined || !items) return;
  const [second, top] = items;
  state.code.push(replacePoint(top, wrapIndex(n, itemPoints(top)), second));
};

/**
 * CODE.NTH: Pushes element |n| mod length of the top CODE item.
 */
const codeNth: InstructionFunction = state => {
  if (state.code.isEmpty() || state.integer.isEmpty()) return;
  const n = state.integer.pop();
  const item = state.code.pop();
  if (n === undefined || item === undefined) return;
  const items = asList(item);
  state.code.push(items.length === 0 ? listItem([]) : items[wrapIndex(n, items.length)]);
};

/**
 * CODE.NTHCDR: Drops the first |n| mod length elements of the top CODE item.
 */
const codeNthCdr: InstructionFunction = state => {
  if (state.code.isEmpty() || state.integer.isEmpty()) return;
  const n = state.integer.pop();
  const item = state.code.pop();
  if (n === undefined || item === undefined) return;
  const items = asList(item);
  state.code.push(items.length === 0 ? listItem([]) : listItem(items.slice(wrapIndex(n, items.length))));
};

const codeContains: InstructionFunction = state => {
  const items = state.code.popVec(2);
  if (items) state.boolean.push(containsItem(items[0], items[1]));
};

const codeMember: InstructionFunction = state => {
  const items = state.code.popVec(2);
  if (!items) return;
  const [second, top] = items;
  state.boolean.push(asList(top).some(element => itemsEqual(element, second)));
};

const codeLength: InstructionFunction = state => {
  const item = state.code.pop();
  if (item !== undefined) state.integer.push(asList(item).length);
};

const codeSize: InstructionFunction = state => {
  const item = state.code.pop();
  if (item !== undefined) state.integer.push(itemPoints(item));
};

/**
 * CODE.INSTRUCTIONS: Pushes a list of every known instruction.
 */
const codeInstructionList: InstructionFunction = (state, cache) => {
  state.code.push(listItem(cache.map(name => instructionItem(name))));
};

// ============ Conversions ============

const codeFromBoolean: InstructionFunction = state => {
  const value = state.boolean.pop();
  if (value !== undefined) state.code.push(boolItem(value));
};

const codeFromFloat: InstructionFunction = state => {
  const value = state.float.pop();
  if (value !== undefined) state.code.push(floatItem(value));
};

const codeFromInteger: InstructionFunction = state => {
  const value = state.integer.pop();
  if (value !== undefined) state.code.push(intItem(value));
};

const codeFromName: InstructionFunction = state => {
  const value = state.name.pop();
  if (value !== undefined) state.code.push(identifierItem(value));
};

// ============ Random code ============

/**
 * Split `points` into at most `maxParts` positive parts
 */
function decompose(random: RandomSource, points: number, maxParts: number): number[] {
  if (points <= 1 || maxParts <= 1) return [points];
  const part = randomInt(random, 1, points - 1);
  return [part, ...decompose(random, points - part, maxParts - 1)];
}

function randomAtom(state: PushState, cache: InstructionCache): Item {
  // Instructions plus three ephemeral constant kinds
  const choice = randomInt(state.random, 0, cache.length + 2);
  if (choice < cache.length) {
    return instructionItem(cache[choice]);
  }
  const { minRandomInteger, maxRandomInteger, minRandomFloat, maxRandomFloat } = state.configuration;
  switch (choice - cache.length) {
    case 0:
      return intItem(randomInt(state.random, minRandomInteger, maxRandomInteger));
    case 1:
      return floatItem(randomFloat(state.random, minRandomFloat, maxRandomFloat));
    default:
      return boolItem(state.random.next() < 0.5);
  }
}

/**
 * Random program with exactly `points` points
 */
export function randomCode(state: PushState, cache: InstructionCache, points: number): Item {
  if (points <= 1) {
    return randomAtom(state, cache);
  }
  const parts = decompose(state.random, points - 1, points - 1);
  const order = [...parts];
  // shuffle so larger sublists are not always first
  for (let i = order.length - 1; i > 0; i--) {
    const j = randomInt(state.random, 0, i);
    [order[i], order[j]] = [order[j], order[i]];
  }
  return listItem(order.map(size => randomCode(state, cache, size)));
}

/**
 * CODE.RAND: Pushes random code. The size is |n| mod
 * maxPointsInRandomExpressions, plus one, with n from INTEGER.
 */
const codeRand: InstructionFunction = (state, cache) => {
  const max = state.configuration.maxPointsInRandomExpressions;
  if (max <= 0) return;
  const n = state.integer.pop();
  if (n === undefined) return;
  state.code.push(randomCode(state, cache, wrapIndex(n, max) + 1));
};

export const codeInstructions: InstructionGroup = {
  ...stackInstructions<Item>({
    prefix: 'CODE',
    id: StackId.Code,
    stack: state => state.code,
    equals: (a, b) => renderItem(a) === renderItem(b),
    toItem: item => item,
  }),
  'CODE.APPEND': combine((second, top) => listItem([...asList(top), ...asList(second)])),
  'CODE.ATOM': predicate(item => item.kind !== 'list'),
  'CODE.CAR': transform(item => (item.kind === 'list' ? item.items[0] ?? item : item)),
  'CODE.CDR': transform(item => listItem(item.kind === 'list' ? item.items.slice(1) : [])),
  'CODE.CONS': combine((second, top) => listItem([second, ...asList(top)])),
  'CODE.CONTAINS': codeContains,
  'CODE.DO': codeDo,
  'CODE.DO*': codeDoStar,
  'CODE.DO*COUNT': codeDoCount,
  'CODE.DO*RANGE': codeDoRange,
  'CODE.DO*TIMES': codeDoTimes,
  'CODE.EXTRACT': codeExtract,
  'CODE.FROMBOOLEAN': codeFromBoolean,
  'CODE.FROMFLOAT': codeFromFloat,
  'CODE.FROMINTEGER': codeFromInteger,
  'CODE.FROMNAME': codeFromName,
  'CODE.IF': codeIf,
  'CODE.INSERT': codeInsert,
  'CODE.INSTRUCTIONS': codeInstructionList,
  'CODE.LENGTH': codeLength,
  'CODE.LIST': combine((second, top) => listItem([second, top])),
  'CODE.MEMBER': codeMember,
  'CODE.NTH': codeNth,
  'CODE.NTHCDR': codeNthCdr,
  'CODE.NULL': predicate(item => item.kind === 'list' && item.items.length === 0),
  'CODE.QUOTE': codeQuote,
  'CODE.RAND': codeRand,
  'CODE.SIZE': codeSize,
};
