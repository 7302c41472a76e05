/**
 * Push program parser
 *
 * Source is a whitespace-separated token stream; `(` and `)` delimit lists.
 * Every other token is classified, in this order, as a registered
 * instruction, an integer, a float, a boolean (TRUE / FALSE) or an
 * identifier.
 */

import {
  type Item,
  boolItem,
  floatItem,
  identifierItem,
  instructionItem,
  intItem,
  listItem,
} from './item.js';
import type { InstructionSet } from './instructions.js';
import type { PushState } from './state.js';

export class PushParseError extends Error {
  constructor(message: string, public readonly tokenIndex: number) {
    super(`Parse error at token ${tokenIndex + 1}: ${message}`);
    this.name = 'PushParseError';
  }
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/**
 * Classify a single non-parenthesis token
 */
export function classifyToken(token: string, instructions: InstructionSet): Item {
  if (instructions.has(token)) {
    return instructionItem(token);
  }
  if (INTEGER_PATTERN.test(token)) {
    const value = Number(token);
    if (value >= INT32_MIN && value <= INT32_MAX) {
      return intItem(value);
    }
  }
  if (FLOAT_PATTERN.test(token)) {
    const value = Number(token);
    if (Number.isFinite(value)) {
      return floatItem(value);
    }
  }
  if (token === 'TRUE') return boolItem(true);
  if (token === 'FALSE') return boolItem(false);
  return identifierItem(token);
}

interface OpenList {
  items: Item[];
  /** Token index of the opening paren */
  openedAt: number;
}

export class Parser {
  private tokens: string[];
  private pos: number = 0;

  constructor(source: string, private instructions: InstructionSet) {
    this.tokens = source.split(/\s+/).filter(token => token.length > 0);
  }

  /**
   * Parse the whole source into its top-level items, in source order.
   * Open lists are kept on an explicit stack, so nesting depth is not
   * limited by the call stack.
   */
  parse(): Item[] {
    const items: Item[] = [];
    const open: OpenList[] = [];
    while (!this.isAtEnd()) {
      const token = this.advance();
      const current = open.length > 0 ? open[open.length - 1].items : items;
      if (token === '(') {
        open.push({ items: [], openedAt: this.pos - 1 });
        continue;
      }
      if (token === ')') {
        const list = open.pop();
        if (!list) {
          throw new PushParseError('unexpected )', this.pos - 1);
        }
        (open.length > 0 ? open[open.length - 1].items : items).push(listItem(list.items));
        continue;
      }
      current.push(this.classify(token));
    }
    const unclosed = open.pop();
    if (unclosed) {
      throw new PushParseError('unclosed (', unclosed.openedAt);
    }
    return items;
  }

  private classify(token: string): Item {
    const item = classifyToken(token, this.instructions);
    if (process.env.DEBUG_PARSER) {
      console.error(`[parser] ${token} -> ${item.kind}`);
    }
    return item;
  }

  private isAtEnd(): boolean {
    return this.pos >= this.tokens.length;
  }

  private advance(): string {
    return this.tokens[this.pos++];
  }
}

/**
 * Parse source into its top-level items
 */
export function parse(source: string, instructions: InstructionSet): Item[] {
  return new Parser(source, instructions).parse();
}

/**
 * Parse source into a single program item. A source consisting of one list
 * yields that list; anything else is wrapped in a list.
 */
export function parseProgram(source: string, instructions: InstructionSet): Item {
  const items = parse(source, instructions);
  if (items.length === 1 && items[0].kind === 'list') {
    return items[0];
  }
  return listItem(items);
}

/**
 * Parse source and push the program onto the EXEC stack
 */
export function loadProgram(state: PushState, source: string, instructions: InstructionSet): Item {
  const program = parseProgram(source, instructions);
  state.exec.push(program);
  return program;
}
