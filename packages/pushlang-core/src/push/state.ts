/**
 * Interpreter state - every typed stack plus the name bindings
 *
 * One PushState belongs to one run. Instructions receive it and are the only
 * code (besides the parser and the engine) that mutates it.
 */

import { type Item, type LiteralItem, itemPoints, renderItem } from './item.js';
import { Stack } from './stack.js';
import type { BoolVector, FloatVector, IntVector } from './vector.js';
import { type PushConfiguration, defaultConfiguration } from './configuration.js';
import { type RandomSource, createRandomSource } from './random.js';

/**
 * Stack identifiers, as pushed by the *.ID instructions and consumed by
 * LIST.ADD / LIST.SET
 */
export enum StackId {
  Boolean = 1,
  BoolVector = 2,
  Code = 3,
  Exec = 4,
  Float = 5,
  FloatVector = 6,
  Integer = 7,
  IntVector = 8,
  Name = 9,
}

const renderVector = (value: BoolVector | IntVector | FloatVector): string => value.toString();

export class PushState {
  readonly exec = new Stack<Item>(renderItem);
  readonly code = new Stack<Item>(renderItem);
  readonly boolean = new Stack<boolean>();
  readonly integer = new Stack<number>();
  readonly float = new Stack<number>();
  readonly name = new Stack<string>();
  readonly boolVector = new Stack<BoolVector>(renderVector);
  readonly intVector = new Stack<IntVector>(renderVector);
  readonly floatVector = new Stack<FloatVector>(renderVector);

  /** Names bound by the *.DEFINE instructions */
  readonly bindings = new Map<string, Item>();

  /** Set by NAME.QUOTE: the next identifier executed goes to the NAME stack */
  quoteNextName: boolean = false;

  readonly configuration: PushConfiguration;
  readonly random: RandomSource;

  constructor(configuration: PushConfiguration = defaultConfiguration(), random?: RandomSource) {
    this.configuration = configuration;
    this.random = random ?? createRandomSource(configuration.seed);
  }

  /**
   * Route a literal to the stack of its type
   */
  pushLiteral(item: LiteralItem): void {
    switch (item.kind) {
      case 'boolean':
        this.boolean.push(item.value);
        break;
      case 'integer':
        this.integer.push(item.value);
        break;
      case 'float':
        this.float.push(item.value);
        break;
      case 'boolvector':
        this.boolVector.push(item.value);
        break;
      case 'intvector':
        this.intVector.push(item.value);
        break;
      case 'floatvector':
        this.floatVector.push(item.value);
        break;
    }
  }

  /**
   * Total points across all stacks. Item stacks count list contents.
   */
  points(): number {
    let total = 0;
    for (const item of this.exec.values()) total += itemPoints(item);
    for (const item of this.code.values()) total += itemPoints(item);
    total += this.boolean.size() + this.integer.size() + this.float.size() + this.name.size();
    total += this.boolVector.size() + this.intVector.size() + this.floatVector.size();
    return total;
  }

  /**
   * Each non-empty stack on its own line: `INTEGER: 1:3; 2:1;`
   */
  toString(): string {
    const lines: string[] = [];
    for (const [label, stack] of this.namedStacks()) {
      if (!stack.isEmpty()) {
        lines.push(`${label}: ${stack.toString()}`);
      }
    }
    return lines.join('\n');
  }

  namedStacks(): Array<[string, { isEmpty(): boolean; size(): number; toString(): string }]> {
    return [
      ['BOOLEAN', this.boolean],
      ['BOOLVECTOR', this.boolVector],
      ['CODE', this.code],
      ['EXEC', this.exec],
      ['FLOAT', this.float],
      ['FLOATVECTOR', this.floatVector],
      ['INTEGER', this.integer],
      ['INTVECTOR', this.intVector],
      ['NAME', this.name],
    ];
  }
}
