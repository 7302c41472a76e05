/**
 * Push interpreter - the execution loop
 *
 * Each step pops the EXEC stack and dispatches the item:
 * - literal: pushed onto the stack of its type
 * - instruction: looked up and run; unknown names are dropped
 * - list: its items are pushed back in reverse so the first runs next
 * - identifier: its binding is pushed onto EXEC; unbound names follow the
 *   configured policy
 *
 * Loops and recursion are instructions that rewrite EXEC, so the loop
 * itself has no control-flow cases of its own.
 */

import { type Item, isLiteral, renderItem } from './item.js';
import type { InstructionSet } from './instructions.js';
import { parse, loadProgram } from './parser.js';
import { PushState } from './state.js';
import { type PushConfiguration, defaultConfiguration } from './configuration.js';

export type RunStatus = 'completed' | 'step-limit' | 'growth-cap' | 'interrupted';

export interface RunResult {
  status: RunStatus;
  /** Steps executed in this run */
  steps: number;
}

export interface RunOptions {
  maxSteps?: number;
  growthCap?: number;
  /** Checked between steps; returning true stops the run */
  interrupt?: (state: PushState, steps: number) => boolean;
}

export class PushInterpreter {
  readonly state: PushState;

  constructor(
    readonly instructionSet: InstructionSet,
    state?: PushState
  ) {
    this.state = state ?? new PushState();
  }

  /**
   * Create an interpreter whose state is built from a configuration,
   * including its initial stack contents
   */
  static fromConfiguration(
    instructionSet: InstructionSet,
    configuration: PushConfiguration = defaultConfiguration()
  ): PushInterpreter {
    const state = new PushState(configuration);
    const initial = configuration.initialStacks;
    for (const value of initial.boolean ?? []) state.boolean.push(value);
    for (const value of initial.integer ?? []) state.integer.push(value);
    for (const value of initial.float ?? []) state.float.push(value);
    for (const value of initial.name ?? []) state.name.push(value);
    if (initial.code !== undefined) {
      for (const item of parse(initial.code, instructionSet)) {
        state.code.push(item);
      }
    }
    return new PushInterpreter(instructionSet, state);
  }

  /**
   * Parse source and push it onto EXEC
   */
  loadProgram(source: string): Item {
    return loadProgram(this.state, source, this.instructionSet);
  }

  /**
   * Execute one item. Returns false if EXEC was empty.
   */
  step(): boolean {
    const item = this.state.exec.pop();
    if (item === undefined) {
      return false;
    }

    if (process.env.DEBUG_EXEC) {
      console.error(`[exec] ${renderItem(item)}`);
    }

    this.dispatch(item);
    return true;
  }

  private dispatch(item: Item): void {
    const state = this.state;

    if (isLiteral(item)) {
      state.pushLiteral(item);
      return;
    }

    switch (item.kind) {
      case 'instruction': {
        const fn = this.instructionSet.get(item.name);
        if (fn) {
          fn(state, this.instructionSet.cache());
        } else if (process.env.DEBUG_EXEC) {
          console.error(`[exec] unknown instruction ${item.name}`);
        }
        break;
      }

      case 'list':
        for (let i = item.items.length - 1; i >= 0; i--) {
          state.exec.push(item.items[i]);
        }
        break;

      case 'identifier': {
        if (state.quoteNextName) {
          state.quoteNextName = false;
          state.name.push(item.name);
          break;
        }
        const bound = state.bindings.get(item.name);
        if (bound !== undefined) {
          state.exec.push(bound);
        } else if (state.configuration.unboundIdentifiers === 'push-name') {
          state.name.push(item.name);
        }
        break;
      }
    }
  }

  /**
   * Step until EXEC is empty or a budget runs out. Budgets are checked only
   * between steps, so an instruction always runs to completion.
   */
  run(options: RunOptions = {}): RunResult {
    const maxSteps = options.maxSteps ?? this.state.configuration.maxSteps;
    const growthCap = options.growthCap ?? this.state.configuration.growthCap;
    let steps = 0;

    while (true) {
      if (this.state.exec.isEmpty()) {
        return { status: 'completed', steps };
      }
      if (steps >= maxSteps) {
        return { status: 'step-limit', steps };
      }
      if (options.interrupt && options.interrupt(this.state, steps)) {
        return { status: 'interrupted', steps };
      }

      this.step();
      steps++;

      if (this.state.points() > growthCap) {
        if (process.env.DEBUG_EXEC) {
          console.error(`[exec] growth cap ${growthCap} exceeded after ${steps} steps`);
        }
        return { status: 'growth-cap', steps };
      }
    }
  }
}
