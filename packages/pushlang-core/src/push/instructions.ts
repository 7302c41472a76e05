/**
 * Instruction registry
 *
 * An instruction is a plain function over the interpreter state. The set maps
 * names to functions; registering a name twice replaces the earlier entry.
 *
 * Behaviors receive an InstructionCache - a frozen, sorted snapshot of the
 * registered names - instead of the live set, so nothing they do can observe
 * or disturb the registry while it is dispatching.
 */

import type { PushState } from './state.js';

export type InstructionCache = readonly string[];

export type InstructionFunction = (state: PushState, cache: InstructionCache) => void;

export type InstructionGroup = Readonly<Record<string, InstructionFunction>>;

/**
 * NOOP: No operation.
 */
const noop: InstructionFunction = () => {};

export class InstructionSet {
  private map = new Map<string, InstructionFunction>();
  private snapshot: InstructionCache | null = null;

  /**
   * Register an instruction, replacing any previous one with the same name
   */
  add(name: string, fn: InstructionFunction): void {
    this.map.set(name, fn);
    this.snapshot = null;
  }

  /**
   * Register every entry of a group table
   */
  loadGroup(group: InstructionGroup): void {
    for (const [name, fn] of Object.entries(group)) {
      this.add(name, fn);
    }
  }

  /**
   * Load NOOP plus the given groups
   */
  load(groups: readonly InstructionGroup[]): void {
    this.add('NOOP', noop);
    for (const group of groups) {
      this.loadGroup(group);
    }
  }

  get(name: string): InstructionFunction | undefined {
    return this.map.get(name);
  }

  has(name: string): boolean {
    return this.map.has(name);
  }

  get size(): number {
    return this.map.size;
  }

  names(): string[] {
    return [...this.map.keys()].sort();
  }

  /**
   * Snapshot of the current instruction names; rebuilt after registration
   */
  cache(): InstructionCache {
    if (!this.snapshot) {
      this.snapshot = Object.freeze(this.names());
    }
    return this.snapshot;
  }
}
