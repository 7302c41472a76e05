/**
 * Push program items
 *
 * A Push program is data: a tree of literals, instruction references,
 * identifiers and lists. The same representation backs the EXEC and CODE
 * stacks, so instructions can build new code at run time.
 */

import type { BoolVector, FloatVector, IntVector } from './vector.js';

export interface BooleanItem {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface IntegerItem {
  readonly kind: 'integer';
  readonly value: number;
}

export interface FloatItem {
  readonly kind: 'float';
  readonly value: number;
}

export interface BoolVectorItem {
  readonly kind: 'boolvector';
  readonly value: BoolVector;
}

export interface IntVectorItem {
  readonly kind: 'intvector';
  readonly value: IntVector;
}

export interface FloatVectorItem {
  readonly kind: 'floatvector';
  readonly value: FloatVector;
}

/**
 * Reference to an instruction by name. Resolved against the instruction set
 * when the item is executed.
 */
export interface InstructionItem {
  readonly kind: 'instruction';
  readonly name: string;
}

export interface IdentifierItem {
  readonly kind: 'identifier';
  readonly name: string;
}

/**
 * List of items in execution order: items[0] runs first.
 */
export interface ListItem {
  readonly kind: 'list';
  readonly items: readonly Item[];
}

export type ScalarItem = BooleanItem | IntegerItem | FloatItem;
export type VectorItem = BoolVectorItem | IntVectorItem | FloatVectorItem;
export type LiteralItem = ScalarItem | VectorItem;

export type Item = LiteralItem | InstructionItem | IdentifierItem | ListItem;

/**
 * Convenience constructors
 */
export function boolItem(value: boolean): BooleanItem {
  return { kind: 'boolean', value };
}

export function intItem(value: number): IntegerItem {
  return { kind: 'integer', value };
}

export function floatItem(value: number): FloatItem {
  return { kind: 'float', value };
}

export function boolVectorItem(value: BoolVector): BoolVectorItem {
  return { kind: 'boolvector', value };
}

export function intVectorItem(value: IntVector): IntVectorItem {
  return { kind: 'intvector', value };
}

export function floatVectorItem(value: FloatVector): FloatVectorItem {
  return { kind: 'floatvector', value };
}

export function instructionItem(name: string): InstructionItem {
  return { kind: 'instruction', name };
}

export function identifierItem(name: string): IdentifierItem {
  return { kind: 'identifier', name };
}

export function listItem(items: readonly Item[]): ListItem {
  return { kind: 'list', items: Object.freeze([...items]) };
}

export const noopItem: InstructionItem = instructionItem('NOOP');

export function isLiteral(item: Item): item is LiteralItem {
  switch (item.kind) {
    case 'boolean':
    case 'integer':
    case 'float':
    case 'boolvector':
    case 'intvector':
    case 'floatvector':
      return true;
    default:
      return false;
  }
}

function renderAtom(item: Exclude<Item, ListItem>): string {
  switch (item.kind) {
    case 'boolean':
    case 'integer':
      return `Literal(${item.value})`;
    case 'float':
      return `Literal(${item.value}f)`;
    case 'boolvector':
    case 'intvector':
    case 'floatvector':
      return `Literal(${item.value.toString()})`;
    case 'instruction':
      return `InstructionMeta(${item.name})`;
    case 'identifier':
      return `Identifier(${item.name})`;
  }
}

interface RenderFrame {
  items: readonly Item[];
  index: number;
  parts: string[];
}

/**
 * Render an item. Lists render their elements with 1-based positions:
 * `List: 1:Literal(1); 2:InstructionMeta(EXEC.DUP);`
 *
 * Nested lists are walked with an explicit stack of frames.
 */
export function renderItem(item: Item): string {
  if (item.kind !== 'list') return renderAtom(item);
  const frames: RenderFrame[] = [{ items: item.items, index: 0, parts: [] }];
  while (true) {
    const frame = frames[frames.length - 1];
    if (frame.index < frame.items.length) {
      const child = frame.items[frame.index];
      if (child.kind === 'list') {
        frames.push({ items: child.items, index: 0, parts: [] });
        continue;
      }
      frame.parts.push(`${frame.index + 1}:${renderAtom(child)};`);
      frame.index++;
      continue;
    }
    frames.pop();
    const rendered = `List: ${frame.parts.join(' ')}`;
    const parent = frames[frames.length - 1];
    if (parent === undefined) return rendered;
    parent.parts.push(`${parent.index + 1}:${rendered};`);
    parent.index++;
  }
}

/**
 * Render a top-first sequence as `1:<a>; 2:<b>;`
 */
export function renderItems(items: readonly Item[]): string {
  return items.map((item, i) => `${i + 1}:${renderItem(item)};`).join(' ');
}

/**
 * Structural equality
 */
export function itemsEqual(a: Item, b: Item): boolean {
  switch (a.kind) {
    case 'boolean':
    case 'integer':
    case 'float':
      return b.kind === a.kind && b.value === a.value;
    case 'boolvector':
      return b.kind === 'boolvector' && a.value.equals(b.value);
    case 'intvector':
      return b.kind === 'intvector' && a.value.equals(b.value);
    case 'floatvector':
      return b.kind === 'floatvector' && a.value.equals(b.value);
    case 'instruction':
    case 'identifier':
      return b.kind === a.kind && b.name === a.name;
    case 'list':
      return b.kind === 'list' &&
        a.items.length === b.items.length &&
        a.items.every((child, i) => itemsEqual(child, b.items[i]));
  }
}

/**
 * Number of points: one per atom, lists count themselves plus their contents
 */
export function itemPoints(item: Item): number {
  let points = 0;
  const pending: Item[] = [item];
  let next = pending.pop();
  while (next !== undefined) {
    points++;
    if (next.kind === 'list') {
      for (const child of next.items) pending.push(child);
    }
    next = pending.pop();
  }
  return points;
}

/**
 * Point at a depth-first index (0 = the item itself). Used by CODE.EXTRACT.
 */
export function itemAtPoint(item: Item, point: number): Item | undefined {
  if (point === 0) return item;
  if (item.kind !== 'list') return undefined;
  let remaining = point - 1;
  for (const child of item.items) {
    const size = itemPoints(child);
    if (remaining < size) {
      return itemAtPoint(child, remaining);
    }
    remaining -= size;
  }
  return undefined;
}

/**
 * Copy of `item` with the point at `point` replaced. Used by CODE.INSERT.
 */
export function replacePoint(item: Item, point: number, replacement: Item): Item {
  if (point === 0) return replacement;
  if (item.kind !== 'list') return item;
  let remaining = point - 1;
  const items = [...item.items];
  for (let i = 0; i < items.length; i++) {
    const size = itemPoints(items[i]);
    if (remaining < size) {
      items[i] = replacePoint(items[i], remaining, replacement);
      return listItem(items);
    }
    remaining -= size;
  }
  return item;
}

/**
 * True if `needle` equals `haystack` or any subtree of it
 */
export function containsItem(haystack: Item, needle: Item): boolean {
  if (itemsEqual(haystack, needle)) return true;
  if (haystack.kind !== 'list') return false;
  return haystack.items.some(child => containsItem(child, needle));
}
