/**
 * Typed stack with deep-indexed operations
 *
 * The backing array holds the bottom at index 0 and the top at the end.
 * Depth arguments count from the top: depth 0 is the top element.
 * Out-of-range depths are no-ops, never errors.
 */

export type Renderer<T> = (value: T) => string;

export class Stack<T> {
  private elements: T[] = [];

  constructor(private render: Renderer<T> = value => String(value)) {}

  size(): number {
    return this.elements.length;
  }

  isEmpty(): boolean {
    return this.elements.length === 0;
  }

  push(value: T): void {
    this.elements.push(value);
  }

  /**
   * Insert at the bottom of the stack
   */
  pushFront(value: T): void {
    this.elements.unshift(value);
  }

  pop(): T | undefined {
    return this.elements.pop();
  }

  /**
   * Remove the top n elements, all or nothing. The result is ordered bottom
   * to top, so its last element is the former top.
   */
  popVec(n: number): T[] | undefined {
    if (n <= 0) return [];
    if (n > this.elements.length) return undefined;
    return this.elements.splice(this.elements.length - n, n);
  }

  /**
   * Read the element at depth without removing it
   */
  copy(depth: number): T | undefined {
    if (!this.inRange(depth)) return undefined;
    return this.elements[this.elements.length - 1 - depth];
  }

  /**
   * Read the top n elements (bottom to top order) without removing them
   */
  copyVec(n: number): T[] | undefined {
    if (n <= 0) return [];
    if (n > this.elements.length) return undefined;
    return this.elements.slice(this.elements.length - n);
  }

  bottom(): T | undefined {
    return this.elements[0];
  }

  /**
   * Move the element at depth to the top
   */
  yank(depth: number): void {
    if (depth <= 0 || !this.inRange(depth)) return;
    const index = this.elements.length - 1 - depth;
    const [value] = this.elements.splice(index, 1);
    this.elements.push(value);
  }

  /**
   * Push a copy of the element at depth without removing it
   */
  yankDup(depth: number): void {
    if (!this.inRange(depth)) return;
    this.elements.push(this.elements[this.elements.length - 1 - depth]);
  }

  /**
   * Move the top element down so that it ends up at depth
   */
  shove(depth: number): void {
    if (!this.inRange(depth)) return;
    const value = this.elements.pop();
    if (value === undefined) return;
    this.elements.splice(this.elements.length - depth, 0, value);
  }

  replace(depth: number, value: T): void {
    if (!this.inRange(depth)) return;
    this.elements[this.elements.length - 1 - depth] = value;
  }

  flush(): void {
    this.elements = [];
  }

  /**
   * Top-first copy of the contents
   */
  values(): T[] {
    return [...this.elements].reverse();
  }

  /**
   * `1:<top>; 2:<next>; ...`, empty string for an empty stack
   */
  toString(): string {
    return this.values()
      .map((value, i) => `${i + 1}:${this.render(value)};`)
      .join(' ');
  }

  private inRange(depth: number): boolean {
    return Number.isInteger(depth) && depth >= 0 && depth < this.elements.length;
  }
}
