/**
 * Vector values held on the BOOLVECTOR, INTVECTOR and FLOATVECTOR stacks.
 *
 * Vectors are values: instructions that "modify" a vector build a new one.
 */

export class PushVector<T extends boolean | number> {
  readonly values: readonly T[];

  constructor(values: readonly T[]) {
    this.values = Object.freeze([...values]);
  }

  get length(): number {
    return this.values.length;
  }

  get(index: number): T | undefined {
    return this.values[index];
  }

  /**
   * Copy of this vector with one element replaced
   */
  with(index: number, value: T): PushVector<T> {
    const copy = [...this.values];
    copy[index] = value;
    return new PushVector(copy);
  }

  equals(other: PushVector<T>): boolean {
    if (other.values.length !== this.values.length) return false;
    return this.values.every((v, i) => v === other.values[i]);
  }

  toString(): string {
    return `[${this.values.map(v => String(v)).join(',')}]`;
  }
}

export type BoolVector = PushVector<boolean>;
export type IntVector = PushVector<number>;
export type FloatVector = PushVector<number>;

export function makeVector<T extends boolean | number>(values: readonly T[]): PushVector<T> {
  return new PushVector(values);
}
