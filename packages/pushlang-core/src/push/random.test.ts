/**
 * Random source tests
 */

import { describe, it, expect } from 'vitest';
import { createRandomSource, randomElement, randomFloat, randomInt } from './random.js';

describe('createRandomSource', () => {
  it('should repeat a sequence for the same seed', () => {
    const a = createRandomSource(1234);
    const b = createRandomSource(1234);
    const first = [a.next(), a.next(), a.next()];
    expect([b.next(), b.next(), b.next()]).toEqual(first);
  });

  it('should stay within [0, 1)', () => {
    const random = createRandomSource(99);
    for (let i = 0; i < 200; i++) {
      const value = random.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('helpers', () => {
  const fixed = (value: number) => ({ next: () => value });

  it('should map to inclusive integer bounds', () => {
    expect(randomInt(fixed(0), 3, 5)).toBe(3);
    expect(randomInt(fixed(0.999), 3, 5)).toBe(5);
    expect(randomInt(fixed(0.5), 5, 3)).toBe(5);
  });

  it('should scale floats', () => {
    expect(randomFloat(fixed(0.5), -1, 1)).toBe(0);
    expect(randomFloat(fixed(0.5), 2, 2)).toBe(2);
  });

  it('should pick elements', () => {
    expect(randomElement(fixed(0.7), ['a', 'b', 'c'])).toBe('c');
    expect(randomElement(fixed(0.7), [])).toBeUndefined();
  });
});
