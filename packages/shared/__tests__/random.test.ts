// Random source and selection helper tests

import { describe, it, expect } from 'vitest';
import { createSeededRandom, pick, pickTwo, randomInt } from '../src/utils/random';

describe('createSeededRandom', () => {
  it('replays the same sequence for the same seed', () => {
    const a = createSeededRandom(42);
    const b = createSeededRandom(42);

    const first = [a(), a(), a(), a()];
    const second = [b(), b(), b(), b()];

    expect(first).toEqual(second);
  });

  it('differs between seeds', () => {
    expect(createSeededRandom(1)()).not.toBe(createSeededRandom(2)());
  });

  it('stays within [0, 1)', () => {
    const random = createSeededRandom(7);
    for (let i = 0; i < 500; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('randomInt', () => {
  it('covers both bounds', () => {
    expect(randomInt(() => 0, 130, 150)).toBe(130);
    expect(randomInt(() => 0.9999, 130, 150)).toBe(150);
    expect(randomInt(() => 0.5, 1, 4)).toBe(3);
  });
});

describe('pick', () => {
  it('maps the random value onto an index', () => {
    expect(pick(() => 0, ['a', 'b', 'c'])).toBe('a');
    expect(pick(() => 0.5, ['a', 'b', 'c'])).toBe('b');
    expect(pick(() => 0.9999, ['a', 'b', 'c'])).toBe('c');
  });

  it('throws on an empty list', () => {
    expect(() => pick(() => 0, [])).toThrow(RangeError);
  });
});

describe('pickTwo', () => {
  it('never returns the same position twice', () => {
    expect(pickTwo(() => 0, ['a', 'b', 'c'])).toEqual(['a', 'b']);
    expect(pickTwo(() => 0.99, ['a', 'b', 'c'])).toEqual(['c', 'b']);
  });

  it('repeats the only element of a single-item list', () => {
    expect(pickTwo(() => 0, ['solo'])).toEqual(['solo', 'solo']);
  });
});
