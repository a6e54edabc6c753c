// Injectable randomness so generation can be replayed in tests

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

/**
 * Deterministic source from an integer seed (sine hash, one step per call)
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed;
  return () => {
    const x = Math.sin(state++) * 10000;
    return x - Math.floor(x);
  };
}

/**
 * Integer in [min, max], both inclusive
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Pick one element. Throws on an empty list.
 */
export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}

/**
 * Pick two elements at distinct positions. Lists with one element return it twice.
 */
export function pickTwo<T>(random: RandomSource, items: readonly T[]): [T, T] {
  if (items.length < 2) {
    const only = pick(random, items);
    return [only, only];
  }
  const first = Math.min(Math.floor(random() * items.length), items.length - 1);
  let second = Math.min(Math.floor(random() * (items.length - 1)), items.length - 2);
  if (second >= first) second += 1;
  return [items[first], items[second]];
}
