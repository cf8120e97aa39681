/**
 * Random source
 * Everything that synthesizes data takes one of these so tests can seed it.
 */

import seedrandom from 'seedrandom';

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

export function createSeededRandom(seed: string | number): RandomSource {
  const rng = seedrandom(String(seed));
  return { next: () => rng() };
}

/** Integer in [min, max], both inclusive */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random.next() * (max - min + 1));
}

/** Float in [min, max) */
export function randomFloat(random: RandomSource, min: number, max: number): number {
  return min + random.next() * (max - min);
}

export function pickOne<T>(random: RandomSource, items: readonly [T, ...T[]]): T {
  const index = Math.floor(random.next() * items.length);
  return items[index] ?? items[0];
}

/** Hex identifier drawn from the source, so seeded runs repeat ids too */
export function randomHexId(random: RandomSource, length = 12): string {
  let id = '';
  for (let i = 0; i < length; i++) {
    id += Math.floor(random.next() * 16).toString(16);
  }
  return id;
}
