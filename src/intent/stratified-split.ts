/**
 * Seeded, class-preserving train/test split.
 *
 * Each class is shuffled independently with a deterministic PRNG and
 * contributes round(count * testSize) examples (at least one, at most
 * count - 1) to the test split, so every class appears on both sides.
 */

import { DatasetFormatError } from './errors.js';

export interface SplitResult<T> {
  train: T[];
  test: T[];
}

/**
 * Mulberry32 PRNG. Returns a generator of floats in [0, 1).
 */
export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Fisher-Yates shuffle into a new array */
export function shuffle<T>(items: readonly T[], rng: () => number): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * Split items into train and test sets preserving class proportions.
 *
 * Classes are visited in sorted label order so the output depends only
 * on the items, the test fraction and the seed.
 *
 * @throws {DatasetFormatError} If any class has fewer than two members
 */
export function stratifiedSplit<T>(
  items: readonly T[],
  labelOf: (item: T) => string,
  testSize: number,
  seed: number,
): SplitResult<T> {
  const byLabel = new Map<string, T[]>();
  for (const item of items) {
    const label = labelOf(item);
    const bucket = byLabel.get(label);
    if (bucket) {
      bucket.push(item);
    } else {
      byLabel.set(label, [item]);
    }
  }

  const rng = createRng(seed);
  const train: T[] = [];
  const test: T[] = [];

  for (const label of [...byLabel.keys()].sort()) {
    const members = byLabel.get(label) ?? [];
    if (members.length < 2) {
      throw new DatasetFormatError(
        `Intent "${label}" has ${members.length} example; at least 2 are needed for a stratified split`,
        { label },
      );
    }

    const shuffled = shuffle(members, rng);
    const testCount = Math.min(
      members.length - 1,
      Math.max(1, Math.round(members.length * testSize)),
    );
    test.push(...shuffled.slice(0, testCount));
    train.push(...shuffled.slice(testCount));
  }

  return { train, test };
}
