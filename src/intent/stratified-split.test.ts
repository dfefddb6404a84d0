import { describe, it, expect } from 'vitest';
import { createRng, shuffle, stratifiedSplit } from './stratified-split.js';
import { DatasetFormatError } from './errors.js';

interface Item {
  id: number;
  label: string;
}

function items(label: string, count: number, offset = 0): Item[] {
  return Array.from({ length: count }, (_, i) => ({ id: offset + i, label }));
}

describe('createRng', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createRng(42);
    const b = createRng(42);
    const seqA = [a(), a(), a()];
    const seqB = [b(), b(), b()];
    expect(seqA).toEqual(seqB);
    for (const value of seqA) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('shuffle', () => {
  it('returns a permutation without touching the input', () => {
    const input = [1, 2, 3, 4, 5];
    const output = shuffle(input, createRng(7));
    expect(input).toEqual([1, 2, 3, 4, 5]);
    expect([...output].sort()).toEqual([1, 2, 3, 4, 5]);
  });
});

describe('stratifiedSplit', () => {
  const data = [...items('A', 10), ...items('B', 5, 100)];

  it('preserves class proportions', () => {
    const { train, test } = stratifiedSplit(data, (item) => item.label, 0.2, 42);
    expect(test.filter((item) => item.label === 'A')).toHaveLength(2);
    expect(test.filter((item) => item.label === 'B')).toHaveLength(1);
    expect(train).toHaveLength(12);
  });

  it('places every item exactly once', () => {
    const { train, test } = stratifiedSplit(data, (item) => item.label, 0.2, 42);
    const ids = [...train, ...test].map((item) => item.id).sort((a, b) => a - b);
    expect(ids).toEqual(data.map((item) => item.id).sort((a, b) => a - b));
  });

  it('is reproducible for a fixed seed', () => {
    const first = stratifiedSplit(data, (item) => item.label, 0.2, 42);
    const second = stratifiedSplit(data, (item) => item.label, 0.2, 42);
    expect(second).toEqual(first);
  });

  it('keeps at least one example of each class on both sides', () => {
    const { train, test } = stratifiedSplit(items('C', 2), (item) => item.label, 0.2, 1);
    expect(train).toHaveLength(1);
    expect(test).toHaveLength(1);
  });

  it('rejects a class with a single example', () => {
    const run = () => stratifiedSplit([...items('A', 4), ...items('B', 1, 10)], (item) => item.label, 0.2, 42);
    expect(run).toThrow(DatasetFormatError);
    expect(run).toThrow(/Intent "B" has 1 example/);
  });
});
