import { describe, it, expect } from 'vitest';
import { SoftmaxRegression, softmax } from './softmax-regression.js';
import type { SparseVector } from './feature-space.js';

const FEATURE_0: SparseVector = { indices: [0], values: [1] };
const FEATURE_1: SparseVector = { indices: [1], values: [1] };

describe('softmax', () => {
  it('returns a probability distribution', () => {
    const probs = softmax([1, 2, 3]);
    expect(probs.reduce((a, b) => a + b, 0)).toBeCloseTo(1, 10);
    expect(probs[2]).toBeGreaterThan(probs[1]);
  });

  it('is stable for large scores', () => {
    expect(softmax([1000, 1000])).toEqual([0.5, 0.5]);
  });
});

describe('SoftmaxRegression', () => {
  const rows = [FEATURE_0, FEATURE_0, FEATURE_1, FEATURE_1];
  const labels = ['a', 'a', 'b', 'b'] as const;

  it('separates linearly separable classes', () => {
    const model = SoftmaxRegression.fit(rows, labels, ['a', 'b'], 2);
    expect(model.predict(FEATURE_0)).toBe('a');
    expect(model.predict(FEATURE_1)).toBe('b');
    expect(model.predictProba(FEATURE_0)[0]).toBeGreaterThan(0.5);
  });

  it('is deterministic', () => {
    const first = SoftmaxRegression.fit(rows, labels, ['a', 'b'], 2);
    const second = SoftmaxRegression.fit(rows, labels, ['a', 'b'], 2);
    expect(second.toJSON()).toEqual(first.toJSON());
  });

  it('keeps probabilities in class order', () => {
    const model = SoftmaxRegression.fit(rows, labels, ['a', 'b'], 2);
    expect(model.classes).toEqual(['a', 'b']);
    const probs = model.predictProba(FEATURE_1);
    expect(probs).toHaveLength(2);
    expect(probs[1]).toBeGreaterThan(probs[0]);
  });

  it('stronger regularization gives less confident posteriors', () => {
    const loose = SoftmaxRegression.fit(rows, labels, ['a', 'b'], 2, {
      maxIterations: 500,
      learningRate: 1,
      regularization: 10,
    });
    const tight = SoftmaxRegression.fit(rows, labels, ['a', 'b'], 2, {
      maxIterations: 500,
      learningRate: 1,
      regularization: 0.1,
    });
    expect(loose.predictProba(FEATURE_0)[0]).toBeGreaterThan(tight.predictProba(FEATURE_0)[0]);
  });

  it('round-trips through its state', () => {
    const model = SoftmaxRegression.fit(rows, labels, ['a', 'b'], 2);
    const restored = SoftmaxRegression.fromState(model.toJSON());
    expect(restored.predictProba(FEATURE_0)).toEqual(model.predictProba(FEATURE_0));
  });
});
