/**
 * Multinomial logistic regression over sparse feature rows.
 *
 * Minimizes mean cross-entropy plus an L2 penalty on the weights
 * (strength 1 / (C * m), bias unpenalized) with full-batch gradient
 * descent from zero weights. No randomness: identical inputs always
 * produce identical parameters.
 */

import type { SparseVector } from './feature-space.js';

export interface SoftmaxOptions {
  /** Gradient descent steps (default 1000) */
  maxIterations: number;
  /** Step size (default 1.0) */
  learningRate: number;
  /** Inverse regularization strength C (default 1.0) */
  regularization: number;
}

export interface SoftmaxState<L extends string> {
  classes: L[];
  /** classes.length rows of nFeatures weights */
  weights: number[][];
  biases: number[];
}

export const DEFAULT_SOFTMAX_OPTIONS: SoftmaxOptions = {
  maxIterations: 1000,
  learningRate: 1.0,
  regularization: 1.0,
};

/** Numerically stable softmax */
export function softmax(scores: number[]): number[] {
  const max = Math.max(...scores);
  const exps = scores.map((s) => Math.exp(s - max));
  const sum = exps.reduce((acc, v) => acc + v, 0);
  return exps.map((v) => v / sum);
}

export class SoftmaxRegression<L extends string> {
  private constructor(private readonly state: SoftmaxState<L>) {}

  /**
   * Fit on sparse rows. `classes` fixes the output order; every label
   * must be one of them.
   */
  static fit<L extends string>(
    rows: readonly SparseVector[],
    labels: readonly L[],
    classes: readonly L[],
    nFeatures: number,
    options: SoftmaxOptions = DEFAULT_SOFTMAX_OPTIONS,
  ): SoftmaxRegression<L> {
    const k = classes.length;
    const m = rows.length;
    const classIndex = new Map(classes.map((label, i) => [label, i]));
    const targets = labels.map((label) => classIndex.get(label) ?? -1);

    const weights = classes.map(() => new Array<number>(nFeatures).fill(0));
    const biases = new Array<number>(k).fill(0);
    const model = new SoftmaxRegression<L>({ classes: [...classes], weights, biases });

    if (m === 0 || k === 0) {
      return model;
    }

    const penalty = 1 / (options.regularization * m);

    for (let iter = 0; iter < options.maxIterations; iter++) {
      const gradW = classes.map(() => new Array<number>(nFeatures).fill(0));
      const gradB = new Array<number>(k).fill(0);

      for (let r = 0; r < m; r++) {
        const row = rows[r];
        const probs = model.predictProba(row);
        for (let c = 0; c < k; c++) {
          const error = probs[c] - (targets[r] === c ? 1 : 0);
          gradB[c] += error;
          const gradRow = gradW[c];
          for (let i = 0; i < row.indices.length; i++) {
            gradRow[row.indices[i]] += error * row.values[i];
          }
        }
      }

      for (let c = 0; c < k; c++) {
        const weightRow = weights[c];
        const gradRow = gradW[c];
        for (let f = 0; f < nFeatures; f++) {
          weightRow[f] -= options.learningRate * (gradRow[f] / m + penalty * weightRow[f]);
        }
        biases[c] -= options.learningRate * (gradB[c] / m);
      }
    }

    return model;
  }

  static fromState<L extends string>(state: SoftmaxState<L>): SoftmaxRegression<L> {
    return new SoftmaxRegression<L>({
      classes: [...state.classes],
      weights: state.weights.map((row) => [...row]),
      biases: [...state.biases],
    });
  }

  get classes(): readonly L[] {
    return this.state.classes;
  }

  /** Raw linear scores, one per class */
  decisionFunction(row: SparseVector): number[] {
    return this.state.classes.map((_, c) => {
      const weightRow = this.state.weights[c];
      let score = this.state.biases[c];
      for (let i = 0; i < row.indices.length; i++) {
        score += weightRow[row.indices[i]] * row.values[i];
      }
      return score;
    });
  }

  /** Posterior probabilities in `classes` order */
  predictProba(row: SparseVector): number[] {
    return softmax(this.decisionFunction(row));
  }

  /** Arg-max class; the earliest class wins ties */
  predict(row: SparseVector): L {
    const probs = this.predictProba(row);
    let best = 0;
    for (let c = 1; c < probs.length; c++) {
      if (probs[c] > probs[best]) best = c;
    }
    return this.state.classes[best];
  }

  toJSON(): SoftmaxState<L> {
    return {
      classes: [...this.state.classes],
      weights: this.state.weights.map((row) => [...row]),
      biases: [...this.state.biases],
    };
  }
}
