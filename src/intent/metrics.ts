/**
 * Held-out evaluation metrics for the intent model.
 *
 * Per-class precision, recall and F1 are reported for every label that
 * appears in either the true or the predicted labels. A ratio with a
 * zero denominator is reported as 0.
 */

import { INTENT_LABELS } from '../types/intent.js';
import type { ClassificationReport, ClassMetrics, IntentLabel } from '../types/intent.js';

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

function f1(precision: number, recall: number): number {
  return precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;
}

/**
 * Compare predictions against true labels.
 *
 * @param actual - True labels
 * @param predicted - Predicted labels, same length and order as `actual`
 */
export function classificationReport(
  actual: readonly IntentLabel[],
  predicted: readonly IntentLabel[],
): ClassificationReport {
  if (actual.length !== predicted.length) {
    throw new Error(
      `Label count mismatch: ${actual.length} actual vs ${predicted.length} predicted`,
    );
  }

  const present = new Set<IntentLabel>([...actual, ...predicted]);
  const labels = INTENT_LABELS.filter((label) => present.has(label));

  let correct = 0;
  const truePositives = new Map<IntentLabel, number>();
  const predictedCounts = new Map<IntentLabel, number>();
  const supportCounts = new Map<IntentLabel, number>();

  for (let i = 0; i < actual.length; i++) {
    const truth = actual[i];
    const guess = predicted[i];
    supportCounts.set(truth, (supportCounts.get(truth) ?? 0) + 1);
    predictedCounts.set(guess, (predictedCounts.get(guess) ?? 0) + 1);
    if (truth === guess) {
      correct++;
      truePositives.set(truth, (truePositives.get(truth) ?? 0) + 1);
    }
  }

  const perClass: ClassificationReport['perClass'] = {};
  const macro: ClassMetrics = { precision: 0, recall: 0, f1: 0, support: 0 };
  const weighted: ClassMetrics = { precision: 0, recall: 0, f1: 0, support: 0 };

  for (const label of labels) {
    const tp = truePositives.get(label) ?? 0;
    const support = supportCounts.get(label) ?? 0;
    const precision = ratio(tp, predictedCounts.get(label) ?? 0);
    const recall = ratio(tp, support);
    const metrics: ClassMetrics = { precision, recall, f1: f1(precision, recall), support };
    perClass[label] = metrics;

    macro.precision += metrics.precision;
    macro.recall += metrics.recall;
    macro.f1 += metrics.f1;
    weighted.precision += metrics.precision * support;
    weighted.recall += metrics.recall * support;
    weighted.f1 += metrics.f1 * support;
  }

  const total = actual.length;
  const classCount = labels.length;

  return {
    accuracy: ratio(correct, total),
    perClass,
    macroAvg: {
      precision: ratio(macro.precision, classCount),
      recall: ratio(macro.recall, classCount),
      f1: ratio(macro.f1, classCount),
      support: total,
    },
    weightedAvg: {
      precision: ratio(weighted.precision, total),
      recall: ratio(weighted.recall, total),
      f1: ratio(weighted.f1, total),
      support: total,
    },
  };
}
