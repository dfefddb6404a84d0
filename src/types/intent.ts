/**
 * Intent label types for the logistics request classifier.
 *
 * The label set is closed: training data, persisted models and the
 * decision table all draw from INTENT_LABELS.
 */

import { z } from 'zod';

// ============================================================================
// Intent Labels
// ============================================================================

export const INTENT_LABELS = [
  'CHECK_RATE',
  'CHECK_SERVICEABILITY',
  'BOOK_PICKUP',
  'TRACK_ORDER',
  'CANCEL_ORDER',
  'RESCHEDULE_PICKUP',
  'RAISE_COMPLAINT',
  'CONNECT_TO_AGENT',
  'PAYMENT_QUERY',
  'DOCUMENT_UPLOAD_QUERY',
] as const;

export const IntentLabelSchema = z.enum(INTENT_LABELS);

export type IntentLabel = z.infer<typeof IntentLabelSchema>;

/**
 * Type guard for values read from datasets, model files or callers.
 */
export function isIntentLabel(value: unknown): value is IntentLabel {
  return IntentLabelSchema.safeParse(value).success;
}

// ============================================================================
// Training Examples
// ============================================================================

export const LabeledExampleSchema = z.object({
  text: z.string(),
  intent: IntentLabelSchema,
});

/** One labeled training row */
export type LabeledExample = z.infer<typeof LabeledExampleSchema>;

// ============================================================================
// Predictions
// ============================================================================

/**
 * Output of `IntentModel.predict()`.
 *
 * `confidence` is the maximum posterior probability rounded to two decimals.
 */
export interface IntentPrediction {
  intent: IntentLabel;
  confidence: number;
}

/** One entry of the full posterior distribution, highest first */
export interface RankedIntent {
  intent: IntentLabel;
  probability: number;
}

// ============================================================================
// Training Report
// ============================================================================

export interface ClassMetrics {
  precision: number;
  recall: number;
  f1: number;
  support: number;
}

/**
 * Held-out evaluation produced by `fit()` and by the `evaluate` command.
 */
export interface ClassificationReport {
  accuracy: number;
  perClass: Partial<Record<IntentLabel, ClassMetrics>>;
  macroAvg: ClassMetrics;
  weightedAvg: ClassMetrics;
}

export interface TrainingReport extends ClassificationReport {
  trainSize: number;
  testSize: number;
  vocabularySize: number;
}
