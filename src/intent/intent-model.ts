/**
 * Trainable intent classifier: TF-IDF n-gram features feeding a
 * multinomial logistic regression.
 *
 * Lifecycle: construct untrained, then fit() or IntentModel.restore().
 * A trained model is read-only; fit() on an existing instance builds a
 * complete new state before replacing the old one in a single
 * assignment, so concurrent predict() calls never see a half-built model.
 *
 * @example
 * ```ts
 * const model = new IntentModel();
 * const report = model.fit(examples);
 * model.predict('Rate batao Mumbai to Pune 10kg');
 * // => { intent: 'CHECK_RATE', confidence: 0.41 }
 * const blob = model.persist();
 * const copy = IntentModel.restore(blob);
 * ```
 */

import { z } from 'zod';
import { normalizeText } from '../text/normalizer.js';
import { INTENT_LABELS, IntentLabelSchema } from '../types/intent.js';
import type {
  ClassificationReport,
  IntentLabel,
  IntentPrediction,
  LabeledExample,
  RankedIntent,
  TrainingReport,
} from '../types/intent.js';
import { validateExamples } from './dataset-loader.js';
import { CorruptModelError, DatasetFormatError, NotTrainedError } from './errors.js';
import { DEFAULT_FEATURE_SPACE_OPTIONS, FeatureSpace } from './feature-space.js';
import type { FeatureSpaceOptions } from './feature-space.js';
import { classificationReport } from './metrics.js';
import { DEFAULT_SOFTMAX_OPTIONS, SoftmaxRegression } from './softmax-regression.js';
import type { SoftmaxOptions } from './softmax-regression.js';
import { stratifiedSplit } from './stratified-split.js';

// ============================================================================
// Options
// ============================================================================

export interface IntentModelOptions extends FeatureSpaceOptions, SoftmaxOptions {
  /** Held-out fraction (default 0.2) */
  testSize: number;
  /** Split seed (default 42) */
  seed: number;
}

export const DEFAULT_INTENT_MODEL_OPTIONS: IntentModelOptions = {
  ...DEFAULT_FEATURE_SPACE_OPTIONS,
  ...DEFAULT_SOFTMAX_OPTIONS,
  testSize: 0.2,
  seed: 42,
};

// ============================================================================
// Persisted Form
// ============================================================================

export const MODEL_FORMAT = 'dispatch-nlu/intent-model';
export const MODEL_FORMAT_VERSION = 1;

export const PersistedModelSchema = z.object({
  format: z.literal(MODEL_FORMAT),
  version: z.literal(MODEL_FORMAT_VERSION),
  trainedAt: z.string(),
  featureSpace: z.object({
    vocabulary: z.array(z.string()),
    idf: z.array(z.number()),
    ngramRange: z.tuple([z.number().int().min(1), z.number().int().min(1)]),
  }),
  classifier: z.object({
    classes: z.array(IntentLabelSchema).min(1),
    weights: z.array(z.array(z.number())),
    biases: z.array(z.number()),
  }),
  evaluation: z
    .object({
      accuracy: z.number().min(0).max(1),
      trainSize: z.number().int().min(0),
      testSize: z.number().int().min(0),
    })
    .optional(),
});

export type PersistedModel = z.infer<typeof PersistedModelSchema>;

interface TrainedState {
  featureSpace: FeatureSpace;
  classifier: SoftmaxRegression<IntentLabel>;
  trainedAt: string;
  evaluation?: PersistedModel['evaluation'];
}

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Dimension checks zod cannot express */
function shapeIssues(model: PersistedModel): string[] {
  const issues: string[] = [];
  const { vocabulary, idf, ngramRange } = model.featureSpace;
  const { classes, weights, biases } = model.classifier;

  if (idf.length !== vocabulary.length) {
    issues.push(`featureSpace.idf: expected ${vocabulary.length} values, got ${idf.length}`);
  }
  if (ngramRange[0] > ngramRange[1]) {
    issues.push('featureSpace.ngramRange: minimum exceeds maximum');
  }
  if (new Set(classes).size !== classes.length) {
    issues.push('classifier.classes: duplicate labels');
  }
  if (weights.length !== classes.length) {
    issues.push(`classifier.weights: expected ${classes.length} rows, got ${weights.length}`);
  }
  weights.forEach((row, i) => {
    if (row.length !== vocabulary.length) {
      issues.push(`classifier.weights.${i}: expected ${vocabulary.length} values, got ${row.length}`);
    }
  });
  if (biases.length !== classes.length) {
    issues.push(`classifier.biases: expected ${classes.length} values, got ${biases.length}`);
  }
  return issues;
}

// ============================================================================
// IntentModel
// ============================================================================

export class IntentModel {
  private state: TrainedState | null = null;
  private readonly options: IntentModelOptions;

  constructor(options?: Partial<IntentModelOptions>) {
    this.options = { ...DEFAULT_INTENT_MODEL_OPTIONS, ...options };
  }

  /** Whether fit() or restore() has completed */
  get isTrained(): boolean {
    return this.state !== null;
  }

  /** ISO timestamp of the training run, or null when untrained */
  get trainedAt(): string | null {
    return this.state?.trainedAt ?? null;
  }

  /** Labels the classifier can emit, in model order */
  get labels(): readonly IntentLabel[] {
    return this.state?.classifier.classes ?? [];
  }

  /** Vocabulary size of the frozen feature space */
  get vocabularySize(): number {
    return this.state?.featureSpace.size ?? 0;
  }

  /**
   * Train on labeled examples and report held-out metrics.
   *
   * @throws {DatasetFormatError} On an empty dataset, a row that is not a
   *   {text, intent} pair with a known label, a class with fewer than two
   *   examples, or a training split with no usable terms
   */
  fit(examples: readonly unknown[]): TrainingReport {
    const rows = this.checkExamples(examples);

    const split = stratifiedSplit(
      rows.map((row) => ({ text: normalizeText(row.text), intent: row.intent })),
      (row) => row.intent,
      this.options.testSize,
      this.options.seed,
    );

    const featureSpace = FeatureSpace.fit(
      split.train.map((row) => row.text),
      { maxFeatures: this.options.maxFeatures, ngramRange: this.options.ngramRange },
    );
    if (featureSpace.size === 0) {
      throw new DatasetFormatError('Training texts contain no usable terms');
    }

    const present = new Set(split.train.map((row) => row.intent));
    const classes = INTENT_LABELS.filter((label) => present.has(label));

    const classifier = SoftmaxRegression.fit(
      split.train.map((row) => featureSpace.transform(row.text)),
      split.train.map((row) => row.intent),
      classes,
      featureSpace.size,
      {
        maxIterations: this.options.maxIterations,
        learningRate: this.options.learningRate,
        regularization: this.options.regularization,
      },
    );

    const predicted = split.test.map((row) => classifier.predict(featureSpace.transform(row.text)));
    const report = classificationReport(
      split.test.map((row) => row.intent),
      predicted,
    );

    this.state = {
      featureSpace,
      classifier,
      trainedAt: new Date().toISOString(),
      evaluation: {
        accuracy: report.accuracy,
        trainSize: split.train.length,
        testSize: split.test.length,
      },
    };

    return {
      ...report,
      trainSize: split.train.length,
      testSize: split.test.length,
      vocabularySize: featureSpace.size,
    };
  }

  /**
   * Classify one request.
   *
   * @throws {NotTrainedError} Before fit() or restore()
   */
  predict(text: string): IntentPrediction {
    const [top] = this.rank(text);
    return { intent: top.intent, confidence: roundTo2(top.probability) };
  }

  /**
   * Full posterior distribution, highest probability first. Ties keep
   * model class order.
   *
   * @throws {NotTrainedError} Before fit() or restore()
   */
  rank(text: string): RankedIntent[] {
    const state = this.requireState();
    const row = state.featureSpace.transform(normalizeText(text));
    const probabilities = state.classifier.predictProba(row);

    return state.classifier.classes
      .map((intent, i) => ({ intent, probability: probabilities[i] }))
      .sort((a, b) => b.probability - a.probability);
  }

  /**
   * Score the model against labeled examples without retraining.
   *
   * @throws {NotTrainedError} Before fit() or restore()
   * @throws {DatasetFormatError} On malformed rows
   */
  evaluate(examples: readonly unknown[]): ClassificationReport {
    const state = this.requireState();
    const rows = this.checkExamples(examples);
    const predicted = rows.map((row) =>
      state.classifier.predict(state.featureSpace.transform(normalizeText(row.text))),
    );
    return classificationReport(
      rows.map((row) => row.intent),
      predicted,
    );
  }

  /**
   * Serialize the feature space and classifier as one JSON document.
   *
   * @throws {NotTrainedError} Before fit() or restore()
   */
  persist(): string {
    const state = this.requireState();
    const document: PersistedModel = {
      format: MODEL_FORMAT,
      version: MODEL_FORMAT_VERSION,
      trainedAt: state.trainedAt,
      featureSpace: state.featureSpace.toJSON(),
      classifier: state.classifier.toJSON(),
      ...(state.evaluation ? { evaluation: state.evaluation } : {}),
    };
    return JSON.stringify(document);
  }

  /**
   * Rebuild a trained model from persist() output.
   *
   * @throws {CorruptModelError} On invalid JSON, schema or dimensions
   */
  static restore(blob: string, options?: Partial<IntentModelOptions>): IntentModel {
    let raw: unknown;
    try {
      raw = JSON.parse(blob);
    } catch {
      throw new CorruptModelError('Model blob is not valid JSON');
    }

    const result = PersistedModelSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      );
      throw new CorruptModelError(`Model blob failed validation:\n${issues.join('\n')}`, issues);
    }

    const issues = shapeIssues(result.data);
    if (issues.length > 0) {
      throw new CorruptModelError(`Model blob has inconsistent dimensions:\n${issues.join('\n')}`, issues);
    }

    const model = new IntentModel(options);
    model.state = {
      featureSpace: FeatureSpace.fromState(result.data.featureSpace),
      classifier: SoftmaxRegression.fromState(result.data.classifier),
      trainedAt: result.data.trainedAt,
      evaluation: result.data.evaluation,
    };
    return model;
  }

  private requireState(): TrainedState {
    if (!this.state) {
      throw new NotTrainedError();
    }
    return this.state;
  }

  private checkExamples(examples: readonly unknown[]): LabeledExample[] {
    if (examples.length === 0) {
      throw new DatasetFormatError('Dataset is empty');
    }
    return validateExamples(examples);
  }
}
