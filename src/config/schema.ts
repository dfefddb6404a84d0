/**
 * Zod schema for the dispatch-nlu configuration file.
 *
 * Every field has a `.default()`, so `DispatchConfigSchema.parse({})`
 * returns a complete config and a missing file means all defaults.
 * Keys are snake_case to match the JSON file.
 *
 * @module config/schema
 */

import { z } from 'zod';
import type { IntentModelOptions } from '../intent/intent-model.js';

// ============================================================================
// Sections
// ============================================================================

const ModelSectionSchema = z.object({
  path: z.string().min(1).default('models/intent-model.json'),
});

/**
 * Training hyper-parameters. Defaults reproduce the reference model:
 * 500 features over 1-2 grams, 80/20 split with seed 42.
 */
const TrainingSectionSchema = z
  .object({
    dataset_path: z.string().min(1).default('data/intents.csv'),
    max_features: z.number().int().min(1).max(100000).default(500),
    ngram_min: z.number().int().min(1).max(5).default(1),
    ngram_max: z.number().int().min(1).max(5).default(2),
    test_size: z.number().gt(0).lt(1).default(0.2),
    seed: z.number().int().default(42),
    max_iterations: z.number().int().min(1).max(100000).default(1000),
    learning_rate: z.number().positive().default(1),
    regularization: z.number().positive().default(1),
  })
  .refine((training) => training.ngram_min <= training.ngram_max, {
    message: 'ngram_min must not exceed ngram_max',
    path: ['ngram_min'],
  });

const ExtractionSectionSchema = z.object({
  /** Use the compromise place tagger in addition to the gazetteer */
  use_location_recognizer: z.boolean().default(true),
});

const AuditSectionSchema = z.object({
  enabled: z.boolean().default(false),
  log_dir: z.string().min(1).default('.dispatch-nlu'),
});

// ============================================================================
// Composite Schema
// ============================================================================

export const DispatchConfigSchema = z.object({
  model: ModelSectionSchema.default(() => ({
    path: 'models/intent-model.json',
  })),
  training: TrainingSectionSchema.default(() => ({
    dataset_path: 'data/intents.csv',
    max_features: 500,
    ngram_min: 1,
    ngram_max: 2,
    test_size: 0.2,
    seed: 42,
    max_iterations: 1000,
    learning_rate: 1,
    regularization: 1,
  })),
  extraction: ExtractionSectionSchema.default(() => ({
    use_location_recognizer: true,
  })),
  audit: AuditSectionSchema.default(() => ({
    enabled: false,
    log_dir: '.dispatch-nlu',
  })),
});

export type DispatchConfig = z.infer<typeof DispatchConfigSchema>;

export type TrainingConfig = DispatchConfig['training'];

export const DEFAULT_CONFIG: DispatchConfig = DispatchConfigSchema.parse({});

/**
 * Map the training section onto intent model options.
 */
export function toIntentModelOptions(training: TrainingConfig): IntentModelOptions {
  return {
    maxFeatures: training.max_features,
    ngramRange: [training.ngram_min, training.ngram_max],
    testSize: training.test_size,
    seed: training.seed,
    maxIterations: training.max_iterations,
    learningRate: training.learning_rate,
    regularization: training.regularization,
  };
}
