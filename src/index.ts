// Types
export type {
  IntentLabel,
  LabeledExample,
  IntentPrediction,
  RankedIntent,
  ClassMetrics,
  ClassificationReport,
  TrainingReport,
} from './types/intent.js';
export { INTENT_LABELS, IntentLabelSchema, LabeledExampleSchema, isIntentLabel } from './types/intent.js';

export type { EntitySet, EntityField, PaymentMode } from './types/entities.js';
export { ENTITY_FIELDS, emptyEntities } from './types/entities.js';

export type { ActionDirective, NextAction, ApiCall, DirectiveParameters } from './types/action.js';

// Text
export { normalizeText } from './text/normalizer.js';

// Intent classification
export * from './intent/index.js';

// Entity extraction
export * from './extraction/index.js';

// Decisions
export * from './decision/index.js';

// Pipeline
export * from './pipeline/index.js';

// Config
export * from './config/index.js';

// Import for the factory below
import { AssistantPipeline } from './pipeline/assistant-pipeline.js';
import { DecisionLogger } from './pipeline/decision-logger.js';
import { EntityExtractor } from './extraction/entity-extractor.js';
import { CompromiseLocationRecognizer, NO_LOCATION_RECOGNIZER } from './extraction/location-recognizer.js';
import { ModelStore } from './intent/model-store.js';
import { DEFAULT_CONFIG, toIntentModelOptions } from './config/schema.js';
import type { DispatchConfig } from './config/schema.js';

/**
 * Build a pipeline and model store from a config.
 *
 * The pipeline starts without a trained model; call
 * `pipeline.loadModel(store)` or `pipeline.train()` before classifying.
 *
 * @example
 * ```typescript
 * const { pipeline, store } = createAssistant(await readConfig());
 * await pipeline.loadModel(store);
 * const result = await pipeline.parse('Pickup karna hai Andheri se Powai, 2 boxes hai');
 * ```
 */
export function createAssistant(config: DispatchConfig = DEFAULT_CONFIG): {
  pipeline: AssistantPipeline;
  store: ModelStore;
} {
  const recognizer = config.extraction.use_location_recognizer
    ? new CompromiseLocationRecognizer()
    : NO_LOCATION_RECOGNIZER;

  const pipeline = new AssistantPipeline({
    extractor: new EntityExtractor({ recognizer }),
    modelOptions: toIntentModelOptions(config.training),
    logger: config.audit.enabled ? new DecisionLogger(config.audit.log_dir) : undefined,
  });

  return { pipeline, store: new ModelStore(config.model.path) };
}
