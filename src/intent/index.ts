/**
 * Intent classification module: feature space, classifier, training
 * data and model persistence.
 */

// Errors
export { NotTrainedError, CorruptModelError, DatasetFormatError } from './errors.js';

// Feature space
export { FeatureSpace, extractTerms, DEFAULT_FEATURE_SPACE_OPTIONS } from './feature-space.js';
export type { FeatureSpaceOptions, FeatureSpaceState, SparseVector } from './feature-space.js';

// Classifier
export { SoftmaxRegression, softmax, DEFAULT_SOFTMAX_OPTIONS } from './softmax-regression.js';
export type { SoftmaxOptions, SoftmaxState } from './softmax-regression.js';

// Split and metrics
export { stratifiedSplit, createRng, shuffle } from './stratified-split.js';
export type { SplitResult } from './stratified-split.js';
export { classificationReport } from './metrics.js';

// Model
export {
  IntentModel,
  PersistedModelSchema,
  DEFAULT_INTENT_MODEL_OPTIONS,
  MODEL_FORMAT,
  MODEL_FORMAT_VERSION,
} from './intent-model.js';
export type { IntentModelOptions, PersistedModel } from './intent-model.js';

// Data and storage
export { loadDataset, parseCsvDataset, parseJsonDataset, validateExamples } from './dataset-loader.js';
export { ModelStore, DEFAULT_MODEL_PATH } from './model-store.js';
