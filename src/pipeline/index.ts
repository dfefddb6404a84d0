export { AssistantPipeline, EmptyQueryError, MODEL_UNAVAILABLE_MESSAGE } from './assistant-pipeline.js';
export type { AssistantPipelineOptions, ParseResult } from './assistant-pipeline.js';
export { DecisionLogger, DECISION_LOG_FILE } from './decision-logger.js';
export type { DecisionLogEntry } from './decision-logger.js';
