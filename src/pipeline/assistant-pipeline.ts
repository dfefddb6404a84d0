/**
 * Request pipeline: intent classification, entity extraction and the
 * next-action decision behind one facade.
 *
 * The pipeline holds the current intent model by reference. Retraining
 * and loading build a complete new model first and swap the reference
 * only on success, so callers never observe a half-trained model.
 */

import { IntentModel } from '../intent/intent-model.js';
import type { IntentModelOptions } from '../intent/intent-model.js';
import type { ModelStore } from '../intent/model-store.js';
import { CorruptModelError, NotTrainedError } from '../intent/errors.js';
import { EntityExtractor } from '../extraction/entity-extractor.js';
import { decide } from '../decision/action-decider.js';
import type { IntentPrediction, RankedIntent, TrainingReport } from '../types/intent.js';
import type { EntitySet } from '../types/entities.js';
import type { ActionDirective } from '../types/action.js';
import type { DecisionLogger } from './decision-logger.js';

// ============================================================================
// Types
// ============================================================================

export class EmptyQueryError extends Error {
  constructor(message = 'Query text is empty') {
    super(message);
    this.name = 'EmptyQueryError';
  }
}

export interface ParseResult {
  text: string;
  /** Null when no usable intent model is loaded */
  intent: IntentPrediction | null;
  entities: EntitySet;
  directive: ActionDirective;
}

export interface AssistantPipelineOptions {
  /** Initial model; an untrained model is used when omitted */
  model?: IntentModel;
  extractor?: EntityExtractor;
  /** Options for models built by train() and loadModel() */
  modelOptions?: Partial<IntentModelOptions>;
  /** Audit trail for parse() outcomes */
  logger?: DecisionLogger;
}

export const MODEL_UNAVAILABLE_MESSAGE =
  'Intent model is unavailable. Please train or load a model first.';

// ============================================================================
// AssistantPipeline
// ============================================================================

export class AssistantPipeline {
  private model: IntentModel;
  private readonly extractor: EntityExtractor;
  private readonly modelOptions: Partial<IntentModelOptions>;
  private readonly logger: DecisionLogger | null;

  constructor(options: AssistantPipelineOptions = {}) {
    this.modelOptions = options.modelOptions ?? {};
    this.model = options.model ?? new IntentModel(this.modelOptions);
    this.extractor = options.extractor ?? new EntityExtractor();
    this.logger = options.logger ?? null;
  }

  /** The model currently in service */
  get currentModel(): IntentModel {
    return this.model;
  }

  get isReady(): boolean {
    return this.model.isTrained;
  }

  /**
   * @throws {NotTrainedError} When no trained model is in service
   */
  classify(text: string): IntentPrediction {
    return this.model.predict(text);
  }

  /**
   * Every intent the model knows, highest probability first.
   *
   * @throws {NotTrainedError} When no trained model is in service
   */
  rank(text: string): RankedIntent[] {
    return this.model.rank(text);
  }

  extract(text: string): EntitySet {
    return this.extractor.extract(text);
  }

  decide(intent: string, entities: EntitySet, confidence = 1): ActionDirective {
    return decide(intent, entities, confidence);
  }

  /**
   * Fit a fresh model and put it in service. A failed fit leaves the
   * previous model in place.
   *
   * @throws {DatasetFormatError} When the examples cannot be trained on
   */
  train(examples: readonly unknown[]): TrainingReport {
    const next = new IntentModel(this.modelOptions);
    const report = next.fit(examples);
    this.model = next;
    return report;
  }

  /**
   * Restore the stored model and put it in service.
   *
   * @returns false when the store holds no model (the current model stays)
   * @throws {CorruptModelError} When the stored model is invalid
   */
  async loadModel(store: ModelStore): Promise<boolean> {
    const restored = await store.load(this.modelOptions);
    if (!restored) {
      return false;
    }
    this.model = restored;
    return true;
  }

  /**
   * Run all three stages on one request.
   *
   * Without a usable model the directive is MODEL_UNAVAILABLE and the
   * entities are still extracted.
   *
   * @throws {EmptyQueryError} When the text is blank
   */
  async parse(text: string): Promise<ParseResult> {
    if (!text.trim()) {
      throw new EmptyQueryError();
    }

    const entities = this.extract(text);
    let result: ParseResult;

    try {
      const prediction = this.classify(text);
      result = {
        text,
        intent: prediction,
        entities,
        directive: this.decide(prediction.intent, entities, prediction.confidence),
      };
    } catch (err) {
      if (!(err instanceof NotTrainedError) && !(err instanceof CorruptModelError)) {
        throw err;
      }
      result = {
        text,
        intent: null,
        entities,
        directive: { nextAction: 'MODEL_UNAVAILABLE', message: MODEL_UNAVAILABLE_MESSAGE },
      };
    }

    if (this.logger) {
      await this.logger.log(result);
    }
    return result;
  }
}
