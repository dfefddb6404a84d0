import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, existsSync, writeFileSync } from 'fs';
import { join } from 'path';
import os from 'os';
import { AssistantPipeline, EmptyQueryError, MODEL_UNAVAILABLE_MESSAGE } from './assistant-pipeline.js';
import { DecisionLogger } from './decision-logger.js';
import { EntityExtractor } from '../extraction/entity-extractor.js';
import { NO_LOCATION_RECOGNIZER } from '../extraction/location-recognizer.js';
import { ModelStore } from '../intent/model-store.js';
import { IntentModel } from '../intent/intent-model.js';
import { CorruptModelError, DatasetFormatError, NotTrainedError } from '../intent/errors.js';
import { TOY_EXAMPLES } from '../intent/__fixtures__/toy-examples.js';

function createPipeline(logger?: DecisionLogger): AssistantPipeline {
  return new AssistantPipeline({
    extractor: new EntityExtractor({ recognizer: NO_LOCATION_RECOGNIZER }),
    logger,
  });
}

describe('AssistantPipeline', () => {
  let tmpDir: string | undefined;

  function createTmpDir(): string {
    tmpDir = mkdtempSync(join(os.tmpdir(), 'pipeline-test-'));
    return tmpDir;
  }

  afterEach(() => {
    if (tmpDir && existsSync(tmpDir)) {
      rmSync(tmpDir, { recursive: true });
    }
    tmpDir = undefined;
  });

  describe('parse', () => {
    it('degrades to MODEL_UNAVAILABLE without a trained model', async () => {
      const pipeline = createPipeline();

      const result = await pipeline.parse('Rate from Mumbai to Pune 10kg');

      expect(result.intent).toBeNull();
      expect(result.directive).toEqual({
        nextAction: 'MODEL_UNAVAILABLE',
        message: MODEL_UNAVAILABLE_MESSAGE,
      });
      expect(result.entities.pickup_location).toBe('Mumbai');
      expect(result.entities.drop_location).toBe('Pune');
      expect(result.entities.weight_kg).toBe(10);
    });

    it('classifies, extracts and decides once trained', async () => {
      const pipeline = createPipeline();
      pipeline.train(TOY_EXAMPLES);

      const result = await pipeline.parse('rate batao, Andheri Powai 10kg');

      expect(result.intent?.intent).toBe('CHECK_RATE');
      expect(result.directive).toEqual({
        nextAction: 'CALCULATE_RATE',
        message: 'Fetching rate information...',
        apiCall: 'pricing_api',
        parameters: { from: 'Andheri', to: 'Powai', weight: 10 },
      });
    });

    it('rejects blank text', async () => {
      await expect(createPipeline().parse('   ')).rejects.toThrow(EmptyQueryError);
    });

    it('logs every outcome when a logger is configured', async () => {
      const logger = new DecisionLogger(createTmpDir());
      const pipeline = createPipeline(logger);

      await pipeline.parse('agent please');

      const entries = await logger.readAll();
      expect(entries).toHaveLength(1);
      expect(entries[0].text).toBe('agent please');
      expect(entries[0].nextAction).toBe('MODEL_UNAVAILABLE');
    });
  });

  describe('rank', () => {
    it('returns the full distribution with the classified intent on top', () => {
      const pipeline = createPipeline();
      pipeline.train(TOY_EXAMPLES);

      const ranking = pipeline.rank('track karo');

      expect(ranking.map((r) => r.intent).sort()).toEqual(['CHECK_RATE', 'CONNECT_TO_AGENT', 'TRACK_ORDER']);
      expect(ranking[0].intent).toBe(pipeline.classify('track karo').intent);
    });

    it('throws NotTrainedError before training', () => {
      expect(() => createPipeline().rank('track karo')).toThrow(NotTrainedError);
    });
  });

  describe('train', () => {
    it('puts the new model in service', () => {
      const pipeline = createPipeline();
      const before = pipeline.currentModel;

      const report = pipeline.train(TOY_EXAMPLES);

      expect(report.trainSize).toBe(15);
      expect(pipeline.isReady).toBe(true);
      expect(pipeline.currentModel).not.toBe(before);
    });

    it('keeps the previous model when training fails', () => {
      const pipeline = createPipeline();
      pipeline.train(TOY_EXAMPLES);
      const trained = pipeline.currentModel;

      expect(() => pipeline.train([])).toThrow(DatasetFormatError);
      expect(pipeline.currentModel).toBe(trained);
      expect(pipeline.classify('track karo').intent).toBe('TRACK_ORDER');
    });
  });

  describe('loadModel', () => {
    it('returns false and keeps the current model when nothing is stored', async () => {
      const pipeline = createPipeline();
      const before = pipeline.currentModel;

      expect(await pipeline.loadModel(new ModelStore(join(createTmpDir(), 'none.json')))).toBe(false);
      expect(pipeline.currentModel).toBe(before);
    });

    it('swaps in a stored model', async () => {
      const store = new ModelStore(join(createTmpDir(), 'model.json'));
      const model = new IntentModel();
      model.fit(TOY_EXAMPLES);
      await store.save(model);

      const pipeline = createPipeline();
      expect(await pipeline.loadModel(store)).toBe(true);
      expect(pipeline.isReady).toBe(true);
      expect(pipeline.classify('agent please')).toEqual(model.predict('agent please'));
    });

    it('propagates a corrupt model and stays unready', async () => {
      const modelPath = join(createTmpDir(), 'model.json');
      writeFileSync(modelPath, '{"format": "something-else"}', 'utf-8');

      const pipeline = createPipeline();
      await expect(pipeline.loadModel(new ModelStore(modelPath))).rejects.toThrow(CorruptModelError);
      expect(pipeline.isReady).toBe(false);
    });
  });

  it('decide() ignores classifier state', () => {
    const pipeline = createPipeline();
    expect(pipeline.decide('CONNECT_TO_AGENT', pipeline.extract('connect me')).nextAction).toBe(
      'TRANSFER_TO_AGENT',
    );
  });
});
