/**
 * CLI command: `dispatch-nlu train`
 *
 * Fits the intent model on a labeled dataset, prints held-out metrics
 * and stores the model.
 *
 * Exit codes:
 * - 0: Model trained and saved
 * - 1: Config, dataset or training error
 *
 * @module cli/commands/train
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { readConfig, ConfigError } from '../../config/reader.js';
import { toIntentModelOptions } from '../../config/schema.js';
import { loadDataset } from '../../intent/dataset-loader.js';
import { IntentModel } from '../../intent/intent-model.js';
import { ModelStore } from '../../intent/model-store.js';
import { DatasetFormatError } from '../../intent/errors.js';
import { extractFlag, hasFlag } from '../flags.js';
import { formatClassificationTable, formatPercent } from '../format.js';

export async function trainCommand(args: string[]): Promise<number> {
  if (hasFlag(args, 'help')) {
    showHelp();
    return 0;
  }

  const json = hasFlag(args, 'json');

  try {
    const config = await readConfig(extractFlag(args, 'config'));
    const datasetPath = extractFlag(args, 'dataset') ?? config.training.dataset_path;
    const modelPath = extractFlag(args, 'model') ?? config.model.path;

    if (!json) {
      p.intro(pc.bgCyan(pc.black(' dispatch-nlu train ')));
    }

    const examples = await loadDataset(datasetPath);
    const model = new IntentModel(toIntentModelOptions(config.training));
    const report = model.fit(examples);
    await new ModelStore(modelPath).save(model);

    if (json) {
      console.log(JSON.stringify({ modelPath, ...report }, null, 2));
      return 0;
    }

    p.log.message(
      `Trained on ${report.trainSize} examples, evaluated on ${report.testSize} ` +
        pc.dim(`(${report.vocabularySize} features)`),
    );
    p.log.message(`Accuracy: ${pc.bold(formatPercent(report.accuracy))}`);
    p.log.message(formatClassificationTable(report).join('\n'));
    p.outro(pc.green(`Model saved to ${modelPath}`));
    return 0;
  } catch (err) {
    if (err instanceof ConfigError || err instanceof DatasetFormatError) {
      p.log.error(err.message);
      return 1;
    }
    throw err;
  }
}

function showHelp(): void {
  console.log(`
dispatch-nlu train - Train the intent classifier

Usage:
  dispatch-nlu train [options]

Options:
  --dataset=<path>   Labeled CSV or JSON dataset (default from config)
  --model=<path>     Where to store the model (default from config)
  --config=<path>    Config file (default: dispatch-nlu.json)
  --json             Print the training report as JSON
`);
}
