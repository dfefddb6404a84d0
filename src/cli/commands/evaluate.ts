/**
 * CLI command: `dispatch-nlu evaluate`
 *
 * Scores the stored model against a labeled dataset.
 *
 * Exit codes:
 * - 0: Evaluation printed
 * - 1: No stored model, or a config, dataset or model error
 *
 * @module cli/commands/evaluate
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { readConfig, ConfigError } from '../../config/reader.js';
import { toIntentModelOptions } from '../../config/schema.js';
import { loadDataset } from '../../intent/dataset-loader.js';
import { ModelStore } from '../../intent/model-store.js';
import { CorruptModelError, DatasetFormatError } from '../../intent/errors.js';
import { extractFlag, hasFlag } from '../flags.js';
import { formatClassificationTable, formatPercent } from '../format.js';

export async function evaluateCommand(args: string[]): Promise<number> {
  if (hasFlag(args, 'help')) {
    showHelp();
    return 0;
  }

  const json = hasFlag(args, 'json');

  try {
    const config = await readConfig(extractFlag(args, 'config'));
    const datasetPath = extractFlag(args, 'dataset') ?? config.training.dataset_path;
    const modelPath = extractFlag(args, 'model') ?? config.model.path;

    const model = await new ModelStore(modelPath).load(toIntentModelOptions(config.training));
    if (!model) {
      p.log.error(`No model found at ${modelPath}`);
      p.log.message(`Run ${pc.cyan('dispatch-nlu train')} first.`);
      return 1;
    }

    const examples = await loadDataset(datasetPath);
    const report = model.evaluate(examples);

    if (json) {
      console.log(JSON.stringify(report, null, 2));
      return 0;
    }

    p.log.message(`Evaluated ${examples.length} examples from ${datasetPath}`);
    p.log.message(`Accuracy: ${pc.bold(formatPercent(report.accuracy))}`);
    p.log.message(formatClassificationTable(report).join('\n'));
    return 0;
  } catch (err) {
    if (
      err instanceof ConfigError ||
      err instanceof DatasetFormatError ||
      err instanceof CorruptModelError
    ) {
      p.log.error(err.message);
      return 1;
    }
    throw err;
  }
}

function showHelp(): void {
  console.log(`
dispatch-nlu evaluate - Score the stored model on a labeled dataset

Usage:
  dispatch-nlu evaluate [options]

Options:
  --dataset=<path>   Labeled CSV or JSON dataset (default from config)
  --model=<path>     Stored model (default from config)
  --config=<path>    Config file (default: dispatch-nlu.json)
  --json             Print the report as JSON
`);
}
