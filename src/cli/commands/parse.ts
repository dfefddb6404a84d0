/**
 * CLI command: `dispatch-nlu parse "<text>"`
 *
 * Runs the full pipeline on one request: intent, entities and the next
 * action. Without a usable model the directive is MODEL_UNAVAILABLE and
 * the entities are still shown. `--ranked` adds the model's full intent
 * distribution.
 *
 * @module cli/commands/parse
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { createAssistant } from '../../index.js';
import { readConfig, ConfigError } from '../../config/reader.js';
import type { DispatchConfig } from '../../config/schema.js';
import { CorruptModelError } from '../../intent/errors.js';
import { extractFlag, hasFlag, positionalText } from '../flags.js';
import { formatDirective, formatEntities, formatRanking } from '../format.js';

export async function parseCommand(args: string[]): Promise<number> {
  if (hasFlag(args, 'help')) {
    showHelp();
    return 0;
  }

  const text = positionalText(args);
  if (!text) {
    p.log.error('Request text is required.');
    p.log.message(`Usage: ${pc.cyan('dispatch-nlu parse "<text>"')}`);
    return 1;
  }
  const json = hasFlag(args, 'json');
  const ranked = hasFlag(args, 'ranked');

  let config: DispatchConfig;
  try {
    config = await readConfig(extractFlag(args, 'config'));
  } catch (err) {
    if (err instanceof ConfigError) {
      p.log.error(err.message);
      return 1;
    }
    throw err;
  }

  const modelPath = extractFlag(args, 'model') ?? config.model.path;
  const { pipeline, store } = createAssistant({ ...config, model: { path: modelPath } });

  try {
    const loaded = await pipeline.loadModel(store);
    if (!loaded && !json) {
      p.log.warn(`No model found at ${modelPath}; intent classification is unavailable.`);
    }
  } catch (err) {
    if (!(err instanceof CorruptModelError)) {
      throw err;
    }
    if (!json) {
      p.log.warn(`${err.message}\nIntent classification is unavailable.`);
    }
  }

  const result = await pipeline.parse(text);
  const ranking = ranked && pipeline.isReady ? pipeline.rank(text) : null;

  if (json) {
    console.log(JSON.stringify(ranking ? { ...result, ranking } : result, null, 2));
    return 0;
  }

  const intentLine = result.intent
    ? `${pc.bold(result.intent.intent)} ${pc.dim(`(confidence ${result.intent.confidence.toFixed(2)})`)}`
    : pc.yellow('unavailable');
  p.log.message(`Intent: ${intentLine}`);
  if (ranking) {
    p.log.message(pc.bold('Ranking') + '\n' + formatRanking(ranking).join('\n'));
  }
  p.log.message(pc.bold('Entities') + '\n' + formatEntities(result.entities).join('\n'));
  p.log.message(pc.bold('Next action') + '\n' + formatDirective(result.directive).join('\n'));
  return 0;
}

function showHelp(): void {
  console.log(`
dispatch-nlu parse - Classify a request, extract entities and decide the next action

Usage:
  dispatch-nlu parse "<text>" [options]

Options:
  --model=<path>     Stored model (default from config)
  --config=<path>    Config file (default: dispatch-nlu.json)
  --ranked           Also show every intent with its probability
  --json             Print the result as JSON
`);
}
