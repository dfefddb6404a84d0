/**
 * CLI command: `dispatch-nlu extract "<text>"`
 *
 * Entity extraction only; no model is needed.
 *
 * @module cli/commands/extract
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { createAssistant } from '../../index.js';
import { readConfig, ConfigError } from '../../config/reader.js';
import { extractFlag, hasFlag, positionalText } from '../flags.js';
import { formatEntities } from '../format.js';

export async function extractCommand(args: string[]): Promise<number> {
  if (hasFlag(args, 'help')) {
    console.log(`
dispatch-nlu extract - Extract entities from a request

Usage:
  dispatch-nlu extract "<text>" [--config=<path>] [--json]
`);
    return 0;
  }

  const text = positionalText(args);
  if (!text) {
    p.log.error('Request text is required.');
    p.log.message(`Usage: ${pc.cyan('dispatch-nlu extract "<text>"')}`);
    return 1;
  }

  try {
    const { pipeline } = createAssistant(await readConfig(extractFlag(args, 'config')));
    const entities = pipeline.extract(text);

    if (hasFlag(args, 'json')) {
      console.log(JSON.stringify(entities, null, 2));
    } else {
      p.log.message(formatEntities(entities).join('\n'));
    }
    return 0;
  } catch (err) {
    if (err instanceof ConfigError) {
      p.log.error(err.message);
      return 1;
    }
    throw err;
  }
}
