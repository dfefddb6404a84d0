#!/usr/bin/env node
import { createRequire } from 'node:module';
import * as p from '@clack/prompts';
import { trainCommand } from './cli/commands/train.js';
import { parseCommand } from './cli/commands/parse.js';
import { extractCommand } from './cli/commands/extract.js';
import { evaluateCommand } from './cli/commands/evaluate.js';

async function printVersion(): Promise<void> {
  const require = createRequire(import.meta.url);
  const pkg = require('../package.json') as { version: string; name: string };

  console.log(`${pkg.name}  v${pkg.version}`);
  console.log(`Node.js       ${process.version}`);
  console.log(`Platform      ${process.platform} ${process.arch}`);
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (command === '--version' || command === '-V') {
    await printVersion();
    return;
  }

  const rest = args.slice(1);
  let exitCode: number;

  switch (command) {
    case 'train':
    case 't':
      exitCode = await trainCommand(rest);
      break;
    case 'parse':
    case 'p':
      exitCode = await parseCommand(rest);
      break;
    case 'extract':
    case 'x':
      exitCode = await extractCommand(rest);
      break;
    case 'evaluate':
    case 'eval':
      exitCode = await evaluateCommand(rest);
      break;
    case 'help':
    case '--help':
    case '-h':
    case undefined:
      showHelp();
      exitCode = 0;
      break;
    default:
      p.log.error(`Unknown command: ${command}`);
      showHelp();
      exitCode = 1;
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

function showHelp() {
  console.log(`
dispatch-nlu - Intent, entities and next actions for logistics requests

Usage:
  dispatch-nlu <command> [options]

Commands:
  train, t          Train the intent classifier and store the model
  parse, p          Classify a request, extract entities and decide the next action
  extract, x        Extract entities only
  evaluate, eval    Score the stored model on a labeled dataset
  help              Show this message

Options:
  --version, -V     Show version information
  --config=<path>   Config file (default: dispatch-nlu.json)

Run 'dispatch-nlu <command> --help' for command options.

Configuration:
  dispatch-nlu.json in the working directory. Every key is optional:

  {
    "model": { "path": "models/intent-model.json" },
    "training": { "dataset_path": "data/intents.csv", "max_features": 500, "seed": 42 },
    "extraction": { "use_location_recognizer": true },
    "audit": { "enabled": false, "log_dir": ".dispatch-nlu" }
  }

Examples:
  dispatch-nlu train
  dispatch-nlu train --dataset=data/intents.csv --model=models/intent-model.json
  dispatch-nlu parse "Pickup karna hai Andheri se Powai, 2 boxes hai"
  dispatch-nlu parse "Rate batao Mumbai to Pune 10kg" --json
  dispatch-nlu extract "kal morning pickup, fragile hai, COD"
  dispatch-nlu evaluate --dataset=data/holdout.csv
`);
}

main().catch((err: unknown) => {
  p.log.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
