/**
 * Loads `dispatch-nlu.json` for the CLI commands and createAssistant().
 *
 * The file may set any subset of the `model`, `training`, `extraction`
 * and `audit` sections; the schema fills the rest. Running without a
 * config file is the normal case and behaves like `{}`.
 *
 * @module config/reader
 */

import { readFile } from 'fs/promises';
import { DispatchConfigSchema, DEFAULT_CONFIG } from './schema.js';
import type { DispatchConfig } from './schema.js';

/** Looked up in the working directory unless `--config` names another file */
export const DEFAULT_CONFIG_PATH = 'dispatch-nlu.json';

/**
 * Unreadable or out-of-range settings. `field` is the dotted path of the
 * first offending setting, e.g. `training.max_features`.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

function formatIssues(issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): string[] {
  return issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

/**
 * @throws {ConfigError} When the file is not JSON or a setting is rejected
 */
export async function readConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<DispatchConfig> {
  let content: string;

  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return DEFAULT_CONFIG;
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  const result = DispatchConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Config validation failed:\n${formatIssues(result.error.issues).join('\n')}`,
      result.error.issues[0]?.path.join('.'),
    );
  }

  return result.data;
}

/** Check an in-memory settings object, collecting every rejected setting */
export function validateConfig(
  raw: unknown,
): { valid: true; config: DispatchConfig } | { valid: false; errors: string[] } {
  const result = DispatchConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data };
  }
  return { valid: false, errors: formatIssues(result.error.issues) };
}
