// ============================================================================
// Decision Logger
// ============================================================================
// Append-only JSONL audit trail of parse outcomes: the request text, the
// predicted intent, the extracted entities and the directive returned.
// Write failures go to stderr and never reach the caller.

import { appendFile, readFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { ParseResult } from './assistant-pipeline.js';

export const DECISION_LOG_FILE = 'decision-log.jsonl';

const DecisionLogEntrySchema = z.object({
  /** ISO 8601 timestamp */
  timestamp: z.string(),
  text: z.string(),
  /** Predicted label, or null when no model was available */
  intent: z.string().nullable(),
  confidence: z.number().nullable(),
  nextAction: z.string(),
  missingFields: z.array(z.string()),
  entities: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])),
});

export type DecisionLogEntry = z.infer<typeof DecisionLogEntrySchema>;

/**
 * Appends one line per parse outcome to `decision-log.jsonl` in the
 * configured directory.
 *
 * @example
 * ```ts
 * const logger = new DecisionLogger('.dispatch-nlu');
 * await logger.log(result);
 * const entries = await logger.readAll();
 * ```
 */
export class DecisionLogger {
  private logDir: string;
  private logFile: string;

  constructor(logDir: string) {
    this.logDir = logDir;
    this.logFile = join(logDir, DECISION_LOG_FILE);
  }

  get path(): string {
    return this.logFile;
  }

  /**
   * Append a parse outcome. On error, writes to stderr and returns
   * without throwing.
   */
  async log(result: ParseResult): Promise<void> {
    try {
      const entry: DecisionLogEntry = {
        timestamp: new Date().toISOString(),
        text: result.text,
        intent: result.intent?.intent ?? null,
        confidence: result.intent?.confidence ?? null,
        nextAction: result.directive.nextAction,
        missingFields: result.directive.missingFields ?? [],
        entities: { ...result.entities },
      };

      await mkdir(this.logDir, { recursive: true });
      await appendFile(this.logFile, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      process.stderr.write(`[decision-logger] Failed to log: ${message}\n`);
    }
  }

  /**
   * Read all entries, skipping blank and malformed lines. Returns an
   * empty array when the log does not exist yet.
   */
  async readAll(): Promise<DecisionLogEntry[]> {
    let content: string;
    try {
      content = await readFile(this.logFile, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw err;
    }

    const entries: DecisionLogEntry[] = [];
    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed) continue;

      let raw: unknown;
      try {
        raw = JSON.parse(trimmed);
      } catch {
        continue;
      }
      const parsed = DecisionLogEntrySchema.safeParse(raw);
      if (parsed.success) {
        entries.push(parsed.data);
      }
    }
    return entries;
  }
}
