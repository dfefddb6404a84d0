/**
 * Plain-text rendering of reports, entities and directives for the CLI.
 * Colour is applied by the commands, not here.
 */

import { INTENT_LABELS } from '../types/intent.js';
import type { ClassMetrics, ClassificationReport, RankedIntent } from '../types/intent.js';
import { ENTITY_FIELDS } from '../types/entities.js';
import type { EntitySet } from '../types/entities.js';
import type { ActionDirective } from '../types/action.js';

const LABEL_WIDTH = 24;
const COLUMN_WIDTH = 10;

function metricsRow(name: string, metrics: ClassMetrics): string {
  return (
    name.padEnd(LABEL_WIDTH) +
    metrics.precision.toFixed(2).padStart(COLUMN_WIDTH) +
    metrics.recall.toFixed(2).padStart(COLUMN_WIDTH) +
    metrics.f1.toFixed(2).padStart(COLUMN_WIDTH) +
    String(metrics.support).padStart(COLUMN_WIDTH)
  );
}

/**
 * Per-class precision/recall/F1 table followed by macro and weighted
 * averages.
 */
export function formatClassificationTable(report: ClassificationReport): string[] {
  const header =
    'intent'.padEnd(LABEL_WIDTH) +
    ['precision', 'recall', 'f1', 'support'].map((h) => h.padStart(COLUMN_WIDTH)).join('');

  const lines = [header];
  for (const label of INTENT_LABELS) {
    const metrics = report.perClass[label];
    if (metrics) {
      lines.push(metricsRow(label, metrics));
    }
  }
  lines.push('');
  lines.push(metricsRow('macro avg', report.macroAvg));
  lines.push(metricsRow('weighted avg', report.weightedAvg));
  return lines;
}

/** One `LABEL  probability` line per ranked intent */
export function formatRanking(ranking: readonly RankedIntent[]): string[] {
  return ranking.map(
    ({ intent, probability }) => intent.padEnd(LABEL_WIDTH) + probability.toFixed(2).padStart(COLUMN_WIDTH),
  );
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/** One `field: value` line per entity; unfilled fields show as "-" */
export function formatEntities(entities: EntitySet): string[] {
  return ENTITY_FIELDS.map((field) => {
    const value = entities[field];
    return `${field}: ${value === null ? '-' : String(value)}`;
  });
}

/** Directive fields in a stable order, skipping those not set */
export function formatDirective(directive: ActionDirective): string[] {
  const lines = [`next action: ${directive.nextAction}`];
  if (directive.message) lines.push(`message: ${directive.message}`);
  if (directive.missingFields) lines.push(`missing: ${directive.missingFields.join(', ')}`);
  if (directive.optionalFields) lines.push(`optional: ${directive.optionalFields.join(', ')}`);
  if (directive.canProceed) lines.push('can proceed: yes');
  if (directive.apiCall) lines.push(`api call: ${directive.apiCall}`);
  if (directive.parameters) lines.push(`parameters: ${JSON.stringify(directive.parameters)}`);
  if (directive.requiredInfo) lines.push(`required info: ${directive.requiredInfo}`);
  if (directive.contact) lines.push(`contact: ${directive.contact}`);
  if (directive.ticketType) lines.push(`ticket type: ${directive.ticketType}`);
  if (directive.priority) lines.push(`priority: ${directive.priority}`);
  if (directive.options) lines.push(`options: ${directive.options.join(', ')}`);
  if (directive.intent) lines.push(`intent: ${directive.intent}`);
  return lines;
}
