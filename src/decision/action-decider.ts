/**
 * Deterministic next-action decisions from an intent and its entities.
 */

import { isIntentLabel } from '../types/intent.js';
import type { EntityField, EntitySet } from '../types/entities.js';
import type { ActionDirective } from '../types/action.js';
import { INTENT_REQUIREMENTS, UNKNOWN_INTENT_MESSAGE } from './requirements.js';

/** Prompt wording for each field that can be asked for */
const FIELD_DESCRIPTIONS: Readonly<Partial<Record<EntityField, string>>> = Object.freeze({
  pickup_location: 'pickup location',
  drop_location: 'delivery location',
  weight_kg: 'package weight (in kg)',
  packages: 'number of packages',
  pickup_time: 'preferred pickup time',
  phone_number: 'contact number',
});

/**
 * Required fields of `intent` whose value is null. Unknown intents have
 * no requirements.
 */
export function findMissingFields(intent: string, entities: EntitySet): EntityField[] {
  if (!isIntentLabel(intent)) {
    return [];
  }
  return INTENT_REQUIREMENTS[intent].required.filter((field) => entities[field] === null);
}

/**
 * Recommended fields of `intent` that are absent or empty, in table order.
 */
export function findUnfilledRecommendedFields(intent: string, entities: EntitySet): EntityField[] {
  if (!isIntentLabel(intent)) {
    return [];
  }
  return INTENT_REQUIREMENTS[intent].recommended.filter((field) => !entities[field]);
}

/**
 * "Please provide X." or "Please provide X, Y and Z."
 */
export function missingFieldsMessage(fields: readonly EntityField[]): string {
  const readable = fields.map((field) => FIELD_DESCRIPTIONS[field] ?? field);
  if (readable.length === 1) {
    return `Please provide ${readable[0]}.`;
  }
  return `Please provide ${readable.slice(0, -1).join(', ')} and ${readable[readable.length - 1]}.`;
}

/**
 * Decide the next step for a classified request. Never throws.
 *
 * `confidence` is accepted for callers that gate on it; decisions do not
 * currently depend on it.
 */
export function decide(intent: string, entities: EntitySet, confidence = 1): ActionDirective {
  if (!isIntentLabel(intent)) {
    return { nextAction: 'UNKNOWN', message: UNKNOWN_INTENT_MESSAGE, intent };
  }

  const missing = findMissingFields(intent, entities);
  if (missing.length > 0) {
    return {
      nextAction: 'ASK_MISSING_FIELDS',
      missingFields: missing,
      message: missingFieldsMessage(missing),
    };
  }

  return INTENT_REQUIREMENTS[intent].resolve(entities, findUnfilledRecommendedFields(intent, entities));
}
