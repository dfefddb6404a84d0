/**
 * Entity extraction module: keyword tables, location recognizers and
 * the rule-based extractor.
 */

export { EntityExtractor } from './entity-extractor.js';
export type { EntityExtractorOptions } from './entity-extractor.js';

export { CompromiseLocationRecognizer, NO_LOCATION_RECOGNIZER } from './location-recognizer.js';
export type { LocationRecognizer, RecognizedSpan } from './location-recognizer.js';

export {
  extractFragile,
  extractLocations,
  extractPackages,
  extractPaymentMode,
  extractPhoneNumber,
  extractPickupTime,
  extractWeight,
  locationCandidates,
} from './rules.js';
export type { LocationPair } from './rules.js';

export {
  GAZETTEER,
  LOCATION_ENTITY_CLASSES,
  TIME_KEYWORDS,
  PAYMENT_KEYWORDS,
  FRAGILE_KEYWORDS,
} from './keyword-tables.js';
