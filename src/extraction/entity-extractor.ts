/**
 * Rule-based entity extraction over a single utterance.
 *
 * All eight fields are always produced; a field the rules cannot fill is
 * null (fragile is false). Extraction never throws for sparse input.
 */

import type { EntitySet } from '../types/entities.js';
import { CompromiseLocationRecognizer } from './location-recognizer.js';
import type { LocationRecognizer } from './location-recognizer.js';
import {
  extractFragile,
  extractLocations,
  extractPackages,
  extractPaymentMode,
  extractPhoneNumber,
  extractPickupTime,
  extractWeight,
} from './rules.js';

export interface EntityExtractorOptions {
  /** Location recognizer; defaults to the compromise place tagger */
  recognizer?: LocationRecognizer;
}

export class EntityExtractor {
  private readonly recognizer: LocationRecognizer;

  constructor(options: EntityExtractorOptions = {}) {
    this.recognizer = options.recognizer ?? new CompromiseLocationRecognizer();
  }

  extract(text: string): EntitySet {
    const { pickup_location, drop_location } = extractLocations(text, this.recognizer);

    return {
      pickup_location,
      drop_location,
      weight_kg: extractWeight(text),
      packages: extractPackages(text),
      pickup_time: extractPickupTime(text),
      fragile: extractFragile(text),
      payment_mode: extractPaymentMode(text),
      phone_number: extractPhoneNumber(text),
    };
  }
}
