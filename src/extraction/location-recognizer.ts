/**
 * Location recognition back ends for the entity extractor.
 *
 * A recognizer returns labeled spans; the extractor keeps only spans
 * whose label is a location class (GPE or LOC). Calls are synchronous.
 */

import nlp from 'compromise';

export interface RecognizedSpan {
  text: string;
  /** Entity class, e.g. GPE, LOC, PERSON */
  label: string;
}

export interface LocationRecognizer {
  recognize(text: string): RecognizedSpan[];
}

const EDGE_PUNCTUATION = /^[^\p{L}\p{M}\p{N}]+|[^\p{L}\p{M}\p{N}]+$/gu;

/**
 * Place recognition using compromise's place tagger (cities, countries,
 * regions). Every place is reported as GPE.
 */
export class CompromiseLocationRecognizer implements LocationRecognizer {
  recognize(text: string): RecognizedSpan[] {
    const places: unknown = nlp(text).places().out('array');
    if (!Array.isArray(places)) {
      return [];
    }

    const spans: RecognizedSpan[] = [];
    for (const place of places) {
      if (typeof place !== 'string') continue;
      const cleaned = place.replace(EDGE_PUNCTUATION, '');
      if (cleaned) {
        spans.push({ text: cleaned, label: 'GPE' });
      }
    }
    return spans;
  }
}

/** Recognizer that finds nothing; the gazetteer alone supplies locations */
export const NO_LOCATION_RECOGNIZER: LocationRecognizer = Object.freeze({
  recognize: (): RecognizedSpan[] => [],
});
