/**
 * Individual extraction rules. Each rule is independent and returns null
 * (or false for the fragile flag) when it finds nothing.
 */

import type { PaymentMode } from '../types/entities.js';
import {
  DROP_CUES,
  FRAGILE_KEYWORDS,
  GAZETTEER,
  LOCATION_ENTITY_CLASSES,
  PAYMENT_KEYWORDS,
  PICKUP_CUES,
  PICKUP_PARTICLES,
  TIME_KEYWORDS,
} from './keyword-tables.js';
import type { LocationRecognizer } from './location-recognizer.js';

// ============================================================================
// Patterns
// ============================================================================

/** Decimal number followed by a kilogram unit */
const WEIGHT_PATTERN = /(\d+(?:\.\d+)?)\s*(?:kgs?|kilograms?|kilos)/;

/** Integer followed by a package noun */
const PACKAGES_PATTERN = /(\d+)\s*(?:box(?:es)?|packages?|parcels?|items?)/;

/** H[:MM] am|pm, H:MM, or H baje */
const CLOCK_PATTERN = /\b\d{1,2}(?::\d{2})?\s*(?:am|pm)\b|\b\d{1,2}:\d{2}\b|\b\d{1,2}\s*baje\b/;

/** Indian mobile number, optionally with +91 */
const PHONE_PATTERN = /(?:\+91[\s-]?[6-9]\d{9}|\b[6-9]\d{9})\b/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word, Unicode-aware match for a lowercase keyword */
function wordPattern(keyword: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{M}\\p{N}_])${escapeRegExp(keyword)}(?![\\p{L}\\p{M}\\p{N}_])`, 'u');
}

const PARTICLE_PATTERNS: readonly RegExp[] = PICKUP_PARTICLES.map(wordPattern);

// ============================================================================
// Locations
// ============================================================================

export interface LocationPair {
  pickup_location: string | null;
  drop_location: string | null;
}

function toTitleCase(value: string): string {
  return value
    .split(' ')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Ordered, deduplicated location candidates: recognizer spans first,
 * then gazetteer hits in gazetteer order.
 */
export function locationCandidates(text: string, recognizer: LocationRecognizer): string[] {
  const seen = new Set<string>();
  const candidates: string[] = [];
  const add = (candidate: string): void => {
    if (!seen.has(candidate)) {
      seen.add(candidate);
      candidates.push(candidate);
    }
  };

  for (const span of recognizer.recognize(text)) {
    const name = span.text.trim();
    if (name && LOCATION_ENTITY_CLASSES.has(span.label)) {
      add(name);
    }
  }

  const lower = text.toLowerCase();
  for (const place of GAZETTEER) {
    if (lower.includes(place)) {
      add(toTitleCase(place));
    }
  }

  return candidates;
}

/**
 * Assign candidates to pickup and drop.
 *
 * Two or more candidates: first is pickup, second is drop. A single
 * candidate is placed by cue words, pickup cues taking precedence.
 */
export function extractLocations(text: string, recognizer: LocationRecognizer): LocationPair {
  const candidates = locationCandidates(text, recognizer);

  if (candidates.length >= 2) {
    return { pickup_location: candidates[0], drop_location: candidates[1] };
  }
  if (candidates.length === 0) {
    return { pickup_location: null, drop_location: null };
  }

  const only = candidates[0];
  const lower = text.toLowerCase();
  const pickupCue =
    PICKUP_CUES.some((cue) => lower.includes(cue)) ||
    PARTICLE_PATTERNS.some((pattern) => pattern.test(lower));
  if (pickupCue) {
    return { pickup_location: only, drop_location: null };
  }
  if (DROP_CUES.some((cue) => lower.includes(cue))) {
    return { pickup_location: null, drop_location: only };
  }
  return { pickup_location: null, drop_location: null };
}

// ============================================================================
// Quantities
// ============================================================================

export function extractWeight(text: string): number | null {
  const match = text.toLowerCase().match(WEIGHT_PATTERN);
  return match ? Number.parseFloat(match[1]) : null;
}

export function extractPackages(text: string): number | null {
  const match = text.toLowerCase().match(PACKAGES_PATTERN);
  return match ? Number.parseInt(match[1], 10) : null;
}

// ============================================================================
// Time, handling, payment, contact
// ============================================================================

/**
 * Symbolic keywords are matched as substrings and checked before clock
 * patterns, so "kal 4 baje" yields "tomorrow" and "tonight" yields "night".
 */
export function extractPickupTime(text: string): string | null {
  const lower = text.toLowerCase();
  for (const [keyword, label] of TIME_KEYWORDS) {
    if (lower.includes(keyword)) {
      return label;
    }
  }
  const clock = lower.match(CLOCK_PATTERN);
  return clock ? clock[0] : null;
}

export function extractFragile(text: string): boolean {
  const lower = text.toLowerCase();
  return FRAGILE_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/** Substring match in table order; "cards" is prepaid, "pincode" is COD */
export function extractPaymentMode(text: string): PaymentMode | null {
  const lower = text.toLowerCase();
  for (const [keyword, mode] of PAYMENT_KEYWORDS) {
    if (lower.includes(keyword)) {
      return mode;
    }
  }
  return null;
}

export function extractPhoneNumber(text: string): string | null {
  const match = text.match(PHONE_PATTERN);
  return match ? match[0] : null;
}
