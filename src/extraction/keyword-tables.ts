/**
 * Static lookup tables for rule-based entity extraction.
 *
 * Ordered tables are priority lists: the first entry that matches wins.
 * Everything here is frozen at module load.
 */

import type { PaymentMode } from '../types/entities.js';

/**
 * Known place names, matched as case-insensitive substrings and
 * reported in title case. Order is the candidate order.
 */
export const GAZETTEER: readonly string[] = Object.freeze([
  'mumbai',
  'delhi',
  'bangalore',
  'pune',
  'chennai',
  'kolkata',
  'hyderabad',
  'ahmedabad',
  'gurgaon',
  'noida',
  'thane',
  'navi mumbai',
  'andheri',
  'powai',
  'bandra',
  'worli',
  'kurla',
  'ghatkopar',
  'kharghar',
  'vashi',
  'panvel',
  'whitefield',
  'koramangala',
  'indiranagar',
  'malleswaram',
  'mg road',
  'connaught place',
  'saket',
  'vasant kunj',
  'dwarka',
  'rohini',
  'ghaziabad',
  'faridabad',
  'kashmir',
  'tier',
]);

/** Recognizer entity classes treated as locations */
export const LOCATION_ENTITY_CLASSES: ReadonlySet<string> = new Set(['GPE', 'LOC']);

/** Single-location cues; the particle "se" must be a whole word */
export const PICKUP_CUES: readonly string[] = Object.freeze(['pickup']);
export const PICKUP_PARTICLES: readonly string[] = Object.freeze(['se']);
export const DROP_CUES: readonly string[] = Object.freeze(['drop', 'delivery']);

/**
 * Symbolic pickup times, matched as substrings. Times of day come before day references, so
 * "kal morning" resolves to "morning".
 */
export const TIME_KEYWORDS: ReadonlyArray<readonly [string, string]> = Object.freeze([
  ['morning', 'morning'],
  ['afternoon', 'afternoon'],
  ['evening', 'evening'],
  ['night', 'night'],
  ['kal', 'tomorrow'],
  ['aaj', 'today'],
  ['parso', 'day_after_tomorrow'],
  ['day after tomorrow', 'day_after_tomorrow'],
  ['tomorrow', 'tomorrow'],
  ['today', 'today'],
] as const);

/** Matched as substrings, COD keywords first */
export const PAYMENT_KEYWORDS: ReadonlyArray<readonly [string, PaymentMode]> = Object.freeze([
  ['cod', 'COD'],
  ['cash on delivery', 'COD'],
  ['cash', 'COD'],
  ['prepaid', 'prepaid'],
  ['online', 'prepaid'],
  ['upi', 'prepaid'],
  ['card', 'prepaid'],
] as const);

/** Matched as substrings */
export const FRAGILE_KEYWORDS: readonly string[] = Object.freeze([
  'fragile',
  'breakable',
  'handle carefully',
  'delicate',
]);
