/**
 * Structured fields extracted from a logistics request.
 *
 * Every field except `fragile` is null when no rule matched. `fragile`
 * is always a boolean and defaults to false.
 */

export type PaymentMode = 'COD' | 'prepaid';

export type EntitySet = {
  pickup_location: string | null;
  drop_location: string | null;
  weight_kg: number | null;
  packages: number | null;
  pickup_time: string | null;
  fragile: boolean;
  payment_mode: PaymentMode | null;
  phone_number: string | null;
};

export type EntityField = keyof EntitySet;

export const ENTITY_FIELDS: readonly EntityField[] = Object.freeze([
  'pickup_location',
  'drop_location',
  'weight_kg',
  'packages',
  'pickup_time',
  'fragile',
  'payment_mode',
  'phone_number',
]);

/** An EntitySet with nothing extracted */
export function emptyEntities(): EntitySet {
  return {
    pickup_location: null,
    drop_location: null,
    weight_kg: null,
    packages: null,
    pickup_time: null,
    fragile: false,
    payment_mode: null,
    phone_number: null,
  };
}
