/**
 * Per-intent requirement table.
 *
 * Each descriptor lists the fields an intent needs before it can act,
 * the fields it can use when present, and the directive it produces once
 * nothing required is missing. `recommended` is the subset of `optional`
 * worth prompting for; decide() hands the unfilled ones to `resolve`.
 */

import type { IntentLabel } from '../types/intent.js';
import type { EntityField, EntitySet } from '../types/entities.js';
import type { ActionDirective } from '../types/action.js';

export interface IntentRequirement {
  required: readonly EntityField[];
  optional: readonly EntityField[];
  recommended: readonly EntityField[];
  resolve: (entities: EntitySet, unfilled: readonly EntityField[]) => ActionDirective;
}

export const PAYMENT_OPTIONS: readonly string[] = Object.freeze(['COD', 'UPI', 'Card', 'Net Banking']);

export const UPLOAD_OPTIONS: readonly string[] = Object.freeze([
  'Invoice',
  'KYC',
  'GST Certificate',
  'ID Proof',
]);

export const UNKNOWN_INTENT_MESSAGE = 'I am not sure how to help with that. Please contact customer support.';

function withContact(directive: ActionDirective, entities: EntitySet): ActionDirective {
  return entities.phone_number ? { ...directive, contact: entities.phone_number } : directive;
}

function resolveBooking(entities: EntitySet, unfilled: readonly EntityField[]): ActionDirective {
  if (unfilled.length > 0) {
    return {
      nextAction: 'ASK_OPTIONAL_FIELDS',
      optionalFields: [...unfilled],
      message: `I can book your pickup. Would you like to specify ${unfilled.join(', ')}?`,
      canProceed: true,
    };
  }

  return {
    nextAction: 'CREATE_BOOKING',
    message: 'Creating your pickup booking...',
    apiCall: 'booking_api',
    parameters: { ...entities },
  };
}

function resolveReschedule(entities: EntitySet): ActionDirective {
  const directive: ActionDirective = {
    nextAction: 'ASK_ORDER_ID',
    message: 'Please provide your booking ID to reschedule',
    requiredInfo: 'booking_id',
  };
  return entities.pickup_time ? { ...directive, parameters: { new_time: entities.pickup_time } } : directive;
}

const REQUIREMENTS: Record<IntentLabel, IntentRequirement> = {
  CHECK_RATE: {
    required: ['pickup_location', 'drop_location', 'weight_kg'],
    optional: ['packages'],
    recommended: [],
    resolve: (entities) => ({
      nextAction: 'CALCULATE_RATE',
      message: 'Fetching rate information...',
      apiCall: 'pricing_api',
      parameters: {
        from: entities.pickup_location,
        to: entities.drop_location,
        weight: entities.weight_kg,
      },
    }),
  },
  CHECK_SERVICEABILITY: {
    required: ['drop_location'],
    optional: ['pickup_location'],
    recommended: [],
    resolve: (entities) => ({
      nextAction: 'CHECK_SERVICE_AREA',
      message: 'Checking serviceability...',
      apiCall: 'serviceability_api',
      parameters: { location: entities.drop_location },
    }),
  },
  BOOK_PICKUP: {
    required: ['pickup_location', 'drop_location', 'packages'],
    optional: ['pickup_time', 'weight_kg', 'phone_number', 'payment_mode'],
    recommended: ['pickup_time', 'phone_number'],
    resolve: resolveBooking,
  },
  TRACK_ORDER: {
    required: [],
    optional: ['phone_number'],
    recommended: [],
    resolve: (entities) =>
      withContact(
        {
          nextAction: 'ASK_TRACKING_INFO',
          message: 'Please provide your AWB number or order ID to track',
          requiredInfo: 'awb_number',
        },
        entities,
      ),
  },
  CANCEL_ORDER: {
    required: [],
    optional: [],
    recommended: [],
    resolve: () => ({
      nextAction: 'ASK_ORDER_ID',
      message: 'Please provide your order ID or AWB number to cancel',
      requiredInfo: 'order_id',
    }),
  },
  RESCHEDULE_PICKUP: {
    required: [],
    optional: ['pickup_time', 'pickup_location'],
    recommended: [],
    resolve: resolveReschedule,
  },
  RAISE_COMPLAINT: {
    required: [],
    optional: ['phone_number'],
    recommended: [],
    resolve: (entities) =>
      withContact(
        {
          nextAction: 'CREATE_TICKET',
          message: 'I will create a complaint ticket. Please describe your issue.',
          ticketType: 'complaint',
        },
        entities,
      ),
  },
  CONNECT_TO_AGENT: {
    required: [],
    optional: [],
    recommended: [],
    resolve: () => ({
      nextAction: 'TRANSFER_TO_AGENT',
      message: 'Connecting you to a customer service agent...',
      priority: 'normal',
    }),
  },
  PAYMENT_QUERY: {
    required: [],
    optional: [],
    recommended: [],
    resolve: () => ({
      nextAction: 'PROVIDE_PAYMENT_INFO',
      message: 'We accept COD, UPI, cards, and online payment. Which option would you prefer?',
      options: [...PAYMENT_OPTIONS],
    }),
  },
  DOCUMENT_UPLOAD_QUERY: {
    required: [],
    optional: [],
    recommended: [],
    resolve: () => ({
      nextAction: 'PROVIDE_UPLOAD_LINK',
      message: 'You can upload documents through our portal or app. What document do you need to upload?',
      options: [...UPLOAD_OPTIONS],
    }),
  },
};

export const INTENT_REQUIREMENTS: Readonly<Record<IntentLabel, IntentRequirement>> =
  Object.freeze(REQUIREMENTS);
