export {
  decide,
  findMissingFields,
  findUnfilledRecommendedFields,
  missingFieldsMessage,
} from './action-decider.js';
export {
  INTENT_REQUIREMENTS,
  PAYMENT_OPTIONS,
  UPLOAD_OPTIONS,
  UNKNOWN_INTENT_MESSAGE,
} from './requirements.js';
export type { IntentRequirement } from './requirements.js';
