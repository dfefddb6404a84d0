/**
 * Next-step directives produced by the action decider.
 */

import type { EntityField } from './entities.js';

export type NextAction =
  | 'ASK_MISSING_FIELDS'
  | 'ASK_OPTIONAL_FIELDS'
  | 'CALCULATE_RATE'
  | 'CHECK_SERVICE_AREA'
  | 'CREATE_BOOKING'
  | 'ASK_TRACKING_INFO'
  | 'ASK_ORDER_ID'
  | 'CREATE_TICKET'
  | 'TRANSFER_TO_AGENT'
  | 'PROVIDE_PAYMENT_INFO'
  | 'PROVIDE_UPLOAD_LINK'
  | 'MODEL_UNAVAILABLE'
  | 'UNKNOWN';

/** External API the host application should call next */
export type ApiCall = 'pricing_api' | 'serviceability_api' | 'booking_api';

export type DirectiveParameters = Record<string, string | number | boolean | null>;

export interface ActionDirective {
  nextAction: NextAction;
  message?: string;
  missingFields?: EntityField[];
  optionalFields?: EntityField[];
  apiCall?: ApiCall;
  parameters?: DirectiveParameters;
  canProceed?: boolean;
  /** Identifier the host should collect before continuing (e.g. awb_number) */
  requiredInfo?: string;
  /** Contact number attached as context for tickets and tracking */
  contact?: string;
  ticketType?: 'complaint';
  priority?: 'normal';
  /** Static choices offered to the user */
  options?: string[];
  /** Raw label echoed back for UNKNOWN directives */
  intent?: string;
}
