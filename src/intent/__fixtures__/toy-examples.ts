/**
 * Small labeled set for intent model tests.
 *
 * Each class carries a marker word no other class uses (rate, track,
 * agent), so the expected winner of a marker-only query is unambiguous.
 */

import type { LabeledExample } from '../../types/intent.js';

export const TOY_EXAMPLES: LabeledExample[] = [
  { text: 'Rate batao Mumbai to Pune 10kg', intent: 'CHECK_RATE' },
  { text: 'rate kitna lagega delhi ke liye', intent: 'CHECK_RATE' },
  { text: 'Shipping rate for 5 kg parcel?', intent: 'CHECK_RATE' },
  { text: 'what is the rate to bangalore', intent: 'CHECK_RATE' },
  { text: 'rate chart bhejo please', intent: 'CHECK_RATE' },
  { text: 'courier rate kya hai', intent: 'CHECK_RATE' },
  { text: 'Mera order track karo', intent: 'TRACK_ORDER' },
  { text: 'track my shipment status', intent: 'TRACK_ORDER' },
  { text: 'parcel track karna hai', intent: 'TRACK_ORDER' },
  { text: 'AWB track kar do', intent: 'TRACK_ORDER' },
  { text: 'please track consignment', intent: 'TRACK_ORDER' },
  { text: 'track where is my delivery', intent: 'TRACK_ORDER' },
  { text: 'Customer agent se baat karni hai', intent: 'CONNECT_TO_AGENT' },
  { text: 'connect me to an agent', intent: 'CONNECT_TO_AGENT' },
  { text: 'agent chahiye urgent', intent: 'CONNECT_TO_AGENT' },
  { text: 'human agent please', intent: 'CONNECT_TO_AGENT' },
  { text: 'call karwao agent ko', intent: 'CONNECT_TO_AGENT' },
  { text: 'live agent transfer', intent: 'CONNECT_TO_AGENT' },
];
