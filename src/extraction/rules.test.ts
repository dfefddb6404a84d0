import { describe, it, expect } from 'vitest';
import {
  extractFragile,
  extractLocations,
  extractPackages,
  extractPaymentMode,
  extractPhoneNumber,
  extractPickupTime,
  extractWeight,
  locationCandidates,
} from './rules.js';
import { NO_LOCATION_RECOGNIZER } from './location-recognizer.js';
import type { LocationRecognizer, RecognizedSpan } from './location-recognizer.js';

function stubRecognizer(spans: RecognizedSpan[]): LocationRecognizer {
  return { recognize: () => spans };
}

describe('extractLocations', () => {
  it('assigns the first two gazetteer hits to pickup and drop', () => {
    expect(extractLocations('Pickup karna hai Andheri se Powai', NO_LOCATION_RECOGNIZER)).toEqual({
      pickup_location: 'Andheri',
      drop_location: 'Powai',
    });
  });

  it('reports multi-word gazetteer names in title case', () => {
    expect(extractLocations('MG Road to Connaught Place', NO_LOCATION_RECOGNIZER)).toEqual({
      pickup_location: 'Mg Road',
      drop_location: 'Connaught Place',
    });
  });

  it('puts recognizer spans ahead of gazetteer hits', () => {
    const recognizer = stubRecognizer([{ text: 'Powai', label: 'GPE' }]);
    expect(extractLocations('Powai to Andheri', recognizer)).toEqual({
      pickup_location: 'Powai',
      drop_location: 'Andheri',
    });
  });

  it('ignores recognizer spans that are not locations', () => {
    const recognizer = stubRecognizer([{ text: 'Ravi', label: 'PERSON' }]);
    expect(extractLocations('Ravi wants delivery to Pune', recognizer)).toEqual({
      pickup_location: null,
      drop_location: 'Pune',
    });
  });

  it('treats a single location with "se" as the pickup', () => {
    expect(extractLocations('Thane se bhejna hai', NO_LOCATION_RECOGNIZER)).toEqual({
      pickup_location: 'Thane',
      drop_location: null,
    });
  });

  it('requires "se" to be a whole word', () => {
    expect(extractLocations('Send to Pune', NO_LOCATION_RECOGNIZER)).toEqual({
      pickup_location: null,
      drop_location: null,
    });
  });

  it('treats a single location with a drop cue as the drop', () => {
    expect(extractLocations('Drop at Saket', NO_LOCATION_RECOGNIZER)).toEqual({
      pickup_location: null,
      drop_location: 'Saket',
    });
  });

  it('deduplicates candidates from both sources', () => {
    const recognizer = stubRecognizer([
      { text: 'Andheri', label: 'GPE' },
      { text: 'Andheri', label: 'LOC' },
    ]);
    expect(extractLocations('Andheri pickup', recognizer)).toEqual({
      pickup_location: 'Andheri',
      drop_location: null,
    });
  });

  it('keeps "tier" as a gazetteer entry', () => {
    expect(extractLocations('tier 2 city delivery', NO_LOCATION_RECOGNIZER)).toEqual({
      pickup_location: null,
      drop_location: 'Tier',
    });
  });

  it('returns nulls when no location is found', () => {
    expect(extractLocations('Where is my parcel', NO_LOCATION_RECOGNIZER)).toEqual({
      pickup_location: null,
      drop_location: null,
    });
  });
});

describe('locationCandidates', () => {
  it('trims recognizer spans and keeps first-seen order', () => {
    const recognizer = stubRecognizer([{ text: ' Goa ', label: 'GPE' }]);
    expect(locationCandidates('Goa se Mumbai', recognizer)).toEqual(['Goa', 'Mumbai']);
  });
});

describe('extractWeight', () => {
  it('parses integer and decimal weights', () => {
    expect(extractWeight('Rate for 10kg parcel')).toBe(10);
    expect(extractWeight('10.5 kilograms')).toBe(10.5);
    expect(extractWeight('5 KGS')).toBe(5);
    expect(extractWeight('around 2 kilos')).toBe(2);
  });

  it('returns null for spelled-out numbers', () => {
    expect(extractWeight('ten kg')).toBeNull();
  });
});

describe('extractPackages', () => {
  it('parses counts followed by a package noun', () => {
    expect(extractPackages('2 boxes hai')).toBe(2);
    expect(extractPackages('3 parcels')).toBe(3);
    expect(extractPackages('1 item')).toBe(1);
  });

  it('returns null when the number is a weight', () => {
    expect(extractPackages('5 kg')).toBeNull();
  });
});

describe('extractPickupTime', () => {
  it('prefers time-of-day keywords over day references', () => {
    expect(extractPickupTime('kal morning pickup')).toBe('morning');
  });

  it('maps Hinglish day references', () => {
    expect(extractPickupTime('pickup kal')).toBe('tomorrow');
    expect(extractPickupTime('parso bhejo')).toBe('day_after_tomorrow');
    expect(extractPickupTime('aaj hi chahiye')).toBe('today');
  });

  it('matches "day after tomorrow" before "tomorrow"', () => {
    expect(extractPickupTime('day after tomorrow please')).toBe('day_after_tomorrow');
  });

  it('returns clock times as lowercase literals', () => {
    expect(extractPickupTime('pickup at 4:30 pm')).toBe('4:30 pm');
    expect(extractPickupTime('Pickup at 5PM')).toBe('5pm');
    expect(extractPickupTime('6 baje aana')).toBe('6 baje');
    expect(extractPickupTime('at 14:00')).toBe('14:00');
  });

  it('matches keywords inside longer words', () => {
    expect(extractPickupTime('pickup tonight please')).toBe('night');
    expect(extractPickupTime('Kalyan se pickup')).toBe('tomorrow');
  });

  it('returns null when no time is mentioned', () => {
    expect(extractPickupTime('10kg parcel')).toBeNull();
  });
});

describe('extractFragile', () => {
  it('detects fragile keywords as substrings', () => {
    expect(extractFragile('Handle carefully, glass items')).toBe(true);
    expect(extractFragile('FRAGILE')).toBe(true);
  });

  it('defaults to false', () => {
    expect(extractFragile('normal box')).toBe(false);
  });
});

describe('extractPaymentMode', () => {
  it('maps cash keywords to COD', () => {
    expect(extractPaymentMode('COD chahiye')).toBe('COD');
    expect(extractPaymentMode('cash on delivery')).toBe('COD');
  });

  it('maps online keywords to prepaid', () => {
    expect(extractPaymentMode('pay by UPI')).toBe('prepaid');
    expect(extractPaymentMode('credit card')).toBe('prepaid');
  });

  it('follows table priority when several keywords appear', () => {
    expect(extractPaymentMode('online or cod')).toBe('COD');
  });

  it('matches keywords inside longer words', () => {
    expect(extractPaymentMode('cashless payment chahiye')).toBe('COD');
    expect(extractPaymentMode('cards accepted?')).toBe('prepaid');
    expect(extractPaymentMode('pincode 400076 serviceable?')).toBe('COD');
  });

  it('returns null when no payment keyword appears', () => {
    expect(extractPaymentMode('pickup from Thane')).toBeNull();
  });
});

describe('extractPhoneNumber', () => {
  it('returns the literal matched number', () => {
    expect(extractPhoneNumber('call me at 9876543210')).toBe('9876543210');
    expect(extractPhoneNumber('+91 9876543210')).toBe('+91 9876543210');
    expect(extractPhoneNumber('+91-9876543210')).toBe('+91-9876543210');
  });

  it('rejects numbers that do not start with 6-9', () => {
    expect(extractPhoneNumber('1234567890')).toBeNull();
  });

  it('rejects longer digit runs', () => {
    expect(extractPhoneNumber('98765432101')).toBeNull();
  });
});
