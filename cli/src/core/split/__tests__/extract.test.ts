import { describe, it, expect } from 'vitest';
import { extractDepotId, extractShippingPoint, keyOf, matchFirst } from '../extract.js';
import { UNKNOWN } from '../types.js';

describe('extractDepotId', () => {
  it('reads the numeral glued to the line before the label', () => {
    expect(extractDepotId('Driver 07\n1:342104\nDepot ID\nRoute A')).toEqual({
      matched: true,
      key: '2104',
      rule: 'before-label',
    });
  });

  it('allows whitespace around the line break', () => {
    expect(keyOf(extractDepotId('10:157788  \r\n   Depot ID'))).toBe('7788');
  });

  it('matches the label case-insensitively', () => {
    expect(keyOf(extractDepotId('1:343300\nDEPOT id'))).toBe('3300');
  });

  it('falls back to the first numeral after the label', () => {
    expect(extractDepotId('Call List\nDepot ID: North-2104 Region 5555')).toEqual({
      matched: true,
      key: '2104',
      rule: 'after-label',
    });
  });

  it('lets the fallback span line breaks', () => {
    expect(keyOf(extractDepotId('depot id\n\n  Yard\n3300'))).toBe('3300');
  });

  it('prefers the before-label rule over a later after-label match', () => {
    expect(keyOf(extractDepotId('Route 1:347788\nDepot ID\nDepot ID 1234'))).toBe('7788');
  });

  it('returns unmatched when no rule applies', () => {
    expect(extractDepotId('Call List\nNo depot here 12345')).toEqual({ matched: false });
    expect(extractDepotId('Depot ID 210')).toEqual({ matched: false });
    expect(extractDepotId('Depot ID: none')).toEqual({ matched: false });
  });

  it('returns unmatched for empty or absent text', () => {
    expect(extractDepotId('')).toEqual({ matched: false });
    expect(extractDepotId(null)).toEqual({ matched: false });
    expect(extractDepotId(undefined)).toEqual({ matched: false });
  });
});

describe('extractShippingPoint', () => {
  it('reads the 3-digit + V token after the label', () => {
    expect(extractShippingPoint('Shipping Point : 123V Messer St Hubert')).toEqual({
      matched: true,
      key: '123V',
      rule: 'label',
    });
  });

  it('allows any whitespace around the colon', () => {
    expect(keyOf(extractShippingPoint('Group List\nShipping Point    :  140V  Depot'))).toBe('140V');
    expect(keyOf(extractShippingPoint('Shipping Point:301V'))).toBe('301V');
  });

  it('matches the label case-insensitively', () => {
    expect(keyOf(extractShippingPoint('SHIPPING POINT : 123V'))).toBe('123V');
  });

  it('rejects a lowercase v token', () => {
    expect(extractShippingPoint('Shipping Point : 123v')).toEqual({ matched: false });
  });

  it('skips a rejected token and uses the next occurrence', () => {
    expect(keyOf(extractShippingPoint('Shipping Point : 123v\nShipping Point : 456V'))).toBe('456V');
  });

  it('rejects malformed values', () => {
    expect(keyOf(extractShippingPoint('Shipping Point : 12V'))).toBe(UNKNOWN);
    expect(keyOf(extractShippingPoint('Shipping Point : 1234V'))).toBe(UNKNOWN);
    expect(keyOf(extractShippingPoint('Shipping Point 123V'))).toBe(UNKNOWN);
    expect(keyOf(extractShippingPoint('Shipping Point : '))).toBe(UNKNOWN);
  });

  it('returns unmatched for empty text', () => {
    expect(extractShippingPoint('')).toEqual({ matched: false });
  });
});

describe('matchFirst', () => {
  it('tries rules in order and reports the winning rule', () => {
    const rules = [
      { name: 'first', pattern: /A(\d)/ },
      { name: 'second', pattern: /B(\d)/ },
    ];
    expect(matchFirst(rules, 'B2 A1')).toEqual({ matched: true, key: '1', rule: 'first' });
    expect(matchFirst(rules, 'B2')).toEqual({ matched: true, key: '2', rule: 'second' });
    expect(matchFirst(rules, 'C3')).toEqual({ matched: false });
  });
});

describe('keyOf', () => {
  it('maps unmatched to UNKNOWN', () => {
    expect(keyOf({ matched: false })).toBe('UNKNOWN');
    expect(keyOf({ matched: true, key: '2104', rule: 'x' })).toBe('2104');
  });
});
