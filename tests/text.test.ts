import { describe, expect, it } from 'vitest';

import {
  ADDRESS_PLACEHOLDER,
  PHONE_PENDING,
  cleanString,
  countWords,
  firstAddressSegment,
  formatPhoneNumber,
  isKnown,
} from '../src/text';

describe('formatPhoneNumber', () => {
  it('groups a ten-digit number', () => {
    expect(formatPhoneNumber('5551234567')).toBe('(555) 123-4567');
  });

  it('drops a leading country digit 1', () => {
    expect(formatPhoneNumber('15551234567')).toBe('(555) 123-4567');
    expect(formatPhoneNumber('+1 555-123-4567')).toBe('(555) 123-4567');
  });

  it('returns other input unchanged', () => {
    expect(formatPhoneNumber('notaphone')).toBe('notaphone');
    expect(formatPhoneNumber('25551234567')).toBe('25551234567');
    expect(formatPhoneNumber('')).toBe('');
  });

  it('is idempotent on formatted numbers', () => {
    expect(formatPhoneNumber('(555) 123-4567')).toBe('(555) 123-4567');
  });
});

describe('text helpers', () => {
  it('collapses whitespace', () => {
    expect(cleanString('  123 Main\n  Street  ')).toBe('123 Main Street');
    expect(cleanString(null)).toBe('');
  });

  it('treats placeholders and blanks as unknown', () => {
    expect(isKnown(ADDRESS_PLACEHOLDER)).toBe(false);
    expect(isKnown(PHONE_PENDING)).toBe(false);
    expect(isKnown('  ')).toBe(false);
    expect(isKnown('12 Elm Street')).toBe(true);
  });

  it('takes the street segment of an address', () => {
    expect(firstAddressSegment('123 Harbor View Road, Springfield, IL')).toBe('123 Harbor View Road');
    expect(firstAddressSegment('No commas here')).toBe('No commas here');
  });

  it('counts whitespace-separated words', () => {
    expect(countWords('Research Summary\n\nfor  Joe')).toBe(4);
    expect(countWords('')).toBe(0);
  });
});
