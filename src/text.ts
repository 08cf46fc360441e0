export const ADDRESS_PLACEHOLDER = 'Address unavailable';
export const PHONE_PLACEHOLDER = 'Phone unavailable';
export const ADDRESS_PENDING = 'Address pending verification';
export const PHONE_PENDING = 'Phone pending verification';

const PLACEHOLDERS = new Set([ADDRESS_PLACEHOLDER, PHONE_PLACEHOLDER, ADDRESS_PENDING, PHONE_PENDING]);

export function isPlaceholder(value: string): boolean {
  return PLACEHOLDERS.has(value);
}

/** Usable NAP value: non-empty and not one of the placeholder strings. */
export function isKnown(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim() !== '' && !isPlaceholder(value);
}

export function cleanString(text: string | null | undefined): string {
  if (!text) return '';
  return text.replace(/\s+/g, ' ').trim();
}

export function digitsOnly(text: string): string {
  return text.replace(/\D/g, '');
}

/**
 * Formats US numbers as "(XXX) XXX-XXXX". Ten digits, or eleven with a
 * leading 1; anything else comes back unchanged.
 */
export function formatPhoneNumber(phone: string): string {
  if (!phone) return '';
  const digits = digitsOnly(phone);
  if (digits.length === 10) {
    return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`;
  }
  if (digits.length === 11 && digits[0] === '1') {
    return `(${digits.slice(1, 4)}) ${digits.slice(4, 7)}-${digits.slice(7)}`;
  }
  return phone;
}

export function firstAddressSegment(address: string): string {
  return address.split(',')[0].trim();
}

export function words(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

export function countWords(text: string): number {
  return words(text).length;
}

export function capitalize(text: string): string {
  if (!text) return text;
  return text[0].toUpperCase() + text.slice(1).toLowerCase();
}
