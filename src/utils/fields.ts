export const DEFAULT_PHONE_PATTERN = /^\+\d{7,15}$/;
export const PLATE_MAX_LENGTH = 10;
export const MAKE_MODEL_MAX_LENGTH = 80;
export const ISSUE_MAX_LENGTH = 500;
export const ODOMETER_LIMIT = 10_000_000;

const NAME_MAX_TOKENS = 4;
const NAME_MAX_LENGTH = 40;
const BARE_PHONE_MIN_DIGITS = 9;

// A digit run that may be broken up by spaces, dashes, dots or parentheses.
const PHONE_CANDIDATE = /\+?\(?\d[\d\s().-]*\d/g;

export function truncate(text: string, max: number): string {
  const chars = Array.from(text.trim());
  return chars.length > max ? chars.slice(0, max).join('') : chars.join('');
}

export function normalizePhone(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const digits = raw.replace(/\D/g, '');
  if (!digits) return null;
  return `+${digits}`;
}

/** Whole-message phone parse, used where the user was asked for a number. */
export function parsePhone(text: string, pattern: RegExp = DEFAULT_PHONE_PATTERN): string | null {
  const phone = normalizePhone(text);
  return phone && pattern.test(phone) ? phone : null;
}

/** Finds a phone number inside free text. */
export function extractPhone(text: string, pattern: RegExp = DEFAULT_PHONE_PATTERN): string | null {
  for (const match of text.matchAll(PHONE_CANDIDATE)) {
    const candidate = match[0];
    const phone = normalizePhone(candidate);
    if (!phone) continue;

    const digitCount = phone.length - 1;
    if (!candidate.startsWith('+') && digitCount < BARE_PHONE_MIN_DIGITS) continue;
    if (pattern.test(phone)) return phone;
  }
  return null;
}

export function normalizePlate(raw: string): string {
  const cleaned = raw.toUpperCase().replace(/[^\p{L}\p{N}]/gu, '');
  return Array.from(cleaned).slice(0, PLATE_MAX_LENGTH).join('');
}

export function normalizeOdometer(raw: string, options: { allowZero?: boolean } = {}): number | null {
  const digits = raw.replace(/\D/g, '');
  if (!digits) return null;

  const value = parseInt(digits, 10);
  if (!Number.isSafeInteger(value) || value >= ODOMETER_LIMIT) return null;
  if (value < 0 || (value === 0 && !options.allowZero)) return null;
  return value;
}

export function looksLikeName(text: string, pattern: RegExp = DEFAULT_PHONE_PATTERN): boolean {
  const trimmed = text.trim();
  if (!trimmed) return false;
  if (extractPhone(trimmed, pattern)) return false;
  if (trimmed.split(/\s+/).length > NAME_MAX_TOKENS) return false;
  return trimmed.length <= NAME_MAX_LENGTH;
}
