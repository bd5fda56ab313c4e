/**
 * Text cleaning and field patterns shared by every extractor
 */

const PRIVATE_USE_GLYPHS = /[\uE000-\uF8FF]/g;
// C0 controls, DEL and C1 controls
const CONTROL_CHARS = /[\u0000-\u001F\u007F-\u009F]/g;
const WHITESPACE_RUN = /\s+/g;

export const PHONE_PATTERN = /\+?\(?\d[\d\-\s().]{8,}\d/;
export const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;
export const RATING_PATTERN = /([0-9]+\.[0-9]+|[0-9]+)\s+stars?/i;
export const COUNT_PATTERN = /([0-9][0-9,.]*)/;

/**
 * Strip private-use glyphs (icon fonts), turn control characters into
 * spaces and collapse whitespace.
 */
export function cleanText(value: string | null | undefined): string {
  if (!value) {
    return '';
  }
  return value
    .replace(PRIVATE_USE_GLYPHS, '')
    .replace(CONTROL_CHARS, ' ')
    .replace(WHITESPACE_RUN, ' ')
    .trim();
}

/**
 * First match of the pattern, or '' when nothing matches.
 * Capture group 1 is preferred over the whole match.
 */
export function firstMatch(text: string | null | undefined, pattern: RegExp): string {
  if (!text) {
    return '';
  }
  const match = pattern.exec(text);
  if (!match) {
    return '';
  }
  return (match[1] ?? match[0]).trim();
}

export function extractPhone(text: string | null | undefined): string {
  return firstMatch(text, PHONE_PATTERN);
}

export function extractEmail(text: string | null | undefined): string {
  return firstMatch(text, EMAIL_PATTERN).toLowerCase();
}

/**
 * "1,234 reviews" -> "1234"
 */
export function extractCount(text: string | null | undefined): string {
  return firstMatch(text, COUNT_PATTERN).replace(/,/g, '');
}

/**
 * Identity-key form of a value: cleaned, lower-cased
 */
export function normalizeKeyPart(value: string | null | undefined): string {
  return cleanText(value).toLowerCase();
}
