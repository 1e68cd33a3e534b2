/**
 * Display-safety helpers for untrusted text (link comments, token symbols,
 * decoded payloads).
 *
 * Example: "visit https://evil.com" -> "visit hxxps://evil[.]com"
 */

const WORD = 'A-Za-z0-9_\\-а-яА-ЯёЁ';

// A dot with a word character on both sides, e.g. the one in "evil.com"
const DOMAIN_DOT_REGEX = new RegExp(`(?<=[${WORD}])\\.(?=[${WORD}])`, 'g');

const ANSI_ESCAPE_REGEX = /\u001b\[[0-?]*[ -/]*[@-~]/g;

// Control, format, surrogate, private-use, unassigned and separators,
// except the plain space
const NON_PRINTABLE_REGEX = /(?! )[\p{C}\p{Z}]/gu;

/**
 * Breaks URL schemes and domains so that auto-linkers do not pick them up.
 * Applying it twice gives the same result as applying it once.
 */
export function defang(text: string): string {
  if (!text) {
    return '';
  }

  return text
    .normalize('NFKC')
    .replaceAll('http:', 'hxxp:')
    .replaceAll('https:', 'hxxps:')
    .replace(DOMAIN_DOT_REGEX, '[.]');
}

/**
 * Removes terminal escape sequences, line breaks, tabs and every other
 * character that cannot be printed on a single line.
 */
export function stripNonPrintable(text: string): string {
  if (!text) {
    return '';
  }

  return text.replace(ANSI_ESCAPE_REGEX, '').replace(NON_PRINTABLE_REGEX, '');
}

export function sanitizeText(text: string): string {
  return defang(stripNonPrintable(text));
}
