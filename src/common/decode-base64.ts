import { defang, stripNonPrintable } from '@common/text/text-sanitizer';

export const ENCODED_COMMENT_LIMIT_BYTES = 4096;

export const ENCODED_COMMENT_TOO_LARGE = '<encoded payload too large>';

// Standard or URL-safe alphabet with optional padding
const BASE64_REGEX = /^([A-Za-z0-9+/_-]+)(={0,2})$/;

function isBase64(encoded: string): boolean {
  const match = BASE64_REGEX.exec(encoded);
  if (!match) {
    return false;
  }

  const [, body, padding] = match;
  if (body.length % 4 === 1) {
    return false;
  }

  return padding.length === 0 || (body.length + padding.length) % 4 === 0;
}

/**
 * Decodes a base64 message comment into single-line, defanged text.
 * Returns an empty string for anything that is not base64, and a fixed
 * placeholder when the input is over the size limit.
 */
export function decodeComment(encoded?: string): string {
  if (!encoded) {
    return '';
  }

  if (Buffer.byteLength(encoded, 'utf-8') > ENCODED_COMMENT_LIMIT_BYTES) {
    return ENCODED_COMMENT_TOO_LARGE;
  }

  const compact = encoded.replace(/\s+/g, '');
  if (!isBase64(compact)) {
    return '';
  }

  const text = Buffer.from(compact, 'base64').toString('utf-8');

  return defang(stripNonPrintable(text).trim());
}
