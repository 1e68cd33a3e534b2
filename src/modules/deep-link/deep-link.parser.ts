import {
  fromUnits,
  parseWholeAmount,
  readUnits,
  TON_DECIMALS,
  zeroAmount,
} from '@common/decimal/amount';
import { reasonOf } from '@common/errors/single-line-message';
import { defang, stripNonPrintable } from '@common/text/text-sanitizer';
import {
  LinkParseResult,
  LinkWarning,
  PayloadKind,
  WARNING_SEPARATOR,
} from './deep-link.types';

const CANONICAL_PREFIX = 'ton://transfer/';

// Web wallets that mirror ton:// links over https
const MIRROR_PREFIXES = [
  'https://app.tonkeeper.com/transfer/',
  'https://tonkeeper.com/transfer/',
  'https://tonhub.com/transfer/',
];

const TRANSFER_MARKER_REGEX = /transfer\//i;

// User-friendly (48 chars of base64url) or raw (workchain:hex) form
const ADDRESS_PATTERN = '[A-Za-z0-9_-]{48}|-?[01]:[0-9a-fA-F]{64}';
const STRICT_ADDRESS_REGEX = new RegExp(`^(?:${ADDRESS_PATTERN})$`);
const LOOSE_ADDRESS_REGEX = new RegExp(ADDRESS_PATTERN);

const CONTROL_AND_SPACE_REGEX = /[\u0000-\u001f\u007f\s]+/g;

function emptyResult(): LinkParseResult {
  return { valid: false, amount: zeroAmount(), hasPayload: false };
}

/**
 * Unlike decodeURIComponent, never throws: malformed escapes stay as they are
 * and invalid UTF-8 becomes U+FFFD
 */
function percentDecode(raw: string): string {
  return raw.replace(/(?:%[0-9A-Fa-f]{2})+/g, (run) =>
    Buffer.from(run.replace(/%/g, ''), 'hex').toString('utf-8'),
  );
}

function rewriteMirror(link: string): string {
  const mirror = MIRROR_PREFIXES.find(
    (prefix) => link.slice(0, prefix.length).toLowerCase() === prefix,
  );
  return mirror ? CANONICAL_PREFIX + link.slice(mirror.length) : link;
}

function sanitizeLink(link: string): string {
  const decoded = percentDecode(link)
    .normalize('NFKC')
    .replace(CONTROL_AND_SPACE_REGEX, '');

  return rewriteMirror(decoded);
}

function extractAddress(token: string, warnings: string[]): string | null {
  if (STRICT_ADDRESS_REGEX.test(token)) {
    return token;
  }

  const found = LOOSE_ADDRESS_REGEX.exec(token);
  if (found) {
    warnings.push(LinkWarning.NonStandardStructure);
    return found[0];
  }

  warnings.push(LinkWarning.MalformedAddress);
  return null;
}

function lastValue(params: URLSearchParams, key: string): string | undefined {
  const values = params.getAll(key).filter((value) => value.length > 0);
  return values.length > 0 ? values[values.length - 1] : undefined;
}

function applyAmount(
  result: LinkParseResult,
  raw: string,
  warnings: string[],
): void {
  if (raw.includes('.')) {
    const whole = parseWholeAmount(raw);
    if (whole) {
      result.amount = whole;
      return;
    }
  } else {
    const units = readUnits(raw);
    if (units) {
      result.amount = fromUnits(units, TON_DECIMALS);
      return;
    }
  }

  warnings.push(LinkWarning.InvalidAmount);
}

function applyParameters(
  result: LinkParseResult,
  params: URLSearchParams,
  warnings: string[],
): void {
  const amount = lastValue(params, 'amount');
  if (amount !== undefined) {
    applyAmount(result, amount, warnings);
  }

  const text = lastValue(params, 'text');
  if (text !== undefined) {
    result.comment = defang(stripNonPrintable(text));
  }

  const hasCall =
    lastValue(params, 'bin') !== undefined ||
    lastValue(params, 'body') !== undefined;
  const hasStateInit = lastValue(params, 'init') !== undefined;

  if (hasCall) {
    result.hasPayload = true;
    result.payloadKind = PayloadKind.ContractCall;
    warnings.push(LinkWarning.BinaryPayload);
  }

  if (hasStateInit) {
    result.hasPayload = true;
    result.payloadKind = hasCall ? PayloadKind.Both : PayloadKind.StateInit;
    warnings.push(LinkWarning.StateInit);
  }
}

function runStages(link: string, warnings: string[]): LinkParseResult {
  const result = emptyResult();
  if (typeof link !== 'string' || !link) {
    return result;
  }

  const clean = sanitizeLink(link);

  const marker = TRANSFER_MARKER_REGEX.exec(clean);
  if (!marker) {
    return result;
  }

  const tail = clean.slice(marker.index + marker[0].length);
  const queryStart = tail.indexOf('?');
  const token = (queryStart === -1 ? tail : tail.slice(0, queryStart))
    .split('/')
    .join('');

  const destination = extractAddress(token, warnings);
  if (!destination) {
    return result;
  }

  result.valid = true;
  result.destination = destination;

  if (queryStart !== -1) {
    const params = new URLSearchParams(tail.slice(queryStart + 1));
    applyParameters(result, params, warnings);
  }

  return result;
}

/**
 * Parses a ton://transfer deep link (or a web-wallet mirror of it) into a
 * transfer intent. Never throws: faults end up in `warning`.
 */
export function parseLink(link: string): LinkParseResult {
  const warnings: string[] = [];
  let result: LinkParseResult;

  try {
    result = runStages(link, warnings);
  } catch (error) {
    warnings.push(`Parser Error: ${reasonOf(error)}`);
    result = emptyResult();
  }

  if (warnings.length > 0) {
    result.warning = warnings.join(WARNING_SEPARATOR);
  }

  return result;
}
