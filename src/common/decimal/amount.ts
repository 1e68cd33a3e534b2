import { Decimal } from 'decimal.js';

export const TON_DECIMALS = 9;
export const DEFAULT_TOKEN_DECIMALS = 9;
export const MAX_TOKEN_DECIMALS = 30;

// uint256 has at most 78 digits, 120 significant digits keep every
// division by 10^30 exact and toString never switches to exponent form
const Fixed = Decimal.clone({ precision: 120, toExpNeg: -130, toExpPos: 130 });

const UNITS_REGEX = /^\d{1,78}$/;
const WHOLE_AMOUNT_REGEX = /^(\d{1,78}\.\d{0,78}|\.\d{1,78})$/;

export function zeroAmount(): Decimal {
  return new Fixed(0);
}

/**
 * Reads a non-negative integer amount of smallest units, as indexers return
 * it (digit string or plain JSON number)
 */
export function readUnits(raw: unknown): string | undefined {
  if (typeof raw === 'string' && UNITS_REGEX.test(raw)) {
    return raw;
  }
  if (typeof raw === 'number' && Number.isSafeInteger(raw) && raw >= 0) {
    return raw.toString();
  }
  return undefined;
}

/**
 * Converts smallest units to whole coins: fromUnits('1500000000', 9) is 1.5
 */
export function fromUnits(units: string, decimals: number): Decimal {
  return new Fixed(units).div(new Fixed(10).pow(decimals));
}

export function fromNano(raw: unknown): Decimal {
  const units = readUnits(raw);
  return units ? fromUnits(units, TON_DECIMALS) : zeroAmount();
}

/**
 * Parses an amount already written in whole coins, e.g. "1.25"
 */
export function parseWholeAmount(raw: string): Decimal | undefined {
  if (!WHOLE_AMOUNT_REGEX.test(raw)) {
    return undefined;
  }
  return new Fixed(raw);
}

/**
 * Token decimals outside [0, 30] or not an integer fall back to 9
 */
export function normalizeDecimals(raw: unknown): number {
  const value =
    typeof raw === 'string' && /^\d{1,4}$/.test(raw) ? Number(raw) : raw;

  if (
    typeof value !== 'number' ||
    !Number.isInteger(value) ||
    value < 0 ||
    value > MAX_TOKEN_DECIMALS
  ) {
    return DEFAULT_TOKEN_DECIMALS;
  }

  return value;
}
