/**
 * Decimal arithmetic utilities for monetary values.
 *
 * All amounts in the invoice bridge are carried as strings (DecimalAmount).
 * Arithmetic runs on bigint so totals and fixed-place formatting are exact.
 * The scale of an operand is kept: "100.00" + "20.00" is "120.00", not "120".
 */

import type { DecimalAmount } from '@invoice-bridge/contracts';

/**
 * Rounding modes for decimal operations.
 *
 * - ROUND_HALF_EVEN (Banker's rounding): Round to nearest even number.
 * - ROUND_HALF_UP: Round 0.5 away from zero. Used for document formatting.
 * - ROUND_DOWN (Truncate): Always round towards zero.
 */
export type RoundingMode = 'ROUND_HALF_EVEN' | 'ROUND_HALF_UP' | 'ROUND_DOWN';

/**
 * Rounding used when formatting document values to a fixed number of places.
 */
export const DEFAULT_ROUNDING_MODE: RoundingMode = 'ROUND_HALF_UP';

/**
 * Internal representation of a decimal value.
 */
interface DecimalValue {
  /** Unsigned integer representation (|value| * 10^scale) */
  value: bigint;
  /** Number of decimal places */
  scale: number;
  /** Whether the value is negative */
  negative: boolean;
}

const pow10 = (exponent: number): bigint => 10n ** BigInt(exponent);

/**
 * Parse a canonical decimal string into internal representation.
 */
function parseDecimal(str: string): DecimalValue {
  const trimmed = str.trim();

  const negative = trimmed.startsWith('-');
  const unsigned = negative || trimmed.startsWith('+') ? trimmed.slice(1) : trimmed;

  if (!/^(\d+\.?\d*|\.\d+)$/.test(unsigned)) {
    throw new Error(`Invalid decimal format: ${str}`);
  }

  const [intPart = '', fracPart = ''] = unsigned.split('.');
  const value = BigInt((intPart + fracPart) || '0');

  return { value, scale: fracPart.length, negative };
}

/**
 * Format a decimal value back to string.
 */
function formatDecimal(decimal: DecimalValue): string {
  const { value, scale } = decimal;

  let str = value.toString();
  while (str.length <= scale) {
    str = '0' + str;
  }

  const insertPoint = str.length - scale;
  const result = scale > 0 ? `${str.slice(0, insertPoint)}.${str.slice(insertPoint)}` : str;

  return decimal.negative && value !== 0n ? `-${result}` : result;
}

/**
 * Signed bigints of both operands at a common scale.
 */
function normalize(a: DecimalValue, b: DecimalValue): [bigint, bigint, number] {
  const targetScale = Math.max(a.scale, b.scale);

  let aValue = a.value * pow10(targetScale - a.scale);
  let bValue = b.value * pow10(targetScale - b.scale);

  if (a.negative) aValue = -aValue;
  if (b.negative) bValue = -bValue;

  return [aValue, bValue, targetScale];
}

function fromSigned(value: bigint, scale: number): DecimalAmount {
  const negative = value < 0n;
  return formatDecimal({ value: negative ? -value : value, scale, negative });
}

/**
 * Apply rounding to an unsigned quotient given the discarded remainder.
 */
function applyRounding(
  quotient: bigint,
  remainder: bigint,
  divisor: bigint,
  mode: RoundingMode,
): bigint {
  if (remainder === 0n) {
    return quotient;
  }

  const isHalf = remainder * 2n === divisor;
  const isMoreThanHalf = remainder * 2n > divisor;

  switch (mode) {
    case 'ROUND_DOWN':
      return quotient;

    case 'ROUND_HALF_UP':
      return isHalf || isMoreThanHalf ? quotient + 1n : quotient;

    case 'ROUND_HALF_EVEN':
      if (isMoreThanHalf) {
        return quotient + 1n;
      }
      if (isHalf && quotient % 2n === 1n) {
        return quotient + 1n;
      }
      return quotient;
  }
}

/**
 * Add two decimal amounts. The result keeps the larger scale.
 */
export function add(a: DecimalAmount, b: DecimalAmount): DecimalAmount {
  const [valA, valB, scale] = normalize(parseDecimal(a), parseDecimal(b));
  return fromSigned(valA + valB, scale);
}

/**
 * Check if amount is strictly greater than zero.
 */
export function isPositive(a: DecimalAmount): boolean {
  const dec = parseDecimal(a);
  return !dec.negative && dec.value !== 0n;
}

/**
 * Round a decimal amount to exactly `places` decimal places.
 *
 * Always pads to `places`, so this doubles as fixed-point formatting:
 * `round('2.5', 0)` is "3", `round('7', 3)` is "7.000".
 */
export function round(
  a: DecimalAmount,
  places: number,
  mode: RoundingMode = DEFAULT_ROUNDING_MODE,
): DecimalAmount {
  const dec = parseDecimal(a);

  if (dec.scale <= places) {
    return formatDecimal({ ...dec, value: dec.value * pow10(places - dec.scale), scale: places });
  }

  const factor = pow10(dec.scale - places);
  const rounded = applyRounding(dec.value / factor, dec.value % factor, factor, mode);

  return formatDecimal({ value: rounded, scale: places, negative: dec.negative });
}

/**
 * Parse culture-invariant numeric text into a canonical DecimalAmount.
 *
 * Accepts surrounding whitespace, a leading sign, "," thousands groups and a
 * "." fraction. The scale of the input is kept ("12.50" stays "12.50").
 * Returns null for anything else.
 */
export function parseInvariantDecimal(text: string | null | undefined): DecimalAmount | null {
  if (text === null || text === undefined) {
    return null;
  }

  const match = /^([+-]?)(\d{1,3}(?:,\d{3})+|\d*)(?:\.(\d*))?$/.exec(text.trim());
  if (!match) {
    return null;
  }

  const sign = match[1] ?? '';
  const intDigits = (match[2] ?? '').replace(/,/g, '');
  const fracDigits = match[3] ?? '';

  if (intDigits.length === 0 && fracDigits.length === 0) {
    return null;
  }

  const intPart = intDigits.replace(/^0+(?=\d)/, '') || '0';
  const unsigned = fracDigits.length > 0 ? `${intPart}.${fracDigits}` : intPart;
  const isZeroValue = /^[0.]*$/.test(unsigned);

  return sign === '-' && !isZeroValue ? `-${unsigned}` : unsigned;
}
