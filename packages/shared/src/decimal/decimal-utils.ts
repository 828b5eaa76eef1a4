/**
 * Decimal string utilities.
 *
 * Amounts, quantities and percentages are carried as strings (DecimalAmount)
 * exactly as they appear in the source document. The engine never does
 * arithmetic on them; it only inspects signs, flips signs and canonicalizes
 * the representation. bigint keeps every digit.
 */

import type { DecimalAmount } from '@invoice-bridge/contracts';

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

/** xs:decimal lexical space */
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parse a decimal string into internal representation.
 */
function parseDecimal(str: string): DecimalValue {
  const trimmed = str.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new Error(`Invalid decimal format: ${str}`);
  }

  const negative = trimmed.startsWith('-');
  const unsigned = trimmed.startsWith('-') || trimmed.startsWith('+') ? trimmed.slice(1) : trimmed;

  const parts = unsigned.split('.');
  const intPart = parts[0] ?? '';
  const fracPart = parts[1] ?? '';

  return {
    value: BigInt((intPart + fracPart) || '0'),
    scale: fracPart.length,
    negative,
  };
}

/**
 * Format a decimal value back to string. Zero is never signed.
 */
function formatDecimal(decimal: DecimalValue): string {
  const { value, scale } = decimal;

  let str = value.toString();

  // Pad with leading zeros if needed
  while (str.length <= scale) {
    str = '0' + str;
  }

  const insertPoint = str.length - scale;
  let result =
    scale > 0
      ? str.slice(0, insertPoint) + '.' + str.slice(insertPoint)
      : str;

  if (decimal.negative && value !== 0n) {
    result = '-' + result;
  }

  return result;
}

/**
 * Check that a string is a valid decimal amount.
 */
export function isValidDecimalAmount(value: string): boolean {
  return DECIMAL_PATTERN.test(value.trim());
}

/**
 * Remove trailing fractional zeroes (and a dangling decimal point).
 *
 * @example
 * stripTrailingZeros('100.00') // '100'
 * stripTrailingZeros('19.50')  // '19.5'
 * stripTrailingZeros('-0.000') // '0'
 */
export function stripTrailingZeros(a: DecimalAmount): DecimalAmount {
  const dec = parseDecimal(a);
  let { value, scale } = dec;
  while (scale > 0 && value % 10n === 0n) {
    value = value / 10n;
    scale--;
  }
  return formatDecimal({ value, scale, negative: dec.negative });
}

/**
 * Check if amount is zero.
 */
export function isZero(a: DecimalAmount): boolean {
  return parseDecimal(a).value === 0n;
}

/**
 * Check if amount is strictly negative.
 */
export function isNegative(a: DecimalAmount): boolean {
  const dec = parseDecimal(a);
  return dec.negative && dec.value !== 0n;
}

/**
 * Negate a decimal amount, keeping its scale.
 */
export function negate(a: DecimalAmount): DecimalAmount {
  const dec = parseDecimal(a);
  return formatDecimal({ ...dec, negative: !dec.negative && dec.value !== 0n });
}
