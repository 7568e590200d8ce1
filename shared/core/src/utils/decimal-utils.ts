/**
 * Decimal String Utilities
 *
 * Account balances are exact decimals and are stored as canonical decimal
 * strings, never as floating point numbers. Canonical form:
 * - no leading zeros in the integer part ("007.5" -> "7.5")
 * - no trailing zeros in the fraction ("1.2500" -> "1.25", "3.0" -> "3")
 * - no negative zero ("-0.00" -> "0")
 *
 * The integer part is normalized through BigInt, so magnitudes beyond
 * Number.MAX_SAFE_INTEGER keep every digit.
 *
 * @example
 * normalizeDecimal('0012.3400'); // '12.34'
 * normalizeDecimal('1e5');       // throws ValidationError
 */

import { ValidationError } from '../error-handling';

const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d+))?$/;

export function isDecimalString(value: string): boolean {
  return DECIMAL_PATTERN.test(value.trim());
}

/**
 * @throws ValidationError when `value` is not a plain decimal
 */
export function normalizeDecimal(value: string, field = 'value'): string {
  const match = DECIMAL_PATTERN.exec(value.trim());
  if (!match) {
    throw new ValidationError(`Invalid decimal for ${field}: "${value}"`, { field });
  }

  const [, sign, integerDigits, fractionDigits = ''] = match;
  const integerPart = BigInt(integerDigits).toString();
  const fractionPart = fractionDigits.replace(/0+$/, '');

  const isZero = integerPart === '0' && fractionPart === '';
  const prefix = sign === '-' && !isZero ? '-' : '';
  return fractionPart === ''
    ? `${prefix}${integerPart}`
    : `${prefix}${integerPart}.${fractionPart}`;
}
