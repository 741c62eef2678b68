import { ColumnRange } from './columns';
import { FieldDecodeError, MalformedLineError } from './errors';

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;
const DIGITS = /^\d+$/;
// sign, five mantissa digits, exponent sign, exponent digit: " 12345-3"
const IMPLIED_EXPONENT = /^([ +-])(\d{5})([+-])(\d)$/;

/**
 * Exact column extraction. The line has to reach the end of the range,
 * shorter input is malformed rather than silently padded.
 */
export function slice(line: string, [start, end]: ColumnRange, field?: string): string {
  if (line.length < end) {
    throw new MalformedLineError(line, end, field);
  }
  return line.slice(start, end);
}

/**
 * Parse a number written with an implicit leading decimal point.
 *
 * decodeImpliedDecimal('378') === 0.378
 */
export function decodeImpliedDecimal(s: string, field = 'eccentricity'): number {
  if (!DIGITS.test(s)) {
    throw new FieldDecodeError(field, s, 'expected digits only');
  }
  return Number(`0.${s}`);
}

/**
 * Parse the format's compact exponential notation: a sign (blank means
 * plus), five mantissa digits after an implied decimal point, and a signed
 * one-digit power of ten.
 *
 * decodeImpliedExponent(' 12345-3') === 0.00012345
 * decodeImpliedExponent('-12345-3') === -0.00012345
 */
export function decodeImpliedExponent(s: string, field = 'bstar'): number {
  const match = IMPLIED_EXPONENT.exec(s);
  if (!match) {
    throw new FieldDecodeError(field, s, 'expected "±ddddd±d"');
  }
  const [, sign, mantissa, expSign, exponent] = match;
  return Number(`${sign === '-' ? '-' : ''}0.${mantissa}e${expSign}${exponent}`);
}

/**
 * Resolve a two-digit year. Element sets start with Sputnik in 1957, so
 * 57-99 belong to the 1900s and 00-56 to the 2000s.
 */
export function decodeTwoDigitYear(s: string | number, field = 'epochYear'): number {
  const y = typeof s === 'number' ? s : /^\d{2}$/.test(s) ? parseInt(s, 10) : NaN;
  if (!Number.isInteger(y) || y < 0 || y > 99) {
    throw new FieldDecodeError(field, String(s), 'expected a two-digit year');
  }
  return y + (y >= 57 ? 1900 : 2000);
}

export function decodeFloat(field: string, s: string): number {
  const text = s.trim();
  if (!DECIMAL.test(text)) {
    throw new FieldDecodeError(field, s, 'expected a decimal number');
  }
  return Number(text);
}

export function decodeInteger(field: string, s: string): number {
  const text = s.trim();
  if (!INTEGER.test(text)) {
    throw new FieldDecodeError(field, s, 'expected an integer');
  }
  return parseInt(text, 10);
}

/**
 * Modulo-10 checksum over the first 68 columns: digits count their value,
 * minus signs count one, everything else zero.
 */
export function computeChecksum(line: string): number {
  let sum = 0;
  for (const c of line.slice(0, 68)) {
    if (c >= '0' && c <= '9') {
      sum += c.charCodeAt(0) - 48;
    } else if (c === '-') {
      sum += 1;
    }
  }
  return sum % 10;
}
