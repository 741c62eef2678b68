import { FieldEncodeError } from './errors';
import { computeChecksum } from './field-grammar';
import { TleFields } from './orbital-element-record';

export interface TleLines {
  name: string;
  line1: string;
  line2: string;
}

/**
 * Inverse of the implied-exponent decoder: " 40858-4" for 4.0858e-5.
 */
export function encodeImpliedExponent(value: number, field = 'bstar'): string {
  if (!Number.isFinite(value)) {
    throw new FieldEncodeError(field, value);
  }
  if (value === 0) {
    return ' 00000-0';
  }
  const sign = value < 0 ? '-' : ' ';
  const abs = Math.abs(value);

  // 0.ddddd x 10^exp
  let exp = Math.floor(Math.log10(abs)) + 1;
  let mantissa = Math.round(abs / Math.pow(10, exp - 5));
  if (mantissa >= 100000) {
    mantissa = Math.round(mantissa / 10);
    exp += 1;
  }
  if (exp > 9 || exp < -9) {
    throw new FieldEncodeError(field, value);
  }
  return `${sign}${mantissa.toString().padStart(5, '0')}${exp < 0 ? '-' : '+'}${Math.abs(exp)}`;
}

/** Eccentricity without its leading "0.": 0.0007999 -> "0007999". */
export function encodeImpliedDecimal(value: number, field = 'eccentricity'): string {
  const text = value.toFixed(7);
  if (!text.startsWith('0.')) {
    throw new FieldEncodeError(field, value);
  }
  return text.slice(2);
}

function encodeMeanMotionDot(value: number): string {
  const text = Math.abs(value).toFixed(8);
  if (!text.startsWith('0.')) {
    throw new FieldEncodeError('meanMotionDot', value);
  }
  return `${value < 0 ? '-' : ' '}${text.slice(1)}`;
}

function fixed(field: string, value: number, width: number, digits: number): string {
  const text = value.toFixed(digits).padStart(width, ' ');
  if (text.length > width) {
    throw new FieldEncodeError(field, value);
  }
  return text;
}

function padded(field: string, value: string | number, width: number, fill = ' '): string {
  const text = String(value).padStart(width, fill);
  if (text.length > width) {
    throw new FieldEncodeError(field, value);
  }
  return text;
}

/**
 * Writes the canonical 69-column lines with checksums. Values are rounded
 * to the precision each column holds, so parsing the output gives back the
 * record whenever its values came from element lines in the first place.
 */
export function toLines(fields: TleFields): TleLines {
  const norad = padded('noradId', fields.noradId, 5);
  if (fields.internationalDesignator.length > 8) {
    throw new FieldEncodeError('internationalDesignator', fields.internationalDesignator);
  }
  const designator = fields.internationalDesignator.padEnd(8);
  if (fields.epochYear < 1957 || fields.epochYear > 2056) {
    throw new FieldEncodeError('epochYear', fields.epochYear);
  }
  const year = (fields.epochYear % 100).toString().padStart(2, '0');
  const day = padded('epochDay', fields.epochDay.toFixed(8), 12, '0');

  const line1 =
    `1 ${norad}${fields.classification} ` +
    `${designator} ` +
    `${year}${day} ` +
    `${encodeMeanMotionDot(fields.meanMotionDot)} ` +
    `${encodeImpliedExponent(fields.meanMotionDdot, 'meanMotionDdot')} ` +
    `${encodeImpliedExponent(fields.bstar, 'bstar')} ` +
    // ephemeris type is always 0 in distributed element sets
    `0 ${padded('elementSetNumber', fields.elementSetNumber, 4)}`;

  const line2 =
    `2 ${norad} ` +
    `${fixed('inclination', fields.inclination, 8, 4)} ` +
    `${fixed('raan', fields.raan, 8, 4)} ` +
    `${encodeImpliedDecimal(fields.eccentricity)} ` +
    `${fixed('argPerigee', fields.argPerigee, 8, 4)} ` +
    `${fixed('meanAnomaly', fields.meanAnomaly, 8, 4)} ` +
    `${fixed('meanMotion', fields.meanMotion, 11, 8)}` +
    `${padded('revNumber', fields.revNumber, 5)}`;

  return {
    name: fields.name,
    line1: line1 + computeChecksum(line1),
    line2: line2 + computeChecksum(line2),
  };
}
