import { CHECKSUM_COLUMN, LINE1_COLUMNS, LINE2_COLUMNS, requiredLength } from './columns';
import { ChecksumMismatchError, FieldDecodeError, LineNumberMismatchError } from './errors';
import {
  computeChecksum,
  decodeFloat,
  decodeImpliedDecimal,
  decodeImpliedExponent,
  decodeInteger,
  decodeTwoDigitYear,
  slice,
} from './field-grammar';
import { CLASSIFICATIONS, Classification, TleFields } from './orbital-element-record';

export interface DecodeOptions {
  /** Compare column 69 of each line with the computed checksum. */
  verifyChecksum?: boolean;
}

const LINE1_LENGTH = requiredLength(LINE1_COLUMNS);
const LINE2_LENGTH = requiredLength(LINE2_COLUMNS);

function isClassification(value: string): value is Classification {
  return CLASSIFICATIONS.some((c) => c === value);
}

function checkLineNumber(line: string, expected: '1' | '2'): void {
  const marker = slice(line, LINE1_COLUMNS.lineNumber, 'lineNumber');
  if (marker !== expected) {
    throw new LineNumberMismatchError(expected, marker);
  }
}

function checkChecksum(line: string, lineNumber: 1 | 2): void {
  const carried = slice(line, CHECKSUM_COLUMN, 'checksum');
  const expected = computeChecksum(line);
  if (carried !== String(expected)) {
    throw new ChecksumMismatchError(lineNumber, expected, carried);
  }
}

/**
 * Trims the string fields and checks the invariants every record keeps.
 * Returns a fresh object, the input is left alone.
 */
export function normalizeFields(fields: TleFields): TleFields {
  const out: TleFields = {
    ...fields,
    name: fields.name.trim(),
    noradId: fields.noradId.trim(),
    internationalDesignator: fields.internationalDesignator.trim(),
  };

  if (!isClassification(out.classification)) {
    throw new FieldDecodeError('classification', String(out.classification), 'expected U, C or S');
  }
  if (!Number.isInteger(out.epochYear) || out.epochYear < 1000 || out.epochYear > 9999) {
    throw new FieldDecodeError('epochYear', String(out.epochYear), 'expected a four-digit year');
  }
  if (!(out.epochDay >= 1 && out.epochDay < 367)) {
    throw new FieldDecodeError('epochDay', String(out.epochDay), 'expected a day of year in [1, 367)');
  }
  if (!(out.eccentricity >= 0 && out.eccentricity < 1)) {
    throw new FieldDecodeError('eccentricity', String(out.eccentricity), 'expected a value in [0, 1)');
  }
  for (const key of ['elementSetNumber', 'revNumber'] as const) {
    if (!Number.isInteger(out[key])) {
      throw new FieldDecodeError(key, String(out[key]), 'expected an integer');
    }
  }
  for (const key of [
    'meanMotionDot',
    'meanMotionDdot',
    'bstar',
    'inclination',
    'raan',
    'argPerigee',
    'meanAnomaly',
    'meanMotion',
  ] as const) {
    if (!Number.isFinite(out[key])) {
      throw new FieldDecodeError(key, String(out[key]), 'expected a finite number');
    }
  }
  return out;
}

/**
 * Reads every stored field from a name line and the two element lines.
 * The name is taken as is (trimmed); the element lines must start with
 * their line number.
 */
export function decodeTleLines(name: string, line1: string, line2: string, options: DecodeOptions = {}): TleFields {
  checkLineNumber(line1, '1');
  checkLineNumber(line2, '2');
  // whole-line length first, so a truncated line is reported as such
  slice(line1, [0, LINE1_LENGTH], 'line1');
  slice(line2, [0, LINE2_LENGTH], 'line2');
  if (options.verifyChecksum) {
    checkChecksum(line1, 1);
    checkChecksum(line2, 2);
  }

  const c1 = LINE1_COLUMNS;
  const c2 = LINE2_COLUMNS;
  const classification = slice(line1, c1.classification);
  if (!isClassification(classification)) {
    throw new FieldDecodeError('classification', classification, 'expected U, C or S');
  }

  return normalizeFields({
    name,
    noradId: slice(line1, c1.noradId),
    classification,
    internationalDesignator: slice(line1, c1.internationalDesignator),
    epochYear: decodeTwoDigitYear(slice(line1, c1.epochYear)),
    epochDay: decodeFloat('epochDay', slice(line1, c1.epochDay)),
    meanMotionDot: decodeFloat('meanMotionDot', slice(line1, c1.meanMotionDot)),
    meanMotionDdot: decodeImpliedExponent(slice(line1, c1.meanMotionDdot), 'meanMotionDdot'),
    bstar: decodeImpliedExponent(slice(line1, c1.bstar), 'bstar'),
    elementSetNumber: decodeInteger('elementSetNumber', slice(line1, c1.elementSetNumber)),
    inclination: decodeFloat('inclination', slice(line2, c2.inclination)),
    raan: decodeFloat('raan', slice(line2, c2.raan)),
    eccentricity: decodeImpliedDecimal(slice(line2, c2.eccentricity), 'eccentricity'),
    argPerigee: decodeFloat('argPerigee', slice(line2, c2.argPerigee)),
    meanAnomaly: decodeFloat('meanAnomaly', slice(line2, c2.meanAnomaly)),
    meanMotion: decodeFloat('meanMotion', slice(line2, c2.meanMotion)),
    revNumber: decodeInteger('revNumber', slice(line2, c2.revNumber)),
  });
}
