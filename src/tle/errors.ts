/**
 * Base class for every failure raised while decoding TLE text or deriving
 * quantities from a decoded record.
 */
export abstract class TleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Line too short for the columns that have to be read from it. */
export class MalformedLineError extends TleError {
  constructor(
    public readonly line: string,
    public readonly requiredLength: number,
    public readonly field?: string,
  ) {
    super(
      `Line has ${line.length} characters, at least ${requiredLength} required` +
        (field ? ` to read "${field}"` : ''),
    );
  }
}

export class FieldDecodeError extends TleError {
  constructor(
    public readonly field: string,
    public readonly rawText: string,
    reason?: string,
  ) {
    super(`Cannot decode field "${field}" from ${JSON.stringify(rawText)}` + (reason ? `: ${reason}` : ''));
  }
}

export class LineNumberMismatchError extends TleError {
  constructor(
    public readonly expected: '1' | '2',
    public readonly actual: string,
  ) {
    super(`Expected line ${expected}, found marker ${JSON.stringify(actual)}`);
  }
}

export class ChecksumMismatchError extends TleError {
  constructor(
    public readonly lineNumber: 1 | 2,
    public readonly expected: number,
    public readonly actual: string,
  ) {
    super(`Checksum of line ${lineNumber} is ${expected}, line carries ${JSON.stringify(actual)}`);
  }
}

/** A value that the fixed-width format has no room for. */
export class FieldEncodeError extends TleError {
  constructor(
    public readonly field: string,
    public readonly value: number | string,
  ) {
    super(`Cannot encode field "${field}" with value ${value}`);
  }
}

export class NoConvergenceError extends TleError {
  constructor(
    public readonly meanAnomaly: number,
    public readonly eccentricity: number,
    public readonly iterations: number,
  ) {
    super(`Kepler's equation did not converge after ${iterations} iterations (M=${meanAnomaly} rad, e=${eccentricity})`);
  }
}

export class InvalidEccentricityError extends TleError {
  constructor(public readonly eccentricity: number) {
    super(`Eccentricity ${eccentricity} is outside [0, 1)`);
  }
}

export class AnomalyOutOfRangeError extends TleError {
  constructor(public readonly meanAnomaly: number) {
    super(`Mean anomaly ${meanAnomaly} rad is outside [-pi, pi]; wrap it first`);
  }
}

/** Raised by the abort policy: the group at `index` could not be parsed. */
export class BatchParseError extends TleError {
  constructor(
    public readonly index: number,
    public readonly cause: TleError,
  ) {
    super(`TLE #${index} could not be parsed: ${cause.message}`);
  }
}

export type ParseError =
  | MalformedLineError
  | FieldDecodeError
  | LineNumberMismatchError
  | ChecksumMismatchError;

export type NumericError = NoConvergenceError | InvalidEccentricityError | AnomalyOutOfRangeError;

export function isParseError(err: unknown): err is ParseError {
  return (
    err instanceof MalformedLineError ||
    err instanceof FieldDecodeError ||
    err instanceof LineNumberMismatchError ||
    err instanceof ChecksumMismatchError
  );
}

export function isNumericError(err: unknown): err is NumericError {
  return (
    err instanceof NoConvergenceError ||
    err instanceof InvalidEccentricityError ||
    err instanceof AnomalyOutOfRangeError
  );
}
