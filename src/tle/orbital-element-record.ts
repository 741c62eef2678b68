import { TleEpoch } from './tle-epoch';

export type Classification = 'U' | 'C' | 'S';

export const CLASSIFICATIONS: readonly Classification[] = ['U', 'C', 'S'];

/**
 * Stored fields of an element set. `Q` is how a physical quantity is held:
 * a bare number in the units the format uses, or a unit-tagged value.
 */
export interface TleFieldsOf<Q> {
  name: string;
  noradId: string;
  classification: Classification;
  internationalDesignator: string;
  epochYear: number;
  /** Day of year with fraction, 1-based. */
  epochDay: number;
  /** First derivative of mean motion divided by 2. */
  meanMotionDot: Q;
  /** Second derivative of mean motion divided by 6. */
  meanMotionDdot: Q;
  bstar: Q;
  elementSetNumber: number;
  inclination: Q;
  raan: Q;
  eccentricity: number;
  argPerigee: Q;
  meanAnomaly: Q;
  meanMotion: Q;
  revNumber: number;
}

/** Fields in the units of the text format: degrees, rev/day, 1/earth radii. */
export type TleFields = TleFieldsOf<number>;

/** Declaration order, as used by tuples and mappings. */
export const TLE_FIELD_NAMES: readonly (keyof TleFields)[] = [
  'name',
  'noradId',
  'classification',
  'internationalDesignator',
  'epochYear',
  'epochDay',
  'meanMotionDot',
  'meanMotionDdot',
  'bstar',
  'elementSetNumber',
  'inclination',
  'raan',
  'eccentricity',
  'argPerigee',
  'meanAnomaly',
  'meanMotion',
  'revNumber',
];

export type TleTuple = readonly [
  name: string,
  noradId: string,
  classification: Classification,
  internationalDesignator: string,
  epochYear: number,
  epochDay: number,
  meanMotionDot: number,
  meanMotionDdot: number,
  bstar: number,
  elementSetNumber: number,
  inclination: number,
  raan: number,
  eccentricity: number,
  argPerigee: number,
  meanAnomaly: number,
  meanMotion: number,
  revNumber: number,
];

/**
 * What both record variants offer: immutable stored fields plus derived
 * quantities computed on first access.
 */
export interface OrbitalElementRecord<Q, L = Q> extends Readonly<TleFieldsOf<Q>> {
  readonly epoch: TleEpoch;
  readonly semiMajorAxis: L;
  readonly trueAnomaly: Q;
  equals(other: OrbitalElementRecord<Q, L>): boolean;
}
