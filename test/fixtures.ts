import { TleFields } from '../src/tle';

export const ISS_LINES = [
  'ISS (ZARYA)',
  '1 25544U 98067A   19249.04864348  .00001909  00000-0  40858-4 0  9990',
  '2 25544  51.6464 320.1755 0007999  10.9066  53.2893 15.50437522187805',
] as const;

export const ISS_FIELDS: TleFields = {
  name: 'ISS (ZARYA)',
  noradId: '25544',
  classification: 'U',
  internationalDesignator: '98067A',
  epochYear: 2019,
  epochDay: 249.04864348,
  meanMotionDot: 1.909e-5,
  meanMotionDdot: 0,
  bstar: 4.0858e-5,
  elementSetNumber: 999,
  inclination: 51.6464,
  raan: 320.1755,
  eccentricity: 0.0007999,
  argPerigee: 10.9066,
  meanAnomaly: 53.2893,
  meanMotion: 15.50437522,
  revNumber: 18780,
};

/** Made-up element sets; checksums are valid. */
export const TESTSAT_1 = [
  'TESTSAT-1',
  '1 90001U 24001A   24060.50000000  .00001234  00000-0  12345-3 0   421',
  '2 90001  97.5000 120.2500 0012345  45.5000 287.0641 14.20000000123452',
] as const;

export const TESTSAT_2 = [
  'TESTSAT-2',
  '1 90002C 99123BC  99365.99999999 -.00000034  00000-0 -12353-4 0    76',
  '2 90002  28.4711  10.0000 7000000 270.0000 359.9000  2.00500000    17',
] as const;

export const TESTSAT_3 = [
  'TESTSAT-3',
  '1 90003S 57001A   57001.00000000  .00000000  12345-3  00000-0 0    10',
  '2 90003  65.1000   0.0000 0000000   0.0000 180.0000 16.50000000    07',
] as const;

export const CATALOG = [...TESTSAT_1, ...TESTSAT_2, ...TESTSAT_3].join('\n');

/** The error `fn` throws; fails the test when it returns normally. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected the call to throw');
}
