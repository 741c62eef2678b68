import { unit } from 'mathjs';

import { TleRecord } from './tle-record';
import { UnitTaggedRecord } from './unit-tagged-record';
import { TleUnits, defaultTleUnits } from './units';
import { ISS_FIELDS, ISS_LINES, TESTSAT_1, TESTSAT_2, TESTSAT_3 } from '../../test/fixtures';

describe('UnitTaggedRecord', () => {
  const iss = UnitTaggedRecord.fromLines(...ISS_LINES);

  it('tags each physical field with its unit', () => {
    expect(iss.inclination.toNumber('deg')).toBeCloseTo(51.6464, 10);
    expect(iss.inclination.toNumber('rad')).toBeCloseTo((51.6464 * Math.PI) / 180, 12);
    expect(iss.meanMotion.toNumber('rev / day')).toBeCloseTo(15.50437522, 10);
    expect(iss.meanMotion.toNumber('deg / hour')).toBeCloseTo((15.50437522 * 360) / 24, 8);
    expect(iss.meanMotionDot.toNumber('rev / day^2')).toBeCloseTo(1.909e-5, 15);
    expect(iss.bstar.toNumber('km^-1')).toBeCloseTo(4.0858e-5 / 6378.1, 15);
  });

  it('leaves counts, text and eccentricity untagged', () => {
    expect(iss.name).toBe('ISS (ZARYA)');
    expect(iss.eccentricity).toBe(0.0007999);
    expect(iss.revNumber).toBe(18780);
    expect(iss.epochDay).toBe(249.04864348);
  });

  it('derives the semi-major axis in meters', () => {
    expect(iss.semiMajorAxis.toNumber('m')).toBeCloseTo(6793584.702357316, 3);
    expect(iss.semiMajorAxis.toNumber('km')).toBeCloseTo(6793.584702357316, 6);
  });

  it('derives the true anomaly in degrees', () => {
    expect(iss.trueAnomaly.toNumber('deg')).toBeCloseTo(53.36282588304321, 8);
    expect(UnitTaggedRecord.fromLines(...TESTSAT_2).trueAnomaly.toNumber('deg')).toBeCloseTo(-0.7934711600754599, 8);
  });

  it('formats derived values in their own unit, without a prefix', () => {
    expect(iss.semiMajorAxis.format({ upperExp: 12 })).toMatch(/^6793584\.70\d* m$/);
    expect(iss.trueAnomaly.toString()).toMatch(/^53\.3628\d* deg$/);
    expect(UnitTaggedRecord.fromLines(...TESTSAT_2).trueAnomaly.toString()).toMatch(/^-0\.7934\d* deg$/);
  });

  it('shares the epoch computation with the plain record', () => {
    expect(iss.epoch.toISOString()).toBe('2019-09-06T01:10:02.796672Z');
  });

  it('converts to and from the plain record without changing a value', () => {
    const sets: ReadonlyArray<readonly [string, string, string]> = [ISS_LINES, TESTSAT_1, TESTSAT_2, TESTSAT_3];
    for (const lines of sets) {
      const plain = TleRecord.fromLines(...lines);
      const back = UnitTaggedRecord.fromRecord(plain).toRecord();
      expect(back.equals(plain)).toBe(true);
      expect(back.fields).toEqual(plain.fields);
    }
    expect(iss.toRecord().fields).toEqual(ISS_FIELDS);
  });

  it('compares stored values exactly', () => {
    expect(UnitTaggedRecord.fromRecord(TleRecord.fromLines(...ISS_LINES)).equals(iss)).toBe(true);

    const nudged = new TleRecord({ ...ISS_FIELDS, meanMotion: 15.504375220000004 });
    expect(UnitTaggedRecord.fromRecord(nudged).equals(iss)).toBe(false);
  });

  it('builds from quantities in other units', () => {
    const units = defaultTleUnits();
    const quantities = {
      ...iss.quantities,
      inclination: units.quantity((51.6464 * Math.PI) / 180, 'rad'),
      meanMotion: units.quantity((15.50437522 * 360) / 86400, 'deg / s'),
    };
    const record = UnitTaggedRecord.fromQuantities(quantities).toRecord();
    expect(record.noradId).toBe('25544');
    expect(record.eccentricity).toBe(0.0007999);
    expect(record.inclination).toBeCloseTo(51.6464, 10);
    expect(record.meanMotion).toBeCloseTo(15.50437522, 10);
  });

  it('tells records with different values apart', () => {
    const other = UnitTaggedRecord.fromQuantities({
      ...iss.quantities,
      raan: defaultTleUnits().quantity(10, 'deg'),
    });
    expect(other.equals(iss)).toBe(false);
  });

  describe('TleUnits', () => {
    it('reuses one default instance', () => {
      expect(defaultTleUnits()).toBe(defaultTleUnits());
      expect(iss.units).toBe(defaultTleUnits());
    });

    it('keeps its units out of the global mathjs instance', () => {
      expect(defaultTleUnits().quantity(1, 'rev').toNumber('deg')).toBeCloseTo(360, 10);
      expect(() => unit(1, 'rev')).toThrow();
    });

    it('takes its own earth radius', () => {
      const units = new TleUnits({ revolutionDeg: 360, earthRadiusKm: 6378.137 });
      const record = UnitTaggedRecord.fromLines(...ISS_LINES, units);
      expect(record.bstar.toNumber('km^-1')).toBeCloseTo(4.0858e-5 / 6378.137, 15);
    });
  });
});
