import { Unit } from 'mathjs';

import { DecodeOptions, decodeTleLines, normalizeFields } from './fields';
import { Lazy } from './lazy';
import { Classification, OrbitalElementRecord, TLE_FIELD_NAMES, TleFields } from './orbital-element-record';
import { DEG2RAD, RAD2DEG, meanToTrueAnomaly, semiMajorAxisFromRadPerSec, wrapDegrees } from './orbital-math';
import { TleEpoch } from './tle-epoch';
import { TleRecord } from './tle-record';
import { TleQuantities, TleUnits, defaultTleUnits } from './units';

/**
 * Element set whose physical fields are mathjs Units instead of numbers in
 * implicit units. Built from the same columns as {@link TleRecord}; the
 * derived quantities use the same formulas after converting to rad, s and m.
 *
 * mathjs keeps a Unit's value in base units, so reading one back in the
 * format's units is not bit-exact. The plain fields the record was built
 * from are kept alongside; `toRecord` and `equals` work on those.
 */
export class UnitTaggedRecord implements OrbitalElementRecord<Unit> {
  readonly name: string;
  readonly noradId: string;
  readonly classification: Classification;
  readonly internationalDesignator: string;
  readonly epochYear: number;
  readonly epochDay: number;
  readonly meanMotionDot: Unit;
  readonly meanMotionDdot: Unit;
  readonly bstar: Unit;
  readonly elementSetNumber: number;
  readonly inclination: Unit;
  readonly raan: Unit;
  readonly eccentricity: number;
  readonly argPerigee: Unit;
  readonly meanAnomaly: Unit;
  readonly meanMotion: Unit;
  readonly revNumber: number;

  private readonly fields: Readonly<TleFields>;

  private readonly derived: {
    readonly epoch: Lazy<TleEpoch>;
    readonly a: Lazy<Unit>;
    readonly nu: Lazy<Unit>;
  };

  private constructor(
    fields: TleFields,
    readonly units: TleUnits,
  ) {
    this.fields = Object.freeze(normalizeFields(fields));
    const q = units.tag(this.fields);
    this.name = q.name;
    this.noradId = q.noradId;
    this.classification = q.classification;
    this.internationalDesignator = q.internationalDesignator;
    this.epochYear = q.epochYear;
    this.epochDay = q.epochDay;
    this.meanMotionDot = q.meanMotionDot;
    this.meanMotionDdot = q.meanMotionDdot;
    this.bstar = q.bstar;
    this.elementSetNumber = q.elementSetNumber;
    this.inclination = q.inclination;
    this.raan = q.raan;
    this.eccentricity = q.eccentricity;
    this.argPerigee = q.argPerigee;
    this.meanAnomaly = q.meanAnomaly;
    this.meanMotion = q.meanMotion;
    this.revNumber = q.revNumber;

    this.derived = {
      epoch: new Lazy(() => TleEpoch.fromDayOfYear(this.epochYear, this.epochDay)),
      // to() pins the unit, otherwise mathjs picks a prefix when formatting
      a: new Lazy(() =>
        units.quantity(semiMajorAxisFromRadPerSec(this.meanMotion.toNumber('rad/s')), 'm').to('m'),
      ),
      nu: new Lazy(() => {
        const M = wrapDegrees(this.meanAnomaly.toNumber('deg')) * DEG2RAD;
        return units.quantity(meanToTrueAnomaly(M, this.eccentricity) * RAD2DEG, 'deg').to('deg');
      }),
    };
    Object.freeze(this);
  }

  static fromLines(
    name: string,
    line1: string,
    line2: string,
    units: TleUnits = defaultTleUnits(),
    options?: DecodeOptions,
  ): UnitTaggedRecord {
    return new UnitTaggedRecord(decodeTleLines(name, line1, line2, options), units);
  }

  static fromRecord(record: TleRecord, units: TleUnits = defaultTleUnits()): UnitTaggedRecord {
    return new UnitTaggedRecord(record.fields, units);
  }

  /** Values that already carry units, e.g. converted from another system. */
  static fromQuantities(quantities: TleQuantities, units: TleUnits = defaultTleUnits()): UnitTaggedRecord {
    return new UnitTaggedRecord(units.untag(quantities), units);
  }

  get epoch(): TleEpoch {
    return this.derived.epoch.get();
  }

  /** Semi-major axis, tagged in meters. */
  get semiMajorAxis(): Unit {
    return this.derived.a.get();
  }

  /** True anomaly, tagged in degrees. */
  get trueAnomaly(): Unit {
    return this.derived.nu.get();
  }

  get quantities(): TleQuantities {
    return {
      name: this.name,
      noradId: this.noradId,
      classification: this.classification,
      internationalDesignator: this.internationalDesignator,
      epochYear: this.epochYear,
      epochDay: this.epochDay,
      meanMotionDot: this.meanMotionDot,
      meanMotionDdot: this.meanMotionDdot,
      bstar: this.bstar,
      elementSetNumber: this.elementSetNumber,
      inclination: this.inclination,
      raan: this.raan,
      eccentricity: this.eccentricity,
      argPerigee: this.argPerigee,
      meanAnomaly: this.meanAnomaly,
      meanMotion: this.meanMotion,
      revNumber: this.revNumber,
    };
  }

  /** Drop the units, back to the plain values the record was built from. */
  toRecord(): TleRecord {
    return new TleRecord(this.fields);
  }

  /** Stored fields only, compared exactly in the format's units. */
  equals(other: UnitTaggedRecord): boolean {
    return TLE_FIELD_NAMES.every((key) => this.fields[key] === other.fields[key]);
  }
}
