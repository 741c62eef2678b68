import { DecodeOptions, decodeTleLines, normalizeFields } from './fields';
import { Lazy } from './lazy';
import {
  Classification,
  OrbitalElementRecord,
  TLE_FIELD_NAMES,
  TleFields,
  TleTuple,
} from './orbital-element-record';
import { semiMajorAxisKm, trueAnomalyDeg } from './orbital-math';
import { TleEpoch } from './tle-epoch';

export interface MappingOptions {
  /** Add the semi-major axis `a` (km) and true anomaly `nu` (deg). */
  computed?: boolean;
  /** Add the `epoch`. */
  epoch?: boolean;
}

export type TleMapping = TleFields & {
  a?: number;
  nu?: number;
  epoch?: TleEpoch;
};

/**
 * A single element set, in the units the text format uses: angles in
 * degrees, mean motion in revolutions per day, BSTAR in inverse earth radii.
 *
 * Instances are frozen. The epoch, semi-major axis and true anomaly are
 * derived on first access and cached.
 *
 * ```ts
 * const iss = TleRecord.fromLines(
 *   'ISS (ZARYA)',
 *   '1 25544U 98067A   19249.04864348  .00001909  00000-0  40858-4 0  9990',
 *   '2 25544  51.6464 320.1755 0007999  10.9066  53.2893 15.50437522187805',
 * );
 * iss.epoch.toISOString(); // '2019-09-06T01:10:02.796672Z'
 * ```
 */
export class TleRecord implements OrbitalElementRecord<number> {
  readonly name: string;
  /** NORAD catalog number, kept as text for alpha-5 numbers. */
  readonly noradId: string;
  readonly classification: Classification;
  readonly internationalDesignator: string;
  readonly epochYear: number;
  readonly epochDay: number;
  readonly meanMotionDot: number;
  readonly meanMotionDdot: number;
  readonly bstar: number;
  readonly elementSetNumber: number;
  readonly inclination: number;
  readonly raan: number;
  readonly eccentricity: number;
  readonly argPerigee: number;
  readonly meanAnomaly: number;
  readonly meanMotion: number;
  readonly revNumber: number;

  private readonly derived: {
    readonly epoch: Lazy<TleEpoch>;
    readonly a: Lazy<number>;
    readonly nu: Lazy<number>;
  };

  constructor(fields: TleFields) {
    const f = normalizeFields(fields);
    this.name = f.name;
    this.noradId = f.noradId;
    this.classification = f.classification;
    this.internationalDesignator = f.internationalDesignator;
    this.epochYear = f.epochYear;
    this.epochDay = f.epochDay;
    this.meanMotionDot = f.meanMotionDot;
    this.meanMotionDdot = f.meanMotionDdot;
    this.bstar = f.bstar;
    this.elementSetNumber = f.elementSetNumber;
    this.inclination = f.inclination;
    this.raan = f.raan;
    this.eccentricity = f.eccentricity;
    this.argPerigee = f.argPerigee;
    this.meanAnomaly = f.meanAnomaly;
    this.meanMotion = f.meanMotion;
    this.revNumber = f.revNumber;

    this.derived = {
      epoch: new Lazy(() => TleEpoch.fromDayOfYear(this.epochYear, this.epochDay)),
      a: new Lazy(() => semiMajorAxisKm(this.meanMotion)),
      nu: new Lazy(() => trueAnomalyDeg(this.meanAnomaly, this.eccentricity)),
    };
    Object.freeze(this);
  }

  /**
   * Parse a record from its name line and two element lines.
   *
   * @throws LineNumberMismatchError when a line does not start with its number
   * @throws MalformedLineError when a line is too short
   * @throws FieldDecodeError when a column does not hold what it should
   */
  static fromLines(name: string, line1: string, line2: string, options?: DecodeOptions): TleRecord {
    return new TleRecord(decodeTleLines(name, line1, line2, options));
  }

  static fromTuple(tuple: TleTuple): TleRecord {
    const [
      name,
      noradId,
      classification,
      internationalDesignator,
      epochYear,
      epochDay,
      meanMotionDot,
      meanMotionDdot,
      bstar,
      elementSetNumber,
      inclination,
      raan,
      eccentricity,
      argPerigee,
      meanAnomaly,
      meanMotion,
      revNumber,
    ] = tuple;
    return new TleRecord({
      name,
      noradId,
      classification,
      internationalDesignator,
      epochYear,
      epochDay,
      meanMotionDot,
      meanMotionDdot,
      bstar,
      elementSetNumber,
      inclination,
      raan,
      eccentricity,
      argPerigee,
      meanAnomaly,
      meanMotion,
      revNumber,
    });
  }

  /** Derived keys (`a`, `nu`, `epoch`) in the mapping are ignored. */
  static fromMapping(mapping: TleMapping): TleRecord {
    return new TleRecord(mapping);
  }

  get epoch(): TleEpoch {
    return this.derived.epoch.get();
  }

  /** Semi-major axis in kilometers. */
  get semiMajorAxis(): number {
    return this.derived.a.get();
  }

  /**
   * True anomaly in degrees, [-180, 180).
   *
   * @throws NoConvergenceError if the Kepler solve does not settle
   */
  get trueAnomaly(): number {
    return this.derived.nu.get();
  }

  get fields(): TleFields {
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

  asTuple(): TleTuple {
    return [
      this.name,
      this.noradId,
      this.classification,
      this.internationalDesignator,
      this.epochYear,
      this.epochDay,
      this.meanMotionDot,
      this.meanMotionDdot,
      this.bstar,
      this.elementSetNumber,
      this.inclination,
      this.raan,
      this.eccentricity,
      this.argPerigee,
      this.meanAnomaly,
      this.meanMotion,
      this.revNumber,
    ];
  }

  asMapping(options: MappingOptions = {}): TleMapping {
    const mapping: TleMapping = this.fields;
    if (options.computed) {
      mapping.a = this.semiMajorAxis;
      mapping.nu = this.trueAnomaly;
    }
    if (options.epoch) {
      mapping.epoch = this.epoch;
    }
    return mapping;
  }

  /** Stored fields only; derived values follow from them. */
  equals(other: TleRecord): boolean {
    return TLE_FIELD_NAMES.every((key) => this[key] === other[key]);
  }

  toString(): string {
    return `TleRecord(${this.name}, ${this.noradId}, epoch=${this.epochYear}/${this.epochDay})`;
  }
}

export function toTuple(record: TleRecord): TleTuple {
  return record.asTuple();
}

export function toMapping(record: TleRecord, computed = false, epoch = false): TleMapping {
  return record.asMapping({ computed, epoch });
}

export function epoch(record: OrbitalElementRecord<unknown>): TleEpoch {
  return record.epoch;
}

export function semiMajorAxis<L>(record: OrbitalElementRecord<unknown, L>): L {
  return record.semiMajorAxis;
}

export function trueAnomaly<Q>(record: OrbitalElementRecord<Q, unknown>): Q {
  return record.trueAnomaly;
}
