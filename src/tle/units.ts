import { all, create, Unit } from 'mathjs';

import { TleFields, TleFieldsOf } from './orbital-element-record';

export type MathInstance = ReturnType<typeof create>;

/** Stored fields with every physical quantity carried as a mathjs Unit. */
export type TleQuantities = TleFieldsOf<Unit>;

type QuantityField = {
  [K in keyof TleFields]: TleFieldsOf<Unit>[K] extends Unit ? K : never;
}[keyof TleFields];

/** Units in which the text format writes each quantity. */
export const TLE_FIELD_UNITS: Readonly<Record<QuantityField, string>> = {
  meanMotionDot: 'rev / day^2',
  meanMotionDdot: 'rev / day^3',
  bstar: 'earthRad^-1',
  inclination: 'deg',
  raan: 'deg',
  argPerigee: 'deg',
  meanAnomaly: 'deg',
  meanMotion: 'rev / day',
};

export interface UnitDefinitions {
  /** Degrees in one revolution. */
  revolutionDeg: number;
  /** Equatorial earth radius used by the BSTAR term, km. */
  earthRadiusKm: number;
}

export const DEFAULT_UNIT_DEFINITIONS: UnitDefinitions = {
  revolutionDeg: 360,
  earthRadiusKm: 6378.1,
};

/**
 * The units a unit-tagged record is built with. Each instance owns a private
 * mathjs instance, so the `rev` and `earthRad` units it defines never leak
 * into the shared `mathjs` default.
 */
export class TleUnits {
  readonly math: MathInstance;

  constructor(readonly definitions: UnitDefinitions = DEFAULT_UNIT_DEFINITIONS) {
    this.math = create(all);
    this.math.createUnit('rev', {
      definition: `${definitions.revolutionDeg} deg`,
      aliases: ['revs', 'revolution', 'revolutions'],
    });
    this.math.createUnit('earthRad', {
      definition: `${definitions.earthRadiusKm} km`,
      aliases: ['earthRadius'],
    });
  }

  quantity(value: number, unit: string): Unit {
    return this.math.unit(value, unit);
  }

  /** Attach the format's units to plain field values. */
  tag(fields: TleFields): TleQuantities {
    const quantities: TleQuantities = {
      ...fields,
      meanMotionDot: this.quantity(fields.meanMotionDot, TLE_FIELD_UNITS.meanMotionDot),
      meanMotionDdot: this.quantity(fields.meanMotionDdot, TLE_FIELD_UNITS.meanMotionDdot),
      bstar: this.quantity(fields.bstar, TLE_FIELD_UNITS.bstar),
      inclination: this.quantity(fields.inclination, TLE_FIELD_UNITS.inclination),
      raan: this.quantity(fields.raan, TLE_FIELD_UNITS.raan),
      argPerigee: this.quantity(fields.argPerigee, TLE_FIELD_UNITS.argPerigee),
      meanAnomaly: this.quantity(fields.meanAnomaly, TLE_FIELD_UNITS.meanAnomaly),
      meanMotion: this.quantity(fields.meanMotion, TLE_FIELD_UNITS.meanMotion),
    };
    return quantities;
  }

  /**
   * Convert back to the plain numbers the format uses. Values pass through
   * base units, so the result can differ from the tagged input in the last
   * bits.
   */
  untag(quantities: TleQuantities): TleFields {
    return {
      ...quantities,
      meanMotionDot: quantities.meanMotionDot.toNumber(TLE_FIELD_UNITS.meanMotionDot),
      meanMotionDdot: quantities.meanMotionDdot.toNumber(TLE_FIELD_UNITS.meanMotionDdot),
      bstar: quantities.bstar.toNumber(TLE_FIELD_UNITS.bstar),
      inclination: quantities.inclination.toNumber(TLE_FIELD_UNITS.inclination),
      raan: quantities.raan.toNumber(TLE_FIELD_UNITS.raan),
      argPerigee: quantities.argPerigee.toNumber(TLE_FIELD_UNITS.argPerigee),
      meanAnomaly: quantities.meanAnomaly.toNumber(TLE_FIELD_UNITS.meanAnomaly),
      meanMotion: quantities.meanMotion.toNumber(TLE_FIELD_UNITS.meanMotion),
    };
  }
}

let shared: TleUnits | undefined;

/**
 * Units used when a caller does not pass its own. Created on first use and
 * never modified afterwards.
 */
export function defaultTleUnits(): TleUnits {
  if (shared === undefined) {
    shared = new TleUnits();
  }
  return shared;
}
