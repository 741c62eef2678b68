import { Injectable } from '@nestjs/common';
import * as satellite from 'satellite.js';
import { Vector3 } from 'three';

import {
  Classification,
  DEG2RAD,
  OrbitalElementRecord,
  RAD2DEG,
  TleEpoch,
  TleLines,
  TleRecord,
  toLines,
  trueToMeanAnomaly,
} from './tle';

/**
 * Classical elements of a two-body orbit at the record's epoch.
 * Angles in degrees, semi-major axis in km.
 */
export interface ClassicalOrbit {
  a: number;
  ecc: number;
  inc: number;
  raan: number;
  argp: number;
  nu: number;
  epoch: TleEpoch;
}

/** ECI position (km) and velocity (km/s). */
export interface StateVector {
  r: Vector3;
  v: Vector3;
}

/** Metadata a state vector cannot provide. */
export interface RecordMetadata {
  name?: string;
  noradId?: string;
  classification?: Classification;
  internationalDesignator?: string;
  elementSetNumber?: number;
  revNumber?: number;
}

interface Coe {
  semiMajorAxis: number; // km
  eccentricity: number;
  inclination: number; // radians
  raan: number; // radians
  argOfPerigee: number; // radians
  meanAnomaly: number; // radians, [0, 2pi)
  meanMotion: number; // rev/day
}

const Z_AXIS = new Vector3(0, 0, 1);
const X_AXIS = new Vector3(1, 0, 0);

/**
 * OrbitService:
 *   - Converts records to classical elements and a two-body state vector.
 *   - Builds records (and element lines) back from an ECI state vector.
 *   - Hands records to satellite.js for SGP4.
 */
@Injectable()
export class OrbitService {
  /**
   * Earth's GM in km^3 / s^2, same value the record's semi-major axis uses.
   */
  private readonly MU_EARTH = 398600.4418;

  toOrbit(record: OrbitalElementRecord<number>): ClassicalOrbit {
    return {
      a: record.semiMajorAxis,
      ecc: record.eccentricity,
      inc: record.inclination,
      raan: record.raan,
      argp: record.argPerigee,
      nu: record.trueAnomaly,
      epoch: record.epoch,
    };
  }

  /**
   * Position and velocity at epoch from the classical elements: perifocal
   * coordinates rotated by argument of perigee, inclination and RAAN.
   */
  toStateVector(orbit: ClassicalOrbit): StateVector {
    const { a, ecc: e } = orbit;
    const nu = orbit.nu * DEG2RAD;
    const p = a * (1 - e * e);
    const radius = p / (1 + e * Math.cos(nu));
    const speed = Math.sqrt(this.MU_EARTH / p);

    const rotate = (vec: Vector3) =>
      vec
        .applyAxisAngle(Z_AXIS, orbit.argp * DEG2RAD)
        .applyAxisAngle(X_AXIS, orbit.inc * DEG2RAD)
        .applyAxisAngle(Z_AXIS, orbit.raan * DEG2RAD);

    return {
      r: rotate(new Vector3(radius * Math.cos(nu), radius * Math.sin(nu), 0)),
      v: rotate(new Vector3(-speed * Math.sin(nu), speed * (e + Math.cos(nu)), 0)),
    };
  }

  /**
   * Record from an ECI state vector at a given epoch. Drag and mean motion
   * derivatives are unknown and set to zero.
   */
  fromState(r: Vector3, v: Vector3, epoch: Date | TleEpoch, meta: RecordMetadata = {}): TleRecord {
    const coe = this.rvToCoe(r, v, this.MU_EARTH);
    const at = epoch instanceof TleEpoch ? epoch : TleEpoch.fromDate(epoch);

    return new TleRecord({
      name: meta.name ?? 'MY-SAT',
      noradId: meta.noradId ?? '99999',
      classification: meta.classification ?? 'U',
      internationalDesignator: meta.internationalDesignator ?? '',
      epochYear: at.year,
      epochDay: at.dayOfYear,
      meanMotionDot: 0,
      meanMotionDdot: 0,
      bstar: 0,
      elementSetNumber: meta.elementSetNumber ?? 999,
      inclination: coe.inclination * RAD2DEG,
      raan: coe.raan * RAD2DEG,
      eccentricity: coe.eccentricity,
      argPerigee: coe.argOfPerigee * RAD2DEG,
      meanAnomaly: coe.meanAnomaly * RAD2DEG,
      meanMotion: coe.meanMotion,
      revNumber: meta.revNumber ?? 1,
    });
  }

  /**
   * High-level wrapper:
   *   - Takes an ECI position/velocity (km, km/s),
   *   - Computes the orbital elements,
   *   - Generates element lines.
   */
  generateTleFromState(r: Vector3, v: Vector3, epoch: Date, meta: RecordMetadata = {}): TleLines {
    return toLines(this.fromState(r, v, epoch, meta).fields);
  }

  /** SGP4 state for the record, through its canonical lines. */
  toSatRec(record: TleRecord): satellite.SatRec {
    const { line1, line2 } = toLines(record.fields);
    return satellite.twoline2satrec(line1, line2);
  }

  /**
   * Convert position/velocity in ECI frame to classical orbital elements.
   *
   * @param r ECI position vector in km
   * @param v ECI velocity vector in km/s
   * @param mu Gravitational parameter km^3 / s^2
   */
  private rvToCoe(r: Vector3, v: Vector3, mu: number): Coe {
    const R = r.length();
    const V = v.length();

    // Specific angular momentum h = r x v
    const hVec = new Vector3().copy(r).cross(v);
    const h = hVec.length();

    // Node vector n = k x h
    const nVec = new Vector3().copy(Z_AXIS).cross(hVec);
    const n = nVec.length();

    // Eccentricity vector e = (v x h) / mu - r / |r|
    const eVec = new Vector3()
      .copy(v)
      .cross(hVec)
      .multiplyScalar(1 / mu)
      .sub(new Vector3().copy(r).multiplyScalar(1 / R));
    const e = eVec.length();

    const i = Math.acos(hVec.z / h);

    // Equatorial orbits have no node line
    let Omega = 0;
    if (n >= 1e-8) {
      Omega = Math.acos(nVec.x / n);
      if (nVec.y < 0) {
        Omega = 2 * Math.PI - Omega;
      }
    }

    let argp = 0;
    if (n >= 1e-8 && e > 1e-8) {
      argp = Math.acos(Math.min(1, Math.max(-1, nVec.dot(eVec) / (n * e))));
      if (eVec.z < 0) {
        argp = 2 * Math.PI - argp;
      }
    }

    // Circular orbits measure from the node instead of perigee
    let trueAnomaly = 0;
    if (e > 1e-8) {
      trueAnomaly = Math.acos(Math.min(1, Math.max(-1, r.dot(eVec) / (R * e))));
      if (r.dot(v) < 0) {
        trueAnomaly = 2 * Math.PI - trueAnomaly;
      }
    } else if (n >= 1e-8) {
      trueAnomaly = Math.acos(Math.min(1, Math.max(-1, nVec.dot(r) / (n * R))));
      if (r.z < 0) {
        trueAnomaly = 2 * Math.PI - trueAnomaly;
      }
    }

    const energy = 0.5 * V * V - mu / R;
    const a = -mu / (2 * energy);

    const nRadSec = Math.sqrt(mu / (a * a * a));

    return {
      semiMajorAxis: a,
      eccentricity: e,
      inclination: i,
      raan: Omega,
      argOfPerigee: argp,
      meanAnomaly: trueToMeanAnomaly(trueAnomaly, e),
      meanMotion: (nRadSec * 86400) / (2 * Math.PI),
    };
  }
}
