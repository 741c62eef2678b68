import {
  AnomalyOutOfRangeError,
  InvalidEccentricityError,
  NoConvergenceError,
} from './errors';

/** Earth's standard gravitational parameter GM, m^3/s^2. */
export const MU_EARTH = 3.986004418e14;

export const DEG2RAD = Math.PI / 180;
export const RAD2DEG = 180 / Math.PI;

export interface KeplerOptions {
  /** Stop once a Newton step is smaller than this, radians. */
  tolerance?: number;
  maxIterations?: number;
}

export const KEPLER_DEFAULTS: Required<KeplerOptions> = {
  tolerance: 1e-8,
  maxIterations: 50,
};

/** rev/day to rad/s: n * 2pi / 86400. */
export function meanMotionToRadPerSec(revPerDay: number): number {
  return (revPerDay * Math.PI) / 43200;
}

/** Semi-major axis in meters for a mean motion in rad/s. */
export function semiMajorAxisFromRadPerSec(radPerSec: number): number {
  return Math.pow(MU_EARTH / (radPerSec * radPerSec), 1 / 3);
}

/** Semi-major axis in kilometers for a mean motion in rev/day. */
export function semiMajorAxisKm(meanMotionRevPerDay: number): number {
  return semiMajorAxisFromRadPerSec(meanMotionToRadPerSec(meanMotionRevPerDay)) / 1000;
}

/** Floored modulo into [-180, 180). */
export function wrapDegrees(deg: number): number {
  return ((((deg + 180) % 360) + 360) % 360) - 180;
}

function assertEccentricity(e: number): void {
  if (!(e >= 0 && e < 1)) {
    throw new InvalidEccentricityError(e);
  }
}

/**
 * Newton-Raphson on M = E - e sin(E). `M` must already be in [-pi, pi];
 * see {@link wrapDegrees}.
 */
export function meanToEccentricAnomaly(M: number, e: number, options: KeplerOptions = {}): number {
  const { tolerance, maxIterations } = { ...KEPLER_DEFAULTS, ...options };
  assertEccentricity(e);
  if (!(Math.abs(M) <= Math.PI)) {
    throw new AnomalyOutOfRangeError(M);
  }

  // M alone is a poor start for very eccentric orbits
  let E = e < 0.8 ? M : M >= 0 ? Math.PI : -Math.PI;
  for (let i = 0; i < maxIterations; i++) {
    const dE = -(E - e * Math.sin(E) - M) / (1 - e * Math.cos(E));
    E += dE;
    if (Math.abs(dE) < tolerance) {
      return E;
    }
  }
  throw new NoConvergenceError(M, e, maxIterations);
}

/** True anomaly in [-pi, pi] for an eccentric anomaly E in [-pi, pi]. */
export function eccentricToTrueAnomaly(E: number, e: number): number {
  assertEccentricity(e);
  return 2 * Math.atan2(Math.sqrt(1 + e) * Math.sin(E / 2), Math.sqrt(1 - e) * Math.cos(E / 2));
}

/** Radians in, radians out. */
export function meanToTrueAnomaly(M: number, e: number, options?: KeplerOptions): number {
  return eccentricToTrueAnomaly(meanToEccentricAnomaly(M, e, options), e);
}

/**
 * True anomaly in degrees from a mean anomaly in degrees as it appears in
 * the element set (0-360). The anomaly is wrapped into [-180, 180) before
 * solving, so the result is in [-180, 180) as well.
 */
export function trueAnomalyDeg(meanAnomalyDeg: number, e: number, options?: KeplerOptions): number {
  return meanToTrueAnomaly(wrapDegrees(meanAnomalyDeg) * DEG2RAD, e, options) * RAD2DEG;
}

/** Inverse of {@link eccentricToTrueAnomaly}, result in [0, 2pi). */
export function trueToMeanAnomaly(nu: number, e: number): number {
  assertEccentricity(e);
  let E = 2 * Math.atan2(Math.sqrt(1 - e) * Math.sin(nu / 2), Math.sqrt(1 + e) * Math.cos(nu / 2));
  if (E < 0) {
    E += 2 * Math.PI;
  }
  const M = E - e * Math.sin(E);
  return M < 0 ? M + 2 * Math.PI : M;
}
