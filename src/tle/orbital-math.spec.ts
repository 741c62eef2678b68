import { AnomalyOutOfRangeError, InvalidEccentricityError, NoConvergenceError } from './errors';
import {
  eccentricToTrueAnomaly,
  meanMotionToRadPerSec,
  meanToEccentricAnomaly,
  meanToTrueAnomaly,
  semiMajorAxisKm,
  trueAnomalyDeg,
  trueToMeanAnomaly,
  wrapDegrees,
} from './orbital-math';
import { thrown } from '../../test/fixtures';

describe('orbital math', () => {
  describe('wrapDegrees', () => {
    it('maps into [-180, 180)', () => {
      expect(wrapDegrees(0)).toBe(0);
      expect(wrapDegrees(180)).toBe(-180);
      expect(wrapDegrees(-180)).toBe(-180);
      expect(wrapDegrees(540)).toBe(-180);
      expect(wrapDegrees(-190)).toBe(170);
      expect(wrapDegrees(287.0641)).toBeCloseTo(-72.9359, 10);
      expect(wrapDegrees(359.9)).toBeCloseTo(-0.1, 10);
    });
  });

  describe('semi-major axis', () => {
    it('converts rev/day to rad/s', () => {
      expect(meanMotionToRadPerSec(1)).toBe(Math.PI / 43200);
    });

    it('follows from the mean motion', () => {
      expect(semiMajorAxisKm(15.50437522)).toBeCloseTo(6793.584702357316, 6);
      expect(semiMajorAxisKm(2.005)).toBeCloseTo(26565.964625718538, 5);
    });
  });

  describe('meanToEccentricAnomaly', () => {
    it('returns the mean anomaly for a circular orbit', () => {
      expect(meanToEccentricAnomaly(1.25, 0)).toBe(1.25);
      expect(meanToEccentricAnomaly(-Math.PI, 0)).toBe(-Math.PI);
    });

    it("satisfies Kepler's equation", () => {
      const E = meanToEccentricAnomaly(1.2, 0.3);
      expect(E - 0.3 * Math.sin(E)).toBeCloseTo(1.2, 12);
    });

    it('rejects an unwrapped mean anomaly', () => {
      const err = thrown(() => meanToEccentricAnomaly(5, 0.1));
      expect(err).toBeInstanceOf(AnomalyOutOfRangeError);
      expect(err).toMatchObject({ meanAnomaly: 5 });
    });

    it('rejects eccentricities outside [0, 1)', () => {
      expect(() => meanToEccentricAnomaly(1, 1)).toThrow(InvalidEccentricityError);
      expect(() => meanToEccentricAnomaly(1, -0.1)).toThrow(InvalidEccentricityError);
      expect(() => meanToEccentricAnomaly(1, Number.NaN)).toThrow(InvalidEccentricityError);
    });

    it('gives up after the iteration limit', () => {
      const err = thrown(() => meanToEccentricAnomaly(1, 0.5, { maxIterations: 1 }));
      expect(err).toBeInstanceOf(NoConvergenceError);
      expect(err).toMatchObject({ meanAnomaly: 1, eccentricity: 0.5, iterations: 1 });
    });
  });

  describe('true anomaly', () => {
    it('equals the eccentric anomaly for a circular orbit', () => {
      expect(eccentricToTrueAnomaly(0.25, 0)).toBeCloseTo(0.25, 14);
    });

    it('wraps the mean anomaly before solving', () => {
      expect(trueAnomalyDeg(287.0641, 0.0007999)).toBeCloseTo(-73.02355225022357, 8);
      expect(trueAnomalyDeg(287.0641, 0.3)).toBeCloseTo(-107.57641872284836, 8);
    });

    it('maps a mean anomaly of 180 degrees to -180, never +180', () => {
      expect(trueAnomalyDeg(180, 0)).toBeCloseTo(-180, 10);
      expect(trueAnomalyDeg(180, 0.5)).toBeCloseTo(-180, 10);
    });

    it('converges for highly eccentric orbits', () => {
      expect(trueAnomalyDeg(10, 0.99)).toBeCloseTo(165.48879985583926, 6);
      expect(trueAnomalyDeg(-170, 0.95)).toBeCloseTo(-179.1777594097051, 6);
      expect(trueAnomalyDeg(0, 0.9)).toBeCloseTo(0, 10);
    });

    it('inverts back to the mean anomaly in [0, 2pi)', () => {
      expect(trueToMeanAnomaly(meanToTrueAnomaly(1.2, 0.3), 0.3)).toBeCloseTo(1.2, 10);
      expect(trueToMeanAnomaly(meanToTrueAnomaly(-1, 0.3), 0.3)).toBeCloseTo(2 * Math.PI - 1, 10);
      expect(trueToMeanAnomaly(0, 0.5)).toBe(0);
    });
  });
});
