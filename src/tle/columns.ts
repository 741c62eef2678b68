/**
 * Column layout of the two element lines, 0-indexed and end-exclusive.
 * Both record variants read through these tables.
 */
export type ColumnRange = readonly [number, number];

export const LINE1_COLUMNS = {
  lineNumber: [0, 1],
  noradId: [2, 7],
  classification: [7, 8],
  internationalDesignator: [9, 17],
  epochYear: [18, 20],
  epochDay: [20, 32],
  meanMotionDot: [33, 43],
  meanMotionDdot: [44, 52],
  bstar: [53, 61],
  elementSetNumber: [64, 68],
} as const;

export const LINE2_COLUMNS = {
  lineNumber: [0, 1],
  inclination: [8, 16],
  raan: [17, 25],
  eccentricity: [26, 33],
  argPerigee: [34, 42],
  meanAnomaly: [43, 51],
  meanMotion: [52, 63],
  revNumber: [63, 68],
} as const;

/** Column holding the modulo-10 checksum on both lines. */
export const CHECKSUM_COLUMN: ColumnRange = [68, 69];

export function requiredLength(columns: Record<string, ColumnRange>): number {
  return Math.max(...Object.values(columns).map(([, end]) => end));
}
