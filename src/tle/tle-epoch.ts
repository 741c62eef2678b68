const MICROS_PER_DAY = 86_400_000_000;

/**
 * Instant an element set is valid for, held as whole microseconds since the
 * Unix epoch. A JS Date only keeps milliseconds, the format's day fraction
 * carries eight decimals (under a millisecond), so the microseconds are kept
 * here and a Date is produced on request.
 */
export class TleEpoch {
  private constructor(public readonly unixMicros: number) {}

  /**
   * Day 1.0 is midnight on January 1st (UTC) of `year`. Leap years fall out
   * of the calendar arithmetic in Date.UTC.
   */
  static fromDayOfYear(year: number, dayOfYear: number): TleEpoch {
    const base = Date.UTC(year, 0, 1) * 1000;
    return new TleEpoch(base + Math.floor((dayOfYear - 1) * MICROS_PER_DAY));
  }

  static fromUnixMicros(unixMicros: number): TleEpoch {
    if (!Number.isSafeInteger(unixMicros)) {
      throw new RangeError(`Epoch must be a whole number of microseconds, got ${unixMicros}`);
    }
    return new TleEpoch(unixMicros);
  }

  static fromDate(date: Date): TleEpoch {
    return new TleEpoch(date.getTime() * 1000);
  }

  get year(): number {
    return this.toDate().getUTCFullYear();
  }

  /** Fractional day of the year, 1-based. */
  get dayOfYear(): number {
    const base = Date.UTC(this.year, 0, 1) * 1000;
    return (this.unixMicros - base) / MICROS_PER_DAY + 1;
  }

  /** Sub-millisecond part, 0-999. */
  get microsecond(): number {
    return ((this.unixMicros % 1000) + 1000) % 1000;
  }

  toDate(): Date {
    return new Date(Math.floor(this.unixMicros / 1000));
  }

  /** ISO 8601 in UTC with six fractional digits. */
  toISOString(): string {
    const iso = this.toDate().toISOString();
    return `${iso.slice(0, -1)}${this.microsecond.toString().padStart(3, '0')}Z`;
  }

  toJSON(): string {
    return this.toISOString();
  }

  equals(other: TleEpoch): boolean {
    return this.unixMicros === other.unixMicros;
  }
}
