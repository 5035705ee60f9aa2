/** Seconds between the NTP epoch (1900-01-01) and the Unix epoch (1970-01-01) */
export const SECONDS_FROM_1900_TO_1970 = 2_208_988_800;

/** Fraction units per second (2^32) */
export const FRACTION_PER_SECOND = 0x1_0000_0000;

/**
 * 64-bit NTP fixed-point timestamp: whole seconds since 1900 plus a
 * fraction of a second out of 2^32. Both halves are kept as unsigned
 * 32-bit integers.
 *
 * Conversion goes through whole milliseconds, so
 * `fromEpochMillis(m).toEpochMillis()` may come back up to 1 ms low:
 * the fraction is truncated in both directions.
 */
export class NtpTimestamp {
  static readonly ZERO = new NtpTimestamp(0, 0);

  readonly seconds: number;
  readonly fraction: number;

  constructor(seconds: number, fraction: number) {
    this.seconds = seconds >>> 0;
    this.fraction = fraction >>> 0;
    Object.freeze(this);
  }

  static fromEpochMillis(epochMillis: number): NtpTimestamp {
    const epochSeconds = Math.floor(epochMillis / 1000);
    const millisPart = epochMillis - epochSeconds * 1000;

    return new NtpTimestamp(
      epochSeconds + SECONDS_FROM_1900_TO_1970,
      Math.floor((millisPart * FRACTION_PER_SECOND) / 1000),
    );
  }

  toEpochMillis(): number {
    const unixSeconds = this.seconds - SECONDS_FROM_1900_TO_1970;
    const fractionMillis = Math.floor(
      (this.fraction * 1000) / FRACTION_PER_SECOND,
    );
    return unixSeconds * 1000 + fractionMillis;
  }

  equals(other: NtpTimestamp): boolean {
    return this.seconds === other.seconds && this.fraction === other.fraction;
  }
}
