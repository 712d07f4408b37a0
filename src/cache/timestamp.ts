/**
 * Logical Timestamps
 *
 * (seconds, nanoseconds) pairs supplied by callers. The only ordering signal
 * between writes and invalidations of a key.
 */

export interface LogicalTimestamp {
  seconds: number;
  nanoseconds: number;
}

export type Ordering = -1 | 0 | 1;

const NANOS_PER_SECOND = 1_000_000_000;

export const ZERO_TIMESTAMP: Readonly<LogicalTimestamp> = Object.freeze({ seconds: 0, nanoseconds: 0 });

/** Build a timestamp, rejecting parts the persisted layout cannot hold */
export function timestamp(seconds: number, nanoseconds = 0): LogicalTimestamp {
  if (!Number.isSafeInteger(seconds) || seconds < 0) {
    throw new RangeError(`Invalid timestamp seconds: ${seconds}`);
  }
  if (!Number.isInteger(nanoseconds) || nanoseconds < 0 || nanoseconds >= NANOS_PER_SECOND) {
    throw new RangeError(`Invalid timestamp nanoseconds: ${nanoseconds}`);
  }
  return { seconds, nanoseconds };
}

export function fromMillis(ms: number): LogicalTimestamp {
  const whole = Math.floor(ms);
  return timestamp(Math.floor(whole / 1000), (whole % 1000) * 1_000_000);
}

export function compareTimestamps(a: LogicalTimestamp, b: LogicalTimestamp): Ordering {
  if (a.seconds !== b.seconds) return a.seconds < b.seconds ? -1 : 1;
  if (a.nanoseconds !== b.nanoseconds) return a.nanoseconds < b.nanoseconds ? -1 : 1;
  return 0;
}

/** Strict `a < b` */
export function isBefore(a: LogicalTimestamp, b: LogicalTimestamp): boolean {
  return compareTimestamps(a, b) < 0;
}

export function maxTimestamp(a: LogicalTimestamp, b: LogicalTimestamp): LogicalTimestamp {
  return isBefore(a, b) ? b : a;
}

/** `seconds.nanoseconds` with the fraction zero-padded to 9 digits */
export function formatTimestamp(ts: LogicalTimestamp): string {
  return `${ts.seconds}.${String(ts.nanoseconds).padStart(9, '0')}`;
}
