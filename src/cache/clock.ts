import { LogicalTimestamp, timestamp } from './timestamp';

/** Source of write / invalidation timestamps */
export interface Clock {
  now(): LogicalTimestamp;
}

const NANOS_PER_SECOND = 1_000_000_000n;
const NANOS = 1_000_000_000;

/**
 * Wall-clock time with nanosecond resolution.
 *
 * Anchors the monotonic high-resolution timer to `Date.now()` once, so
 * readings within one process never go backwards. Clocks on different hosts
 * are assumed to be close; nothing here corrects skew between them.
 */
export class SystemClock implements Clock {
  private readonly anchorWallNs: bigint;
  private readonly anchorHr: bigint;

  constructor() {
    this.anchorWallNs = BigInt(Date.now()) * 1_000_000n;
    this.anchorHr = process.hrtime.bigint();
  }

  now(): LogicalTimestamp {
    const ns = this.anchorWallNs + (process.hrtime.bigint() - this.anchorHr);
    return timestamp(Number(ns / NANOS_PER_SECOND), Number(ns % NANOS_PER_SECOND));
  }
}

/** Settable clock for tests and replay tooling */
export class ManualClock implements Clock {
  private current: LogicalTimestamp;

  constructor(start: LogicalTimestamp = timestamp(0)) {
    this.current = start;
  }

  now(): LogicalTimestamp {
    return { ...this.current };
  }

  set(ts: LogicalTimestamp): void {
    this.current = ts;
  }

  /** Moves by whole nanoseconds; sub-millisecond parts of the current reading are kept */
  advanceMillis(ms: number): LogicalTimestamp {
    const totalNanos = this.current.nanoseconds + Math.round(ms * 1_000_000);
    const carry = Math.floor(totalNanos / NANOS);
    this.current = timestamp(this.current.seconds + carry, totalNanos - carry * NANOS);
    return this.now();
  }
}
