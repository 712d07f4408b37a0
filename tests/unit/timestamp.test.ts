import {
  ZERO_TIMESTAMP,
  compareTimestamps,
  formatTimestamp,
  fromMillis,
  isBefore,
  maxTimestamp,
  timestamp,
} from '../../src/cache/timestamp';
import { ManualClock, SystemClock } from '../../src/cache/clock';

describe('Logical timestamps', () => {
  describe('compareTimestamps', () => {
    it('should order by seconds first', () => {
      expect(compareTimestamps(timestamp(1, 999_999_999), timestamp(2, 0))).toBe(-1);
      expect(compareTimestamps(timestamp(3, 0), timestamp(2, 500))).toBe(1);
    });

    it('should fall back to nanoseconds when seconds are equal', () => {
      expect(compareTimestamps(timestamp(5, 10), timestamp(5, 11))).toBe(-1);
      expect(compareTimestamps(timestamp(5, 11), timestamp(5, 10))).toBe(1);
    });

    it('should treat equal pairs as equal', () => {
      expect(compareTimestamps(timestamp(7, 42), { seconds: 7, nanoseconds: 42 })).toBe(0);
    });
  });

  it('isBefore should be strict', () => {
    expect(isBefore(timestamp(1), timestamp(2))).toBe(true);
    expect(isBefore(timestamp(2), timestamp(2))).toBe(false);
    expect(isBefore(timestamp(3), timestamp(2))).toBe(false);
  });

  it('maxTimestamp should return the later of two', () => {
    expect(maxTimestamp(timestamp(1, 5), timestamp(1, 4))).toEqual({ seconds: 1, nanoseconds: 5 });
    expect(maxTimestamp(ZERO_TIMESTAMP, timestamp(0, 1))).toEqual({ seconds: 0, nanoseconds: 1 });
  });

  describe('timestamp', () => {
    it('should reject negative or fractional seconds', () => {
      expect(() => timestamp(-1)).toThrow(RangeError);
      expect(() => timestamp(1.5)).toThrow(RangeError);
    });

    it('should reject nanoseconds outside a second', () => {
      expect(() => timestamp(1, 1_000_000_000)).toThrow(RangeError);
      expect(() => timestamp(1, -1)).toThrow(RangeError);
    });
  });

  it('fromMillis should split milliseconds into seconds and nanoseconds', () => {
    expect(fromMillis(1_700_000_000_123)).toEqual({ seconds: 1_700_000_000, nanoseconds: 123_000_000 });
  });

  it('formatTimestamp should zero-pad the fraction', () => {
    expect(formatTimestamp(timestamp(150, 42))).toBe('150.000000042');
  });
});

describe('Clocks', () => {
  it('SystemClock should never go backwards', () => {
    const clock = new SystemClock();
    let previous = clock.now();
    for (let i = 0; i < 1000; i++) {
      const next = clock.now();
      expect(isBefore(next, previous)).toBe(false);
      previous = next;
    }
  });

  it('SystemClock should track wall-clock seconds', () => {
    const before = Math.floor(Date.now() / 1000);
    const reading = new SystemClock().now();
    const after = Math.floor(Date.now() / 1000);
    expect(reading.seconds).toBeGreaterThanOrEqual(before);
    expect(reading.seconds).toBeLessThanOrEqual(after);
  });

  it('ManualClock should only move when told to', () => {
    const clock = new ManualClock(timestamp(100));
    expect(clock.now()).toEqual({ seconds: 100, nanoseconds: 0 });
    expect(clock.advanceMillis(1500)).toEqual({ seconds: 101, nanoseconds: 500_000_000 });
    clock.set(timestamp(150));
    expect(clock.now()).toEqual({ seconds: 150, nanoseconds: 0 });
  });

  it('ManualClock should keep sub-millisecond nanoseconds when advancing', () => {
    const clock = new ManualClock(timestamp(10, 999_999_500));
    expect(clock.advanceMillis(1)).toEqual({ seconds: 11, nanoseconds: 999_500 });
    expect(clock.advanceMillis(0)).toEqual({ seconds: 11, nanoseconds: 999_500 });
    expect(clock.advanceMillis(-1)).toEqual({ seconds: 10, nanoseconds: 999_999_500 });
  });
});
