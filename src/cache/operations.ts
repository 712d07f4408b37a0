/**
 * Protocol steps as atomic operations.
 *
 * Each builder returns the step twice over: as a pure function for stores that
 * lock in-process, and as a script call for stores that run it server-side.
 * The comparison always happens inside the atomic region.
 */

import { AtomicOperation, CacheLookup, CacheRecord, WriteOutcome } from './types';
import { LogicalTimestamp, ZERO_TIMESTAMP, isBefore } from './timestamp';
import { isFresh } from './record';

const MISS: CacheLookup = { kind: 'miss' };

function writeOutcomeFromReply(reply: unknown): WriteOutcome {
  if (reply === 1) return 'accepted';
  if (reply === 0) return 'rejected';
  throw new TypeError(`Unexpected script reply: ${String(reply)}`);
}

/**
 * Accept unless the write is strictly older than the latest invalidation or
 * than the write already stored. Equal timestamps are accepted.
 */
export function setOperation(value: Buffer, writeTs: LogicalTimestamp): AtomicOperation<WriteOutcome> {
  return {
    script: 'coherentSet',
    args: [value, String(writeTs.seconds), String(writeTs.nanoseconds)],
    apply(current: CacheRecord | undefined) {
      const invalidateTs = current?.invalidateTs ?? ZERO_TIMESTAMP;
      const storedTs = current?.writeTs ?? ZERO_TIMESTAMP;
      if (isBefore(writeTs, invalidateTs) || isBefore(writeTs, storedTs)) {
        return { result: 'rejected' };
      }
      return {
        write: { record: { value, writeTs, invalidateTs }, retention: { mode: 'persist' } },
        result: 'accepted',
      };
    },
    fromReply: writeOutcomeFromReply,
  };
}

/**
 * Raise the invalidation mark unless a newer one is already recorded.
 * Records holding no value are tombstones and get the retention window
 * refreshed; records with a value keep whatever expiry they have.
 */
export function invalidateOperation(invalidateTs: LogicalTimestamp, tombstoneTtlSeconds: number): AtomicOperation<WriteOutcome> {
  return {
    script: 'coherentInvalidate',
    args: [String(invalidateTs.seconds), String(invalidateTs.nanoseconds), String(tombstoneTtlSeconds)],
    apply(current: CacheRecord | undefined) {
      const currentInvalidateTs = current?.invalidateTs ?? ZERO_TIMESTAMP;
      if (isBefore(invalidateTs, currentInvalidateTs)) {
        return { result: 'rejected' };
      }
      const record: CacheRecord = {
        value: current?.value,
        writeTs: current?.writeTs ?? { ...ZERO_TIMESTAMP },
        invalidateTs,
      };
      return {
        write: {
          record,
          retention: record.value === undefined
            ? { mode: 'expire', seconds: tombstoneTtlSeconds }
            : { mode: 'keep' },
        },
        result: 'accepted',
      };
    },
    fromReply: writeOutcomeFromReply,
  };
}

/** Read-only: a value only when present and not hidden by an invalidation */
export function getOperation(): AtomicOperation<CacheLookup> {
  return {
    script: 'coherentGet',
    args: [],
    apply(current: CacheRecord | undefined) {
      if (current === undefined || current.value === undefined || !isFresh(current)) {
        return { result: MISS };
      }
      return { result: { kind: 'value', value: current.value } };
    },
    fromReply(reply: unknown): CacheLookup {
      if (reply === null || reply === undefined) return MISS;
      if (Buffer.isBuffer(reply)) return { kind: 'value', value: reply };
      if (typeof reply === 'string') return { kind: 'value', value: Buffer.from(reply) };
      throw new TypeError(`Unexpected script reply type: ${typeof reply}`);
    },
  };
}
