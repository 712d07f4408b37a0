/**
 * Persisted record codec.
 *
 * Maps CacheRecord onto the `ts_sec / ts_nsec / inv_sec / inv_nsec / v` hash.
 * A record that fails to parse is corruption, never a miss.
 */

import Ajv from 'ajv';
import { CacheRecord, PersistedFields } from './types';
import { LogicalTimestamp, ZERO_TIMESTAMP, isBefore } from './timestamp';
import { StoreCorruptionError } from './errors';

type StampName = 'ts_sec' | 'ts_nsec' | 'inv_sec' | 'inv_nsec';

const STAMP_NAMES: readonly StampName[] = ['ts_sec', 'ts_nsec', 'inv_sec', 'inv_nsec'];

type RawStamps = Partial<Record<StampName, string>>;
type ParsedStamps = Partial<Record<StampName, number>>;

const ajv = new Ajv({ allErrors: true });

// Digits only, as the Lua side checks: no sign, blanks, exponent or fraction
const digits = { type: 'string', pattern: '^[0-9]+$' };

const validateRawStamps = ajv.compile<RawStamps>({
  type: 'object',
  properties: {
    ts_sec: digits,
    ts_nsec: digits,
    inv_sec: digits,
    inv_nsec: digits,
  },
  dependencies: {
    ts_sec: ['ts_nsec'],
    ts_nsec: ['ts_sec'],
    inv_sec: ['inv_nsec'],
    inv_nsec: ['inv_sec'],
  },
});

const seconds = { type: 'integer', minimum: 0, maximum: Number.MAX_SAFE_INTEGER };
const nanoseconds = { type: 'integer', minimum: 0, maximum: 999_999_999 };

const validateStamps = ajv.compile<ParsedStamps>({
  type: 'object',
  properties: {
    ts_sec: seconds,
    ts_nsec: nanoseconds,
    inv_sec: seconds,
    inv_nsec: nanoseconds,
  },
});

function isStampName(name: string): name is StampName {
  return STAMP_NAMES.some((stamp) => stamp === name);
}

export function encodeRecord(record: CacheRecord): PersistedFields {
  const fields: PersistedFields = {
    ts_sec: String(record.writeTs.seconds),
    ts_nsec: String(record.writeTs.nanoseconds),
    inv_sec: String(record.invalidateTs.seconds),
    inv_nsec: String(record.invalidateTs.nanoseconds),
  };
  if (record.value !== undefined) fields.v = record.value;
  return fields;
}

/**
 * Parse raw hash fields (as returned by HGETALL) into a record.
 * Returns undefined for an empty hash (absent key).
 */
export function decodeRecord(
  raw: Readonly<Record<string, string | Buffer | undefined>>,
  key?: string,
): CacheRecord | undefined {
  const stamps: RawStamps = {};
  let value: Buffer | undefined;
  let present = 0;
  for (const [name, field] of Object.entries(raw)) {
    if (field === undefined) continue;
    // Fields outside the layout are ignored, as HMGET in the scripts ignores them
    if (name === 'v') {
      value = Buffer.isBuffer(field) ? Buffer.from(field) : Buffer.from(field, 'utf8');
    } else if (isStampName(name)) {
      stamps[name] = Buffer.isBuffer(field) ? field.toString('utf8') : field;
    } else {
      continue;
    }
    present++;
  }
  if (present === 0) return undefined;

  if (!validateRawStamps(stamps)) {
    throw malformed(key, ajv.errorsText(validateRawStamps.errors));
  }
  const parsed: ParsedStamps = {};
  for (const name of STAMP_NAMES) {
    const text = stamps[name];
    if (text !== undefined) parsed[name] = Number(text);
  }
  if (!validateStamps(parsed)) {
    throw malformed(key, ajv.errorsText(validateStamps.errors));
  }
  if (value !== undefined && parsed.ts_sec === undefined) {
    throw new StoreCorruptionError(`Cache record${key ? ` for ${key}` : ''} has a value but no write timestamp`, key);
  }

  return {
    value,
    writeTs: pair(parsed.ts_sec, parsed.ts_nsec),
    invalidateTs: pair(parsed.inv_sec, parsed.inv_nsec),
  };
}

function malformed(key: string | undefined, detail: string): StoreCorruptionError {
  return new StoreCorruptionError(`Malformed cache record${key ? ` for ${key}` : ''}: ${detail}`, key);
}

function pair(sec: number | undefined, nsec: number | undefined): LogicalTimestamp {
  if (sec === undefined || nsec === undefined) return { ...ZERO_TIMESTAMP };
  return { seconds: sec, nanoseconds: nsec };
}

/** Visible to readers: a value exists and no newer invalidation hides it */
export function isFresh(record: CacheRecord): boolean {
  return record.value !== undefined && !isBefore(record.writeTs, record.invalidateTs);
}
