/**
 * Cache Coherence Types
 *
 * Per-key record, the atomic store contract and protocol outcomes.
 * Used by: CoherenceProtocol, PopulationPipeline, admin routes
 */

import { LogicalTimestamp } from './timestamp';

export interface CacheRecord {
  /** Last known good payload; undefined when only invalidations happened */
  value?: Buffer;
  writeTs: LogicalTimestamp;
  /** ZERO_TIMESTAMP until the first accepted invalidation */
  invalidateTs: LogicalTimestamp;
}

/**
 * Store-visible hash layout. Field names are shared with the Lua scripts.
 * A type alias, so it stays assignable to the raw field map `decodeRecord` reads.
 */
export type PersistedFields = {
  ts_sec?: string;
  ts_nsec?: string;
  inv_sec?: string;
  inv_nsec?: string;
  v?: Buffer;
};

export type Retention =
  | { mode: 'persist' }
  | { mode: 'keep' }
  | { mode: 'expire'; seconds: number };

export interface AtomicStep<R> {
  /** Omitted when the record is left untouched */
  write?: { record: CacheRecord; retention: Retention };
  result: R;
}

export type ScriptName = 'coherentSet' | 'coherentInvalidate' | 'coherentGet';

/**
 * One indivisible read-modify-write on a single key.
 *
 * `apply` is the step as a pure function over the current record; stores that
 * run code server-side execute `script` with `args` instead and hand the reply
 * to `fromReply`. Both paths must agree.
 */
export interface AtomicOperation<R> {
  readonly script: ScriptName;
  readonly args: Array<string | Buffer>;
  apply(current: CacheRecord | undefined): AtomicStep<R>;
  fromReply(reply: unknown): R;
}

export interface AtomicStore {
  readonly kind: 'redis' | 'memory';
  /** Linearizable per key; no ordering across keys */
  executeAtomic<R>(key: string, operation: AtomicOperation<R>): Promise<R>;
  /** Raw record, freshness not applied */
  inspect(key: string): Promise<CacheRecord | undefined>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

export interface StoreConfig {
  /** Sweep interval for expired in-memory records */
  sweepIntervalMs: number;
}

export type WriteOutcome = 'accepted' | 'rejected';

export type CacheLookup =
  | { kind: 'value'; value: Buffer }
  | { kind: 'miss' };

export interface ProtocolConfig {
  /** Prepended to every application key */
  keyPrefix: string;
  /** Retention window of invalidation-only records */
  tombstoneTtlSeconds: number;
}

export interface ProtocolStats {
  setsAccepted: number;
  setsRejected: number;
  invalidationsAccepted: number;
  invalidationsRejected: number;
  hits: number;
  misses: number;
  errors: number;
}
