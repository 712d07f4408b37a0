/**
 * Coherence Protocol
 *
 * Conditional set, invalidate and freshness-checked get. Every call is one
 * atomic round-trip against the store; the timestamp comparison runs inside
 * it, never in the caller.
 */

import { AtomicOperation, AtomicStore, CacheLookup, CacheRecord, ProtocolConfig, ProtocolStats, WriteOutcome } from './types';
import { LogicalTimestamp, formatTimestamp } from './timestamp';
import { getOperation, invalidateOperation, setOperation } from './operations';
import { logger } from '../observability/logger';

const DEFAULT_CONFIG: ProtocolConfig = {
  keyPrefix: '',
  tombstoneTtlSeconds: 120,
};

export interface SetEntry {
  key: string;
  value: Buffer;
}

export class CoherenceProtocol {
  private readonly config: ProtocolConfig;
  private readonly counters: ProtocolStats = {
    setsAccepted: 0,
    setsRejected: 0,
    invalidationsAccepted: 0,
    invalidationsRejected: 0,
    hits: 0,
    misses: 0,
    errors: 0,
  };
  private readonly log = logger.child({ component: 'coherence' });

  constructor(
    private readonly store: AtomicStore,
    config?: Partial<ProtocolConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /** Store `value` unless `ts` is older than the latest invalidation or the stored write */
  async set(key: string, value: Buffer, ts: LogicalTimestamp): Promise<WriteOutcome> {
    const outcome = await this.run(key, setOperation(value, ts));
    if (outcome === 'accepted') this.counters.setsAccepted++;
    else this.counters.setsRejected++;
    this.log.debug({ key, ts: formatTimestamp(ts), outcome }, 'set');
    return outcome;
  }

  /** Hide every write strictly older than `ts` */
  async invalidate(key: string, ts: LogicalTimestamp): Promise<WriteOutcome> {
    const outcome = await this.run(key, invalidateOperation(ts, this.config.tombstoneTtlSeconds));
    if (outcome === 'accepted') this.counters.invalidationsAccepted++;
    else this.counters.invalidationsRejected++;
    this.log.debug({ key, ts: formatTimestamp(ts), outcome }, 'invalidate');
    return outcome;
  }

  async get(key: string): Promise<CacheLookup> {
    const lookup = await this.run(key, getOperation());
    if (lookup.kind === 'value') this.counters.hits++;
    else this.counters.misses++;
    this.log.debug({ key, hit: lookup.kind === 'value' }, 'get');
    return lookup;
  }

  /**
   * Batch set sharing one timestamp. One atomic call per key; outcomes are
   * in entry order. Nothing is atomic across keys.
   */
  async setMany(entries: SetEntry[], ts: LogicalTimestamp): Promise<WriteOutcome[]> {
    return Promise.all(entries.map((entry) => this.set(entry.key, entry.value, ts)));
  }

  async invalidateMany(keys: string[], ts: LogicalTimestamp): Promise<WriteOutcome[]> {
    return Promise.all(keys.map((key) => this.invalidate(key, ts)));
  }

  /** Raw record for diagnostics; freshness is not applied */
  async inspect(key: string): Promise<CacheRecord | undefined> {
    return this.store.inspect(this.storeKey(key));
  }

  stats(): ProtocolStats {
    return { ...this.counters };
  }

  private async run<R>(key: string, operation: AtomicOperation<R>): Promise<R> {
    try {
      return await this.store.executeAtomic(this.storeKey(key), operation);
    } catch (err) {
      this.counters.errors++;
      this.log.warn({ err, key, op: operation.script }, 'Cache store call failed');
      throw err;
    }
  }

  private storeKey(key: string): string {
    return `${this.config.keyPrefix}${key}`;
  }
}
