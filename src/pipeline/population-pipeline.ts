/**
 * Population Pipeline
 *
 * Read-through and write-through around the relational source:
 *  - populate: fetch rows, cache each under its derived key
 *  - readThrough / readThroughMany: cache first, source on miss, then
 *    populate (or only fall back, with `populate: false`)
 *  - writeThrough: run the mutation, then invalidate the affected keys
 *
 * Write timestamps for populated rows are taken before the fetch starts;
 * invalidation timestamps after the mutation has committed. A mutation that
 * commits while a fetch is in flight therefore outranks the fetched rows.
 */

import { CoherenceProtocol } from '../cache/coherence-protocol';
import { Clock } from '../cache/clock';
import { LogicalTimestamp } from '../cache/timestamp';
import { CacheLookup } from '../cache/types';
import { InvalidationError, isTransient } from '../cache/errors';
import { DependencyHealthManager } from '../resilience/dependency-health';
import { Codec, PipelineConfig, PopulateResult, QueryExecutor, ReadThroughOptions, SourceQuery, SourceRow } from './types';
import { logger } from '../observability/logger';

const DEFAULT_CONFIG: PipelineConfig = {
  invalidateRetries: 3,
  invalidateRetryDelayMs: 50,
  bypassOnError: true,
};

export interface PipelineDeps<Row> {
  protocol: CoherenceProtocol;
  source: QueryExecutor;
  codec: Codec<Row>;
  clock: Clock;
  health?: DependencyHealthManager;
}

type Lookup<Row> =
  | { kind: 'hit'; row: Row }
  | { kind: 'miss' }
  | { kind: 'bypass' };

interface PendingRow<Row> {
  key: string;
  row: Row;
}

export class PopulationPipeline<Row extends SourceRow> {
  private readonly config: PipelineConfig;
  private readonly log = logger.child({ component: 'pipeline' });

  constructor(
    private readonly deps: PipelineDeps<Row>,
    config?: Partial<PipelineConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /** Fetch rows and cache every one of them under `keyOf(row)` */
  async populate(query: SourceQuery, keyOf: (row: Row) => string): Promise<PopulateResult<Row>> {
    const ts = this.deps.clock.now();
    const rows = await this.fetch(query);
    const counts = await this.cacheRows(rows.map((row) => ({ key: keyOf(row), row })), ts);
    return { rows, ...counts };
  }

  /**
   * Cached row for `key`, or the first row `query` returns (then cached,
   * unless `populate` is false). Resolves with null when the source has no
   * row either.
   */
  async readThrough(key: string, query: SourceQuery, options: ReadThroughOptions = {}): Promise<Row | null> {
    const lookup = await this.lookup(key);
    if (lookup.kind === 'hit') return lookup.row;

    const ts = this.deps.clock.now();
    const [row] = await this.fetch(query);
    if (row === undefined) return null;

    if (lookup.kind === 'miss' && options.populate !== false) {
      await this.cacheRows([{ key, row }], ts);
    }
    return row;
  }

  /**
   * Batched read-through. One lookup per key, a single source query for the
   * keys that missed, results in key order (null where the source has no row).
   */
  async readThroughMany(
    keys: string[],
    queryForMissing: (missing: string[]) => SourceQuery,
    keyOf: (row: Row) => string,
    options: ReadThroughOptions = {},
  ): Promise<Array<Row | null>> {
    const lookups = await Promise.all(keys.map((key) => this.lookup(key)));
    const results: Array<Row | null> = lookups.map((l) => (l.kind === 'hit' ? l.row : null));

    const missing = keys.filter((_, i) => lookups[i].kind !== 'hit');
    if (missing.length === 0) return results;

    const ts = this.deps.clock.now();
    const rows = await this.fetch(queryForMissing(Array.from(new Set(missing))));
    const byKey = new Map<string, Row>();
    for (const row of rows) byKey.set(keyOf(row), row);

    const toCache: PendingRow<Row>[] = [];
    const queued = new Set<string>();
    keys.forEach((key, i) => {
      const lookup = lookups[i];
      if (lookup.kind === 'hit') return;
      const row = byKey.get(key);
      if (row === undefined) return;
      results[i] = row;
      if (lookup.kind === 'miss' && options.populate !== false && !queued.has(key)) {
        queued.add(key);
        toCache.push({ key, row });
      }
    });

    await this.cacheRows(toCache, ts);
    return results;
  }

  /**
   * Run a mutation against the source, then invalidate `keys`.
   * Resolves with the affected row count. Throws InvalidationError naming the
   * keys still failing after retries; the mutation itself has committed.
   */
  async writeThrough(mutation: SourceQuery, keys: string[]): Promise<number> {
    let affected: number;
    try {
      affected = await this.deps.source.execute(mutation);
      this.deps.health?.recordSuccess('source');
    } catch (err) {
      this.deps.health?.recordFailure('source', errorMessage(err));
      throw err;
    }
    await this.invalidateKeys(keys, this.deps.clock.now());
    return affected;
  }

  /** Invalidate keys changed outside `writeThrough` */
  async invalidateKeys(keys: string[], ts: LogicalTimestamp = this.deps.clock.now()): Promise<void> {
    const failures: Array<{ key: string; err: unknown }> = [];
    await Promise.all(
      keys.map(async (key) => {
        try {
          await this.invalidateWithRetry(key, ts);
        } catch (err) {
          failures.push({ key, err });
        }
      }),
    );

    if (failures.length > 0) {
      const failedKeys = failures.map((f) => f.key);
      this.log.error({ err: failures[0].err, keys: failedKeys }, 'Invalidation failed; cached rows may be stale');
      throw new InvalidationError(failedKeys, { cause: failures[0].err });
    }
  }

  private async invalidateWithRetry(key: string, ts: LogicalTimestamp): Promise<void> {
    const attempts = 1 + Math.max(0, this.config.invalidateRetries);
    for (let attempt = 1; ; attempt++) {
      try {
        await this.deps.protocol.invalidate(key, ts);
        this.deps.health?.recordSuccess('store');
        return;
      } catch (err) {
        this.deps.health?.recordFailure('store', errorMessage(err));
        if (!isTransient(err) || attempt >= attempts) throw err;
        this.log.warn({ err, key, attempt }, 'Retrying invalidation');
        await sleep(this.config.invalidateRetryDelayMs);
      }
    }
  }

  private async lookup(key: string): Promise<Lookup<Row>> {
    const health = this.deps.health;
    if (health && !health.isAvailable('store')) {
      return { kind: 'bypass' };
    }

    let found: CacheLookup;
    try {
      found = await this.deps.protocol.get(key);
      health?.recordSuccess('store');
    } catch (err) {
      health?.recordFailure('store', errorMessage(err));
      if (!this.config.bypassOnError) throw err;
      this.log.warn({ err, key }, 'Cache read failed; reading from source');
      return { kind: 'bypass' };
    }

    if (found.kind === 'miss') return { kind: 'miss' };
    return { kind: 'hit', row: this.deps.codec.decode(found.value) };
  }

  private async fetch(query: SourceQuery): Promise<Row[]> {
    try {
      const rows = await this.deps.source.query<Row>(query);
      this.deps.health?.recordSuccess('source');
      return rows;
    } catch (err) {
      this.deps.health?.recordFailure('source', errorMessage(err));
      throw err;
    }
  }

  /** One set per row sharing `ts`. Failures are logged and counted, never thrown. */
  private async cacheRows(
    pending: PendingRow<Row>[],
    ts: LogicalTimestamp,
  ): Promise<Omit<PopulateResult<Row>, 'rows'>> {
    const counts = { accepted: 0, rejected: 0, failed: 0 };
    const settled = await Promise.allSettled(
      pending.map(async ({ key, row }) => this.deps.protocol.set(key, this.deps.codec.encode(row), ts)),
    );

    settled.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        counts[result.value]++;
        return;
      }
      counts.failed++;
      this.deps.health?.recordFailure('store', errorMessage(result.reason));
      this.log.warn({ err: result.reason, key: pending[i].key }, 'Error caching row');
    });

    if (pending.length > 0) {
      this.log.debug({ count: pending.length, ...counts }, 'Rows cached');
    }
    return counts;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
