/**
 * Population Pipeline Types
 *
 * The relational source of truth and payload encoding, as consumed by the
 * read-through / write-through pipeline.
 */

/** A row as returned by the source; column name → value */
export type SourceRow = Record<string, unknown>;

/** Parameterized statement (`$1`, `$2`, … placeholders) */
export interface SourceQuery {
  text: string;
  values?: unknown[];
}

export interface QueryExecutor {
  query<Row extends SourceRow>(query: SourceQuery): Promise<Row[]>;
  /** Run a mutation; resolves with the affected row count once committed */
  execute(query: SourceQuery): Promise<number>;
}

/** A QueryExecutor the application owns and probes for readiness */
export interface SourceExecutor extends QueryExecutor {
  ping(): Promise<void>;
  close(): Promise<void>;
}

export interface Codec<T> {
  encode(value: T): Buffer;
  decode(payload: Buffer): T;
}

export interface PipelineConfig {
  /** Extra attempts for an invalidation failing with a transient store error */
  invalidateRetries: number;
  invalidateRetryDelayMs: number;
  /** Serve reads from the source when the cache store errors */
  bypassOnError: boolean;
}

export interface ReadThroughOptions {
  /** Cache rows fetched on a miss (default true); false only falls back to the source */
  populate?: boolean;
}

export interface PopulateResult<Row> {
  rows: Row[];
  accepted: number;
  rejected: number;
  failed: number;
}
