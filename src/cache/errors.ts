/**
 * Cache Error Taxonomy
 *
 * `miss` and `rejected` are successful outcomes; everything here is a failure
 * and is surfaced to the caller.
 */

export class CacheError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Connection / timeout failure. Safe to retry with the same arguments. */
export class TransientStoreError extends CacheError {
  constructor(
    message: string,
    readonly key?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Persisted record does not parse. Never retried automatically. */
export class StoreCorruptionError extends CacheError {
  constructor(
    message: string,
    readonly key?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Value could not be encoded or decoded. Fatal for that call only. */
export class SerializationError extends CacheError {}

/** A source mutation committed but some keys could not be invalidated */
export class InvalidationError extends CacheError {
  constructor(
    readonly keys: string[],
    options?: { cause?: unknown },
  ) {
    super(`Failed to invalidate ${keys.length} key(s): ${keys.join(', ')}`, options);
  }
}

export function isTransient(err: unknown): err is TransientStoreError {
  return err instanceof TransientStoreError;
}

const CORRUPTION_MARKERS = ['CORRUPT', 'WRONGTYPE'];

/**
 * Map a raw store failure onto the taxonomy.
 * Script error replies carrying a corruption marker become StoreCorruptionError;
 * any other failure from the transport is treated as transient.
 */
export function toStoreError(err: unknown, key: string): CacheError {
  if (err instanceof CacheError) return err;
  const message = err instanceof Error ? err.message : String(err);
  const isReply = err instanceof Error && err.name === 'ReplyError';
  if (isReply && CORRUPTION_MARKERS.some((marker) => message.includes(marker))) {
    return new StoreCorruptionError(`Corrupt record for ${key}: ${message}`, key, { cause: err });
  }
  return new TransientStoreError(`Store call failed for ${key}: ${message}`, key, { cause: err });
}
