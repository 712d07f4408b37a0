/**
 * Atomic Stores
 *
 * Redis-backed (server-side Lua scripts) and in-process.
 * Both realize the same per-key linearizable read-modify-write.
 */

import * as fs from 'fs';
import * as path from 'path';
import Redis, { Result } from 'ioredis';
import { Mutex } from 'async-mutex';
import { AtomicOperation, AtomicStore, CacheRecord, PersistedFields, Retention, ScriptName, StoreConfig } from './types';
import { decodeRecord, encodeRecord } from './record';
import { toStoreError } from './errors';
import { logger } from '../observability/logger';

declare module 'ioredis' {
  interface RedisCommander<Context> {
    coherentSet(key: string, ...args: Array<string | Buffer>): Result<number, Context>;
    coherentInvalidate(key: string, ...args: Array<string | Buffer>): Result<number, Context>;
    coherentGetBuffer(key: string, ...args: Array<string | Buffer>): Result<Buffer | null, Context>;
  }
}

const DEFAULT_CONFIG: StoreConfig = {
  sweepIntervalMs: 60_000,
};

// Resolve from project root (2 levels up from dist/cache/ or src/cache/)
const LUA_DIR = path.resolve(__dirname, '..', '..', 'lua');

const SCRIPT_NAMES: ScriptName[] = ['coherentSet', 'coherentInvalidate', 'coherentGet'];

const SCRIPT_FILES: Record<ScriptName, string> = {
  coherentSet: 'set.lua',
  coherentInvalidate: 'invalidate.lua',
  coherentGet: 'get.lua',
};

export function loadScripts(dir: string = LUA_DIR): Record<ScriptName, string> {
  const common = fs.readFileSync(path.join(dir, 'common.lua'), 'utf-8');
  const read = (file: string) => `${common}\n${fs.readFileSync(path.join(dir, file), 'utf-8')}`;
  return {
    coherentSet: read(SCRIPT_FILES.coherentSet),
    coherentInvalidate: read(SCRIPT_FILES.coherentInvalidate),
    coherentGet: read(SCRIPT_FILES.coherentGet),
  };
}

// ───── Redis Implementation ─────────────────────────────────────

export class RedisAtomicStore implements AtomicStore {
  readonly kind = 'redis';
  private readonly log = logger.child({ component: 'store-redis' });

  constructor(
    private readonly redis: Redis,
    scripts: Record<ScriptName, string> = loadScripts(),
  ) {
    // EVALSHA with transparent SCRIPT LOAD on NOSCRIPT
    for (const name of SCRIPT_NAMES) {
      this.redis.defineCommand(name, { numberOfKeys: 1, lua: scripts[name] });
    }
  }

  async executeAtomic<R>(key: string, operation: AtomicOperation<R>): Promise<R> {
    let reply: unknown;
    try {
      reply = await this.call(operation.script, key, operation.args);
    } catch (err) {
      throw toStoreError(err, key);
    }
    return operation.fromReply(reply);
  }

  async inspect(key: string): Promise<CacheRecord | undefined> {
    let raw: Record<string, Buffer>;
    try {
      raw = await this.redis.hgetallBuffer(key);
    } catch (err) {
      throw toStoreError(err, key);
    }
    return decodeRecord(raw, key);
  }

  async ping(): Promise<void> {
    try {
      await this.redis.ping();
    } catch (err) {
      throw toStoreError(err, 'PING');
    }
  }

  /** Ping until Redis answers, pausing `delayMs` between attempts */
  async waitUntilOnline(retries: number, delayMs = 1000): Promise<void> {
    for (let attempt = 1; attempt <= retries; attempt++) {
      try {
        await this.ping();
        return;
      } catch (err) {
        this.log.warn({ err, attempt, retries }, 'Redis not reachable yet');
        if (attempt < retries) await sleep(delayMs);
      }
    }
    throw toStoreError(new Error('Redis is not online'), 'PING');
  }

  /** The client belongs to the caller; nothing to release here */
  async close(): Promise<void> {}

  private call(script: ScriptName, key: string, args: Array<string | Buffer>): Promise<unknown> {
    switch (script) {
      case 'coherentSet':
        return this.redis.coherentSet(key, ...args);
      case 'coherentInvalidate':
        return this.redis.coherentInvalidate(key, ...args);
      case 'coherentGet':
        return this.redis.coherentGetBuffer(key, ...args);
    }
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

interface MemoryEntry {
  fields: PersistedFields;
  expiresAt?: number;
}

/**
 * Single-process store. One global lock serializes every read-modify-write;
 * contention is expected to be low.
 */
export class MemoryAtomicStore implements AtomicStore {
  readonly kind = 'memory';
  private readonly entries = new Map<string, MemoryEntry>();
  private readonly mutex = new Mutex();
  private readonly sweepTimer?: NodeJS.Timeout;

  constructor(
    config: StoreConfig = DEFAULT_CONFIG,
    private readonly now: () => number = Date.now,
  ) {
    if (config.sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => this.sweep(), config.sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  async executeAtomic<R>(key: string, operation: AtomicOperation<R>): Promise<R> {
    return this.mutex.runExclusive(() => {
      const current = decodeRecord(this.live(key)?.fields ?? {}, key);
      const step = operation.apply(current);
      if (step.write) {
        this.save(key, step.write.record, step.write.retention);
      }
      return step.result;
    });
  }

  async inspect(key: string): Promise<CacheRecord | undefined> {
    return this.mutex.runExclusive(() => decodeRecord(this.live(key)?.fields ?? {}, key));
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.entries.clear();
  }

  /** Live (unexpired) key count */
  size(): number {
    this.sweep();
    return this.entries.size;
  }

  /** Seconds until the key expires; -1 without expiry, -2 when absent (as Redis TTL) */
  ttl(key: string): number {
    const entry = this.live(key);
    if (!entry) return -2;
    if (entry.expiresAt === undefined) return -1;
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }

  rawFields(key: string): PersistedFields | undefined {
    const entry = this.live(key);
    return entry ? { ...entry.fields } : undefined;
  }

  /** Write a hash verbatim, bypassing the protocol (diagnostics and fault injection) */
  putRawFields(key: string, fields: PersistedFields, ttlSeconds?: number): void {
    this.entries.set(key, {
      fields: { ...fields },
      expiresAt: ttlSeconds === undefined ? undefined : this.now() + ttlSeconds * 1000,
    });
  }

  private live(key: string): MemoryEntry | undefined {
    const entry = this.entries.get(key);
    if (entry?.expiresAt !== undefined && this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private save(key: string, record: CacheRecord, retention: Retention): void {
    const fields = encodeRecord(record);
    if (fields.v) fields.v = Buffer.from(fields.v);

    let expiresAt: number | undefined;
    if (retention.mode === 'expire') {
      expiresAt = this.now() + retention.seconds * 1000;
    } else if (retention.mode === 'keep') {
      expiresAt = this.entries.get(key)?.expiresAt;
    }
    this.entries.set(key, { fields, expiresAt });
  }

  private sweep(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== undefined && now >= entry.expiresAt) this.entries.delete(key);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
