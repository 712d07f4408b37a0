import Fastify, { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { env } from './config/env';
import { logger } from './observability/logger';
import { AtomicStore } from './cache/types';
import { MemoryAtomicStore, RedisAtomicStore } from './cache/atomic-store';
import { CoherenceProtocol } from './cache/coherence-protocol';
import { Clock, SystemClock } from './cache/clock';
import { DependencyHealthManager } from './resilience/dependency-health';
import { PgQueryExecutor, createPgPool } from './pipeline/pg-executor';
import { PopulationPipeline } from './pipeline/population-pipeline';
import { jsonCodec } from './pipeline/codec';
import { Codec, SourceExecutor, SourceRow } from './pipeline/types';
import { registerHealthRoutes } from './health/health-routes';
import { registerAdminRoutes } from './admin/admin-routes';

export interface AppContext {
  app: FastifyInstance;
  store: AtomicStore;
  protocol: CoherenceProtocol;
  health: DependencyHealthManager;
  clock: Clock;
  redis?: Redis;
  source?: SourceExecutor;
}

/** Collaborators tests and embedding hosts can supply instead of env-built ones */
export interface AppOverrides {
  store?: AtomicStore;
  source?: SourceExecutor;
  clock?: Clock;
  adminApiKey?: string;
}

async function buildStore(): Promise<{ store: AtomicStore; redis?: Redis }> {
  if (env.store.kind === 'memory') {
    logger.info('Atomic store: In-memory');
    return { store: new MemoryAtomicStore({ sweepIntervalMs: env.store.sweepIntervalMs }) };
  }

  const redis = new Redis(env.redis.url, { maxRetriesPerRequest: 3 });
  redis.on('error', (err) => logger.warn({ err }, 'Redis connection error'));
  const store = new RedisAtomicStore(redis);
  await store.waitUntilOnline(env.store.connectRetries);
  logger.info({ url: env.redis.url }, 'Atomic store: Redis-backed (Lua scripts)');
  return { store, redis };
}

export async function buildApp(overrides: AppOverrides = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
  });

  const { store, redis } = overrides.store ? { store: overrides.store, redis: undefined } : await buildStore();

  const protocol = new CoherenceProtocol(store, {
    keyPrefix: env.cache.keyPrefix,
    tombstoneTtlSeconds: env.cache.tombstoneTtlSeconds,
  });
  const health = new DependencyHealthManager(env.resilience.failureThreshold, env.resilience.circuitResetMs);
  const clock = overrides.clock ?? new SystemClock();

  const source: SourceExecutor | undefined = overrides.source
    ?? (env.database.url ? new PgQueryExecutor(createPgPool(env.database.url, env.database.poolSize)) : undefined);

  app.addHook('onResponse', (req, reply, done) => {
    logger.debug({ method: req.method, url: req.url, status: reply.statusCode }, 'request');
    done();
  });

  registerHealthRoutes(app, {
    store,
    protocol,
    health,
    pingSource: source ? () => source.ping() : undefined,
  });

  const adminApiKey = overrides.adminApiKey ?? env.security.adminApiKey;
  if (adminApiKey) {
    registerAdminRoutes(app, protocol, clock, adminApiKey);
  } else {
    logger.info('ADMIN_API_KEY not set; admin routes disabled');
  }

  app.addHook('onClose', async () => {
    await store.close();
    if (source) await source.close();
  });

  return { app, store, protocol, health, clock, redis, source };
}

/**
 * Read-through / write-through pipeline over the app's protocol and source.
 * Rows are stored as JSON unless another codec is given.
 */
export function createPipeline<Row extends SourceRow>(
  ctx: AppContext,
  codec: Codec<Row> = jsonCodec<Row>(),
): PopulationPipeline<Row> {
  if (!ctx.source) {
    throw new Error('DATABASE_URL is required for the population pipeline');
  }
  return new PopulationPipeline<Row>(
    { protocol: ctx.protocol, source: ctx.source, codec, clock: ctx.clock, health: ctx.health },
    {
      invalidateRetries: env.cache.invalidateRetries,
      invalidateRetryDelayMs: env.cache.invalidateRetryDelayMs,
      bypassOnError: env.cache.bypassOnError,
    },
  );
}
