import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

function storeKind(key: string): 'redis' | 'memory' {
  const val = optional(key, 'memory');
  if (val !== 'redis' && val !== 'memory') {
    throw new Error(`Invalid ${key}: ${val} (expected "redis" or "memory")`);
  }
  return val;
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 3000),
  logLevel: optional('LOG_LEVEL', 'info'),

  // ───── Cache Store ─────
  store: {
    kind: storeKind('CACHE_STORE'),
    connectRetries: optionalInt('STORE_CONNECT_RETRIES', 10),
    sweepIntervalMs: optionalInt('STORE_SWEEP_INTERVAL_MS', 60_000),
  },

  redis: {
    url: optional('REDIS_URL', 'redis://localhost:6379'),
  },

  // ───── Coherence Protocol ─────
  cache: {
    keyPrefix: optional('CACHE_KEY_PREFIX', 'freshcache:'),
    tombstoneTtlSeconds: optionalInt('TOMBSTONE_TTL_SECONDS', 120),
    invalidateRetries: optionalInt('INVALIDATE_RETRIES', 3),
    invalidateRetryDelayMs: optionalInt('INVALIDATE_RETRY_DELAY_MS', 50),
    bypassOnError: optionalBool('CACHE_BYPASS_ON_ERROR', true),
  },

  // ───── Source of Truth ─────
  database: {
    url: optional('DATABASE_URL', ''),
    poolSize: optionalInt('DATABASE_POOL_SIZE', 10),
  },

  // ───── Resilience ─────
  resilience: {
    failureThreshold: optionalInt('CIRCUIT_FAILURE_THRESHOLD', 5),
    circuitResetMs: optionalInt('CIRCUIT_RESET_MS', 30_000),
  },

  security: {
    // Admin routes are not registered when empty
    adminApiKey: optional('ADMIN_API_KEY', ''),
  },
} as const;
