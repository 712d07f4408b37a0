import { FastifyInstance } from 'fastify';
import { AtomicStore } from '../cache/types';
import { CoherenceProtocol } from '../cache/coherence-protocol';
import { DependencyHealthManager } from '../resilience/dependency-health';

export interface HealthDeps {
  store: AtomicStore;
  protocol: CoherenceProtocol;
  health: DependencyHealthManager;
  /** Source-of-truth probe; readiness skips the source when absent */
  pingSource?: () => Promise<void>;
}

export function registerHealthRoutes(app: FastifyInstance, deps: HealthDeps): void {
  /** Liveness probe — always returns 200 if the process is running */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness probe — pings the cache store and the source of truth */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: string; latencyMs?: number }> = {};

    const storeStart = Date.now();
    try {
      await deps.store.ping();
      checks.store = { status: 'ok', latencyMs: Date.now() - storeStart };
    } catch {
      checks.store = { status: 'error', latencyMs: Date.now() - storeStart };
    }

    if (deps.pingSource) {
      const sourceStart = Date.now();
      try {
        await deps.pingSource();
        checks.source = { status: 'ok', latencyMs: Date.now() - sourceStart };
      } catch {
        checks.source = { status: 'error', latencyMs: Date.now() - sourceStart };
      }
    } else {
      checks.source = { status: 'skipped' };
    }

    for (const [name, health] of Object.entries(deps.health.getHealthSummary())) {
      checks[`circuit_${name}`] = { status: health.circuitOpen ? 'error' : 'ok' };
    }

    const allOk = Object.values(checks).every((c) => c.status === 'ok' || c.status === 'skipped');
    const statusCode = allOk ? 200 : 503;

    return reply.status(statusCode).send({
      status: allOk ? 'ready' : 'not_ready',
      store: deps.store.kind,
      checks,
      degradationLevel: deps.health.getDegradationLevel(),
      timestamp: new Date().toISOString(),
    });
  });

  /** Protocol outcome counters since start */
  app.get('/stats', async (_req, reply) => {
    return reply.send({ store: deps.store.kind, ...deps.protocol.stats() });
  });
}
