import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { CoherenceProtocol } from '../cache/coherence-protocol';
import { Clock } from '../cache/clock';
import { isFresh } from '../cache/record';
import { formatTimestamp } from '../cache/timestamp';
import { CacheError, StoreCorruptionError } from '../cache/errors';
import { logger } from '../observability/logger';

interface KeyParams {
  key: string;
}

function verifyAdminKey(adminApiKey: string, req: FastifyRequest, reply: FastifyReply): boolean {
  const key = req.headers['x-admin-api-key'];
  if (typeof key !== 'string' || key !== adminApiKey) {
    reply.status(403).send({ error: 'Forbidden' });
    return false;
  }
  return true;
}

function sendStoreError(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof StoreCorruptionError) {
    return reply.status(500).send({ error: 'corrupt_record', message: err.message });
  }
  if (err instanceof CacheError) {
    return reply.status(503).send({ error: 'store_unavailable', message: err.message });
  }
  throw err;
}

export function registerAdminRoutes(
  app: FastifyInstance,
  protocol: CoherenceProtocol,
  clock: Clock,
  adminApiKey: string,
): void {
  const log = logger.child({ component: 'admin' });

  /** Stored record with its timestamps; the payload itself is not returned */
  app.get<{ Params: KeyParams }>('/admin/records/:key', async (req, reply) => {
    if (!verifyAdminKey(adminApiKey, req, reply)) return;

    try {
      const record = await protocol.inspect(req.params.key);
      if (!record) {
        return reply.status(404).send({ key: req.params.key, exists: false });
      }
      return reply.send({
        key: req.params.key,
        exists: true,
        fresh: isFresh(record),
        writeTs: formatTimestamp(record.writeTs),
        invalidateTs: formatTimestamp(record.invalidateTs),
        valueBytes: record.value?.length ?? null,
      });
    } catch (err) {
      return sendStoreError(reply, err);
    }
  });

  /** Invalidate a key by hand, stamped with the current time */
  app.post<{ Params: KeyParams }>('/admin/records/:key/invalidate', async (req, reply) => {
    if (!verifyAdminKey(adminApiKey, req, reply)) return;

    const ts = clock.now();
    try {
      const outcome = await protocol.invalidate(req.params.key, ts);
      log.info({ key: req.params.key, ts: formatTimestamp(ts), outcome }, 'Manual invalidation');
      return reply.send({ key: req.params.key, outcome, ts: formatTimestamp(ts) });
    } catch (err) {
      return sendStoreError(reply, err);
    }
  });
}
