import pino from 'pino';
import { env } from '../config/env';

/** Process-wide logger; modules derive `logger.child({ component })` */
export const logger = pino({
  level: env.logLevel,
  base: { service: 'freshcache', pid: process.pid },
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  ...(env.nodeEnv === 'development'
    ? { transport: { target: 'pino/file', options: { destination: 1 } } }
    : {}),
});
