import pino from 'pino';

/**
 * Creates the root logger.
 * In production: JSON lines for log shippers
 * In development: pretty-printed with colors
 */
const createLogger = () => {
  const isDevelopment = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

  return pino({
    name: 'bgh-udp-bridge',
    level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : isDevelopment ? 'debug' : 'info'),
    transport: isDevelopment ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    } : undefined,
  });
};

/**
 * Global logger instance. Components take a child bound to their name.
 *
 * @example
 * import { logger } from '@/utils/logger';
 *
 * const log = logger.child({ component: 'UdpTransport' });
 * log.info({ port }, 'Listening for broadcasts');
 * log.error({ err }, 'Send failed');
 */
export const logger = createLogger();
