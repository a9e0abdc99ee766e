import pino from 'pino';
import { config } from '../config/env';

export const logger = pino({
  level: config.logging.level,
  transport: config.server.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname'
        }
      }
    : undefined,
  base: {
    service: 'cafe-billing',
    env: config.server.nodeEnv
  }
});

/**
 * Logger bound to one module of the engine, e.g. `{ module: 'orders' }`
 */
export function createChildLogger(context: { module: string } & Record<string, unknown>) {
  return logger.child(context);
}
