import pino, { type Logger } from 'pino';
import { config } from './index.js';

const SERVICE = 'session-flow';

/**
 * Root logger. Every line carries the service and environment; failures are
 * logged under `err`, which may hold a non-Error thrown value.
 */
export const logger: Logger = pino({
  level: config.logging.level,
  base: { service: SERVICE, env: config.nodeEnv },
  serializers: { err: pino.stdSerializers.err },
  transport: config.nodeEnv === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'service,env',
    },
  } : undefined,
});

export function createChildLogger(module: string, bindings: Record<string, unknown> = {}): Logger {
  return logger.child({ ...bindings, module });
}
