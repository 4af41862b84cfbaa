import pino from 'pino';
import type { Logger } from 'pino';
import { config } from '../config';

export const logger = pino({
  level: config.logging.level,
  base: {
    service: config.serviceName,
    version: config.buildVersion,
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
  transport:
    config.env === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname,service,version',
          },
        }
      : undefined,
});

/** Child logger tagged with the framework component that emits the record. */
export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
