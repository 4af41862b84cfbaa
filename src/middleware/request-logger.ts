import pinoHttp from 'pino-http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { logger } from '../logging/logger';
import { getCorrelationId } from './correlation-id';

function resolveLogLevel(res: ServerResponse<IncomingMessage>, error: Error | undefined): 'error' | 'warn' | 'info' {
  if (error) {
    return 'error';
  }

  const status = res.statusCode ?? 0;
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

export const requestLogger = pinoHttp({
  logger,
  customLogLevel: (_req, res, error) => resolveLogLevel(res, error),
  customProps: () => {
    const correlationId = getCorrelationId();
    return correlationId ? { correlationId } : {};
  },
  // Health probes are frequent and carry no information.
  autoLogging: {
    ignore: (req) => req.url === '/healthz',
  },
  redact: {
    paths: ['req.headers.authorization', 'req.headers.cookie'],
  },
});
