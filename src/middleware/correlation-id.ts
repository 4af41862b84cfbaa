import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';

type Context = {
  correlationId: string;
};

const storage = new AsyncLocalStorage<Context>();
export const CORRELATION_HEADER = 'x-correlation-id';
const MAX_LENGTH = 128;

export function correlationIdMiddleware(req: Request, res: Response, next: NextFunction) {
  const correlationId = sanitizeCorrelationId(req.header(CORRELATION_HEADER)) ?? randomUUID();
  res.setHeader(CORRELATION_HEADER, correlationId);
  runWithCorrelationId(correlationId, next);
}

export function runWithCorrelationId<T>(correlationId: string, fn: () => T): T {
  return storage.run({ correlationId }, fn);
}

function sanitizeCorrelationId(value?: string | null): string | null {
  const trimmed = value?.trim();
  if (!trimmed || trimmed.length > MAX_LENGTH) {
    return null;
  }
  return trimmed;
}

export function getCorrelationId(): string | undefined {
  return storage.getStore()?.correlationId;
}
