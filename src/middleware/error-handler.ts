import type { NextFunction, Request, Response } from 'express';
import { isAppError } from '../lib/errors';
import { logger } from '../logging/logger';

// body-parser reports oversized or unreadable bodies with a status and a type.
function isBodyParserError(err: unknown): err is { status: number; type: string; message?: string } {
  return (
    typeof err === 'object' &&
    err !== null &&
    'status' in err &&
    typeof err.status === 'number' &&
    'type' in err &&
    typeof err.type === 'string'
  );
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (isBodyParserError(err)) {
    logger.warn({ err }, 'Rejected request body');
    return res.status(err.status).json({
      status: err.status,
      code: err.type,
      message: err.message ?? 'Invalid request body.',
    });
  }

  if (isAppError(err)) {
    logger.error({ err }, 'Application error handled');
    return res.status(err.status).json({
      status: err.status,
      code: err.code,
      message: err.message,
      details: err.details,
    });
  }

  logger.error({ err }, 'Unhandled error');
  return res.status(500).json({
    status: 500,
    code: 'internal_error',
    message: 'Unexpected error occurred.',
  });
}
