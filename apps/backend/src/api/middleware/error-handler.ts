import type { NextFunction, Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { ZodError } from 'zod';
import { logger } from '../../lib/logger.js';
import { TubePulseError } from '../../lib/errors.js';

/**
 * HTTP status for each error code of the TubePulse taxonomy.
 */
const STATUS_BY_CODE: Record<string, StatusCodes> = {
  NOT_FOUND: StatusCodes.NOT_FOUND,
  VALIDATION_ERROR: StatusCodes.BAD_REQUEST,
  RATE_LIMIT: StatusCodes.TOO_MANY_REQUESTS,
  UPSTREAM_UNAVAILABLE: StatusCodes.SERVICE_UNAVAILABLE,
  STORAGE_ERROR: StatusCodes.SERVICE_UNAVAILABLE
};

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction) {
  let status: number = StatusCodes.INTERNAL_SERVER_ERROR;
  let code = 'INTERNAL_ERROR';
  let message = 'Internal server error';
  let details: unknown;

  if (error instanceof TubePulseError) {
    status = STATUS_BY_CODE[error.code] ?? StatusCodes.INTERNAL_SERVER_ERROR;
    code = error.code;
    message = error.message;
    details = error.details;
  } else if (error instanceof ZodError) {
    status = StatusCodes.BAD_REQUEST;
    code = 'VALIDATION_ERROR';
    message = 'Invalid request parameters';
    details = error.flatten();
  }

  if (status >= 500) {
    logger.error({ error, requestId: req.id }, 'Unhandled error');
  } else {
    logger.warn({ error, requestId: req.id }, 'Handled error');
  }

  res.status(status).json({ success: false, error: message, code, details });
}
