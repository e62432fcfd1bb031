import type { NextFunction, Request, Response } from 'express';
import { v4 as uuid } from 'uuid';

/**
 * Tag each request with a correlation id, reusing an incoming `x-request-id`.
 */
export function requestContext(req: Request, res: Response, next: NextFunction) {
  const header = req.headers['x-request-id'];
  const requestId = (Array.isArray(header) ? header[0] : header) || uuid();
  req.id = requestId;
  res.setHeader('x-request-id', requestId);
  next();
}
