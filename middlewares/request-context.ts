import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      startTime?: number;
    }
  }
}

/**
 * Tags each request with an id (echoed as X-Request-ID) and a start time.
 * An inbound X-Request-ID from a trusted proxy is kept.
 */
export const requestContext = (req: Request, res: Response, next: NextFunction) => {
  const inbound = req.get('x-request-id');
  req.requestId = inbound && inbound.length <= 128 ? inbound : randomUUID();
  req.startTime = Date.now();

  res.setHeader('X-Request-ID', req.requestId);

  next();
};
