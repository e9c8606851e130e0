// src/http/middleware/correlationId.ts

/**
 * Correlation ID middleware
 *
 * Rules:
 * 1) Prefer header: x-correlation-id
 * 2) Otherwise generate a UUID
 *
 * Outputs:
 * - req.correlationId (typed via module augmentation)
 * - response header x-correlation-id
 */

import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';

const MAX_CORRELATION_ID_LENGTH = 128;

export function correlationIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const headerId = req.header('x-correlation-id')?.trim();

  const correlationId =
    headerId && headerId.length > 0 && headerId.length <= MAX_CORRELATION_ID_LENGTH
      ? headerId
      : randomUUID();

  req.correlationId = correlationId;
  res.setHeader('x-correlation-id', correlationId);

  next();
}
