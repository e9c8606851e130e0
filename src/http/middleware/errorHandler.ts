// src/http/middleware/errorHandler.ts

/**
 * Global error handler
 *
 * - Converts DTO validation errors and malformed JSON bodies into HTTP 400
 * - Converts unknown errors into HTTP 500
 * - Always returns the standard error envelope with the correlationId
 */

import type { NextFunction, Request, Response } from 'express';
import { buildErrorEnvelope } from '../errors/errorEnvelope';

import { ToolCallDtoValidationError } from '../../dispatch/dto/ToolCallDto';
import { logger } from '../../shared/logging/Logger';

/**
 * body-parser marks JSON syntax errors with type "entity.parse.failed".
 */
function isBodyParseError(err: unknown): err is Error & { type: string } {
  return err instanceof Error && 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): Response {
  // 400: request payload validation failures
  if (err instanceof ToolCallDtoValidationError) {
    logger.debug(
      { correlationId: req.correlationId, issues: err.issues },
      'Tool call payload validation failed',
    );

    return res.status(400).json(
      buildErrorEnvelope({
        code: 'VALIDATION_ERROR',
        message: err.message,
        correlationId: req.correlationId,
        issues: err.issues,
      }),
    );
  }

  if (isBodyParseError(err)) {
    return res.status(400).json(
      buildErrorEnvelope({
        code: 'VALIDATION_ERROR',
        message: 'Request body is not valid JSON.',
        correlationId: req.correlationId,
      }),
    );
  }

  // 500: unknown/unexpected failures
  logger.error({ correlationId: req.correlationId, err }, 'Unhandled error in request pipeline');

  return res.status(500).json(
    buildErrorEnvelope({
      code: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred.',
      correlationId: req.correlationId,
    }),
  );
}
