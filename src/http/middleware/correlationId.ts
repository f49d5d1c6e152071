// src/http/middleware/correlationId.ts

/**
 * Correlation ID middleware
 *
 * Purpose:
 * - Give every request a fresh correlation id for log/response joins.
 *
 * Rules:
 * 1) Always generate a new UUID; caller-supplied ids are ignored
 * 2) Set the response header before any other stage can write
 *
 * Outputs:
 * - req.requestId and req.log (typed via module augmentation)
 * - response header X-Request-Id
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { randomUUID } from 'crypto';

import { REQUEST_ID_HEADER } from '../context/requestContext';
import { logger as defaultLogger, type AppLogger } from '../../shared/logging/Logger';

export function createCorrelationIdMiddleware(
  baseLogger: AppLogger = defaultLogger,
  generateId: () => string = randomUUID,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const requestId = generateId();

    req.requestId = requestId;
    req.log = baseLogger.child({ requestId });
    res.setHeader(REQUEST_ID_HEADER, requestId);

    next();
  };
}
