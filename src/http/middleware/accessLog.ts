// src/http/middleware/accessLog.ts

/**
 * Access log: one line when a request enters, one when its response is sent.
 * The requestId bound by correlationIdMiddleware joins the two.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';

import { requestScope } from '../context/requestContext';
import { logger as defaultLogger, type AppLogger } from '../../shared/logging/Logger';

export function createAccessLogMiddleware(baseLogger: AppLogger = defaultLogger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const { log } = requestScope(req, baseLogger);
    const startedAt = process.hrtime.bigint();
    const method = req.method;
    const path = req.originalUrl.split('?')[0];

    const latencyMs = (): number => Number(process.hrtime.bigint() - startedAt) / 1e6;

    log.info({ method, path }, 'Request started');

    res.on('finish', () => {
      log.info({ method, path, status: res.statusCode, latencyMs: latencyMs() }, 'Response sent');
    });

    res.on('close', () => {
      if (!res.writableFinished) {
        log.warn({ method, path, latencyMs: latencyMs() }, 'Request aborted');
      }
    });

    next();
  };
}
