// src/http/middleware/errorHandler.ts

/**
 * Global error handler
 *
 * Catches whatever escapes the route pipeline (failures in app-level
 * middleware) and answers with the standard failure envelope.
 * Route handlers themselves never reach here: the pipeline classifies their
 * failures in place.
 */

import type { ErrorRequestHandler, NextFunction, Request, Response } from 'express';

import { requestScope } from '../context/requestContext';
import { classifyError } from '../errors/errorClassifier';
import { sendFailure } from '../pipeline/sendEnvelope';
import { logger as defaultLogger, type AppLogger } from '../../shared/logging/Logger';

export function createErrorHandler(baseLogger: AppLogger = defaultLogger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    // Too late to send an envelope; let Express close the connection
    if (res.headersSent) {
      next(err);
      return;
    }

    sendFailure(res, requestScope(req, baseLogger), classifyError(err));
  };
}
