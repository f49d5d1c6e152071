// src/http/middleware/notFound.ts

import type { Request, RequestHandler, Response } from 'express';

import { BusinessCode } from '../envelope/BusinessCode';
import { classified } from '../errors/ClassifiedError';
import { requestScope } from '../context/requestContext';
import { sendFailure } from '../pipeline/sendEnvelope';
import { logger as defaultLogger, type AppLogger } from '../../shared/logging/Logger';

export function createNotFoundHandler(baseLogger: AppLogger = defaultLogger): RequestHandler {
  return (req: Request, res: Response): void => {
    sendFailure(
      res,
      requestScope(req, baseLogger),
      classified({
        kind: 'NotFound',
        code: BusinessCode.NotFound,
        publicMessage: 'Route not found',
        cause: new Error(`No route for ${req.method} ${req.path}`),
      }),
    );
  };
}
