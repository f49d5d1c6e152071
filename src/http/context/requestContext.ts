// src/http/context/requestContext.ts

/**
 * Request-scoped values attached by the pipeline middleware.
 *
 * Nothing here is shared between requests: each value is created when the
 * request enters and dropped with it.
 */

import type { Request } from 'express';
import type { AppLogger } from '../../shared/logging/Logger';

declare global {
  namespace Express {
    interface Request {
      /** Correlation id, set by correlationIdMiddleware. */
      requestId?: string;
      /** Child logger bound to requestId. */
      log?: AppLogger;
    }
  }
}

export const REQUEST_ID_HEADER = 'X-Request-Id';

export type RequestScope = {
  requestId: string;
  log: AppLogger;
};

/**
 * Read the values correlationIdMiddleware attached. Requests that bypassed
 * the middleware (a mis-wired router) are reported with a placeholder id
 * rather than crashing the error path.
 */
export function requestScope(req: Request, fallbackLog: AppLogger): RequestScope {
  const requestId = req.requestId ?? 'unassigned';
  return {
    requestId,
    log: req.log ?? fallbackLog.child({ requestId }),
  };
}
