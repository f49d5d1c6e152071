// src/http/pipeline/sendEnvelope.ts

/**
 * The only place response bodies are written.
 *
 * Success outcomes and classified errors both leave through here, so the
 * envelope shape and the failure log line cannot drift apart between routes,
 * the 404 fallback and the global error handler.
 */

import type { Response } from 'express';

import { successTransportStatus } from '../envelope/BusinessCode';
import {
  buildFailureEnvelope,
  buildPaginatedEnvelope,
  buildSuccessEnvelope,
} from '../envelope/envelope';
import type { ClassifiedError } from '../errors/ClassifiedError';
import { classifyError, reportClassifiedError } from '../errors/errorClassifier';
import type { RequestScope } from '../context/requestContext';
import type { RouteOutcome } from './routeOutcome';

export function sendFailure(res: Response, scope: RequestScope, error: ClassifiedError): Response {
  reportClassifiedError(scope.log, scope.requestId, error);

  return res.status(error.transportStatus).json(buildFailureEnvelope({ requestId: scope.requestId, error }));
}

export function sendOutcome<T>(res: Response, scope: RequestScope, outcome: RouteOutcome<T>): Response {
  try {
    if (outcome.type === 'page') {
      const envelope = buildPaginatedEnvelope({
        requestId: scope.requestId,
        items: outcome.items,
        total: outcome.total,
        page: outcome.page,
        pageSize: outcome.pageSize,
      });
      return res.status(successTransportStatus(envelope.code)).json(envelope);
    }

    const envelope = buildSuccessEnvelope({
      requestId: scope.requestId,
      data: outcome.data,
      code: outcome.code,
      message: outcome.message,
    });
    return res.status(successTransportStatus(envelope.code)).json(envelope);
  } catch (err) {
    // A handler produced an outcome the codec refuses (pagination bounds, non-success code)
    return sendFailure(res, scope, classifyError(err));
  }
}
