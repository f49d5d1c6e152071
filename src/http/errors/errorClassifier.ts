// src/http/errors/errorClassifier.ts

/**
 * Error classifier
 *
 * Maps any failure raised below the HTTP boundary to exactly one
 * ClassifiedError. The table is closed: anything not recognised is Internal,
 * and Internal never carries the cause's text in its public message.
 */

import type { Logger } from 'pino';

import { BusinessCode, ErrorKind } from '../envelope/BusinessCode';
import { ClassifiedError, classified, isClassifiedError } from './ClassifiedError';
import {
  AuthenticationFailure,
  AuthenticationFailureReason,
  PermissionDenied,
  PersistenceUnavailableError,
  RecordNotFoundError,
  UniqueConstraintViolation,
  ValidationFailure,
  ValidationReason,
} from '../../shared/errors/DomainErrors';

const VALIDATION_CODES: Record<ValidationReason, BusinessCode> = {
  malformed: BusinessCode.BadRequest,
  invalid: BusinessCode.ValidationError,
  param: BusinessCode.ParamError,
};

const AUTHENTICATION_CODES: Record<AuthenticationFailureReason, BusinessCode> = {
  missing: BusinessCode.Unauthorized,
  credentials: BusinessCode.Unauthorized,
  expired: BusinessCode.TokenExpired,
  invalid: BusinessCode.TokenInvalid,
};

const BODY_PARSER_MESSAGES: Record<string, string> = {
  'entity.parse.failed': 'Malformed JSON body',
  'entity.too.large': 'Request body too large',
  'entity.verify.failed': 'Request body rejected',
  'encoding.unsupported': 'Unsupported content encoding',
  'charset.unsupported': 'Unsupported charset',
};

type BodyParserError = {
  type: string;
  status: number;
};

/**
 * body-parser rejects a request before any route runs; its errors carry a
 * string `type` and a 4xx `status`.
 */
function asBodyParserError(err: unknown): BodyParserError | undefined {
  if (!(err instanceof Error) || !('type' in err) || !('status' in err)) return undefined;

  const { type, status } = err;
  if (typeof type !== 'string' || typeof status !== 'number') return undefined;
  if (status < 400 || status >= 500) return undefined;

  return { type, status };
}

export function classifyError(err: unknown): ClassifiedError {
  if (isClassifiedError(err)) return err;

  if (err instanceof ValidationFailure) {
    return classified({
      kind: 'Validation',
      code: VALIDATION_CODES[err.reason],
      publicMessage: err.message,
      cause: err,
      details: err.issues,
    });
  }

  if (err instanceof AuthenticationFailure) {
    return classified({
      kind: 'Unauthorized',
      code: AUTHENTICATION_CODES[err.reason],
      publicMessage: err.message,
      cause: err,
    });
  }

  if (err instanceof PermissionDenied) {
    return classified({
      kind: 'Forbidden',
      code: BusinessCode.AccessDenied,
      publicMessage: err.message,
      cause: err,
    });
  }

  if (err instanceof RecordNotFoundError) {
    return classified({
      kind: 'NotFound',
      code: BusinessCode.ResourceNotFound,
      publicMessage: `${err.entity} not found`,
      cause: err,
    });
  }

  if (err instanceof UniqueConstraintViolation) {
    return classified({
      kind: 'Conflict',
      code: BusinessCode.DuplicateResource,
      publicMessage: err.message,
      cause: err,
    });
  }

  if (err instanceof PersistenceUnavailableError) {
    return classified({
      kind: 'Internal',
      code: BusinessCode.DatabaseError,
      publicMessage: err.message,
      cause: err,
    });
  }

  const bodyParserError = asBodyParserError(err);
  if (bodyParserError) {
    return classified({
      kind: 'Validation',
      code: BusinessCode.BadRequest,
      publicMessage: BODY_PARSER_MESSAGES[bodyParserError.type] ?? 'Invalid request body',
      cause: err,
    });
  }

  return classified({
    kind: 'Internal',
    code: BusinessCode.InternalError,
    publicMessage: 'unclassified failure',
    cause: err,
  });
}

const LOG_LEVELS: Record<ErrorKind, 'error' | 'warn' | 'info'> = {
  Internal: 'error',
  Unauthorized: 'warn',
  Forbidden: 'warn',
  Validation: 'info',
  NotFound: 'info',
  Conflict: 'info',
};

export type ErrorReportLogger = Pick<Logger, 'error' | 'warn' | 'info'>;

/**
 * The single observability point for failures: one structured event per
 * classified error, carrying the full internal cause.
 */
export function reportClassifiedError(
  log: ErrorReportLogger,
  requestId: string,
  error: ClassifiedError,
): void {
  const level = LOG_LEVELS[error.kind];

  log[level](
    {
      requestId,
      kind: error.kind,
      code: error.businessCode,
      status: error.transportStatus,
      err: error.internalCause,
      ...(error.details ? { issues: error.details } : {}),
    },
    error.kind === 'Internal' ? 'Request failed with internal error' : 'Request rejected',
  );
}
