// src/http/errors/ClassifiedError.ts

import { BusinessCode, ERROR_RANGES, ErrorKind, TRANSPORT_STATUS, isInRange } from '../envelope/BusinessCode';
import type { ValidationIssue } from '../../shared/errors/DomainErrors';

/**
 * A failure after classification.
 *
 * Two separate message channels:
 * - publicMessage: the only text that reaches the caller
 * - internalCause: the original failure, for logs only; never serialized
 */
export type ClassifiedError = {
  readonly kind: ErrorKind;
  readonly businessCode: BusinessCode;
  readonly transportStatus: number;
  readonly publicMessage: string;
  readonly internalCause: unknown;
  readonly details?: readonly ValidationIssue[];
};

export const INTERNAL_PUBLIC_MESSAGE = 'an internal error occurred';

/**
 * Values built by `classified()`. Anything else shaped like a ClassifiedError
 * (a thrown plain object, a deserialized body) is classified from scratch.
 */
const issued = new WeakSet<object>();

export function classified(params: {
  kind: ErrorKind;
  code: BusinessCode;
  publicMessage: string;
  cause: unknown;
  details?: readonly ValidationIssue[];
}): ClassifiedError {
  if (!isInRange(params.code, ERROR_RANGES[params.kind])) {
    throw new RangeError(`Business code ${params.code} is outside the ${params.kind} range`);
  }

  const error: ClassifiedError = Object.freeze({
    kind: params.kind,
    businessCode: params.code,
    transportStatus: TRANSPORT_STATUS[params.kind],
    // Internal detail never reaches the caller, whatever the code site passed in
    publicMessage: params.kind === 'Internal' ? INTERNAL_PUBLIC_MESSAGE : params.publicMessage,
    internalCause: params.cause,
    ...(params.details && params.details.length > 0 ? { details: params.details } : {}),
  });

  issued.add(error);
  return error;
}

export function isClassifiedError(value: unknown): value is ClassifiedError {
  return typeof value === 'object' && value !== null && issued.has(value);
}
