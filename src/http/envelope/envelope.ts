// src/http/envelope/envelope.ts

/**
 * Standard response envelope
 *
 * Every response body, success or failure, is built here so clients can
 * branch on `success` and `code` without looking at the HTTP status.
 */

import { config } from '../../shared/config/Config';
import type { ValidationIssue } from '../../shared/errors/DomainErrors';
import type { ClassifiedError } from '../errors/ClassifiedError';
import { BusinessCode, isSuccessCode } from './BusinessCode';

export type Envelope<T> = {
  success: boolean;
  code: BusinessCode;
  message: string;
  timestamp: number;
  requestId: string;
  data?: T;
  version: string;
};

export type FailureEnvelope = Envelope<never> & {
  success: false;
  errors?: ValidationIssue[];
};

export type PaginatedEnvelope<T> = Envelope<never> & {
  success: true;
  items: T[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
};

/**
 * Build metadata shared by every envelope. Overridable for tests.
 */
export type EnvelopeMeta = {
  requestId: string;
  version?: string;
  now?: () => number;
};

/**
 * Raised when an internal caller builds a page that breaks its own bounds.
 * A programming error, never a caller-facing validation failure.
 */
export class PaginationInvariantError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'PaginationInvariantError';
  }
}

function baseFields(meta: EnvelopeMeta) {
  return {
    timestamp: (meta.now ?? Date.now)(),
    requestId: meta.requestId,
    version: meta.version ?? config.buildVersion,
  };
}

export function buildSuccessEnvelope<T>(
  params: EnvelopeMeta & { data: T; code?: BusinessCode; message?: string },
): Envelope<T> {
  const code = params.code ?? BusinessCode.Success;
  if (!isSuccessCode(code)) {
    throw new RangeError(`Business code ${code} is not a success code`);
  }

  return {
    success: true,
    code,
    message: params.message ?? 'Success',
    ...baseFields(params),
    data: params.data,
  };
}

export function buildFailureEnvelope(params: EnvelopeMeta & { error: ClassifiedError }): FailureEnvelope {
  const { error } = params;

  return {
    success: false,
    code: error.businessCode,
    message: error.publicMessage,
    ...baseFields(params),
    ...(error.details ? { errors: error.details.map((d) => ({ field: d.field, message: d.message })) } : {}),
  };
}

export function buildPaginatedEnvelope<T>(
  params: EnvelopeMeta & {
    items: T[];
    total: number;
    page: number;
    pageSize: number;
    message?: string;
  },
): PaginatedEnvelope<T> {
  const { items, total, page, pageSize } = params;

  if (!Number.isInteger(page) || page < 1) {
    throw new PaginationInvariantError(`page must be an integer >= 1 (got ${page})`);
  }
  if (!Number.isInteger(pageSize) || pageSize < 1) {
    throw new PaginationInvariantError(`pageSize must be an integer >= 1 (got ${pageSize})`);
  }
  if (items.length > pageSize) {
    throw new PaginationInvariantError(`${items.length} items exceed pageSize ${pageSize}`);
  }
  if (!Number.isInteger(total) || total < items.length) {
    throw new PaginationInvariantError(`total ${total} is smaller than the ${items.length} items returned`);
  }

  return {
    success: true,
    code: BusinessCode.Success,
    message: params.message ?? 'Success',
    ...baseFields(params),
    items,
    total,
    page,
    pageSize,
    totalPages: Math.ceil(total / pageSize),
  };
}
