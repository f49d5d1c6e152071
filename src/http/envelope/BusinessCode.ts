// src/http/envelope/BusinessCode.ts

/**
 * Business status codes carried in every envelope.
 *
 * Published values are part of the public contract: add new codes, never
 * renumber existing ones.
 */
export const BusinessCode = {
  Success: 20000,
  Created: 20100,
  Accepted: 20200,

  BadRequest: 40000,
  ValidationError: 40001,
  ParamError: 40002,

  Unauthorized: 40100,
  TokenExpired: 40101,
  TokenInvalid: 40102,

  Forbidden: 40300,
  AccessDenied: 40301,

  NotFound: 40400,
  ResourceNotFound: 40401,

  Conflict: 40900,
  DuplicateResource: 40901,

  InternalError: 50000,
  ServiceUnavailable: 50001,
  DatabaseError: 50002,
  ThirdPartyError: 50200,
  ExternalApiError: 50201,
} as const;

export type BusinessCode = (typeof BusinessCode)[keyof typeof BusinessCode];

export const ERROR_KINDS = [
  'Validation',
  'Unauthorized',
  'Forbidden',
  'NotFound',
  'Conflict',
  'Internal',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export type CodeRange = {
  min: number;
  max: number;
};

/**
 * Range table: which block of codes belongs to which outcome.
 */
export const SUCCESS_RANGE: CodeRange = { min: 20000, max: 20999 };

export const ERROR_RANGES: Record<ErrorKind, CodeRange> = {
  Validation: { min: 40000, max: 40099 },
  Unauthorized: { min: 40100, max: 40199 },
  Forbidden: { min: 40300, max: 40399 },
  NotFound: { min: 40400, max: 40499 },
  Conflict: { min: 40900, max: 40999 },
  Internal: { min: 50000, max: 50201 },
};

/**
 * Conventional transport status per error kind.
 */
export const TRANSPORT_STATUS: Record<ErrorKind, number> = {
  Validation: 400,
  Unauthorized: 401,
  Forbidden: 403,
  NotFound: 404,
  Conflict: 409,
  Internal: 500,
};

const SUCCESS_TRANSPORT_STATUS: Record<number, number> = {
  [BusinessCode.Success]: 200,
  [BusinessCode.Created]: 201,
  [BusinessCode.Accepted]: 202,
};

export function isInRange(code: number, range: CodeRange): boolean {
  return code >= range.min && code <= range.max;
}

export function isSuccessCode(code: number): boolean {
  return isInRange(code, SUCCESS_RANGE);
}

/**
 * Resolve which error kind a code belongs to, or undefined for success codes
 * and codes outside every published range.
 */
export function kindOfCode(code: number): ErrorKind | undefined {
  return ERROR_KINDS.find((kind) => isInRange(code, ERROR_RANGES[kind]));
}

/**
 * HTTP status for a success code (200 unless the code says otherwise).
 */
export function successTransportStatus(code: BusinessCode): number {
  return SUCCESS_TRANSPORT_STATUS[code] ?? 200;
}
