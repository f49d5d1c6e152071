// src/shared/errors/DomainErrors.ts

/**
 * Typed failures raised below the HTTP boundary.
 *
 * Domain code, DTO parsers and repositories throw these; the error classifier
 * (src/http/errors/errorClassifier.ts) is the only place that turns them into
 * public responses.
 */

export type ValidationIssue = {
  field: string;
  message: string;
};

/**
 * - malformed: the body is not parseable JSON
 * - invalid: the body parsed but broke field rules
 * - param: path or query parameters broke field rules
 */
export type ValidationReason = 'malformed' | 'invalid' | 'param';

export class ValidationFailure extends Error {
  public readonly issues: ValidationIssue[];
  public readonly reason: ValidationReason;

  public constructor(message: string, issues: ValidationIssue[], reason: ValidationReason = 'invalid') {
    super(message);
    this.name = 'ValidationFailure';
    this.issues = issues;
    this.reason = reason;
  }
}

export type AuthenticationFailureReason = 'missing' | 'expired' | 'invalid' | 'credentials';

export class AuthenticationFailure extends Error {
  public readonly reason: AuthenticationFailureReason;

  public constructor(reason: AuthenticationFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthenticationFailure';
    this.reason = reason;
  }
}

export class PermissionDenied extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'PermissionDenied';
  }
}

export class RecordNotFoundError extends Error {
  public readonly entity: string;
  public readonly id: string;

  public constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`);
    this.name = 'RecordNotFoundError';
    this.entity = entity;
    this.id = id;
  }
}

export class UniqueConstraintViolation extends Error {
  public readonly entity: string;
  public readonly fields: string[];

  public constructor(entity: string, fields: string[], options?: { cause?: unknown }) {
    super(`${entity} already exists (${fields.join(', ')})`, options);
    this.name = 'UniqueConstraintViolation';
    this.entity = entity;
    this.fields = fields;
  }
}

/**
 * The store could not be reached or refused the operation for reasons
 * unrelated to the request's data.
 */
export class PersistenceUnavailableError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceUnavailableError';
  }
}
