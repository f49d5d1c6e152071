// src/http/validation/payloadValidator.ts

/**
 * Payload validator stage
 *
 * Turns the raw request body into a typed input before any handler runs.
 * Each route declares its schema up front; the stage never guesses.
 *
 * - Malformed JSON        -> Validation (BadRequest)
 * - Rule failures         -> Validation (ValidationError), every field listed
 * - Routes without a body -> the body is ignored
 */

import { ValidationFailure, ValidationIssue } from '../../shared/errors/DomainErrors';
import { classifyError } from '../errors/errorClassifier';
import { StageResult, abort, proceed } from '../pipeline/stage';
import { Issues, isRecord } from './fieldReaders';

export type PayloadSchema<T> = {
  /**
   * "json": the route expects a JSON object body.
   * "none": the route takes no body; parse receives an empty object.
   */
  kind: 'json' | 'none';
  name: string;
  parse: (payload: Record<string, unknown>, issues: Issues) => T;
};

export function jsonPayload<T>(
  name: string,
  parse: (payload: Record<string, unknown>, issues: Issues) => T,
): PayloadSchema<T> {
  return { kind: 'json', name, parse };
}

export const noPayload: PayloadSchema<undefined> = {
  kind: 'none',
  name: 'none',
  parse: () => undefined,
};

/**
 * The body arrives as text; an absent or empty body counts as `{}` so that a
 * schema with required fields reports all of them as missing.
 */
function parseJsonBody(raw: unknown): unknown {
  if (raw === undefined || raw === null) return {};
  if (typeof raw !== 'string') return raw;
  if (raw.trim().length === 0) return {};

  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    throw new ValidationFailure(
      'Malformed JSON body',
      [{ field: '(body)', message: 'Body is not valid JSON.' }],
      'malformed',
    );
  }
}

export function parsePayload<T>(schema: PayloadSchema<T>, rawBody: unknown): T {
  if (schema.kind === 'none') return schema.parse({}, []);

  const payload = parseJsonBody(rawBody);
  if (!isRecord(payload)) {
    throw new ValidationFailure(`Invalid ${schema.name} payload`, [
      { field: '(body)', message: 'Payload must be a JSON object.' },
    ]);
  }

  const issues: ValidationIssue[] = [];
  const value = schema.parse(payload, issues);

  if (issues.length > 0) {
    throw new ValidationFailure(
      `Invalid ${schema.name} payload: ${issues.map((issue) => issue.message).join(' ')}`,
      issues,
    );
  }

  return value;
}

export function validatePayload<T>(schema: PayloadSchema<T>, rawBody: unknown): StageResult<T> {
  try {
    return proceed(parsePayload(schema, rawBody));
  } catch (err) {
    return abort(classifyError(err));
  }
}
