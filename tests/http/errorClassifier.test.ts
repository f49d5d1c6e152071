// tests/http/errorClassifier.test.ts

import { BusinessCode } from '../../src/http/envelope/BusinessCode';
import { INTERNAL_PUBLIC_MESSAGE, classified } from '../../src/http/errors/ClassifiedError';
import { classifyError, reportClassifiedError } from '../../src/http/errors/errorClassifier';
import {
  AuthenticationFailure,
  PermissionDenied,
  PersistenceUnavailableError,
  RecordNotFoundError,
  UniqueConstraintViolation,
  ValidationFailure,
} from '../../src/shared/errors/DomainErrors';
import { createMemoryLogger } from '../support/memoryLogger';

describe('classifyError', () => {
  test('validation failures keep their issues', () => {
    const issues = [{ field: 'email', message: '"email" is required.' }];
    const error = classifyError(new ValidationFailure('Invalid CreateUser payload', issues));

    expect(error).toMatchObject({
      kind: 'Validation',
      businessCode: 40001,
      transportStatus: 400,
      publicMessage: 'Invalid CreateUser payload',
      details: issues,
    });
  });

  test.each([
    ['malformed', 40000],
    ['invalid', 40001],
    ['param', 40002],
  ] as const)('validation reason %s maps to %d', (reason, code) => {
    expect(classifyError(new ValidationFailure('bad', [], reason)).businessCode).toBe(code);
  });

  test.each([
    ['missing', 40100],
    ['credentials', 40100],
    ['expired', 40101],
    ['invalid', 40102],
  ] as const)('authentication reason %s maps to %d', (reason, code) => {
    const error = classifyError(new AuthenticationFailure(reason, 'denied'));

    expect(error.kind).toBe('Unauthorized');
    expect(error.transportStatus).toBe(401);
    expect(error.businessCode).toBe(code);
  });

  test('permission denied is Forbidden', () => {
    const error = classifyError(new PermissionDenied('You may only update your own profile'));

    expect(error).toMatchObject({ kind: 'Forbidden', businessCode: 40301, transportStatus: 403 });
  });

  test('missing records name the entity but not the id', () => {
    const error = classifyError(new RecordNotFoundError('User', '65f000000000000000000001'));

    expect(error).toMatchObject({
      kind: 'NotFound',
      businessCode: 40401,
      transportStatus: 404,
      publicMessage: 'User not found',
    });
  });

  test('unique violations are Conflict', () => {
    const error = classifyError(new UniqueConstraintViolation('User', ['email']));

    expect(error).toMatchObject({
      kind: 'Conflict',
      businessCode: 40901,
      transportStatus: 409,
      publicMessage: 'User already exists (email)',
    });
  });

  test('store outages are Internal with the database code', () => {
    const cause = new PersistenceUnavailableError('User store unavailable');
    const error = classifyError(cause);

    expect(error).toMatchObject({
      kind: 'Internal',
      businessCode: 50002,
      transportStatus: 500,
      publicMessage: INTERNAL_PUBLIC_MESSAGE,
    });
    expect(error.internalCause).toBe(cause);
  });

  test('unknown failures are Internal and keep the cause for logs only', () => {
    const cause = new Error('connect ECONNREFUSED 10.0.0.5:27017');
    const error = classifyError(cause);

    expect(error.kind).toBe('Internal');
    expect(error.businessCode).toBe(50000);
    expect(error.publicMessage).toBe('an internal error occurred');
    expect(error.internalCause).toBe(cause);
  });

  test('non-Error throws are Internal', () => {
    expect(classifyError('plain string').businessCode).toBe(50000);
    expect(classifyError(undefined).businessCode).toBe(50000);
  });

  test('body-parser rejections are Validation', () => {
    const parseError = Object.assign(new Error('Unexpected token'), { type: 'entity.parse.failed', status: 400 });
    const tooLarge = Object.assign(new Error('too large'), { type: 'entity.too.large', status: 413 });

    expect(classifyError(parseError)).toMatchObject({ businessCode: 40000, publicMessage: 'Malformed JSON body' });
    expect(classifyError(tooLarge)).toMatchObject({ businessCode: 40000, publicMessage: 'Request body too large' });
  });

  test('already classified errors pass through unchanged', () => {
    const error = classified({
      kind: 'NotFound',
      code: BusinessCode.NotFound,
      publicMessage: 'Route not found',
      cause: null,
    });

    expect(classifyError(error)).toBe(error);
  });

  test('objects merely shaped like a classified error are classified from scratch', () => {
    const forged = {
      kind: 'Internal',
      businessCode: 50000,
      transportStatus: 500,
      publicMessage: 'db password=hunter2',
      internalCause: null,
    };

    const error = classifyError(forged);

    expect(error).not.toBe(forged);
    expect(error.publicMessage).toBe('an internal error occurred');
    expect(error.internalCause).toBe(forged);
  });

  test('a forged success code on a failure does not pass through', () => {
    const error = classifyError({
      kind: 'Internal',
      businessCode: 20000,
      transportStatus: 200,
      publicMessage: 'fine',
      internalCause: null,
    });

    expect(error).toMatchObject({ kind: 'Internal', businessCode: 50000, transportStatus: 500 });
  });

  test('a code outside its kind range is a programming error', () => {
    expect(() =>
      classified({ kind: 'NotFound', code: BusinessCode.DuplicateResource, publicMessage: 'x', cause: null }),
    ).toThrow(RangeError);
  });
});

describe('reportClassifiedError', () => {
  test('internal errors log at error level with the full cause', () => {
    const { logger, lines } = createMemoryLogger();

    reportClassifiedError(logger, 'req-9', classifyError(new Error('boom')));

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 50,
      msg: 'Request failed with internal error',
      requestId: 'req-9',
      kind: 'Internal',
      code: 50000,
      status: 500,
      err: { message: 'boom' },
    });
  });

  test('authentication rejections log at warn level', () => {
    const { logger, lines } = createMemoryLogger();

    reportClassifiedError(logger, 'req-10', classifyError(new AuthenticationFailure('expired', 'Token expired')));

    expect(lines[0]).toMatchObject({ level: 40, msg: 'Request rejected', code: 40101 });
  });

  test('validation rejections log at info level with their issues', () => {
    const { logger, lines } = createMemoryLogger();
    const issues = [{ field: 'email', message: '"email" is required.' }];

    reportClassifiedError(logger, 'req-11', classifyError(new ValidationFailure('Invalid', issues)));

    expect(lines[0]).toMatchObject({ level: 30, code: 40001, issues });
  });
});
