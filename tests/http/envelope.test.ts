// tests/http/envelope.test.ts

import { BusinessCode } from '../../src/http/envelope/BusinessCode';
import {
  PaginationInvariantError,
  buildFailureEnvelope,
  buildPaginatedEnvelope,
  buildSuccessEnvelope,
} from '../../src/http/envelope/envelope';
import { classified } from '../../src/http/errors/ClassifiedError';
import { config } from '../../src/shared/config/Config';

const meta = {
  requestId: 'req-1',
  version: 'build-test',
  now: () => 1_700_000_000_000,
};

describe('Response envelope', () => {
  test('success envelope carries data and metadata', () => {
    const envelope = buildSuccessEnvelope({ ...meta, data: { id: 'u-1' } });

    expect(envelope).toEqual({
      success: true,
      code: 20000,
      message: 'Success',
      timestamp: 1_700_000_000_000,
      requestId: 'req-1',
      version: 'build-test',
      data: { id: 'u-1' },
    });
  });

  test('success envelope keeps an explicit success code and message', () => {
    const envelope = buildSuccessEnvelope({ ...meta, data: null, code: BusinessCode.Created, message: 'Created' });

    expect(envelope.code).toBe(20100);
    expect(envelope.message).toBe('Created');
  });

  test('success envelope refuses an error code', () => {
    expect(() => buildSuccessEnvelope({ ...meta, data: {}, code: BusinessCode.ValidationError })).toThrow(
      RangeError,
    );
  });

  test('version defaults to the configured build version', () => {
    const envelope = buildSuccessEnvelope({ requestId: 'req-2', data: 1 });

    expect(envelope.version).toBe(config.buildVersion);
  });

  test('failure envelope lists validation issues and has no data', () => {
    const error = classified({
      kind: 'Validation',
      code: BusinessCode.ValidationError,
      publicMessage: 'Invalid CreateUser payload',
      cause: new Error('raw'),
      details: [{ field: 'email', message: '"email" is required.' }],
    });

    const envelope = buildFailureEnvelope({ ...meta, error });

    expect(envelope).toEqual({
      success: false,
      code: 40001,
      message: 'Invalid CreateUser payload',
      timestamp: 1_700_000_000_000,
      requestId: 'req-1',
      version: 'build-test',
      errors: [{ field: 'email', message: '"email" is required.' }],
    });
    expect('data' in envelope).toBe(false);
  });

  test('failure envelope for an internal error never carries the cause', () => {
    const error = classified({
      kind: 'Internal',
      code: BusinessCode.InternalError,
      publicMessage: 'duplicate key on users_email_idx',
      cause: new Error('duplicate key on users_email_idx'),
    });

    const envelope = buildFailureEnvelope({ ...meta, error });

    expect(envelope.message).toBe('an internal error occurred');
    expect(envelope.errors).toBeUndefined();
  });

  test('paginated envelope computes totalPages', () => {
    const envelope = buildPaginatedEnvelope({ ...meta, items: ['a', 'b'], total: 5, page: 1, pageSize: 2 });

    expect(envelope).toMatchObject({
      success: true,
      code: 20000,
      items: ['a', 'b'],
      total: 5,
      page: 1,
      pageSize: 2,
      totalPages: 3,
    });
  });

  test('an empty result has zero pages', () => {
    const envelope = buildPaginatedEnvelope({ ...meta, items: [], total: 0, page: 1, pageSize: 20 });

    expect(envelope.totalPages).toBe(0);
  });

  test.each([
    { items: ['a'], total: 1, page: 0, pageSize: 10 },
    { items: ['a'], total: 1, page: 1, pageSize: 0 },
    { items: ['a', 'b', 'c'], total: 3, page: 1, pageSize: 2 },
    { items: ['a', 'b'], total: 1, page: 1, pageSize: 2 },
    { items: ['a'], total: 1.5, page: 1, pageSize: 2 },
  ])('rejects a page that breaks its bounds (%o)', (page) => {
    expect(() => buildPaginatedEnvelope({ ...meta, ...page })).toThrow(PaginationInvariantError);
  });
});
