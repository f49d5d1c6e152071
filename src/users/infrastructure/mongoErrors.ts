// src/users/infrastructure/mongoErrors.ts

/**
 * Translate mongoose / driver failures into the repository's failure contract.
 * Anything unrecognised is returned unchanged and ends up classified as Internal.
 */

import mongoose from 'mongoose';

import {
  PersistenceUnavailableError,
  RecordNotFoundError,
  UniqueConstraintViolation,
} from '../../shared/errors/DomainErrors';

const DUPLICATE_KEY = 11000;

const UNAVAILABLE_ERROR_NAMES = new Set([
  'MongoNetworkError',
  'MongoNetworkTimeoutError',
  'MongoServerSelectionError',
  'MongooseServerSelectionError',
  'MongoNotConnectedError',
  'MongoTopologyClosedError',
]);

function duplicateKeyFields(err: Error): string[] | undefined {
  if (!('code' in err) || err.code !== DUPLICATE_KEY) return undefined;

  const keys = ('keyValue' in err ? err.keyValue : undefined) ?? ('keyPattern' in err ? err.keyPattern : undefined);
  if (typeof keys === 'object' && keys !== null) {
    return Object.keys(keys);
  }
  return [];
}

export function translateMongoError(err: unknown, entity: string): unknown {
  if (
    err instanceof RecordNotFoundError ||
    err instanceof UniqueConstraintViolation ||
    err instanceof PersistenceUnavailableError
  ) {
    return err;
  }

  if (!(err instanceof Error)) return err;

  const fields = duplicateKeyFields(err);
  if (fields) {
    return new UniqueConstraintViolation(entity, fields, { cause: err });
  }

  if (err instanceof mongoose.Error.CastError && err.path === '_id') {
    return new RecordNotFoundError(entity, String(err.value));
  }

  if (UNAVAILABLE_ERROR_NAMES.has(err.name)) {
    return new PersistenceUnavailableError(`${entity} store unavailable`, { cause: err });
  }

  return err;
}
