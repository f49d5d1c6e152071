// src/users/dto/UserDtos.ts

/**
 * Request payload schemas for the user routes.
 *
 * Built on the shared field readers so that every failing field is reported
 * in one response.
 */

import { ValidationFailure, ValidationIssue } from '../../shared/errors/DomainErrors';
import { readEmail, readInteger, readOptionalString, readString } from '../../http/validation/fieldReaders';
import { jsonPayload } from '../../http/validation/payloadValidator';

export const USERNAME_RULES = { minLength: 3, maxLength: 50 };
export const PASSWORD_RULES = { minLength: 8, maxLength: 128, trim: false };

export const MAX_PAGE_SIZE = 100;
export const DEFAULT_PAGE_SIZE = 20;

export interface CreateUserDto {
  username: string;
  email: string;
  password: string;
}

export interface UpdateUserDto {
  username?: string;
  bio?: string;
  avatarUrl?: string;
}

export interface PaginationQuery {
  page: number;
  pageSize: number;
}

export const createUserSchema = jsonPayload<CreateUserDto>('CreateUser', (payload, issues) => ({
  username: readString(payload, 'username', USERNAME_RULES, issues),
  email: readEmail(payload, 'email', issues),
  password: readString(payload, 'password', PASSWORD_RULES, issues),
}));

export const updateUserSchema = jsonPayload<UpdateUserDto>('UpdateUser', (payload, issues) => {
  const username = readOptionalString(payload, 'username', USERNAME_RULES, issues);
  const bio = readOptionalString(payload, 'bio', { maxLength: 500 }, issues);
  const avatarUrl = readOptionalString(payload, 'avatarUrl', { maxLength: 2048 }, issues);

  if (username === undefined && bio === undefined && avatarUrl === undefined && issues.length === 0) {
    issues.push({ field: '(body)', message: 'At least one of "username", "bio", "avatarUrl" is required.' });
  }

  return {
    ...(username !== undefined ? { username } : {}),
    ...(bio !== undefined ? { bio } : {}),
    ...(avatarUrl !== undefined ? { avatarUrl } : {}),
  };
});

/**
 * Query-string pagination (`?page=2&pageSize=10`), defaults 1 / 20.
 */
export function parsePaginationQuery(query: Record<string, unknown>): PaginationQuery {
  const issues: ValidationIssue[] = [];

  const page = readInteger(query, 'page', { min: 1, fallback: 1 }, issues);
  const pageSize = readInteger(
    query,
    'pageSize',
    { min: 1, max: MAX_PAGE_SIZE, fallback: DEFAULT_PAGE_SIZE },
    issues,
  );

  if (issues.length > 0) {
    throw new ValidationFailure(
      `Invalid pagination parameters: ${issues.map((issue) => issue.message).join(' ')}`,
      issues,
      'param',
    );
  }

  return { page, pageSize };
}
