// src/http/validation/fieldReaders.ts

/**
 * Field readers shared by the DTO parsers.
 *
 * Each reader checks one field, records an issue instead of throwing, and
 * returns a placeholder on failure so the parser can keep going and report
 * every failing field at once.
 */

import type { ValidationIssue } from '../../shared/errors/DomainErrors';

export type Issues = ValidationIssue[];

export type StringRules = {
  minLength?: number;
  maxLength?: number;
  /** Strip surrounding whitespace before checking (default true). */
  trim?: boolean;
};

export type IntegerRules = {
  min: number;
  max?: number;
  fallback: number;
};

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function lengthIssue(key: string, rules: StringRules): string {
  const { minLength, maxLength } = rules;
  if (minLength !== undefined && maxLength !== undefined) {
    return `"${key}" must be between ${minLength} and ${maxLength} characters.`;
  }
  if (minLength !== undefined) {
    return `"${key}" must be at least ${minLength} characters.`;
  }
  return `"${key}" must be at most ${maxLength} characters.`;
}

function checkString(key: string, value: unknown, rules: StringRules, issues: Issues): string | undefined {
  if (typeof value !== 'string') {
    issues.push({ field: key, message: `"${key}" must be a string.` });
    return undefined;
  }

  const text = rules.trim === false ? value : value.trim();
  const tooShort = rules.minLength !== undefined && text.length < rules.minLength;
  const tooLong = rules.maxLength !== undefined && text.length > rules.maxLength;
  if (tooShort || tooLong) {
    issues.push({ field: key, message: lengthIssue(key, rules) });
    return undefined;
  }

  return text;
}

export function readString(
  obj: Record<string, unknown>,
  key: string,
  rules: StringRules,
  issues: Issues,
): string {
  const value = obj[key];
  if (value === undefined || value === null || (typeof value === 'string' && value.trim() === '')) {
    issues.push({ field: key, message: `"${key}" is required.` });
    return '';
  }

  return checkString(key, value, rules, issues) ?? '';
}

export function readOptionalString(
  obj: Record<string, unknown>,
  key: string,
  rules: StringRules,
  issues: Issues,
): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  return checkString(key, value, rules, issues);
}

export function readEmail(obj: Record<string, unknown>, key: string, issues: Issues): string {
  const before = issues.length;
  const value = readString(obj, key, { maxLength: 254 }, issues);
  if (issues.length > before) return '';

  if (!EMAIL_PATTERN.test(value)) {
    issues.push({ field: key, message: `"${key}" must be a valid email address.` });
    return '';
  }

  return value.toLowerCase();
}

/**
 * Integer from a query string value ("2") or a JSON number.
 * Missing values take the fallback; values beyond the safe integer range fail.
 */
export function readInteger(
  obj: Record<string, unknown>,
  key: string,
  rules: IntegerRules,
  issues: Issues,
): number {
  const raw = obj[key];
  if (raw === undefined || raw === '') return rules.fallback;

  const value: unknown = typeof raw === 'string' && /^-?\d+$/.test(raw.trim()) ? Number(raw) : raw;

  if (
    typeof value !== 'number' ||
    !Number.isSafeInteger(value) ||
    value < rules.min ||
    (rules.max !== undefined && value > rules.max)
  ) {
    const bound =
      rules.max === undefined ? `>= ${rules.min}` : `between ${rules.min} and ${rules.max}`;
    issues.push({ field: key, message: `"${key}" must be an integer ${bound}.` });
    return rules.fallback;
  }

  return value;
}
