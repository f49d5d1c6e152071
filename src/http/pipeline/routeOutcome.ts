// src/http/pipeline/routeOutcome.ts

import { BusinessCode } from '../envelope/BusinessCode';

/**
 * What a route handler hands back on success. Handlers never build envelopes
 * themselves; failures are thrown and classified by the pipeline.
 */
export type RouteOutcome<T> =
  | { type: 'single'; data: T; code?: BusinessCode; message?: string }
  | { type: 'page'; items: T[]; total: number; page: number; pageSize: number };

export function ok<T>(data: T, message?: string): RouteOutcome<T> {
  return { type: 'single', data, code: BusinessCode.Success, message };
}

export function created<T>(data: T, message = 'Created'): RouteOutcome<T> {
  return { type: 'single', data, code: BusinessCode.Created, message };
}

export function page<T>(items: T[], total: number, pageNumber: number, pageSize: number): RouteOutcome<T> {
  return { type: 'page', items, total, page: pageNumber, pageSize };
}
