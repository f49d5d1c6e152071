// src/http/pipeline/stage.ts

/**
 * Stage results for the request pipeline.
 *
 * Each stage either continues with a value or aborts with a classified error;
 * an abort skips every later stage.
 */

import type { ClassifiedError } from '../errors/ClassifiedError';

export type StageResult<T> = { ok: true; value: T } | { ok: false; error: ClassifiedError };

export function proceed<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

export function abort<T = never>(error: ClassifiedError): StageResult<T> {
  return { ok: false, error };
}

/**
 * Run the next stage only when the previous one continued.
 */
export function andThen<T, U>(result: StageResult<T>, next: (value: T) => StageResult<U>): StageResult<U> {
  return result.ok ? next(result.value) : result;
}

export async function andThenAsync<T, U>(
  result: StageResult<T>,
  next: (value: T) => Promise<StageResult<U>>,
): Promise<StageResult<U>> {
  return result.ok ? next(result.value) : result;
}
