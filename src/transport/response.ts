/**
 * Maps raw responses to typed results or errors.
 */

import { z } from 'zod';
import { PinataError, fromApiError } from '../errors';
import type { HttpResponse } from './index';

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Decodes a success body with `schema`, or raises the service error.
 */
export function parseResult<S extends z.ZodTypeAny>(
  response: HttpResponse<unknown>,
  schema: S
): z.output<S> {
  if (!isSuccess(response.status)) {
    throw fromApiError(response.status, response.data, response.requestId);
  }

  const parsed = schema.safeParse(response.data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join('.') : undefined;
    throw PinataError.decode(
      `Unexpected response body${path ? ` at "${path}"` : ''}: ${issue?.message ?? 'invalid'}`,
      { statusCode: response.status, requestId: response.requestId, path }
    );
  }
  return parsed.data;
}

/**
 * For endpoints whose success body carries nothing of interest.
 */
export function parseOkResult(response: HttpResponse<unknown>): void {
  if (!isSuccess(response.status)) {
    throw fromApiError(response.status, response.data, response.requestId);
  }
}
