/**
 * Error types for the Pinata client.
 */

import { z } from 'zod';

/**
 * Error codes for Pinata errors.
 */
export enum PinataErrorCode {
  /** API key is empty. */
  InvalidApiKey = 'invalid_api_key',
  /** Secret API key is empty. */
  InvalidSecretApiKey = 'invalid_secret_api_key',
  /** Configuration error. */
  Configuration = 'configuration_error',
  /** Request rejected before it was sent. */
  Validation = 'validation_error',
  /** Non-success response from the service. */
  Api = 'api_error',
  /** Network error. */
  Network = 'network_error',
  /** Timeout error. */
  Timeout = 'timeout_error',
  /** Response body did not have the expected shape. */
  Decode = 'decode_error',
}

/**
 * Additional error details.
 */
export interface PinataErrorDetails {
  /** HTTP status code. */
  statusCode?: number;
  /** Request ID for debugging. */
  requestId?: string;
  /** Parameter that caused the error. */
  param?: string;
  /** Location of a decoding failure within the response body. */
  path?: string;
  /** Original error. */
  cause?: Error;
}

/**
 * Pinata client error.
 */
export class PinataError extends Error {
  /** Error code. */
  readonly code: PinataErrorCode;

  /** Additional error details. */
  readonly details: PinataErrorDetails;

  constructor(code: PinataErrorCode, message: string, details: PinataErrorDetails = {}) {
    super(message);
    this.name = 'PinataError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PinataError);
    }
  }

  /**
   * HTTP status of the failed exchange, when there was one.
   */
  get statusCode(): number | undefined {
    return this.details.statusCode;
  }

  static invalidApiKey(): PinataError {
    return new PinataError(PinataErrorCode.InvalidApiKey, 'API key cannot be empty');
  }

  static invalidSecretApiKey(): PinataError {
    return new PinataError(
      PinataErrorCode.InvalidSecretApiKey,
      'Secret API key cannot be empty'
    );
  }

  static configuration(message: string): PinataError {
    return new PinataError(PinataErrorCode.Configuration, message);
  }

  static validation(message: string, param?: string): PinataError {
    return new PinataError(PinataErrorCode.Validation, message, { param });
  }

  /**
   * Creates the generic service error raised for every non-success status.
   */
  static api(message: string, statusCode: number, requestId?: string): PinataError {
    return new PinataError(PinataErrorCode.Api, message, { statusCode, requestId });
  }

  static network(message: string, cause?: Error): PinataError {
    return new PinataError(PinataErrorCode.Network, message, { cause });
  }

  static timeout(message: string, cause?: Error): PinataError {
    return new PinataError(PinataErrorCode.Timeout, message, { cause });
  }

  static decode(
    message: string,
    details: Pick<PinataErrorDetails, 'statusCode' | 'requestId' | 'path'> = {}
  ): PinataError {
    return new PinataError(PinataErrorCode.Decode, message, details);
  }

  /**
   * Converts to JSON.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: {
        statusCode: this.details.statusCode,
        requestId: this.details.requestId,
        param: this.details.param,
        path: this.details.path,
        cause: this.details.cause?.message,
      },
    };
  }
}

/**
 * Error envelope returned by the service on failure.
 *
 * Older endpoints answer with a plain string, newer ones with a
 * `{ reason, details }` object.
 */
export const ApiErrorResponseSchema = z.object({
  error: z.union([
    z.string(),
    z.object({
      reason: z.string(),
      details: z.string().optional(),
    }),
  ]),
});

export type ApiErrorResponse = z.infer<typeof ApiErrorResponseSchema>;

/**
 * Extracts the human-readable message from a decoded error envelope.
 */
export function errorMessage(body: ApiErrorResponse): string {
  const { error } = body;
  if (typeof error === 'string') {
    return error;
  }
  return error.details ? `${error.reason}: ${error.details}` : error.reason;
}

/**
 * Creates a PinataError from a failed response body.
 */
export function fromApiError(status: number, body: unknown, requestId?: string): PinataError {
  const parsed = ApiErrorResponseSchema.safeParse(body);
  if (!parsed.success) {
    return PinataError.decode(
      `Unable to decode error response (HTTP ${status}): ${describeBody(body)}`,
      { statusCode: status, requestId }
    );
  }
  return PinataError.api(errorMessage(parsed.data), status, requestId);
}

/**
 * Type guard for PinataError.
 */
export function isPinataError(error: unknown): error is PinataError {
  return error instanceof PinataError;
}

function describeBody(body: unknown): string {
  if (body === undefined || body === '') {
    return '<empty body>';
  }
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}
