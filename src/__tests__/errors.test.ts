/**
 * Tests for error decoding and response mapping.
 */

import { describe, it, expect } from 'vitest';
import { PinataError, PinataErrorCode, fromApiError, isPinataError } from '../errors';
import { parseOkResult, parseResult } from '../transport';
import { PinnedObjectSchema } from '../types/pinning';
import { FIXTURE_HASH, pinnedObjectFixture } from '../fixtures';

describe('fromApiError', () => {
  it('should use a plain string error as the message', () => {
    const error = fromApiError(401, { error: 'Invalid API key provided' }, 'req-1');

    expect(error.code).toBe(PinataErrorCode.Api);
    expect(error.message).toBe('Invalid API key provided');
    expect(error.statusCode).toBe(401);
    expect(error.details.requestId).toBe('req-1');
  });

  it('should join reason and details of a structured error', () => {
    const error = fromApiError(400, {
      error: { reason: 'INVALID_ROUTE', details: 'The provided route does not exist' },
    });

    expect(error.code).toBe(PinataErrorCode.Api);
    expect(error.message).toBe('INVALID_ROUTE: The provided route does not exist');
  });

  it('should use the reason alone when details are absent', () => {
    const error = fromApiError(403, { error: { reason: 'NO_SCOPES_FOUND' } });

    expect(error.message).toBe('NO_SCOPES_FOUND');
  });

  it.each([400, 401, 403, 404, 429, 500, 502, 503])(
    'should map status %i to the generic service error',
    (status) => {
      const error = fromApiError(status, { error: 'failure' });

      expect(error.code).toBe(PinataErrorCode.Api);
      expect(error.statusCode).toBe(status);
    }
  );

  it('should raise a decode error for an unreadable envelope', () => {
    const error = fromApiError(502, '<html>Bad Gateway</html>');

    expect(error.code).toBe(PinataErrorCode.Decode);
    expect(error.statusCode).toBe(502);
    expect(error.message).toBe(
      'Unable to decode error response (HTTP 502): <html>Bad Gateway</html>'
    );
  });

  it('should describe an empty body', () => {
    const error = fromApiError(500, '');

    expect(error.message).toBe('Unable to decode error response (HTTP 500): <empty body>');
  });
});

describe('parseResult', () => {
  it('should decode a success body', () => {
    const result = parseResult(
      { status: 200, headers: {}, data: pinnedObjectFixture() },
      PinnedObjectSchema
    );

    expect(result).toEqual({
      ipfsHash: FIXTURE_HASH,
      pinSize: 57,
      timestamp: '2024-05-01T10:00:00.000Z',
    });
  });

  it('should raise a decode error naming the mismatching field', () => {
    try {
      parseResult(
        { status: 200, headers: {}, data: pinnedObjectFixture({ IpfsHash: 42 }) },
        PinnedObjectSchema
      );
      expect.fail('Should have thrown');
    } catch (error) {
      expect(isPinataError(error)).toBe(true);
      expect(error).toMatchObject({
        code: PinataErrorCode.Decode,
        message: 'Unexpected response body at "IpfsHash": Expected string, received number',
        details: { path: 'IpfsHash', statusCode: 200 },
      });
    }
  });

  it('should never return a result for a failed status', () => {
    expect(() =>
      parseResult(
        { status: 500, headers: {}, data: { error: 'Internal error' } },
        PinnedObjectSchema
      )
    ).toThrow('Internal error');
  });
});

describe('parseOkResult', () => {
  it('should accept any success body', () => {
    expect(() => parseOkResult({ status: 200, headers: {}, data: 'OK' })).not.toThrow();
  });

  it('should raise the service error otherwise', () => {
    expect(() =>
      parseOkResult({ status: 404, headers: {}, data: { error: 'Not found' } })
    ).toThrow(PinataError);
  });
});

describe('PinataError', () => {
  it('should serialize without the cause object', () => {
    const cause = new Error('socket hang up');
    const error = PinataError.network('Network error: socket hang up', cause);

    expect(error.toJSON()).toEqual({
      name: 'PinataError',
      code: 'network_error',
      message: 'Network error: socket hang up',
      details: {
        statusCode: undefined,
        requestId: undefined,
        param: undefined,
        path: undefined,
        cause: 'socket hang up',
      },
    });
  });
});
