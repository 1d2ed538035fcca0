/**
 * Tests for the axios transport against an in-process HTTP mock.
 */

import { describe, it, expect, beforeAll, afterEach, afterAll } from 'vitest';
import { setupServer } from 'msw/node';
import { http, HttpResponse } from 'msw';
import path from 'path';
import { PinataClient } from '../client';
import { AxiosTransport } from '../transport';
import { ApiKeyAuthProvider } from '../auth';
import { PinataConfig } from '../config';
import { PinataErrorCode } from '../errors';
import { pinnedObjectFixture, totalPinnedDataFixture } from '../fixtures';
import { captureError, createTree, removeTree } from './helpers';

const BASE_URL = 'https://api.pinata.test';

const server = setupServer();

beforeAll(() => {
  server.listen({ onUnhandledRequest: 'error' });
});

afterEach(() => {
  server.resetHandlers();
});

afterAll(() => {
  server.close();
});

function createTestClient(): PinataClient {
  return new PinataClient({
    apiKey: 'test-key',
    secretApiKey: 'test-secret',
    baseUrl: BASE_URL,
  });
}

describe('AxiosTransport', () => {
  it('should send both credentials and the user agent on every request', async () => {
    const seen: { headers?: Headers } = {};
    server.use(
      http.get(`${BASE_URL}/data/testAuthentication`, ({ request }) => {
        seen.headers = request.headers;
        return HttpResponse.json({ message: 'ok' });
      })
    );

    await createTestClient().data.testAuthentication();

    expect(seen.headers?.get('pinata_api_key')).toBe('test-key');
    expect(seen.headers?.get('pinata_secret_api_key')).toBe('test-secret');
    expect(seen.headers?.get('user-agent')).toBe('pinata-client-ts/0.1.0');
  });

  it('should send no query string for an empty filter', async () => {
    let search: string | undefined;
    server.use(
      http.get(`${BASE_URL}/pinning/pinJobs`, ({ request }) => {
        search = new URL(request.url).search;
        return HttpResponse.json({ count: 0, rows: [] });
      })
    );

    await createTestClient().pinning.getPinJobs();

    expect(search).toBe('');
  });

  it('should send each set filter as a query parameter', async () => {
    const seen: { params?: URLSearchParams } = {};
    server.use(
      http.get(`${BASE_URL}/data/pinList`, ({ request }) => {
        seen.params = new URL(request.url).searchParams;
        return HttpResponse.json({ count: 0, rows: [] });
      })
    );

    await createTestClient().data.getPinList({
      status: 'pinned',
      pageLimit: 5,
      metadataName: 'N',
    });

    expect(seen.params?.get('status')).toBe('pinned');
    expect(seen.params?.get('pageLimit')).toBe('5');
    expect(seen.params?.get('metadata[name]')).toBe('N');
  });

  it('should send JSON bodies', async () => {
    let contentType: string | null = null;
    let body: unknown;
    server.use(
      http.post(`${BASE_URL}/pinning/pinJSONToIPFS`, async ({ request }) => {
        contentType = request.headers.get('content-type');
        body = await request.json();
        return HttpResponse.json(pinnedObjectFixture());
      })
    );

    const pinned = await createTestClient().pinning.pinJson({
      content: { hello: 'world' },
      metadata: { name: 'greeting' },
    });

    expect(pinned.pinSize).toBe(57);
    expect(contentType).toContain('application/json');
    expect(body).toEqual({
      pinataContent: { hello: 'world' },
      pinataMetadata: { name: 'greeting' },
    });
  });

  it('should send file uploads as multipart form data', async () => {
    const root = await createTree({ 'one.txt': 'hello' });
    let contentType: string | null = null;
    let body = '';
    server.use(
      http.post(`${BASE_URL}/pinning/pinFileToIPFS`, async ({ request }) => {
        contentType = request.headers.get('content-type');
        body = await request.text();
        return HttpResponse.json(pinnedObjectFixture({ PinSize: 5 }));
      })
    );

    try {
      const pinned = await createTestClient().pinning.pinFile({
        paths: [path.join(root, 'one.txt')],
      });
      expect(pinned.pinSize).toBe(5);
    } finally {
      await removeTree(root);
    }

    expect(contentType).toMatch(/^multipart\/form-data; boundary=/);
    expect(body).toContain('name="file"; filename="one.txt"');
    expect(body).toContain('hello');
  });

  it('should raise the service error on a non-success status', async () => {
    server.use(
      http.get(`${BASE_URL}/data/testAuthentication`, () =>
        HttpResponse.json(
          { error: 'Invalid API key provided' },
          { status: 401, headers: { 'x-request-id': 'req-401' } }
        )
      )
    );

    const error = await captureError(createTestClient().data.testAuthentication());

    expect(error.code).toBe(PinataErrorCode.Api);
    expect(error.statusCode).toBe(401);
    expect(error.message).toBe('Invalid API key provided');
    expect(error.details.requestId).toBe('req-401');
  });

  it('should raise a network error when no response arrives', async () => {
    server.use(http.get(`${BASE_URL}/data/userPinnedDataTotal`, () => HttpResponse.error()));

    const error = await captureError(createTestClient().data.getTotalUserPinnedData());

    expect(error.code).toBe(PinataErrorCode.Network);
    expect(error.statusCode).toBeUndefined();
  });

  it('should return lower-cased headers and the request ID', async () => {
    server.use(
      http.get(`${BASE_URL}/data/userPinnedDataTotal`, () =>
        HttpResponse.json(totalPinnedDataFixture(), { headers: { 'X-Request-Id': 'req-42' } })
      )
    );
    const config = PinataConfig.builder()
      .apiKey('test-key')
      .secretApiKey('test-secret')
      .baseUrl(BASE_URL)
      .build();
    const transport = new AxiosTransport(
      config,
      new ApiKeyAuthProvider(config.apiKey, config.secretApiKey)
    );

    const response = await transport.request({ method: 'GET', path: '/data/userPinnedDataTotal' });

    expect(response.status).toBe(200);
    expect(response.requestId).toBe('req-42');
    expect(response.headers['x-request-id']).toBe('req-42');
    expect(response.data).toEqual(totalPinnedDataFixture());
  });
});
