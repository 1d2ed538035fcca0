/**
 * Tests for client construction and wiring.
 */

import { describe, it, expect } from 'vitest';
import path from 'path';
import { PinataClient, createClient } from '../client';
import { MockHttpTransport } from '../mocks';
import { PinataErrorCode } from '../errors';
import { ConsoleLogger, LogLevel } from '../observability';
import { pinnedObjectFixture } from '../fixtures';
import { RecordingLogger, captureError, createTree, removeTree } from './helpers';

describe('PinataClient', () => {
  it('should reject an empty API key', () => {
    expect(() => createClient('', '')).toThrow('API key cannot be empty');
  });

  it('should reject an empty secret API key', () => {
    try {
      new PinataClient({ apiKey: 'test-key', secretApiKey: '' });
      expect.unreachable('construction should fail');
    } catch (error) {
      expect(error).toMatchObject({ code: PinataErrorCode.InvalidSecretApiKey });
    }
  });

  it('should route both services through the injected transport', async () => {
    const transport = new MockHttpTransport();
    const client = PinataClient.builder()
      .apiKey('test-key')
      .secretApiKey('test-secret')
      .transport(transport)
      .build();

    transport.addJsonResponse({ message: 'ok' });
    transport.addJsonResponse(pinnedObjectFixture());

    await client.data.testAuthentication();
    const pinned = await client.pinning.pinJson({ content: [1, 2, 3] });

    expect(pinned.pinSize).toBe(57);
    expect(transport.getRequests().map((request) => request.path)).toEqual([
      '/data/testAuthentication',
      '/pinning/pinJSONToIPFS',
    ]);
  });

  it('should keep builder settings in its configuration', () => {
    const client = PinataClient.builder()
      .apiKey('test-key-1234')
      .secretApiKey('test-secret')
      .baseUrl('https://api.pinata.test/')
      .timeout(5000)
      .userAgent('custom-agent/1.0')
      .header('X-Trace', 'on')
      .transport(new MockHttpTransport())
      .build();

    const config = client.getConfig();
    expect(config.baseUrl).toBe('https://api.pinata.test');
    expect(config.timeout).toBe(5000);
    expect(config.userAgent).toBe('custom-agent/1.0');
    expect(config.customHeaders).toEqual({ 'X-Trace': 'on' });
    expect(config.getApiKeyHint()).toBe('...1234');
  });

  it('should read its configuration from the environment', () => {
    const client = PinataClient.fromEnv({
      PINATA_API_KEY: 'test-key',
      PINATA_SECRET_API_KEY: 'test-secret',
      PINATA_BASE_URL: 'http://localhost:3000',
      PINATA_TIMEOUT: '2500',
    });

    expect(client.getConfig().baseUrl).toBe('http://localhost:3000');
    expect(client.getConfig().timeout).toBe(2500);
  });

  it('should fail from an environment without keys', async () => {
    const error = await captureError(Promise.resolve().then(() => PinataClient.fromEnv({})));

    expect(error.code).toBe(PinataErrorCode.Configuration);
    expect(error.message).toBe('PINATA_API_KEY environment variable not set');
  });

  it('should install a console logger at the requested level', () => {
    const client = PinataClient.builder()
      .apiKey('test-key')
      .secretApiKey('test-secret')
      .withConsoleLogging(LogLevel.Debug)
      .build();

    expect(client.getLogger()).toBeInstanceOf(ConsoleLogger);
  });

  it('should log uploads with the client context', async () => {
    const logger = new RecordingLogger();
    const transport = new MockHttpTransport().addJsonResponse(pinnedObjectFixture());
    const client = new PinataClient({
      apiKey: 'test-key-abcd',
      secretApiKey: 'test-secret',
      logger,
      transport,
    });
    const root = await createTree({ 'one.txt': 'hello' });

    try {
      await client.pinning.pinFile({ paths: [path.join(root, 'one.txt')] });
    } finally {
      await removeTree(root);
    }

    expect(logger.entries).toEqual([
      {
        level: LogLevel.Debug,
        message: 'Assembled upload',
        context: {
          client: 'pinata',
          apiKey: '...abcd',
          paths: [path.join(root, 'one.txt')],
          parts: 1,
          bytes: 5,
        },
        error: undefined,
      },
    ]);
  });
});
