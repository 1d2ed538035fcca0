/**
 * Pinata Client Library
 *
 * TypeScript client for the Pinata IPFS pinning API: pin content by hash,
 * JSON value or local file/directory upload, manage pin policies and
 * metadata, and query pin jobs, the pin list and account usage.
 *
 * @example
 * ```typescript
 * import { PinataClient } from 'pinata-client';
 *
 * const client = PinataClient.builder()
 *   .apiKey('your-api-key')
 *   .secretApiKey('your-secret-api-key')
 *   .build();
 *
 * await client.data.testAuthentication();
 *
 * const pinned = await client.pinning.pinFile({ paths: ['./site'] });
 * console.log(pinned.ipfsHash);
 * ```
 */

// Client
export { PinataClient, PinataClientBuilder, createClient } from './client';
export type { PinataClientOptions } from './client';

// Config
export {
  PinataConfig,
  PinataConfigBuilder,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
} from './config';
export type { PinataConfigOptions } from './config';

// Errors
export { PinataError, PinataErrorCode, isPinataError, fromApiError } from './errors';
export type { PinataErrorDetails, ApiErrorResponse } from './errors';

// Types
export * from './types';

// Services
export type { PinningService, DataService } from './services';

// Transport
export type { HttpTransport, HttpRequest, HttpResponse, HttpMethod, QueryParams } from './transport';
export { AxiosTransport } from './transport';

// Upload
export type { FilePart } from './upload';
export { collectFileParts, collectAllParts, buildPinFileForm } from './upload';

// Auth
export type { AuthProvider } from './auth';
export { ApiKeyAuthProvider, createApiKeyAuth } from './auth';

// Observability
export type { Logger, LogConfig, LogContext, LogEntry } from './observability';
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  REDACTED_KEYS,
  createLogger,
} from './observability';

// Mocks
export { MockHttpTransport, createMockTransport } from './mocks';
export type { MockResponse } from './mocks';
