/**
 * Configuration module for the Pinata client.
 */

import { z } from 'zod';
import { PinataError } from '../errors';

/** Default base URL for the Pinata API. */
export const DEFAULT_BASE_URL = 'https://api.pinata.cloud';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT_MS = 60000;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'pinata-client-ts/0.1.0';

/**
 * Configuration options for the Pinata client.
 */
export interface PinataConfigOptions {
  /** Public API key, sent as `pinata_api_key`. */
  apiKey: string;
  /** Secret API key, sent as `pinata_secret_api_key`. */
  secretApiKey: string;
  /** Base URL for API requests. */
  baseUrl?: string;
  /** Request timeout in milliseconds; `0` disables the timeout. */
  timeout?: number;
  /** User-Agent header. */
  userAgent?: string;
  /** Custom headers to include in requests. */
  customHeaders?: Record<string, string>;
}

const baseUrlSchema = z
  .string()
  .url()
  .refine((url) => url.startsWith('https://') || url.startsWith('http://'), {
    message: 'Base URL must use http:// or https://',
  });

const timeoutSchema = z.number().int().nonnegative();

const envTimeoutSchema = z
  .string()
  .trim()
  .regex(/^\d+$/)
  .transform(Number);

/**
 * Last four characters of an API key, for logs. Keys of four characters or
 * fewer are masked entirely.
 */
export function apiKeyHint(apiKey: string): string {
  return apiKey.length > 4 ? `...${apiKey.slice(-4)}` : '****';
}

/**
 * Checks the credential pair, key first.
 */
export function validateKeys(apiKey: string, secretApiKey: string): void {
  if (apiKey.length === 0) {
    throw PinataError.invalidApiKey();
  }
  if (secretApiKey.length === 0) {
    throw PinataError.invalidSecretApiKey();
  }
}

/**
 * Configuration for the Pinata client.
 */
export class PinataConfig {
  readonly apiKey: string;
  readonly secretApiKey: string;
  readonly baseUrl: string;
  readonly timeout: number;
  readonly userAgent: string;
  readonly customHeaders: Readonly<Record<string, string>>;

  private constructor(options: PinataConfigOptions) {
    this.apiKey = options.apiKey;
    this.secretApiKey = options.secretApiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.customHeaders = { ...options.customHeaders };
  }

  static builder(): PinataConfigBuilder {
    return new PinataConfigBuilder();
  }

  /**
   * Creates a configuration from `PINATA_*` environment variables.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): PinataConfig {
    const apiKey = env['PINATA_API_KEY'];
    if (apiKey === undefined) {
      throw PinataError.configuration('PINATA_API_KEY environment variable not set');
    }
    const secretApiKey = env['PINATA_SECRET_API_KEY'];
    if (secretApiKey === undefined) {
      throw PinataError.configuration('PINATA_SECRET_API_KEY environment variable not set');
    }

    const builder = new PinataConfigBuilder().apiKey(apiKey).secretApiKey(secretApiKey);

    const baseUrl = env['PINATA_BASE_URL'];
    if (baseUrl) {
      builder.baseUrl(baseUrl);
    }

    const timeout = env['PINATA_TIMEOUT'];
    if (timeout !== undefined) {
      const parsed = envTimeoutSchema.safeParse(timeout);
      if (!parsed.success) {
        throw PinataError.configuration(`PINATA_TIMEOUT must be an integer, got "${timeout}"`);
      }
      builder.timeout(parsed.data);
    }

    return builder.build();
  }

  /**
   * Creates a validated configuration from options.
   */
  static fromOptions(options: PinataConfigOptions): PinataConfig {
    validateKeys(options.apiKey, options.secretApiKey);

    if (options.baseUrl !== undefined) {
      const result = baseUrlSchema.safeParse(options.baseUrl);
      if (!result.success) {
        throw PinataError.configuration(
          `Invalid base URL "${options.baseUrl}": ${result.error.issues[0]?.message ?? 'invalid'}`
        );
      }
    }

    if (options.timeout !== undefined && !timeoutSchema.safeParse(options.timeout).success) {
      throw PinataError.configuration(
        `Timeout must be a non-negative integer, got ${options.timeout}`
      );
    }

    return new PinataConfig(options);
  }

  /**
   * Returns a hint of the API key for debugging.
   */
  getApiKeyHint(): string {
    return apiKeyHint(this.apiKey);
  }

  toJSON(): Record<string, unknown> {
    return {
      apiKey: this.getApiKeyHint(),
      secretApiKey: '[REDACTED]',
      baseUrl: this.baseUrl,
      timeout: this.timeout,
      userAgent: this.userAgent,
    };
  }
}

/**
 * Builder for PinataConfig.
 */
export class PinataConfigBuilder {
  private _apiKey?: string;
  private _secretApiKey?: string;
  private _baseUrl?: string;
  private _timeout?: number;
  private _userAgent?: string;
  private _customHeaders: Record<string, string> = {};

  apiKey(key: string): this {
    this._apiKey = key;
    return this;
  }

  secretApiKey(secret: string): this {
    this._secretApiKey = secret;
    return this;
  }

  baseUrl(url: string): this {
    this._baseUrl = url;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this._timeout = ms;
    return this;
  }

  timeoutSecs(secs: number): this {
    this._timeout = secs * 1000;
    return this;
  }

  userAgent(userAgent: string): this {
    this._userAgent = userAgent;
    return this;
  }

  header(name: string, value: string): this {
    this._customHeaders[name] = value;
    return this;
  }

  build(): PinataConfig {
    return PinataConfig.fromOptions({
      apiKey: this._apiKey ?? '',
      secretApiKey: this._secretApiKey ?? '',
      baseUrl: this._baseUrl,
      timeout: this._timeout,
      userAgent: this._userAgent,
      customHeaders: this._customHeaders,
    });
  }
}
