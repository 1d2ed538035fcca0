/**
 * Main Pinata client implementation.
 */

import { PinataConfig, PinataConfigBuilder } from '../config';
import { AuthProvider, ApiKeyAuthProvider } from '../auth';
import { HttpTransport, AxiosTransport } from '../transport';
import { PinningService, DefaultPinningService } from '../services/pinning';
import { DataService, DefaultDataService } from '../services/data';
import { Logger, LogLevel, ConsoleLogger, NoopLogger } from '../observability/logging';

/**
 * Options for creating a Pinata client.
 */
export interface PinataClientOptions {
  apiKey: string;
  secretApiKey: string;
  baseUrl?: string;
  /** Request timeout in milliseconds. */
  timeout?: number;
  userAgent?: string;
  customHeaders?: Record<string, string>;
  logger?: Logger;
  /** Custom transport (for testing). */
  transport?: HttpTransport;
  /** Custom auth provider. */
  authProvider?: AuthProvider;
}

/**
 * Main Pinata client.
 *
 * Holds only immutable configuration; calls made concurrently on one client
 * do not share any state.
 */
export class PinataClient {
  /** Pinning, unpinning, pin jobs and per-hash settings. */
  readonly pinning: PinningService;
  /** Authentication check, pin list and usage totals. */
  readonly data: DataService;

  private readonly config: PinataConfig;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(options: PinataClientOptions) {
    const configBuilder = new PinataConfigBuilder()
      .apiKey(options.apiKey)
      .secretApiKey(options.secretApiKey);

    if (options.baseUrl !== undefined) {
      configBuilder.baseUrl(options.baseUrl);
    }
    if (options.timeout !== undefined) {
      configBuilder.timeout(options.timeout);
    }
    if (options.userAgent !== undefined) {
      configBuilder.userAgent(options.userAgent);
    }
    if (options.customHeaders) {
      for (const [name, value] of Object.entries(options.customHeaders)) {
        configBuilder.header(name, value);
      }
    }

    this.config = configBuilder.build();
    this.logger = (options.logger ?? new NoopLogger()).child({
      client: 'pinata',
      apiKey: this.config.getApiKeyHint(),
    });

    const auth =
      options.authProvider ??
      new ApiKeyAuthProvider(this.config.apiKey, this.config.secretApiKey);
    this.transport = options.transport ?? new AxiosTransport(this.config, auth, this.logger);

    this.pinning = new DefaultPinningService(this.transport, this.logger);
    this.data = new DefaultDataService(this.transport);
  }

  getConfig(): PinataConfig {
    return this.config;
  }

  getLogger(): Logger {
    return this.logger;
  }

  static builder(): PinataClientBuilder {
    return new PinataClientBuilder();
  }

  /**
   * Creates a client from `PINATA_*` environment variables.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): PinataClient {
    const config = PinataConfig.fromEnv(env);
    return new PinataClient({
      apiKey: config.apiKey,
      secretApiKey: config.secretApiKey,
      baseUrl: config.baseUrl,
      timeout: config.timeout,
    });
  }
}

/**
 * Builder for creating PinataClient instances.
 */
export class PinataClientBuilder {
  private apiKeyValue = '';
  private secretApiKeyValue = '';
  private options: Omit<PinataClientOptions, 'apiKey' | 'secretApiKey'> = {};

  apiKey(key: string): this {
    this.apiKeyValue = key;
    return this;
  }

  secretApiKey(secret: string): this {
    this.secretApiKeyValue = secret;
    return this;
  }

  baseUrl(url: string): this {
    this.options.baseUrl = url;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.options.timeout = ms;
    return this;
  }

  userAgent(userAgent: string): this {
    this.options.userAgent = userAgent;
    return this;
  }

  header(name: string, value: string): this {
    this.options.customHeaders = { ...this.options.customHeaders, [name]: value };
    return this;
  }

  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  /**
   * Enables console logging at the specified level.
   */
  withConsoleLogging(level: LogLevel = LogLevel.Info): this {
    this.options.logger = new ConsoleLogger({ level });
    return this;
  }

  /**
   * Sets a custom transport (for testing).
   */
  transport(transport: HttpTransport): this {
    this.options.transport = transport;
    return this;
  }

  authProvider(provider: AuthProvider): this {
    this.options.authProvider = provider;
    return this;
  }

  build(): PinataClient {
    return new PinataClient({
      ...this.options,
      apiKey: this.apiKeyValue,
      secretApiKey: this.secretApiKeyValue,
    });
  }
}

/**
 * Creates a client from a key pair. Throws if either key is empty.
 */
export function createClient(apiKey: string, secretApiKey: string): PinataClient {
  return new PinataClient({ apiKey, secretApiKey });
}
