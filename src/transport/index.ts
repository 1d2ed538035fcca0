/**
 * HTTP transport layer for the Pinata client.
 */

import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import FormData from 'form-data';
import { AuthProvider } from '../auth';
import { PinataConfig } from '../config';
import { PinataError } from '../errors';
import { Logger, NoopLogger } from '../observability/logging';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** Query string values; absent filters are left out before they get here. */
export type QueryParams = Record<string, string | number>;

/**
 * HTTP request options.
 */
export interface HttpRequest {
  method: HttpMethod;
  /** URL path (relative to base URL). */
  path: string;
  query?: QueryParams;
  /** JSON-serializable value or a multipart form. */
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * HTTP response. Non-success statuses are returned, not thrown.
 */
export interface HttpResponse<T = unknown> {
  status: number;
  /** Response headers, lower-cased. */
  headers: Record<string, string>;
  data: T;
  requestId?: string;
}

/**
 * HTTP transport interface.
 */
export interface HttpTransport {
  /**
   * Sends a request and returns the response whatever its status.
   * Rejects only when no response was received.
   */
  request<T = unknown>(req: HttpRequest): Promise<HttpResponse<T>>;
}

/**
 * Default HTTP transport using axios.
 */
export class AxiosTransport implements HttpTransport {
  private readonly client: AxiosInstance;
  private readonly config: PinataConfig;
  private readonly logger: Logger;

  constructor(config: PinataConfig, auth: AuthProvider, logger: Logger = new NoopLogger()) {
    this.config = config;
    this.logger = logger;
    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeout,
      headers: {
        'User-Agent': config.userAgent,
        ...config.customHeaders,
        ...auth.getAuthHeaders(),
      },
      validateStatus: () => true,
    });
  }

  async request<T = unknown>(req: HttpRequest): Promise<HttpResponse<T>> {
    const axiosConfig: AxiosRequestConfig = {
      method: req.method,
      url: req.path,
      params: req.query,
      headers: { ...req.headers },
    };

    if (req.body !== undefined) {
      axiosConfig.data = req.body;
      if (req.body instanceof FormData) {
        axiosConfig.headers = { ...axiosConfig.headers, ...req.body.getHeaders() };
      } else {
        axiosConfig.headers = { ...axiosConfig.headers, 'Content-Type': 'application/json' };
      }
    }

    const startedAt = Date.now();
    this.logger.debug('Sending request', { method: req.method, path: req.path });

    let response: AxiosResponse;
    try {
      response = await this.client.request(axiosConfig);
    } catch (error) {
      const mapped = this.mapTransportError(error);
      this.logger.error('Request failed', mapped, { method: req.method, path: req.path });
      throw mapped;
    }

    const headers = this.normalizeHeaders(response.headers);
    const requestId = headers['x-request-id'];

    this.logger.debug('Received response', {
      method: req.method,
      path: req.path,
      status: response.status,
      durationMs: Date.now() - startedAt,
      requestId,
    });

    return {
      status: response.status,
      headers,
      data: response.data,
      requestId,
    };
  }

  private mapTransportError(error: unknown): PinataError {
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return PinataError.timeout(`Request timed out after ${this.config.timeout}ms`, error);
      }
      return PinataError.network(`Network error: ${error.message}`, error);
    }
    if (error instanceof Error) {
      return PinataError.network(error.message, error);
    }
    return PinataError.network('Unknown network error');
  }

  private normalizeHeaders(headers: object): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        result[key.toLowerCase()] = value;
      } else if (Array.isArray(value)) {
        result[key.toLowerCase()] = value.join(', ');
      }
    }
    return result;
  }
}

/**
 * Drops unset values so that they produce no query parameter.
 */
export function buildQuery(params: Record<string, string | number | undefined>): QueryParams {
  const query: QueryParams = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      query[key] = value;
    }
  }
  return query;
}

export { parseResult, parseOkResult } from './response';
