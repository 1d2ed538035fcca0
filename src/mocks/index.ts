/**
 * Mock infrastructure for testing code built on the Pinata client.
 */

import type { HttpRequest, HttpResponse, HttpTransport } from '../transport';

/**
 * Mock response to return.
 */
export interface MockResponse {
  status: number;
  data: unknown;
  headers?: Record<string, string>;
}

/**
 * Mock transport answering queued responses in order.
 *
 * When the queue is empty the default response (`200 {}`) is returned.
 */
export class MockHttpTransport implements HttpTransport {
  private readonly responses: Array<MockResponse | Error> = [];
  private readonly recorded: HttpRequest[] = [];
  private readonly defaultResponse: MockResponse = { status: 200, data: {} };

  addResponse(response: MockResponse): this {
    this.responses.push(response);
    return this;
  }

  addJsonResponse(data: unknown, status = 200): this {
    return this.addResponse({ status, data });
  }

  /**
   * Queues a failure in the service's error envelope.
   */
  addErrorResponse(status: number, message: string): this {
    return this.addResponse({ status, data: { error: message } });
  }

  /**
   * Queues a transport failure: the next request rejects with `error`.
   */
  addFailure(error: Error): this {
    this.responses.push(error);
    return this;
  }

  getRequests(): HttpRequest[] {
    return [...this.recorded];
  }

  getLastRequest(): HttpRequest | undefined {
    return this.recorded[this.recorded.length - 1];
  }

  async request<T = unknown>(req: HttpRequest): Promise<HttpResponse<T>> {
    this.recorded.push(req);

    const next = this.responses.shift() ?? this.defaultResponse;
    if (next instanceof Error) {
      throw next;
    }

    return {
      status: next.status,
      headers: next.headers ?? {},
      data: next.data as T,
      requestId: 'mock-request-id',
    };
  }
}

export function createMockTransport(): MockHttpTransport {
  return new MockHttpTransport();
}
