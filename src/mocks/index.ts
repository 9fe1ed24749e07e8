/**
 * Mocks for testing Data API integrations.
 */

import type { FormData } from 'undici';
import type { HttpMethod, HttpTransport, TransportRequest, TransportResponse } from '../transport/index.js';
import { envelope, sleep } from './helpers.js';

export { envelope, sleep } from './helpers.js';
export { InMemoryDataApi } from './in-memory-server.js';
export type {
  InMemoryDataApiOptions,
  InMemoryFieldDefinition,
  InMemoryLayoutDefinition,
  InMemoryPortalDefinition,
  RecordedRequest,
  StoredPortalRow,
  StoredRecordSnapshot,
} from './in-memory-server.js';

/**
 * Mock response configuration
 */
export interface MockResponse {
  /** Envelope object (serialized as JSON) or raw body text */
  body: unknown;
  status?: number;
  headers?: Record<string, string>;
  /** Milliseconds before the response is delivered */
  delay?: number;
  /** Remove the mock after its first use */
  once?: boolean;
}

/**
 * Mock request matcher
 */
export interface MockMatcher {
  url?: string | RegExp;
  method?: HttpMethod;
}

/**
 * A request seen by the mock transport, with its JSON body decoded.
 */
export interface MockCall {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: unknown;
  form?: FormData;
}

/**
 * Mock HTTP transport for testing
 */
export class MockHttpTransport implements HttpTransport {
  private mocks: Array<{ matcher: MockMatcher; response: MockResponse }> = [];
  private calls: MockCall[] = [];
  private defaultResponse: MockResponse = {
    body: envelope(),
    status: 200,
  };

  /**
   * Add mock response
   */
  mock(matcher: MockMatcher | string | RegExp, response: MockResponse): this {
    const normalized =
      typeof matcher === 'string' || matcher instanceof RegExp ? { url: matcher } : matcher;
    this.mocks.push({ matcher: normalized, response });
    return this;
  }

  /**
   * Set default response
   */
  setDefaultResponse(response: MockResponse): this {
    this.defaultResponse = response;
    return this;
  }

  /**
   * Get all calls made
   */
  getCalls(): MockCall[] {
    return [...this.calls];
  }

  /**
   * Get calls matching a URL
   */
  getCallsTo(url: string | RegExp): MockCall[] {
    return this.calls.filter((call) =>
      typeof url === 'string' ? call.url.includes(url) : url.test(call.url)
    );
  }

  /**
   * Clear all mocks and calls
   */
  reset(): this {
    this.mocks = [];
    this.calls = [];
    return this;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const body = request.body;
    this.calls.push({
      method: request.method,
      url: request.url,
      headers: { ...request.headers },
      body: typeof body === 'string' ? JSON.parse(body) : undefined,
      form: body !== undefined && typeof body !== 'string' ? body : undefined,
    });

    const index = this.mocks.findIndex(({ matcher }) => this.matches(matcher, request));
    const mock = index >= 0 ? this.mocks[index] : undefined;
    if (mock?.response.once) {
      this.mocks.splice(index, 1);
    }
    const response = mock?.response ?? this.defaultResponse;

    if (response.delay) {
      await sleep(response.delay, request.signal);
    }

    return {
      status: response.status ?? 200,
      headers: response.headers ?? {},
      body: typeof response.body === 'string' ? response.body : JSON.stringify(response.body),
    };
  }

  private matches(matcher: MockMatcher, request: TransportRequest): boolean {
    if (matcher.url) {
      const hit =
        typeof matcher.url === 'string'
          ? request.url.includes(matcher.url)
          : matcher.url.test(request.url);
      if (!hit) return false;
    }
    if (matcher.method && request.method !== matcher.method) {
      return false;
    }
    return true;
  }
}
