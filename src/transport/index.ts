/**
 * HTTP transport layer.
 *
 * The client only needs "send a request, get status/headers/body back"; the
 * default implementation delegates to undici's fetch. Transports do not retry
 * and do not interpret the body.
 */

import { fetch, type FormData } from 'undici';
import { NetworkError, TimeoutError } from '../errors.js';

/**
 * HTTP method type.
 */
export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

/**
 * Request handed to a transport.
 */
export interface TransportRequest {
  method: HttpMethod;
  /** Absolute URL including query string */
  url: string;
  headers: Record<string, string>;
  /** Serialized JSON or multipart form */
  body?: string | FormData;
  /** Aborted when the caller's deadline passes */
  signal?: AbortSignal;
}

/**
 * Raw response returned by a transport.
 */
export interface TransportResponse {
  status: number;
  /** Header names are lower-cased */
  headers: Record<string, string>;
  body: string;
}

/**
 * Transport interface
 */
export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

/**
 * Default undici-based transport
 */
export class UndiciTransport implements HttpTransport {
  async send(request: TransportRequest): Promise<TransportResponse> {
    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: request.signal,
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        headers,
        body: await response.text(),
      };
    } catch (error) {
      // undici rejects with the abort reason when one was given
      if (error instanceof TimeoutError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TimeoutError(timeoutFromSignal(request.signal));
      }
      if (error instanceof Error) {
        throw new NetworkError(error.message, error);
      }
      throw new NetworkError('Unknown network error', error);
    }
  }
}

function timeoutFromSignal(signal: AbortSignal | undefined): number {
  const reason: unknown = signal?.reason;
  return reason instanceof TimeoutError ? reason.timeoutMs : 0;
}

/**
 * Create the default transport
 */
export function createTransport(): HttpTransport {
  return new UndiciTransport();
}
