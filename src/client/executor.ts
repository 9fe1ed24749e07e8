/**
 * Sends one Data API request and turns the reply into either a validated
 * envelope or a typed error.
 *
 * @module client/executor
 */

import type { FormData } from 'undici';
import type { DataApiConfig } from '../config.js';
import {
  ServiceCode,
  errorMessage,
  fromServiceMessage,
  isDataApiError,
} from '../errors.js';
import { MetricNames, type Observability } from '../observability/index.js';
import { parseEnvelope } from '../parser/index.js';
import type { HttpMethod, HttpTransport } from '../transport/index.js';
import type { CallOptions } from '../types/index.js';
import { Deadline } from './deadline.js';
import type { Params } from './params.js';

/**
 * A request as built by the client.
 */
export interface ApiRequest {
  /** Operation name used in logs and metric labels */
  operation: string;
  method: HttpMethod;
  /** Path below `/fmi/data/{apiVersion}` */
  path: string;
  query?: Params;
  /** Serialized as JSON */
  body?: unknown;
  /** Multipart body, sent instead of `body` */
  form?: FormData;
  /** Value of the Authorization header */
  authorization?: string;
  /** Deadline of the operation the request belongs to */
  deadline: Deadline;
}

/**
 * A successful reply.
 */
export interface ApiResponse {
  status: number;
  headers: Record<string, string>;
  response: Record<string, unknown>;
  messages: Array<{ code: number; message: string }>;
}

/**
 * Builds URLs and headers, applies the deadline, validates the envelope and
 * maps service messages to errors. Never retries.
 */
export class ApiExecutor {
  private readonly root: string;

  constructor(
    private readonly config: DataApiConfig,
    private readonly transport: HttpTransport,
    private readonly observability: Observability
  ) {
    this.root = `${config.baseUrl}/fmi/data/${config.apiVersion}`;
  }

  /**
   * Starts the deadline of an operation: the caller's shared deadline, or
   * one of `timeout` (default: the configured timeout) from now.
   */
  startDeadline(options: CallOptions = {}): Deadline {
    return options.deadline ?? new Deadline(options.timeout ?? this.config.timeout);
  }

  async execute(request: ApiRequest): Promise<ApiResponse> {
    const { logger, metrics } = this.observability;
    const labels = { operation: request.operation };
    const started = Date.now();

    metrics.increment(MetricNames.OPERATIONS_TOTAL, 1, labels);
    logger.debug('Sending request', {
      operation: request.operation,
      method: request.method,
      path: request.path,
    });

    try {
      const reply = await request.deadline.run((signal) =>
        this.transport.send({
          method: request.method,
          url: this.buildUrl(request.path, request.query),
          headers: this.buildHeaders(request),
          body: request.form ?? (request.body === undefined ? undefined : JSON.stringify(request.body)),
          signal,
        })
      );

      const envelope = parseEnvelope(reply.body, reply.status);
      const first = envelope.messages[0];
      if (first.code !== ServiceCode.Success) {
        throw fromServiceMessage(first.code, first.message, reply.status);
      }

      return {
        status: reply.status,
        headers: reply.headers,
        response: envelope.response,
        messages: envelope.messages,
      };
    } catch (error) {
      const code = isDataApiError(error) ? error.code : 'UNKNOWN';
      metrics.increment(MetricNames.ERRORS_TOTAL, 1, { ...labels, code });
      logger.error('Request failed', {
        operation: request.operation,
        path: request.path,
        code,
        serviceCode: isDataApiError(error) ? error.serviceCode : undefined,
        error: errorMessage(error),
      });
      throw error;
    } finally {
      metrics.timing(MetricNames.OPERATION_LATENCY, Date.now() - started, labels);
    }
  }

  private buildUrl(path: string, query?: Params): string {
    const url = new URL(`${this.root}${path}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.append(key, String(value));
        }
      }
    }
    return url.toString();
  }

  private buildHeaders(request: ApiRequest): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent,
      Accept: 'application/json',
    };
    // multipart bodies carry their own content type and boundary
    if (request.body !== undefined && !request.form) {
      headers['Content-Type'] = 'application/json';
    }
    if (request.authorization) {
      headers['Authorization'] = request.authorization;
    }
    return headers;
  }
}
