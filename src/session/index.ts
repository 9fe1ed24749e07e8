/**
 * Session token lifecycle.
 *
 * @module session
 */

import {
  basicAuthHeader,
  toDataSourcePayload,
  type DataApiCredentials,
  type DataSourceCredentials,
} from '../auth/index.js';
import type { ApiExecutor, ApiResponse } from '../client/executor.js';
import type { Deadline } from '../client/deadline.js';
import type { DataApiPaths } from '../client/paths.js';
import {
  AuthError,
  NotAuthenticatedError,
  TimeoutError,
  errorMessage,
  isDataApiError,
} from '../errors.js';
import { MetricNames, type Observability } from '../observability/index.js';
import { loginResponseSchema } from '../parser/schemas.js';
import type { CallOptions } from '../types/index.js';

/**
 * Session state.
 */
export enum SessionState {
  /** No token held; only login is possible */
  NoToken = 'NoToken',
  /** A token is held and attached to every request */
  Valid = 'Valid',
  /** A dropped token is being released on the server */
  Invalidated = 'Invalidated',
}

const TOKEN_HEADER = 'x-fm-data-access-token';

function loginFailure(error: unknown): Error {
  if (error instanceof AuthError || error instanceof TimeoutError) {
    return error;
  }
  return new AuthError(`Login failed: ${errorMessage(error)}`, {
    serviceCode: isDataApiError(error) ? error.serviceCode : undefined,
    httpStatus: isDataApiError(error) ? error.httpStatus : undefined,
    cause: error,
  });
}

/**
 * Owns the access token of one client.
 *
 * Not safe for concurrent login/logout: callers sharing a client across
 * tasks serialize those calls themselves.
 */
export class SessionManager {
  private token: string | null = null;
  private current = SessionState.NoToken;

  constructor(
    private readonly executor: ApiExecutor,
    private readonly paths: DataApiPaths,
    private credentials: DataApiCredentials,
    private readonly dataSources: readonly DataSourceCredentials[],
    private readonly observability: Observability
  ) {}

  get state(): SessionState {
    return this.current;
  }

  get isValid(): boolean {
    return this.current === SessionState.Valid;
  }

  /**
   * Returns the token to attach to a request.
   * @throws {NotAuthenticatedError} Unless the session is valid
   */
  currentToken(): string {
    if (this.current !== SessionState.Valid || this.token === null) {
      throw new NotAuthenticatedError();
    }
    return this.token;
  }

  /**
   * Opens a session. A token already held is dropped first and released on
   * the server; failure to release it is logged and otherwise ignored.
   *
   * @param credentials - Account to use instead of the configured one
   * @throws {AuthError} If the login is rejected or the server is unreachable
   * @throws {TimeoutError} If the login does not complete in time
   */
  async login(credentials?: DataApiCredentials, options: CallOptions = {}): Promise<string> {
    if (credentials) {
      this.credentials = credentials;
    }

    const deadline = this.executor.startDeadline(options);
    const previous = this.token;
    if (previous !== null) {
      try {
        await this.release(previous, deadline);
      } catch (error) {
        this.observability.logger.warn('Could not release previous session token', {
          error: errorMessage(error),
        });
      }
    }

    let reply: ApiResponse;
    try {
      reply = await this.executor.execute({
        operation: 'login',
        method: 'POST',
        path: this.paths.sessions(),
        body: { fmDataSource: toDataSourcePayload(this.dataSources) },
        authorization: basicAuthHeader(this.credentials),
        deadline,
      });
    } catch (error) {
      throw loginFailure(error);
    }

    const parsed = loginResponseSchema.safeParse(reply.response);
    const token = (parsed.success ? parsed.data.token : undefined) ?? reply.headers[TOKEN_HEADER];
    if (!token) {
      throw AuthError.missingToken();
    }

    this.token = token;
    this.current = SessionState.Valid;
    this.observability.metrics.increment(MetricNames.SESSIONS_OPENED);
    this.observability.logger.info('Session opened', { username: this.credentials.username });
    return token;
  }

  /**
   * Closes the session. Local state is cleared whether or not the server
   * accepts the request. Does nothing without a token.
   *
   * @throws {AuthError} If the server call fails
   * @throws {TimeoutError} If the server call does not complete in time
   */
  async logout(options: CallOptions = {}): Promise<void> {
    const token = this.token;
    if (token === null) {
      return;
    }

    try {
      await this.release(token, this.executor.startDeadline(options));
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw error;
      }
      throw new AuthError(`Logout failed: ${errorMessage(error)}`, {
        serviceCode: isDataApiError(error) ? error.serviceCode : undefined,
        httpStatus: isDataApiError(error) ? error.httpStatus : undefined,
        cause: error,
      });
    }
    this.observability.logger.info('Session closed');
  }

  /**
   * Drops the token after the server rejected it. The next call needs a
   * fresh login.
   */
  invalidate(reason: string): void {
    if (this.token === null && this.current === SessionState.NoToken) {
      return;
    }
    this.token = null;
    this.current = SessionState.NoToken;
    this.observability.metrics.increment(MetricNames.SESSIONS_INVALIDATED);
    this.observability.logger.warn('Session invalidated', { reason });
  }

  private async release(token: string, deadline: Deadline): Promise<void> {
    this.token = null;
    this.current = SessionState.Invalidated;
    try {
      await this.executor.execute({
        operation: 'logout',
        method: 'DELETE',
        path: this.paths.session(token),
        deadline,
      });
    } finally {
      this.current = SessionState.NoToken;
    }
  }
}
