/**
 * Error types for the Data API client.
 * @module errors
 */

/**
 * Service message codes the client reacts to.
 */
export enum ServiceCode {
  Success = 0,
  RecordMissing = 101,
  FieldMissing = 102,
  LayoutMissing = 105,
  InvalidCredentials = 212,
  ModIdMismatch = 306,
  NoRecordsMatch = 401,
  FindCriteriaEmpty = 400,
  InvalidToken = 952,
}

/**
 * Extra detail attached to an error.
 */
export interface ErrorDetails {
  /** Numeric code from the service message, when one was returned */
  serviceCode?: number;
  /** HTTP status of the response that carried the error */
  httpStatus?: number;
  /** Underlying cause */
  cause?: unknown;
}

/**
 * Base error class for Data API client operations.
 */
export abstract class DataApiError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;

  readonly serviceCode?: number;
  readonly httpStatus?: number;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = this.constructor.name;
    this.serviceCode = details.serviceCode;
    this.httpStatus = details.httpStatus;
  }

  /**
   * Formats the error for display.
   */
  toString(): string {
    let result = `[${this.code}] ${this.message}`;
    if (this.serviceCode !== undefined) {
      result += ` (service code ${this.serviceCode})`;
    }
    if (this.httpStatus !== undefined) {
      result += ` (HTTP ${this.httpStatus})`;
    }
    return result;
  }
}

/**
 * Invalid client configuration.
 */
export class ConfigurationError extends DataApiError {
  readonly code = 'FM_CONFIG';
  readonly retryable = false;

  constructor(message: string) {
    super(`Configuration error: ${message}`);
  }
}

/**
 * Login or logout failed.
 */
export class AuthError extends DataApiError {
  readonly code = 'FM_AUTH';
  readonly retryable = false;

  static invalidCredentials(message: string, httpStatus?: number): AuthError {
    return new AuthError(message, {
      serviceCode: ServiceCode.InvalidCredentials,
      httpStatus,
    });
  }

  static missingToken(): AuthError {
    return new AuthError('Login response did not include an access token');
  }
}

/**
 * An operation was attempted without a valid session token.
 */
export class NotAuthenticatedError extends DataApiError {
  readonly code = 'FM_NOT_AUTHENTICATED';
  readonly retryable = false;

  constructor(message = 'No valid session, call login() first') {
    super(message);
  }
}

/**
 * The service rejected the session token mid-session.
 */
export class TokenExpiredError extends DataApiError {
  readonly code = 'FM_TOKEN_EXPIRED';
  readonly retryable = false;

  constructor(message = 'Session token is no longer valid', details: ErrorDetails = {}) {
    super(message, { serviceCode: ServiceCode.InvalidToken, ...details });
  }
}

/**
 * Non-zero service message code without a more specific mapping.
 */
export class ServiceError extends DataApiError {
  readonly code: string = 'FM_SERVICE';
  readonly retryable = false;

  constructor(
    readonly serviceCode: number,
    readonly serviceMessage: string,
    httpStatus?: number
  ) {
    super(`Service returned error ${serviceCode}: ${serviceMessage}`, {
      serviceCode,
      httpStatus,
    });
  }
}

/**
 * The modification id sent with an edit did not match the record's current one.
 */
export class RecordConflictError extends ServiceError {
  override readonly code: string = 'FM_RECORD_CONFLICT';

  constructor(serviceMessage: string, httpStatus?: number) {
    super(ServiceCode.ModIdMismatch, serviceMessage, httpStatus);
  }
}

/**
 * Operation on a record that was deleted or never received an id.
 */
export class StaleRecordError extends DataApiError {
  readonly code = 'FM_STALE_RECORD';
  readonly retryable = false;

  static deleted(recordId: number | null): StaleRecordError {
    return new StaleRecordError(`Record ${recordId ?? '(unsaved)'} has been deleted`);
  }

  static missingId(): StaleRecordError {
    return new StaleRecordError('Record has no record id');
  }

  static goneFromPortal(portal: string, recordId: number | null): StaleRecordError {
    return new StaleRecordError(`Row ${recordId ?? '(unsaved)'} is no longer part of portal ${portal}`);
  }
}

/**
 * Field lookup or assignment for a field the record does not carry.
 */
export class UnknownFieldError extends DataApiError {
  readonly code = 'FM_UNKNOWN_FIELD';
  readonly retryable = false;

  constructor(readonly fieldName: string) {
    super(
      `No field named ${fieldName}. Only fields placed on the layout are returned by the Data API`
    );
  }
}

/**
 * A value was rejected before being sent.
 */
export class FieldValidationError extends DataApiError {
  readonly code = 'FM_FIELD_VALIDATION';
  readonly retryable = false;

  constructor(readonly fieldName: string, reason: string) {
    super(`Field ${fieldName}: ${reason}`);
  }
}

/**
 * The response body or envelope did not have the expected shape.
 */
export class ParseError extends DataApiError {
  readonly code = 'FM_PARSE';
  readonly retryable = false;
}

/**
 * The request did not complete before its deadline.
 */
export class TimeoutError extends DataApiError {
  readonly code = 'FM_TIMEOUT';
  readonly retryable = true;

  constructor(readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
  }
}

/**
 * The transport failed before a response arrived.
 */
export class NetworkError extends DataApiError {
  readonly code = 'FM_NETWORK';
  readonly retryable = true;

  constructor(message: string, cause?: unknown) {
    super(`Network error: ${message}`, { cause });
  }
}

/**
 * Creates an error from the first service message of a response.
 */
export function fromServiceMessage(
  serviceCode: number,
  message: string,
  httpStatus?: number
): DataApiError {
  switch (serviceCode) {
    case ServiceCode.InvalidToken:
      return new TokenExpiredError(message, { httpStatus });
    case ServiceCode.InvalidCredentials:
      return AuthError.invalidCredentials(message, httpStatus);
    case ServiceCode.ModIdMismatch:
      return new RecordConflictError(message, httpStatus);
    default:
      if (httpStatus === 401) {
        return new TokenExpiredError(message, { serviceCode, httpStatus });
      }
      return new ServiceError(serviceCode, message, httpStatus);
  }
}

/**
 * Type guard for DataApiError.
 */
export function isDataApiError(error: unknown): error is DataApiError {
  return error instanceof DataApiError;
}

/**
 * Type guard for retryable errors.
 */
export function isRetryableError(error: unknown): boolean {
  return isDataApiError(error) && error.retryable;
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
