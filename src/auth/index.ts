/**
 * Credentials for opening Data API sessions.
 * @module auth
 */

/**
 * Secret string wrapper to prevent accidental exposure.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value.
   * Use with caution - avoid logging or displaying.
   */
  expose(): string {
    return this.value;
  }

  /**
   * Returns a safe representation for logging.
   */
  toString(): string {
    return '[REDACTED]';
  }

  /**
   * Custom JSON serialization to prevent accidental exposure.
   */
  toJSON(): string {
    return '[REDACTED]';
  }
}

/**
 * Account used to log into a hosted database.
 */
export interface DataApiCredentials {
  /** Account name */
  username: string;
  /** Account password */
  password: SecretString;
}

/**
 * Credentials for an external data source the layout reads from.
 * Sent with the login request as `fmDataSource`.
 */
export interface DataSourceCredentials {
  /** Database (file) name of the external source */
  database: string;
  /** Account name */
  username: string;
  /** Account password */
  password: SecretString;
}

/**
 * Creates credentials from plain strings.
 * @param username - Account name.
 * @param password - Account password.
 */
export function createCredentials(username: string, password: string): DataApiCredentials {
  return { username, password: new SecretString(password) };
}

/**
 * Builds the `Authorization` header value for a login request.
 */
export function basicAuthHeader(credentials: DataApiCredentials): string {
  const encoded = Buffer.from(
    `${credentials.username}:${credentials.password.expose()}`
  ).toString('base64');
  return `Basic ${encoded}`;
}

/**
 * Builds the `Authorization` header value for a session request.
 */
export function bearerAuthHeader(token: string): string {
  return `Bearer ${token}`;
}

/**
 * Serializes data-source credentials into the login body shape.
 */
export function toDataSourcePayload(
  sources: readonly DataSourceCredentials[]
): Array<{ database: string; username: string; password: string }> {
  return sources.map((source) => ({
    database: source.database,
    username: source.username,
    password: source.password.expose(),
  }));
}
