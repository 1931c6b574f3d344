/**
 * Raised while building a client or service when a required setting is
 * missing or malformed. Thrown before any network call is made.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Non-success HTTP response from the Writer completions endpoint.
 */
export class WriterAPIError extends Error {
  public readonly status: number;
  public readonly body: string;

  constructor(status: number, body: string) {
    super(`Writer API request failed with status ${status}: ${body}`);
    this.name = 'WriterAPIError';
    this.status = status;
    this.body = body;
  }
}
