/**
 * Error taxonomy for the RSS Reader client.
 *
 * Every failure surfaced by the client is an `RssReaderError`. The subclasses tell the
 * caller whether the server rejected the key, answered with another error status, could
 * not be reached, or answered with a body that does not decode.
 */

export class RssReaderError extends Error {
  constructor(message = "An error occurred with the RSS Reader client", options?: ErrorOptions) {
    super(message, options);
    this.name = "RssReaderError";
  }
}

/** Non-2xx response other than 401. */
export class ApiError extends RssReaderError {
  readonly statusCode: number;

  constructor(statusCode: number, message?: string) {
    super(message || `API Error (Status code: ${statusCode})`);
    this.name = "ApiError";
    this.statusCode = statusCode;
  }
}

export class AuthenticationError extends RssReaderError {
  constructor(message = "Authentication failed. Check your API key.") {
    super(message);
    this.name = "AuthenticationError";
  }
}

/** No HTTP response was obtained at all (DNS, refused connection, timeout, TLS). */
export class ConnectionError extends RssReaderError {
  constructor(message = "Failed to connect to the RSS Reader API", options?: ErrorOptions) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

/** A 2xx response whose body is not JSON or does not match the expected record shape. */
export class ResponseDecodeError extends RssReaderError {
  readonly path?: string;

  constructor(message: string, options?: ErrorOptions & { path?: string }) {
    super(message, options);
    this.name = "ResponseDecodeError";
    this.path = options?.path;
  }
}

export function describeError(err: unknown): string {
  if (!(err instanceof Error)) {
    return String(err);
  }
  const cause = err.cause instanceof Error ? err.cause.message : undefined;
  if (cause && cause !== err.message) {
    return `${err.message} (${cause})`;
  }
  return err.message;
}
