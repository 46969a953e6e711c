/**
 * HTTP Errors
 *
 * Error taxonomy for the request pipeline. Errors that carry a status code
 * extend HttpError so the dispatcher can turn them into a response; the rest
 * describe contract violations or transport failures.
 */

/**
 * Base HTTP error class with status code support
 */
export class HttpError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.statusCode = statusCode;
  }

  toJSON(): { error: string; status: number } {
    return {
      error: this.message,
      status: this.statusCode,
    };
  }
}

/**
 * 400 Bad Request
 */
export class BadRequestError extends HttpError {
  constructor(message = 'Bad Request', cause?: unknown) {
    super(message, 400, cause);
  }
}

/**
 * Request line without a method and a target
 */
export class MalformedRequestLineError extends BadRequestError {
  readonly line: string;

  constructor(line: string) {
    super('Malformed request line');
    this.line = line;
  }
}

/**
 * Request head or body over the configured limit (431 for the head, 413 for the body)
 */
export class RequestTooLargeError extends HttpError {
  readonly limit: number;

  constructor(part: 'head' | 'body', limit: number) {
    super(
      part === 'head' ? 'Request Header Fields Too Large' : 'Payload Too Large',
      part === 'head' ? 431 : 413,
    );
    this.limit = limit;
  }
}

export class BodyDecodeError extends HttpError {
  constructor(message: string, cause?: unknown) {
    super(message, 400, cause);
  }
}

export class BodyAlreadyConsumedError extends HttpError {
  constructor() {
    super('Request body already consumed', 400);
  }
}

export class AssetNotFoundError extends HttpError {
  readonly path: string;

  constructor(path: string) {
    super('Asset not found', 404);
    this.path = path;
  }
}

export class PathTraversalError extends HttpError {
  readonly requested: string;

  constructor(requested: string) {
    super('Path escapes the static root', 404);
    this.requested = requested;
  }
}

/**
 * Raised when a response is modified or sent after its status line went out
 */
export class ResponseStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResponseStateError';
  }
}

/**
 * Raised when a response value cannot be serialized
 */
export class EncodeError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'EncodeError';
  }
}

/**
 * A socket write failed mid-response; the connection has been destroyed
 */
export class ConnectionWriteError extends Error {
  constructor(cause: unknown) {
    super('Connection write failed', { cause });
    this.name = 'ConnectionWriteError';
  }
}

/**
 * The listener could not bind or stopped accepting connections
 */
export class ListenerError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ListenerError';
  }
}

export class RouteDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RouteDefinitionError';
  }
}

/**
 * Extracts a message from an unknown thrown value
 */
export function extractErrorMessage(error: unknown, defaultMessage = 'An error occurred'): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string' && error) {
    return error;
  }
  return defaultMessage;
}
