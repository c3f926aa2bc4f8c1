/**
 * Base error for mdb operations
 */
export class MdbError extends Error {
  constructor(
    public code: string,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MdbError';
  }
}

/**
 * Network/connection errors
 */
export class NetworkError extends MdbError {
  constructor(message: string, cause?: unknown) {
    super('NETWORK_ERROR', message, { cause });
    this.name = 'NetworkError';
  }
}

/**
 * Non-success HTTP status from the server
 */
export class HttpError extends MdbError {
  constructor(
    public readonly status: number,
    public readonly uri: string,
    public readonly requestPayload: unknown,
    public readonly body: unknown,
    code = 'HTTP_ERROR'
  ) {
    super(code, `HTTP ${status} for ${uri}`, { status, uri, body });
    this.name = 'HttpError';
  }
}

export class BadRequestError extends HttpError {
  constructor(uri: string, requestPayload: unknown, body: unknown) {
    super(400, uri, requestPayload, body, 'BAD_REQUEST');
    this.name = 'BadRequestError';
  }
}

export class NotFoundError extends HttpError {
  constructor(
    uri: string,
    requestPayload: unknown,
    body: unknown,
    public readonly params?: Record<string, string>
  ) {
    super(404, uri, requestPayload, body, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends HttpError {
  constructor(uri: string, requestPayload: unknown, body: unknown) {
    super(409, uri, requestPayload, body, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

/**
 * The aggregate behind the URI has been removed
 */
export class GoneError extends HttpError {
  constructor(uri: string, requestPayload: unknown, body: unknown) {
    super(410, uri, requestPayload, body, 'GONE');
    this.name = 'GoneError';
  }
}

/**
 * The resource has no link with the requested relation
 */
export class RelationNotFoundError extends MdbError {
  constructor(
    public readonly rel: string,
    owner: string | undefined
  ) {
    super(
      'RELATION_NOT_FOUND',
      `Could not find relation ${rel} in ${owner ?? 'resource'}`,
      { rel, owner }
    );
    this.name = 'RelationNotFoundError';
  }
}

/**
 * Response body that is not the JSON the client expected
 */
export class MalformedResponseError extends MdbError {
  constructor(
    message: string,
    public readonly uri: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super('MALFORMED_RESPONSE', message, { uri, status, cause });
    this.name = 'MalformedResponseError';
  }
}

/**
 * Well-formed response of the wrong resource type or cardinality
 */
export class UnexpectedResourceError extends MdbError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('UNEXPECTED_RESOURCE', message, details);
    this.name = 'UnexpectedResourceError';
  }
}

export class InvalidArgumentError extends MdbError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Request attempted on, or interrupted by, a closed client
 */
export class ClientClosedError extends MdbError {
  constructor(uri?: string) {
    super(
      'CLIENT_CLOSED',
      uri ? `Client closed before request to ${uri} completed` : 'Client is closed',
      { uri }
    );
    this.name = 'ClientClosedError';
  }
}

export class ConfigError extends MdbError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
    this.name = 'ConfigError';
  }
}
