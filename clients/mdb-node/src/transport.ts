import { Log } from 'freshlog';
import { Agent } from 'undici';
import {
  BadRequestError,
  ClientClosedError,
  ConflictError,
  GoneError,
  HttpError,
  MalformedResponseError,
  NetworkError,
  NotFoundError
} from './errors.js';
import type { ClientLogger, FetchFn, HeaderMap, QueryParams } from './types.js';

/**
 * Unpacked response to a single request
 */
export interface StandardResponse {
  requestedUri: string;
  status: number;
  /** parsed JSON body; undefined when the server sent no content */
  body: unknown;
}

export interface TransportOptions {
  fetch?: FetchFn;
  logger?: ClientLogger;
}

interface RequestBody {
  contentType: string;
  data: string;
}

const JSON_CONTENT_TYPE = /^application\/([\w.+-]+\+)?json\b/i;

function isJson(contentType: string | null): boolean {
  return contentType !== null && JSON_CONTENT_TYPE.test(contentType);
}

function jsonBody(payload: unknown): RequestBody {
  return { contentType: 'application/json', data: JSON.stringify(payload) };
}

function withParams(uri: string, params?: QueryParams): string {
  if (!params || Object.keys(params).length === 0) {
    return uri;
  }
  const url = new URL(uri);
  for (const [name, value] of Object.entries(params)) {
    url.searchParams.set(name, value);
  }
  return url.toString();
}

/**
 * HTTP session against mdb.
 *
 * Holds no request state. Without an injected fetch it owns a connection
 * pool of its own. Closing it aborts whatever is in flight, destroys that
 * pool and rejects every later request.
 */
export class RestTransport {
  private readonly controller = new AbortController();
  private readonly agent?: Agent;
  private readonly fetchFn: FetchFn;
  private readonly logger: ClientLogger;

  constructor(options: TransportOptions = {}) {
    if (options.fetch) {
      this.fetchFn = options.fetch;
    } else {
      const agent = new Agent();
      this.agent = agent;
      this.fetchFn = (url, init) => fetch(url, { ...init, dispatcher: agent });
    }
    this.logger = options.logger ?? Log;
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.controller.abort();
    this.logger.trace('mdb session closed');
    await this.agent?.destroy();
  }

  async get(uri: string, headers: HeaderMap, params?: QueryParams): Promise<StandardResponse> {
    const target = withParams(uri, params);
    const response = await this.send('GET', target, headers);
    return this.unpackJsonResponse(response, target, undefined, params);
  }

  /**
   * GET returning the body as text, whatever its content type
   */
  async getText(uri: string, headers: HeaderMap, params?: QueryParams): Promise<string> {
    const target = withParams(uri, params);
    const response = await this.send('GET', target, headers);
    await this.raiseErrors(response, target, undefined, params);
    return this.readText(response, target);
  }

  async post(uri: string, payload: unknown, headers: HeaderMap): Promise<StandardResponse> {
    const response = await this.send('POST', uri, headers, jsonBody(payload));
    return this.unpackJsonResponse(response, uri, payload);
  }

  /**
   * POST, then GET the representation the response's Location points at
   */
  async postFollow(uri: string, payload: unknown, headers: HeaderMap): Promise<StandardResponse> {
    const response = await this.send('POST', uri, headers, jsonBody(payload));
    await this.raiseErrors(response, uri, payload);

    const location = response.headers.get('location');
    await this.readText(response, uri);
    if (!location) {
      throw new MalformedResponseError(
        `Response ${response.status} to POST ${uri} has no Location header`,
        uri,
        response.status
      );
    }
    return this.get(new URL(location, uri).toString(), headers);
  }

  async postForm(
    uri: string,
    fields: Record<string, string>,
    headers: HeaderMap
  ): Promise<StandardResponse> {
    const body = {
      contentType: 'application/x-www-form-urlencoded',
      data: new URLSearchParams(fields).toString()
    };
    const response = await this.send('POST', uri, headers, body);
    return this.unpackJsonResponse(response, uri, fields);
  }

  async put(uri: string, payload: unknown, headers: HeaderMap): Promise<StandardResponse> {
    const response = await this.send('PUT', uri, headers, jsonBody(payload));
    return this.unpackJsonResponse(response, uri, payload);
  }

  async delete(uri: string, headers: HeaderMap): Promise<StandardResponse> {
    const response = await this.send('DELETE', uri, headers);
    return this.unpackJsonResponse(response, uri);
  }

  private async send(
    method: string,
    uri: string,
    headers: HeaderMap,
    body?: RequestBody
  ): Promise<Response> {
    if (this.closed) {
      throw new ClientClosedError();
    }

    const requestHeaders = new Headers(headers);
    if (body && !requestHeaders.has('content-type')) {
      requestHeaders.set('content-type', body.contentType);
    }

    this.logger.trace(`${method} ${uri}`);
    let response: Response;
    try {
      response = await this.fetchFn(uri, {
        method,
        headers: requestHeaders,
        body: body?.data,
        signal: this.controller.signal
      });
    } catch (error) {
      if (this.closed) {
        throw new ClientClosedError(uri);
      }
      this.logger.error(`${method} ${uri} failed`, { error });
      throw new NetworkError(`Failed to connect to ${uri}`, error);
    }
    this.logger.trace(`${method} ${uri} ${response.status}`, { status: response.status });
    return response;
  }

  private async readText(response: Response, uri: string): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      if (this.closed) {
        throw new ClientClosedError(uri);
      }
      throw new NetworkError(`Failed to read response from ${uri}`, error);
    }
  }

  private async unpackJsonResponse(
    response: Response,
    uri: string,
    requestPayload?: unknown,
    params?: QueryParams
  ): Promise<StandardResponse> {
    await this.raiseErrors(response, uri, requestPayload, params);
    return {
      requestedUri: uri,
      status: response.status,
      body: await this.unpackContent(response, uri)
    };
  }

  private async unpackContent(response: Response, uri: string): Promise<unknown> {
    const { status } = response;
    if (status === 204) {
      return undefined;
    }
    if (status === 202 && response.headers.get('content-length') === '0') {
      return undefined;
    }

    const contentType = response.headers.get('content-type');
    const text = await this.readText(response, uri);
    if (!isJson(contentType)) {
      throw new MalformedResponseError(
        `Response ${status} to ${uri} is ${contentType ?? 'untyped'}: ${text.slice(0, 200)}`,
        uri,
        status
      );
    }
    return this.parseJson(text, uri, status);
  }

  private parseJson(text: string, uri: string, status: number): unknown {
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new MalformedResponseError(`Invalid JSON in response ${status} from ${uri}`, uri, status, error);
    }
  }

  /**
   * Error bodies are kept as JSON when they parse, as text otherwise
   */
  private async errorBody(response: Response, uri: string): Promise<unknown> {
    const text = await this.readText(response, uri);
    if (isJson(response.headers.get('content-type'))) {
      try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
      } catch {
        return text;
      }
    }
    return text;
  }

  private async raiseErrors(
    response: Response,
    uri: string,
    requestPayload?: unknown,
    params?: QueryParams
  ): Promise<void> {
    const { status } = response;
    if (status < 400) {
      return;
    }

    const body = await this.errorBody(response, uri);
    switch (status) {
      case 400:
        throw new BadRequestError(uri, requestPayload, body);
      case 404:
        throw new NotFoundError(uri, requestPayload, body, params);
      case 409:
        throw new ConflictError(uri, requestPayload, body);
      case 410:
        throw new GoneError(uri, requestPayload, body);
      default:
        throw new HttpError(status, uri, requestPayload, body);
    }
  }
}
