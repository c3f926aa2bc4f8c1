import { Log } from 'freshlog';
import { VoidChangeListener, type ChangeListener } from './change-listener.js';
import { InvalidArgumentError, MalformedResponseError, RelationNotFoundError } from './errors.js';
import { SELF, findLink, isResource } from './links.js';
import { RestTransport, type StandardResponse } from './transport.js';
import type { ClientLogger, HeaderMap, JsonApiOptions, Payload, Resource } from './types.js';

export const DEFAULT_BATCH_ID = 'default-batch-id';

/**
 * Works with mdb hyperlinked JSON objects.
 *
 * Every request carries the identifying headers of the session. The class
 * knows no server address: every URI comes from a payload, optionally
 * rewritten to `forceHost`. An "owner" below is any resource with a links
 * section.
 */
export class MdbJsonApi {
  changeListener: ChangeListener;

  protected readonly transport: RestTransport;
  protected readonly logger: ClientLogger;
  private readonly globalHeaders = new Headers();
  private readonly forceHost?: string;

  constructor(options: JsonApiOptions) {
    this.logger = options.logger ?? Log;
    this.transport = new RestTransport({ fetch: options.fetch, logger: this.logger });
    this.changeListener = options.changeListener ?? new VoidChangeListener();
    this.forceHost = options.forceHost;

    this.setOptionalHeader('X-Source-System', options.sourceSystem);
    this.setOptionalHeader('X-userId', options.userId);
    this.setOptionalHeader('X-transactionId', options.correlationId);
    this.setOptionalHeader('X-Batch-Identifier', options.batchId ?? DEFAULT_BATCH_ID);
  }

  get closed(): boolean {
    return this.transport.closed;
  }

  /**
   * Release the session and its connections. In-flight and later requests
   * fail with ClientClosedError.
   */
  async close(): Promise<void> {
    await this.transport.close();
  }

  addGlobalHeader(name: string, value: string): void {
    if (typeof value !== 'string') {
      throw new InvalidArgumentError(`header value for ${name} is not a string: ${typeof value}`);
    }
    this.globalHeaders.set(name, value);
  }

  /**
   * GET a URI and return the representation as served
   */
  async open(uri: string, headers?: HeaderMap): Promise<Resource> {
    const response = await this.transport.get(this.rewrittenLink(uri), this.mergedHeaders(headers));
    return this.toResource(response);
  }

  /**
   * Follow a relation of the owner
   */
  async openRel(owner: Resource, rel: string, headers?: HeaderMap): Promise<Resource> {
    return this.open(this.resolveRel(owner, rel), headers);
  }

  /**
   * Create or link a sub-resource under a relation of the owner
   */
  async addOnRel(
    owner: Resource,
    rel: string,
    payload: Payload,
    headers?: HeaderMap
  ): Promise<Resource | undefined> {
    const uri = this.rewrittenLink(this.resolveRel(owner, rel));
    const response = await this.transport.post(uri, payload, this.mergedHeaders(headers));
    this.changeListener.onAdd(owner.resId, rel, payload);
    return this.toOptionalResource(response);
  }

  /**
   * Fetch the current representation of the owner from its self link
   */
  async reload(owner: Resource, headers?: HeaderMap): Promise<Resource> {
    return this.openRel(owner, SELF, headers);
  }

  /**
   * Post changed fields to the owner and return its new representation
   */
  async update(owner: Resource, updates: Payload, headers?: HeaderMap): Promise<Resource> {
    const uri = this.rewrittenLink(this.resolveRel(owner, SELF));
    this.changeListener.onChange(owner.resId, undefined, updates);
    const response = await this.transport.postFollow(uri, updates, this.mergedHeaders(headers));
    return this.toResource(response);
  }

  /**
   * Replace the owner's content
   */
  async replace(owner: Resource, payload: Payload, headers?: HeaderMap): Promise<Resource> {
    const uri = this.rewrittenLink(this.resolveRel(owner, SELF));
    const response = await this.transport.put(uri, payload, this.mergedHeaders(headers));
    return this.toResource(response);
  }

  async delete(owner: Resource, headers?: HeaderMap): Promise<Resource | undefined> {
    const uri = this.rewrittenLink(this.resolveRel(owner, SELF));
    const response = await this.transport.delete(uri, this.mergedHeaders(headers));
    this.changeListener.onDelete(owner.resId);
    return this.toOptionalResource(response);
  }

  /**
   * Global headers overridden by the request's own, names compared without case
   */
  protected mergedHeaders(requestHeaders: HeaderMap = {}): HeaderMap {
    const merged = new Headers(this.globalHeaders);
    for (const [name, value] of Object.entries(requestHeaders)) {
      merged.set(name, value);
    }
    const result: HeaderMap = {};
    merged.forEach((value, name) => {
      result[name] = value;
    });
    return result;
  }

  protected rewrittenLink(link: string): string {
    if (!this.forceHost) {
      return link;
    }
    const forced = new URL(`http://${this.forceHost}`);
    const url = new URL(link);
    url.protocol = 'http:';
    url.hostname = forced.hostname;
    url.port = forced.port;
    return url.toString();
  }

  protected resolveRel(owner: Resource, rel: string): string {
    const href = findLink(owner, rel);
    if (href === undefined) {
      this.logger.warn(`relation ${rel} not found`, { resId: owner.resId });
      throw new RelationNotFoundError(rel, owner.resId);
    }
    try {
      return new URL(href, findLink(owner, SELF)).toString();
    } catch (error) {
      throw new MalformedResponseError(
        `Link ${href} of ${owner.resId ?? 'resource'} is not a valid URI`,
        href,
        undefined,
        error
      );
    }
  }

  protected toResource(response: StandardResponse): Resource {
    const { body, requestedUri, status } = response;
    if (!isResource(body)) {
      throw new MalformedResponseError(
        `Expected a resource from ${requestedUri}, got ${body === undefined ? 'no content' : typeof body}`,
        requestedUri,
        status
      );
    }
    return body;
  }

  protected toOptionalResource(response: StandardResponse): Resource | undefined {
    return response.body === undefined ? undefined : this.toResource(response);
  }

  protected toResourceList(response: StandardResponse): Resource[] {
    const { body, requestedUri, status } = response;
    if (!Array.isArray(body) || !body.every(isResource)) {
      throw new MalformedResponseError(`Expected a list of resources from ${requestedUri}`, requestedUri, status);
    }
    return body;
  }

  private setOptionalHeader(name: string, value: string | undefined): void {
    if (value !== undefined && value !== '') {
      this.addGlobalHeader(name, value);
    }
  }
}
