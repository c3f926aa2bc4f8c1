import { ResId, type ResIdKind } from '../src/ids.js';
import { Relations } from '../src/relations.js';
import { ResourceTypes } from '../src/resources.js';
import type { FetchFn, Payload, Resource } from '../src/types.js';

export const FAKE_HOST = 'http://mdb.test';
export const FAKE_API = `${FAKE_HOST}/api`;

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Headers;
  body?: string;
}

const COLLECTIONS: Record<string, { kind: ResIdKind; type?: string }> = {
  masterEO: { kind: 'masterEO', type: ResourceTypes.MasterEO },
  mediaObject: { kind: 'mediaObject', type: ResourceTypes.MediaObject },
  mediaResource: { kind: 'mediaResource', type: ResourceTypes.MediaResource },
  essence: { kind: 'essence', type: ResourceTypes.Essence },
  publicationEvent: { kind: 'publicationEvent', type: ResourceTypes.PublicationEvent },
  publicationMediaObject: { kind: 'publicationMediaObject', type: ResourceTypes.PublicationMediaObject },
  versionGroup: { kind: 'versionGroup', type: ResourceTypes.VersionGroup },
  timeline: { kind: 'timeline' },
  serie: { kind: 'serie' },
  season: { kind: 'season' }
};

const RELATION_FIELDS: Record<string, string> = {
  [Relations.SUBJECTS]: 'subjects',
  [Relations.REFERENCES]: 'references',
  [Relations.CATEGORIES]: 'categories',
  [Relations.CONTRIBUTORS]: 'contributors',
  [Relations.LOCATIONS]: 'locations',
  [Relations.ITEMS]: 'items',
  [Relations.FORMATS]: 'formats',
  [Relations.DOCUMENTS]: 'documents'
};

export function json(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers }
  });
}

function abortError(): Error {
  const error = new Error('This operation was aborted');
  error.name = 'AbortError';
  return error;
}

function isPayload(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * In-process stand-in for the mdb service, served through the fetch
 * function handed to the client
 */
export class FakeMdb {
  readonly requests: RecordedRequest[] = [];
  private readonly resources = new Map<string, Resource>();
  private readonly overrides = new Map<string, () => Response>();
  private readonly stalled = new Set<string>();
  private readonly unreachable = new Set<string>();
  private counter = 0;

  readonly fetch: FetchFn = async (url, init) => {
    const method = init.method ?? 'GET';
    const body = typeof init.body === 'string' ? init.body : undefined;
    this.requests.push({ method, url, headers: new Headers(init.headers), body });

    const signal = init.signal;
    if (signal?.aborted) {
      throw abortError();
    }
    const key = `${method} ${url}`;
    if (this.unreachable.has(url)) {
      throw new TypeError('fetch failed');
    }
    if (this.stalled.has(key)) {
      return new Promise<Response>((_, reject) => {
        signal?.addEventListener('abort', () => reject(abortError()));
      });
    }
    const override = this.overrides.get(key);
    if (override) {
      return override();
    }
    return this.handle(method, new URL(url), body);
  };

  /** answer the next requests to method+url with the given response */
  respond(method: string, url: string, response: () => Response): void {
    this.overrides.set(`${method} ${url}`, response);
  }

  /** never answer method+url; only an abort ends the request */
  stall(method: string, url: string): void {
    this.stalled.add(`${method} ${url}`);
  }

  /** fail every request to url as a connection error */
  refuse(url: string): void {
    this.unreachable.add(url);
  }

  /** store a representation served at url as is */
  seed(url: string, resource: Resource): void {
    this.resources.set(url, resource);
  }

  requestsTo(method: string, url: string): RecordedRequest[] {
    return this.requests.filter(r => r.method === method && r.url === url);
  }

  private handle(method: string, url: URL, body: string | undefined): Response {
    const path = `${url.origin}${url.pathname}`;
    const parsed: unknown = body === undefined || !body.startsWith('{') ? undefined : JSON.parse(body);
    const payload = isPayload(parsed) ? parsed : {};

    if (path.startsWith(`${FAKE_API}/`)) {
      const handled = this.handleApiMethod(method, path.slice(FAKE_API.length + 1), url.searchParams, payload);
      if (handled) {
        return handled;
      }
    }

    const stored = this.resources.get(path);
    if (stored) {
      return this.handleResource(method, path, stored, payload);
    }

    const slash = path.lastIndexOf('/');
    const owner = this.resources.get(path.slice(0, slash));
    const relation = path.slice(slash + 1);
    if (owner && method === 'POST') {
      const existing = owner[relation];
      owner[relation] = [...(Array.isArray(existing) ? existing : []), payload];
      return json(200, owner);
    }

    return json(404, { message: `No resource at ${path}` });
  }

  private handleApiMethod(
    method: string,
    name: string,
    params: URLSearchParams,
    payload: Payload
  ): Response | undefined {
    const collection = COLLECTIONS[name];
    if (method === 'POST' && collection) {
      const self = this.create(name, collection, payload);
      return new Response(null, { status: 201, headers: { location: self } });
    }

    if (method === 'GET' && name === 'resolve') {
      const found = this.all().find(r => r.resId === params.get('resId'));
      return found ? json(200, found) : json(404, { message: 'not found' });
    }

    if (method === 'GET' && name === 'references') {
      const type = params.get('type');
      const value = params.get('reference');
      const matching = this.all().filter(r =>
        Array.isArray(r.references) &&
        r.references.some(ref => isPayload(ref) && ref.type === type && ref.reference === value)
      );
      return json(200, matching);
    }

    if (method === 'GET' && name === 'mediaObject/by-name') {
      const found = this.all().find(r => r.type === ResourceTypes.MediaObject && r.name === params.get('name'));
      return found ? json(200, found) : json(404, { message: 'not found' });
    }

    if (method === 'GET' && name === 'serie/by_title') {
      const serie = this.all().filter(
        r => r.title === params.get('title') && r.masterSystem === params.get('masterSystem')
      );
      return json(200, { serie });
    }

    return undefined;
  }

  private handleResource(method: string, path: string, stored: Resource, payload: Payload): Response {
    switch (method) {
      case 'GET':
        return json(200, stored);
      case 'POST': {
        const updated = { ...stored, ...payload, resId: stored.resId, links: stored.links };
        this.resources.set(path, updated);
        return json(200, updated, { location: path });
      }
      case 'PUT': {
        const type = typeof payload.type === 'string' ? payload.type : stored.type;
        const replaced = { ...payload, resId: stored.resId, type, links: stored.links };
        this.resources.set(path, replaced);
        return json(200, replaced);
      }
      case 'DELETE':
        this.resources.set(path, { ...stored, deleted: true });
        return new Response(null, { status: 204 });
      default:
        return json(405, { message: `${method} not allowed` });
    }
  }

  private create(name: string, collection: { kind: ResIdKind; type?: string }, payload: Payload): string {
    this.counter += 1;
    const guid = `00000000-0000-4000-8000-${String(this.counter).padStart(12, '0')}`;
    const self = `${FAKE_API}/${name}/${guid}`;
    const relationLinks = Object.entries(RELATION_FIELDS).map(([rel, field]) => ({
      rel,
      href: `${self}/${field}`
    }));
    this.resources.set(self, {
      ...payload,
      resId: ResId.of(collection.kind, guid).toString(),
      type: collection.type ?? (typeof payload.type === 'string' ? payload.type : undefined),
      links: [{ rel: 'self', href: self }, ...relationLinks]
    });
    return self;
  }

  private all(): Resource[] {
    return [...this.resources.values()];
  }
}
