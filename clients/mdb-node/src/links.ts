import { RelationNotFoundError, UnexpectedResourceError } from './errors.js';
import type { Link, Payload, Resource } from './types.js';

export const SELF = 'self';

/**
 * Check that a parsed JSON value has the shape of a resource
 */
export function isResource(value: unknown): value is Resource {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const links: unknown = Reflect.get(value, 'links');
  return links === undefined || (Array.isArray(links) && links.every(isLink));
}

export function isLink(value: unknown): value is Link {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'rel') === 'string' &&
    typeof Reflect.get(value, 'href') === 'string'
  );
}

/**
 * Resolve a relation name against a resource.
 *
 * Looks in the links section first, then at a field of the same name
 * holding either an `href` or an embedded resource with a self link.
 */
export function findLink(owner: Resource, rel: string): string | undefined {
  const link = owner.links?.find(candidate => candidate.rel === rel);
  if (link) {
    return link.href;
  }

  if (rel === SELF) {
    return undefined;
  }

  const embedded = owner[rel];
  if (typeof embedded !== 'object' || embedded === null) {
    return undefined;
  }
  const href: unknown = Reflect.get(embedded, 'href');
  if (typeof href === 'string') {
    return href;
  }
  return isResource(embedded) ? findLink(embedded, SELF) : undefined;
}

/**
 * Resolve a relation name, failing when the resource lacks it
 */
export function link(owner: Resource, rel: string): string {
  const href = findLink(owner, rel);
  if (href === undefined) {
    throw new RelationNotFoundError(rel, describe(owner));
  }
  return href;
}

export function selfLink(owner: Resource): string {
  return link(owner, SELF);
}

function describe(owner: Resource): string | undefined {
  return owner.resId ?? owner.links?.find(l => l.rel === SELF)?.href;
}

/**
 * Strip server-owned identity from a resource so it can be posted as a new one
 */
export function cloneForCreate(item: Resource): Payload {
  const { resId: _resId, links: _links, ...rest } = item;
  return rest;
}

/**
 * Reference payload pointing at an existing resource
 */
export function resIdRef(resource: Resource): { resId: string } {
  if (!resource.resId) {
    throw new UnexpectedResourceError('Resource has no resId', { resource });
  }
  return { resId: resource.resId };
}

export class MdbLinks {
  constructor(private readonly links: Link[]) {}

  get length(): number {
    return this.links.length;
  }

  selectSingle(rel: string): Link {
    const matching = this.links.filter(l => l.rel === rel);
    if (matching.length > 1) {
      throw new UnexpectedResourceError(`Multiple links match rel=${rel}`, { rel });
    }
    const [only] = matching;
    if (!only) {
      throw new RelationNotFoundError(rel, undefined);
    }
    return only;
  }

  self(): Link {
    return this.selectSingle(SELF);
  }

  static of(owner: Resource): MdbLinks | undefined {
    return owner.links && owner.links.length > 0 ? new MdbLinks(owner.links) : undefined;
  }
}

/**
 * Embedded reference held in a field of its owner
 */
export function referenceTo(owner: Resource, field: string): Resource | undefined {
  const value = owner[field];
  return isResource(value) ? value : undefined;
}

export function referenceCollection(owner: Resource, field: string): ResourceReferenceCollection {
  const value = owner[field];
  const children = Array.isArray(value) ? value.filter(isResource) : [];
  return new ResourceReferenceCollection(children, owner, field);
}

/**
 * Embedded references held in an array field of their owner
 */
export class ResourceReferenceCollection implements Iterable<Resource> {
  constructor(
    readonly children: Resource[],
    private readonly owner: Resource,
    private readonly collectionName: string
  ) {}

  get length(): number {
    return this.children.length;
  }

  [Symbol.iterator](): Iterator<Resource> {
    return this.children[Symbol.iterator]();
  }

  ofType(type: string): ResourceReferenceCollection {
    return this.filtered(child => child.type === type);
  }

  ofSubtype(subType: string): ResourceReferenceCollection {
    return this.filtered(child => child.subType === subType);
  }

  first(): Resource | undefined {
    return this.children[0];
  }

  at(index: number): Resource | undefined {
    return this.children[index];
  }

  single(): Resource {
    const found = this.singleOrNone();
    if (!found) {
      throw new UnexpectedResourceError(
        `Requested single element of empty ${this.collectionName}`,
        { collection: this.collectionName }
      );
    }
    return found;
  }

  singleOrNone(): Resource | undefined {
    if (this.children.length > 1) {
      throw new UnexpectedResourceError(
        `Requested single element of ${this.collectionName} from ${describe(this.owner) ?? 'resource'} which has multiple elements`,
        { collection: this.collectionName, size: this.children.length }
      );
    }
    return this.first();
  }

  private filtered(predicate: (child: Resource) => boolean): ResourceReferenceCollection {
    return new ResourceReferenceCollection(
      this.children.filter(predicate),
      this.owner,
      this.collectionName
    );
  }
}
