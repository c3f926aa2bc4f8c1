import { InvalidArgumentError } from './errors.js';

/**
 * Base URI of every kind of typed mdb identifier
 */
export const ResIdBases = {
  bag: 'http://id.nrk.no/2016/mdb/bag',
  serie: 'http://id.nrk.no/2016/mdb/serie',
  season: 'http://id.nrk.no/2016/mdb/season',
  masterEOResource: 'http://id.nrk.no/2016/mdb/masterEOResource',
  masterEO: 'http://id.nrk.no/2016/mdb/masterEO',
  publicationEvent: 'http://id.nrk.no/2016/mdb/publicationEvent',
  publicationMediaObject: 'http://id.nrk.no/2016/mdb/publicationMediaObject',
  mediaObject: 'http://id.nrk.no/2016/mdb/mediaObject',
  mediaResource: 'http://id.nrk.no/2016/mdb/mediaResource',
  essence: 'http://id.nrk.no/2016/mdb/essence',
  versionGroup: 'http://id.nrk.no/2016/mdb/versionGroup',
  timeline: 'http://id.nrk.no/2017/mdb/timeline'
} as const;

export type ResIdKind = keyof typeof ResIdBases;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}

function isKind(value: string): value is ResIdKind {
  return Object.prototype.hasOwnProperty.call(ResIdBases, value);
}

/**
 * Type-qualified identifier, `<base>/<guid>`
 */
export class ResId {
  private constructor(
    readonly kind: ResIdKind,
    readonly guid: string
  ) {}

  get base(): string {
    return ResIdBases[this.kind];
  }

  /** whether the guid part is a UUID; some legacy ids are not */
  get isUuid(): boolean {
    return isUuid(this.guid);
  }

  toString(): string {
    return `${this.base}/${this.guid}`;
  }

  equals(other: ResId): boolean {
    return this.kind === other.kind && this.guid.toLowerCase() === other.guid.toLowerCase();
  }

  static of(kind: ResIdKind, guid: string): ResId {
    if (!guid || guid.includes('/')) {
      throw new InvalidArgumentError(`${guid} is not a valid ${kind} id`);
    }
    return new ResId(kind, guid);
  }

  /**
   * Parse a resId string, optionally requiring a specific kind
   */
  static parse(resId: string, expected?: ResIdKind): ResId {
    const slash = resId.lastIndexOf('/');
    const head = resId.slice(0, slash);
    const guid = resId.slice(slash + 1);
    const kind = kindOfBase(head);

    if (slash < 0 || !kind || !guid) {
      throw new InvalidArgumentError(`Unknown type ${resId}`);
    }
    if (expected && kind !== expected) {
      throw new InvalidArgumentError(`${resId} is not a ${expected} resid`);
    }
    return new ResId(kind, guid);
  }

  static tryParse(resId: string, expected?: ResIdKind): ResId | undefined {
    try {
      return ResId.parse(resId, expected);
    } catch (error) {
      if (error instanceof InvalidArgumentError) {
        return undefined;
      }
      throw error;
    }
  }
}

function kindOfBase(base: string): ResIdKind | undefined {
  return Object.keys(ResIdBases)
    .filter(isKind)
    .find(kind => ResIdBases[kind] === base);
}

export function parseResId(resId: string): ResId {
  return ResId.parse(resId);
}

export function matchesKind(resId: string, kind: ResIdKind): boolean {
  return resId.startsWith(`${ResIdBases[kind]}/`);
}

/**
 * Bare guid of a resId, or the value itself when it is already a guid
 */
export function asId(id: ResId | string): string {
  if (id instanceof ResId) {
    return id.guid;
  }
  return ResId.tryParse(id)?.guid ?? id;
}

export function asResId(id: ResId | string, kind: ResIdKind): string {
  if (id instanceof ResId) {
    return id.toString();
  }
  return matchesKind(id, kind) ? id : ResId.of(kind, id).toString();
}
