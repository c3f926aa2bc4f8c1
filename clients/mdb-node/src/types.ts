import type { Log } from 'freshlog';
import type { ChangeListener } from './change-listener.js';

/**
 * Link from a resource to another resource
 */
export interface Link {
  rel: string;
  href: string;
  type?: string;
  subType?: string;
}

/**
 * JSON resource representation as served by mdb
 */
export interface Resource {
  resId?: string;
  type?: string;
  subType?: string;
  links?: Link[];
  [field: string]: unknown;
}

/**
 * Payload posted to create or change a resource
 */
export type Payload = Record<string, unknown>;

export type HeaderMap = Record<string, string>;

export type QueryParams = Record<string, string>;

export interface ReferenceValue extends Resource {
  reference?: string;
}

export interface Contributor extends Resource {
  contact?: { title?: string; resId?: string };
  role?: { title?: string; resId?: string };
  characterName?: string;
  capacity?: string;
  comment?: string;
}

export interface Subject extends Resource {
  title?: string;
}

export interface Locator extends Resource {
  identifier?: string;
  storageType?: { resId?: string };
}

export interface TimelineItem extends Resource {
  title?: string;
  description?: string;
  offset?: string | number | null;
  duration?: string | number | null;
  event?: string;
  appliesToFullTimeline?: boolean;
}

export interface EditorialObject extends Resource {
  title?: string;
  contributors?: Contributor[];
  references?: ReferenceValue[];
  subjects?: Subject[];
}

export interface MasterEO extends EditorialObject {
  type: 'http://id.nrk.no/2016/mdb/types/MasterEditorialObject';
  isMetadataMeo?: boolean;
  versionGroup?: Resource;
  mediaObjects?: Resource[];
  publications?: Resource[];
  timelines?: Resource[];
}

export interface MasterEOResource extends EditorialObject {
  type: 'http://id.nrk.no/2016/mdb/types/MasterEOResource';
}

export interface PublicationEvent extends EditorialObject {
  type: 'http://id.nrk.no/2016/mdb/types/PublicationEvent';
  publishes?: Resource;
  pmos?: Resource[];
}

export interface VersionGroup extends Resource {
  type: 'http://id.nrk.no/2016/mdb/types/VersionGroup';
  metadataMeo?: Resource;
}

export interface MediaObject extends Resource {
  type: 'http://id.nrk.no/2016/mdb/types/MediaObject';
  masterEO?: Resource;
  resources?: Resource[];
  publishedVersions?: Resource[];
}

export interface PublicationMediaObject extends Resource {
  type: 'http://id.nrk.no/2016/mdb/types/PublicationMediaObject';
  playouts?: Resource[];
  publishedVersionOf?: Resource;
}

export interface MediaResource extends Resource {
  type: 'http://id.nrk.no/2016/mdb/types/MediaResource';
  mediaObject?: Resource;
  essences?: Resource[];
  locators?: Locator[];
}

export interface Essence extends Resource {
  type: 'http://id.nrk.no/2016/mdb/types/Essence';
  composedOf?: Resource;
  playoutOf?: Resource;
}

export interface Timeline extends Resource {
  type: string;
  masterEO?: Resource;
  items?: TimelineItem[];
  subjects?: Subject[];
  spatials?: Array<{ name?: string }>;
  contributors?: Contributor[];
}

/**
 * Subset of the freshlog logger the client writes to
 */
export type ClientLogger = Pick<typeof Log, 'trace' | 'warn' | 'error'>;

/**
 * fetch as the transport calls it
 */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Options shared by every client level
 */
export interface JsonApiOptions {
  userId: string;
  correlationId?: string;
  sourceSystem?: string;
  batchId?: string;
  /** host (and port) every link is rewritten to, scheme forced to http */
  forceHost?: string;
  fetch?: FetchFn;
  logger?: ClientLogger;
  changeListener?: ChangeListener;
}

export interface ResolveOptions {
  failOnMissing?: boolean;
  headers?: HeaderMap;
}

export interface CreateTimelineOptions {
  /** create the timeline without its items */
  shallow?: boolean;
  headers?: HeaderMap;
}
