export { MdbClient, type ReindexKind } from './client.js';
export { MdbJsonApi, DEFAULT_BATCH_ID } from './json-api.js';
export { RestTransport, type StandardResponse, type TransportOptions } from './transport.js';
export { withClient, type Closeable } from './session.js';
export { loadConfig, DEFAULT_MDB_URL, type MdbClientConfig } from './config.js';
export {
  MdbError,
  NetworkError,
  HttpError,
  BadRequestError,
  NotFoundError,
  ConflictError,
  GoneError,
  RelationNotFoundError,
  MalformedResponseError,
  UnexpectedResourceError,
  InvalidArgumentError,
  ClientClosedError,
  ConfigError
} from './errors.js';
export {
  Change,
  RecordingChangeListener,
  VoidChangeListener,
  type ChangeListener,
  type ChangeType
} from './change-listener.js';
export {
  MdbLinks,
  ResourceReferenceCollection,
  SELF,
  cloneForCreate,
  findLink,
  isResource,
  link,
  referenceCollection,
  referenceTo,
  resIdRef,
  selfLink
} from './links.js';
export { Relations, type Relation } from './relations.js';
export * from './resources.js';
export * from './timeline.js';
export * from './diff.js';
export { ResId, ResIdBases, asId, asResId, isUuid, matchesKind, parseResId, type ResIdKind } from './ids.js';
export type {
  ClientLogger,
  Contributor,
  CreateTimelineOptions,
  EditorialObject,
  Essence,
  FetchFn,
  HeaderMap,
  JsonApiOptions,
  Link,
  Locator,
  MasterEO,
  MasterEOResource,
  MediaObject,
  MediaResource,
  Payload,
  PublicationEvent,
  PublicationMediaObject,
  QueryParams,
  ReferenceValue,
  ResolveOptions,
  Resource,
  Subject,
  Timeline,
  TimelineItem,
  VersionGroup
} from './types.js';
