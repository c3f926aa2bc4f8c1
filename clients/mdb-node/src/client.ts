import { loadConfig } from './config.js';
import { InvalidArgumentError, NotFoundError, UnexpectedResourceError } from './errors.js';
import { asId } from './ids.js';
import { MdbJsonApi } from './json-api.js';
import { referenceCollection, resIdRef } from './links.js';
import { Relations } from './relations.js';
import {
  expectResource,
  isEssence,
  isMasterEO,
  isMediaObject,
  isMediaResource,
  isPublicationEvent,
  isPublicationMediaObject
} from './resources.js';
import { TimelineTypes, isTimeline } from './timeline.js';
import type {
  CreateTimelineOptions,
  Essence,
  HeaderMap,
  JsonApiOptions,
  MasterEO,
  MediaObject,
  MediaResource,
  Payload,
  PublicationEvent,
  PublicationMediaObject,
  QueryParams,
  ResolveOptions,
  Resource,
  Timeline
} from './types.js';

/**
 * Collections the search index can be rebuilt for, one item at a time
 */
export type ReindexKind =
  | 'masterEOs'
  | 'mediaObjects'
  | 'mediaResources'
  | 'publicationMediaObjects'
  | 'essences'
  | 'versionGroups'
  | 'publicationEvents';

/**
 * mdb client
 *
 * Domain operations on top of the hypermedia navigator. Named API methods
 * live under `<base>/api`; everything else is reached through links.
 */
export class MdbClient extends MdbJsonApi {
  readonly apiBase: string;

  constructor(apiBase: string, options: JsonApiOptions) {
    super(options);
    let parsed: URL;
    try {
      parsed = new URL(apiBase);
    } catch {
      throw new InvalidArgumentError(`Not a valid mdb URL: ${apiBase}`);
    }
    this.apiBase = `${parsed.protocol}//${parsed.host}/api`;
  }

  /**
   * Create a client from MDB_* environment variables
   */
  static fromEnv(
    env: Record<string, string | undefined> = process.env,
    overrides: Partial<JsonApiOptions> = {}
  ): MdbClient {
    const { url, ...config } = loadConfig(env);
    return new MdbClient(url, { ...config, ...overrides });
  }

  /**
   * URI of a named API method
   */
  apiMethod(name: string): string {
    return `${this.apiBase}/${name}`;
  }

  // ==================
  // Creation
  // ==================

  /**
   * Create a master EO
   */
  async createMasterEO(masterEO: Payload, headers?: HeaderMap): Promise<MasterEO> {
    const created = await this.invokeCreate('masterEO', masterEO, headers);
    return expectResource(created, isMasterEO, 'master EO');
  }

  /**
   * Create a media object belonging to the master EO
   */
  async createMediaObject(
    masterEO: Resource,
    mediaObject: Payload,
    headers?: HeaderMap
  ): Promise<MediaObject> {
    const payload = { ...mediaObject, masterEO: resIdRef(masterEO) };
    const created = await this.invokeCreate('mediaObject', payload, headers);
    return expectResource(created, isMediaObject, 'media object');
  }

  /**
   * Create a media resource of the media object
   */
  async createMediaResource(
    mediaObject: Resource,
    mediaResource: Payload,
    headers?: HeaderMap
  ): Promise<MediaResource> {
    const payload = { ...mediaResource, mediaObject: resIdRef(mediaObject) };
    const created = await this.invokeCreate('mediaResource', payload, headers);
    return expectResource(created, isMediaResource, 'media resource');
  }

  /**
   * Create an essence composed of the media resource and played out by the publication media object
   */
  async createEssence(
    publicationMediaObject: Resource,
    mediaResource: Resource,
    essence: Payload,
    headers?: HeaderMap
  ): Promise<Essence> {
    const payload = {
      ...essence,
      composedOf: resIdRef(mediaResource),
      playoutOf: resIdRef(publicationMediaObject)
    };
    const created = await this.invokeCreate('essence', payload, headers);
    return expectResource(created, isEssence, 'essence');
  }

  /**
   * Create a publication event publishing the master EO
   */
  async createPublicationEvent(
    masterEO: Resource,
    publicationEvent: Payload,
    headers?: HeaderMap
  ): Promise<PublicationEvent> {
    if (Object.keys(publicationEvent).length === 0) {
      throw new InvalidArgumentError('Cannot create an empty publication event');
    }
    const payload = { ...publicationEvent, publishes: resIdRef(masterEO) };
    const created = await this.invokeCreate('publicationEvent', payload, headers);
    return expectResource(created, isPublicationEvent, 'publication event');
  }

  /**
   * Create a publication media object of the event, published as a version of the media object
   */
  async createPublicationMediaObject(
    publicationEvent: Resource,
    mediaObject: Resource,
    publicationMediaObject: Payload,
    headers?: HeaderMap
  ): Promise<PublicationMediaObject> {
    const payload = {
      ...publicationMediaObject,
      publicationEvent: resIdRef(publicationEvent),
      publishedVersionOf: resIdRef(mediaObject)
    };
    const created = await this.invokeCreate('publicationMediaObject', payload, headers);
    return expectResource(created, isPublicationMediaObject, 'publication media object');
  }

  // ==================
  // Timelines
  // ==================

  /**
   * Create a timeline on the master EO. With `shallow` the items are left out
   */
  async createTimeline(
    masterEO: Resource,
    timeline: Payload,
    options: CreateTimelineOptions = {}
  ): Promise<Timeline> {
    const withMasterEO: Payload = { ...timeline, masterEO: resIdRef(masterEO) };
    const { items, ...withoutItems } = withMasterEO;
    const payload = options.shallow || items === undefined ? withoutItems : { ...withoutItems, items };
    const created = await this.invokeCreate('timeline', payload, options.headers);
    return expectResource(created, isTimeline, 'timeline');
  }

  /**
   * Create a rights timeline; any supplied type must be the rights type
   */
  async createRightsTimeline(
    masterEO: Resource,
    timeline: Payload,
    options: CreateTimelineOptions = {}
  ): Promise<Timeline> {
    const { type } = timeline;
    if (type !== undefined && type !== TimelineTypes.Rights) {
      throw new InvalidArgumentError(
        `Attempted to create a rights timeline with a supplied type ${String(type)}`
      );
    }
    return this.createTimeline(masterEO, { ...timeline, type: TimelineTypes.Rights }, options);
  }

  /**
   * Replace an existing timeline of the master EO
   */
  async replaceTimeline(
    masterEO: Resource,
    existingTimeline: Resource,
    timeline: Payload,
    headers?: HeaderMap
  ): Promise<Timeline> {
    const payload = { ...timeline, masterEO: resIdRef(masterEO) };
    const replaced = await this.replace(existingTimeline, payload, headers);
    return expectResource(replaced, isTimeline, 'timeline');
  }

  /**
   * Replace the master EO's timeline of the same type, or create one
   */
  async createOrReplaceTimeline(
    masterEO: Resource,
    timeline: Payload,
    headers?: HeaderMap
  ): Promise<Timeline> {
    const { type } = timeline;
    if (typeof type !== 'string') {
      throw new InvalidArgumentError('A timeline needs a type to be created or replaced');
    }
    const existing = referenceCollection(masterEO, 'timelines').ofType(type).first();
    if (existing) {
      return this.replaceTimeline(masterEO, existing, timeline, headers);
    }
    return this.createTimeline(masterEO, timeline, { headers });
  }

  // ==================
  // Relations
  // ==================

  /**
   * Add a subject
   */
  addSubject(owner: Resource, subject: Payload, headers?: HeaderMap) {
    return this.addOnRel(owner, Relations.SUBJECTS, subject, headers);
  }

  /**
   * Add an external reference
   */
  addReference(owner: Resource, reference: Payload, headers?: HeaderMap) {
    return this.addOnRel(owner, Relations.REFERENCES, reference, headers);
  }

  /**
   * Add a category
   */
  addCategory(owner: Resource, category: Payload, headers?: HeaderMap) {
    return this.addOnRel(owner, Relations.CATEGORIES, category, headers);
  }

  /**
   * Add a contributor
   */
  addContributor(owner: Resource, contributor: Payload, headers?: HeaderMap) {
    return this.addOnRel(owner, Relations.CONTRIBUTORS, contributor, headers);
  }

  /**
   * Add a location
   */
  addLocation(owner: Resource, location: Payload, headers?: HeaderMap) {
    return this.addOnRel(owner, Relations.LOCATIONS, location, headers);
  }

  /**
   * Add an item to a timeline
   */
  addTimelineItem(timeline: Resource, item: Payload, headers?: HeaderMap) {
    return this.addOnRel(timeline, Relations.ITEMS, item, headers);
  }

  /**
   * Add a format to a media resource
   */
  addMediaResourceFormat(mediaResource: Resource, format: Payload, headers?: HeaderMap) {
    return this.addOnRel(mediaResource, Relations.FORMATS, format, headers);
  }

  /**
   * Store a document on the master EO
   */
  addStoredDocument(masterEO: Resource, storedDocument: Payload, headers?: HeaderMap) {
    return this.addOnRel(masterEO, Relations.DOCUMENTS, storedDocument, headers);
  }

  /**
   * Move the version group's metadata onto its metadata master EO
   */
  migrateMetadata(versionGroup: Resource, headers?: HeaderMap) {
    return this.addOnRel(versionGroup, Relations.MIGRATE_METADATA, {}, headers);
  }

  // ==================
  // Lookup
  // ==================

  /**
   * Look a resource up by resId
   */
  async resolve(resId: string, options: ResolveOptions = {}): Promise<Resource | undefined> {
    const { failOnMissing = true, headers } = options;
    if (!resId) {
      return undefined;
    }
    try {
      return this.toResource(await this.invokeGet('resolve', { resId }, headers));
    } catch (error) {
      if (error instanceof NotFoundError && !failOnMissing) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * The metadata master EO of the version group the resId belongs to
   */
  async resolveMetadataMasterEO(resId: string, headers?: HeaderMap): Promise<MasterEO> {
    const resolved = await this.resolve(resId, { headers });
    if (!resolved) {
      throw new InvalidArgumentError('A resId is required');
    }
    const masterEO = expectResource(resolved, isMasterEO, 'master EO');
    if (masterEO.isMetadataMeo) {
      return masterEO;
    }
    const versionGroup = await this.openRel(masterEO, 'versionGroup', headers);
    const metadataMeo = await this.openRel(versionGroup, 'metadataMeo', headers);
    return expectResource(metadataMeo, isMasterEO, 'master EO');
  }

  /**
   * Media object by name, undefined when mdb has none
   */
  async findMediaObject(name: string, headers?: HeaderMap): Promise<MediaObject | undefined> {
    try {
      const found = this.toResource(await this.invokeGet('mediaObject/by-name', { name }, headers));
      return expectResource(found, isMediaObject, 'media object');
    } catch (error) {
      if (error instanceof NotFoundError) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Every resource carrying the given external reference
   */
  async reference(type: string, value: string, headers?: HeaderMap): Promise<Resource[]> {
    const response = await this.invokeGet('references', { type, reference: value }, headers);
    return this.toResourceList(response);
  }

  /**
   * The single resource carrying the given external reference, reloaded
   */
  async referenceSingle(type: string, value: string, headers?: HeaderMap): Promise<Resource | undefined> {
    const found = await this.reference(type, value, headers);
    if (found.length > 1) {
      throw new UnexpectedResourceError(`Multiple elements found when resolving ${type}=${value}`, {
        type,
        value,
        resIds: found.map(r => r.resId)
      });
    }
    const [only] = found;
    return only ? this.reload(only, headers) : undefined;
  }

  /**
   * Reload a reference, passing undefined through
   */
  async openResource(reference: Resource | undefined, headers?: HeaderMap): Promise<Resource | undefined> {
    return reference ? this.reload(reference, headers) : undefined;
  }

  /**
   * Reload each reference in turn
   */
  async openResources(references: Iterable<Resource>, headers?: HeaderMap): Promise<Resource[]> {
    const opened: Resource[] = [];
    for (const reference of references) {
      opened.push(await this.reload(reference, headers));
    }
    return opened;
  }

  // ==================
  // Series
  // ==================

  /**
   * First serie with the title in the master system
   */
  async findSerie(title: string, masterSystem: string, headers?: HeaderMap): Promise<Resource | undefined> {
    const response = this.toResource(
      await this.invokeGet('serie/by_title', { title, masterSystem }, headers)
    );
    return referenceCollection(response, 'serie').first();
  }

  /**
   * Create a serie from a title and master system
   */
  createSerie(title: string, masterSystem: string, headers?: HeaderMap): Promise<Resource> {
    return this.invokeCreate('serie', { title, masterSystem }, headers);
  }

  /**
   * Create a serie from a full payload
   */
  createSerieFrom(serie: Payload, headers?: HeaderMap): Promise<Resource> {
    return this.invokeCreate('serie', serie, headers);
  }

  /**
   * Create a season
   */
  createSeason(season: Payload, headers?: HeaderMap): Promise<Resource> {
    return this.invokeCreate('season', season, headers);
  }

  /**
   * Create an episode of the serie
   */
  createEpisode(serieId: string, episode: Payload, headers?: HeaderMap): Promise<Resource> {
    return this.invokeCreate(`serie/${encodeURIComponent(asId(serieId))}/episode`, episode, headers);
  }

  // ==================
  // Administration
  // ==================

  /**
   * Ask mdb to publish a change notification for the resource
   */
  async broadcastChange(destination: string, resId: string, headers?: HeaderMap): Promise<unknown> {
    const resolved = await this.resolve(resId, { headers });
    if (!resolved) {
      throw new InvalidArgumentError('A resId is required');
    }
    const fields = { destination, resId, type: resolved.type ?? '' };
    const response = await this.transport.postForm(
      this.apiMethod('changes/by-resid'),
      fields,
      this.mergedHeaders(headers)
    );
    return response.body;
  }

  /**
   * Rebuild the search index for one resource of the type
   */
  async fullReindexSingle(type: string, guid: string, headers?: HeaderMap): Promise<unknown> {
    const response = await this.transport.postForm(
      this.apiMethod(`admin/mdbIndex/fullreindexsingle/${type}/${asId(guid)}`),
      {},
      this.mergedHeaders(headers)
    );
    return response.body;
  }

  /**
   * Reindex one item of a collection; returns mdb's text answer
   */
  reindex(kind: ReindexKind, guid: string, headers?: HeaderMap): Promise<string> {
    return this.transport.getText(
      this.apiMethod(`admin/mdbIndex/${kind}/${asId(guid)}`),
      this.mergedHeaders(headers)
    );
  }

  /**
   * Stored events matching a LIKE pattern
   */
  async likeQuery(like: string, headers?: HeaderMap): Promise<unknown> {
    const response = await this.invokeGet('admin/events/likeQuery', { like }, headers);
    return response.body;
  }

  /**
   * Export a publication event aggregate, undefined when it does not exist
   */
  exportPublicationEvent(aggregateId: string, headers?: HeaderMap): Promise<string | undefined> {
    return this.exportAggregate('publicationEvents', aggregateId, headers);
  }

  /**
   * Export a master EO aggregate, undefined when it does not exist
   */
  exportMasterEO(aggregateId: string, headers?: HeaderMap): Promise<string | undefined> {
    return this.exportAggregate('masterEOs', aggregateId, headers);
  }

  private async exportAggregate(
    collection: string,
    aggregateId: string,
    headers?: HeaderMap
  ): Promise<string | undefined> {
    try {
      return await this.transport.getText(
        this.apiMethod(`admin/mdbExport/${collection}/${asId(aggregateId)}`),
        this.mergedHeaders(headers)
      );
    } catch (error) {
      if (error instanceof NotFoundError) {
        return undefined;
      }
      throw error;
    }
  }

  private invokeGet(name: string, params: QueryParams, headers?: HeaderMap) {
    return this.transport.get(this.apiMethod(name), this.mergedHeaders(headers), params);
  }

  private async invokeCreate(method: string, payload: Payload, headers?: HeaderMap): Promise<Resource> {
    const response = await this.transport.postFollow(
      this.apiMethod(method),
      payload,
      this.mergedHeaders(headers)
    );
    const created = this.toResource(response);
    this.changeListener.onCreate(created.resId, created.type ?? method, payload);
    return created;
  }
}
