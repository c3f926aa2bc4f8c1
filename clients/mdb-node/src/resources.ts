import { InvalidArgumentError, UnexpectedResourceError } from './errors.js';
import { ResId, type ResIdKind } from './ids.js';
import type {
  Contributor,
  EditorialObject,
  Essence,
  Locator,
  MasterEO,
  MasterEOResource,
  MediaObject,
  MediaResource,
  PublicationEvent,
  PublicationMediaObject,
  ReferenceValue,
  Resource,
  Subject,
  VersionGroup
} from './types.js';

export const ResourceTypes = {
  MasterEO: 'http://id.nrk.no/2016/mdb/types/MasterEditorialObject',
  MasterEOResource: 'http://id.nrk.no/2016/mdb/types/MasterEOResource',
  MediaObject: 'http://id.nrk.no/2016/mdb/types/MediaObject',
  PublicationMediaObject: 'http://id.nrk.no/2016/mdb/types/PublicationMediaObject',
  MediaResource: 'http://id.nrk.no/2016/mdb/types/MediaResource',
  Essence: 'http://id.nrk.no/2016/mdb/types/Essence',
  PublicationEvent: 'http://id.nrk.no/2016/mdb/types/PublicationEvent',
  VersionGroup: 'http://id.nrk.no/2016/mdb/types/VersionGroup'
} as const;

export const isMasterEO = (r: Resource): r is MasterEO =>
  r.type === ResourceTypes.MasterEO;

export const isMasterEOResource = (r: Resource): r is MasterEOResource =>
  r.type === ResourceTypes.MasterEOResource;

export const isMediaObject = (r: Resource): r is MediaObject =>
  r.type === ResourceTypes.MediaObject;

export const isPublicationMediaObject = (r: Resource): r is PublicationMediaObject =>
  r.type === ResourceTypes.PublicationMediaObject;

export const isMediaResource = (r: Resource): r is MediaResource =>
  r.type === ResourceTypes.MediaResource;

export const isEssence = (r: Resource): r is Essence =>
  r.type === ResourceTypes.Essence;

export const isPublicationEvent = (r: Resource): r is PublicationEvent =>
  r.type === ResourceTypes.PublicationEvent;

export const isVersionGroup = (r: Resource): r is VersionGroup =>
  r.type === ResourceTypes.VersionGroup;

/**
 * Narrow a resource to the expected type or fail
 */
export function expectResource<T extends Resource>(
  resource: Resource,
  guard: (r: Resource) => r is T,
  expected: string
): T {
  if (!guard(resource)) {
    throw new UnexpectedResourceError(
      `Expected a ${expected} but got ${resource.type ?? 'untyped resource'}`,
      { resId: resource.resId, type: resource.type }
    );
  }
  return resource;
}

/**
 * Kind of the resource's resId; undefined when it has none or it is not typed
 */
export function resourceKind(resource: Resource): ResIdKind | undefined {
  return resource.resId ? ResId.tryParse(resource.resId)?.kind : undefined;
}

// References

export function referencesOf(eo: EditorialObject, type: string): ReferenceValue[] {
  return (eo.references ?? []).filter(ref => ref.type === type);
}

export function referenceOf(eo: EditorialObject, type: string): ReferenceValue | undefined {
  const found = referencesOf(eo, type);
  if (found.length > 1) {
    throw new UnexpectedResourceError(`Multiple refs of type ${type} in ${eo.resId ?? 'resource'}`, {
      type
    });
  }
  return found[0];
}

export function referenceValue(eo: EditorialObject, type: string): string | undefined {
  return referenceOf(eo, type)?.reference;
}

export function referenceIntValue(eo: EditorialObject, type: string): number | undefined {
  const value = referenceValue(eo, type);
  if (!value) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`Reference ${type}=${value} is not an integer`);
  }
  return parsed;
}

// Contributors

export function contributorsOf(eo: EditorialObject): Contributor[] {
  return eo.contributors ?? [];
}

/**
 * Identity of a contributor by contact, role and capacity
 */
export function contributorKey(contributor: Contributor): string {
  const { contact = {}, role = {}, capacity } = contributor;
  return (
    `CT=${contact.title ?? ''},T=${role.title ?? ''},R=${role.resId ?? ''},` +
    `C=${contact.resId ?? ''},CAP=${capacity ?? ''}`
  );
}

export function uniqueContributors(contributors: Contributor[]): Contributor[] {
  return uniqueBy(contributors, contributorKey);
}

/**
 * Identity of a contributor by its values alone, ignoring resIds
 */
export function contributorValueKey(contributor: Contributor): string {
  const { contact = {}, role = {} } = contributor;
  if (role.resId?.includes('rest_client')) {
    throw new InvalidArgumentError(`client generated role resid ${role.resId}`);
  }
  return [
    contact.title ?? '',
    role.title ?? '',
    contributor.characterName ?? '',
    contributor.comment ?? '',
    contributor.capacity ?? ''
  ].join(':');
}

export function squashContributors(contributors: Contributor[]): Contributor[] {
  return uniqueBy(contributors, contributorValueKey);
}

/**
 * Copy of an editorial object whose contributors are unique by value
 */
export function removeDuplicateContributors<T extends EditorialObject>(eo: T): T {
  if (!eo.contributors) {
    return eo;
  }
  return { ...eo, contributors: squashContributors(eo.contributors) };
}

function uniqueBy<T>(items: T[], key: (item: T) => string): T[] {
  const seen = new Set<string>();
  return items.filter(item => {
    const k = key(item);
    if (seen.has(k)) {
      return false;
    }
    seen.add(k);
    return true;
  });
}

// Subjects and locators

export function subjectsWithTitle(
  meo: EditorialObject,
  title: string,
  caseSensitive = true
): Subject[] {
  const wanted = caseSensitive ? title : title.toLowerCase();
  return (meo.subjects ?? []).filter(subject => {
    const actual = subject.title ?? '';
    return (caseSensitive ? actual : actual.toLowerCase()) === wanted;
  });
}

export function matchingLocators(
  mediaResource: MediaResource,
  identifier: string,
  storageType: string
): Locator[] {
  return (mediaResource.locators ?? []).filter(
    locator => locator.identifier === identifier && locator.storageType?.resId === storageType
  );
}
