import { isDeepStrictEqual } from 'node:util';
import type { Payload } from './types.js';

export const ContributorRoles = {
  V23: 'http://authority.nrk.no/role/V23',
  N58: 'http://authority.nrk.no/role/N58'
} as const;

export const DiffReferenceTypes = {
  PsApi: 'http://id.nrk.no/2016/mdb/reference/psAPI',
  Guri: 'http://id.nrk.no/2018/mdb/reference/guri'
} as const;

/**
 * Decides whether two collection items are the same item, or carry the
 * same values
 */
export type Comparator = (existing: Payload, modified: Payload) => boolean;

export interface CollectionComparators {
  identity: Comparator;
  value: Comparator;
}

export type CollectionField = 'contributors' | 'categories' | 'subjects' | 'spatials' | 'references';

export type DifferOptions = Partial<Record<CollectionField, Partial<CollectionComparators>>> & {
  /** primitive fields left out of the diff, replacing DEFAULT_IGNORABLES */
  ignorables?: Iterable<string>;
};

export type ChangeSection = Record<string, unknown>;

export type SectionName = 'added' | 'modified' | 'removed';

export const DEFAULT_IGNORABLES: readonly string[] = [
  'title',
  'shortDescription',
  'published',
  'embeddingAllowed',
  'duration'
];

const NEVER_DIFFED: ReadonlySet<string> = new Set(['resId', 'created', 'lastUpdated']);

function isRecord(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function valueAt(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

function recordsIn(value: unknown): Payload[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function isPrimitive(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * False for absent values, empty strings, zero, false and empty lists or objects
 */
export function hasContent(value: unknown): boolean {
  if (value === undefined || value === null || value === '' || value === 0 || value === false) {
    return false;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return !isRecord(value) || Object.keys(value).length > 0;
}

function isEmpty(section: ChangeSection): boolean {
  return Object.keys(section).length === 0;
}

function appendTo(section: ChangeSection, name: string, elements: Iterable<Payload | null>): void {
  const current = section[name];
  const entries: unknown[] = Array.isArray(current) ? current : [];
  entries.push(...elements);
  section[name] = entries;
}

// Comparison of places

function isCoordinate(value: unknown): value is number {
  return typeof value === 'number' && value !== 0 && !Number.isNaN(value);
}

/**
 * Coordinates match when both are missing or they agree to nine significant digits
 */
export function areSameCoordinate(existing: unknown, modified: unknown): boolean {
  const hasExisting = isCoordinate(existing);
  const hasModified = isCoordinate(modified);
  if (!hasExisting || !hasModified) {
    return hasExisting === hasModified;
  }
  return Math.abs(existing - modified) <= 1e-9 * Math.max(Math.abs(existing), Math.abs(modified));
}

export function areSameLatLon(existing: Payload, modified: Payload): boolean {
  return (
    areSameCoordinate(existing.latitude, modified.latitude) &&
    areSameCoordinate(existing.longitude, modified.longitude)
  );
}

/**
 * Same place: by name when the existing place has one, by position otherwise
 */
export function areSameSpatial(existing: Payload, modified: Payload): boolean {
  const name = existing.name;
  if (typeof name === 'string' && name !== '') {
    return name === modified.name;
  }
  return areSameLatLon(existing, modified);
}

export function isSpatial(spatial: Payload): boolean {
  const { name, latitude, longitude } = spatial;
  return (typeof name === 'string' && name !== '') || (isCoordinate(latitude) && isCoordinate(longitude));
}

export function isWellformedSubject(subject: Payload): boolean {
  return typeof subject.title === 'string' && subject.title !== '';
}

function sameContactAndRole(existing: Payload, modified: Payload): boolean {
  return (
    valueAt(existing, 'contact', 'title') === valueAt(modified, 'contact', 'title') &&
    valueAt(existing, 'role', 'resId') === valueAt(modified, 'role', 'resId')
  );
}

export const Comparators = {
  byTitle: (existing, modified) => existing.title === modified.title,
  byResId: (existing, modified) => existing.resId === modified.resId,
  categoryByResource: (existing, modified) => existing.resource === modified.resource,
  subjectByResIdOrTitle: (existing, modified) =>
    hasContent(existing.resId) ? existing.resId === modified.resId : existing.title === modified.title,
  contributorByContactAndRoleTitle: (existing, modified) =>
    valueAt(existing, 'contact', 'title') === valueAt(modified, 'contact', 'title') &&
    valueAt(existing, 'role', 'title') === valueAt(modified, 'role', 'title'),
  contributorByContactAndRole: sameContactAndRole,
  contributorByResId: (existing, modified) =>
    Object.hasOwn(existing, 'resId') ? existing.resId === modified.resId : sameContactAndRole(existing, modified),
  contributorValues: (existing, modified) =>
    ['characterName', 'comment', 'capacity'].every(field => existing[field] === modified[field]) &&
    valueAt(existing, 'contact', 'title') === valueAt(modified, 'contact', 'title') &&
    valueAt(existing, 'role', 'resId') === valueAt(modified, 'role', 'resId') &&
    valueAt(existing, 'role', 'title') === valueAt(modified, 'role', 'title'),
  spatialByPlace: areSameSpatial,
  spatialByResIdOrPlace: (existing, modified) =>
    hasContent(existing.resId) ? existing.resId === modified.resId : areSameSpatial(existing, modified),
  spatialValues: (existing, modified) =>
    isSpatial(modified) && valueAt(existing, 'stadnamn', 'resId') === valueAt(modified, 'stadnamn', 'resId'),
  referenceByTypeAndValue: (existing, modified) =>
    existing.type === modified.type && existing.reference === modified.reference,
  always: () => true
} satisfies Record<string, Comparator>;

const DEFAULT_COMPARATORS: ReadonlyArray<[CollectionField, CollectionComparators]> = [
  ['contributors', { identity: Comparators.contributorByContactAndRoleTitle, value: Comparators.contributorValues }],
  ['categories', { identity: Comparators.categoryByResource, value: Comparators.byTitle }],
  ['subjects', { identity: Comparators.byTitle, value: Comparators.byTitle }],
  ['spatials', { identity: Comparators.spatialByPlace, value: Comparators.spatialValues }],
  ['references', { identity: Comparators.referenceByTypeAndValue, value: Comparators.always }]
];

function contributorHasRole(entry: unknown, role: string): boolean {
  return valueAt(entry, 'role', 'resId') === role;
}

function describeContributor(contributor: unknown): string {
  if (!isRecord(contributor)) {
    return '';
  }
  return `${String(valueAt(contributor, 'contact', 'title') ?? '')} as ${String(valueAt(contributor, 'role', 'resId') ?? '')}`;
}

/**
 * Changes between an existing editorial object and a modified one.
 *
 * Collection lists in `modified` and `removed` are aligned with the
 * existing collection: positions that did not change hold null.
 * `added` holds new fields and new collection items only.
 */
export class Diff {
  readonly added: ChangeSection = {};
  readonly modified: ChangeSection = {};
  readonly removed: ChangeSection = {};

  addToAdded(name: string, elements: Iterable<Payload | null>): void {
    appendTo(this.added, name, elements);
  }

  addToModified(name: string, elements: Iterable<Payload | null>): void {
    appendTo(this.modified, name, elements);
  }

  addToRemoved(name: string, elements: Iterable<Payload | null>): void {
    appendTo(this.removed, name, elements);
  }

  hasDiff(): boolean {
    return !isEmpty(this.added) || !isEmpty(this.modified) || !isEmpty(this.removed);
  }

  hasAddModifyDiff(): boolean {
    return !isEmpty(this.added) || !isEmpty(this.modified);
  }

  hasRemovalsOnly(): boolean {
    return isEmpty(this.added) && isEmpty(this.modified) && !isEmpty(this.removed);
  }

  /** Contributors of the role both added and removed */
  changedV23(): boolean {
    return (
      this.contributorsWithRole('added', ContributorRoles.V23).length > 0 &&
      this.contributorsWithRole('removed', ContributorRoles.V23).length > 0
    );
  }

  /** Contributors of the role added or removed */
  changedN58(): boolean {
    return (
      this.contributorsWithRole('added', ContributorRoles.N58).length > 0 ||
      this.contributorsWithRole('removed', ContributorRoles.N58).length > 0
    );
  }

  eliminateChangedV23(): void {
    this.eliminateContributorRole(ContributorRoles.V23);
  }

  eliminateChangedN58(): void {
    this.eliminateContributorRole(ContributorRoles.N58);
  }

  eliminateChangedCategories(): void {
    for (const section of this.sections()) {
      delete section.categories;
    }
  }

  /**
   * Drop every change outside the given fields
   */
  retainOnly(fields: Iterable<string>): void {
    const kept = new Set(fields);
    for (const section of this.sections()) {
      for (const key of Object.keys(section)) {
        if (!kept.has(key)) {
          delete section[key];
        }
      }
    }
  }

  removeReferencesOfType(type: string): void {
    this.dropCollectionEntries('references', entry => valueAt(entry, 'type') === type);
  }

  /**
   * Remove collection changes left without a single changed item
   */
  pack(): void {
    for (const section of this.sections()) {
      for (const [key, value] of Object.entries(section)) {
        if (Array.isArray(value) && !value.some(hasContent)) {
          delete section[key];
        }
      }
    }
  }

  /**
   * Write the modified values into target. Aligned lists replace only the
   * positions that changed.
   */
  applyModifications(target: Payload): void {
    for (const [key, value] of Object.entries(this.modified)) {
      const current = target[key];
      if (Array.isArray(value) && Array.isArray(current)) {
        target[key] = current.map((item: unknown, index) => value[index] ?? item);
      } else {
        target[key] = value;
      }
    }
  }

  /**
   * Write the added fields into target, appending added collection items
   */
  applyAdds(target: Payload): void {
    for (const [key, value] of Object.entries(this.added)) {
      const current = target[key];
      if (Array.isArray(value)) {
        target[key] = Array.isArray(current) ? [...current, ...value] : [...value];
      } else {
        target[key] = value;
      }
    }
  }

  primitiveValuedFields(section: SectionName): string[] {
    return Object.entries(this[section])
      .filter(([, value]) => isPrimitive(value))
      .map(([key]) => key);
  }

  async ifPresent(section: SectionName, key: string, fn: (value: unknown) => Promise<void>): Promise<void> {
    const value = this[section][key];
    if (value !== undefined) {
      await fn(value);
    }
  }

  explainDiff(): string {
    const parts: string[] = [];
    if (!isEmpty(this.added)) {
      parts.push(`Added:\n${JSON.stringify(this.added, null, 4)}`);
    }
    if (!isEmpty(this.modified)) {
      parts.push(`Modified:\n${JSON.stringify(this.modified, null, 4)}`);
    }
    if (!isEmpty(this.removed)) {
      parts.push(`Removed:\n${JSON.stringify(this.removed, null, 4)}`);
    }
    return parts.join('\n');
  }

  /**
   * One line naming each added and removed contributor with its role
   */
  explainContributorChanges(): string {
    const parts: string[] = [];
    const added = recordsIn(this.added.contributors);
    if (added.length > 0) {
      parts.push(`Added: ${added.map(describeContributor).join(', ')}`);
    }
    const removed = recordsIn(this.removed.contributors);
    if (removed.length > 0) {
      parts.push(`Removed: ${removed.map(describeContributor).join(', ')}`);
    }
    return parts.length > 0 ? `${parts.join(' ')}\n` : '';
  }

  explainDiffShort(): string {
    const parts: string[] = [];
    if (!isEmpty(this.added)) {
      parts.push(`Added: ${Object.keys(this.added).join(' ')}`);
    }
    if (!isEmpty(this.modified)) {
      parts.push(`Modified: ${Object.keys(this.modified).join(' ')}`);
    }
    if (!isEmpty(this.removed)) {
      parts.push(`Removed: ${Object.keys(this.removed).join(' ')}`);
    }
    return this.explainContributorChanges() + parts.join(', ');
  }

  private sections(): ChangeSection[] {
    return [this.added, this.modified, this.removed];
  }

  private contributorsWithRole(section: SectionName, role: string): Payload[] {
    return recordsIn(this[section].contributors).filter(c => contributorHasRole(c, role));
  }

  private eliminateContributorRole(role: string): void {
    this.dropCollectionEntries('contributors', entry => contributorHasRole(entry, role));
  }

  /**
   * Added entries are removed; aligned entries become null
   */
  private dropCollectionEntries(field: string, matches: (entry: unknown) => boolean): void {
    const added = this.added[field];
    if (Array.isArray(added)) {
      this.added[field] = added.filter(entry => !matches(entry));
    }
    for (const section of [this.modified, this.removed]) {
      const aligned = section[field];
      if (Array.isArray(aligned)) {
        section[field] = aligned.map((entry: unknown) => (matches(entry) ? null : entry));
      }
    }
    this.pack();
  }
}

/**
 * Calculates the Diff between two editorial objects: primitive fields
 * one by one, then contributors, categories, subjects, spatials and
 * references item by item
 */
export class Differ {
  private readonly comparators: ReadonlyArray<[CollectionField, CollectionComparators]>;
  private readonly ignorables: ReadonlySet<string>;

  constructor(
    private readonly existing: Payload,
    private readonly modified: Payload,
    options: DifferOptions = {}
  ) {
    this.comparators = DEFAULT_COMPARATORS.map(([field, defaults]): [CollectionField, CollectionComparators] => [
      field,
      { ...defaults, ...options[field] }
    ]);
    this.ignorables = new Set(options.ignorables ?? DEFAULT_IGNORABLES);
  }

  calculate(): Diff {
    const diff = new Diff();
    this.attributeChanges(diff);
    for (const [field, comparators] of this.comparators) {
      this.collectionChanges(diff, field, comparators);
    }
    return diff;
  }

  private isDiffed(key: string): boolean {
    return !NEVER_DIFFED.has(key) && !this.ignorables.has(key);
  }

  private attributeChanges(diff: Diff): void {
    const { existing, modified } = this;
    for (const [key, value] of Object.entries(existing)) {
      if (!this.isDiffed(key) || !isPrimitive(value)) {
        continue;
      }
      if (!Object.hasOwn(modified, key)) {
        diff.removed[key] = value;
      } else if (modified[key] !== value) {
        diff.modified[key] = modified[key];
      }
    }
    for (const [key, value] of Object.entries(modified)) {
      if (this.isDiffed(key) && isPrimitive(value) && !Object.hasOwn(existing, key)) {
        diff.added[key] = value;
      }
    }
  }

  private collectionChanges(diff: Diff, field: CollectionField, { identity, value }: CollectionComparators): void {
    const existingItems = recordsIn(this.existing[field]);
    const modifiedItems = recordsIn(this.modified[field]);

    const added = modifiedItems.filter(m => !existingItems.some(e => identity(e, m)));
    if (added.length > 0) {
      diff.addToAdded(field, added);
    }

    const changed = existingItems.map(e => modifiedItems.find(m => identity(e, m) && !value(e, m)) ?? null);
    if (changed.some(item => item !== null)) {
      diff.addToModified(field, changed);
    }

    const removed = existingItems.map(e => (modifiedItems.some(m => identity(e, m)) ? null : e));
    if (removed.some(item => item !== null)) {
      diff.addToRemoved(field, removed);
    }
  }
}

/**
 * References to post for a publication event: its psAPI and guri ids
 * first, then the ones it already carries
 */
export function publicationEventReferences(
  publicationEvent: Payload,
  psApiId?: string,
  clipId?: string
): Payload[] {
  const references: Payload[] = [];
  if (psApiId) {
    references.push({ type: DiffReferenceTypes.PsApi, reference: psApiId });
  }
  if (clipId) {
    references.push({ type: DiffReferenceTypes.Guri, reference: clipId });
  }
  references.push(...recordsIn(publicationEvent.references));
  return references;
}

// Single field changes

/**
 * Change of one field. Collections follow the alignment rules of Diff.
 */
export class FieldDiffResult {
  constructor(
    readonly added?: unknown,
    readonly modified?: unknown,
    readonly removed?: unknown,
    readonly fieldName?: string
  ) {}

  static withAdded(fieldName: string, addition: unknown): FieldDiffResult {
    return new FieldDiffResult(addition, undefined, undefined, fieldName);
  }

  static withModified(fieldName: string, modification: unknown): FieldDiffResult {
    return new FieldDiffResult(undefined, modification, undefined, fieldName);
  }

  static withRemoval(fieldName: string, removal: unknown): FieldDiffResult {
    return new FieldDiffResult(undefined, undefined, removal, fieldName);
  }

  static unchanged(fieldName?: string): FieldDiffResult {
    return new FieldDiffResult(undefined, undefined, undefined, fieldName);
  }

  hasDiff(): boolean {
    return hasContent(this.added) || hasContent(this.modified) || hasContent(this.removed);
  }

  hasAddModifyDiff(): boolean {
    return hasContent(this.added) || hasContent(this.modified);
  }

  /**
   * One line per changed item, e.g. `categories added: Sport`
   */
  explainCollectionChange(): string {
    const label = this.fieldName ?? 'field';
    return [
      ...FieldDiffResult.lines(`${label} added`, this.added),
      ...FieldDiffResult.lines(`${label} modified`, this.modified),
      ...FieldDiffResult.lines(`${label} removed`, this.removed)
    ].join('');
  }

  private static lines(prefix: string, change: unknown): string[] {
    if (!hasContent(change)) {
      return [];
    }
    const items: unknown[] = Array.isArray(change) ? change : [change];
    return items.filter(hasContent).map(item => `${prefix}: ${FieldDiffResult.describe(item)}\n`);
  }

  private static describe(item: unknown): string {
    if (!isRecord(item)) {
      return String(item);
    }
    if ('name' in item) {
      return String(item.name);
    }
    if ('title' in item) {
      return String(item.title);
    }
    const title = valueAt(item, 'contact', 'title');
    if (typeof title === 'string' && title !== '') {
      const role = valueAt(item, 'role', 'title') ?? valueAt(item, 'role', 'resId');
      return typeof role === 'string' && role !== '' ? `${title} as ${role}` : title;
    }
    return JSON.stringify(item);
  }
}

/**
 * Change of a single field, unchanged when both sides agree
 */
export function attributeChange(original: Payload, modified: Payload, key: string): FieldDiffResult {
  const inOriginal = Object.hasOwn(original, key);
  const inModified = Object.hasOwn(modified, key);
  if (inOriginal && !inModified) {
    return FieldDiffResult.withRemoval(key, original[key]);
  }
  if (!inOriginal && inModified) {
    return FieldDiffResult.withAdded(key, modified[key]);
  }
  if (inOriginal && !isDeepStrictEqual(original[key], modified[key])) {
    return FieldDiffResult.withModified(key, modified[key]);
  }
  return FieldDiffResult.unchanged(key);
}

/**
 * Illustration changes. A new image identifier or different crop
 * attributes count as a modification of the whole illustration.
 */
export function illustrationChanges(existing: Payload, modified: Payload): FieldDiffResult {
  const field = 'illustration';
  const existingImage = existing[field];
  const modifiedImage = modified[field];

  if (!hasContent(existingImage) && hasContent(modifiedImage)) {
    return FieldDiffResult.withAdded(field, modifiedImage);
  }
  if (hasContent(existingImage) && !hasContent(modifiedImage)) {
    return FieldDiffResult.withRemoval(field, existingImage);
  }
  if (valueAt(existingImage, 'identifier') !== valueAt(modifiedImage, 'identifier')) {
    return FieldDiffResult.withModified(field, modifiedImage);
  }
  const existingAttributes = valueAt(existingImage, 'illustrationAttributes');
  const modifiedAttributes = valueAt(modifiedImage, 'illustrationAttributes');
  if (hasContent(existingAttributes) || hasContent(modifiedAttributes)) {
    if (!isDeepStrictEqual(existingAttributes, modifiedAttributes)) {
      return FieldDiffResult.withModified(field, modifiedImage);
    }
  }
  return FieldDiffResult.unchanged(field);
}

/**
 * Category changes, matched by resId and compared by title unless other
 * comparators are given
 */
export function categoriesChanges(
  existing: Payload,
  modified: Payload,
  identity: Comparator = Comparators.byResId,
  value: Comparator = Comparators.byTitle
): FieldDiffResult {
  const field = 'categories';
  const existingItems = recordsIn(existing[field]);
  const modifiedItems = recordsIn(modified[field]);

  const added = modifiedItems.filter(m => !existingItems.some(e => identity(e, m)));
  const changed = existingItems.map(e => modifiedItems.find(m => identity(e, m) && !value(e, m)) ?? null);
  const removed = existingItems.map(e => (modifiedItems.some(m => identity(e, m)) ? null : e));

  return new FieldDiffResult(
    added.length > 0 ? added : undefined,
    changed.some(item => item !== null) ? changed : undefined,
    removed.some(item => item !== null) ? removed : undefined,
    field
  );
}
