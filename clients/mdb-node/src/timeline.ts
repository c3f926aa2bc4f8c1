import { UnexpectedResourceError } from './errors.js';
import type { Resource, Timeline, TimelineItem } from './types.js';

export const TimelineTypes = {
  Rights: 'http://id.nrk.no/2017/mdb/timelinetype/Rights',
  IndexPoints: 'http://id.nrk.no/2017/mdb/timelinetype/IndexPoints',
  Genealogy: 'http://id.nrk.no/2017/mdb/timelinetype/Genealogy',
  GenealogyRights: 'http://id.nrk.no/2017/mdb/timelinetype/GenealogyRights',
  Technical: 'http://id.nrk.no/2017/mdb/timelinetype/Technical',
  Internal: 'http://id.nrk.no/2017/mdb/timelinetype/Internal'
} as const;

export type TimelineType = (typeof TimelineTypes)[keyof typeof TimelineTypes];

export const TimelineItemTypes = {
  ExtractedVersion: 'http://id.nrk.no/2017/mdb/timelineitem/ExtractedVersionTimelineItem',
  ExploitationIssue: 'http://id.nrk.no/2017/mdb/timelineitem/ExploitationIssueTimelineItem',
  GeneralRights: 'http://id.nrk.no/2017/mdb/timelineitem/GeneralRightsTimelineItem',
  IndexPoint: 'http://id.nrk.no/2017/mdb/timelineitem/IndexpointTimelineItem',
  Internal: 'http://id.nrk.no/2017/mdb/timelineitem/InternalTimelineItem',
  Technical: 'http://id.nrk.no/2017/mdb/timelineitem/TechnicalTimelineItem'
} as const;

const TIMELINE_TYPES: ReadonlySet<string> = new Set(Object.values(TimelineTypes));

export function isTimeline(resource: Resource): resource is Timeline {
  return typeof resource.type === 'string' && TIMELINE_TYPES.has(resource.type);
}

export function isTimelineOfType(resource: Resource, type: TimelineType): resource is Timeline {
  return resource.type === type;
}

/** field name and value an item must carry */
export type ItemCriteria = Record<string, unknown>;

// null and a missing field compare equal
const same = (a: unknown, b: unknown): boolean => (a ?? null) === (b ?? null);

export function filterItems(
  timeline: Timeline,
  predicate: (item: TimelineItem) => boolean
): TimelineItem[] {
  return (timeline.items ?? []).filter(predicate);
}

export function selectItems(timeline: Timeline, criteria: ItemCriteria): TimelineItem[] {
  const entries = Object.entries(criteria);
  return filterItems(timeline, item => entries.every(([key, value]) => same(item[key], value)));
}

/**
 * The one item matching the criteria; undefined when none does
 */
export function selectSingleItem(
  timeline: Timeline,
  criteria: ItemCriteria
): TimelineItem | undefined {
  const items = selectItems(timeline, criteria);
  if (items.length > 1) {
    const description = Object.entries(criteria)
      .map(([key, value]) => `${key}=${String(value)}`)
      .join(',');
    throw new UnexpectedResourceError(
      `Multiple elements found for ${description} in ${timeline.resId ?? 'timeline'}`,
      { criteria }
    );
  }
  return items[0];
}

export const findItem = (timeline: Timeline, resId: string) =>
  selectSingleItem(timeline, { resId });

export const findByTitle = (timeline: Timeline, title: string) =>
  selectSingleItem(timeline, { title });

export const findByDescription = (timeline: Timeline, description: string) =>
  selectSingleItem(timeline, { description });

export const findIndexPointsByTitleAndOffset = (timeline: Timeline, title: string, offset: unknown) =>
  selectItems(timeline, { title, offset });

export const findIndexPointByTitleAndOffset = (timeline: Timeline, title: string, offset: unknown) =>
  selectSingleItem(timeline, { title, offset });

export const findIndexPointsByOffsetAndDuration = (
  timeline: Timeline,
  offset: unknown,
  duration: unknown
) => selectItems(timeline, { offset, duration });

export const findIndexPointByOffsetAndDuration = (
  timeline: Timeline,
  offset: unknown,
  duration: unknown
) => selectSingleItem(timeline, { offset, duration });

export const findIndexPointByOffset = (timeline: Timeline, offset: unknown) =>
  selectSingleItem(timeline, { offset });

// Technical timelines

export const findIndexPointsByEvent = (timeline: Timeline, event: string) =>
  selectItems(timeline, { event });

export const findIndexPointByEventAndOffset = (timeline: Timeline, event: string, offset: unknown) =>
  selectSingleItem(timeline, { event, offset });

// Internal timelines

export const findIndexPointBySubtypeOffsetDuration = (
  timeline: Timeline,
  subType: string,
  offset: unknown,
  duration: unknown
) => selectSingleItem(timeline, { subType, offset, duration });

// Rights timelines

export function fullTimelineItem(timeline: Timeline, type: string): TimelineItem | undefined {
  return selectSingleItem(timeline, { appliesToFullTimeline: true, type });
}

/**
 * Sort the timeline's subjects, spatials and contributors in place so that
 * two equal timelines serialize identically
 */
export function stabilizeOrder(timeline: Timeline): Timeline {
  timeline.subjects?.sort((a, b) => compare(a.title, b.title));
  timeline.spatials?.sort((a, b) => compare(a.name, b.name));
  timeline.contributors?.sort((a, b) =>
    compare(
      `${a.contact?.title ?? ''}${a.role?.resId ?? ''}`,
      `${b.contact?.title ?? ''}${b.role?.resId ?? ''}`
    )
  );
  return timeline;
}

function compare(a = '', b = ''): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
