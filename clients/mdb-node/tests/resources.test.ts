import { describe, test, expect } from 'vitest';
import {
  ResourceTypes,
  contributorKey,
  contributorsOf,
  contributorValueKey,
  expectResource,
  isMasterEO,
  isMasterEOResource,
  isVersionGroup,
  matchingLocators,
  referenceIntValue,
  referenceOf,
  referenceValue,
  referencesOf,
  removeDuplicateContributors,
  resourceKind,
  squashContributors,
  subjectsWithTitle,
  uniqueContributors
} from '../src/resources.js';
import { InvalidArgumentError, UnexpectedResourceError } from '../src/errors.js';
import type { Contributor, EditorialObject, MediaResource } from '../src/types.js';

const PRF = 'http://id.nrk.no/2016/mdb/reference/prf';
const ROLE = 'http://authority.nrk.no/role/V23';

const reporter: Contributor = {
  contact: { resId: 'http://id.nrk.no/2016/mdb/contact/c1', title: 'Ola Nordmann' },
  role: { resId: ROLE, title: 'reporter' },
  characterName: 'abc',
  comment: 'a comment',
  capacity: 'staff'
};

const sameReporterOtherContact: Contributor = {
  ...reporter,
  contact: { resId: 'http://id.nrk.no/2016/mdb/contact/c2', title: 'Ola Nordmann' }
};

const otherReporter: Contributor = {
  ...reporter,
  contact: { resId: 'http://id.nrk.no/2016/mdb/contact/c3', title: 'Kari Nordmann' }
};

describe('RESOURCES Tests', () => {
  test('RESOURCES-001: Type guards narrow by type URI', () => {
    const meo = { type: ResourceTypes.MasterEO, title: 'fozz' };

    expect(isMasterEO(meo)).toBe(true);
    expect(isVersionGroup(meo)).toBe(false);
    expect(expectResource(meo, isMasterEO, 'master EO').title).toBe('fozz');
    expect(() => expectResource(meo, isVersionGroup, 'version group')).toThrow(
      `Expected a version group but got ${ResourceTypes.MasterEO}`
    );
    expect(() => expectResource({}, isMasterEO, 'master EO')).toThrow(UnexpectedResourceError);
    expect(resourceKind({ resId: 'http://id.nrk.no/2016/mdb/versionGroup/vg-1' })).toBe('versionGroup');
    expect(resourceKind({ resId: 'vg-1' })).toBeUndefined();
    expect(resourceKind(meo)).toBeUndefined();
  });

  test('RESOURCES-002: References by type', () => {
    const eo: EditorialObject = {
      resId: 'eo-1',
      references: [
        { type: PRF, reference: '42' },
        { type: 'other', reference: 'x' },
        { type: 'other', reference: 'y' }
      ]
    };

    expect(referencesOf(eo, 'other')).toHaveLength(2);
    expect(referenceOf(eo, PRF)).toEqual({ type: PRF, reference: '42' });
    expect(referenceValue(eo, PRF)).toBe('42');
    expect(referenceIntValue(eo, PRF)).toBe(42);
    expect(referenceIntValue(eo, 'missing')).toBeUndefined();
    expect(() => referenceOf(eo, 'other')).toThrow('Multiple refs of type other in eo-1');
    expect(() => referenceIntValue({ references: [{ type: PRF, reference: 'abc' }] }, PRF)).toThrow(
      InvalidArgumentError
    );
  });

  test('RESOURCES-003: Contributor identity', () => {
    expect(contributorKey(reporter)).toBe(
      `CT=Ola Nordmann,T=reporter,R=${ROLE},C=http://id.nrk.no/2016/mdb/contact/c1,CAP=staff`
    );
    expect(contributorKey({})).toBe('CT=,T=,R=,C=,CAP=');
    expect(uniqueContributors([reporter, reporter, sameReporterOtherContact])).toHaveLength(2);
  });

  test('RESOURCES-004: Contributors squashed by value', () => {
    expect(contributorValueKey(reporter)).toBe('Ola Nordmann:reporter:abc:a comment:staff');
    expect(squashContributors([reporter, reporter])).toEqual([reporter]);
    expect(squashContributors([reporter, sameReporterOtherContact, otherReporter])).toEqual([
      reporter,
      otherReporter
    ]);
    expect(squashContributors([reporter, { ...reporter, characterName: 'xyz' }])).toHaveLength(2);
    expect(() =>
      contributorValueKey({ role: { resId: 'http://id.nrk.no/rest_client/role/1' } })
    ).toThrow(InvalidArgumentError);
  });

  test('RESOURCES-005: Duplicate contributors removed from a copy', () => {
    const eo: EditorialObject = { title: 'pe', contributors: [reporter, reporter, otherReporter] };

    const fixed = removeDuplicateContributors(eo);

    expect(fixed.contributors).toEqual([reporter, otherReporter]);
    expect(eo.contributors).toHaveLength(3);
    expect(removeDuplicateContributors({ title: 'none' })).toEqual({ title: 'none' });
  });

  test('RESOURCES-006: Subjects by title', () => {
    const eo: EditorialObject = { subjects: [{ title: 'Sport' }, { title: 'sport' }, { title: 'News' }] };

    expect(subjectsWithTitle(eo, 'sport')).toEqual([{ title: 'sport' }]);
    expect(subjectsWithTitle(eo, 'SPORT', false)).toHaveLength(2);
    expect(subjectsWithTitle({}, 'sport')).toEqual([]);
  });

  test('RESOURCES-007: Locators by identifier and storage', () => {
    const mediaResource: MediaResource = {
      type: ResourceTypes.MediaResource,
      locators: [
        { identifier: 'file.mxf', storageType: { resId: 'storage/a' } },
        { identifier: 'file.mxf', storageType: { resId: 'storage/b' } },
        { identifier: 'other.mxf', storageType: { resId: 'storage/a' } }
      ]
    };

    expect(matchingLocators(mediaResource, 'file.mxf', 'storage/b')).toEqual([
      { identifier: 'file.mxf', storageType: { resId: 'storage/b' } }
    ]);
  });

  test('RESOURCES-008: Contributors and master EO resources', () => {
    expect(contributorsOf({ title: 'no contributors' })).toEqual([]);
    expect(contributorsOf({ contributors: [reporter, otherReporter] })).toEqual([reporter, otherReporter]);

    const attachment = { type: ResourceTypes.MasterEOResource, resId: 'meo-resource-1' };
    expect(isMasterEOResource(attachment)).toBe(true);
    expect(isMasterEOResource({ type: ResourceTypes.MasterEO })).toBe(false);
    expect(isMasterEOResource({})).toBe(false);
  });
});
