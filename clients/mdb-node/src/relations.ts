/**
 * Relation names of the mdb schema
 */
export const Relations = {
  SUBJECTS: 'http://id.nrk.no/2016/mdb/relation/subjects',
  REFERENCES: 'http://id.nrk.no/2016/mdb/relation/references',
  CATEGORIES: 'http://id.nrk.no/2016/mdb/relation/categories',
  CONTRIBUTORS: 'http://id.nrk.no/2016/mdb/relation/contributors',
  LOCATIONS: 'http://id.nrk.no/2016/mdb/relation/locations',
  ITEMS: 'http://id.nrk.no/2016/mdb/relation/items',
  FORMATS: 'http://id.nrk.no/2016/mdb/relation/formats',
  DOCUMENTS: 'http://id.nrk.no/2016/mdb/relation/documents',
  MIGRATE_METADATA: 'temprel:migrateMetadata'
} as const;

export type Relation = (typeof Relations)[keyof typeof Relations];
