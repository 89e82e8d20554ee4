import type { QueryPayload } from './query/types.js';

/** Remote collection (database) identifier. */
export type CollectionRef = string;

/**
 * One property as the API sends it: `{ "type": "select", "select": { "name": "High" } }`.
 * Only the property binding layer looks inside.
 */
export type WireProperty = Record<string, unknown>;

/** Property bag keyed by property name. */
export type PropertyBag = Record<string, WireProperty>;

export interface RawRecord {
  id: string;
  created_time?: string | undefined;
  last_edited_time?: string | undefined;
  url?: string | undefined;
  archived?: boolean | undefined;
  properties: PropertyBag;
}

export interface QueryResult {
  records: RawRecord[];
  hasMore: boolean;
  nextCursor: string | null;
}

/** Read side of the remote API. */
export interface CollectionEndpoint {
  query(collection: CollectionRef, payload: QueryPayload): Promise<QueryResult>;
}

/** Write side of the remote API. `properties` is always a partial bag in wire shape. */
export interface RecordEndpoint {
  create(collection: CollectionRef, properties: PropertyBag): Promise<RawRecord>;
  update(recordId: string, properties: PropertyBag): Promise<RawRecord>;
  retrieve(recordId: string): Promise<RawRecord>;
  /** Moves a record to the trash (`true`) or back out of it (`false`). */
  setArchived(recordId: string, archived: boolean): Promise<RawRecord>;
}

export type Endpoint = CollectionEndpoint & RecordEndpoint;
