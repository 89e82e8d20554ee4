export type ConditionFamily =
  | 'text'
  | 'number'
  | 'checkbox'
  | 'select'
  | 'multi_select'
  | 'date'
  | 'people'
  | 'files'
  | 'relation'
  | 'formula';

/** Property type tags as the API names them. */
export type PropertyTag =
  | 'title'
  | 'rich_text'
  | 'number'
  | 'checkbox'
  | 'select'
  | 'status'
  | 'multi_select'
  | 'date'
  | 'url'
  | 'email'
  | 'phone_number'
  | 'people'
  | 'relation'
  | 'files'
  | 'formula'
  | 'rollup'
  | 'created_time'
  | 'last_edited_time'
  | 'created_by'
  | 'last_edited_by';

export type TimestampKind = 'created_time' | 'last_edited_time';

export type SortDirection = 'ascending' | 'descending';

/**
 * Atomic predicate. `operand` is already in wire form (dates as ISO strings,
 * empty markers as `{}`); a formula constraint nests another Constraint.
 */
export interface Constraint {
  readonly family: ConditionFamily;
  readonly operator: string;
  readonly operand: unknown;
}

export interface PropertyFilter {
  readonly kind: 'property';
  readonly property: string;
  /** Wire tag, e.g. `"number"` in `{ "property": "Cost", "number": { ... } }`. */
  readonly tag: PropertyTag;
  /** Declared type, when the filter was resolved against a schema. */
  readonly type?: PropertyTag;
  readonly constraint: Constraint;
}

export interface TimestampFilter {
  readonly kind: 'timestamp';
  readonly timestamp: TimestampKind;
  readonly constraint: Constraint;
}

export interface CompoundFilter {
  readonly kind: 'and' | 'or';
  readonly filters: readonly FilterNode[];
}

export type FilterNode = PropertyFilter | TimestampFilter | CompoundFilter;

export type SortSpec =
  | { readonly kind: 'property'; readonly property: string; readonly direction: SortDirection }
  | { readonly kind: 'timestamp'; readonly timestamp: TimestampKind; readonly direction: SortDirection };

/** Either a property name or a built-in timestamp. */
export type FilterTarget = string | { readonly timestamp: TimestampKind };

/**
 * Builder state handed to the compiler. Built exclusively via QueryBuilder.
 */
export interface QueryState {
  readonly filter: FilterNode | null;
  readonly sorts: readonly SortSpec[];
  readonly pageSize?: number;
  readonly resultCap?: number;
  readonly startCursor?: string;
}

export type WireFilter = { [key: string]: unknown };

export type WireSort =
  | { property: string; direction: SortDirection }
  | { timestamp: TimestampKind; direction: SortDirection };

/** Request body of a collection query. */
export interface QueryPayload {
  filter?: WireFilter;
  sorts?: WireSort[];
  page_size: number;
  start_cursor?: string;
}

/** What the query layer needs to know of a collection schema. */
export type SchemaLookup = ReadonlyMap<string, { readonly tag: PropertyTag }>;
