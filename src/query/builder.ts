import { InvalidArgumentError, UnknownPropertyError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { ResultSequence } from '../pagination/result-sequence.js';
import type { CollectionEndpoint, CollectionRef, RawRecord } from '../types.js';
import { MAX_PAGE_SIZE, compileCanonicalKey, compileQuery } from './compiler.js';
import { combine, isTimestampKind, or, propertyFilter, resolveFilter, timestampFilter } from './filters.js';
import type {
  Constraint,
  FilterNode,
  FilterTarget,
  QueryPayload,
  QueryState,
  SchemaLookup,
  SortDirection,
  SortSpec,
} from './types.js';

export interface QueryBuilderConfig<T> {
  collection: CollectionRef;
  endpoint: CollectionEndpoint;
  /** Turns each raw record into the caller's record type. */
  map: (record: RawRecord) => T;
  /** Collection schema; when absent, filters pass through unchecked. */
  schema?: SchemaLookup;
  defaultPageSize?: number;
  logger?: Logger;
}

const DIRECTIONS: ReadonlySet<string> = new Set<SortDirection>(['ascending', 'descending']);

function isFilterNode(value: FilterTarget | FilterNode): value is FilterNode {
  return typeof value === 'object' && 'kind' in value;
}

/**
 * Mutable, single-owner query builder. Every operation returns the same
 * builder so calls chain; use clone() to branch independent variants.
 *
 * @example
 * tasks.query()
 *   .filter('Priority', select.equals('High'))
 *   .sort('Due Date', 'ascending')
 *   .limit(2)
 *   .execute()
 */
export class QueryBuilder<T = RawRecord> {
  private root: FilterNode | null = null;
  private sorts: SortSpec[] = [];
  private resultCap: number | undefined;
  private pageSizeHint: number | undefined;
  private startCursor: string | undefined;
  /** Set once or() has joined clauses; ANDing onto that root would be ambiguous. */
  private openOr = false;
  private readonly logger: Logger;

  constructor(private readonly config: QueryBuilderConfig<T>) {
    this.logger = config.logger ?? silentLogger;
  }

  get collection(): CollectionRef {
    return this.config.collection;
  }

  /** Snapshot of the current builder state. */
  get state(): QueryState {
    return {
      filter: this.root,
      sorts: [...this.sorts],
      ...(this.pageSizeHint !== undefined ? { pageSize: this.pageSizeHint } : {}),
      ...(this.resultCap !== undefined ? { resultCap: this.resultCap } : {}),
      ...(this.startCursor !== undefined ? { startCursor: this.startCursor } : {}),
    };
  }

  /**
   * Builds one filter clause checked against this builder's schema, for use
   * in filterAny(), or(), and the and()/or() helpers.
   */
  clause(target: FilterTarget, constraint: Constraint): FilterNode {
    if (typeof target !== 'string') {
      return timestampFilter(target.timestamp, constraint);
    }
    const schema = this.config.schema;
    if (schema === undefined) {
      return propertyFilter(target, constraint);
    }
    const declared = schema.get(target);
    if (declared === undefined) {
      throw new UnknownPropertyError(target);
    }
    return propertyFilter(target, constraint, declared.tag);
  }

  /** Adds a filter, AND-combined with whatever is already there. */
  filter(node: FilterNode): this;
  filter(target: FilterTarget, constraint: Constraint): this;
  filter(target: FilterTarget | FilterNode, constraint?: Constraint): this {
    this.assertNoOpenOr('filter()');
    this.root = combine('and', this.root, this.toNode(target, constraint));
    return this;
  }

  /**
   * Adds an explicit OR group of the given clauses. The group is AND-combined
   * with any existing filter, and later filter() calls AND onto it.
   */
  filterAny(...nodes: FilterNode[]): this {
    if (nodes.length === 0) {
      throw new InvalidArgumentError('filterAny() needs at least one filter');
    }
    this.assertNoOpenOr('filterAny()');
    const group = or(...nodes.map((node) => resolveFilter(node, this.config.schema)));
    this.root = combine('and', this.root, group);
    return this;
  }

  /**
   * OR-combines a filter with the current root. Only allowed while the root
   * is a single clause or an OR group; after several filter() calls, nest
   * explicitly with filterAny(), and() or or(). Once or() has joined two
   * clauses, filter() and filterAny() are rejected for the same reason.
   */
  or(node: FilterNode): this;
  or(target: FilterTarget, constraint: Constraint): this;
  or(target: FilterTarget | FilterNode, constraint?: Constraint): this {
    const node = this.toNode(target, constraint);
    if (this.root !== null && this.root.kind === 'and') {
      throw new InvalidArgumentError(
        'Ambiguous filter: or() after several filter() calls; group the clauses with filterAny(), and() or or()',
      );
    }
    if (this.root !== null) {
      this.openOr = true;
    }
    this.root = combine('or', this.root, node);
    return this;
  }

  /** Appends a sort key; earlier keys take precedence. */
  sort(target: FilterTarget, direction: SortDirection = 'ascending'): this {
    if (!DIRECTIONS.has(direction)) {
      throw new InvalidArgumentError(`Invalid sort direction: "${String(direction)}"`);
    }
    if (typeof target === 'string') {
      if (this.config.schema !== undefined && !this.config.schema.has(target)) {
        throw new UnknownPropertyError(target);
      }
      this.sorts.push({ kind: 'property', property: target, direction });
    } else {
      if (!isTimestampKind(target.timestamp)) {
        throw new InvalidArgumentError(`Unknown timestamp: "${String(target.timestamp)}"`);
      }
      this.sorts.push({ kind: 'timestamp', timestamp: target.timestamp, direction });
    }
    return this;
  }

  /** Caps the total number of results across all pages. */
  limit(count: number): this {
    if (!Number.isInteger(count) || count <= 0) {
      throw new InvalidArgumentError(`limit must be a positive integer, got ${count}`);
    }
    this.resultCap = count;
    return this;
  }

  /** Server-side page-size hint; independent of limit(). */
  pageSize(size: number): this {
    if (!Number.isInteger(size) || size <= 0 || size > MAX_PAGE_SIZE) {
      throw new InvalidArgumentError(`page size must be an integer between 1 and ${MAX_PAGE_SIZE}, got ${size}`);
    }
    this.pageSizeHint = size;
    return this;
  }

  /** Starts the result set at the given cursor. */
  startAt(cursor: string): this {
    if (cursor.length === 0) {
      throw new InvalidArgumentError('start cursor must be a non-empty string');
    }
    this.startCursor = cursor;
    return this;
  }

  /** Independent copy of this builder; changes to either do not affect the other. */
  clone(): QueryBuilder<T> {
    const copy = new QueryBuilder<T>(this.config);
    copy.root = this.root;
    copy.sorts = [...this.sorts];
    copy.resultCap = this.resultCap;
    copy.pageSizeHint = this.pageSizeHint;
    copy.startCursor = this.startCursor;
    copy.openOr = this.openOr;
    return copy;
  }

  compile(): QueryPayload {
    return compileQuery(this.state, this.config.defaultPageSize);
  }

  /** Runs the query. Each call returns a fresh sequence with its own cursor state. */
  execute(): ResultSequence<T> {
    return this.run(this.state);
  }

  /** First matching record, or undefined when there is none. */
  async first(): Promise<T | undefined> {
    const sequence = this.run({ ...this.state, pageSize: 1, resultCap: 1 });
    const result = await sequence.next();
    if (result.done) {
      this.logger.debug({ collection: this.config.collection }, 'query returned no results');
      return undefined;
    }
    return result.value;
  }

  private run(state: QueryState): ResultSequence<T> {
    const { collection, endpoint, map } = this.config;
    const payload = compileQuery(state, this.config.defaultPageSize);
    this.logger.debug({ collection, query: compileCanonicalKey(payload) }, 'executing query');

    return new ResultSequence<T>({
      load: (cursor) =>
        endpoint.query(collection, cursor === undefined ? payload : { ...payload, start_cursor: cursor }),
      map,
      ...(state.resultCap !== undefined ? { resultCap: state.resultCap } : {}),
      ...(state.startCursor !== undefined ? { startCursor: state.startCursor } : {}),
      logger: this.logger,
    });
  }

  private assertNoOpenOr(operation: string): void {
    if (this.openOr) {
      throw new InvalidArgumentError(
        `Ambiguous filter: ${operation} after or(); group the clauses with filterAny(), and() or or()`,
      );
    }
  }

  private toNode(target: FilterTarget | FilterNode, constraint: Constraint | undefined): FilterNode {
    if (isFilterNode(target)) {
      return resolveFilter(target, this.config.schema);
    }
    if (constraint === undefined) {
      throw new InvalidArgumentError('A filter target needs a constraint');
    }
    return this.clause(target, constraint);
  }
}
