import { RemoteFetchError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { QueryResult, RawRecord } from '../types.js';

export type SequenceState = 'fetching' | 'exhausted';

/** Loads one page starting at `cursor` (undefined = first page). */
export type PageLoader = (cursor: string | undefined) => Promise<QueryResult>;

export interface ResultSequenceOptions<T> {
  load: PageLoader;
  map: (record: RawRecord) => T;
  /** Total number of records to yield across all pages. */
  resultCap?: number;
  startCursor?: string;
  logger?: Logger;
}

/**
 * Lazy, forward-only sequence over a paginated result set.
 *
 * Nothing is fetched until the first `next()`. Each page fetch follows the
 * cursor returned by the previous one; once the server reports no more pages
 * and the last batch is drained, or the result cap is reached, the sequence
 * is exhausted and issues no further requests. A sequence cannot be
 * restarted: execute the query again for a fresh one.
 */
export class ResultSequence<T> implements AsyncIterableIterator<T> {
  private readonly load: PageLoader;
  private readonly map: (record: RawRecord) => T;
  private readonly resultCap: number | undefined;
  private readonly logger: Logger;

  private currentState: SequenceState = 'fetching';
  private batch: readonly RawRecord[] = [];
  private index = 0;
  private cursor: string | undefined;
  private hasMore = true;
  private yieldedCount = 0;
  private pageCount = 0;

  constructor(options: ResultSequenceOptions<T>) {
    this.load = options.load;
    this.map = options.map;
    this.resultCap = options.resultCap;
    this.cursor = options.startCursor;
    this.logger = options.logger ?? silentLogger;
  }

  get state(): SequenceState {
    return this.currentState;
  }

  /** Records handed to the caller so far. */
  get yielded(): number {
    return this.yieldedCount;
  }

  get pagesFetched(): number {
    return this.pageCount;
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    while (this.currentState === 'fetching') {
      if (this.resultCap !== undefined && this.yieldedCount >= this.resultCap) {
        this.logger.debug({ cap: this.resultCap }, 'result cap reached');
        this.currentState = 'exhausted';
        break;
      }

      const record = this.batch[this.index];
      if (record !== undefined) {
        this.index += 1;
        this.yieldedCount += 1;
        return { done: false, value: this.map(record) };
      }

      if (!this.hasMore) {
        this.currentState = 'exhausted';
        break;
      }

      await this.fetchPage();
    }
    return { done: true, value: undefined };
  }

  /** Stops the sequence early; no further pages are requested. */
  async return(): Promise<IteratorResult<T, undefined>> {
    this.currentState = 'exhausted';
    this.batch = [];
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  /** Drains the remaining records into an array. */
  async toArray(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }

  private async fetchPage(): Promise<void> {
    this.logger.debug({ cursor: this.cursor ?? null, page: this.pageCount + 1 }, 'loading next page');

    let result: QueryResult;
    try {
      result = await this.load(this.cursor);
    } catch (err) {
      this.currentState = 'exhausted';
      this.batch = [];
      throw new RemoteFetchError(this.yieldedCount, err);
    }

    this.pageCount += 1;
    this.batch = result.records;
    this.index = 0;
    this.hasMore = result.hasMore && result.nextCursor !== null;
    this.cursor = result.nextCursor ?? undefined;

    this.logger.debug(
      { results: result.records.length, nextCursor: result.nextCursor },
      'loaded page',
    );
  }
}
