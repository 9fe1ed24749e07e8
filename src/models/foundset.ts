/**
 * Lazily paginated query result.
 *
 * @module models/foundset
 */

import type { DataRecord } from './record.js';

/**
 * One page of a query result.
 */
export interface FoundsetPage {
  records: DataRecord[];
  /** Records matching the query on the server */
  foundCount: number;
  /** Records in this page */
  returnedCount: number;
}

/**
 * Fetches `limit` records starting at the 1-based `offset`.
 */
export type PageLoader = (offset: number, limit: number) => Promise<FoundsetPage>;

export interface FoundsetOptions {
  /** 1-based offset of the first page */
  offset: number;
  /** Most records the foundset yields; unbounded when omitted */
  limit?: number;
  pageSize: number;
  /** Omitted for foundsets that never fetch (empty results, portal rows) */
  loader?: PageLoader;
}

/**
 * Ordered, forward-only sequence of records.
 *
 * The first page is held from the start; later pages are fetched when an
 * index beyond the materialized records is requested. Materialized records
 * are kept for the foundset's lifetime and never re-fetched; a fresh query is
 * the only way to see newer data.
 *
 * Page fetches are serialized: concurrent callers wait on the same request.
 */
export class Foundset implements AsyncIterable<DataRecord> {
  private readonly records: DataRecord[];
  private readonly offset: number;
  private readonly pageSize: number;
  private readonly bound: number;
  private readonly loader?: PageLoader;
  private readonly found: number;
  private readonly returned: number;
  private pending?: Promise<void>;
  private exhausted: boolean;

  constructor(first: FoundsetPage, options: FoundsetOptions) {
    this.records = [...first.records];
    this.offset = options.offset;
    this.pageSize = options.pageSize;
    this.loader = options.loader;
    this.found = first.foundCount;
    this.returned = first.returnedCount;
    this.bound = Math.max(
      0,
      Math.min(first.foundCount - (options.offset - 1), options.limit ?? Number.POSITIVE_INFINITY)
    );
    this.exhausted =
      !this.loader || first.records.length === 0 || first.records.length >= this.bound;
  }

  /**
   * Creates a foundset that never fetches.
   */
  static of(records: DataRecord[], foundCount = records.length): Foundset {
    return new Foundset(
      { records, foundCount, returnedCount: records.length },
      { offset: 1, limit: records.length, pageSize: Math.max(records.length, 1) }
    );
  }

  /**
   * Creates an empty foundset.
   */
  static empty(): Foundset {
    return Foundset.of([]);
  }

  /**
   * Records matching the query on the server.
   */
  get totalCount(): number {
    return this.found;
  }

  /**
   * Records returned by the first page.
   */
  get returnedCount(): number {
    return this.returned;
  }

  /**
   * Records fetched so far.
   */
  get materializedCount(): number {
    return this.records.length;
  }

  /**
   * Upper bound of records the foundset yields.
   */
  get size(): number {
    return this.bound;
  }

  /**
   * Returns the record at `index`, fetching pages up to it.
   * Resolves to undefined beyond the end.
   */
  async at(index: number): Promise<DataRecord | undefined> {
    if (index < 0 || index >= this.bound) {
      return undefined;
    }
    while (index >= this.records.length && !this.exhausted) {
      await this.loadNextPage();
    }
    return this.records[index];
  }

  async *[Symbol.asyncIterator](): AsyncIterator<DataRecord> {
    for (let i = 0; ; i++) {
      const record = await this.at(i);
      if (!record) {
        return;
      }
      yield record;
    }
  }

  /**
   * Fetches every remaining page and returns all records.
   */
  async toArray(): Promise<DataRecord[]> {
    const all: DataRecord[] = [];
    for await (const record of this) {
      all.push(record);
    }
    return all;
  }

  private loadNextPage(): Promise<void> {
    if (!this.pending) {
      this.pending = this.fetchPage().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  private async fetchPage(): Promise<void> {
    const remaining = this.bound - this.records.length;
    if (!this.loader || remaining <= 0) {
      this.exhausted = true;
      return;
    }
    const page = await this.loader(
      this.offset + this.records.length,
      Math.min(this.pageSize, remaining)
    );
    if (page.records.length === 0) {
      // the result shrank on the server since the first page
      this.exhausted = true;
      return;
    }
    this.records.push(...page.records.slice(0, remaining));
    if (this.records.length >= this.bound) {
      this.exhausted = true;
    }
  }
}
