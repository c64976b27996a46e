import type { ContentRecord } from '@sitekit/grouper-content'
import type { SortKey } from './sort'
import { parseOrderBy, sortBy } from './sort'

export type RecordFilter = (record: ContentRecord) => boolean

/**
 * Immutable query over a fixed list of records.
 * Every refinement returns a new query; the record list is never copied
 * until it is materialized.
 */
export class FixedRecordsQuery implements Iterable<ContentRecord> {
  constructor(
    private readonly records: readonly ContentRecord[],
    private readonly filters: readonly RecordFilter[] = [],
    private readonly order: readonly SortKey[] = [],
    private readonly range: { offset: number, limit: number | null } = { offset: 0, limit: null },
  ) {}

  filter(predicate: RecordFilter): FixedRecordsQuery {
    return new FixedRecordsQuery(this.records, [...this.filters, predicate], this.order, this.range)
  }

  orderBy(...fields: string[]): FixedRecordsQuery {
    return new FixedRecordsQuery(this.records, this.filters, parseOrderBy(fields), this.range)
  }

  limit(limit: number): FixedRecordsQuery {
    return new FixedRecordsQuery(this.records, this.filters, this.order, { ...this.range, limit })
  }

  offset(offset: number): FixedRecordsQuery {
    return new FixedRecordsQuery(this.records, this.filters, this.order, { ...this.range, offset })
  }

  private matching(): ContentRecord[] {
    const filtered = this.records.filter(record => this.filters.every(fn => fn(record)))
    return sortBy(filtered, this.order, (record, field) => record.get(field))
  }

  all(): ContentRecord[] {
    const { offset, limit } = this.range
    const matching = this.matching()
    return matching.slice(offset, limit === null ? undefined : offset + limit)
  }

  first(): ContentRecord | null {
    return this.limit(1).all()[0] ?? null
  }

  get(path: string): ContentRecord | null {
    return this.matching().find(record => record.path === path) ?? null
  }

  /** Records after offset/limit. */
  count(): number {
    return this.all().length
  }

  /** Records matching the filters, ignoring offset/limit. */
  get total(): number {
    return this.matching().length
  }

  [Symbol.iterator](): Iterator<ContentRecord> {
    return this.all()[Symbol.iterator]()
  }
}
