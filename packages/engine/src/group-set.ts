import type { ContentRecord } from '@sitekit/grouper-content'
import type { GroupBySource } from './group-source'
import type { FieldKeyPath } from './model-reader'
import { missingKeyError } from './errors'

/**
 * A group a record belongs to, with the field it was found in.
 */
export interface GroupRef {
  source: GroupBySource
  occurrence: FieldKeyPath
}

/**
 * The published result of one watcher build.
 *
 * Immutable once built. `get()` distinguishes a missing group (throws)
 * from an empty one.
 */
export class GroupSet implements Iterable<GroupBySource> {
  private readonly refs: Map<string, GroupRef[]> = new Map()

  constructor(
    readonly attribute: string,
    private readonly ordered: readonly GroupBySource[],
    private readonly byKey: ReadonlyMap<string, GroupBySource>,
    /** Dependency identifiers this result was computed from. */
    readonly dependencies: ReadonlySet<string>,
  ) {
    for (const source of ordered) {
      for (const entry of source.childEntries()) {
        let refs = this.refs.get(entry.record.path)
        if (!refs) {
          refs = []
          this.refs.set(entry.record.path, refs)
        }
        for (const occurrence of entry.occurrences) {
          refs.push({ source, occurrence })
        }
      }
    }
  }

  static empty(attribute: string, dependencies: ReadonlySet<string> = new Set()): GroupSet {
    return new GroupSet(attribute, [], new Map(), dependencies)
  }

  /** Number of distinct groups (aliases excluded). */
  get size(): number {
    return this.ordered.length
  }

  has(key: string): boolean {
    return this.byKey.has(key)
  }

  /**
   * Group by final key or alias.
   *
   * @throws GroupByError with code MISSING_KEY
   */
  get(key: string): GroupBySource {
    const source = this.byKey.get(key)
    if (!source)
      throw missingKeyError(this.attribute, key)
    return source
  }

  find(key: string): GroupBySource | null {
    return this.byKey.get(key) ?? null
  }

  /** Every key, aliases included. */
  keys(): string[] {
    return [...this.byKey.keys()]
  }

  sources(): GroupBySource[] {
    return [...this.ordered]
  }

  /**
   * Groups `record` contributed to, in group creation order.
   */
  refsOf(record: ContentRecord | string): readonly GroupRef[] {
    return this.refs.get(typeof record === 'string' ? record : record.path) ?? []
  }

  [Symbol.iterator](): Iterator<GroupBySource> {
    return this.ordered[Symbol.iterator]()
  }

  toJSON(): Record<string, string[]> {
    return Object.fromEntries(this.ordered.map(source => [source.key, source.childEntries().map(e => e.record.path)]))
  }
}
