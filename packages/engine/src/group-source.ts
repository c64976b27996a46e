import type { ContentDatabase, ContentRecord } from '@sitekit/grouper-content'
import type { ConfigView, GroupByConfig } from './config'
import type { ExpressionContext, ExpressionEvaluator } from './expression'
import type { FieldKeyPath } from './model-reader'
import type { SortKey } from './sort'
import { buildUrl, stripIndexFile } from '@sitekit/grouper-utils/url'
import { FixedRecordsQuery } from './children-query'
import { KEY_TOKEN } from './config'
import { ConfigError, invalidPageError, isGroupByError, notFinalizedError } from './errors'
import { evaluateExpression } from './expression'
import { pageCount, pageSlug, Pagination } from './pagination'
import { sortBy } from './sort'

/** Path segment marking virtual group nodes. */
export const VPATH = '@groupby'

/**
 * One record in a group, with every raw key it contributed.
 */
export interface ChildEntry {
  record: ContentRecord
  keyObjs: unknown[]
  extras: unknown[]
  occurrences: FieldKeyPath[]
}

/**
 * What every group of one watcher build shares.
 */
export interface GroupEnvironment {
  config: GroupByConfig
  view: ConfigView
  db: ContentDatabase
  evaluator: ExpressionEvaluator
}

class GroupData {
  readonly meta: Map<string, unknown> = new Map()
  readonly entries: Map<string, ChildEntry> = new Map()
  readonly aliases: string[] = []
  ordered: ChildEntry[] | null = null
  slug: string | null = null

  constructor(
    readonly key: string,
    readonly keyObj: unknown,
  ) {}
}

/**
 * Prefix of every virtual path under a record path: `/blog` → `/blog@groupby`.
 */
export function virtualRoot(recordPath: string): string {
  return recordPath === '/' ? `/${VPATH}` : `${recordPath}${VPATH}`
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function recordPathOf(record: ContentRecord | string): string {
  return typeof record === 'string' ? record : record.path
}

/**
 * The records sharing one resolved key.
 *
 * Instances for different pages of the same group share their data; use
 * `forPage()` to get a page view. Children and pagination become readable
 * once the owning build has finished.
 */
export class GroupBySource {
  private constructor(
    private readonly data: GroupData,
    private readonly env: GroupEnvironment,
    /** Page number, or null for the unpaginated view. */
    readonly pageNum: number | null,
  ) {}

  /** @internal */
  static create(key: string, keyObj: unknown, env: GroupEnvironment): GroupBySource {
    const source = new GroupBySource(new GroupData(key, keyObj), env, null)
    source.data.slug = source.computeSlug()
    return source
  }

  get attribute(): string {
    return this.env.config.attribute
  }

  get key(): string {
    return this.data.key
  }

  get keyObj(): unknown {
    return this.data.keyObj
  }

  /** Other keys that resolved to this group's slug. */
  get aliases(): readonly string[] {
    return this.data.aliases
  }

  /** Free-form per-group attributes, writable from `onResolved`. */
  get meta(): Map<string, unknown> {
    return this.data.meta
  }

  get config(): ConfigView {
    return this.env.view
  }

  /** Slug of this page relative to the watcher root, or null. */
  get slug(): string | null {
    const base = this.data.slug
    if (base === null || this.pageNum === null || this.pageNum <= 1)
      return base
    return pageSlug(base, this.pageNum, this.env.config.pagination.urlSuffix)
  }

  /** Absolute URL of this page, or null when not addressable. */
  get urlPath(): string | null {
    const slug = this.slug
    if (slug === null)
      return null
    return buildUrl([this.env.config.root, stripIndexFile(slug)])
  }

  /** Virtual path: `<root>@groupby/<attribute>/<key>[/<page>]`. */
  get path(): string {
    const base = `${virtualRoot(this.env.config.root)}/${this.attribute}/${this.key}`
    return this.pageNum !== null && this.pageNum > 1 ? `${base}/${this.pageNum}` : base
  }

  get isFinalized(): boolean {
    return this.data.ordered !== null
  }

  private entries(what: string): ChildEntry[] {
    if (this.data.ordered === null)
      throw notFinalizedError(what, this.key)
    return this.data.ordered
  }

  /** All child entries, in final order. */
  childEntries(): readonly ChildEntry[] {
    return this.entries('children')
  }

  get children(): FixedRecordsQuery {
    return new FixedRecordsQuery(this.entries('children').map(entry => entry.record))
  }

  get firstChild(): ContentRecord | null {
    return this.entries('children')[0]?.record ?? null
  }

  get firstExtra(): unknown {
    return this.entries('children')[0]?.extras[0]
  }

  extrasOf(record: ContentRecord | string): unknown[] {
    return [...(this.data.entries.get(recordPathOf(record))?.extras ?? [])]
  }

  keyObjsOf(record: ContentRecord | string): unknown[] {
    return [...(this.data.entries.get(recordPathOf(record))?.keyObjs ?? [])]
  }

  hasChild(record: ContentRecord | string): boolean {
    return this.data.entries.has(recordPathOf(record))
  }

  /** Number of children, available while building too. */
  get size(): number {
    return this.data.entries.size
  }

  private get perPage(): number {
    const { enabled, perPage } = this.env.config.pagination
    return enabled ? perPage : Math.max(1, this.data.entries.size)
  }

  get pageCount(): number {
    return pageCount(this.entries('pagination').length, this.perPage)
  }

  get pagination(): Pagination<ContentRecord> {
    const records = this.entries('pagination').map(entry => entry.record)
    return new Pagination(records, this.pageNum ?? 1, this.perPage)
  }

  /**
   * View of page `page`. Page 1 is the base URL.
   */
  forPage(page: number): GroupBySource {
    const pages = this.pageCount
    if (!Number.isInteger(page) || page < 1 || page > pages)
      throw invalidPageError(page, pages)
    return new GroupBySource(this.data, this.env, page)
  }

  /** Shared identity across page views. */
  sameGroup(other: GroupBySource): boolean {
    return this.data === other.data
  }

  private context(): ExpressionContext {
    return { this: this, record: this.env.db.get(this.env.config.root), config: this.env.view }
  }

  /**
   * Evaluate a declared field. Evaluated on every call.
   */
  field(name: string): unknown {
    const expression = this.env.config.fields.get(name)
    if (!expression)
      return undefined
    try {
      return evaluateExpression(expression, this.context(), this.env.evaluator)
    }
    catch (error) {
      if (isGroupByError(error))
        throw error
      const source = expression.kind === 'expr' ? expression.source : '<function>'
      throw new ConfigError(this.attribute, `fields.${name}`, source, reasonOf(error), { cause: error })
    }
  }

  /** Declared fields as lazy properties. */
  get fields(): Readonly<Record<string, unknown>> {
    const fields: Record<string, unknown> = {}
    for (const name of this.env.config.fields.keys()) {
      Object.defineProperty(fields, name, {
        enumerable: true,
        get: () => this.field(name),
      })
    }
    return Object.freeze(fields)
  }

  /**
   * Value by name for templates and sorting: built-in properties, then
   * declared fields, then `meta`.
   */
  get(name: string): unknown {
    switch (name) {
      case 'key':
        return this.key
      case 'keyObj':
      case 'key_obj':
        return this.keyObj
      case 'slug':
        return this.slug
      case 'urlPath':
      case 'url_path':
        return this.urlPath
      case 'path':
        return this.path
      case 'attribute':
        return this.attribute
      case 'size':
        return this.size
    }
    if (this.env.config.fields.has(name))
      return this.field(name)
    return this.meta.get(name)
  }

  /**
   * Files whose changes affect this group. Children's sources come first,
   * then declared dependencies, then the group template.
   */
  sourceFilenames(): string[] {
    const files = new Set<string>()
    for (const entry of this.data.entries.values()) {
      for (const file of entry.record.sourceFilenames()) {
        files.add(file)
      }
    }
    for (const file of this.env.config.dependencies) {
      files.add(file)
    }
    files.add(this.env.config.templatePath)
    return [...files]
  }

  /** @internal */
  addAlias(key: string): void {
    if (key !== this.key && !this.data.aliases.includes(key))
      this.data.aliases.push(key)
  }

  /**
   * Record one raw key yielded for `record`. A record appears once per
   * group; repeated keys accumulate on its entry.
   *
   * @internal
   */
  addChild(record: ContentRecord, keyObj: unknown, extra: unknown, occurrence: FieldKeyPath): void {
    let entry = this.data.entries.get(record.path)
    if (!entry) {
      entry = { record, keyObjs: [], extras: [], occurrences: [] }
      this.data.entries.set(record.path, entry)
    }
    entry.keyObjs.push(keyObj)
    if (extra !== undefined)
      entry.extras.push(extra)
    entry.occurrences.push(occurrence)
  }

  /** @internal */
  finalize(orderBy: readonly SortKey[] | null): void {
    const entries = [...this.data.entries.values()]
    this.data.ordered = orderBy
      ? sortBy(entries, orderBy, (entry, field) => entry.record.get(field))
      : entries
  }

  private computeSlug(): string | null {
    const { slug } = this.env.config
    if (slug === null)
      return null
    if (slug.includes(KEY_TOKEN))
      return slug.replaceAll(KEY_TOKEN, this.key).replace(/^\/+/, '')

    let value: unknown
    try {
      value = evaluateExpression({ kind: 'expr', source: slug }, this.context(), this.env.evaluator)
    }
    catch (error) {
      throw new ConfigError(this.attribute, 'slug', slug, reasonOf(error), { cause: error })
    }
    if (value === null || value === undefined)
      return null
    const text = String(value).replace(/^\/+/, '')
    return text === '' ? null : text
  }

  toString(): string {
    return `<GroupBySource attribute="${this.attribute}" key="${this.key}" page=${this.pageNum ?? 1}>`
  }
}
