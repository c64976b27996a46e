import type { ContentDatabase, ContentRecord, DependencyRecorder } from '@sitekit/grouper-content'
import type { Slugify } from '@sitekit/grouper-utils/slugify'
import type { GroupByConfigFile, GroupByConfigInput } from './config'
import type { ExpressionEvaluator } from './expression'
import type { GroupBySource } from './group-source'
import type { GroupSet } from './group-set'
import type { ArtifactRecord, ArtifactRegistry } from './pruner'
import type { ResolvedPage } from './resolver'
import type { SortKey } from './sort'
import type { WatcherHost, WatcherOptions } from './watcher'
import { fileDependency, normalizeRecordPath, recordDependency } from '@sitekit/grouper-content'
import { createLogger } from '@sitekit/grouper-utils/logger'
import { slugify as defaultSlugify } from '@sitekit/grouper-utils/slugify'
import { artifactName, buildUrl, normalizeUrl } from '@sitekit/grouper-utils/url'
import { BuildCache } from './build-cache'
import { GroupByConfig, KEY_TOKEN } from './config'
import { DependencyTracker } from './dependency-tracker'
import { ConfigError, duplicateWatcherError, unknownWatcherError } from './errors'
import { PathExpressionEvaluator } from './expression'
import { defaultGrouping } from './grouping'
import { prune } from './pruner'
import { VirtualResolver } from './resolver'
import { parseOrderBy, sortBy } from './sort'
import { Watcher } from './watcher'

const log = createLogger('GroupBy')

export interface GroupByOptions {
  db: ContentDatabase
  slugify?: Slugify
  evaluator?: ExpressionEvaluator
}

export interface VGroupsOptions {
  /** Attributes to include; all watched attributes when omitted. */
  keys?: string | readonly string[]
  /** Only occurrences in these record fields. */
  fields?: string | readonly string[]
  /** Only occurrences in these flow-block fields. */
  flows?: string | readonly string[]
  /** Include the whole subtree, not just the record itself. */
  recursive?: boolean
  orderBy?: string | readonly string[]
  /** Receives every record and config file the query depended on. */
  recorder?: DependencyRecorder
}

function toSet(value: string | readonly string[] | undefined): Set<string> | null {
  if (value === undefined)
    return null
  return new Set(typeof value === 'string' ? [value] : value)
}

/**
 * Registry of watchers plus the shared cache, dependency
 * tracker and URL resolver.
 *
 * @example
 * const groupBy = new GroupBy({ db })
 * groupBy.addWatcher('tags', { root: '/blog' }).setGrouping(defaultGrouping(null))
 * const tags = await groupBy.groups('tags', '/blog')
 */
export class GroupBy {
  readonly db: ContentDatabase
  readonly slugify: Slugify
  readonly evaluator: ExpressionEvaluator
  private readonly registered: Map<string, Watcher> = new Map()
  private readonly cache: BuildCache<GroupSet> = new BuildCache()
  private readonly tracker: DependencyTracker = new DependencyTracker()
  private readonly resolver: VirtualResolver = new VirtualResolver()
  private readonly host: WatcherHost
  private readonly unsubscribe: () => void

  constructor(options: GroupByOptions) {
    this.db = options.db
    this.slugify = options.slugify ?? defaultSlugify
    this.evaluator = options.evaluator ?? new PathExpressionEvaluator()
    this.host = {
      db: this.db,
      slugify: this.slugify,
      evaluator: this.evaluator,
      cache: this.cache,
      published: (watcher, groups) => {
        this.tracker.register(watcher.id, [...groups.dependencies, ...watcher.buildDependencies()])
        this.resolver.update(watcher.id, groups)
      },
    }
    this.unsubscribe = this.db.onChange(changed => this.invalidate(changed))
  }

  // ==================== Registration ====================

  /**
   * Register a watcher. The config may be a `GroupByConfig`, a mapping, or
   * a parsed config file (its `attribute` section is used).
   *
   * @throws GroupByError DUPLICATE_WATCHER when attribute and root are taken
   * @throws ConfigError when the config is malformed
   */
  addWatcher(
    attribute: string,
    config?: GroupByConfig | GroupByConfigFile | GroupByConfigInput,
    options: WatcherOptions = {},
  ): Watcher {
    const resolved = GroupByConfig.fromAny(attribute, config)
    resolved.validate(this.evaluator)
    if (this.registered.has(resolved.id))
      throw duplicateWatcherError(attribute, resolved.root)

    const watcher = new Watcher(resolved, this.host, options)
    this.registered.set(watcher.id, watcher)
    this.tracker.watchRoot(watcher.id, watcher.root)
    this.resolver.register(watcher.id)
    log.debug(`Registered ${watcher.id}${watcher.preBuild ? ' (pre-build)' : ''}`)
    return watcher
  }

  /**
   * One watcher per config-file section, each using the default grouping
   * with the section's `split`.
   */
  registerConfigFile(file: GroupByConfigFile, options: WatcherOptions = {}): Watcher[] {
    return file.attributes().map((attribute) => {
      const watcher = this.addWatcher(attribute, file, options)
      return watcher.setGrouping(defaultGrouping(watcher.config.split))
    })
  }

  get watchers(): Watcher[] {
    return [...this.registered.values()]
  }

  /**
   * @throws GroupByError UNKNOWN_WATCHER
   */
  watcher(attribute: string, root = '/'): Watcher {
    const normalized = normalizeRecordPath(root)
    const watcher = this.registered.get(`${attribute}@${normalized}`)
    if (!watcher)
      throw unknownWatcherError(attribute, normalized)
    return watcher
  }

  /** Every file any watcher depends on. */
  get dependencies(): Set<string> {
    const files = new Set<string>()
    for (const watcher of this.registered.values()) {
      for (const file of watcher.config.dependencies) {
        files.add(file)
      }
    }
    return files
  }

  // ==================== Access ====================

  async groups(attribute: string, root = '/'): Promise<GroupSet> {
    return this.watcher(attribute, root).groups()
  }

  /**
   * @throws GroupByError MISSING_KEY when no group has that key
   */
  async get(attribute: string, key: string, root = '/'): Promise<GroupBySource> {
    const groups = await this.groups(attribute, root)
    return groups.get(key)
  }

  private mayServe(watcher: Watcher, url: string): boolean {
    const { slug } = watcher.config
    if (slug === null)
      return false
    const rootUrl = buildUrl([watcher.root])
    if (!url.startsWith(rootUrl))
      return false
    const tokenAt = slug.indexOf(KEY_TOKEN)
    if (tokenAt < 0)
      return true
    const prefix = slug.slice(0, tokenAt).replace(/^\/+/, '')
    return url.startsWith(`${rootUrl}${prefix}`)
  }

  /**
   * Group page served at `url`, or null. Only watchers whose root and slug
   * prefix fit the URL are built.
   */
  async resolve(url: string): Promise<ResolvedPage | null> {
    const normalized = normalizeUrl(url)
    const candidates = this.watchers.filter(watcher => this.mayServe(watcher, normalized))
    await Promise.all(candidates.map(watcher => watcher.groups()))
    return this.resolver.lookup(normalized)
  }

  /**
   * Resolve `<recordPath>@groupby/<attribute>/<key>[/<page>]` given the
   * pieces after the marker.
   */
  async resolveVirtualPath(recordPath: string, pieces: readonly string[]): Promise<ResolvedPage | null> {
    const [attribute, key, pageText, ...rest] = pieces
    if (attribute === undefined || key === undefined || rest.length > 0)
      return null
    const watcher = this.registered.get(`${attribute}@${normalizeRecordPath(recordPath)}`)
    if (!watcher)
      return null
    const source = (await watcher.groups()).find(key)
    if (!source || source.key !== key)
      return null

    const paginated = source.config.pagination.enabled
    if (pageText === undefined)
      return { watcherId: watcher.id, source: paginated ? source.forPage(1) : source, page: paginated ? 1 : null }
    if (!paginated || !/^\d+$/.test(pageText))
      return null
    const page = Number(pageText)
    if (page < 1 || page > source.pageCount)
      return null
    return { watcherId: watcher.id, source: source.forPage(page), page }
  }

  /**
   * Groups reachable from `record`: those any visited record contributed
   * to. Deduplicated in first-seen order unless `orderBy` is given.
   */
  async vgroups(record: ContentRecord | string, options: VGroupsOptions = {}): Promise<GroupBySource[]> {
    const start = typeof record === 'string' ? this.db.get(record) : record
    const attributes = toSet(options.keys)
    const fields = toSet(options.fields)
    const flows = toSet(options.flows)
    const watchers = this.watchers.filter(watcher => attributes === null || attributes.has(watcher.attribute))

    const recorder = options.recorder
    for (const watcher of watchers) {
      for (const dependency of watcher.fileDependencies()) {
        recorder?.recordDependency(dependency)
      }
    }
    if (!start)
      return []

    const sets = await Promise.all(watchers.map(watcher => watcher.groups()))
    const seen = new Set<GroupBySource>()
    const result: GroupBySource[] = []
    const queue: ContentRecord[] = [start]
    for (let current = queue.shift(); current; current = queue.shift()) {
      recorder?.recordDependency(recordDependency(current.path))
      for (const groups of sets) {
        for (const { source, occurrence } of groups.refsOf(current)) {
          if (fields && !fields.has(occurrence.fieldKey))
            continue
          if (flows && (occurrence.flowKey === null || !flows.has(occurrence.flowKey)))
            continue
          if (seen.has(source))
            continue
          seen.add(source)
          result.push(source)
        }
      }
      if (options.recursive)
        queue.push(...current.children)
    }

    if (options.orderBy === undefined)
      return result
    let keys: SortKey[]
    try {
      keys = parseOrderBy(options.orderBy)
    }
    catch (error) {
      const msg = error instanceof Error ? error.message : String(error)
      throw new ConfigError('vgroups', 'order_by', String(options.orderBy), msg, { cause: error })
    }
    return sortBy(result, keys, (source, field) => source.get(field))
  }

  // ==================== Build lifecycle ====================

  /**
   * Rebuild every pre-build watcher. Run before records are rendered.
   */
  async prebuild(): Promise<void> {
    for (const watcher of this.registered.values()) {
      if (!watcher.preBuild)
        continue
      watcher.invalidate()
      await watcher.groups()
    }
  }

  /**
   * Build every watcher and declare one artifact per served page.
   */
  async buildAll(registry: ArtifactRegistry): Promise<ArtifactRecord[]> {
    await Promise.all(this.watchers.map(watcher => watcher.groups()))
    const declared: ArtifactRecord[] = []
    for (const [url, page] of this.resolver.entries()) {
      const artifact: ArtifactRecord = {
        url,
        artifact: artifactName(url),
        sourcePath: page.source.path,
        template: page.source.config.template,
        sources: page.source.sourceFilenames(),
      }
      registry.declare(artifact)
      declared.push(artifact)
    }
    log.debug(`Declared ${declared.length} group pages`)
    return declared
  }

  /**
   * Bring every watcher up to date, then retract group artifacts no longer
   * served. Returns the removed URLs.
   */
  async prune(registry: ArtifactRegistry): Promise<string[]> {
    await Promise.all(this.watchers.map(watcher => watcher.groups()))
    return prune(registry, new Set(this.resolver.urls()))
  }

  /**
   * Mark every watcher depending on `changed` stale. Returns their ids.
   */
  invalidate(changed: Iterable<string>): string[] {
    const affected = [...this.tracker.affected(changed)]
    for (const id of affected) {
      this.cache.invalidate(id)
    }
    if (affected.length > 0)
      log.debug(`Invalidated ${affected.join(', ')}`)
    return affected
  }

  /** Mark watchers depending on a file stale. */
  touchFile(filename: string): string[] {
    return this.invalidate([fileDependency(filename)])
  }

  /**
   * Drop every cached result and URL, as at the start of a new build run.
   */
  reset(): void {
    this.cache.clear()
    for (const id of this.registered.keys()) {
      this.tracker.clear(id)
      this.resolver.reset(id)
    }
  }

  dispose(): void {
    this.unsubscribe()
    this.reset()
  }
}
