import type { ContentDatabase } from '@sitekit/grouper-content'
import type { Slugify } from '@sitekit/grouper-utils/slugify'
import type { BuildCache, BuildState } from './build-cache'
import type { GroupByConfig } from './config'
import type { ExpressionEvaluator } from './expression'
import type { GroupingCallback, ProduceKeys } from './grouping'
import { fileDependency } from '@sitekit/grouper-content'
import { createLogger } from '@sitekit/grouper-utils/logger'
import { aggregate } from './aggregator'
import { noCallbackError } from './errors'
import { GroupSet } from './group-set'
import { toGroupingCallback } from './grouping'

const log = createLogger('Watcher')

/**
 * What a watcher needs from its owner.
 */
export interface WatcherHost {
  db: ContentDatabase
  slugify: Slugify
  evaluator: ExpressionEvaluator
  cache: BuildCache<GroupSet>
  /** Called with each build that is still current when it completes. */
  published: (watcher: Watcher, groups: GroupSet) => void
}

export interface WatcherOptions {
  /** Rebuild on every `GroupBy.prebuild()`, before records are rendered. */
  preBuild?: boolean
}

/**
 * One attribute under one root, bound to a config and a grouping
 * callback. Builds lazily on first access and caches until a dependency
 * changes or the config is edited.
 */
export class Watcher {
  readonly preBuild: boolean
  private callback: GroupingCallback | null = null
  private flattenBlocks = true
  private builds = 0

  constructor(
    readonly config: GroupByConfig,
    private readonly host: WatcherHost,
    options: WatcherOptions = {},
  ) {
    this.preBuild = options.preBuild ?? false
    config.onChange(() => this.invalidate())
  }

  get id(): string {
    return this.config.id
  }

  get attribute(): string {
    return this.config.attribute
  }

  get root(): string {
    return this.config.root
  }

  get flatten(): boolean {
    return this.flattenBlocks
  }

  get state(): BuildState {
    return this.host.cache.state(this.id)
  }

  /** Number of completed or attempted scans. */
  get buildCount(): number {
    return this.builds
  }

  get hasGrouping(): boolean {
    return this.callback !== null
  }

  setGrouping(callback: ProduceKeys | GroupingCallback, flatten = true): this {
    this.callback = toGroupingCallback(callback)
    this.flattenBlocks = flatten
    this.invalidate()
    return this
  }

  /**
   * Add files whose change must rebuild this watcher.
   */
  dependsOn(...files: string[]): this {
    this.config.addDependency(...files)
    return this
  }

  setEnabled(enabled: boolean): this {
    this.config.enabled = enabled
    return this
  }

  /** File dependency identifiers declared by the config. */
  fileDependencies(): string[] {
    return [...this.config.dependencies].map(fileDependency)
  }

  /** Declared files plus the group template. */
  buildDependencies(): string[] {
    return [...this.fileDependencies(), fileDependency(this.config.templatePath)]
  }

  /**
   * Current groups, building them if needed. A disabled watcher yields an
   * empty set without scanning.
   */
  async groups(): Promise<GroupSet> {
    return this.host.cache.get(this.id, () => this.build(), groups => this.host.published(this, groups))
  }

  /**
   * Last complete result without triggering a build.
   */
  peek(): GroupSet | null {
    return this.host.cache.peek(this.id)
  }

  invalidate(): void {
    this.host.cache.invalidate(this.id)
  }

  private async build(): Promise<GroupSet> {
    const config = this.config.clone()
    if (!config.enabled) {
      log.debug(`${this.id} is disabled`)
      return GroupSet.empty(this.attribute, new Set(this.fileDependencies()))
    }
    const callback = this.callback
    if (!callback)
      throw noCallbackError(this.id)
    this.builds++
    log.debug(`Building ${this.id}`)
    return aggregate({
      db: this.host.db,
      config,
      callback,
      flatten: this.flattenBlocks,
      slugify: this.host.slugify,
      evaluator: this.host.evaluator,
    })
  }
}
