import type { GroupBySource } from './group-source'
import type { GroupSet } from './group-set'
import { createLogger } from '@sitekit/grouper-utils/logger'
import { normalizeUrl } from '@sitekit/grouper-utils/url'

const log = createLogger('Resolver')

/**
 * A resolved URL: the page view of a group, and its page number (null when
 * the watcher does not paginate).
 */
export interface ResolvedPage {
  watcherId: string
  source: GroupBySource
  page: number | null
}

/**
 * Maps URLs to group pages, rebuilt wholesale per watcher build.
 *
 * When two watchers claim one URL, the watcher registered first owns it,
 * independent of build order.
 */
export class VirtualResolver {
  private readonly order: string[] = []
  private readonly claims: Map<string, Map<string, ResolvedPage>> = new Map()

  register(watcherId: string): void {
    if (!this.order.includes(watcherId))
      this.order.push(watcherId)
  }

  unregister(watcherId: string): void {
    const index = this.order.indexOf(watcherId)
    if (index >= 0)
      this.order.splice(index, 1)
    this.claims.delete(watcherId)
  }

  /**
   * Replace every URL of a watcher with those of its new groups.
   */
  update(watcherId: string, groups: GroupSet): void {
    this.register(watcherId)
    const urls = new Map<string, ResolvedPage>()
    for (const source of groups) {
      if (source.urlPath === null)
        continue
      const paginated = source.config.pagination.enabled
      const pages = paginated ? source.pageCount : 1
      for (let page = 1; page <= pages; page++) {
        const view = source.forPage(page)
        if (view.urlPath !== null)
          urls.set(normalizeUrl(view.urlPath), { watcherId, source: view, page: paginated ? page : null })
      }
    }
    this.claims.set(watcherId, urls)

    for (const url of urls.keys()) {
      const owner = this.lookup(url)
      if (owner && owner.watcherId !== watcherId)
        log.warn(`${url} of ${watcherId} is already served by ${owner.watcherId}`)
    }
  }

  reset(watcherId: string): void {
    this.claims.delete(watcherId)
  }

  lookup(url: string): ResolvedPage | null {
    const normalized = normalizeUrl(url)
    for (const watcherId of this.order) {
      const page = this.claims.get(watcherId)?.get(normalized)
      if (page)
        return page
    }
    return null
  }

  /**
   * Every URL with its owning page, in watcher registration order.
   */
  entries(): Map<string, ResolvedPage> {
    const result = new Map<string, ResolvedPage>()
    for (const watcherId of this.order) {
      for (const [url, page] of this.claims.get(watcherId) ?? []) {
        if (!result.has(url))
          result.set(url, page)
      }
    }
    return result
  }

  urls(): string[] {
    return [...this.entries().keys()]
  }
}
