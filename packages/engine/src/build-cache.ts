import { createLogger } from '@sitekit/grouper-utils/logger'

const log = createLogger('BuildCache')

export const BuildState = {
  Unbuilt: 'unbuilt',
  Building: 'building',
  Built: 'built',
  Stale: 'stale',
} as const

export type BuildState = (typeof BuildState)[keyof typeof BuildState]

interface CacheEntry<T> {
  state: BuildState
  result: { value: T } | null
  building: Promise<T> | null
  dirtyDuringBuild: boolean
  generation: number
}

/**
 * Memoized builds keyed by entry id.
 *
 * At most one build per entry runs at a time; concurrent callers share its
 * promise. A result is published only when its build completes, so readers
 * see either the previous complete result or the new one. Entries are
 * independent: different ids build in parallel.
 */
export class BuildCache<T> {
  private readonly entries: Map<string, CacheEntry<T>> = new Map()

  private entry(id: string): CacheEntry<T> {
    let entry = this.entries.get(id)
    if (!entry) {
      entry = { state: BuildState.Unbuilt, result: null, building: null, dirtyDuringBuild: false, generation: 0 }
      this.entries.set(id, entry)
    }
    return entry
  }

  state(id: string): BuildState {
    return this.entries.get(id)?.state ?? BuildState.Unbuilt
  }

  /**
   * Last complete result, whatever the current state.
   */
  peek(id: string): T | null {
    return this.entries.get(id)?.result?.value ?? null
  }

  /**
   * Cached result when built; otherwise join the running build or start one.
   * `publish` runs with the result only if the build is still current, that
   * is, not discarded while it ran.
   */
  async get(id: string, build: () => Promise<T>, publish?: (value: T) => void): Promise<T> {
    const entry = this.entry(id)
    if (entry.state === BuildState.Built && entry.result) {
      log.debug(`hit ${id}`)
      return entry.result.value
    }
    if (entry.building) {
      log.debug(`joining build of ${id}`)
      return entry.building
    }

    const generation = ++entry.generation
    entry.state = BuildState.Building
    entry.dirtyDuringBuild = false
    const current = (): boolean => entry.generation === generation

    const building = (async () => {
      try {
        const value = await build()
        if (current()) {
          publish?.(value)
          entry.result = { value }
          entry.state = entry.dirtyDuringBuild ? BuildState.Stale : BuildState.Built
          entry.building = null
        }
        else {
          log.debug(`dropping result of discarded build of ${id}`)
        }
        return value
      }
      catch (error) {
        if (current()) {
          entry.state = entry.result ? BuildState.Stale : BuildState.Unbuilt
          entry.building = null
        }
        throw error
      }
    })()
    entry.building = building
    return building
  }

  /**
   * Mark an entry stale. A build in progress publishes as stale.
   */
  invalidate(id: string): void {
    const entry = this.entries.get(id)
    if (!entry)
      return
    if (entry.state === BuildState.Building) {
      entry.dirtyDuringBuild = true
    }
    else if (entry.state === BuildState.Built) {
      entry.state = BuildState.Stale
      log.debug(`stale ${id}`)
    }
  }

  /**
   * Forget an entry entirely. A running build still settles for its
   * callers but is not published.
   */
  discard(id: string): void {
    const entry = this.entries.get(id)
    if (!entry)
      return
    entry.generation++
    this.entries.delete(id)
  }

  clear(): void {
    for (const id of [...this.entries.keys()]) {
      this.discard(id)
    }
  }
}
