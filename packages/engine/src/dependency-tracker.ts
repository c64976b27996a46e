import { isUnderPath, recordPathOf } from '@sitekit/grouper-content'

/**
 * Maps dependency identifiers to the cache entries
 * computed from them.
 *
 * Exact identifiers come from the last build (contributing records,
 * config files). Root watches catch records that did not exist yet: any
 * `record:` change under an entry's root affects it.
 */
export class DependencyTracker {
  private readonly exact: Map<string, Set<string>> = new Map()
  private readonly byEntry: Map<string, Set<string>> = new Map()
  private readonly roots: Map<string, string> = new Map()

  /**
   * Replace the exact dependencies of an entry.
   */
  register(entryId: string, dependencies: Iterable<string>): void {
    this.clear(entryId)
    const deps = new Set(dependencies)
    this.byEntry.set(entryId, deps)
    for (const dependency of deps) {
      let entries = this.exact.get(dependency)
      if (!entries) {
        entries = new Set()
        this.exact.set(dependency, entries)
      }
      entries.add(entryId)
    }
  }

  watchRoot(entryId: string, rootPath: string): void {
    this.roots.set(entryId, rootPath)
  }

  /**
   * Drop the exact dependencies of an entry. Root watches stay.
   */
  clear(entryId: string): void {
    const deps = this.byEntry.get(entryId)
    if (!deps)
      return
    for (const dependency of deps) {
      const entries = this.exact.get(dependency)
      entries?.delete(entryId)
      if (entries?.size === 0)
        this.exact.delete(dependency)
    }
    this.byEntry.delete(entryId)
  }

  forget(entryId: string): void {
    this.clear(entryId)
    this.roots.delete(entryId)
  }

  dependenciesOf(entryId: string): ReadonlySet<string> {
    return this.byEntry.get(entryId) ?? new Set()
  }

  /**
   * Entries affected by a set of changed identifiers.
   */
  affected(changed: Iterable<string>): Set<string> {
    const result = new Set<string>()
    for (const dependency of changed) {
      for (const entryId of this.exact.get(dependency) ?? []) {
        result.add(entryId)
      }
      const path = recordPathOf(dependency)
      if (path === null)
        continue
      for (const [entryId, root] of this.roots) {
        if (isUnderPath(path, root))
          result.add(entryId)
      }
    }
    return result
  }
}
