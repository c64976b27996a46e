import type { ContentDatabase } from '@sitekit/grouper-content'
import type { Slugify } from '@sitekit/grouper-utils/slugify'
import type { GroupByConfig } from './config'
import type { ExpressionEvaluator } from './expression'
import type { GroupingCallback } from './grouping'
import type { ResolvedKey } from './key-resolver'
import type { FieldOccurrence } from './model-reader'
import { fileDependency, recordDependency } from '@sitekit/grouper-content'
import { createLogger } from '@sitekit/grouper-utils/logger'
import { callbackFailedError, isGroupByError } from './errors'
import { GroupBySource } from './group-source'
import { GroupSet } from './group-set'
import { splitYield } from './grouping'
import { resolveKey } from './key-resolver'
import { scan } from './model-reader'

const log = createLogger('Aggregator')

export interface AggregateOptions {
  db: ContentDatabase
  config: GroupByConfig
  callback: GroupingCallback
  flatten: boolean
  slugify: Slugify
  evaluator: ExpressionEvaluator
}

/**
 * Scan the watcher's subtree, run the callback per occurrence and collect
 * the resulting groups.
 *
 * Keys are resolved as they are produced, so `onResolved` sees the final key
 * and URL while the scan is still running. A key whose slug equals an
 * existing group's slug joins that group as an alias; the first group wins.
 */
export async function aggregate(options: AggregateOptions): Promise<GroupSet> {
  const { db, config, callback, flatten } = options
  const env = { config, view: config.toView(), db, evaluator: options.evaluator }
  const keyEnv = { slugify: options.slugify, evaluator: options.evaluator }

  const byKey = new Map<string, GroupBySource>()
  const bySlug = new Map<string, GroupBySource>()
  const ordered: GroupBySource[] = []
  const dependencies = new Set<string>()
  for (const file of config.dependencies) {
    dependencies.add(fileDependency(file))
  }

  const groupFor = ({ key, keyObj }: ResolvedKey): GroupBySource => {
    const known = byKey.get(key)
    if (known)
      return known
    const candidate = GroupBySource.create(key, keyObj, env)
    const slug = candidate.slug
    const existing = slug === null ? undefined : bySlug.get(slug)
    if (existing) {
      log.warn(`"${key}" and "${existing.key}" of ${config.id} share slug "${slug}"; using "${existing.key}"`)
      existing.addAlias(key)
      byKey.set(key, existing)
      return existing
    }
    ordered.push(candidate)
    byKey.set(key, candidate)
    if (slug !== null)
      bySlug.set(slug, candidate)
    return candidate
  }

  const consume = async (occurrence: FieldOccurrence): Promise<void> => {
    for await (const value of callback.produceKeys(occurrence)) {
      const { raw, extra } = splitYield(value)
      const resolved = resolveKey(raw, occurrence, config, keyEnv)
      const source = groupFor(resolved)
      source.addChild(occurrence.record, resolved.keyObj, extra, occurrence.key)
      if (callback.onResolved) {
        await callback.onResolved({
          key: source.key,
          keyObj: resolved.keyObj,
          raw,
          extra,
          source,
          urlPath: source.urlPath,
        }, occurrence)
      }
    }
  }

  const startTime = Date.now()
  let occurrences = 0
  for (const occurrence of scan(db, config.root, config.attribute, flatten)) {
    occurrences++
    dependencies.add(recordDependency(occurrence.record.path))
    try {
      await consume(occurrence)
    }
    catch (error) {
      if (isGroupByError(error))
        throw error
      throw callbackFailedError(config.id, error)
    }
  }

  for (const source of ordered) {
    source.finalize(config.orderBy)
  }

  log.debug(`${config.id}: ${occurrences} occurrences, ${ordered.length} groups in ${Date.now() - startTime}ms`)
  return new GroupSet(config.attribute, ordered, byKey, dependencies)
}
