import type { GroupBySource } from './group-source'
import type { FieldOccurrence } from './model-reader'

/**
 * A raw key as produced by a callback: string, number, bigint, boolean,
 * null, or an object with its own `toString`.
 */
export type RawKey = unknown

/**
 * What a callback may produce per key: the raw key, or a `[rawKey, extra]`
 * pair whose `extra` is stored for the record in that group.
 */
export type KeyYield = RawKey | readonly [RawKey, unknown]

/**
 * Passed to `onResolved` as soon as a produced key has a group.
 * `source` is still being built: `meta` is writable, `children` and
 * `pagination` are not available yet.
 */
export interface ResolvedHandle {
  key: string
  keyObj: unknown
  raw: RawKey
  extra: unknown
  source: GroupBySource
  /** Absolute URL of the group's first page, or null when not addressable. */
  urlPath: string | null
}

export type ProduceKeys = (occurrence: FieldOccurrence) => Iterable<KeyYield> | AsyncIterable<KeyYield>

export interface GroupingCallback {
  produceKeys: ProduceKeys
  onResolved?: (handle: ResolvedHandle, occurrence: FieldOccurrence) => void | Promise<void>
}

export function toGroupingCallback(callback: ProduceKeys | GroupingCallback): GroupingCallback {
  return typeof callback === 'function' ? { produceKeys: callback } : callback
}

/**
 * Split a yielded value into raw key and extra. Only two-element arrays are
 * pairs; a bare array is an invalid key and is rejected later.
 */
export function splitYield(value: KeyYield): { raw: RawKey, extra: unknown } {
  if (Array.isArray(value) && value.length === 2)
    return { raw: value[0], extra: value[1] }
  return { raw: value, extra: undefined }
}

function isScalar(value: unknown): boolean {
  return typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean'
}

/**
 * Callback used for watchers registered from a config file. A non-empty
 * string is split on `split` with each part trimmed (empty parts are kept
 * and fall to the none-key), or yielded whole without a delimiter. Scalars
 * pass through, list items are yielded as they are, and empty values yield
 * `null`.
 */
export function defaultGrouping(split: string | null): GroupingCallback {
  return {
    produceKeys(occurrence) {
      const value = occurrence.field
      if (typeof value === 'string' && value !== '')
        return split ? value.split(split).map(part => part.trim()) : [value]
      if (isScalar(value))
        return [value]
      if (Array.isArray(value))
        return value.length > 0 ? value : [null]
      if (value === null || value === undefined || value === '')
        return [null]
      return []
    },
  }
}
