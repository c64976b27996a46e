export interface SortKey {
  field: string
  reverse: boolean
}

const SORT_KEY = /^-?[A-Z_][\w.]*$/i

/**
 * Parse an order-by spec such as `"-date, title"` or `['-date', 'title']`.
 * A leading `-` sorts that key descending.
 */
export function parseOrderBy(spec: string | readonly string[]): SortKey[] {
  const parts = typeof spec === 'string' ? spec.split(',') : spec
  const keys: SortKey[] = []
  for (const part of parts) {
    const text = part.trim()
    if (text === '')
      continue
    if (!SORT_KEY.test(text))
      throw new Error(`Invalid sort key "${text}"`)
    keys.push(text.startsWith('-')
      ? { field: text.slice(1), reverse: true }
      : { field: text, reverse: false })
  }
  return keys
}

function isMissing(value: unknown): value is null | undefined {
  return value === null || value === undefined
}

function rank(value: unknown): unknown {
  if (value instanceof Date)
    return value.getTime()
  if (typeof value === 'boolean')
    return value ? 1 : 0
  return value
}

/**
 * Compare two field values. Missing values sort after present ones in both
 * directions; mixed types fall back to their string forms.
 */
export function compareValues(a: unknown, b: unknown): number {
  const left = rank(a)
  const right = rank(b)
  if ((typeof left === 'number' || typeof left === 'bigint') && (typeof right === 'number' || typeof right === 'bigint'))
    return left < right ? -1 : left > right ? 1 : 0
  const ls = String(left)
  const rs = String(right)
  return ls < rs ? -1 : ls > rs ? 1 : 0
}

/**
 * Stable multi-key sort. `lookup` reads a field from an item.
 */
export function sortBy<T>(
  items: readonly T[],
  keys: readonly SortKey[],
  lookup: (item: T, field: string) => unknown,
): T[] {
  if (keys.length === 0)
    return [...items]
  const indexed = items.map((item, index) => ({ item, index }))
  indexed.sort((a, b) => {
    for (const key of keys) {
      const av = lookup(a.item, key.field)
      const bv = lookup(b.item, key.field)
      const am = isMissing(av)
      const bm = isMissing(bv)
      if (am || bm) {
        if (am && bm)
          continue
        return am ? 1 : -1
      }
      const result = compareValues(av, bv)
      if (result !== 0)
        return key.reverse ? -result : result
    }
    return a.index - b.index
  })
  return indexed.map(entry => entry.item)
}
