import { ContentRecord } from '@sitekit/grouper-content/record'
import { FixedRecordsQuery } from '@sitekit/grouper-engine/children-query'
import { compareValues, parseOrderBy, sortBy } from '@sitekit/grouper-engine/sort'
import { describe, expect, it } from 'vitest'

describe('parseOrderBy', () => {
  it('reads comma-separated keys with optional minus', () => {
    expect(parseOrderBy('-date, title,')).toEqual([
      { field: 'date', reverse: true },
      { field: 'title', reverse: false },
    ])
    expect(parseOrderBy(['_path'])).toEqual([{ field: '_path', reverse: false }])
  })

  it('rejects malformed keys', () => {
    expect(() => parseOrderBy('--date')).toThrow('Invalid sort key "--date"')
  })
})

describe('sortBy', () => {
  const rows = [
    { id: 'a', n: 2 },
    { id: 'b', n: null },
    { id: 'c', n: 1 },
    { id: 'd', n: 2 },
  ]
  const lookup = (row: { n: number | null }, field: string): unknown => field === 'n' ? row.n : undefined

  it('sorts stably with missing values last', () => {
    expect(sortBy(rows, parseOrderBy('n'), lookup).map(r => r.id)).toEqual(['c', 'a', 'd', 'b'])
  })

  it('keeps missing values last when reversed', () => {
    expect(sortBy(rows, parseOrderBy('-n'), lookup).map(r => r.id)).toEqual(['a', 'd', 'c', 'b'])
  })

  it('returns a copy in input order without keys', () => {
    const sorted = sortBy(rows, [], lookup)
    expect(sorted).toEqual(rows)
    expect(sorted).not.toBe(rows)
  })
})

describe('compareValues', () => {
  it('compares numbers, dates, booleans and strings', () => {
    expect(compareValues(2, 10)).toBe(-1)
    expect(compareValues(new Date(2024, 0, 2), new Date(2024, 0, 1))).toBe(1)
    expect(compareValues(false, true)).toBe(-1)
    expect(compareValues('b', 'a')).toBe(1)
    expect(compareValues('a', 'a')).toBe(0)
  })
})

describe('FixedRecordsQuery', () => {
  const records = ['c', 'a', 'b'].map((name, i) =>
    new ContentRecord({ path: `/blog/${name}`, model: 'post', fields: { rank: i } }))
  const query = new FixedRecordsQuery(records)

  it('iterates in the given order', () => {
    expect([...query].map(r => r.path)).toEqual(['/blog/c', '/blog/a', '/blog/b'])
    expect(query.first()?.path).toBe('/blog/c')
  })

  it('orders, filters and slices without changing the original', () => {
    const refined = query.orderBy('_path').filter(r => r.get('rank') !== 1).offset(1).limit(5)
    expect(refined.all().map(r => r.path)).toEqual(['/blog/c'])
    expect(refined.total).toBe(2)
    expect(refined.count()).toBe(1)
    expect(query.count()).toBe(3)
  })

  it('looks up a record by path', () => {
    expect(query.get('/blog/b')?.get('rank')).toBe(2)
    expect(query.filter(() => false).get('/blog/b')).toBeNull()
  })
})
