import type { FieldOccurrence } from '@sitekit/grouper-engine/model-reader'
import { ContentRecord } from '@sitekit/grouper-content/record'
import { defaultGrouping, splitYield, toGroupingCallback } from '@sitekit/grouper-engine/grouping'
import { describe, expect, it } from 'vitest'

const record = new ContentRecord({ path: '/blog/a', model: 'post' })

function occurrence(field: unknown): FieldOccurrence {
  return { record, key: { fieldKey: 'tags', flowIndex: null, flowKey: null }, field }
}

function keys(split: string | null, field: unknown): unknown[] {
  const produced = defaultGrouping(split).produceKeys(occurrence(field))
  return Array.isArray(produced) ? produced : ['not an array']
}

describe('defaultGrouping', () => {
  it('splits strings on the delimiter and trims', () => {
    expect(keys(',', 'Latest News,Awesome')).toEqual(['Latest News', 'Awesome'])
  })

  it('keeps empty parts of a split string', () => {
    expect(keys(',', ' a , , b ')).toEqual(['a', '', 'b'])
    expect(keys(',', ' , ')).toEqual(['', ''])
  })

  it('keeps strings whole without a delimiter', () => {
    expect(keys(null, '  Hello World ')).toEqual(['  Hello World '])
  })

  it('yields list elements whole', () => {
    expect(keys(null, ['A', 'B'])).toEqual(['A', 'B'])
    expect(keys(',', ['a,b', 'c'])).toEqual(['a,b', 'c'])
  })

  it('yields null for empty values', () => {
    expect(keys(null, null)).toEqual([null])
    expect(keys(null, undefined)).toEqual([null])
    expect(keys(null, '')).toEqual([null])
    expect(keys(null, [])).toEqual([null])
  })

  it('passes scalars through', () => {
    expect(keys(null, 5)).toEqual([5])
    expect(keys(null, false)).toEqual([false])
  })

  it('ignores other objects', () => {
    expect(keys(null, { a: 1 })).toEqual([])
  })
})

describe('splitYield', () => {
  it('separates key and extra of a pair', () => {
    expect(splitYield(['k', { weight: 2 }])).toEqual({ raw: 'k', extra: { weight: 2 } })
  })

  it('leaves bare keys without extra', () => {
    expect(splitYield('k')).toEqual({ raw: 'k', extra: undefined })
    expect(splitYield(['a', 'b', 'c'])).toEqual({ raw: ['a', 'b', 'c'], extra: undefined })
  })
})

describe('toGroupingCallback', () => {
  it('wraps a bare function', () => {
    const produceKeys = (): string[] => []
    expect(toGroupingCallback(produceKeys)).toEqual({ produceKeys })
  })
})
