import { slugify } from '@sitekit/grouper-utils/slugify'
import { describe, expect, it } from 'vitest'

describe('slugify', () => {
  it('lowercases and joins words with dashes', () => {
    expect(slugify('Latest News')).toBe('latest-news')
  })

  it('drops punctuation at the edges', () => {
    expect(slugify('C#')).toBe('c')
    expect(slugify('  (draft)  ')).toBe('draft')
  })

  it('collapses runs of unsafe characters into one dash', () => {
    expect(slugify('a -- b / c')).toBe('a-b-c')
    expect(slugify('v1.2')).toBe('v1-2')
  })

  it('strips diacritics', () => {
    expect(slugify('Über Café')).toBe('uber-cafe')
  })

  it('keeps underscores', () => {
    expect(slugify('_')).toBe('_')
    expect(slugify('snake_case')).toBe('snake_case')
  })

  it('returns an empty string when nothing is left', () => {
    expect(slugify('###')).toBe('')
  })
})
