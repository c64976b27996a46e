import type { FieldOccurrence } from '@sitekit/grouper-engine/model-reader'
import { GroupByConfig } from '@sitekit/grouper-engine/config'
import { PathExpressionEvaluator } from '@sitekit/grouper-engine/expression'
import { keyToString, resolveKey } from '@sitekit/grouper-engine/key-resolver'
import { slugify } from '@sitekit/grouper-utils/slugify'
import { beforeEach, describe, expect, it } from 'vitest'
import { addPost, createBlog } from './fixtures/blog'

describe('resolveKey', () => {
  const env = { slugify, evaluator: new PathExpressionEvaluator() }
  let occurrence: FieldOccurrence

  beforeEach(() => {
    const db = createBlog()
    const record = addPost(db, 'first', { tags: ['x'] })
    occurrence = { record, key: { fieldKey: 'tags', flowIndex: null, flowKey: null }, field: ['x'] }
  })

  it('slugifies the raw key and keeps it as keyObj', () => {
    const config = new GroupByConfig('tags')
    expect(resolveKey('Latest News', occurrence, config, env)).toEqual({ key: 'latest-news', keyObj: 'Latest News' })
  })

  it('applies key_map before slugify', () => {
    const config = new GroupByConfig('tags', { key_map: { Blog: 'News' } })
    expect(resolveKey('Blog', occurrence, config, env)).toEqual({ key: 'news', keyObj: 'Blog' })
  })

  it('maps the string form of non-string keys', () => {
    const config = new GroupByConfig('tags', { key_map: { 42: 'answer' } })
    expect(resolveKey(42, occurrence, config, env).key).toBe('answer')
  })

  it('uses the none key for empty values', () => {
    const config = new GroupByConfig('tags')
    expect(resolveKey(null, occurrence, config, env).key).toBe('none')
    expect(resolveKey(undefined, occurrence, config, env).key).toBe('none')
    expect(resolveKey('   ', occurrence, config, env).key).toBe('none')
  })

  it('uses replace_none_key for empty values', () => {
    const config = new GroupByConfig('tags', { replace_none_key: 'Untagged' })
    expect(resolveKey('', occurrence, config, env)).toEqual({ key: 'untagged', keyObj: '' })
  })

  it('falls back when the slug comes out empty', () => {
    expect(resolveKey('###', occurrence, new GroupByConfig('tags'), env).key).toBe('none')
    const config = new GroupByConfig('tags', { replace_none_key: 'Misc' })
    expect(resolveKey('###', occurrence, config, env).key).toBe('misc')
  })

  it('accepts scalars and objects with their own toString', () => {
    const config = new GroupByConfig('tags')
    expect(resolveKey(3.5, occurrence, config, env).key).toBe('3-5')
    expect(resolveKey(true, occurrence, config, env).key).toBe('true')
    expect(resolveKey(10n, occurrence, config, env).key).toBe('10')
    const custom = { toString: () => 'Custom Key' }
    expect(resolveKey(custom, occurrence, config, env)).toEqual({ key: 'custom-key', keyObj: custom })
  })

  it('rejects values without a string form', () => {
    const config = new GroupByConfig('tags')
    expect(() => resolveKey({}, occurrence, config, env)).toThrow('Unsupported group key yielded for "tags": object')
    expect(() => resolveKey(['a', 'b', 'c'], occurrence, config, env)).toThrow('Unsupported group key yielded for "tags": array')
    expect(() => resolveKey(Number.NaN, occurrence, config, env)).toThrow('Unsupported group key yielded for "tags": number')
    expect(() => resolveKey(Symbol('x'), occurrence, config, env)).toThrow('Unsupported group key yielded for "tags": symbol')
  })

  it('transforms the raw key with a key_obj_fn expression', () => {
    const config = new GroupByConfig('tags', { key_obj_fn: 'X.name' })
    expect(resolveKey({ name: 'Foo Bar' }, occurrence, config, env)).toEqual({ key: 'foo-bar', keyObj: 'Foo Bar' })
  })

  it('gives key_obj_fn the occurrence and record', () => {
    const config = new GroupByConfig('tags', { key_obj_fn: 'ARGS.key.fieldKey ~ "-" ~ this.path' })
    expect(resolveKey('ignored', occurrence, config, env).key).toBe('tags-blog-first')
  })

  it('transforms the raw key with a key_obj_fn function', () => {
    const config = new GroupByConfig('tags', { key_obj_fn: ctx => String(ctx.X).toUpperCase() })
    expect(resolveKey('abc', occurrence, config, env)).toEqual({ key: 'abc', keyObj: 'ABC' })
  })

  it('reports a failing key_obj_fn as a config error', () => {
    const config = new GroupByConfig('tags', {
      key_obj_fn: () => {
        throw new Error('bad input')
      },
    })
    expect(() => resolveKey('a', occurrence, config, env)).toThrow(
      'Invalid config for [tags.key_obj_fn] = "<function>": bad input',
    )
  })

  it('is stable for repeated calls', () => {
    const config = new GroupByConfig('tags', { key_map: { 'C#': 'C Sharp' } })
    const first = resolveKey('C#', occurrence, config, env)
    expect(resolveKey('C#', occurrence, config, env)).toEqual(first)
    expect(first.key).toBe('c-sharp')
  })
})

describe('keyToString', () => {
  it('returns null for plain objects and arrays', () => {
    expect(keyToString({})).toBeNull()
    expect(keyToString([1])).toBeNull()
    expect(keyToString(Number.POSITIVE_INFINITY)).toBeNull()
  })

  it('uses inherited toString of classes', () => {
    class Tag {
      constructor(private readonly name: string) {}
      toString(): string {
        return this.name
      }
    }
    expect(keyToString(new Tag('Go'))).toBe('Go')
  })
})
