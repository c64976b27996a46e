import { ContentRecord } from '@sitekit/grouper-content/record'
import {
  evaluateExpression,
  lookupProperty,
  PathExpressionEvaluator,
  toFieldExpression,
} from '@sitekit/grouper-engine/expression'
import { describe, expect, it } from 'vitest'

describe('PathExpressionEvaluator', () => {
  const evaluator = new PathExpressionEvaluator()
  const evaluate = (source: string, context: Record<string, unknown>): unknown =>
    evaluator.compile(source).evaluate(context)

  it('reads dotted paths', () => {
    expect(evaluate('this.key', { this: { key: 'awesome' } })).toBe('awesome')
    expect(evaluate('this.meta.count', { this: { meta: { count: 3 } } })).toBe(3)
  })

  it('concatenates terms with ~', () => {
    expect(evaluate('"tags/" ~ this.key ~ "/"', { this: { key: 'a' } })).toBe('tags/a/')
  })

  it('treats missing values as empty in concatenations', () => {
    expect(evaluate('"x" ~ this.nope', { this: {} })).toBe('x')
    expect(evaluate('this.nope.deeper', { this: {} })).toBeUndefined()
  })

  it('parses literals', () => {
    expect(evaluate('42', {})).toBe(42)
    expect(evaluate('-1.5', {})).toBe(-1.5)
    expect(evaluate('true', {})).toBe(true)
    expect(evaluate('null', {})).toBeNull()
    expect(evaluate('\'single\'', {})).toBe('single')
    expect(evaluate('"a ~ b"', {})).toBe('a ~ b')
  })

  it('falls back to get() accessors', () => {
    const record = new ContentRecord({ path: '/blog', model: 'page', fields: { title: 'Blog' } })
    expect(evaluate('record.title', { record })).toBe('Blog')
    expect(evaluate('record.path', { record })).toBe('/blog')
  })

  it('reads maps by key', () => {
    expect(evaluate('m.a', { m: new Map([['a', 1]]) })).toBe(1)
  })

  it('caches compiled sources', () => {
    expect(evaluator.compile('this.key')).toBe(evaluator.compile('this.key'))
  })

  it('rejects malformed expressions', () => {
    expect(() => evaluator.compile('this..key')).toThrow('Unexpected "" in "this..key"')
    expect(() => evaluator.compile('"open')).toThrow('Unterminated string literal in ""open"')
    expect(() => evaluator.compile('this.key ~ ')).toThrow('Empty term in "this.key ~ "')
    expect(() => evaluator.compile('a b')).toThrow('Unexpected "a b" in "a b"')
  })
})

describe('lookupProperty', () => {
  it('returns undefined for primitives and null', () => {
    expect(lookupProperty(null, 'x')).toBeUndefined()
    expect(lookupProperty('text', 'length')).toBeUndefined()
  })
})

describe('toFieldExpression', () => {
  it('classifies config values', () => {
    const fn = (): number => 1
    expect(toFieldExpression(fn)).toEqual({ kind: 'fn', fn })
    expect(toFieldExpression('this.key')).toEqual({ kind: 'expr', source: 'this.key' })
    expect(toFieldExpression(5)).toEqual({ kind: 'static', value: 5 })
  })
})

describe('evaluateExpression', () => {
  const evaluator = new PathExpressionEvaluator()

  it('evaluates every kind', () => {
    const context = { this: { key: 'k' } }
    expect(evaluateExpression({ kind: 'static', value: [1] }, context, evaluator)).toEqual([1])
    expect(evaluateExpression({ kind: 'expr', source: 'this.key' }, context, evaluator)).toBe('k')
    expect(evaluateExpression({ kind: 'fn', fn: ctx => ctx.this }, context, evaluator)).toEqual({ key: 'k' })
  })
})
