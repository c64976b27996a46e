/**
 * Variables an expression is evaluated against, e.g. `{ this, record, config }`.
 */
export type ExpressionContext = Readonly<Record<string, unknown>>

export type ExpressionFn = (context: ExpressionContext) => unknown

/**
 * A declared field value: fixed, an expression string, or a function.
 */
export type FieldExpression =
  | { kind: 'static', value: unknown }
  | { kind: 'expr', source: string }
  | { kind: 'fn', fn: ExpressionFn }

export interface CompiledExpression {
  evaluate: (context: ExpressionContext) => unknown
}

/**
 * Pluggable expression language. The host's template engine can supply its
 * own; `PathExpressionEvaluator` is the built-in default.
 */
export interface ExpressionEvaluator {
  compile: (source: string) => CompiledExpression
}

export function isExpressionFn(value: unknown): value is ExpressionFn {
  return typeof value === 'function'
}

/**
 * Classify a config value: functions run, strings are expressions, anything
 * else is returned as-is.
 */
export function toFieldExpression(value: unknown): FieldExpression {
  if (isExpressionFn(value))
    return { kind: 'fn', fn: value }
  if (typeof value === 'string')
    return { kind: 'expr', source: value }
  return { kind: 'static', value }
}

/**
 * Evaluate a field expression. Nothing is cached: each call sees the
 * current state of the context objects.
 */
export function evaluateExpression(
  expression: FieldExpression,
  context: ExpressionContext,
  evaluator: ExpressionEvaluator,
): unknown {
  switch (expression.kind) {
    case 'static':
      return expression.value
    case 'fn':
      return expression.fn(context)
    case 'expr':
      return evaluator.compile(expression.source).evaluate(context)
  }
}

// ==================== Default evaluator ====================

type Term =
  | { type: 'literal', value: unknown }
  | { type: 'path', segments: string[] }

const NUMBER = /^-?\d+(?:\.\d+)?$/
const SEGMENT = /^[A-Z_$][\w$]*$|^\d+$/i

function splitConcat(source: string): string[] {
  const parts: string[] = []
  let current = ''
  let quote: string | null = null
  for (const ch of source) {
    if (quote) {
      current += ch
      if (ch === quote)
        quote = null
      continue
    }
    if (ch === '"' || ch === '\'') {
      quote = ch
      current += ch
      continue
    }
    if (ch === '~') {
      parts.push(current)
      current = ''
      continue
    }
    current += ch
  }
  if (quote)
    throw new SyntaxError(`Unterminated string literal in "${source}"`)
  parts.push(current)
  return parts
}

function parseTerm(raw: string, source: string): Term {
  const text = raw.trim()
  if (text === '')
    throw new SyntaxError(`Empty term in "${source}"`)
  const first = text[0]
  if ((first === '"' || first === '\'') && text.endsWith(first) && text.length >= 2)
    return { type: 'literal', value: text.slice(1, -1) }
  if (NUMBER.test(text))
    return { type: 'literal', value: Number(text) }
  if (text === 'true' || text === 'false')
    return { type: 'literal', value: text === 'true' }
  if (text === 'null' || text === 'none')
    return { type: 'literal', value: null }
  const segments = text.split('.')
  for (const segment of segments) {
    if (!SEGMENT.test(segment))
      throw new SyntaxError(`Unexpected "${segment}" in "${source}"`)
  }
  return { type: 'path', segments }
}

/**
 * Read one property: plain properties and getters first, then a `get(name)`
 * accessor (content records, flow blocks, maps).
 */
export function lookupProperty(target: unknown, name: string): unknown {
  if (target === null || target === undefined)
    return undefined
  if (typeof target !== 'object' && typeof target !== 'function')
    return undefined
  if (target instanceof Map)
    return target.get(name)
  if (name in target) {
    const value: unknown = Reflect.get(target, name)
    if (typeof value !== 'function')
      return value
  }
  const getter: unknown = Reflect.get(target, 'get')
  if (typeof getter === 'function')
    return getter.call(target, name)
  return undefined
}

function evaluateTerm(term: Term, context: ExpressionContext): unknown {
  if (term.type === 'literal')
    return term.value
  const [head, ...rest] = term.segments
  let value: unknown = head === undefined ? undefined : context[head]
  for (const segment of rest) {
    value = lookupProperty(value, segment)
  }
  return value
}

function stringify(value: unknown): string {
  return value === null || value === undefined ? '' : String(value)
}

/**
 * Minimal expression language: dotted paths (`this.key`, `record.title`),
 * quoted strings, numbers, `true`/`false`/`null`, and `~` concatenation.
 *
 * @example
 * evaluator.compile('"tags/" ~ this.key ~ "/"').evaluate({ this: group })
 */
export class PathExpressionEvaluator implements ExpressionEvaluator {
  private readonly compiled: Map<string, CompiledExpression> = new Map()

  compile(source: string): CompiledExpression {
    const cached = this.compiled.get(source)
    if (cached)
      return cached

    const terms = splitConcat(source).map(part => parseTerm(part, source))
    const expression: CompiledExpression = {
      evaluate: (context) => {
        if (terms.length === 1 && terms[0])
          return evaluateTerm(terms[0], context)
        return terms.map(term => stringify(evaluateTerm(term, context))).join('')
      },
    }
    this.compiled.set(source, expression)
    return expression
  }
}
