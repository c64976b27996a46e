import type { Slugify } from '@sitekit/grouper-utils/slugify'
import type { GroupByConfig } from './config'
import type { ExpressionEvaluator } from './expression'
import type { FieldOccurrence } from './model-reader'
import { ConfigError, invalidYieldError, isGroupByError } from './errors'
import { evaluateExpression } from './expression'

/** Key used when a raw key is empty and no `replace_none_key` is set. */
export const NONE_KEY = 'none'

export interface KeyEnvironment {
  slugify: Slugify
  evaluator: ExpressionEvaluator
}

export interface ResolvedKey {
  /** Final, URL-safe group key. */
  key: string
  /** Raw key after `key_obj_fn`, before remapping. */
  keyObj: unknown
}

function isEmpty(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '')
}

function hasOwnToString(value: object): boolean {
  for (let proto: object | null = value; proto && proto !== Object.prototype; proto = Object.getPrototypeOf(proto)) {
    if (Object.hasOwn(proto, 'toString'))
      return true
  }
  return false
}

/**
 * String form of a raw key, or null when the type has no meaningful one.
 */
export function keyToString(value: unknown): string | null {
  switch (typeof value) {
    case 'string':
      return value
    case 'number':
      return Number.isFinite(value) ? String(value) : null
    case 'bigint':
    case 'boolean':
      return String(value)
    case 'object':
      if (value === null || Array.isArray(value) || !hasOwnToString(value))
        return null
      return String(value)
    default:
      return null
  }
}

/**
 * Turn a raw key into the final group key.
 *
 * Order: `key_obj_fn`, empty → `replace_none_key`, `key_map` lookup,
 * slugify. Never mutates the config or the occurrence.
 */
export function resolveKey(
  raw: unknown,
  occurrence: FieldOccurrence,
  config: GroupByConfig,
  env: KeyEnvironment,
): ResolvedKey {
  let keyObj = raw
  if (config.keyObjFn) {
    try {
      keyObj = evaluateExpression(config.keyObjFn, {
        X: raw,
        ARGS: occurrence,
        this: occurrence.record,
        config: config.toView(),
      }, env.evaluator)
    }
    catch (error) {
      if (isGroupByError(error))
        throw error
      const msg = error instanceof Error ? error.message : String(error)
      const source = config.keyObjFn.kind === 'expr' ? config.keyObjFn.source : '<function>'
      throw new ConfigError(config.attribute, 'key_obj_fn', source, msg, { cause: error })
    }
  }

  const fallback = config.replaceNoneKey ?? NONE_KEY
  const text = isEmpty(keyObj) ? fallback : keyToString(keyObj)
  if (text === null)
    throw invalidYieldError(config.attribute, keyObj)

  const key = env.slugify(config.mapKey(text))
  if (key !== '')
    return { key, keyObj }
  return { key: env.slugify(fallback) || NONE_KEY, keyObj }
}
