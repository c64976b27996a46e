import type { ExpressionEvaluator, ExpressionFn, FieldExpression } from './expression'
import type { SortKey } from './sort'
import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { normalizeRecordPath } from '@sitekit/grouper-content/record'
import { z } from 'zod/v4'
import { ConfigError } from './errors'
import { isExpressionFn, toFieldExpression } from './expression'
import { parseOrderBy } from './sort'

export const DEFAULT_PER_PAGE = 20
export const DEFAULT_URL_SUFFIX = 'page'
export const KEY_TOKEN = '{key}'
export const TEMPLATES_DIR = 'templates'

const ExpressionInputSchema = z.union([
  z.string(),
  z.custom<ExpressionFn>(isExpressionFn, 'Expected an expression string or a function'),
])

/**
 * Mapping form of a watcher config. Keys mirror the config-file sections.
 */
export const GroupByConfigInputSchema = z.strictObject({
  root: z.string().optional(),
  slug: z.string().nullable().optional(),
  template: z.string().min(1).optional(),
  split: z.string().min(1).nullable().optional(),
  enabled: z.boolean().optional(),
  key_obj_fn: ExpressionInputSchema.nullable().optional(),
  replace_none_key: z.string().nullable().optional(),
  fields: z.record(z.string(), z.unknown()).optional(),
  key_map: z.record(z.string(), z.string()).optional(),
  children: z.strictObject({
    order_by: z.union([z.string(), z.array(z.string())]).optional(),
  }).optional(),
  pagination: z.strictObject({
    enabled: z.boolean().optional(),
    per_page: z.number().int().positive().optional(),
    url_suffix: z.string().min(1).optional(),
  }).optional(),
  dependencies: z.array(z.string()).optional(),
})

export type GroupByConfigInput = z.input<typeof GroupByConfigInputSchema>

export interface PaginationConfig {
  enabled: boolean
  perPage: number
  urlSuffix: string
}

/**
 * Read-only projection of a config, handed to templates and field
 * expressions as `config`.
 */
export interface ConfigView {
  readonly attribute: string
  readonly root: string
  readonly slug: string | null
  readonly template: string
  readonly split: string | null
  readonly enabled: boolean
  readonly replaceNoneKey: string | null
  readonly keyMap: Readonly<Record<string, string>>
  readonly fieldNames: readonly string[]
  readonly orderBy: readonly SortKey[] | null
  readonly pagination: Readonly<PaginationConfig>
  readonly dependencies: readonly string[]
}

function valueAt(input: unknown, keys: readonly PropertyKey[]): unknown {
  let value = input
  for (const key of keys) {
    if (value === null || typeof value !== 'object')
      return undefined
    value = Reflect.get(value, key)
  }
  return value
}

function describe(value: unknown): string {
  if (value === undefined)
    return ''
  if (typeof value === 'string')
    return value
  if (typeof value === 'function')
    return '<function>'
  return JSON.stringify(value) ?? String(value)
}

/**
 * Parsed config file: one section per attribute.
 */
export class GroupByConfigFile {
  constructor(
    readonly filename: string,
    readonly sections: Readonly<Record<string, unknown>>,
  ) {}

  attributes(): string[] {
    return Object.keys(this.sections)
  }
}

const ConfigFileSchema = z.record(z.string(), z.unknown())

/**
 * Parse config-file text. Top-level keys are attribute names.
 */
export function parseConfigFile(text: string, filename: string): GroupByConfigFile {
  let json: unknown
  try {
    json = JSON.parse(text)
  }
  catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    throw new ConfigError(filename, '*', '', `not valid JSON: ${msg}`, { cause: error })
  }
  const result = ConfigFileSchema.safeParse(json)
  if (!result.success)
    throw new ConfigError(filename, '*', describe(json), 'expected an object of attribute sections')
  return new GroupByConfigFile(filename, result.data)
}

/**
 * Read and parse a JSON config file.
 */
export async function loadConfigFile(filePath: string): Promise<GroupByConfigFile> {
  const absPath = path.resolve(filePath)
  const text = await readFile(absPath, 'utf-8')
  return parseConfigFile(text, absPath)
}

/**
 * Settings for one watched attribute.
 *
 * Construction validates shape; `validate()` additionally compiles every
 * expression so syntax errors surface at registration. `root` is fixed
 * since it is part of the watcher's identity; every other setting may be
 * edited and notifies `onChange` listeners.
 */
export class GroupByConfig {
  readonly attribute: string
  readonly root: string
  private slugValue: string | null
  private templateValue: string
  private splitValue: string | null
  private enabledValue: boolean
  private keyObjFnValue: FieldExpression | null
  private replaceNoneKeyValue: string | null
  private orderByValue: SortKey[] | null = null
  private readonly fieldMap: Map<string, FieldExpression> = new Map()
  private readonly keyMapValue: Map<string, string> = new Map()
  private readonly paginationValue: PaginationConfig = {
    enabled: false,
    perPage: DEFAULT_PER_PAGE,
    urlSuffix: DEFAULT_URL_SUFFIX,
  }

  private readonly dependencySet: Set<string> = new Set()
  private readonly listeners: Set<() => void> = new Set()

  constructor(attribute: string, input: GroupByConfigInput = {}) {
    if (attribute.trim() === '')
      throw new ConfigError(attribute, 'attribute', attribute, 'attribute name must not be empty')
    this.attribute = attribute

    const result = GroupByConfigInputSchema.safeParse(input)
    if (!result.success) {
      const issue = result.error.issues[0]
      const keys = issue?.path ?? []
      throw new ConfigError(
        attribute,
        keys.map(String).join('.') || '*',
        describe(valueAt(input, keys)),
        issue?.message ?? 'invalid config',
        { cause: result.error },
      )
    }
    const parsed = result.data

    this.root = normalizeRecordPath(parsed.root ?? '/')
    this.slugValue = parsed.slug === undefined ? `${attribute}/${KEY_TOKEN}/index.html` : parsed.slug
    this.templateValue = parsed.template ?? `groupby-${attribute}.html`
    this.splitValue = parsed.split ?? null
    this.enabledValue = parsed.enabled ?? true
    this.keyObjFnValue = parsed.key_obj_fn == null ? null : toFieldExpression(parsed.key_obj_fn)
    this.replaceNoneKeyValue = parsed.replace_none_key ?? null
    this.setFields(parsed.fields ?? {})
    this.setKeyMap(parsed.key_map ?? {})
    if (parsed.children?.order_by !== undefined)
      this.setOrderBy(parsed.children.order_by)
    this.setPagination({
      enabled: parsed.pagination?.enabled,
      perPage: parsed.pagination?.per_page,
      urlSuffix: parsed.pagination?.url_suffix,
    })
    for (const dependency of parsed.dependencies ?? []) {
      this.dependencySet.add(dependency)
    }
  }

  /** Watcher identity: attribute plus root. */
  get id(): string {
    return `${this.attribute}@${this.root}`
  }

  // ==================== Settings ====================

  get slug(): string | null {
    return this.slugValue
  }

  set slug(value: string | null) {
    this.slugValue = value
    this.changed()
  }

  get template(): string {
    return this.templateValue
  }

  set template(value: string) {
    this.templateValue = value
    this.changed()
  }

  /** Template path relative to the project, as used in file dependencies. */
  get templatePath(): string {
    return `${TEMPLATES_DIR}/${this.templateValue}`
  }

  get split(): string | null {
    return this.splitValue
  }

  set split(value: string | null) {
    this.splitValue = value
    this.changed()
  }

  get enabled(): boolean {
    return this.enabledValue
  }

  set enabled(value: boolean) {
    if (this.enabledValue === value)
      return
    this.enabledValue = value
    this.changed()
  }

  get keyObjFn(): FieldExpression | null {
    return this.keyObjFnValue
  }

  set keyObjFn(value: FieldExpression | null) {
    this.keyObjFnValue = value
    this.changed()
  }

  get replaceNoneKey(): string | null {
    return this.replaceNoneKeyValue
  }

  set replaceNoneKey(value: string | null) {
    this.replaceNoneKeyValue = value
    this.changed()
  }

  get orderBy(): readonly SortKey[] | null {
    return this.orderByValue
  }

  get fields(): ReadonlyMap<string, FieldExpression> {
    return this.fieldMap
  }

  get keyMap(): ReadonlyMap<string, string> {
    return this.keyMapValue
  }

  get pagination(): Readonly<PaginationConfig> {
    return this.paginationValue
  }

  get dependencies(): ReadonlySet<string> {
    return this.dependencySet
  }

  setFields(fields: Readonly<Record<string, unknown>>): void {
    this.fieldMap.clear()
    for (const [name, value] of Object.entries(fields)) {
      this.fieldMap.set(name, toFieldExpression(value))
    }
    this.changed()
  }

  setKeyMap(keyMap: Readonly<Record<string, string>>): void {
    this.keyMapValue.clear()
    for (const [from, to] of Object.entries(keyMap)) {
      this.keyMapValue.set(from, to)
    }
    this.changed()
  }

  setOrderBy(spec: string | readonly string[] | null): void {
    if (spec === null) {
      this.orderByValue = null
      this.changed()
      return
    }
    try {
      const keys = parseOrderBy(spec)
      this.orderByValue = keys.length > 0 ? keys : null
    }
    catch (error) {
      const msg = error instanceof Error ? error.message : String(error)
      throw new ConfigError(this.attribute, 'children.order_by', describe(spec), msg, { cause: error })
    }
    this.changed()
  }

  setPagination(options: { enabled?: boolean, perPage?: number, urlSuffix?: string }): void {
    if (options.perPage !== undefined && (!Number.isInteger(options.perPage) || options.perPage < 1)) {
      throw new ConfigError(
        this.attribute,
        'pagination.per_page',
        String(options.perPage),
        'must be a positive integer',
      )
    }
    if (options.urlSuffix !== undefined && options.urlSuffix.trim() === '')
      throw new ConfigError(this.attribute, 'pagination.url_suffix', options.urlSuffix, 'must not be empty')
    if (options.enabled !== undefined)
      this.paginationValue.enabled = options.enabled
    if (options.perPage !== undefined)
      this.paginationValue.perPage = options.perPage
    if (options.urlSuffix !== undefined)
      this.paginationValue.urlSuffix = options.urlSuffix
    this.changed()
  }

  addDependency(...files: string[]): void {
    for (const file of files) {
      this.dependencySet.add(file)
    }
    this.changed()
  }

  // ==================== Change tracking ====================

  /**
   * Call `listener` after every edit. Returns the unsubscribe function.
   */
  onChange(listener: () => void): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private changed(): void {
    for (const listener of this.listeners) {
      listener()
    }
  }

  /**
   * Independent copy without listeners. A build reads one snapshot from
   * start to finish, and the groups it returns keep it.
   */
  clone(): GroupByConfig {
    const copy = new GroupByConfig(this.attribute, { root: this.root })
    copy.slugValue = this.slugValue
    copy.templateValue = this.templateValue
    copy.splitValue = this.splitValue
    copy.enabledValue = this.enabledValue
    copy.keyObjFnValue = this.keyObjFnValue
    copy.replaceNoneKeyValue = this.replaceNoneKeyValue
    copy.orderByValue = this.orderByValue ? [...this.orderByValue] : null
    for (const [name, expression] of this.fieldMap) {
      copy.fieldMap.set(name, expression)
    }
    for (const [from, to] of this.keyMapValue) {
      copy.keyMapValue.set(from, to)
    }
    Object.assign(copy.paginationValue, this.paginationValue)
    for (const file of this.dependencySet) {
      copy.dependencySet.add(file)
    }
    return copy
  }

  /**
   * Apply `key_map` to the string form of a raw key.
   */
  mapKey(key: string): string {
    return this.keyMap.get(key) ?? key
  }

  /**
   * True when the slug is an expression rather than a `{key}` template.
   */
  get slugIsExpression(): boolean {
    return this.slug !== null && !this.slug.includes(KEY_TOKEN)
  }

  /**
   * Compile every expression once so malformed ones fail early.
   */
  validate(evaluator: ExpressionEvaluator): void {
    const check = (field: string, expression: FieldExpression | null): void => {
      if (expression?.kind !== 'expr')
        return
      try {
        evaluator.compile(expression.source)
      }
      catch (error) {
        const msg = error instanceof Error ? error.message : String(error)
        throw new ConfigError(this.attribute, field, expression.source, msg, { cause: error })
      }
    }
    check('key_obj_fn', this.keyObjFn)
    if (this.slug !== null && this.slugIsExpression)
      check('slug', { kind: 'expr', source: this.slug })
    for (const [name, expression] of this.fields) {
      check(`fields.${name}`, expression)
    }
  }

  toView(): ConfigView {
    return Object.freeze({
      attribute: this.attribute,
      root: this.root,
      slug: this.slug,
      template: this.template,
      split: this.split,
      enabled: this.enabled,
      replaceNoneKey: this.replaceNoneKey,
      keyMap: Object.freeze(Object.fromEntries(this.keyMap)),
      fieldNames: Object.freeze([...this.fields.keys()]),
      orderBy: this.orderBy ? Object.freeze([...this.orderBy]) : null,
      pagination: Object.freeze({ ...this.paginationValue }),
      dependencies: Object.freeze([...this.dependencies]),
    })
  }

  static fromInput(attribute: string, input: GroupByConfigInput = {}): GroupByConfig {
    return new GroupByConfig(attribute, input)
  }

  /**
   * Config from the attribute's section of a config file. The file itself
   * becomes a dependency.
   */
  static fromFile(attribute: string, file: GroupByConfigFile): GroupByConfig {
    const section = file.sections[attribute] ?? {}
    const result = GroupByConfigInputSchema.safeParse(section)
    if (!result.success) {
      const issue = result.error.issues[0]
      const keys = issue?.path ?? []
      throw new ConfigError(
        attribute,
        keys.map(String).join('.') || '*',
        describe(valueAt(section, keys)),
        `${issue?.message ?? 'invalid config'} (in ${file.filename})`,
        { cause: result.error },
      )
    }
    const config = new GroupByConfig(attribute, result.data)
    config.addDependency(file.filename)
    return config
  }

  static fromAny(attribute: string, value: GroupByConfig | GroupByConfigFile | GroupByConfigInput | undefined): GroupByConfig {
    if (value instanceof GroupByConfig) {
      if (value.attribute !== attribute)
        throw new ConfigError(attribute, 'attribute', value.attribute, 'config belongs to another attribute')
      return value
    }
    if (value instanceof GroupByConfigFile)
      return GroupByConfig.fromFile(attribute, value)
    return GroupByConfig.fromInput(attribute, value)
  }
}
