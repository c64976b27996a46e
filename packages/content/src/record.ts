/**
 * Normalize a record path: leading slash, no trailing slash (except root).
 */
export function normalizeRecordPath(path: string): string {
  const trimmed = path.replace(/\/+$/, '')
  if (trimmed === '')
    return '/'
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`
}

/**
 * Parent path of a record path, or null for the root.
 */
export function parentPathOf(path: string): string | null {
  if (path === '/')
    return null
  const idx = path.lastIndexOf('/')
  return idx <= 0 ? '/' : path.slice(0, idx)
}

/**
 * Check whether `path` equals `root` or lies beneath it.
 */
export function isUnderPath(path: string, root: string): boolean {
  if (root === '/')
    return path.startsWith('/')
  return path === root || path.startsWith(`${root}/`)
}

/**
 * A content record (page) in the host tree.
 *
 * `set()` mutates the in-memory value only; use the database's
 * `updateRecord()` for edits that must invalidate cached groups.
 */
export class ContentRecord {
  readonly path: string
  readonly model: string
  parent: ContentRecord | null = null
  readonly children: ContentRecord[] = []
  private readonly values: Map<string, unknown>
  private readonly sourceFile: string | undefined

  constructor(params: {
    path: string
    model: string
    fields?: Record<string, unknown>
    sourceFile?: string
  }) {
    this.path = normalizeRecordPath(params.path)
    this.model = params.model
    this.values = new Map(Object.entries(params.fields ?? {}))
    this.sourceFile = params.sourceFile
  }

  get(field: string): unknown {
    if (field === '_path')
      return this.path
    if (field === '_model')
      return this.model
    return this.values.get(field)
  }

  set(field: string, value: unknown): void {
    this.values.set(field, value)
  }

  fieldNames(): string[] {
    return [...this.values.keys()]
  }

  /**
   * Files this record was loaded from (for artifact dependency lists).
   */
  sourceFilenames(): string[] {
    return this.sourceFile ? [this.sourceFile] : []
  }

  toString(): string {
    return `<ContentRecord path="${this.path}" model="${this.model}">`
  }
}
