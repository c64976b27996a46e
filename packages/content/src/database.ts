import type { DataModel, DataModelInput, FlowBlockModel, FlowBlockModelInput } from './model'
import { createLogger } from '@sitekit/grouper-utils/logger'
import { fileDependency, recordDependency } from './dependency'
import { DataModelSchema, FlowBlockModelSchema } from './model'
import { ContentRecord, normalizeRecordPath, parentPathOf } from './record'

const log = createLogger('ContentDB')

/**
 * Called with the dependency identifiers that changed.
 */
export type ChangeListener = (changed: string[]) => void

/**
 * Read side of the host content model, as seen by the grouping engine.
 */
export interface ContentDatabase {
  readonly datamodels: ReadonlyMap<string, DataModel>
  readonly flowblocks: ReadonlyMap<string, FlowBlockModel>
  get: (path: string) => ContentRecord | null
  onChange: (listener: ChangeListener) => () => void
}

/**
 * In-memory host tree.
 *
 * Records are linked to their parent by path; a parent must be added before
 * its children. Edits through `updateRecord`, `removeRecord` and `touchFile`
 * notify change listeners.
 */
export class MemoryContentDatabase implements ContentDatabase {
  private readonly models: Map<string, DataModel> = new Map()
  private readonly blocks: Map<string, FlowBlockModel> = new Map()
  private readonly records: Map<string, ContentRecord> = new Map()
  private readonly listeners: Set<ChangeListener> = new Set()

  get datamodels(): ReadonlyMap<string, DataModel> {
    return this.models
  }

  get flowblocks(): ReadonlyMap<string, FlowBlockModel> {
    return this.blocks
  }

  addModel(input: DataModelInput): DataModel {
    const model = DataModelSchema.parse(input)
    this.models.set(model.id, model)
    return model
  }

  addFlowBlock(input: FlowBlockModelInput): FlowBlockModel {
    const block = FlowBlockModelSchema.parse(input)
    this.blocks.set(block.id, block)
    return block
  }

  addRecord(params: {
    path: string
    model: string
    fields?: Record<string, unknown>
    sourceFile?: string
  }): ContentRecord {
    const record = new ContentRecord(params)
    if (this.records.has(record.path)) {
      throw new Error(`Record with path "${record.path}" already exists`)
    }
    const parentPath = parentPathOf(record.path)
    if (parentPath !== null) {
      const parent = this.records.get(parentPath)
      if (!parent) {
        throw new Error(`Parent record "${parentPath}" of "${record.path}" does not exist`)
      }
      record.parent = parent
      parent.children.push(record)
    }
    this.records.set(record.path, record)
    this.emit([recordDependency(record.path)])
    return record
  }

  get(path: string): ContentRecord | null {
    return this.records.get(normalizeRecordPath(path)) ?? null
  }

  get size(): number {
    return this.records.size
  }

  /**
   * Edit record fields and notify listeners.
   */
  updateRecord(path: string, fields: Record<string, unknown>): ContentRecord {
    const record = this.get(path)
    if (!record) {
      throw new Error(`Record not found: ${path}`)
    }
    for (const [key, value] of Object.entries(fields)) {
      record.set(key, value)
    }
    this.emit([recordDependency(record.path)])
    return record
  }

  /**
   * Remove a record and its whole subtree.
   */
  removeRecord(path: string): void {
    const record = this.get(path)
    if (!record)
      return
    const removed: string[] = []
    const queue = [record]
    while (queue.length > 0) {
      const current = queue.shift()
      if (!current)
        break
      queue.push(...current.children)
      this.records.delete(current.path)
      removed.push(recordDependency(current.path))
    }
    if (record.parent) {
      const siblings = record.parent.children
      siblings.splice(siblings.indexOf(record), 1)
      record.parent = null
    }
    this.emit(removed)
  }

  /**
   * Signal that an external file (config, template) changed.
   */
  touchFile(filename: string): void {
    this.emit([fileDependency(filename)])
  }

  onChange(listener: ChangeListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private emit(changed: string[]): void {
    log.debug(`changed: ${changed.join(', ')}`)
    for (const listener of this.listeners) {
      listener(changed)
    }
  }
}
