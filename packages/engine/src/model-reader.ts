import type { ContentDatabase, ContentRecord, DataModel, FlowBlock } from '@sitekit/grouper-content'
import { FieldType, hasAttribute, isFlow } from '@sitekit/grouper-content'

/**
 * Where an occurrence was found: a top-level field, or one key of one block
 * inside a flow field.
 */
export interface FieldKeyPath {
  fieldKey: string
  flowIndex: number | null
  flowKey: string | null
}

/**
 * One place a watched attribute was found, as handed to grouping callbacks.
 */
export interface FieldOccurrence {
  record: ContentRecord
  key: FieldKeyPath
  /** Raw field (or block field) value, possibly null or undefined. */
  field: unknown
}

/**
 * `*`: the field itself carries the attribute.
 * `?`: a flow field whose allowed blocks have flagged fields.
 */
type FieldMark =
  | { kind: '*' }
  | { kind: '?', blocks: Map<string, string[]> }

/**
 * Finds attribute-flagged fields of records.
 *
 * Schema inspection happens once per data model and is cached for the
 * lifetime of the reader.
 */
export class ModelReader {
  private readonly marks: Map<string, Map<string, FieldMark>> = new Map()

  constructor(
    private readonly db: ContentDatabase,
    readonly attribute: string,
    readonly flatten: boolean = true,
  ) {}

  private flaggedBlockFields(): Map<string, string[]> {
    const flagged = new Map<string, string[]>()
    for (const [id, block] of this.db.flowblocks) {
      const keys = block.fields.filter(f => hasAttribute(f, this.attribute)).map(f => f.name)
      if (keys.length > 0)
        flagged.set(id, keys)
    }
    return flagged
  }

  private marksFor(model: DataModel): Map<string, FieldMark> {
    const cached = this.marks.get(model.id)
    if (cached)
      return cached

    const marks = new Map<string, FieldMark>()
    let blockFlags: Map<string, string[]> | null = null
    for (const field of model.fields) {
      if (hasAttribute(field, this.attribute)) {
        marks.set(field.name, { kind: '*' })
        continue
      }
      if (field.type !== FieldType.Flow)
        continue
      blockFlags ??= this.flaggedBlockFields()
      const allowed = field.flowBlocks ?? [...blockFlags.keys()]
      const blocks = new Map<string, string[]>()
      for (const id of allowed) {
        const keys = blockFlags.get(id)
        if (keys)
          blocks.set(id, keys)
      }
      if (blocks.size > 0)
        marks.set(field.name, { kind: '?', blocks })
    }
    this.marks.set(model.id, marks)
    return marks
  }

  /**
   * Yield every occurrence of the attribute in one record, in field order.
   */
  *read(record: ContentRecord): Generator<FieldOccurrence> {
    const model = this.db.datamodels.get(record.model)
    if (!model)
      return
    for (const [fieldKey, mark] of this.marksFor(model)) {
      const value = record.get(fieldKey)
      // Block-level flags need blocks to look at.
      if (mark.kind === '?' && this.flatten && !isFlow(value))
        continue
      if (!this.flatten || !isFlow(value)) {
        yield { record, key: { fieldKey, flowIndex: null, flowKey: null }, field: value }
        continue
      }
      for (const [flowIndex, block] of value.blocks.entries()) {
        for (const flowKey of this.blockKeys(block, mark)) {
          yield { record, key: { fieldKey, flowIndex, flowKey }, field: block.get(flowKey) }
        }
      }
    }
  }

  private blockKeys(block: FlowBlock, mark: FieldMark): string[] {
    if (mark.kind === '*')
      return block.keys()
    return mark.blocks.get(block.type) ?? []
  }
}

/**
 * Records of a subtree in pre-order (node, then children in order).
 */
export function* walkRecords(root: ContentRecord): Generator<ContentRecord> {
  const stack: ContentRecord[] = [root]
  while (stack.length > 0) {
    const record = stack.pop()
    if (!record)
      break
    yield record
    for (let i = record.children.length - 1; i >= 0; i--) {
      const child = record.children[i]
      if (child)
        stack.push(child)
    }
  }
}

/**
 * Lazily yield every occurrence of `attribute` under `rootPath`. A missing
 * root yields nothing.
 */
export function* scan(
  db: ContentDatabase,
  rootPath: string,
  attribute: string,
  flatten: boolean = true,
): Generator<FieldOccurrence> {
  const root = db.get(rootPath)
  if (!root)
    return
  const reader = new ModelReader(db, attribute, flatten)
  for (const record of walkRecords(root)) {
    yield* reader.read(record)
  }
}
