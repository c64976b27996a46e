/**
 * A single block inside a flow field. Keys starting with `_` are reserved
 * for block metadata and are not treated as content.
 */
export class FlowBlock {
  readonly type: string
  private readonly data: Map<string, unknown>

  constructor(type: string, data: Record<string, unknown> = {}) {
    this.type = type
    this.data = new Map(Object.entries(data).filter(([key]) => !key.startsWith('_')))
  }

  get(key: string): unknown {
    return this.data.get(key)
  }

  set(key: string, value: unknown): void {
    this.data.set(key, value)
  }

  keys(): string[] {
    return [...this.data.keys()]
  }

  toJSON(): Record<string, unknown> {
    return { _flowblock: this.type, ...Object.fromEntries(this.data) }
  }
}

/**
 * Ordered sequence of blocks stored in a `flow` field.
 */
export class Flow {
  readonly blocks: FlowBlock[]

  constructor(blocks: FlowBlock[] = []) {
    this.blocks = blocks
  }

  get length(): number {
    return this.blocks.length
  }

  toJSON(): Array<Record<string, unknown>> {
    return this.blocks.map(block => block.toJSON())
  }
}

export function isFlow(value: unknown): value is Flow {
  return value instanceof Flow
}
