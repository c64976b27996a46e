import { createLogger } from '@sitekit/grouper-utils/logger'
import { VPATH } from './group-source'

const log = createLogger('Pruner')

/**
 * A page declared to the host build for rendering.
 */
export interface ArtifactRecord {
  url: string
  /** Output file name, e.g. `blog/tags/a/index.html`. */
  artifact: string
  /** Virtual path of the group page that produced it. */
  sourcePath: string
  template: string
  /** Input files the rendered page depends on. */
  sources: string[]
}

/**
 * The host's registry of addressable artifacts.
 */
export interface ArtifactRegistry {
  declare: (record: ArtifactRecord) => void
  list: () => ArtifactRecord[]
  remove: (url: string) => void
}

/**
 * In-memory registry, keyed by URL. Used by the CLI and tests.
 */
export class MemoryArtifactRegistry implements ArtifactRegistry {
  private readonly records: Map<string, ArtifactRecord> = new Map()

  declare(record: ArtifactRecord): void {
    this.records.set(record.url, record)
  }

  list(): ArtifactRecord[] {
    return [...this.records.values()]
  }

  remove(url: string): void {
    this.records.delete(url)
  }

  get(url: string): ArtifactRecord | null {
    return this.records.get(url) ?? null
  }

  get size(): number {
    return this.records.size
  }
}

export function isGroupArtifact(record: ArtifactRecord): boolean {
  return record.sourcePath.includes(`${VPATH}/`)
}

/**
 * Retract group artifacts whose URL is no longer served. Returns the
 * removed URLs.
 */
export function prune(registry: ArtifactRegistry, liveUrls: ReadonlySet<string>): string[] {
  const removed: string[] = []
  for (const record of registry.list()) {
    if (!isGroupArtifact(record) || liveUrls.has(record.url))
      continue
    registry.remove(record.url)
    removed.push(record.url)
    log.info(`Pruned ${record.url} (${record.sourcePath})`)
  }
  return removed
}
