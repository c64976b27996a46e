import type { DataModel } from './model'
import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { createLogger } from '@sitekit/grouper-utils/logger'
import { z } from 'zod/v4'
import { MemoryContentDatabase } from './database'
import { Flow, FlowBlock } from './flow'
import { DataModelSchema, FieldType, FlowBlockModelSchema } from './model'

const log = createLogger('SiteLoader')

const RecordEntrySchema = z.object({
  path: z.string().min(1),
  model: z.string().min(1),
  fields: z.record(z.string(), z.unknown()).default({}),
})

/**
 * On-disk site description: models, flow blocks and a flat record list.
 */
export const SiteFileSchema = z.object({
  models: z.array(DataModelSchema).default([]),
  flowblocks: z.array(FlowBlockModelSchema).default([]),
  records: z.array(RecordEntrySchema).default([]),
})

export type SiteFile = z.infer<typeof SiteFileSchema>
export type SiteFileInput = z.input<typeof SiteFileSchema>

const FlowBlockEntrySchema = z.record(z.string(), z.unknown())

function toFlow(value: unknown, where: string): Flow {
  const entries = z.array(FlowBlockEntrySchema).parse(value ?? [])
  return new Flow(entries.map((entry, index) => {
    const type = entry._flowblock
    if (typeof type !== 'string') {
      throw new TypeError(`${where}: block ${index} is missing "_flowblock"`)
    }
    return new FlowBlock(type, entry)
  }))
}

function convertFields(
  fields: Record<string, unknown>,
  model: DataModel | undefined,
  where: string,
): Record<string, unknown> {
  if (!model)
    return fields
  const converted: Record<string, unknown> = { ...fields }
  for (const field of model.fields) {
    if (field.type === FieldType.Flow && field.name in fields) {
      converted[field.name] = toFlow(fields[field.name], `${where}.${field.name}`)
    }
  }
  return converted
}

function depth(recordPath: string): number {
  return recordPath.split('/').filter(Boolean).length
}

/**
 * Build a database from an already-parsed site description.
 */
export function createSiteDatabase(input: SiteFileInput, sourceFile?: string): MemoryContentDatabase {
  const site = SiteFileSchema.parse(input)
  const db = new MemoryContentDatabase()
  for (const model of site.models) {
    db.addModel(model)
  }
  for (const block of site.flowblocks) {
    db.addFlowBlock(block)
  }
  // Parents must exist before children; sibling order is preserved.
  const ordered = [...site.records].sort((a, b) => depth(a.path) - depth(b.path))
  for (const entry of ordered) {
    db.addRecord({
      path: entry.path,
      model: entry.model,
      fields: convertFields(entry.fields, db.datamodels.get(entry.model), entry.path),
      sourceFile,
    })
  }
  return db
}

/**
 * Load a JSON site file from disk.
 */
export async function loadSite(filePath: string): Promise<MemoryContentDatabase> {
  const absPath = path.resolve(filePath)
  let raw: string
  try {
    raw = await readFile(absPath, 'utf-8')
  }
  catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    throw new Error(`Failed to read site file ${absPath}: ${msg}`)
  }
  const db = createSiteDatabase(JSON.parse(raw), absPath)
  log.debug(`Loaded ${db.size} records from ${absPath}`)
  return db
}
