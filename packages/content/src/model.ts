import { z } from 'zod/v4'

/**
 * Field types the grouping engine treats specially.
 * Any other type string is carried through untouched.
 */
export const FieldType = {
  String: 'string',
  Strings: 'strings',
  Text: 'text',
  Markdown: 'markdown',
  Flow: 'flow',
} as const

export type FieldType = (typeof FieldType)[keyof typeof FieldType]

/**
 * One field of a data model or flow-block model.
 * `options` holds free-form flags such as `tags: true` that watchers look for.
 */
export const FieldDefinitionSchema = z.object({
  name: z.string().min(1),
  type: z.string().default(FieldType.String),
  options: z.record(z.string(), z.union([z.string(), z.boolean(), z.number()])).default({}),
  /** Allowed flow blocks (flow fields only). Absent or null allows every block. */
  flowBlocks: z.array(z.string()).nullable().optional(),
})

export type FieldDefinition = z.infer<typeof FieldDefinitionSchema>
export type FieldDefinitionInput = z.input<typeof FieldDefinitionSchema>

export const DataModelSchema = z.object({
  id: z.string().min(1),
  fields: z.array(FieldDefinitionSchema).default([]),
})

export type DataModel = z.infer<typeof DataModelSchema>
export type DataModelInput = z.input<typeof DataModelSchema>

/**
 * Flow-block models share the data-model shape.
 */
export const FlowBlockModelSchema = DataModelSchema

export type FlowBlockModel = DataModel
export type FlowBlockModelInput = DataModelInput

const TRUTHY = new Set(['true', 'yes', '1', 'on'])

/**
 * Interpret a schema option as a flag (`"yes"`, `"true"`, `1`, `true` …).
 */
export function boolFromString(value: unknown): boolean {
  if (typeof value === 'boolean')
    return value
  if (typeof value === 'number')
    return value !== 0
  if (typeof value === 'string')
    return TRUTHY.has(value.trim().toLowerCase())
  return false
}

/**
 * Check whether a field definition carries the given attribute flag.
 */
export function hasAttribute(field: FieldDefinition, attribute: string): boolean {
  return boolFromString(field.options[attribute])
}
