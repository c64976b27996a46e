// Host database
export { MemoryContentDatabase } from './database'
export type { ChangeListener, ContentDatabase } from './database'

// Dependency identifiers
export { fileDependency, recordDependency, recordPathOf } from './dependency'
export type { DependencyRecorder } from './dependency'

// Flow fields
export { Flow, FlowBlock, isFlow } from './flow'

// Schema
export {
  boolFromString,
  DataModelSchema,
  FieldDefinitionSchema,
  FieldType,
  FlowBlockModelSchema,
  hasAttribute,
} from './model'
export type {
  DataModel,
  DataModelInput,
  FieldDefinition,
  FieldDefinitionInput,
  FlowBlockModel,
  FlowBlockModelInput,
} from './model'

// Records
export { ContentRecord, isUnderPath, normalizeRecordPath, parentPathOf } from './record'

// Site files
export { createSiteDatabase, loadSite, SiteFileSchema } from './site-loader'
export type { SiteFile, SiteFileInput } from './site-loader'
