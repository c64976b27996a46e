// Facade
export { GroupBy } from './groupby'
export type { GroupByOptions, VGroupsOptions } from './groupby'

// Config
export {
  DEFAULT_PER_PAGE,
  DEFAULT_URL_SUFFIX,
  GroupByConfig,
  GroupByConfigFile,
  GroupByConfigInputSchema,
  KEY_TOKEN,
  loadConfigFile,
  parseConfigFile,
} from './config'
export type { ConfigView, GroupByConfigInput, PaginationConfig } from './config'

// Errors
export {
  ConfigError,
  GroupByError,
  GroupByErrorCode,
  isGroupByError,
} from './errors'

// Expressions
export { evaluateExpression, PathExpressionEvaluator, toFieldExpression } from './expression'
export type {
  CompiledExpression,
  ExpressionContext,
  ExpressionEvaluator,
  ExpressionFn,
  FieldExpression,
} from './expression'

// Grouping
export { defaultGrouping, toGroupingCallback } from './grouping'
export type { GroupingCallback, KeyYield, ProduceKeys, RawKey, ResolvedHandle } from './grouping'
export { keyToString, NONE_KEY, resolveKey } from './key-resolver'
export type { KeyEnvironment, ResolvedKey } from './key-resolver'
export { ModelReader, scan, walkRecords } from './model-reader'
export type { FieldKeyPath, FieldOccurrence } from './model-reader'

// Groups
export { aggregate } from './aggregator'
export { FixedRecordsQuery } from './children-query'
export { GroupBySource, virtualRoot, VPATH } from './group-source'
export type { ChildEntry } from './group-source'
export { GroupSet } from './group-set'
export type { GroupRef } from './group-set'
export { pageCount, pageSlug, Pagination } from './pagination'
export { compareValues, parseOrderBy, sortBy } from './sort'
export type { SortKey } from './sort'

// Build
export { BuildCache, BuildState } from './build-cache'
export { DependencyTracker } from './dependency-tracker'
export { Watcher } from './watcher'
export type { WatcherHost, WatcherOptions } from './watcher'

// Resolution
export { isGroupArtifact, MemoryArtifactRegistry, prune } from './pruner'
export type { ArtifactRecord, ArtifactRegistry } from './pruner'
export { VirtualResolver } from './resolver'
export type { ResolvedPage } from './resolver'
