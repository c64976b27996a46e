/**
 * Error codes for grouping operations
 */
export const GroupByErrorCode = {
  CALLBACK_FAILED: 'CALLBACK_FAILED',
  INVALID_YIELD: 'INVALID_YIELD',
  CONFIG_ERROR: 'CONFIG_ERROR',
  MISSING_KEY: 'MISSING_KEY',
  UNKNOWN_WATCHER: 'UNKNOWN_WATCHER',
  DUPLICATE_WATCHER: 'DUPLICATE_WATCHER',
  NO_CALLBACK: 'NO_CALLBACK',
  NOT_FINALIZED: 'NOT_FINALIZED',
  INVALID_PAGE: 'INVALID_PAGE',
} as const

export type GroupByErrorCode = (typeof GroupByErrorCode)[keyof typeof GroupByErrorCode]

/**
 * Base error for everything the grouping engine raises on purpose
 */
export class GroupByError extends Error {
  constructor(
    public code: GroupByErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'GroupByError'
  }
}

/**
 * Malformed configuration. Names the offending `[attribute.field]` entry.
 */
export class ConfigError extends GroupByError {
  constructor(
    public key: string,
    public field: string,
    public expr: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(GroupByErrorCode.CONFIG_ERROR, `Invalid config for [${key}.${field}] = "${expr}": ${reason}`, options)
    this.name = 'ConfigError'
  }
}

export function isGroupByError(error: unknown, code?: GroupByErrorCode): error is GroupByError {
  return error instanceof GroupByError && (code === undefined || error.code === code)
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Create a callback failure error (the grouping callback threw)
 */
export function callbackFailedError(watcherId: string, cause: unknown): GroupByError {
  return new GroupByError(
    GroupByErrorCode.CALLBACK_FAILED,
    `Grouping callback of ${watcherId} failed: ${reasonOf(cause)}`,
    { cause },
  )
}

/**
 * Create an invalid yield error (unsupported raw key type)
 */
export function invalidYieldError(attribute: string, value: unknown): GroupByError {
  const kind = value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value
  return new GroupByError(
    GroupByErrorCode.INVALID_YIELD,
    `Unsupported group key yielded for "${attribute}": ${kind}`,
  )
}

/**
 * Create a missing key error (no group with that key)
 */
export function missingKeyError(attribute: string, key: string): GroupByError {
  return new GroupByError(GroupByErrorCode.MISSING_KEY, `No group "${key}" for attribute "${attribute}"`)
}

/**
 * Create an unknown watcher error
 */
export function unknownWatcherError(attribute: string, root: string): GroupByError {
  return new GroupByError(GroupByErrorCode.UNKNOWN_WATCHER, `No watcher registered for "${attribute}" under "${root}"`)
}

/**
 * Create a duplicate watcher error
 */
export function duplicateWatcherError(attribute: string, root: string): GroupByError {
  return new GroupByError(
    GroupByErrorCode.DUPLICATE_WATCHER,
    `A watcher for "${attribute}" under "${root}" is already registered`,
  )
}

/**
 * Create a missing callback error
 */
export function noCallbackError(watcherId: string): GroupByError {
  return new GroupByError(GroupByErrorCode.NO_CALLBACK, `No grouping callback set for ${watcherId}`)
}

/**
 * Create an error for reading build-only state of an in-progress group
 */
export function notFinalizedError(what: string, key: string): GroupByError {
  return new GroupByError(
    GroupByErrorCode.NOT_FINALIZED,
    `Cannot read ${what} of group "${key}" before its build has completed`,
  )
}

/**
 * Create an invalid page error
 */
export function invalidPageError(page: number, pages: number): GroupByError {
  return new GroupByError(GroupByErrorCode.INVALID_PAGE, `Page ${page} is out of range 1..${pages}`)
}
