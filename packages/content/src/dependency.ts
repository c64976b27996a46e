/**
 * Dependency identifiers shared by the content database (which emits them on
 * change) and the build cache (which tracks them).
 *
 * Records are `record:<path>`, external files are `file:<path>`.
 */
export const RECORD_PREFIX = 'record:'
export const FILE_PREFIX = 'file:'

export function recordDependency(path: string): string {
  return `${RECORD_PREFIX}${path}`
}

export function fileDependency(filename: string): string {
  return `${FILE_PREFIX}${filename}`
}

/**
 * Return the record path of a `record:` identifier, or null for anything else.
 */
export function recordPathOf(dependency: string): string | null {
  return dependency.startsWith(RECORD_PREFIX) ? dependency.slice(RECORD_PREFIX.length) : null
}

/**
 * Receives dependencies discovered while evaluating something, e.g. a
 * template render that queried groups.
 */
export interface DependencyRecorder {
  recordDependency: (dependency: string) => void
}
