import type { ConsolaInstance } from 'consola'
import { createConsola, LogLevels } from 'consola'

export const logger: ConsolaInstance = createConsola({ level: LogLevels.info })

// `withTag` copies options, so every instance is kept for `setLogLevel`.
const instances: ConsolaInstance[] = [logger]

function track(instance: ConsolaInstance): ConsolaInstance {
  instances.push(instance)
  return instance
}

// Tagged logger, e.g. `[Watcher] Building tags@/blog`
export function createLogger(tag: string): ConsolaInstance {
  return track(logger.withTag(tag))
}

// Writes only to stderr, for commands whose stdout is data (JSON, tables).
export function createStderrLogger(tag: string): ConsolaInstance {
  const root = createConsola({
    level: logger.level,
    stdout: process.stderr,
    stderr: process.stderr,
  })
  return track(root.withTag(tag))
}

export function setLogLevel(level: number): void {
  for (const instance of instances) {
    instance.level = level
  }
}

/**
 * Level from user input: an integer, or a consola level name such as
 * `debug` or `warn`. Null when neither.
 */
export function parseLogLevel(value: string): number | null {
  const text = value.trim().toLowerCase()
  if (/^-?\d+$/.test(text))
    return Number.parseInt(text, 10)
  for (const [name, level] of Object.entries(LogLevels)) {
    if (name === text)
      return level
  }
  return null
}

export { LogLevels } from 'consola'
