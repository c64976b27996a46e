export { createLogger, createStderrLogger, logger, LogLevels, parseLogLevel, setLogLevel } from './logger'

export { slugify } from './slugify'
export type { Slugify } from './slugify'

export { artifactName, buildUrl, normalizeUrl, stripIndexFile } from './url'
