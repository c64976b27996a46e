import { LogLevels, parseLogLevel, setLogLevel } from '@sitekit/grouper-utils/logger'
import { Command } from 'commander'

import pkg from '../package.json'
import { registerListCommand } from './commands/list'
import { registerResolveCommand } from './commands/resolve'

/**
 * Log level from the environment (`GROUPER_LOG_LEVEL=debug` or `=4`).
 * Unrecognized values are ignored.
 */
export function applyEnvLogLevel(value: string | undefined): void {
  const level = value === undefined ? null : parseLogLevel(value)
  if (level !== null)
    setLogLevel(level)
}

export function createProgram(): Command {
  const program = new Command()

  program
    .name('grouper')
    .description('Group site records by flagged attributes')
    .version(pkg.version)
    .option('--verbose', 'Show build and cache details')
    .option('--quiet', 'Only show warnings and errors')
    .hook('preAction', (command) => {
      const options = command.opts<{ verbose?: boolean, quiet?: boolean }>()
      if (options.verbose)
        setLogLevel(LogLevels.debug)
      else if (options.quiet)
        setLogLevel(LogLevels.warn)
    })

  registerListCommand(program)
  registerResolveCommand(program)
  return program
}
