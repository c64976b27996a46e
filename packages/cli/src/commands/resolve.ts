import type { Command } from 'commander'
import { createStderrLogger } from '@sitekit/grouper-utils/logger'
import { loadProject } from './project'

const log = createStderrLogger('resolve')

export function registerResolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Print the group page served at a URL')
    .argument('<site>', 'Site JSON file')
    .argument('<url>', 'URL path, e.g. /blog/tags/awesome/')
    .option('-c, --config <file>', 'Grouping config (default: groupby.json beside the site)')
    .action(
      async (sitePath: string, url: string, options: { config?: string }) => {
        let found = false
        try {
          const { groupBy } = await loadProject(sitePath, options.config)
          const page = await groupBy.resolve(url)
          if (page) {
            found = true
            const { source } = page
            console.log(`watcher: ${page.watcherId}`)
            console.log(`key: ${source.key}`)
            console.log(`page: ${page.page ?? '-'}`)
            console.log(`path: ${source.path}`)
            for (const record of source.pagination.items) {
              console.log(`  ${record.path}`)
            }
          }
        }
        catch (error) {
          const msg = error instanceof Error ? error.message : String(error)
          log.error(`Resolve failed: ${msg}`)
          process.exit(1)
        }
        if (!found) {
          log.error(`No group serves ${url}`)
          process.exit(1)
        }
      },
    )
}
