import type { Command } from 'commander'
import { createStderrLogger } from '@sitekit/grouper-utils/logger'
import { loadProject } from './project'

const log = createStderrLogger('list')

export interface GroupSummary {
  attribute: string
  root: string
  key: string
  url: string | null
  children: string[]
}

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('Print every group of a site')
    .argument('<site>', 'Site JSON file')
    .option('-c, --config <file>', 'Grouping config (default: groupby.json beside the site)')
    .option('-a, --attribute <name>', 'Only groups of this attribute')
    .option('--json', 'Print JSON instead of a table')
    .action(
      async (
        sitePath: string,
        options: {
          config?: string
          attribute?: string
          json?: boolean
        },
      ) => {
        try {
          const { groupBy } = await loadProject(sitePath, options.config)
          const summaries: GroupSummary[] = []
          for (const watcher of groupBy.watchers) {
            if (options.attribute && watcher.attribute !== options.attribute)
              continue
            for (const source of await watcher.groups()) {
              summaries.push({
                attribute: watcher.attribute,
                root: watcher.root,
                key: source.key,
                url: source.urlPath,
                children: source.children.all().map(record => record.path),
              })
            }
          }

          if (options.json) {
            console.log(JSON.stringify(summaries, null, 2))
            return
          }
          if (summaries.length === 0) {
            log.info('No groups')
            return
          }
          for (const summary of summaries) {
            console.log([summary.attribute, summary.key, summary.url ?? '-', summary.children.length].join('\t'))
          }
        }
        catch (error) {
          const msg = error instanceof Error ? error.message : String(error)
          log.error(`List failed: ${msg}`)
          process.exit(1)
        }
      },
    )
}
