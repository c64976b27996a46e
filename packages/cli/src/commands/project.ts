import type { MemoryContentDatabase } from '@sitekit/grouper-content'
import type { GroupByConfigFile } from '@sitekit/grouper-engine/config'
import { existsSync } from 'node:fs'
import path from 'node:path'
import { loadSite } from '@sitekit/grouper-content/site-loader'
import { loadConfigFile } from '@sitekit/grouper-engine/config'
import { GroupBy } from '@sitekit/grouper-engine/groupby'

export const DEFAULT_CONFIG_FILE = 'groupby.json'

export interface Project {
  db: MemoryContentDatabase
  config: GroupByConfigFile
  groupBy: GroupBy
}

/**
 * Config path for a site: the explicit one, or `groupby.json` beside the
 * site file.
 */
export function configPathFor(sitePath: string, configPath?: string): string {
  return path.resolve(configPath ?? path.join(path.dirname(sitePath), DEFAULT_CONFIG_FILE))
}

/**
 * Load a site and register one default-grouping watcher per config section.
 */
export async function loadProject(sitePath: string, configPath?: string): Promise<Project> {
  const configFile = configPathFor(sitePath, configPath)
  if (!existsSync(configFile))
    throw new Error(`Config file not found: ${configFile}`)

  const db = await loadSite(sitePath)
  const config = await loadConfigFile(configFile)
  const groupBy = new GroupBy({ db })
  groupBy.registerConfigFile(config)
  return { db, config, groupBy }
}
