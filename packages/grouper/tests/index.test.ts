import { createSiteDatabase, defaultGrouping, GroupBy, MemoryArtifactRegistry } from '@sitekit/grouper'
import { describe, expect, it } from 'vitest'

describe('@sitekit/grouper', () => {
  it('groups a site end to end', async () => {
    const db = createSiteDatabase({
      models: [{ id: 'post', fields: [{ name: 'category', options: { category: 'yes' } }] }],
      records: [
        { path: '/', model: 'post' },
        { path: '/a', model: 'post', fields: { category: 'Food' } },
        { path: '/b', model: 'post', fields: { category: 'Food' } },
      ],
    })
    const groupBy = new GroupBy({ db })
    groupBy.addWatcher('category', { replace_none_key: 'misc' }).setGrouping(defaultGrouping(null))

    const registry = new MemoryArtifactRegistry()
    const declared = await groupBy.buildAll(registry)
    expect(declared.map(artifact => artifact.artifact)).toEqual([
      'category/misc/index.html',
      'category/food/index.html',
    ])
  })
})
