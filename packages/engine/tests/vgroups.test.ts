import type { MemoryContentDatabase } from '@sitekit/grouper-content'
import { parseConfigFile } from '@sitekit/grouper-engine/config'
import { GroupBy } from '@sitekit/grouper-engine/groupby'
import { beforeEach, describe, expect, it } from 'vitest'
import { addPost, createBlog, flow, textBlock } from './fixtures/blog'

describe('vgroups', () => {
  let db: MemoryContentDatabase
  let groupBy: GroupBy

  beforeEach(() => {
    db = createBlog()
    addPost(db, 'one', { tags: ['Awesome', 'Latest News'], category: 'Travel' })
    addPost(db, 'two', { tags: ['Latest News'], category: 'Food', body: flow(textBlock('Deep')) })
    groupBy = new GroupBy({ db })
    groupBy.registerConfigFile(parseConfigFile(JSON.stringify({
      tags: { root: '/blog' },
      category: { root: '/blog' },
    }), 'groupby.json'))
  })

  const keysOf = async (...args: Parameters<GroupBy['vgroups']>): Promise<string[]> =>
    (await groupBy.vgroups(...args)).map(source => source.key)

  it('collects groups of a whole subtree in visit order', async () => {
    expect(await keysOf('/blog', { recursive: true })).toEqual(['awesome', 'latest-news', 'travel', 'deep', 'food'])
  })

  it('collects groups of a single record', async () => {
    expect(await keysOf('/blog/two')).toEqual(['latest-news', 'deep', 'food'])
    expect(await keysOf('/blog')).toEqual([])
  })

  it('filters by attribute', async () => {
    expect(await keysOf('/blog', { recursive: true, keys: 'tags' })).toEqual(['awesome', 'latest-news', 'deep'])
    expect(await keysOf('/blog', { recursive: true, keys: ['category'] })).toEqual(['travel', 'food'])
  })

  it('filters by record field', async () => {
    expect(await keysOf('/blog', { recursive: true, fields: 'tags' })).toEqual(['awesome', 'latest-news'])
    expect(await keysOf('/blog', { recursive: true, fields: ['body'] })).toEqual(['deep'])
  })

  it('filters by flow-block field', async () => {
    expect(await keysOf('/blog', { recursive: true, flows: 'content' })).toEqual(['deep'])
    expect(await keysOf('/blog', { recursive: true, flows: 'note' })).toEqual([])
  })

  it('sorts when asked', async () => {
    expect(await keysOf('/blog', { recursive: true, orderBy: 'key' }))
      .toEqual(['awesome', 'deep', 'food', 'latest-news', 'travel'])
    expect(await keysOf('/blog', { recursive: true, orderBy: ['-size', 'key'] }))
      .toEqual(['latest-news', 'awesome', 'deep', 'food', 'travel'])
  })

  it('rejects malformed sort keys', async () => {
    await expect(groupBy.vgroups('/blog', { orderBy: '1bad' })).rejects.toThrow(
      'Invalid config for [vgroups.order_by] = "1bad": Invalid sort key "1bad"',
    )
  })

  it('reports every dependency it read', async () => {
    const dependencies = new Set<string>()
    await groupBy.vgroups('/blog', {
      recursive: true,
      recorder: { recordDependency: dependency => dependencies.add(dependency) },
    })
    expect([...dependencies]).toEqual(['file:groupby.json', 'record:/blog', 'record:/blog/one', 'record:/blog/two'])
  })

  it('records config files even for a missing record', async () => {
    const dependencies: string[] = []
    const groups = await groupBy.vgroups('/missing', {
      keys: 'tags',
      recorder: { recordDependency: dependency => dependencies.push(dependency) },
    })
    expect(groups).toEqual([])
    expect(dependencies).toEqual(['file:groupby.json'])
  })

  it('accepts a record instance', async () => {
    const two = db.get('/blog/two')
    expect(two).not.toBeNull()
    if (two)
      expect(await keysOf(two, { keys: 'category' })).toEqual(['food'])
  })
})
