import { describe, it, expect } from 'vitest'
import { EngineRegistry } from '@/lib/search/engine-registry'
import { pickPublicSearchArgs, searchFromPublicParams } from '@/lib/search/public-args'
import { FakeEngine } from '../helpers/fake-engine'

class CollectionEngine extends FakeEngine {
  readonly publicSearchArgs = ['collection']
}

describe('pickPublicSearchArgs', () => {
  it('keeps whitelisted primitive values only', () => {
    const picked = pickPublicSearchArgs({
      query: 'graphene',
      perPage: '20',
      page: 2,
      sort: { $ne: 1 },
      staffOnly: true,
    })

    expect(picked).toEqual({ query: 'graphene', perPage: '20', page: 2 })
  })

  it('reads URLSearchParams', () => {
    const picked = pickPublicSearchArgs(new URLSearchParams('query=dark+matter&start=20&admin=1'))
    expect(picked).toEqual({ query: 'dark matter', start: '20' })
  })

  it('ignores inherited keys', () => {
    const params: Record<string, unknown> = Object.create({ query: 'inherited' })
    expect(pickPublicSearchArgs(params)).toEqual({})
  })

  it('honours a custom whitelist', () => {
    expect(pickPublicSearchArgs({ query: 'q', collection: 'theses' }, ['collection'])).toEqual({ collection: 'theses' })
  })
})

describe('searchFromPublicParams', () => {
  it('lets engine-specific public keys through and drops the rest', async () => {
    const registry = new EngineRegistry().register('catalog', CollectionEngine)

    const results = await searchFromPublicParams(
      registry,
      'catalog',
      new URLSearchParams('query=graphene&collection=theses&staffOnly=yes&page=2')
    )

    expect(results.searchArgs).toMatchObject({ query: 'graphene', collection: 'theses', page: 2 })
    expect(results.searchArgs?.staffOnly).toBeUndefined()
  })
})
