import { readFileSync } from 'node:fs'
import { describe, it, expect, vi, afterEach } from 'vitest'
import { DecodeError, UpstreamConnectionError } from '@/lib/errors'
import { SearchEngine } from '@/lib/search/search-engine'
import { ArxivEngine } from '@/lib/services/adapters/arxiv'

const fixture = (name: string) => readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf8')

function stubFetch(body: string) {
  const fetchMock = vi.fn(async () => new Response(body))
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

describe('ArxivEngine', () => {
  const arxiv = new SearchEngine(new ArxivEngine({ id: 'arxiv' }))

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  describe('queryUrl', () => {
    it('passes the record offset straight through', () => {
      const request = arxiv.normalizeArguments('dark matter', {
        semanticSearchField: 'author',
        start: 20,
        perPage: 10,
        sort: 'date_desc',
      })

      const url = new URL(new ArxivEngine().queryUrl(request))

      expect(url.origin + url.pathname).toBe('https://export.arxiv.org/api/query')
      expect(url.searchParams.get('search_query')).toBe('au:dark matter')
      expect(url.searchParams.get('start')).toBe('20')
      expect(url.searchParams.get('max_results')).toBe('10')
      expect(url.searchParams.get('sortBy')).toBe('submittedDate')
      expect(url.searchParams.get('sortOrder')).toBe('descending')
    })

    it('searches all fields by default', () => {
      const url = new URL(new ArxivEngine().queryUrl(arxiv.normalizeArguments('axions')))

      expect(url.searchParams.get('search_query')).toBe('all:axions')
      expect(url.searchParams.get('start')).toBe('0')
      expect(url.searchParams.get('sortBy')).toBeNull()
    })
  })

  describe('search', () => {
    it('maps Atom entries onto result items', async () => {
      stubFetch(fixture('arxiv-feed.xml'))

      const results = await arxiv.search('dark matter', { start: 20, perPage: 2 })

      expect(results.failed()).toBe(false)
      expect(results.totalItems).toBe(1234)
      expect(results.start).toBe(20)
      expect(results.length).toBe(2)

      const [first, second] = results.items
      expect(first.title).toBe('Halo Profiles of Dark Matter')
      expect(first.abstract).toBe('We study halo profiles in simulations.')
      expect(first.year).toBe(2021)
      expect(first.format).toBe('Preprint')
      expect(first.doi).toBe('10.5555/halo.2021.7')
      expect(first.sourceTitle).toBe('Example Astrophys. J. 12 (2021) 45-67')
      expect(first.authors.map(a => a.displayName())).toEqual(['Lovelace, A', 'Turing, A'])
      expect(first.link).toBe('http://arxiv.org/abs/2101.00001v1')
      expect(first.uniqueId).toBe('2101.00001v1')
      expect(first.engineId).toBe('arxiv')

      expect(second.authors.map(a => a.displayName())).toEqual(['Noether, E'])
      expect(second.doi).toBeUndefined()
      expect(second.uniqueId).toBe('2102.00002v2')
    })

    it('reads an empty feed', async () => {
      stubFetch(fixture('arxiv-empty-feed.xml'))

      const results = await arxiv.search('zzzz')

      expect(results.failed()).toBe(false)
      expect(results.length).toBe(0)
      expect(results.totalItems).toBe(0)
    })

    it('reports malformed XML as a failed result', async () => {
      stubFetch('<feed><entry></feed>')

      const results = await arxiv.search('dark matter')

      expect(results.failed()).toBe(true)
      expect(results.error?.kind).toBe('UpstreamFailure')
      expect(results.error?.cause).toBeInstanceOf(DecodeError)
    })

    it('reports a feed cut off mid-body as a failed result', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => new Response(new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('<feed xmlns="http://www.w3.org/2005/Atom">'))
          controller.error(new TypeError('terminated'))
        },
      }))))

      const results = await arxiv.search('dark matter')

      expect(results.failed()).toBe(true)
      expect(results.error?.kind).toBe('UpstreamFailure')
      expect(results.error?.message).toBe('arXiv request failed: terminated')
      expect(results.error?.cause).toBeInstanceOf(UpstreamConnectionError)
    })

    it('rejects a page size over 100 without calling the API', async () => {
      const fetchMock = stubFetch(fixture('arxiv-empty-feed.xml'))

      const results = await arxiv.search('dark matter', { perPage: 101 })

      expect(fetchMock).not.toHaveBeenCalled()
      expect(results.error?.message).toBe('101 is more than maximum perPage of 100 for ArxivEngine')
    })
  })
})
