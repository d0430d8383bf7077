import { z } from 'zod'
import type {
  EngineConfiguration,
  EngineConfigurationInput,
  SearchEngineAdapter,
  SearchRequest,
} from '@/contracts/search-engine'
import { defineCapabilities } from '@/lib/search/capabilities'
import { buildEngineConfiguration, parseEngineSettings } from '@/lib/search/engine-configuration'
import { Author, ResultItem, ResultSet, type ItemFormat } from '@/lib/search/results'
import { fetchJSON } from '@/lib/services/http'

const OPENALEX_CAPABILITIES = defineCapabilities({
  // OpenAlex limit
  maxPerPage: 200,
  searchFieldDefinitions: {
    default: { label: 'All fields' },
    title: { label: 'Title', filter: 'title.search' },
    abstract: { label: 'Abstract', filter: 'abstract.search' },
    fulltext: { label: 'Full text', filter: 'fulltext.search' },
  },
  semanticSearchMap: {
    title: 'title',
  },
  sortDefinitions: {
    relevance: { label: 'Relevance', param: 'relevance_score:desc' },
    date_desc: { label: 'Newest first', param: 'publication_date:desc' },
    cited_desc: { label: 'Most cited', param: 'cited_by_count:desc' },
  },
})

const settingsSchema = z.object({
  mailto: z.string().email(),
  baseUrl: z.string().url(),
  timeoutMs: z.number().int().positive().optional(),
})

type OpenAlexSettings = z.infer<typeof settingsSchema>

const workSchema = z.object({
  id: z.string(),
  display_name: z.string().nullish(),
  publication_year: z.number().int().nullish(),
  doi: z.string().nullish(),
  type: z.string().nullish(),
  abstract_inverted_index: z.record(z.array(z.number())).nullish(),
  authorships: z.array(z.object({
    author: z.object({ display_name: z.string().nullish() }).nullish(),
  })).nullish(),
  primary_location: z.object({
    landing_page_url: z.string().nullish(),
    source: z.object({
      display_name: z.string().nullish(),
      issn_l: z.string().nullish(),
      host_organization_name: z.string().nullish(),
    }).nullish(),
  }).nullish(),
  biblio: z.object({
    volume: z.string().nullish(),
    issue: z.string().nullish(),
    first_page: z.string().nullish(),
    last_page: z.string().nullish(),
  }).nullish(),
})

const responseSchema = z.object({
  meta: z.object({ count: z.number().int().nonnegative() }),
  results: z.array(workSchema),
})

type OpenAlexWork = z.infer<typeof workSchema>

const FORMAT_MAP: Record<string, ItemFormat> = {
  'article': 'Article',
  'book': 'Book',
  'book-chapter': 'Chapter',
  'dissertation': 'Dissertation',
  'preprint': 'Preprint',
  'dataset': 'Dataset',
  'report': 'Report',
}

/**
 * OpenAlex works search.
 *
 * Required configuration: `mailto`, a contact address sent with every
 * request to use the polite pool.
 */
export class OpenAlexEngine implements SearchEngineAdapter {
  readonly typeName = 'OpenAlexEngine'
  readonly capabilities = OPENALEX_CAPABILITIES
  readonly configuration: EngineConfiguration
  private readonly settings: OpenAlexSettings

  constructor(configuration: EngineConfigurationInput = {}) {
    this.configuration = buildEngineConfiguration(this.typeName, configuration, {
      defaultConfiguration: { baseUrl: 'https://api.openalex.org' },
      requiredConfiguration: ['mailto'],
    })
    this.settings = parseEngineSettings(settingsSchema, this.configuration, this.typeName)
  }

  async searchImplementation(request: SearchRequest): Promise<ResultSet> {
    const data = await fetchJSON(this.queryUrl(request), responseSchema, {
      label: 'OpenAlex',
      timeoutMs: this.settings.timeoutMs,
      headers: { 'User-Agent': `scholar-federation/0.1 (mailto:${this.settings.mailto})` },
    })

    return new ResultSet(data.results.map(work => this.toItem(work)), data.meta.count)
  }

  queryUrl(request: SearchRequest): string {
    const params = new URLSearchParams()

    const field = request.searchField ? OPENALEX_CAPABILITIES.searchFieldDefinitions[request.searchField] : undefined
    if (field && typeof field.filter === 'string') {
      params.set('filter', `${field.filter}:${filterValue(request.query)}`)
    } else {
      params.set('search', request.query)
    }

    const sort = request.sort ? OPENALEX_CAPABILITIES.sortDefinitions[request.sort] : undefined
    if (sort && typeof sort.param === 'string') {
      params.set('sort', sort.param)
    }

    // OpenAlex pages by page number only
    params.set('page', String(request.page))
    params.set('per_page', String(request.perPage))
    params.set('mailto', this.settings.mailto)

    return `${this.settings.baseUrl}/works?${params}`
  }

  private toItem(work: OpenAlexWork): ResultItem {
    const source = work.primary_location?.source
    const biblio = work.biblio

    return new ResultItem({
      title: work.display_name ?? undefined,
      format: work.type ? FORMAT_MAP[work.type] ?? work.type : undefined,
      authors: (work.authorships ?? [])
        .map(a => a.author?.display_name)
        .filter((name): name is string => Boolean(name))
        .map(name => Author.fromFullName(name)),
      year: work.publication_year ?? undefined,
      volume: biblio?.volume ?? undefined,
      issue: biblio?.issue ?? undefined,
      startPage: biblio?.first_page ?? undefined,
      endPage: biblio?.last_page ?? undefined,
      journalTitle: source?.display_name ?? undefined,
      issn: source?.issn_l ?? undefined,
      publisher: source?.host_organization_name ?? undefined,
      doi: work.doi ? work.doi.replace(/^https?:\/\/(dx\.)?doi\.org\//, '') : undefined,
      abstract: work.abstract_inverted_index ? deInvertAbstract(work.abstract_inverted_index) : undefined,
      link: work.primary_location?.landing_page_url ?? undefined,
      uniqueId: work.id.replace('https://openalex.org/', ''),
    })
  }
}

// Utility to reconstruct abstract from OpenAlex inverted index
function deInvertAbstract(invertedIndex: Record<string, number[]>): string {
  const words: Array<{ word: string; position: number }> = []

  for (const [word, positions] of Object.entries(invertedIndex)) {
    for (const position of positions) {
      words.push({ word, position })
    }
  }

  return words
    .sort((a, b) => a.position - b.position)
    .map(item => item.word)
    .join(' ')
}

// `,` separates filters and `|` ORs values inside a filter
function filterValue(query: string): string {
  return query.replace(/[,|]/g, ' ').replace(/\s+/g, ' ').trim()
}
