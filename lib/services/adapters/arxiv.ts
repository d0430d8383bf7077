import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { z } from 'zod'
import type {
  EngineConfiguration,
  EngineConfigurationInput,
  SearchEngineAdapter,
  SearchRequest,
} from '@/contracts/search-engine'
import { DecodeError } from '@/lib/errors'
import { defineCapabilities } from '@/lib/search/capabilities'
import { buildEngineConfiguration, parseEngineSettings } from '@/lib/search/engine-configuration'
import { Author, ResultItem, ResultSet } from '@/lib/search/results'
import { fetchText, validateResponse } from '@/lib/services/http'

const ARXIV_CAPABILITIES = defineCapabilities({
  maxPerPage: 100,
  searchFieldDefinitions: {
    all: { label: 'All fields' },
    ti: { label: 'Title' },
    au: { label: 'Author' },
    abs: { label: 'Abstract' },
    cat: { label: 'Subject category' },
  },
  semanticSearchMap: {
    title: 'ti',
    author: 'au',
    subject: 'cat',
  },
  sortDefinitions: {
    relevance: { label: 'Relevance', sortBy: 'relevance' },
    date_desc: { label: 'Newest first', sortBy: 'submittedDate' },
  },
})

const settingsSchema = z.object({
  baseUrl: z.string().url(),
  timeoutMs: z.number().int().positive().optional(),
})

type ArxivSettings = z.infer<typeof settingsSchema>

// Elements that carry attributes come back as { '#text', '@_attr' } objects
const textSchema = z
  .union([z.string(), z.object({ '#text': z.string() }).passthrough()])
  .transform(value => (typeof value === 'string' ? value : value['#text']))

const entrySchema = z.object({
  'id': textSchema,
  'title': textSchema.optional(),
  'summary': textSchema.optional(),
  'published': textSchema.optional(),
  'author': z.array(z.object({ name: textSchema })).default([]),
  'arxiv:doi': textSchema.optional(),
  'arxiv:journal_ref': textSchema.optional(),
})

const feedSchema = z.object({
  feed: z.object({
    'opensearch:totalResults': textSchema.optional(),
    'entry': z.array(entrySchema).default([]),
  }),
})

type ArxivEntry = z.infer<typeof entrySchema>

const ARRAY_PATHS = new Set(['feed.entry', 'feed.entry.author'])

const parser = new XMLParser({
  ignoreAttributes: false,
  parseTagValue: false,
  isArray: (_tagName, jPath) => ARRAY_PATHS.has(jPath),
})

export class ArxivEngine implements SearchEngineAdapter {
  readonly typeName = 'ArxivEngine'
  readonly capabilities = ARXIV_CAPABILITIES
  readonly configuration: EngineConfiguration
  private readonly settings: ArxivSettings

  constructor(configuration: EngineConfigurationInput = {}) {
    this.configuration = buildEngineConfiguration(this.typeName, configuration, {
      defaultConfiguration: { baseUrl: 'https://export.arxiv.org/api/query' },
    })
    this.settings = parseEngineSettings(settingsSchema, this.configuration, this.typeName)
  }

  async searchImplementation(request: SearchRequest): Promise<ResultSet> {
    const xml = await fetchText(this.queryUrl(request), {
      label: 'arXiv',
      timeoutMs: this.settings.timeoutMs,
    })

    const { feed } = validateResponse(feedSchema, parseAtom(xml), 'arXiv')
    const total = Number.parseInt(feed['opensearch:totalResults'] ?? '', 10)

    return new ResultSet(
      feed.entry.map(entry => toItem(entry)),
      Number.isNaN(total) ? undefined : total
    )
  }

  queryUrl(request: SearchRequest): string {
    const field = request.searchField ?? 'all'
    const params = new URLSearchParams({
      search_query: `${field}:${request.query}`,
      // arXiv takes a record offset, not a page number
      start: String(request.start),
      max_results: String(request.perPage),
    })

    const sort = request.sort ? ARXIV_CAPABILITIES.sortDefinitions[request.sort] : undefined
    if (sort && typeof sort.sortBy === 'string') {
      params.set('sortBy', sort.sortBy)
      params.set('sortOrder', 'descending')
    }

    return `${this.settings.baseUrl}?${params}`
  }
}

function parseAtom(xml: string): unknown {
  const validation = XMLValidator.validate(xml)
  if (validation !== true) {
    throw new DecodeError(
      `arXiv returned malformed XML: ${validation.err.msg} (line ${validation.err.line})`,
      'arXiv'
    )
  }
  const parsed: unknown = parser.parse(xml)
  return parsed
}

function toItem(entry: ArxivEntry): ResultItem {
  const title = collapse(entry.title)
  const year = entry.published ? Number.parseInt(entry.published.slice(0, 4), 10) : Number.NaN

  return new ResultItem({
    title: title || undefined,
    format: 'Preprint',
    authors: entry.author.map(author => Author.fromFullName(collapse(author.name))),
    year: Number.isNaN(year) ? undefined : year,
    abstract: collapse(entry.summary) || undefined,
    doi: entry['arxiv:doi'],
    sourceTitle: entry['arxiv:journal_ref'] ? collapse(entry['arxiv:journal_ref']) : undefined,
    link: entry.id,
    uniqueId: entry.id.replace(/^https?:\/\/arxiv\.org\/abs\//, ''),
  })
}

function collapse(value: string | undefined): string {
  return (value ?? '').replace(/\s+/g, ' ').trim()
}
