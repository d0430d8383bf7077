import type { DisplayConfiguration, SearchRequest } from '@/contracts/search-engine'
import { DEFAULT_PER_PAGE } from '@/lib/search/normalize-arguments'

export type KnownItemFormat =
  | 'Article'
  | 'Book'
  | 'Chapter'
  | 'Dissertation'
  | 'Preprint'
  | 'Dataset'
  | 'Report'

// Engines may report formats outside the known set
export type ItemFormat = KnownItemFormat | (string & {})

export type SearchErrorKind = 'InvalidArguments' | 'UpstreamFailure'

export interface SearchErrorInfo {
  kind: SearchErrorKind
  message: string
  /** The original thrown value, kept for diagnostics */
  cause?: unknown
  /** Human-readable detail, when the source supplied one */
  info?: string
}

export interface AuthorInit {
  first?: string
  last?: string
  display?: string
}

export class Author {
  readonly first?: string
  readonly last?: string
  readonly display?: string

  constructor(init: AuthorInit = {}) {
    this.first = init.first
    this.last = init.last
    this.display = init.display
  }

  /**
   * Split a "First Middle Last" name; the final token becomes the last name.
   */
  static fromFullName(name: string): Author {
    const parts = name.trim().split(/\s+/).filter(Boolean)
    if (parts.length <= 1) {
      return new Author({ last: parts[0] })
    }
    return new Author({ first: parts.slice(0, -1).join(' '), last: parts[parts.length - 1] })
  }

  /** "Smith, J" unless an explicit display form was given */
  displayName(): string {
    if (this.display) return this.display

    const last = this.last?.trim()
    const initial = this.first?.trim().charAt(0)
    if (last && initial) return `${last}, ${initial}`
    return last || this.first?.trim() || ''
  }
}

export interface ResultItemInit {
  title?: string
  subtitle?: string
  format?: ItemFormat
  formatStr?: string
  authors?: Author[]
  year?: number
  volume?: string
  issue?: string
  startPage?: string
  endPage?: string
  journalTitle?: string
  sourceTitle?: string
  issn?: string
  doi?: string
  isbn?: string
  publisher?: string
  abstract?: string
  link?: string
  uniqueId?: string
}

export class ResultItem {
  title?: string
  subtitle?: string
  format?: ItemFormat
  formatStr?: string
  readonly authors: Author[]
  year?: number
  volume?: string
  issue?: string
  startPage?: string
  endPage?: string
  journalTitle?: string
  sourceTitle?: string
  issn?: string
  doi?: string
  isbn?: string
  publisher?: string
  abstract?: string
  link?: string
  uniqueId?: string

  // Stamped by the search executor from the owning engine's configuration
  engineId?: string
  decorator?: string
  displayConfiguration: Readonly<DisplayConfiguration> = {}

  constructor(init: ResultItemInit = {}) {
    this.title = init.title
    this.subtitle = init.subtitle
    this.format = init.format
    this.formatStr = init.formatStr
    this.authors = [...(init.authors ?? [])]
    this.year = init.year
    this.volume = init.volume
    this.issue = init.issue
    this.startPage = init.startPage
    this.endPage = init.endPage
    this.journalTitle = init.journalTitle
    this.sourceTitle = init.sourceTitle
    this.issn = init.issn
    this.doi = init.doi
    this.isbn = init.isbn
    this.publisher = init.publisher
    this.abstract = init.abstract
    this.link = init.link
    this.uniqueId = init.uniqueId
  }

  /** Title and subtitle joined the way citations print them */
  completeTitle(): string {
    const title = this.title?.trim() ?? ''
    const subtitle = this.subtitle?.trim()
    return subtitle ? `${title}: ${subtitle}` : title
  }
}

export interface ResultPagination {
  currentPage: number
  perPage: number
  totalPages: number
  totalItems: number
  /** 1-based index of the first record on this page, 0 when there is none */
  startRecord: number
  endRecord: number
  isFirstPage: boolean
  isLastPage: boolean
}

/**
 * Outcome of one search on one engine. Either items plus metadata, or an
 * error; a failed set never carries items.
 */
export class ResultSet implements Iterable<ResultItem> {
  readonly items: ResultItem[]
  totalItems?: number
  timing = 0
  start = 0
  perPage = DEFAULT_PER_PAGE
  engineId?: string
  displayConfiguration: Readonly<DisplayConfiguration> = {}
  searchArgs?: SearchRequest

  private failure?: SearchErrorInfo

  constructor(items: ResultItem[] = [], totalItems?: number) {
    this.items = [...items]
    this.totalItems = totalItems
  }

  static fromError(error: SearchErrorInfo): ResultSet {
    const results = new ResultSet()
    results.fail(error)
    return results
  }

  get error(): SearchErrorInfo | undefined {
    return this.failure
  }

  /** Mark the set failed; any items already collected are dropped */
  fail(error: SearchErrorInfo): void {
    this.failure = error
    this.items.length = 0
  }

  failed(): boolean {
    return this.failure !== undefined
  }

  get length(): number {
    return this.items.length
  }

  first(): ResultItem | undefined {
    return this.items[0]
  }

  [Symbol.iterator](): Iterator<ResultItem> {
    return this.items[Symbol.iterator]()
  }

  pagination(): ResultPagination {
    const perPage = this.perPage > 0 ? this.perPage : DEFAULT_PER_PAGE
    const totalItems = this.totalItems ?? this.start + this.items.length
    const currentPage = Math.floor(this.start / perPage) + 1
    const totalPages = Math.ceil(totalItems / perPage)
    const startRecord = totalItems > this.start ? this.start + 1 : 0
    const endRecord = startRecord === 0 ? 0 : Math.min(this.start + perPage, totalItems)

    return {
      currentPage,
      perPage,
      totalPages,
      totalItems,
      startRecord,
      endRecord,
      isFirstPage: currentPage === 1,
      isLastPage: currentPage >= totalPages,
    }
  }
}
