import type { ResultSet } from '@/lib/search/results'

export type UnrecognizedSearchFieldPolicy = 'raise' | 'ignore'

/** Descriptive metadata for a search field or sort key; only the key matters to the core */
export interface FieldDefinition {
  label?: string
  [meta: string]: unknown
}

/**
 * Static, configuration-time description of what an engine type supports.
 */
export interface EngineCapabilities {
  /** Absent means unbounded */
  readonly maxPerPage?: number
  readonly searchFieldDefinitions: Readonly<Record<string, FieldDefinition>>
  /** Cross-engine names such as `title`, `author` and `subject` mapped onto local field keys */
  readonly semanticSearchMap: Readonly<Record<string, string>>
  readonly sortDefinitions: Readonly<Record<string, FieldDefinition>>
}

export interface DisplayConfiguration {
  /** Name of a presentation adapter; opaque to the search core */
  decorator?: string
  [key: string]: unknown
}

/**
 * Read-only engine configuration after defaults are merged and required keys checked.
 */
export interface EngineConfiguration {
  readonly id?: string
  readonly forDisplay: Readonly<DisplayConfiguration>
  readonly unrecognizedSearchField?: UnrecognizedSearchFieldPolicy
  readonly [key: string]: unknown
}

/** Configuration as supplied by whoever constructs an engine */
export interface EngineConfigurationInput {
  id?: string
  forDisplay?: DisplayConfiguration
  unrecognizedSearchField?: UnrecognizedSearchFieldPolicy
  [key: string]: unknown
}

export type NumericArgument = number | string | null | undefined

/**
 * Search arguments as callers pass them. Pagination values may come straight
 * from a query string; blank values count as unset.
 */
export interface SearchOptions {
  query?: string
  searchField?: string | null
  semanticSearchField?: string | null
  sort?: string | number | null
  page?: NumericArgument
  start?: NumericArgument
  perPage?: NumericArgument
  unrecognizedSearchField?: string | null
  [key: string]: unknown
}

/**
 * Canonical request handed to `searchImplementation`. Both `page` and `start`
 * are always present; keys the core does not know pass through untouched.
 */
export interface SearchRequest {
  readonly query: string
  readonly searchField: string | null
  readonly sort: string | null
  readonly page: number
  readonly start: number
  readonly perPage: number
  readonly [key: string]: unknown
}

export type ErrorClass = abstract new (...args: never[]) => Error

/**
 * What every search source implements. Engines may be shared across
 * concurrent searches, so implementations must not keep per-search state.
 */
export interface SearchEngineAdapter {
  /** Fallback identity when the configuration carries no `id` */
  readonly typeName: string
  readonly configuration: EngineConfiguration
  readonly capabilities: EngineCapabilities
  /** Replaces the default list of error classes turned into failed results */
  readonly containedErrors?: readonly ErrorClass[]
  /** Engine-specific keys that are safe to accept from untrusted input */
  readonly publicSearchArgs?: readonly string[]
  searchImplementation(request: SearchRequest): Promise<ResultSet>
}

export type SearchEngineType = new (configuration?: EngineConfigurationInput) => SearchEngineAdapter
