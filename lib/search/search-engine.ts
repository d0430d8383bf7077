import type {
  EngineCapabilities,
  EngineConfiguration,
  ErrorClass,
  SearchEngineAdapter,
  SearchOptions,
  SearchRequest,
} from '@/contracts/search-engine'
import {
  DecodeError,
  InvalidArgumentsError,
  MalformedResponseError,
  UpstreamConnectionError,
  UpstreamError,
  UpstreamTimeoutError,
} from '@/lib/errors'
import { searchKeys, semanticSearchKeys, sortKeys } from '@/lib/search/capabilities'
import { lookupConfiguration } from '@/lib/search/engine-configuration'
import { mergeSearchArguments, normalizeSearchArguments } from '@/lib/search/normalize-arguments'
import { ResultSet, type SearchErrorInfo } from '@/lib/search/results'
import { createTimer, logError, logSearchMetrics } from '@/lib/utils/logger'

/**
 * Transient and parsing failures turned into failed result sets. Anything
 * else thrown by an engine propagates, so programming errors stay loud.
 */
export const DEFAULT_CONTAINED_ERRORS: readonly ErrorClass[] = Object.freeze([
  UpstreamTimeoutError,
  UpstreamConnectionError,
  MalformedResponseError,
  DecodeError,
  SyntaxError,
])

export const PUBLIC_SETTABLE_SEARCH_ARGS: readonly string[] = Object.freeze([
  'query',
  'searchField',
  'semanticSearchField',
  'sort',
  'page',
  'start',
  'perPage',
])

/**
 * Caller-facing wrapper around a {@link SearchEngineAdapter}.
 *
 * Adapters only translate a canonical request into a call to their source.
 * This class normalizes arguments, times the call, contains the errors on the
 * adapter's allow-list and stamps engine metadata onto the results.
 *
 * @example
 * const engine = new SearchEngine(new OpenAlexEngine({ id: 'openalex', mailto: 'library@example.edu' }))
 * const results = await engine.search('cancer', { perPage: 20, page: 2 })
 * if (results.failed()) console.warn(results.error?.message)
 */
export class SearchEngine {
  constructor(readonly adapter: SearchEngineAdapter) {}

  /** Configured id, falling back to the engine type name */
  get id(): string {
    return this.adapter.configuration.id ?? this.adapter.typeName
  }

  get configuration(): EngineConfiguration {
    return this.adapter.configuration
  }

  get capabilities(): EngineCapabilities {
    return this.adapter.capabilities
  }

  searchKeys(): string[] {
    return searchKeys(this.capabilities)
  }

  semanticSearchKeys(): string[] {
    return semanticSearchKeys(this.capabilities)
  }

  sortKeys(): string[] {
    return sortKeys(this.capabilities)
  }

  maxPerPage(): number | undefined {
    return this.capabilities.maxPerPage
  }

  /**
   * Argument names that may be taken from untrusted input such as a web
   * request. Elevated-access flags are never on this list.
   */
  publicSettableSearchArgs(): string[] {
    return [...PUBLIC_SETTABLE_SEARCH_ARGS, ...(this.adapter.publicSearchArgs ?? [])]
  }

  containedErrors(): readonly ErrorClass[] {
    return this.adapter.containedErrors ?? DEFAULT_CONTAINED_ERRORS
  }

  /**
   * Normalize without searching. Throws InvalidArgumentsError.
   */
  normalizeArguments(queryOrOptions: string | SearchOptions, options?: SearchOptions): SearchRequest {
    return normalizeSearchArguments(mergeSearchArguments(queryOrOptions, options), {
      capabilities: this.capabilities,
      configuration: this.configuration,
      engineName: this.adapter.typeName,
    })
  }

  /**
   * Run one search. Rejected arguments and contained upstream failures come
   * back as a failed ResultSet; errors outside the allow-list are rethrown.
   */
  async search(queryOrOptions: string | SearchOptions, options?: SearchOptions): Promise<ResultSet> {
    const timer = createTimer()

    let request: SearchRequest
    try {
      request = this.normalizeArguments(queryOrOptions, options)
    } catch (error) {
      if (!(error instanceof InvalidArgumentsError)) throw error

      const failed = ResultSet.fromError({ kind: 'InvalidArguments', message: error.message, cause: error })
      this.fillInSearchMetadata(failed)
      failed.timing = timer.end()
      this.logOutcome(failed, mergeSearchArguments(queryOrOptions, options).query ?? '')
      return failed
    }

    let results: ResultSet
    try {
      results = await this.adapter.searchImplementation(request)
    } catch (error) {
      if (!this.isContained(error)) throw error

      logError(error, { engine_id: this.id, query: request.query })
      const failed = ResultSet.fromError(upstreamFailure(error))
      this.fillInSearchMetadata(failed, request)
      failed.timing = timer.end()
      this.logOutcome(failed, request.query)
      return failed
    }

    this.fillInSearchMetadata(results, request)
    results.timing = timer.end()

    const decorator = lookupConfiguration(this.configuration, 'forDisplay.decorator')
    for (const item of results) {
      // Copied so display logic holding only an item can still see its engine
      item.engineId = results.engineId
      item.decorator = typeof decorator === 'string' ? decorator : undefined
      item.displayConfiguration = this.configuration.forDisplay
    }

    this.logOutcome(results, request.query)
    return results
  }

  /** Same as {@link search} */
  execute(queryOrOptions: string | SearchOptions, options?: SearchOptions): Promise<ResultSet> {
    return this.search(queryOrOptions, options)
  }

  /**
   * Stamp request and engine metadata onto a result set. Values an adapter
   * set for these fields are overwritten.
   */
  fillInSearchMetadata(results: ResultSet, request?: SearchRequest): void {
    if (request) {
      results.searchArgs = request
      results.start = request.start
      results.perPage = request.perPage
    }
    results.engineId = this.id
    results.displayConfiguration = this.configuration.forDisplay
  }

  private isContained(error: unknown): boolean {
    return this.containedErrors().some(errorClass => error instanceof errorClass)
  }

  private logOutcome(results: ResultSet, query: string): void {
    logSearchMetrics({
      engine_id: this.id,
      query,
      duration_ms: results.timing,
      results_count: results.length,
      total_items: results.totalItems,
      failed: results.failed(),
      error_kind: results.error?.kind,
    })
  }
}

function upstreamFailure(error: unknown): SearchErrorInfo {
  const message = error instanceof Error ? error.message : String(error)
  const info = error instanceof UpstreamError && error.info ? error.info : message
  return { kind: 'UpstreamFailure', message, cause: error, info }
}
