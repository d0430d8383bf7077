import type {
  EngineCapabilities,
  EngineConfiguration,
  SearchOptions,
  SearchRequest,
} from '@/contracts/search-engine'
import { InvalidArgumentsError } from '@/lib/errors'
import { isSearchKey, mapSemanticField } from '@/lib/search/capabilities'

export const DEFAULT_PER_PAGE = 10

const CORE_KEYS = new Set(['query', 'searchField', 'semanticSearchField', 'sort', 'page', 'start', 'perPage'])

interface NormalizationContext {
  capabilities: EngineCapabilities
  configuration?: Pick<EngineConfiguration, 'unrecognizedSearchField'>
  /** Used in rejection messages */
  engineName?: string
}

/**
 * Collapse the two calling styles, `search('query', { perPage: 20 })` and
 * `search({ query: 'query', perPage: 20 })`, into one options object.
 */
export function mergeSearchArguments(queryOrOptions: string | SearchOptions, options: SearchOptions = {}): SearchOptions {
  if (typeof queryOrOptions === 'string') {
    return { query: queryOrOptions, ...options }
  }
  return { ...queryOrOptions, ...options }
}

/**
 * Turn caller arguments into the canonical request an engine receives.
 *
 * - `page`, `start` and `perPage` accept numbers or numeric strings; blank means unset
 * - `perPage` defaults to {@link DEFAULT_PER_PAGE}
 * - `page` and `start` are mutually derived: `start = (page - 1) * perPage`
 * - `semanticSearchField` is replaced by the engine's local `searchField`
 *
 * Throws InvalidArgumentsError for conflicting pagination, a page size over
 * the engine maximum, or an unknown field when the effective
 * `unrecognizedSearchField` policy is `raise`.
 */
export function normalizeSearchArguments(args: SearchOptions, context: NormalizationContext): SearchRequest {
  const { capabilities, configuration, engineName = 'search engine' } = context

  let page = coerceInteger(args.page, 'page')
  let start = coerceInteger(args.start, 'start')
  const perPage = coerceInteger(args.perPage, 'perPage') ?? DEFAULT_PER_PAGE

  if (page !== undefined && start !== undefined) {
    throw new InvalidArgumentsError("Can't supply both page and start", 'page')
  }
  if (perPage < 1) {
    throw new InvalidArgumentsError(`perPage must be at least 1, got ${perPage}`, 'perPage')
  }
  if (capabilities.maxPerPage !== undefined && perPage > capabilities.maxPerPage) {
    throw new InvalidArgumentsError(
      `${perPage} is more than maximum perPage of ${capabilities.maxPerPage} for ${engineName}`,
      'perPage'
    )
  }
  if (page !== undefined && page < 1) {
    throw new InvalidArgumentsError(`page must be at least 1, got ${page}`, 'page')
  }
  if (start !== undefined && start < 0) {
    throw new InvalidArgumentsError(`start must not be negative, got ${start}`, 'start')
  }

  if (page !== undefined) {
    start = (page - 1) * perPage
    if (!Number.isSafeInteger(start)) {
      throw new InvalidArgumentsError(`page ${page} of ${perPage} is past the largest supported offset`, 'start')
    }
  } else if (start !== undefined) {
    page = Math.floor(start / perPage) + 1
  } else {
    start = 0
    page = 1
  }

  const raise = effectivePolicy(args, configuration) === 'raise'
  let searchField = isBlank(args.searchField) ? null : String(args.searchField)

  if (!isBlank(args.semanticSearchField)) {
    const semantic = String(args.semanticSearchField)
    const mapped = mapSemanticField(capabilities, semantic)
    if (mapped === undefined && raise) {
      throw new InvalidArgumentsError(`${engineName} does not know about semanticSearchField ${semantic}`, 'semanticSearchField')
    }
    searchField = mapped ?? null
  }

  if (searchField !== null && raise && !isSearchKey(capabilities, searchField)) {
    throw new InvalidArgumentsError(`${engineName} does not know about searchField ${searchField}`, 'searchField')
  }

  const passthrough: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(args)) {
    if (!CORE_KEYS.has(key)) passthrough[key] = value
  }

  return Object.freeze({
    ...passthrough,
    query: String(args.query ?? ''),
    searchField,
    sort: isBlank(args.sort) ? null : String(args.sort),
    page,
    start,
    perPage,
  })
}

/**
 * Request value wins over engine configuration
 */
function effectivePolicy(
  args: SearchOptions,
  configuration: Pick<EngineConfiguration, 'unrecognizedSearchField'> | undefined
): string | undefined {
  if (!isBlank(args.unrecognizedSearchField)) {
    return String(args.unrecognizedSearchField)
  }
  return configuration?.unrecognizedSearchField
}

function coerceInteger(value: unknown, key: string): number | undefined {
  if (isBlank(value)) return undefined

  let result: number
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new InvalidArgumentsError(`${key} must be a finite number, got ${value}`, key)
    }
    result = Math.trunc(value)
  } else if (typeof value === 'string' && /^[+-]?\d+(\.\d+)?$/.test(value.trim())) {
    result = Math.trunc(Number(value.trim()))
  } else {
    throw new InvalidArgumentsError(`${key} must be an integer, got ${JSON.stringify(value)}`, key)
  }

  if (!Number.isSafeInteger(result)) {
    throw new InvalidArgumentsError(`${key} is too large, got ${JSON.stringify(value)}`, key)
  }
  return result
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '')
}
