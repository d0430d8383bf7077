/**
 * Search Module Barrel File
 *
 * Engine contract, executor, registry and multi-engine orchestration
 */

export type * from '@/contracts/search-engine'
export {
  defineCapabilities,
  isSearchKey,
  mapSemanticField,
  searchKeys,
  semanticSearchKeys,
  sortKeys,
  type CapabilitiesInput,
} from '@/lib/search/capabilities'
export {
  buildEngineConfiguration,
  lookupConfiguration,
  parseEngineSettings,
  type ConfigurationRequirements,
} from '@/lib/search/engine-configuration'
export { EngineRegistry } from '@/lib/search/engine-registry'
export {
  MultiSearcher,
  runAll,
  type DuplicateIdPolicy,
  type MultiSearcherOptions,
  type MultiSearchResults,
} from '@/lib/search/multi-searcher'
export { DEFAULT_PER_PAGE, mergeSearchArguments, normalizeSearchArguments } from '@/lib/search/normalize-arguments'
export { pickPublicSearchArgs, searchFromPublicParams, type PublicParams } from '@/lib/search/public-args'
export {
  Author,
  ResultItem,
  ResultSet,
  type AuthorInit,
  type ItemFormat,
  type KnownItemFormat,
  type ResultItemInit,
  type ResultPagination,
  type SearchErrorInfo,
  type SearchErrorKind,
} from '@/lib/search/results'
export { DEFAULT_CONTAINED_ERRORS, PUBLIC_SETTABLE_SEARCH_ARGS, SearchEngine } from '@/lib/search/search-engine'
