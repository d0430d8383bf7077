import { z } from 'zod'
import type { SearchOptions } from '@/contracts/search-engine'
import type { EngineRegistry } from '@/lib/search/engine-registry'
import type { ResultSet } from '@/lib/search/results'
import { PUBLIC_SETTABLE_SEARCH_ARGS } from '@/lib/search/search-engine'
import logger from '@/lib/utils/logger'

/**
 * Values accepted from untrusted input: strings (as from a query string) or
 * numbers (as from a JSON body). Anything structured is dropped.
 */
export const PublicArgValueSchema = z.union([
  z.string().max(1000),
  z.number().finite(),
])

export type PublicParams = URLSearchParams | Record<string, unknown>

/**
 * Keep only whitelisted keys with primitive values. Use this on any input
 * that crosses a trust boundary before handing it to `search`; flags such as
 * elevated access must come from server-side context instead.
 */
export function pickPublicSearchArgs(
  params: PublicParams,
  allowed: readonly string[] = PUBLIC_SETTABLE_SEARCH_ARGS
): SearchOptions {
  const source: Record<string, unknown> = params instanceof URLSearchParams
    ? Object.fromEntries(params)
    : params

  const picked: SearchOptions = {}
  for (const key of allowed) {
    if (!Object.prototype.hasOwnProperty.call(source, key)) continue

    const parsed = PublicArgValueSchema.safeParse(source[key])
    if (parsed.success) {
      picked[key] = parsed.data
    } else {
      logger.debug({ key }, 'Dropping non-primitive public search argument')
    }
  }
  return picked
}

/**
 * Run a search for a registered engine straight from request parameters,
 * e.g. a results panel loaded over AJAX.
 */
export function searchFromPublicParams(
  registry: EngineRegistry,
  engineId: string,
  params: PublicParams
): Promise<ResultSet> {
  const engine = registry.get(engineId)
  return engine.search(pickPublicSearchArgs(params, engine.publicSettableSearchArgs()))
}
