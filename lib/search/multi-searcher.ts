import pLimit from 'p-limit'
import type { SearchOptions } from '@/contracts/search-engine'
import { searchSettings } from '@/lib/config'
import { ConfigurationError, RunInProgressError, errorMessage, isOperationalError } from '@/lib/errors'
import type { EngineRegistry } from '@/lib/search/engine-registry'
import { ResultSet } from '@/lib/search/results'
import type { SearchEngine } from '@/lib/search/search-engine'
import logger, { createTimer, logError, logMultiSearchMetrics } from '@/lib/utils/logger'

export type DuplicateIdPolicy = 'raise' | 'last-write-wins'

export interface MultiSearcherOptions {
  /** Resolves `engineIds` */
  registry?: EngineRegistry
  engineIds?: readonly string[]
  engines?: readonly SearchEngine[]
  /** Max engines searched at once (default: unbounded, or SEARCH_CONCURRENCY) */
  concurrency?: number
  /** Two engines with the same id: configuration error, or keep the later result */
  onDuplicateId?: DuplicateIdPolicy
  /** Engine ids to skip; also honoured via env SEARCH__DISABLE */
  disabled?: readonly string[]
}

/** Result sets keyed by engine id */
export type MultiSearchResults = Record<string, ResultSet>

interface SearchTask {
  engineId: string
  promise: Promise<ResultSet>
}

interface SearchRun {
  tasks: SearchTask[]
  timer: ReturnType<typeof createTimer>
}

/**
 * Runs one search per engine concurrently and collects the results by
 * engine id.
 *
 * ```ts
 * const searcher = new MultiSearcher({ registry, engineIds: ['openalex', 'arxiv'] })
 * searcher.start('graphene', { perPage: 5 })
 * const results = await searcher.results()
 * ```
 *
 * `results()` can be collected once per `start()`; a second call returns an
 * empty object. One engine failing never keeps the others from being collected.
 */
export class MultiSearcher {
  private readonly engines: SearchEngine[] = []
  private readonly concurrency: number
  private readonly onDuplicateId: DuplicateIdPolicy
  private readonly disabled: Set<string>
  private run: SearchRun | null = null

  constructor(options: MultiSearcherOptions = {}) {
    this.concurrency = options.concurrency ?? searchSettings.concurrency
    this.onDuplicateId = options.onDuplicateId ?? 'raise'
    this.disabled = new Set([...(options.disabled ?? []), ...searchSettings.disabledEngines])

    const { registry, engineIds = [] } = options
    if (engineIds.length > 0 && !registry) {
      throw new ConfigurationError('A registry is required to resolve engine ids', 'registry')
    }
    for (const id of engineIds) {
      if (registry) this.addEngine(registry.get(id))
    }
    for (const engine of options.engines ?? []) {
      this.addEngine(engine)
    }
  }

  /**
   * Add an already-built engine.
   */
  addEngine(engine: SearchEngine): this {
    const duplicate = this.engines.some(existing => existing.id === engine.id)
    if (duplicate) {
      if (this.onDuplicateId === 'raise') {
        throw new ConfigurationError(`Duplicate search engine id "${engine.id}" in one multi-search`, 'id')
      }
      logger.warn({ engine_id: engine.id }, `Duplicate engine id "${engine.id}"; the later engine's results win`)
    }
    this.engines.push(engine)
    return this
  }

  engineIds(): string[] {
    return this.engines.map(engine => engine.id)
  }

  /**
   * Start every engine's search without waiting for any of them. Arguments
   * are the same as {@link SearchEngine.search}.
   */
  start(queryOrOptions: string | SearchOptions, options?: SearchOptions): this {
    if (this.run) {
      throw new RunInProgressError()
    }

    const timer = createTimer()
    const limit = pLimit(this.concurrency)
    const tasks = this.engines
      .filter(engine => !this.disabled.has(engine.id))
      .map(engine => ({
        engineId: engine.id,
        // Settles either way, so a failure waiting for collection is never unhandled
        promise: limit(() => engine.search(queryOrOptions, options)).then(
          results => results,
          (reason: unknown) => this.uncontainedFailure(engine, reason)
        ),
      }))
    this.run = { tasks, timer }
    return this
  }

  /**
   * Wait for every started search and return results keyed by engine id.
   * Errors that escaped an engine's own containment come back as failed
   * result sets for that engine.
   */
  async results(): Promise<MultiSearchResults> {
    const run = this.run
    this.run = null
    if (!run) return {}

    const { tasks, timer } = run
    const collected = await Promise.all(tasks.map(task => task.promise))

    const results: MultiSearchResults = {}
    collected.forEach((resultSet, index) => {
      results[tasks[index].engineId] = resultSet
    })

    logMultiSearchMetrics({
      engines: tasks.map(task => task.engineId),
      duration_ms: timer.end(),
      failed_engines: Object.keys(results).filter(id => results[id].failed()),
    })
    return results
  }

  private uncontainedFailure(engine: SearchEngine, reason: unknown): ResultSet {
    // an operational error the engine left uncontained is logged as a warning
    if (isOperationalError(reason)) {
      logger.warn({
        engine_id: engine.id,
        stage: 'multi_search',
        error_name: reason instanceof Error ? reason.name : undefined,
        error_message: errorMessage(reason, 'unknown error'),
      }, `Search on ${engine.id} failed outside its contained errors`)
    } else {
      logError(reason, { engine_id: engine.id, stage: 'multi_search' })
    }
    const failed = ResultSet.fromError({
      kind: 'UpstreamFailure',
      message: errorMessage(reason, `Search on ${engine.id} failed`),
      cause: reason,
    })
    engine.fillInSearchMetadata(failed)
    return failed
  }
}

/**
 * Search every engine concurrently and wait for all of them.
 */
export async function runAll(
  engines: readonly SearchEngine[],
  queryOrOptions: string | SearchOptions,
  options?: SearchOptions,
  searcherOptions: Omit<MultiSearcherOptions, 'engines' | 'engineIds' | 'registry'> = {}
): Promise<MultiSearchResults> {
  return new MultiSearcher({ ...searcherOptions, engines }).start(queryOrOptions, options).results()
}
