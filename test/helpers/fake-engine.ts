import type {
  EngineConfiguration,
  EngineConfigurationInput,
  ErrorClass,
  SearchEngineAdapter,
  SearchRequest,
} from '@/contracts/search-engine'
import { defineCapabilities } from '@/lib/search/capabilities'
import { buildEngineConfiguration } from '@/lib/search/engine-configuration'
import { ResultItem, ResultSet } from '@/lib/search/results'
import { SearchEngine } from '@/lib/search/search-engine'

export const FAKE_CAPABILITIES = defineCapabilities({
  maxPerPage: 50,
  searchFieldDefinitions: {
    title: { label: 'Title' },
    au: { label: 'Author' },
  },
  semanticSearchMap: {
    title: 'title',
    author: 'au',
  },
  sortDefinitions: {
    relevance: { label: 'Relevance' },
    date_desc: { label: 'Newest first' },
  },
})

export interface FakeBehaviour {
  titles?: string[]
  totalItems?: number
  /** Thrown from searchImplementation */
  error?: unknown
  /** Awaited before answering */
  gate?: Promise<void>
  containedErrors?: readonly ErrorClass[]
  publicSearchArgs?: readonly string[]
}

/**
 * In-process engine that records every request it receives.
 */
export class FakeEngine implements SearchEngineAdapter {
  readonly typeName = 'FakeEngine'
  readonly capabilities = FAKE_CAPABILITIES
  readonly configuration: EngineConfiguration
  readonly containedErrors?: readonly ErrorClass[]
  readonly publicSearchArgs?: readonly string[]
  readonly requests: SearchRequest[] = []

  constructor(configuration: EngineConfigurationInput = {}, private readonly behaviour: FakeBehaviour = {}) {
    this.configuration = buildEngineConfiguration(this.typeName, configuration)
    this.containedErrors = behaviour.containedErrors
    this.publicSearchArgs = behaviour.publicSearchArgs
  }

  async searchImplementation(request: SearchRequest): Promise<ResultSet> {
    this.requests.push(request)
    if (this.behaviour.gate) await this.behaviour.gate
    if (this.behaviour.error !== undefined) throw this.behaviour.error

    const items = (this.behaviour.titles ?? []).map(title => new ResultItem({ title }))
    return new ResultSet(items, this.behaviour.totalItems)
  }
}

export function fakeEngine(
  id: string,
  behaviour: FakeBehaviour = {},
  configuration: EngineConfigurationInput = {}
): { engine: SearchEngine; adapter: FakeEngine } {
  const adapter = new FakeEngine({ ...configuration, id }, behaviour)
  return { engine: new SearchEngine(adapter), adapter }
}

/** A promise that stays pending until `open()` is called */
export function createGate(): { promise: Promise<void>; open: () => void } {
  let resolvePromise: () => void = () => {}
  const promise = new Promise<void>(resolve => {
    resolvePromise = resolve
  })
  return { promise, open: () => resolvePromise() }
}
