import type { EngineConfigurationInput, SearchEngineType } from '@/contracts/search-engine'
import { ConfigurationError, EngineNotFoundError } from '@/lib/errors'
import { SearchEngine } from '@/lib/search/search-engine'

interface RegisteredEngine {
  engineType: SearchEngineType
  configuration: EngineConfigurationInput
}

/**
 * Engine configurations by id, populated once at startup and passed to
 * whatever needs to resolve an engine id.
 *
 * @example
 * const registry = new EngineRegistry()
 *   .register('openalex', OpenAlexEngine, { mailto: 'library@example.edu' })
 *   .register('arxiv', ArxivEngine)
 *
 * const results = await registry.get('arxiv').search('dark matter')
 */
export class EngineRegistry {
  private readonly entries = new Map<string, RegisteredEngine>()

  register(id: string, engineType: SearchEngineType, configuration: EngineConfigurationInput = {}): this {
    if (!id.trim()) {
      throw new ConfigurationError('Engine id must not be blank', 'id')
    }
    if (this.entries.has(id)) {
      throw new ConfigurationError(`Search engine "${id}" is already registered`, 'id')
    }
    this.entries.set(id, { engineType, configuration })
    return this
  }

  has(id: string): boolean {
    return this.entries.has(id)
  }

  ids(): string[] {
    return [...this.entries.keys()]
  }

  /**
   * A fresh engine built from the registered configuration, with `id` set to
   * the registered id.
   */
  get(id: string): SearchEngine {
    const entry = this.entries.get(id)
    if (!entry) {
      throw new EngineNotFoundError(id)
    }
    return new SearchEngine(new entry.engineType({ ...entry.configuration, id }))
  }

  clear(): void {
    this.entries.clear()
  }
}
