import type { EngineCapabilities, FieldDefinition } from '@/contracts/search-engine'
import { ConfigurationError } from '@/lib/errors'

export interface CapabilitiesInput {
  maxPerPage?: number
  searchFieldDefinitions?: Record<string, FieldDefinition>
  semanticSearchMap?: Record<string, string>
  sortDefinitions?: Record<string, FieldDefinition>
}

/**
 * Build a frozen capability set for an engine type. Called once per type at
 * module load, so a bad declaration fails before any search runs.
 */
export function defineCapabilities(input: CapabilitiesInput = {}): EngineCapabilities {
  const { maxPerPage } = input
  if (maxPerPage !== undefined && !(Number.isInteger(maxPerPage) && maxPerPage > 0)) {
    throw new ConfigurationError(`maxPerPage must be a positive integer, got ${maxPerPage}`, 'maxPerPage')
  }

  const searchFieldDefinitions = Object.freeze({ ...input.searchFieldDefinitions })
  const semanticSearchMap = Object.freeze({ ...input.semanticSearchMap })

  for (const [semantic, field] of Object.entries(semanticSearchMap)) {
    if (!hasOwn(searchFieldDefinitions, field)) {
      throw new ConfigurationError(
        `Semantic search field "${semantic}" maps to undeclared search field "${field}"`,
        'semanticSearchMap'
      )
    }
  }

  return Object.freeze({
    maxPerPage,
    searchFieldDefinitions,
    semanticSearchMap,
    sortDefinitions: Object.freeze({ ...input.sortDefinitions }),
  })
}

export function searchKeys(capabilities: EngineCapabilities): string[] {
  return Object.keys(capabilities.searchFieldDefinitions)
}

export function semanticSearchKeys(capabilities: EngineCapabilities): string[] {
  return Object.keys(capabilities.semanticSearchMap)
}

export function sortKeys(capabilities: EngineCapabilities): string[] {
  return Object.keys(capabilities.sortDefinitions)
}

export function isSearchKey(capabilities: EngineCapabilities, key: string): boolean {
  return hasOwn(capabilities.searchFieldDefinitions, key)
}

/**
 * Local field key for a semantic field name, or undefined when unsupported
 */
export function mapSemanticField(capabilities: EngineCapabilities, semantic: string): string | undefined {
  return hasOwn(capabilities.semanticSearchMap, semantic)
    ? capabilities.semanticSearchMap[semantic]
    : undefined
}

function hasOwn(record: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key)
}
