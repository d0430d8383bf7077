import { serverEnv } from '@/lib/config'
import type { EngineRegistry } from '@/lib/search/engine-registry'
import { ArxivEngine } from '@/lib/services/adapters/arxiv'
import { OpenAlexEngine } from '@/lib/services/adapters/openalex'
import logger from '@/lib/utils/logger'

export interface AcademicEngineOptions {
  /** Sent to OpenAlex as `mailto`; OpenAlex is skipped without it */
  contactEmail?: string
}

/**
 * Register the bundled scholarly engines under `openalex` and `arxiv`.
 */
export function registerAcademicEngines(
  registry: EngineRegistry,
  { contactEmail = serverEnv.CONTACT_EMAIL }: AcademicEngineOptions = {}
): EngineRegistry {
  if (contactEmail) {
    registry.register('openalex', OpenAlexEngine, { mailto: contactEmail })
  } else {
    logger.warn('CONTACT_EMAIL not set – skipping OpenAlex')
  }

  registry.register('arxiv', ArxivEngine)
  return registry
}
