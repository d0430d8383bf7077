import { describe, it, expect } from 'vitest'
import { EngineRegistry } from '@/lib/search/engine-registry'
import { registerAcademicEngines } from '@/lib/services/academic-engines'

describe('registerAcademicEngines', () => {
  it('registers OpenAlex and arXiv', () => {
    const registry = registerAcademicEngines(new EngineRegistry(), { contactEmail: 'library@example.edu' })

    expect(registry.ids()).toEqual(['openalex', 'arxiv'])
    expect(registry.get('openalex').configuration.mailto).toBe('library@example.edu')
  })

  it('falls back to CONTACT_EMAIL from the environment', () => {
    const registry = registerAcademicEngines(new EngineRegistry())
    expect(registry.get('openalex').configuration.mailto).toBe('library@example.edu')
  })

  it('skips OpenAlex without a contact address', () => {
    const registry = registerAcademicEngines(new EngineRegistry(), { contactEmail: '' })
    expect(registry.ids()).toEqual(['arxiv'])
  })
})
