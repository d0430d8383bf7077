import z from 'zod'
import { ConfigurationError } from '@/lib/errors'

// Process-level settings. Per-engine settings live in each engine's configuration.
const serverSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CONTACT_EMAIL: z.string().email().optional(),
  // Comma-separated engine ids the multi-searcher skips
  SEARCH__DISABLE: z.string().optional(),
  SEARCH_CONCURRENCY: z.coerce.number().int().positive().optional(),
  SEARCH_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(12_000),
})

function parseEnv<T extends z.ZodTypeAny>(schema: T): z.infer<T> {
  const parsed = schema.safeParse(process.env)
  if (!parsed.success) {
    const formatted = parsed.error.issues
      .map(i => `${i.path.join('.')}: ${i.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid environment configuration: ${formatted}`)
  }
  return parsed.data
}

export const serverEnv: z.infer<typeof serverSchema> = parseEnv(serverSchema)

export interface SearchSettings {
  disabledEngines: string[]
  concurrency: number
  httpTimeoutMs: number
}

export const searchSettings: SearchSettings = {
  disabledEngines: (serverEnv.SEARCH__DISABLE ?? '')
    .split(',')
    .map(id => id.trim())
    .filter(Boolean),
  concurrency: serverEnv.SEARCH_CONCURRENCY ?? Number.POSITIVE_INFINITY,
  httpTimeoutMs: serverEnv.SEARCH_HTTP_TIMEOUT_MS,
}
