import { get, isPlainObject, merge } from 'lodash-es'
import z from 'zod'
import type { EngineConfiguration, EngineConfigurationInput } from '@/contracts/search-engine'
import { ConfigurationError } from '@/lib/errors'

export interface ConfigurationRequirements {
  /** Values the caller's configuration is deep-merged over */
  defaultConfiguration?: EngineConfigurationInput
  /** Dotted key paths that must be present and non-null after merging */
  requiredConfiguration?: readonly string[]
}

const standardKeysSchema = z.object({
  id: z.string().min(1).optional(),
  forDisplay: z.object({ decorator: z.string().optional() }).passthrough().default({}),
  unrecognizedSearchField: z.enum(['raise', 'ignore']).optional(),
}).passthrough()

/**
 * Merge an engine's configuration over its type defaults, validate it and
 * freeze it. Throws ConfigurationError; a missing key is a deployment bug.
 */
export function buildEngineConfiguration(
  typeName: string,
  input: EngineConfigurationInput = {},
  requirements: ConfigurationRequirements = {}
): EngineConfiguration {
  const merged: Record<string, unknown> = merge({}, requirements.defaultConfiguration ?? {}, input)

  for (const key of requirements.requiredConfiguration ?? []) {
    const value: unknown = get(merged, key)
    if (value === undefined || value === null) {
      throw new ConfigurationError(`${typeName} requires configuration key ${key}`, key)
    }
  }

  const parsed = standardKeysSchema.safeParse(merged)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration for ${typeName}: ${formatIssues(parsed.error)}`)
  }

  return deepFreeze(parsed.data)
}

/**
 * Read a dotted key path such as `forDisplay.decorator`
 */
export function lookupConfiguration(configuration: EngineConfiguration, path: string): unknown {
  const value: unknown = get(configuration, path)
  return value
}

/**
 * Parse an engine's own configuration keys into a typed settings object.
 */
export function parseEngineSettings<T extends z.ZodTypeAny>(
  schema: T,
  configuration: EngineConfiguration,
  typeName: string
): z.infer<T> {
  const parsed = schema.safeParse(configuration)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration for ${typeName}: ${formatIssues(parsed.error)}`)
  }
  return parsed.data
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
    .join('; ')
}

function deepFreeze<T extends object>(value: T): T {
  const nested: unknown[] = Object.values(value)
  for (const child of nested) {
    if ((Array.isArray(child) || isPlainObject(child)) && typeof child === 'object' && child !== null) {
      deepFreeze(child)
    }
  }
  return Object.freeze(value)
}
