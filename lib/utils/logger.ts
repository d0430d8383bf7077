/**
 * Structured logging for search execution
 */

import pino from 'pino'
import { serverEnv } from '@/lib/config'

interface SearchMetrics {
  engine_id: string
  query: string
  duration_ms: number
  results_count: number
  total_items?: number
  failed: boolean
  error_kind?: string
}

interface MultiSearchMetrics {
  engines: string[]
  duration_ms: number
  failed_engines: string[]
}

// Create structured logger
const logger = pino({
  level: serverEnv.LOG_LEVEL,
  formatters: {
    level: (label) => {
      return { level: label }
    }
  },
  timestamp: pino.stdTimeFunctions.isoTime
})

export const logSearchMetrics = (metrics: SearchMetrics) => {
  const level = metrics.failed ? 'warn' : 'info'
  logger[level]({
    type: 'search_metrics',
    ...metrics
  }, `Search "${metrics.query}" on ${metrics.engine_id} ${metrics.failed ? 'failed' : `returned ${metrics.results_count} results`}`)
}

export const logMultiSearchMetrics = (metrics: MultiSearchMetrics) => {
  logger.info({
    type: 'multi_search_metrics',
    ...metrics
  }, `Multi-search over ${metrics.engines.length} engines completed in ${metrics.duration_ms}ms`)
}

export const createTimer = () => {
  const start = Date.now()
  return {
    end: () => Date.now() - start,
  }
}

// Error tracking with context
export const logError = (error: unknown, context: Record<string, unknown> = {}) => {
  if (error instanceof Error) {
    logger.error({
      type: 'error',
      error_name: error.name,
      error_message: error.message,
      error_stack: error.stack,
      ...context
    }, `Error: ${error.message}`)
    return
  }
  logger.error({ type: 'error', error_value: String(error), ...context }, 'Error: non-Error value thrown')
}

export type { SearchMetrics, MultiSearchMetrics }

export default logger
