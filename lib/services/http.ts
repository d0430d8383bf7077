import type { z } from 'zod'
import { searchSettings } from '@/lib/config'
import {
  AppError,
  DecodeError,
  HttpStatusError,
  MalformedResponseError,
  UpstreamConnectionError,
  UpstreamTimeoutError,
} from '@/lib/errors'

export interface FetchOptions extends RequestInit {
  /** Source name used in error messages */
  label: string
  timeoutMs?: number
}

/**
 * fetch with a timeout that also covers reading the body. Transport
 * failures are mapped onto the upstream error classes the search executor
 * contains; a non-2xx status becomes an HttpStatusError.
 */
export async function fetchWithTimeout<T>(
  url: string,
  opts: FetchOptions,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const { label, timeoutMs = searchSettings.httpTimeoutMs, ...init } = opts
  const controller = new AbortController()
  // rejects on abort, including while the body is still streaming
  const deadline = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => reject(new UpstreamTimeoutError(`${label} timed out after ${timeoutMs}ms`, label)),
      { once: true }
    )
  })
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

  const exchange = async (): Promise<T> => {
    const response = await fetch(url, { ...init, signal: controller.signal })
    if (!response.ok) {
      throw new HttpStatusError(
        `${label} responded with HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
        response.status,
        label,
        { info: await readErrorDetail(response) }
      )
    }
    return read(response)
  }

  try {
    return await Promise.race([exchange(), deadline])
  } catch (error) {
    if (error instanceof AppError) throw error
    if (controller.signal.aborted) {
      throw new UpstreamTimeoutError(`${label} timed out after ${timeoutMs}ms`, label, { cause: error })
    }
    throw new UpstreamConnectionError(
      `${label} request failed: ${error instanceof Error ? error.message : String(error)}`,
      label,
      { cause: error }
    )
  } finally {
    clearTimeout(timeoutId)
  }
}

/**
 * GET a JSON document and validate its shape.
 */
export async function fetchJSON<T extends z.ZodTypeAny>(
  url: string,
  schema: T,
  opts: FetchOptions
): Promise<z.infer<T>> {
  const body = await fetchWithTimeout(url, opts, response => response.text())

  let data: unknown
  try {
    data = JSON.parse(body)
  } catch (error) {
    throw new DecodeError(`${opts.label} returned invalid JSON`, opts.label, { cause: error })
  }

  return validateResponse(schema, data, opts.label)
}

/**
 * Check a decoded body against the shape an engine expects. Throws
 * MalformedResponseError listing the first few mismatches.
 */
export function validateResponse<T extends z.ZodTypeAny>(schema: T, data: unknown, label: string): z.infer<T> {
  const parsed = schema.safeParse(data)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .slice(0, 3)
      .map(i => `${i.path.join('.')}: ${i.message}`)
      .join('; ')
    throw new MalformedResponseError(`${label} returned an unexpected response`, label, {
      cause: parsed.error,
      info: detail,
    })
  }
  return parsed.data
}

export function fetchText(url: string, opts: FetchOptions): Promise<string> {
  return fetchWithTimeout(url, opts, response => response.text())
}

async function readErrorDetail(response: Response): Promise<string | undefined> {
  try {
    const text = (await response.text()).trim()
    return text ? text.slice(0, 500) : undefined
  } catch {
    // detail is optional; the status alone is reported
    return undefined
  }
}
