import { describe, it, expect, vi, afterEach } from 'vitest'
import { z } from 'zod'
import {
  DecodeError,
  HttpStatusError,
  MalformedResponseError,
  UpstreamConnectionError,
  UpstreamTimeoutError,
} from '@/lib/errors'
import { fetchJSON, fetchText } from '@/lib/services/http'

const schema = z.object({ count: z.number() })

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (error) {
    return error
  }
  throw new Error('expected the promise to reject')
}

/** A 200 response whose body sends one chunk and then stalls, or fails with `failure`. */
function partialBodyResponse(failure?: Error): Response {
  return new Response(new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('<feed'))
      if (failure) controller.error(failure)
    },
  }))
}

describe('http helpers', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('returns validated JSON', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('{"count":3,"extra":true}')))

    await expect(fetchJSON('https://catalog.example.edu/api', schema, { label: 'Catalog' }))
      .resolves.toEqual({ count: 3 })
  })

  it('passes request options through to fetch', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('plain body'))
    vi.stubGlobal('fetch', fetchMock)

    const body = await fetchText('https://catalog.example.edu/feed', {
      label: 'Catalog',
      headers: { Accept: 'application/atom+xml' },
    })

    expect(body).toBe('plain body')
    expect(fetchMock).toHaveBeenCalledWith('https://catalog.example.edu/feed', expect.objectContaining({
      headers: { Accept: 'application/atom+xml' },
    }))
  })

  it('raises a decode error for a body that is not JSON', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('<html>oops</html>')))

    const error = await captureError(fetchJSON('https://catalog.example.edu/api', schema, { label: 'Catalog' }))

    expect(error).toBeInstanceOf(DecodeError)
    expect(error).toMatchObject({ message: 'Catalog returned invalid JSON' })
  })

  it('raises a malformed response error when the shape is wrong', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('{"count":"three"}')))

    const error = await captureError(fetchJSON('https://catalog.example.edu/api', schema, { label: 'Catalog' }))

    expect(error).toBeInstanceOf(MalformedResponseError)
    expect(error).toMatchObject({
      message: 'Catalog returned an unexpected response',
      info: 'count: Expected number, received string',
    })
  })

  it('raises an HTTP status error with the body as detail', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(
      new Response('maintenance window', { status: 503, statusText: 'Service Unavailable' })
    ))

    const error = await captureError(fetchText('https://catalog.example.edu/feed', { label: 'Catalog' }))

    expect(error).toBeInstanceOf(HttpStatusError)
    expect(error).toMatchObject({
      message: 'Catalog responded with HTTP 503 Service Unavailable',
      status: 503,
      info: 'maintenance window',
    })
  })

  it('raises a timeout error when the request is aborted', async () => {
    vi.stubGlobal('fetch', vi.fn((_url: string, init: RequestInit) => new Promise((_resolve, reject) => {
      init.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')))
    })))

    const error = await captureError(fetchText('https://catalog.example.edu/feed', { label: 'Catalog', timeoutMs: 5 }))

    expect(error).toBeInstanceOf(UpstreamTimeoutError)
    expect(error).toMatchObject({ message: 'Catalog timed out after 5ms', service: 'Catalog' })
  })

  it('raises a connection error when the request cannot be made', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')))

    const error = await captureError(fetchText('https://catalog.example.edu/feed', { label: 'Catalog' }))

    expect(error).toBeInstanceOf(UpstreamConnectionError)
    expect(error).toMatchObject({ message: 'Catalog request failed: fetch failed' })
  })

  it('times out when the body stalls after the headers arrive', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(partialBodyResponse()))

    const error = await captureError(fetchText('https://catalog.example.edu/feed', { label: 'Catalog', timeoutMs: 20 }))

    expect(error).toBeInstanceOf(UpstreamTimeoutError)
    expect(error).toMatchObject({ message: 'Catalog timed out after 20ms' })
  })

  it('times out a stalled JSON body as well', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(partialBodyResponse()))

    const error = await captureError(fetchJSON('https://catalog.example.edu/api', schema, { label: 'Catalog', timeoutMs: 20 }))

    expect(error).toBeInstanceOf(UpstreamTimeoutError)
  })

  it('raises a connection error when the body is cut off mid-read', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(partialBodyResponse(new TypeError('terminated'))))

    const error = await captureError(fetchText('https://catalog.example.edu/feed', { label: 'Catalog' }))

    expect(error).toBeInstanceOf(UpstreamConnectionError)
    expect(error).toMatchObject({ message: 'Catalog request failed: terminated', service: 'Catalog' })
  })
})
