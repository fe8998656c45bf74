import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { HttpResponse } from './http'
import {
  BlockedHttpRequestError,
  emptyResponseError,
  handleHttpError,
  handleNetworkError,
  httpFetch
} from './http'
import type { ApiError } from './types'

// Helper to assert error result and get error
function assertError(result: { ok: boolean; error?: ApiError }): ApiError {
  expect(result.ok).toBe(false)
  if (!result.ok && result.error) return result.error
  throw new Error('Expected error result')
}

function createMockResponse(
  status: number,
  body: string,
  headers: Record<string, string> = {}
): HttpResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: {
      get: (name: string) => headers[name.toLowerCase()] ?? null
    },
    text: async () => body,
    json: async () => JSON.parse(body)
  }
}

describe('HTTP Utilities', () => {
  describe('httpFetch', () => {
    const fetchStub = vi.fn()
    let originalCI: string | undefined

    beforeEach(() => {
      originalCI = process.env.CI
      delete process.env.CI
      fetchStub.mockReset()
      fetchStub.mockResolvedValue(createMockResponse(200, '[]'))
      vi.stubGlobal('fetch', fetchStub)
    })

    afterEach(() => {
      vi.unstubAllGlobals()
      if (originalCI !== undefined) {
        process.env.CI = originalCI
      } else {
        delete process.env.CI
      }
    })

    it('passes headers through to fetch', async () => {
      await httpFetch('https://example.test/search', { headers: { 'User-Agent': 'test-agent' } })

      const [url, init] = fetchStub.mock.calls[0] as [string, RequestInit]
      expect(url).toBe('https://example.test/search')
      expect(init.headers).toEqual({ 'User-Agent': 'test-agent' })
    })

    it('attaches an abort signal when a timeout is given', async () => {
      await httpFetch('https://example.test/search', { timeoutMs: 5000 })

      const [, init] = fetchStub.mock.calls[0] as [string, RequestInit]
      expect(init.signal).toBeInstanceOf(AbortSignal)
    })

    it('sends no signal without a timeout', async () => {
      await httpFetch('https://example.test/search')

      const [, init] = fetchStub.mock.calls[0] as [string, RequestInit]
      expect(init.signal).toBeUndefined()
    })

    it('blocks real requests when tests run in CI', async () => {
      process.env.CI = 'true'

      await expect(httpFetch('https://example.test/search')).rejects.toBeInstanceOf(
        BlockedHttpRequestError
      )
      expect(fetchStub).not.toHaveBeenCalled()
    })
  })

  describe('handleHttpError', () => {
    it('handles 429 rate limit error', async () => {
      const response = createMockResponse(429, 'Too many requests')

      const result = await handleHttpError(response)
      const error = assertError(result)

      expect(error.type).toBe('rate_limit')
      expect(error.message).toBe('Rate limited: Too many requests')
    })

    it('includes retry-after header when present', async () => {
      const response = createMockResponse(429, 'Too many requests', {
        'retry-after': '60'
      })

      const result = await handleHttpError(response)
      const error = assertError(result)

      expect(error.retryAfter).toBe(60)
    })

    it('handles 403 as an auth error', async () => {
      const response = createMockResponse(403, 'Blocked user agent')

      const result = await handleHttpError(response)
      const error = assertError(result)

      expect(error.type).toBe('auth')
      expect(error.message).toBe('Access denied: Blocked user agent')
    })

    it('handles 400 bad request', async () => {
      const response = createMockResponse(400, 'Invalid coordinates')

      const result = await handleHttpError(response)
      const error = assertError(result)

      expect(error.type).toBe('invalid_request')
      expect(error.message).toBe('Bad request: Invalid coordinates')
    })

    it('handles generic HTTP errors', async () => {
      const response = createMockResponse(500, 'Internal server error')

      const result = await handleHttpError(response)
      const error = assertError(result)

      expect(error.type).toBe('network')
      expect(error.message).toBe('API error 500: Internal server error')
    })
  })

  describe('handleNetworkError', () => {
    it('handles Error objects', () => {
      const result = handleNetworkError(new Error('Connection refused'))
      const apiError = assertError(result)

      expect(apiError.type).toBe('network')
      expect(apiError.message).toBe('Network error: Connection refused')
    })

    it('maps timeouts to the timeout type', () => {
      const timeout = new Error('The operation was aborted due to timeout')
      timeout.name = 'TimeoutError'

      const error = assertError(handleNetworkError(timeout))

      expect(error.type).toBe('timeout')
      expect(error.message).toBe('Request timed out: The operation was aborted due to timeout')
    })

    it('maps aborted requests to the timeout type', () => {
      const aborted = new Error('This operation was aborted')
      aborted.name = 'AbortError'

      expect(assertError(handleNetworkError(aborted)).type).toBe('timeout')
    })

    it('handles string errors', () => {
      const error = assertError(handleNetworkError('Something went wrong'))

      expect(error.type).toBe('network')
      expect(error.message).toBe('Network error: Something went wrong')
    })

    it('handles null error', () => {
      expect(assertError(handleNetworkError(null)).type).toBe('network')
    })
  })

  describe('emptyResponseError', () => {
    it('returns invalid_response error type', () => {
      const error = assertError(emptyResponseError())

      expect(error.type).toBe('invalid_response')
      expect(error.message).toBe('Empty response from API')
    })

    it('accepts a custom detail message', () => {
      expect(assertError(emptyResponseError('No route found')).message).toBe('No route found')
    })
  })
})
