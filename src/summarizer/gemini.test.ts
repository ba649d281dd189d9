import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { Attachment, SummaryRequest } from '../types'

// Use vi.hoisted to create mock before module mocking
const mockFetch = vi.hoisted(() => vi.fn())

vi.mock('../http', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../http')>()),
  httpFetch: mockFetch
}))

import {
  buildGeminiPayload,
  callGemini,
  createGeminiSummarizer,
  DEFAULT_MODEL,
  describeSummarizerError,
  type GeminiPayload
} from './gemini'
import { SUMMARY_RESPONSE_SCHEMA } from './schema'

const request: SummaryRequest = {
  detailLevel: 'standard',
  instructions: 'Summarize.',
  transcript: '[2024-01-01 09:00] Alice: hi',
  media: { filenames: ['IMG-1.jpg'], images: ['IMG-1.jpg'], videos: [] },
  responseSchema: SUMMARY_RESPONSE_SCHEMA
}

const attachment: Attachment = {
  filename: 'IMG-1.jpg',
  kind: 'image',
  mimeType: 'image/jpeg',
  data: new Uint8Array([1, 2, 3])
}

function createMockResponse(status: number, body: unknown) {
  const text = typeof body === 'string' ? body : JSON.stringify(body)
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: { get: () => null },
    text: async () => text,
    json: async () => JSON.parse(text)
  }
}

function geminiReply(...texts: string[]) {
  return { candidates: [{ content: { parts: texts.map((text) => ({ text })) } }] }
}

const payload: GeminiPayload = buildGeminiPayload(request, [])

describe('Gemini client', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  describe('buildGeminiPayload', () => {
    it('sends instructions and the chat log without media', () => {
      expect(payload.contents[0]?.parts).toEqual([
        { text: 'Summarize.' },
        { text: '\n--- CHAT LOG ---\n[2024-01-01 09:00] Alice: hi\n--- END CHAT LOG ---\n' }
      ])
      expect(payload.generationConfig.responseMimeType).toBe('application/json')
      expect(payload.generationConfig.responseSchema).toBe(SUMMARY_RESPONSE_SCHEMA)
    })

    it('tags each attachment with its filename', () => {
      const parts = buildGeminiPayload(request, [attachment]).contents[0]?.parts ?? []

      expect(parts.slice(2)).toEqual([
        { text: '\n--- MEDIA ---\n' },
        { text: 'FILENAME: IMG-1.jpg' },
        { inlineData: { mimeType: 'image/jpeg', data: 'AQID' } }
      ])
    })
  })

  describe('callGemini', () => {
    it('posts to the model endpoint and joins the reply text', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse(200, geminiReply('{"a"', ':1}')))

      const result = await callGemini(payload, { apiKey: 'test-key' })

      expect(result).toEqual({ ok: true, value: '{"a":1}' })
      const [url, init] = mockFetch.mock.calls[0] ?? []
      expect(url).toBe(
        `https://generativelanguage.googleapis.com/v1beta/models/${DEFAULT_MODEL}:generateContent`
      )
      expect(init).toMatchObject({
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'x-goog-api-key': 'test-key' },
        body: JSON.stringify(payload)
      })
      expect(init?.signal).toBeInstanceOf(AbortSignal)
    })

    it('uses the configured model', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse(200, geminiReply('ok')))

      await callGemini(payload, { apiKey: 'test-key', model: 'gemini-1.5-pro' })

      expect(mockFetch.mock.calls[0]?.[0]).toBe(
        'https://generativelanguage.googleapis.com/v1beta/models/gemini-1.5-pro:generateContent'
      )
    })

    it('classifies an invalid key', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse(400, 'API key not valid.'))

      const result = await callGemini(payload, { apiKey: 'test-key' })

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.type).toBe('auth')
        expect(describeSummarizerError(result.error)).toBe(
          'The Gemini API key is not valid. Check the key and try again.'
        )
      }
    })

    it('classifies an unknown model', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse(404, 'models/x is not found'))

      const result = await callGemini(payload, { apiKey: 'test-key', model: 'x' })

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.type).toBe('unsupported_model')
        expect(describeSummarizerError(result.error)).toBe(
          'The configured Gemini model is incorrect or not supported by this API version. Choose a different model.'
        )
      }
    })

    it('maps a timeout to the generic message', async () => {
      const timeout = new Error('The operation was aborted due to timeout')
      timeout.name = 'TimeoutError'
      mockFetch.mockRejectedValueOnce(timeout)

      const result = await callGemini(payload, { apiKey: 'test-key', timeoutMs: 10 })

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(result.error.type).toBe('timeout')
        expect(describeSummarizerError(result.error)).toBe(
          'The summary could not be generated because the Gemini API request failed. Please try again later.'
        )
      }
    })

    it('reports a blocked prompt', async () => {
      mockFetch.mockResolvedValueOnce(
        createMockResponse(200, { promptFeedback: { blockReason: 'SAFETY' } })
      )

      const result = await callGemini(payload, { apiKey: 'test-key' })

      expect(result).toEqual({
        ok: false,
        error: { type: 'invalid_response', message: 'Request blocked: SAFETY' }
      })
    })

    it('reports an empty reply', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse(200, { candidates: [] }))

      const result = await callGemini(payload, { apiKey: 'test-key' })

      expect(result).toEqual({
        ok: false,
        error: { type: 'invalid_response', message: 'Empty response from API' }
      })
    })
  })

  describe('createGeminiSummarizer', () => {
    it('builds the payload from the request and attachments', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse(200, geminiReply('{}')))
      const summarizer = createGeminiSummarizer({ apiKey: 'test-key' })

      const result = await summarizer.summarize(request, [attachment])

      expect(result).toEqual({ ok: true, value: '{}' })
      const body = mockFetch.mock.calls[0]?.[1]?.body
      expect(body).toBe(JSON.stringify(buildGeminiPayload(request, [attachment])))
    })

    it('forwards the caller abort signal', async () => {
      mockFetch.mockResolvedValueOnce(createMockResponse(200, geminiReply('{}')))
      const controller = new AbortController()
      const summarizer = createGeminiSummarizer({ apiKey: 'test-key' })

      await summarizer.summarize(request, [], controller.signal)
      controller.abort()

      const signal: AbortSignal | undefined = mockFetch.mock.calls[0]?.[1]?.signal
      expect(signal?.aborted).toBe(true)
    })
  })
})
