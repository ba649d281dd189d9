/**
 * Gemini Summarizer Client
 *
 * Sends a summary request (text plus tagged inline attachments) to Gemini's
 * generateContent endpoint and returns the raw JSON text of the reply.
 */

import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from '../http'
import type { ApiError, Attachment, Result, SummaryRequest } from '../types'

export const DEFAULT_MODEL = 'gemini-2.0-flash'
export const DEFAULT_TIMEOUT_MS = 120_000

const GEMINI_API_URL = 'https://generativelanguage.googleapis.com/v1beta/models'
const MAX_OUTPUT_TOKENS = 8192

export type GeminiPart =
  | { readonly text: string }
  | { readonly inlineData: { readonly mimeType: string; readonly data: string } }

export interface GeminiPayload {
  readonly contents: ReadonlyArray<{ readonly role: 'user'; readonly parts: readonly GeminiPart[] }>
  readonly generationConfig: {
    readonly responseMimeType: 'application/json'
    readonly responseSchema: Readonly<Record<string, unknown>>
    readonly maxOutputTokens: number
  }
}

export interface GeminiConfig {
  readonly apiKey: string
  readonly model?: string | undefined
  readonly timeoutMs?: number | undefined
}

interface GeminiResponse {
  candidates?: Array<{
    content?: {
      parts?: Array<{ text?: string }>
    }
  }>
  promptFeedback?: { blockReason?: string }
}

/**
 * Summarizer boundary used by the session. The Gemini client is the default
 * implementation; tests substitute their own.
 */
export interface Summarizer {
  summarize(
    request: SummaryRequest,
    attachments: readonly Attachment[],
    signal?: AbortSignal
  ): Promise<Result<string>>
}

/**
 * Build the generateContent body: instructions, chat log, then each attachment
 * preceded by its FILENAME tag.
 */
export function buildGeminiPayload(
  request: SummaryRequest,
  attachments: readonly Attachment[]
): GeminiPayload {
  const parts: GeminiPart[] = [
    { text: request.instructions },
    { text: `\n--- CHAT LOG ---\n${request.transcript}\n--- END CHAT LOG ---\n` }
  ]

  if (attachments.length > 0) {
    parts.push({ text: '\n--- MEDIA ---\n' })
    for (const attachment of attachments) {
      parts.push({ text: `FILENAME: ${attachment.filename}` })
      parts.push({
        inlineData: {
          mimeType: attachment.mimeType,
          data: Buffer.from(attachment.data).toString('base64')
        }
      })
    }
  }

  return {
    contents: [{ role: 'user', parts }],
    generationConfig: {
      responseMimeType: 'application/json',
      responseSchema: request.responseSchema,
      maxOutputTokens: MAX_OUTPUT_TOKENS
    }
  }
}

function requestSignal(timeoutMs: number, signal: AbortSignal | undefined): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs)
  return signal ? AbortSignal.any([signal, timeout]) : timeout
}

/**
 * Call Gemini with a prepared payload and return the reply text.
 */
export async function callGemini(
  payload: GeminiPayload,
  config: GeminiConfig,
  signal?: AbortSignal
): Promise<Result<string>> {
  const model = config.model ?? DEFAULT_MODEL
  const url = `${GEMINI_API_URL}/${encodeURIComponent(model)}:generateContent`

  try {
    const response = await httpFetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'x-goog-api-key': config.apiKey },
      body: JSON.stringify(payload),
      signal: requestSignal(config.timeoutMs ?? DEFAULT_TIMEOUT_MS, signal)
    })

    if (!response.ok) return handleHttpError(response)

    const data = (await response.json()) as GeminiResponse
    if (data.promptFeedback?.blockReason) {
      return {
        ok: false,
        error: {
          type: 'invalid_response',
          message: `Request blocked: ${data.promptFeedback.blockReason}`
        }
      }
    }

    const text = (data.candidates?.[0]?.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .join('')
    return text ? { ok: true, value: text } : emptyResponseError()
  } catch (error) {
    return handleNetworkError(error)
  }
}

export function createGeminiSummarizer(config: GeminiConfig): Summarizer {
  return {
    summarize: (request, attachments, signal) =>
      callGemini(buildGeminiPayload(request, attachments), config, signal)
  }
}

/**
 * User-facing explanation for a failed summarizer call. Raw error text is
 * for verbose logs only.
 */
export function describeSummarizerError(error: ApiError): string {
  switch (error.type) {
    case 'auth':
      return 'The Gemini API key is not valid. Check the key and try again.'
    case 'unsupported_model':
      return 'The configured Gemini model is incorrect or not supported by this API version. Choose a different model.'
    default:
      return 'The summary could not be generated because the Gemini API request failed. Please try again later.'
  }
}
