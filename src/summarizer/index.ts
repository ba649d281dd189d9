/**
 * Summarizer Module
 *
 * Builds bounded summary requests, calls Gemini and validates the reply.
 */

export {
  type ResolveAttachmentsOptions,
  type ResolvedAttachments,
  resolveAttachments,
  type SkippedAttachment
} from './attachments'
export { DETAIL_INSTRUCTIONS, getDetailInstructions, isDetailLevel } from './detail'
export {
  buildGeminiPayload,
  callGemini,
  createGeminiSummarizer,
  DEFAULT_MODEL,
  DEFAULT_TIMEOUT_MS,
  describeSummarizerError,
  type GeminiConfig,
  type GeminiPart,
  type GeminiPayload,
  type Summarizer
} from './gemini'
export { DEFAULT_MEDIA_BUDGET, selectMedia } from './media-selection'
export {
  type BuildSummaryRequestOptions,
  buildInstructions,
  buildSummaryRequest,
  restrictRequestMedia
} from './prompt'
export { parseSummaryResponse } from './response-parser'
export { RESPONSE_SHAPE_TEXT, SUMMARY_RESPONSE_SCHEMA } from './schema'
export { formatTimestamp, IMAGE_PLACEHOLDER, renderTranscript } from './transcript'
