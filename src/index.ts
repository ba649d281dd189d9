/**
 * Chat Digest Core Library
 *
 * Turn an exported WhatsApp chat archive into a structured timeline and a
 * bounded, schema-constrained summary request.
 *
 * Design principle: the core never prints. I/O happens at the archive reader,
 * the media sampler and the summarizer client; everything else is pure.
 *
 * @license AGPL-3.0
 */

// Participant analytics
export {
  type AuthorCount,
  analyzeParticipants,
  NOT_AVAILABLE,
  type ParticipantAnalytics
} from './analytics'
// Archive reader
export {
  ArchiveError,
  type ArchiveListing,
  classifyMediaName,
  getImageMimeType,
  IMAGE_EXTENSIONS,
  openArchive,
  readArchiveEntry,
  VIDEO_EXTENSIONS
} from './archive'
// Stills and video frames
export {
  encodeStill,
  loadMediaPreview,
  type PreviewOptions,
  sampleFrameIndex,
  sampleVideoFrame,
  type StillImage,
  type StillIntent,
  THUMBNAIL_SIZE
} from './media'
// Transcript parsing
export {
  correlateMedia,
  parseLine,
  parseTimestamp,
  parseTranscript,
  TRANSCRIPT_FORMATS,
  type TranscriptFormat
} from './parser'
// Summary session
export {
  DEFAULT_COOLDOWN_MS,
  type SessionOptions,
  type SessionState,
  type SummarizeOptions,
  type SummaryFailure,
  type SummaryFailureKind,
  type SummaryOutcome,
  type SummaryReport,
  SummarySession
} from './session'
// Summary requests and replies
export {
  buildGeminiPayload,
  buildInstructions,
  buildSummaryRequest,
  callGemini,
  createGeminiSummarizer,
  DEFAULT_MEDIA_BUDGET,
  DEFAULT_MODEL,
  DEFAULT_TIMEOUT_MS,
  DETAIL_INSTRUCTIONS,
  describeSummarizerError,
  type GeminiConfig,
  getDetailInstructions,
  isDetailLevel,
  parseSummaryResponse,
  renderTranscript,
  resolveAttachments,
  restrictRequestMedia,
  type SkippedAttachment,
  selectMedia,
  SUMMARY_RESPONSE_SCHEMA,
  type Summarizer
} from './summarizer'
// Timeline
export {
  buildTimeline,
  buildTimelineFromText,
  filterByTimeWindow,
  parseTimeWindow,
  summarizeTimeline,
  TIME_WINDOW_LABELS,
  TIME_WINDOWS
} from './timeline'
// Types
export * from './types'

export const VERSION = '0.1.0'
