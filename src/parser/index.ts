/**
 * Parser Module
 *
 * Parse WhatsApp transcripts into structured messages and link their media.
 */

export { correlateMedia } from './correlate'
export { parseTimestamp, TRANSCRIPT_FORMATS, type TranscriptFormat } from './formats'
export { cleanBody, isMediaOmitted, parseLine, parseTranscript } from './whatsapp'
