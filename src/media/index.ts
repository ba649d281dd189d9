/**
 * Media Module
 *
 * Stills for previews and summarizer attachments.
 */

export { SAMPLE_POSITION, sampleFrameIndex, sampleVideoFrame } from './frame-sampler'
export { loadMediaPreview, type PreviewOptions } from './preview'
export { encodeStill, type StillImage, type StillIntent, THUMBNAIL_SIZE } from './still'
