/**
 * Archive Reader
 *
 * Opens an exported WhatsApp .zip, selects the transcript and lists the bundled
 * media. The archive is reopened for every entry read rather than held open.
 */

import { readFile } from 'node:fs/promises'
import JSZip from 'jszip'
import type { MediaKind } from '../types'

export const TRANSCRIPT_EXTENSION = '.txt'

export const IMAGE_EXTENSIONS: readonly string[] = ['.jpg', '.jpeg', '.png', '.webp']
export const VIDEO_EXTENSIONS: readonly string[] = ['.mp4']

const IMAGE_MIME_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.webp': 'image/webp'
}

/**
 * Raised when the container cannot be opened or holds no transcript.
 * Fatal to the current load.
 */
export class ArchiveError extends Error {
  readonly archivePath: string

  constructor(archivePath: string, message: string, options?: { cause?: unknown }) {
    super(`${message}: ${archivePath}`, options)
    this.name = 'ArchiveError'
    this.archivePath = archivePath
  }
}

export interface ArchiveListing {
  readonly path: string
  readonly transcriptName: string
  readonly transcript: string
  /** Image and video entry names, in archive listing order */
  readonly mediaNames: readonly string[]
}

function extensionOf(name: string): string {
  const dot = name.lastIndexOf('.')
  return dot === -1 ? '' : name.slice(dot).toLowerCase()
}

/**
 * Classify an entry name by extension (case-insensitive).
 */
export function classifyMediaName(name: string): MediaKind | null {
  const ext = extensionOf(name)
  if (IMAGE_EXTENSIONS.includes(ext)) return 'image'
  if (VIDEO_EXTENSIONS.includes(ext)) return 'video'
  return null
}

/**
 * Get the MIME type for a supported image name, or null.
 */
export function getImageMimeType(name: string): string | null {
  return IMAGE_MIME_TYPES[extensionOf(name)] ?? null
}

async function loadZip(path: string): Promise<JSZip> {
  let bytes: Buffer
  try {
    bytes = await readFile(path)
  } catch (error) {
    throw new ArchiveError(path, 'Could not read archive', { cause: error })
  }

  try {
    return await JSZip.loadAsync(new Uint8Array(bytes))
  } catch (error) {
    throw new ArchiveError(path, 'Not a valid zip archive', { cause: error })
  }
}

function listFileEntries(zip: JSZip): string[] {
  return Object.values(zip.files)
    .filter((entry) => !entry.dir)
    .map((entry) => entry.name)
}

/**
 * Open an archive, read its transcript and enumerate media entries.
 *
 * @throws ArchiveError when the file is unreadable, not a zip, or has no transcript
 */
export async function openArchive(path: string): Promise<ArchiveListing> {
  const zip = await loadZip(path)
  const names = listFileEntries(zip)

  const transcriptName = names.find((name) => name.endsWith(TRANSCRIPT_EXTENSION))
  if (!transcriptName) {
    throw new ArchiveError(path, 'No transcript (.txt) found in archive')
  }

  const entry = zip.file(transcriptName)
  if (!entry) {
    throw new ArchiveError(path, `Could not read transcript ${transcriptName}`)
  }

  const transcript = (await entry.async('string')).replace(/^\uFEFF/, '')
  const mediaNames = names.filter((name) => classifyMediaName(name) !== null)

  return { path, transcriptName, transcript, mediaNames }
}

/**
 * Read a single entry's bytes. Returns null if the archive or entry is missing
 * or the entry cannot be decompressed.
 */
export async function readArchiveEntry(path: string, name: string): Promise<Uint8Array | null> {
  let zip: JSZip
  try {
    zip = await loadZip(path)
  } catch {
    return null
  }

  const entry = zip.file(name)
  if (!entry || entry.dir) {
    return null
  }

  try {
    return await entry.async('uint8array')
  } catch {
    // Corrupt compressed data
    return null
  }
}
