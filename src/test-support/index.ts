/**
 * Test Support Module
 *
 * Builders for messages, zip archives and images used across test files.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import JSZip from 'jszip'
import sharp from 'sharp'
import type { ChatMessage } from '../types'

/**
 * Create a ChatMessage with default values for testing.
 */
export function createMessage(
  overrides: Partial<ChatMessage> & { id: number; timestamp: Date }
): ChatMessage {
  return {
    author: 'Alice',
    body: 'hello',
    format: 'android-24h',
    ...overrides
  }
}

export async function createTempDir(prefix = 'chat-digest-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix))
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true })
}

/**
 * Write a zip archive with the given entries and return its path.
 * Entry order is preserved in the archive listing.
 */
export async function createTestArchive(
  dir: string,
  entries: ReadonlyArray<readonly [name: string, content: string | Uint8Array]>,
  filename = 'chat.zip'
): Promise<string> {
  const zip = new JSZip()
  for (const [name, content] of entries) {
    zip.file(name, content)
  }
  const path = join(dir, filename)
  await writeFile(path, await zip.generateAsync({ type: 'nodebuffer' }))
  return path
}

const LOCAL_FILE_HEADER = 0x04034b50

/**
 * Write a deflated zip archive whose named entry has its compressed data
 * overwritten, so listing works but reading that entry fails.
 */
export async function createCorruptArchive(
  dir: string,
  entries: ReadonlyArray<readonly [name: string, content: string | Uint8Array]>,
  corruptName: string,
  filename = 'corrupt.zip'
): Promise<string> {
  const zip = new JSZip()
  for (const [name, content] of entries) {
    zip.file(name, content)
  }
  const buffer = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' })

  let offset = 0
  while (offset + 30 <= buffer.length && buffer.readUInt32LE(offset) === LOCAL_FILE_HEADER) {
    const compressedSize = buffer.readUInt32LE(offset + 18)
    const nameLength = buffer.readUInt16LE(offset + 26)
    const extraLength = buffer.readUInt16LE(offset + 28)
    const name = buffer.toString('utf8', offset + 30, offset + 30 + nameLength)
    const dataStart = offset + 30 + nameLength + extraLength

    if (name === corruptName) {
      buffer.fill(0xff, dataStart, dataStart + compressedSize)
    }
    offset = dataStart + compressedSize
  }

  const path = join(dir, filename)
  await writeFile(path, buffer)
  return path
}

/**
 * Solid-color PNG of the given size.
 */
export async function createTestImage(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 80, b: 40 } }
  })
    .png()
    .toBuffer()
}
