import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  createCorruptArchive,
  createTempDir,
  createTestArchive,
  removeTempDir
} from '../test-support'
import {
  ArchiveError,
  classifyMediaName,
  getImageMimeType,
  openArchive,
  readArchiveEntry
} from './index'

describe('Archive Reader', () => {
  let dir: string

  beforeEach(async () => {
    dir = await createTempDir()
  })

  afterEach(async () => {
    await removeTempDir(dir)
  })

  describe('classifyMediaName', () => {
    it('classifies images and videos case-insensitively', () => {
      expect(classifyMediaName('IMG-0001.jpg')).toBe('image')
      expect(classifyMediaName('photo.JPEG')).toBe('image')
      expect(classifyMediaName('shot.png')).toBe('image')
      expect(classifyMediaName('sticker.webp')).toBe('image')
      expect(classifyMediaName('VID-0001.MP4')).toBe('video')
    })

    it('returns null for other entries', () => {
      expect(classifyMediaName('voice.opus')).toBeNull()
      expect(classifyMediaName('_chat.txt')).toBeNull()
      expect(classifyMediaName('README')).toBeNull()
    })
  })

  describe('getImageMimeType', () => {
    it('maps extensions to MIME types', () => {
      expect(getImageMimeType('a.jpg')).toBe('image/jpeg')
      expect(getImageMimeType('a.JPEG')).toBe('image/jpeg')
      expect(getImageMimeType('a.png')).toBe('image/png')
      expect(getImageMimeType('a.webp')).toBe('image/webp')
      expect(getImageMimeType('a.mp4')).toBeNull()
    })
  })

  describe('openArchive', () => {
    it('selects the first .txt entry and lists media in archive order', async () => {
      const path = await createTestArchive(dir, [
        ['_chat.txt', '29/01/2020, 23:29 - Alice: hi'],
        ['notes.txt', 'not the transcript'],
        ['VID-0001.mp4', 'video-bytes'],
        ['voice.opus', 'audio'],
        ['IMG-0001.jpg', 'image-bytes']
      ])

      const listing = await openArchive(path)

      expect(listing.path).toBe(path)
      expect(listing.transcriptName).toBe('_chat.txt')
      expect(listing.transcript).toBe('29/01/2020, 23:29 - Alice: hi')
      expect(listing.mediaNames).toEqual(['VID-0001.mp4', 'IMG-0001.jpg'])
    })

    it('strips a byte order mark from the transcript', async () => {
      const path = await createTestArchive(dir, [['_chat.txt', '\uFEFFfirst line']])

      const listing = await openArchive(path)

      expect(listing.transcript).toBe('first line')
    })

    it('throws ArchiveError when no transcript is present', async () => {
      const path = await createTestArchive(dir, [['IMG-0001.jpg', 'image-bytes']])

      await expect(openArchive(path)).rejects.toThrow(
        `No transcript (.txt) found in archive: ${path}`
      )
    })

    it('throws ArchiveError for a file that is not a zip', async () => {
      const path = join(dir, 'broken.zip')
      await writeFile(path, 'plain text, not a zip')

      await expect(openArchive(path)).rejects.toBeInstanceOf(ArchiveError)
      await expect(openArchive(path)).rejects.toThrow(`Not a valid zip archive: ${path}`)
    })

    it('throws ArchiveError for a missing file', async () => {
      const path = join(dir, 'missing.zip')

      await expect(openArchive(path)).rejects.toThrow(`Could not read archive: ${path}`)
    })
  })

  describe('readArchiveEntry', () => {
    it('reads entry bytes', async () => {
      const path = await createTestArchive(dir, [
        ['_chat.txt', ''],
        ['IMG-0001.jpg', new Uint8Array([1, 2, 3])]
      ])

      const bytes = await readArchiveEntry(path, 'IMG-0001.jpg')

      expect(bytes && Array.from(bytes)).toEqual([1, 2, 3])
    })

    it('returns null for a missing entry or archive', async () => {
      const path = await createTestArchive(dir, [['_chat.txt', '']])

      expect(await readArchiveEntry(path, 'IMG-0002.jpg')).toBeNull()
      expect(await readArchiveEntry(join(dir, 'missing.zip'), 'IMG-0001.jpg')).toBeNull()
    })

    it('returns null when an entry cannot be decompressed', async () => {
      const path = await createCorruptArchive(
        dir,
        [
          ['_chat.txt', 'hello'],
          ['IMG-0001.png', 'x'.repeat(200)]
        ],
        'IMG-0001.png'
      )

      expect(await readArchiveEntry(path, 'IMG-0001.png')).toBeNull()
      expect((await openArchive(path)).mediaNames).toEqual(['IMG-0001.png'])
    })

    it('supports concurrent reads', async () => {
      const path = await createTestArchive(dir, [
        ['_chat.txt', ''],
        ['a.jpg', 'aaa'],
        ['b.jpg', 'bb']
      ])

      const [a, b] = await Promise.all([
        readArchiveEntry(path, 'a.jpg'),
        readArchiveEntry(path, 'b.jpg')
      ])

      expect(a?.length).toBe(3)
      expect(b?.length).toBe(2)
    })
  })
})
