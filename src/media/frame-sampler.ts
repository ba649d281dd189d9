/**
 * Video Frame Sampler
 *
 * Pulls one representative still (the frame at 10% of the video) out of a
 * video inside an archive. Uses the ffprobe/ffmpeg binaries on PATH, or the
 * ones named by FFPROBE_PATH / FFMPEG_PATH. Any failure yields null: a broken
 * video must never abort a summary.
 */

import { execFile } from 'node:child_process'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { promisify } from 'node:util'
import { readArchiveEntry } from '../archive'
import { encodeStill, type StillImage, type StillIntent } from './still'

const execFileAsync = promisify(execFile)

/** Relative position of the sampled frame */
export const SAMPLE_POSITION = 0.1

const TOOL_TIMEOUT_MS = 30_000
const MAX_FRAME_BYTES = 64 * 1024 * 1024

export interface SampleVideoFrameOptions {
  readonly intent: StillIntent
  /** Directory under which the transient extraction is written (default: OS temp dir) */
  readonly tempDir?: string | undefined
}

function ffprobePath(): string {
  return process.env.FFPROBE_PATH ?? 'ffprobe'
}

function ffmpegPath(): string {
  return process.env.FFMPEG_PATH ?? 'ffmpeg'
}

/**
 * Count decodable video frames. Returns null when ffprobe cannot tell.
 */
async function countFrames(videoPath: string): Promise<number | null> {
  const { stdout } = await execFileAsync(
    ffprobePath(),
    [
      '-v',
      'error',
      '-select_streams',
      'v:0',
      '-count_packets',
      '-show_entries',
      'stream=nb_read_packets',
      '-of',
      'csv=p=0',
      videoPath
    ],
    { timeout: TOOL_TIMEOUT_MS }
  )
  const count = Number.parseInt(stdout.trim(), 10)
  return Number.isFinite(count) && count > 0 ? count : null
}

/**
 * Decode frame `index` to PNG bytes.
 */
async function decodeFrame(videoPath: string, index: number): Promise<Buffer> {
  const { stdout } = await execFileAsync(
    ffmpegPath(),
    [
      '-v',
      'error',
      '-i',
      videoPath,
      '-vf',
      `select=eq(n\\,${index})`,
      '-frames:v',
      '1',
      '-f',
      'image2pipe',
      '-vcodec',
      'png',
      'pipe:1'
    ],
    { encoding: 'buffer', maxBuffer: MAX_FRAME_BYTES, timeout: TOOL_TIMEOUT_MS }
  )
  return stdout
}

/**
 * Frame index for a video of `frameCount` frames.
 */
export function sampleFrameIndex(frameCount: number): number {
  return Math.min(frameCount - 1, Math.floor(frameCount * SAMPLE_POSITION))
}

/**
 * Extract one still from a video entry. Returns null if no frame is available.
 */
export async function sampleVideoFrame(
  archivePath: string,
  entryName: string,
  options: SampleVideoFrameOptions
): Promise<StillImage | null> {
  let workDir: string | undefined
  try {
    const bytes = await readArchiveEntry(archivePath, entryName)
    if (!bytes) return null

    workDir = await mkdtemp(join(options.tempDir ?? tmpdir(), 'chat-digest-frame-'))
    const videoPath = join(workDir, 'video.mp4')
    await writeFile(videoPath, bytes)

    const frameCount = await countFrames(videoPath)
    if (frameCount === null) return null

    const frame = await decodeFrame(videoPath, sampleFrameIndex(frameCount))
    if (frame.length === 0) return null

    return await encodeStill(frame, options.intent)
  } catch {
    return null
  } finally {
    if (workDir) {
      await rm(workDir, { recursive: true, force: true })
    }
  }
}
