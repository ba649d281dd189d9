/**
 * Preview Command
 *
 * Write a JPEG still of one image or video entry.
 */

import { writeFile } from 'node:fs/promises'
import { dirname, parse as parsePath } from 'node:path'
import { classifyMediaName, loadMediaPreview } from '../../index'
import type { CLIArgs } from '../args'
import { ensureDir } from '../io'
import type { Logger } from '../logger'

export async function cmdPreview(args: CLIArgs, logger: Logger): Promise<void> {
  if (!args.input || !args.filename) {
    throw new Error('Usage: chat-digest preview <input> <filename>')
  }
  if (!classifyMediaName(args.filename)) {
    throw new Error(`Not an image or video entry: ${args.filename}`)
  }

  const still = await loadMediaPreview(args.input, args.filename, args.full ? 'full' : 'thumbnail')
  if (!still) {
    throw new Error(`No preview available for ${args.filename}`)
  }

  const output = args.outputFile ?? `${parsePath(args.filename).name}.jpg`
  await ensureDir(dirname(output))
  await writeFile(output, still.data)
  logger.success(`Wrote ${still.width}x${still.height} still to ${output}`)
}
