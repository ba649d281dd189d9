/**
 * CLI File I/O
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { Logger } from './logger'

export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true })
}

/**
 * Write a value as JSON to stdout or to a file, per the --json option.
 */
export async function writeJsonOutput(
  target: string,
  value: unknown,
  logger: Logger
): Promise<void> {
  const json = JSON.stringify(value, null, 2)
  if (target === 'stdout') {
    console.log(json)
    return
  }
  await ensureDir(dirname(target))
  await writeFile(target, json)
  logger.success(`Saved to ${target}`)
}
