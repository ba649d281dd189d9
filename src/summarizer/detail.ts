/**
 * Detail Levels
 *
 * What each detail level asks of the summarizer. These are requests, not
 * guarantees: the reply is validated independently.
 */

import type { DetailInstructions, DetailLevel } from '../types'

export const DETAIL_INSTRUCTIONS: Readonly<Record<DetailLevel, DetailInstructions>> = {
  brief: {
    maxWords: 120,
    keyMessages: { min: 1, max: 2 },
    mediaCallouts: { min: 0, max: 1 }
  },
  standard: {
    maxWords: 240,
    keyMessages: { min: 2, max: 4 },
    mediaCallouts: { min: 1, max: 3 }
  },
  verbose: {
    maxWords: 450,
    keyMessages: { min: 4, max: 8 },
    mediaCallouts: { min: 2, max: 6 }
  }
}

export function getDetailInstructions(level: DetailLevel): DetailInstructions {
  return DETAIL_INSTRUCTIONS[level]
}

export function isDetailLevel(value: string): value is DetailLevel {
  return value === 'brief' || value === 'standard' || value === 'verbose'
}
