/**
 * Transcript Formats
 *
 * Ordered list of line shapes found in WhatsApp exports, most specific first.
 * Adding a format means adding a shape here; the parser loop does not change.
 *
 * Notes:
 * - \u200E is a left-to-right mark that iOS exports put at the start of lines
 * - \u202F is the narrow no-break space some locales put between time and AM/PM
 */

export type DateOrder = 'dmy' | 'mdy'

export interface TranscriptFormat {
  readonly name: string
  /** Named groups: date, time, body and (when hasAuthor) author */
  readonly pattern: RegExp
  readonly dateOrder: DateOrder
  readonly hasAuthor: boolean
}

interface TimestampShape {
  readonly name: string
  /** Regex source matching everything up to the author (or body for system lines) */
  readonly prefix: string
  readonly dateOrder: DateOrder
}

const LRM = '\\u200E?'
const MERIDIEM = '[\\s\\u202F]*[AaPp][Mm]'

const TIMESTAMP_SHAPES: readonly TimestampShape[] = [
  {
    // [29/01/2020, 23:29:05] Author: Body
    name: 'ios-24h',
    prefix: `\\[(?<date>\\d{1,2}/\\d{1,2}/\\d{4}),\\s*(?<time>\\d{1,2}:\\d{2}:\\d{2})\\]\\s*`,
    dateOrder: 'dmy'
  },
  {
    // [1/29/2020, 23:29:05] Author: Body (US day order, 24-hour clock)
    name: 'ios-24h-us',
    prefix: `\\[(?<date>\\d{1,2}/\\d{1,2}/\\d{4}),\\s*(?<time>\\d{1,2}:\\d{2}:\\d{2})\\]\\s*`,
    dateOrder: 'mdy'
  },
  {
    // [1/29/20, 11:29:05 PM] Author: Body
    name: 'ios-12h',
    prefix: `\\[(?<date>\\d{1,2}/\\d{1,2}/\\d{2,4}),\\s*(?<time>\\d{1,2}:\\d{2}:\\d{2}${MERIDIEM})\\]\\s*`,
    dateOrder: 'mdy'
  },
  {
    // 29/01/2020, 23:29 - Author: Body
    name: 'android-24h',
    prefix: `(?<date>\\d{1,2}/\\d{1,2}/\\d{4}),\\s*(?<time>\\d{1,2}:\\d{2})\\s*-\\s*`,
    dateOrder: 'dmy'
  },
  {
    // 1/29/20, 11:29 PM - Author: Body
    name: 'android-12h',
    prefix: `(?<date>\\d{1,2}/\\d{1,2}/\\d{2,4}),\\s*(?<time>\\d{1,2}:\\d{2}${MERIDIEM})\\s*-\\s*`,
    dateOrder: 'mdy'
  },
  {
    // 29/01/20, 23:29 - Author: Body
    name: 'android-24h-short-year',
    prefix: `(?<date>\\d{1,2}/\\d{1,2}/\\d{2}),\\s*(?<time>\\d{1,2}:\\d{2})\\s*-\\s*`,
    dateOrder: 'dmy'
  },
  {
    // 01/29/2020, 23:29 - Author: Body (US day order, 24-hour clock)
    name: 'android-24h-us',
    prefix: `(?<date>\\d{1,2}/\\d{1,2}/\\d{4}),\\s*(?<time>\\d{1,2}:\\d{2})\\s*-\\s*`,
    dateOrder: 'mdy'
  }
]

function authoredFormat(shape: TimestampShape): TranscriptFormat {
  return {
    name: shape.name,
    pattern: new RegExp(`^${LRM}${shape.prefix}(?<author>[^:]+):\\s*(?<body>.*)$`),
    dateOrder: shape.dateOrder,
    hasAuthor: true
  }
}

function systemFormat(shape: TimestampShape): TranscriptFormat {
  return {
    name: `${shape.name}-system`,
    pattern: new RegExp(`^${LRM}${shape.prefix}(?<body>.+)$`),
    dateOrder: shape.dateOrder,
    hasAuthor: false
  }
}

/**
 * Authored variants of every shape come before any system variant: a system
 * pattern also matches authored lines.
 */
export const TRANSCRIPT_FORMATS: readonly TranscriptFormat[] = [
  ...TIMESTAMP_SHAPES.map(authoredFormat),
  ...TIMESTAMP_SHAPES.map(systemFormat)
]

const TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?(?:[\s\u202F]*([AP]M))?$/i

/**
 * Parse a captured date and time into a local (timezone-naive) Date.
 * Returns null for out-of-range fields and impossible calendar dates.
 */
export function parseTimestamp(dateStr: string, timeStr: string, order: DateOrder): Date | null {
  const dateParts = dateStr.split('/')
  if (dateParts.length !== 3) return null

  const [first, second, yearStr] = dateParts
  if (first === undefined || second === undefined || yearStr === undefined) return null

  const day = Number.parseInt(order === 'dmy' ? first : second, 10)
  const month = Number.parseInt(order === 'dmy' ? second : first, 10)
  const rawYear = Number.parseInt(yearStr, 10)
  const year = yearStr.length === 2 ? 2000 + rawYear : rawYear

  const timeMatch = TIME_PATTERN.exec(timeStr.trim())
  if (!timeMatch) return null

  const [, hourStr, minuteStr, secondStr, meridiem] = timeMatch
  let hour = Number.parseInt(hourStr ?? '', 10)
  const minute = Number.parseInt(minuteStr ?? '', 10)
  const seconds = secondStr ? Number.parseInt(secondStr, 10) : 0

  if (meridiem) {
    if (hour < 1 || hour > 12) return null
    const pm = meridiem.toUpperCase() === 'PM'
    if (pm && hour !== 12) hour += 12
    if (!pm && hour === 12) hour = 0
  } else if (hour > 23) {
    return null
  }

  if (month < 1 || month > 12 || day < 1 || day > 31) return null
  if (minute > 59 || seconds > 59) return null

  const timestamp = new Date(year, month - 1, day, hour, minute, seconds)

  // Date rolls 31/02 over into March; reject instead
  if (
    timestamp.getFullYear() !== year ||
    timestamp.getMonth() !== month - 1 ||
    timestamp.getDate() !== day
  ) {
    return null
  }

  return timestamp
}
