import { describe, expect, it } from 'vitest'
import { SYSTEM_AUTHOR } from '../types'
import { cleanBody, isMediaOmitted, parseLine, parseTranscript } from './whatsapp'

describe('WhatsApp Parser', () => {
  describe('parseLine', () => {
    it('parses Android 24-hour lines', () => {
      expect(parseLine('29/01/2020, 23:29 - Alice: See you there')).toEqual({
        timestamp: new Date(2020, 0, 29, 23, 29),
        author: 'Alice',
        body: 'See you there',
        format: 'android-24h'
      })
    })

    it('parses Android 12-hour lines', () => {
      const message = parseLine('1/29/20, 11:29 PM - Bob Smith: On my way')

      expect(message?.timestamp).toEqual(new Date(2020, 0, 29, 23, 29))
      expect(message?.author).toBe('Bob Smith')
      expect(message?.format).toBe('android-12h')
    })

    it('parses Android short-year lines', () => {
      const message = parseLine('29/01/20, 08:15 - Alice: Morning')

      expect(message?.timestamp).toEqual(new Date(2020, 0, 29, 8, 15))
      expect(message?.format).toBe('android-24h-short-year')
    })

    it('parses iOS 24-hour lines with a leading direction mark', () => {
      const message = parseLine('\u200E[29/01/2020, 23:29:05] Alice: Hello')

      expect(message?.timestamp).toEqual(new Date(2020, 0, 29, 23, 29, 5))
      expect(message?.body).toBe('Hello')
      expect(message?.format).toBe('ios-24h')
    })

    it('parses month-first iOS 24-hour lines', () => {
      const message = parseLine('[1/29/2020, 23:29:05] Alice: x')

      expect(message?.timestamp).toEqual(new Date(2020, 0, 29, 23, 29, 5))
      expect(message?.format).toBe('ios-24h-us')
    })

    it('parses iOS 12-hour lines', () => {
      const message = parseLine('[1/29/20, 11:29:05 PM] Bob: Hi')

      expect(message?.timestamp).toEqual(new Date(2020, 0, 29, 23, 29, 5))
      expect(message?.format).toBe('ios-12h')
    })

    it('reads ambiguous dates day-first', () => {
      expect(parseLine('05/06/2020, 10:00 - Alice: hi')?.timestamp).toEqual(
        new Date(2020, 5, 5, 10, 0)
      )
    })

    it('falls through to the next format when the timestamp is invalid', () => {
      const message = parseLine('01/29/2020, 23:29 - Alice: hi')

      expect(message?.timestamp).toEqual(new Date(2020, 0, 29, 23, 29))
      expect(message?.format).toBe('android-24h-us')
    })

    it('assigns the system author to lines without a sender', () => {
      const message = parseLine('29/01/2020, 23:29 - Messages to this group are now secured.')

      expect(message?.author).toBe(SYSTEM_AUTHOR)
      expect(message?.body).toBe('Messages to this group are now secured.')
      expect(message?.format).toBe('android-24h-system')
    })

    it('keeps colons inside the body', () => {
      expect(parseLine('29/01/2020, 23:29 - Alice: Meet at 10:30: cafe')?.body).toBe(
        'Meet at 10:30: cafe'
      )
    })

    it('strips the file attached marker', () => {
      expect(parseLine('29/01/2020, 23:29 - Alice: IMG-0001.jpg (file attached)')?.body).toBe(
        'IMG-0001.jpg'
      )
    })

    it('drops media omission placeholders', () => {
      expect(parseLine('29/01/2020, 23:29 - Alice: <Media omitted>')).toBeNull()
      expect(parseLine('[29/01/2020, 23:29:05] Alice: \u200Eimage omitted')).toBeNull()
    })

    it('returns null for unparseable lines', () => {
      expect(parseLine('just some text')).toBeNull()
      expect(parseLine('')).toBeNull()
      expect(parseLine('99/99/2020, 23:29 - Alice: hi')).toBeNull()
    })

    it('ignores a trailing carriage return', () => {
      expect(parseLine('29/01/2020, 23:29 - Alice: hi\r')?.body).toBe('hi')
    })
  })

  describe('cleanBody', () => {
    it('strips attachment markers', () => {
      expect(cleanBody('IMG-0001.jpg, (file attached)')).toBe('IMG-0001.jpg')
      expect(cleanBody('<attached: 00000012-PHOTO-2020-01-29.jpg>')).toBe(
        '00000012-PHOTO-2020-01-29.jpg'
      )
    })

    it('removes direction marks and surrounding whitespace', () => {
      expect(cleanBody('\u200E  hello \u200F')).toBe('hello')
    })
  })

  describe('isMediaOmitted', () => {
    it('recognizes placeholders', () => {
      expect(isMediaOmitted('<Media omitted>')).toBe(true)
      expect(isMediaOmitted('video omitted')).toBe(true)
      expect(isMediaOmitted('sticker omitted')).toBe(true)
      expect(isMediaOmitted('Contact card omitted')).toBe(true)
    })

    it('does not match ordinary text', () => {
      expect(isMediaOmitted('the image omitted a detail')).toBe(false)
    })
  })

  describe('parseTranscript', () => {
    const transcript = [
      'Chat header before any message',
      '29/01/2020, 23:29 - Alice: first line',
      'second line',
      '',
      '29/01/2020, 23:30 - Bob: <Media omitted>',
      'orphan after placeholder',
      '29/01/2020, 23:31 - Messages to this group are now secured.',
      '30/01/2020, 08:00 - Alice: IMG-0001.jpg (file attached)',
      ''
    ].join('\r\n')

    it('appends continuation lines and drops orphans', () => {
      const drafts = parseTranscript(transcript)

      expect(drafts.map((d) => [d.author, d.body])).toEqual([
        ['Alice', 'first line\nsecond line'],
        [SYSTEM_AUTHOR, 'Messages to this group are now secured.'],
        ['Alice', 'IMG-0001.jpg']
      ])
    })

    it('keeps the attachment on the first line when a caption follows', () => {
      const drafts = parseTranscript(
        '29/01/2020, 23:29 - Alice: IMG-0001.jpg (file attached)\nLook at this view'
      )

      expect(drafts.map((d) => d.body)).toEqual(['IMG-0001.jpg\nLook at this view'])
    })

    it('drops header lines with an impossible date instead of appending them', () => {
      const drafts = parseTranscript(
        [
          '29/01/2020, 23:29 - Alice: IMG-0001.jpg (file attached)',
          '31/02/2020, 10:00 - Bob: hi',
          'stray line',
          '30/01/2020, 08:00 - Bob: next'
        ].join('\n')
      )

      expect(drafts.map((d) => [d.author, d.body])).toEqual([
        ['Alice', 'IMG-0001.jpg'],
        ['Bob', 'next']
      ])
    })

    it('keeps transcript order and duplicates', () => {
      const line = '29/01/2020, 23:29 - Alice: same'
      const drafts = parseTranscript(`${line}\n${line}\n28/01/2020, 09:00 - Bob: earlier`)

      expect(drafts.map((d) => d.body)).toEqual(['same', 'same', 'earlier'])
    })

    it('returns an empty list for empty input', () => {
      expect(parseTranscript('')).toEqual([])
    })
  })
})
