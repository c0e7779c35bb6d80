import { TimingConfigSchema } from '@script-captions/config'
import { describe, expect, it } from 'vitest'
import type { CaptionSegment } from '../types'
import { countWords } from '../utils/words'
import { needsSplit, splitSegment } from './segment-splitting'

const config = { timing: TimingConfigSchema.parse({}) }

const WORDS = [
  'alpha',
  'beta',
  'gamma',
  'delta',
  'epsilon',
  'zeta',
  'eta',
  'theta',
  'iota',
  'kappa',
]

function makeText(count: number): string {
  return Array.from({ length: count }, (_, i) => WORDS[i % WORDS.length]).join(
    ' ',
  )
}

function makeSegment(
  text: string,
  startTime: number,
  endTime: number,
): CaptionSegment {
  return {
    startTime,
    endTime,
    text,
    speakerId: 2,
    speakerName: 'Carol',
    confidence: 1,
  }
}

describe('needsSplit', () => {
  it('should split over the word cap', () => {
    expect(needsSplit(16, 5, config)).toBe(true)
  })

  it('should split over the duration cap', () => {
    expect(needsSplit(12, 10.5, config)).toBe(true)
  })

  it('should never split a single word', () => {
    expect(needsSplit(1, 30, config)).toBe(false)
  })

  it('should keep segments within both caps', () => {
    expect(needsSplit(15, 10, config)).toBe(false)
  })
})

describe('splitSegment', () => {
  it('should split 40 words into 15, 15 and 10', () => {
    const result = splitSegment(makeSegment(`${makeText(40)}.`, 0, 16.5), config)

    expect(result.segments.map((s) => countWords(s.text))).toEqual([15, 15, 10])
    expect(result.segments.map((s) => s.endTime)).toEqual([6.1875, 12.375, 16.5])
    expect(result.segments.map((s) => s.startTime)).toEqual([0, 6.1875, 12.375])
    expect(result.warnings).toEqual([])
  })

  it('should keep every word in order', () => {
    const text = `${makeText(40)}.`
    const result = splitSegment(makeSegment(text, 0, 16.5), config)

    expect(result.segments.map((s) => s.text).join(' ')).toBe(text)
  })

  it('should cut at punctuation near an even division', () => {
    const words = makeText(20).split(' ')
    words[8] = `${words[8]}.`
    const result = splitSegment(makeSegment(words.join(' '), 0, 8), config)

    expect(result.segments.map((s) => countWords(s.text))).toEqual([9, 11])
    expect(result.segments[0].text.endsWith('iota.')).toBe(true)
    expect(result.segments[0].endTime).toBeCloseTo(3.6)
    expect(result.segments[1].endTime).toBe(8)
  })

  it('should halve a segment that is only over the duration cap', () => {
    const result = splitSegment(makeSegment(makeText(12), 3, 17), config)

    expect(result.segments.map((s) => countWords(s.text))).toEqual([6, 6])
    expect(result.segments.map((s) => [s.startTime, s.endTime])).toEqual([
      [3, 10],
      [10, 17],
    ])
  })

  it('should prefer a clause break inside the middle half', () => {
    const words = makeText(12).split(' ')
    words[3] = `${words[3]},`
    const result = splitSegment(makeSegment(words.join(' '), 0, 14), config)

    expect(result.segments.map((s) => countWords(s.text))).toEqual([4, 8])
  })

  it('should hold each child to the minimum duration', () => {
    const result = splitSegment(makeSegment(makeText(16), 0, 2), config)

    expect(result.segments.map((s) => countWords(s.text))).toEqual([15, 1])
    expect(result.segments[0].endTime).toBe(1.875)
    expect(result.segments[1].startTime).toBe(1.875)
    expect(result.segments[1].endTime).toBe(2.875)
  })

  it('should top up short children inside a fixed span', () => {
    const result = splitSegment(makeSegment(makeText(16), 0, 2), config, {
      fixedSpan: true,
    })

    expect(result.segments.map((s) => countWords(s.text))).toEqual([15, 1])
    expect(result.segments.map((s) => [s.startTime, s.endTime])).toEqual([
      [0, 1],
      [1, 2],
    ])
  })

  it('should share a fixed span by word count when it cannot hold the minimum', () => {
    const result = splitSegment(makeSegment(makeText(40), 0, 2.5), config, {
      fixedSpan: true,
    })

    expect(result.segments.map((s) => countWords(s.text))).toEqual([15, 15, 10])
    expect(result.segments.map((s) => s.endTime)).toEqual([0.9375, 1.875, 2.5])
  })

  it('should keep speaker identity on every child', () => {
    const result = splitSegment(makeSegment(makeText(40), 0, 16), config)

    for (const segment of result.segments) {
      expect(segment.speakerId).toBe(2)
      expect(segment.speakerName).toBe('Carol')
      expect(segment.confidence).toBe(1)
    }
  })

  it('should keep a single oversized word and report it', () => {
    const result = splitSegment(
      makeSegment('Supercalifragilistic', 0, 12),
      config,
    )

    expect(result.segments).toEqual([
      makeSegment('Supercalifragilistic', 0, 12),
    ])
    expect(result.warnings).toEqual([
      {
        kind: 'oversized-word',
        word: 'Supercalifragilistic',
        duration: 12,
        maxSegmentDuration: 10,
      },
    ])
  })

  it('should not modify the input segment', () => {
    const segment = makeSegment(makeText(40), 0, 16)
    const copy = { ...segment }

    splitSegment(segment, config)

    expect(segment).toEqual(copy)
  })
})
