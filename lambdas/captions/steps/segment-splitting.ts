import type { TimingConfig } from '@script-captions/config'
import type { CaptionSegment, OversizedWordWarning } from '../types'
import { textToWords, wordsToText } from '../utils/words'

/** Closing quotes or brackets that may follow the punctuation of a boundary */
const BOUNDARY = /[.?!;:,]["')\]]*$/
const SENTENCE_BOUNDARY = /[.?!]["')\]]*$/

/**
 * Configuration consulted by the splitter
 */
export interface SplitterConfig {
  timing: Pick<
    TimingConfig,
    'maxWordsPerSegment' | 'maxSegmentDuration' | 'minSegmentDuration'
  >
}

/**
 * Result of splitting one segment
 */
export interface SplitResult {
  /** Contiguous children, in order */
  segments: CaptionSegment[]
  /** Single words that stay over the duration cap */
  warnings: OversizedWordWarning[]
}

/**
 * Options for splitting one segment
 */
export interface SplitOptions {
  /**
   * Keep every child inside the parent's span. Children under the minimum duration are
   * topped up from the others instead of pushing later children past the parent's end.
   */
  fixedSpan?: boolean
}

/**
 * Whether a segment has to go through the splitter.
 */
export function needsSplit(
  wordCount: number,
  duration: number,
  config: SplitterConfig,
): boolean {
  return (
    wordCount > config.timing.maxWordsPerSegment ||
    (wordCount > 1 && duration > config.timing.maxSegmentDuration)
  )
}

/**
 * Strength of the boundary after a word: 2 for a sentence end, 1 for a clause break, 0 for none.
 */
function boundaryStrength(word: string): number {
  if (SENTENCE_BOUNDARY.test(word)) return 2
  if (BOUNDARY.test(word)) return 1
  return 0
}

/**
 * Find the cut position in [lo, hi] that follows punctuation and is nearest to the target.
 * Ties go to the stronger boundary, then to the earlier cut.
 * A cut at position `c` splits the words into [0, c) and [c, n).
 */
function nearestBoundary(
  words: string[],
  lo: number,
  hi: number,
  target: number,
): number | undefined {
  let best: { cut: number; distance: number; strength: number } | undefined

  for (let cut = Math.max(lo, 1); cut <= Math.min(hi, words.length - 1); cut++) {
    const strength = boundaryStrength(words[cut - 1])
    if (strength === 0) {
      continue
    }
    const distance = Math.abs(cut - target)
    if (
      !best ||
      distance < best.distance ||
      (distance === best.distance && strength > best.strength)
    ) {
      best = { cut, distance, strength }
    }
  }

  return best?.cut
}

/**
 * Cut for a piece over the word cap: aim for an even division into the fewest pieces,
 * never leaving more than `maxWords` in the first one. Without punctuation, cut at the cap.
 */
function wordCapCut(words: string[], maxWords: number): number {
  const pieces = Math.ceil(words.length / maxWords)
  const target = Math.ceil(words.length / pieces)
  const lo = Math.ceil(maxWords / 2)

  return nearestBoundary(words, lo, maxWords, target) ?? maxWords
}

/**
 * Cut for a piece that is only over the duration cap: punctuation in the middle half, else the midpoint.
 */
function midpointCut(words: string[]): number {
  const n = words.length
  const margin = Math.ceil(n / 4)

  return nearestBoundary(words, margin, n - margin, n / 2) ?? Math.floor(n / 2)
}

/**
 * Share `total` seconds by word count while holding every share to `min`.
 * When the span is too short to give each piece `min`, shares stay proportional.
 */
function shareWithinSpan(
  wordCounts: number[],
  total: number,
  min: number,
): number[] {
  const totalWords = wordCounts.reduce((a, b) => a + b, 0)
  if (total < min * wordCounts.length) {
    return wordCounts.map((count) => (total * count) / totalWords)
  }

  const atMinimum = new Set<number>()
  for (;;) {
    const remaining = total - atMinimum.size * min
    const freeWords = wordCounts.reduce(
      (sum, count, i) => (atMinimum.has(i) ? sum : sum + count),
      0,
    )
    const shares = wordCounts.map((count, i) =>
      atMinimum.has(i) ? min : (remaining * count) / freeWords,
    )
    const short = shares.findIndex(
      (share, i) => !atMinimum.has(i) && share < min,
    )
    if (short === -1) {
      return shares
    }
    atMinimum.add(short)
  }
}

/**
 * Split a segment that is over the word or duration cap into contiguous children.
 *
 * The parent's duration is shared by word count, each child is then held to the minimum
 * duration, and speaker identity is inherited unchanged. Without `fixedSpan` a top-up
 * pushes later children back; with it the children always end with the parent.
 * A single word over the duration cap is kept whole and reported.
 */
export function splitSegment(
  segment: CaptionSegment,
  config: SplitterConfig,
  options: SplitOptions = {},
): SplitResult {
  const { maxWordsPerSegment, maxSegmentDuration, minSegmentDuration } =
    config.timing
  const words = textToWords(segment.text)
  const totalDuration = segment.endTime - segment.startTime

  if (words.length === 0) {
    return { segments: [{ ...segment }], warnings: [] }
  }

  const secondsPerWord = totalDuration / words.length

  const splitWords = (chunk: string[]): string[][] => {
    if (!needsSplit(chunk.length, chunk.length * secondsPerWord, config)) {
      return [chunk]
    }
    const cut =
      chunk.length > maxWordsPerSegment
        ? wordCapCut(chunk, maxWordsPerSegment)
        : midpointCut(chunk)
    return [...splitWords(chunk.slice(0, cut)), ...splitWords(chunk.slice(cut))]
  }

  const pieces = splitWords(words)
  const segments: CaptionSegment[] = []
  const warnings: OversizedWordWarning[] = []

  const spanShares = options.fixedSpan
    ? shareWithinSpan(
        pieces.map((piece) => piece.length),
        totalDuration,
        minSegmentDuration,
      )
    : undefined

  let startTime = segment.startTime
  let wordsSoFar = 0
  let extension = 0

  for (const [index, piece] of pieces.entries()) {
    wordsSoFar += piece.length
    const isLast = index === pieces.length - 1
    let endTime: number

    if (spanShares) {
      endTime = isLast ? segment.endTime : startTime + spanShares[index]
    } else {
      endTime =
        isLast && extension === 0
          ? segment.endTime
          : segment.startTime +
            (totalDuration * wordsSoFar) / words.length +
            extension

      if (endTime - startTime < minSegmentDuration) {
        extension += minSegmentDuration - (endTime - startTime)
        endTime = startTime + minSegmentDuration
      }
    }

    if (piece.length === 1 && endTime - startTime > maxSegmentDuration) {
      warnings.push({
        kind: 'oversized-word',
        word: piece[0],
        duration: endTime - startTime,
        maxSegmentDuration,
      })
    }

    segments.push({
      ...segment,
      startTime,
      endTime,
      text: wordsToText(piece),
    })
    startTime = endTime
  }

  return { segments, warnings }
}
