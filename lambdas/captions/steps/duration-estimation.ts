import type { EstimationConfig, TimingConfig } from '@script-captions/config'
import { countWords } from '../utils/words'

/** A run of `.`, `?` or `!` that ends a token (so "3.5" or "e.g" inside a word are not pauses) */
const SENTENCE_END = /[.?!]+(?=["')\]]*(?:\s|$))/g
/** A comma that ends a token (so "1,000" is not a pause) */
const COMMA = /,(?=["')\]]*(?:\s|$))/g
const DIGIT = /\p{N}/u

/**
 * Configuration consulted by the estimator
 */
export interface EstimatorConfig {
  timing: Pick<TimingConfig, 'wordsPerMinute'>
  estimation: EstimationConfig
}

/**
 * How an estimate was reached
 */
export interface DurationEstimate {
  wordCount: number
  /** Seconds from word count and speaking rate alone */
  baseSeconds: number
  /** Fraction of the base added for digits and technical terms */
  upliftRatio: number
  /** Seconds added for punctuation */
  pauseSeconds: number
  sentenceEnds: number
  commas: number
  /** Final estimate: base * (1 + uplift) + pauses */
  seconds: number
}

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0
}

function hasTechnicalTerm(text: string, patterns: string[]): boolean {
  return patterns.some((pattern) => new RegExp(pattern, 'u').test(text))
}

/**
 * Estimate how long an utterance takes to speak, with the breakdown of each adjustment.
 * Pure and deterministic: the same text and configuration always give the same result.
 */
export function describeEstimate(
  text: string,
  config: EstimatorConfig,
): DurationEstimate {
  const { timing, estimation } = config
  const wordCount = countWords(text)
  const baseSeconds = wordCount / (timing.wordsPerMinute / 60)

  let upliftRatio = 0
  if (DIGIT.test(text)) {
    upliftRatio += estimation.numericUplift
  }
  if (hasTechnicalTerm(text, estimation.technicalTermPatterns)) {
    upliftRatio += estimation.technicalTermUplift
  }

  const sentenceEnds = countMatches(text, SENTENCE_END)
  const commas = countMatches(text, COMMA)
  const pauseSeconds =
    sentenceEnds * estimation.sentenceEndPause + commas * estimation.commaPause

  return {
    wordCount,
    baseSeconds,
    upliftRatio,
    pauseSeconds,
    sentenceEnds,
    commas,
    seconds: baseSeconds * (1 + upliftRatio) + pauseSeconds,
  }
}

/**
 * Estimate the spoken duration of a text in seconds.
 */
export function estimateDuration(
  text: string,
  config: EstimatorConfig,
): number {
  return describeEstimate(text, config).seconds
}
