import type { CaptionsConfig } from '@script-captions/config'
import type { CaptionSegment } from '../../types'

/**
 * Options passed to caption generators.
 */
export interface GeneratorOptions {
  /** The timed segments, in order */
  segments: CaptionSegment[]
  /** Caption configuration options */
  config: CaptionsConfig
}

/**
 * A single caption cue with timing and text.
 * Used internally during caption generation.
 */
export interface CaptionCue {
  /** Start time in seconds */
  start: number
  /** End time in seconds */
  end: number
  /** The text content (may include a speaker prefix or voice tag) */
  text: string
}
