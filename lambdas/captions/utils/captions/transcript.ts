import type { CaptionsConfig } from '@script-captions/config'
import type { CaptionSegment } from '../../types'
import { buildSpeakerPrefix, formatClockTimestamp } from './formatting'
import type { GeneratorOptions } from './types'

/**
 * Build one transcript line: `[HH:MM:SS] Alice: text`.
 * The timestamp and the name are each dropped when disabled in the configuration.
 */
export function formatTranscriptLine(
  segment: CaptionSegment,
  config: CaptionsConfig,
): string {
  const timestamp = config.includeTimestamps
    ? `[${formatClockTimestamp(segment.startTime)}] `
    : ''
  const speaker = buildSpeakerPrefix(
    segment.speakerName,
    'label',
    config.includeSpeakerNames,
  )
  return `${timestamp}${speaker}${segment.text.trim()}`
}

/**
 * Generate a plain-text transcript, one line per segment.
 */
export function generateTranscript(options: GeneratorOptions): string {
  const { segments, config } = options
  return segments
    .map((segment) => formatTranscriptLine(segment, config))
    .join('\n')
}
