import type { CaptionSegment } from '../../types'
import { buildSpeakerPrefix, escapeHtml, formatSrtTimestamp } from './formatting'
import type { CaptionCue, GeneratorOptions } from './types'

function toCue(segment: CaptionSegment, includeSpeakerNames: boolean): CaptionCue {
  return {
    start: segment.startTime,
    end: segment.endTime,
    text:
      buildSpeakerPrefix(segment.speakerName, 'bracket', includeSpeakerNames) +
      escapeHtml(segment.text.trim()),
  }
}

/**
 * Generate SubRip (SRT) format captions.
 *
 * SRT format:
 * 1
 * 00:00:00,000 --> 00:00:01,300
 * [Alice] Hello there.
 *
 * 2
 * 00:00:01,800 --> 00:00:04,600
 * [Bob] Hi, good to be here.
 */
export function generateSrt(options: GeneratorOptions): string {
  const { segments, config } = options
  const lines: string[] = []

  segments.forEach((segment, index) => {
    const cue = toCue(segment, config.includeSpeakerNames)
    lines.push((index + 1).toString())
    lines.push(
      `${formatSrtTimestamp(cue.start)} --> ${formatSrtTimestamp(cue.end)}`,
    )
    lines.push(cue.text)
    lines.push('')
  })

  return lines.join('\n')
}
