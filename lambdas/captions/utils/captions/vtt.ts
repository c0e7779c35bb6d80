import { buildSpeakerPrefix, escapeHtml, formatVttTimestamp } from './formatting'
import type { GeneratorOptions } from './types'

/**
 * Generate WebVTT format captions.
 *
 * VTT format:
 * WEBVTT
 *
 * 00:00:00.000 --> 00:00:01.300
 * <v Alice>Hello there.
 *
 * 00:00:01.800 --> 00:00:04.600
 * <v Bob>Hi, good to be here.
 */
export function generateVtt(options: GeneratorOptions): string {
  const { segments, config } = options
  const lines: string[] = ['WEBVTT', '']

  for (const segment of segments) {
    lines.push(
      `${formatVttTimestamp(segment.startTime)} --> ${formatVttTimestamp(segment.endTime)}`,
    )
    lines.push(
      buildSpeakerPrefix(
        segment.speakerName,
        'voice',
        config.includeSpeakerNames,
      ) + escapeHtml(segment.text.trim()),
    )
    lines.push('')
  }

  return lines.join('\n')
}
