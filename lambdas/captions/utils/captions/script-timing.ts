import { formatVttTimestamp } from './formatting'
import { formatTranscriptLine } from './transcript'
import type { GeneratorOptions } from './types'

/**
 * Generate the script annotated with timing, for reviewing a timeline by eye.
 *
 * [00:00:00] Alice: Hello there.
 *     duration: 1.30s (00:00:00.000 --> 00:00:01.300)
 */
export function generateScriptTiming(options: GeneratorOptions): string {
  const { segments, config } = options
  const lines: string[] = []

  for (const segment of segments) {
    const duration = segment.endTime - segment.startTime
    lines.push(formatTranscriptLine(segment, config))
    lines.push(
      `    duration: ${duration.toFixed(2)}s (${formatVttTimestamp(segment.startTime)} --> ${formatVttTimestamp(segment.endTime)})`,
    )
  }

  return lines.join('\n')
}
