import type { CaptionSegment } from '../../types'
import { countWords } from '../words'
import type { GeneratorOptions } from './types'

/**
 * A segment as written to the JSON document.
 */
export interface JsonCaptionSegment {
  startTime: number
  endTime: number
  duration: number
  text: string
  speakerId: number
  speakerName: string
  confidence: number
  wordCount: number
}

/**
 * The JSON caption document.
 */
export interface JsonCaptionsDocument {
  format: string
  version: string
  totalSegments: number
  /** End time of the last segment, 0 when there are none */
  totalDuration: number
  /** Speaker ids to display names, for the speakers present in the segments */
  speakers: Record<string, string>
  segments: JsonCaptionSegment[]
}

/**
 * Collect the speakers present in the segments, in order of first appearance.
 */
function extractSpeakers(segments: CaptionSegment[]): Record<string, string> {
  const speakers: Record<string, string> = {}
  for (const segment of segments) {
    const key = String(segment.speakerId)
    if (!(key in speakers)) {
      speakers[key] = segment.speakerName
    }
  }
  return speakers
}

/**
 * Build the JSON caption document.
 */
export function buildJsonDocument(
  options: GeneratorOptions,
): JsonCaptionsDocument {
  const { segments, config } = options
  const last = segments[segments.length - 1]

  return {
    format: config.jsonFormatId,
    version: config.jsonVersion,
    totalSegments: segments.length,
    totalDuration: last ? last.endTime : 0,
    speakers: extractSpeakers(segments),
    segments: segments.map((segment) => ({
      startTime: segment.startTime,
      endTime: segment.endTime,
      duration: segment.endTime - segment.startTime,
      text: segment.text,
      speakerId: segment.speakerId,
      speakerName: segment.speakerName,
      confidence: segment.confidence,
      wordCount: countWords(segment.text),
    })),
  }
}

/**
 * Generate JSON format captions.
 *
 * Speaker names are always included: the document carries data, not display text.
 */
export function generateJson(options: GeneratorOptions): string {
  return JSON.stringify(buildJsonDocument(options), null, 2)
}
