import type { CaptionFormat, CaptionsConfig } from '@script-captions/config'
import type { CaptionSegment } from '../../types'
import { generateJson } from './json'
import { generateScriptTiming } from './script-timing'
import { generateSrt } from './srt'
import { generateTranscript } from './transcript'
import { generateVtt } from './vtt'

export { buildJsonDocument, generateJson } from './json'
export type { JsonCaptionSegment, JsonCaptionsDocument } from './json'
export { generateScriptTiming } from './script-timing'
export { generateSrt } from './srt'
export { generateTranscript } from './transcript'
export { generateVtt } from './vtt'

/**
 * Render segments in one caption format. The segments are not modified.
 */
export function renderCaptions(
  segments: CaptionSegment[],
  format: CaptionFormat,
  config: CaptionsConfig,
): string {
  const options = { segments, config }
  switch (format) {
    case 'srt':
      return generateSrt(options)
    case 'vtt':
      return generateVtt(options)
    case 'json':
      return generateJson(options)
    case 'transcript':
      return generateTranscript(options)
    case 'script-timing':
      return generateScriptTiming(options)
  }
}

/**
 * Render segments in every format listed in `config.formats`.
 */
export function renderAll(
  segments: CaptionSegment[],
  config: CaptionsConfig,
): Partial<Record<CaptionFormat, string>> {
  const rendered: Partial<Record<CaptionFormat, string>> = {}
  for (const format of config.formats) {
    rendered[format] = renderCaptions(segments, format, config)
  }
  return rendered
}
