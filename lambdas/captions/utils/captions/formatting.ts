interface TimestampParts {
  hours: string
  minutes: string
  seconds: string
  milliseconds: string
}

/**
 * Break seconds into zero-padded parts.
 * Works from whole milliseconds so a value never rounds up to "1000" ms.
 */
function toTimestampParts(seconds: number): TimestampParts {
  const totalMs = Math.max(0, Math.round(seconds * 1000))
  const hours = Math.floor(totalMs / 3_600_000)
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000)
  const secs = Math.floor((totalMs % 60_000) / 1000)
  const ms = totalMs % 1000

  return {
    hours: hours.toString().padStart(2, '0'),
    minutes: minutes.toString().padStart(2, '0'),
    seconds: secs.toString().padStart(2, '0'),
    milliseconds: ms.toString().padStart(3, '0'),
  }
}

/**
 * Format seconds to VTT timestamp: HH:MM:SS.TTT
 * VTT uses a period for milliseconds separator.
 */
export function formatVttTimestamp(seconds: number): string {
  const { hours, minutes, seconds: secs, milliseconds } =
    toTimestampParts(seconds)
  return `${hours}:${minutes}:${secs}.${milliseconds}`
}

/**
 * Format seconds to SRT timestamp: HH:MM:SS,mmm
 * SRT uses a comma for milliseconds separator (French origin).
 */
export function formatSrtTimestamp(seconds: number): string {
  const { hours, minutes, seconds: secs, milliseconds } =
    toTimestampParts(seconds)
  return `${hours}:${minutes}:${secs},${milliseconds}`
}

/**
 * Format seconds to a transcript clock: HH:MM:SS
 */
export function formatClockTimestamp(seconds: number): string {
  const { hours, minutes, seconds: secs } = toTimestampParts(seconds)
  return `${hours}:${minutes}:${secs}`
}

/**
 * Escape HTML special characters to prevent tag conflicts in VTT/SRT.
 */
export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')
}

/**
 * How a speaker name is attached to caption text.
 * - `bracket`: `[Alice] ` (SRT)
 * - `voice`: `<v Alice>` (VTT)
 * - `label`: `Alice: ` (transcripts)
 */
export type SpeakerPrefixStyle = 'bracket' | 'voice' | 'label'

/**
 * Build the speaker prefix based on configuration.
 * @param speaker The speaker display name
 * @param style How the name is attached
 * @param includeSpeakerNames The configuration option
 */
export function buildSpeakerPrefix(
  speaker: string,
  style: SpeakerPrefixStyle,
  includeSpeakerNames: boolean,
): string {
  if (!includeSpeakerNames || speaker.length === 0) {
    return ''
  }

  switch (style) {
    case 'bracket':
      return `[${escapeHtml(speaker)}] `
    case 'voice':
      return `<v ${escapeHtml(speaker)}>`
    case 'label':
      return `${speaker}: `
  }
}
