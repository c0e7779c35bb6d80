// =============================================================================
// Script types (parsed input)
// =============================================================================

/** One speaker turn as written in the script */
export interface Utterance {
  /** Dense id per distinct speaker label, assigned in first-seen order */
  speakerId: number
  /** The label as first written in the script (e.g., "Alice", "Speaker 1") */
  speakerLabel: string
  /** Display name resolved through the speaker mapping, or the label itself */
  speakerName: string
  /** Trimmed utterance text, never empty */
  text: string
}

/**
 * Caller-supplied speaker names.
 * A record is keyed by speaker label (case-insensitive) or by speaker id ("0", "1", ...).
 * A list maps its index to the speaker id.
 */
export type SpeakerMapping = Record<string, string> | string[]

// =============================================================================
// Caption types (timed output)
// =============================================================================

/** A single timed caption segment */
export interface CaptionSegment {
  /** Start time in seconds */
  startTime: number
  /** End time in seconds */
  endTime: number
  /** Caption text: a whole utterance or a slice of one */
  text: string
  /** Id of the speaker that owns the utterance */
  speakerId: number
  /** Display name of the speaker */
  speakerName: string
  /** Always 1.0 for segments derived from a script */
  confidence: number
}

/** Timing supplied by the caller for one utterance */
export interface CustomTiming {
  /** Start time in seconds */
  startTime: number
  /** End time in seconds (takes precedence over `duration`) */
  endTime?: number
  /** Duration in seconds, used when `endTime` is missing */
  duration?: number
}

// =============================================================================
// Warnings (non-fatal)
// =============================================================================

/** A single word whose estimated duration exceeds the segment cap on its own */
export interface OversizedWordWarning {
  kind: 'oversized-word'
  word: string
  duration: number
  maxSegmentDuration: number
}

/** The natural timeline and the supplied total duration disagree badly */
export interface ExtremeRescaleWarning {
  kind: 'extreme-rescale'
  factor: number
  naturalDuration: number
  totalDuration: number
}

/** Text found before the first speaker line, which belongs to no speaker */
export interface UnattributedTextWarning {
  kind: 'unattributed-text'
  /** 1-based line number in the script */
  line: number
  text: string
}

/** Custom timings could not be matched one-to-one with the utterances */
export interface CustomTimingMismatchWarning {
  kind: 'custom-timing-mismatch'
  utterances: number
  timings: number
}

/** Reported alongside otherwise valid output, never thrown */
export type DegenerateInputWarning =
  | OversizedWordWarning
  | ExtremeRescaleWarning
  | UnattributedTextWarning
  | CustomTimingMismatchWarning
