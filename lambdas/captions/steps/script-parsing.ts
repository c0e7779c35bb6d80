import type { ParsingConfig } from '@script-captions/config'
import { ScriptFormatError } from '../errors'
import type {
  SpeakerMapping,
  UnattributedTextWarning,
  Utterance,
} from '../types'

/**
 * `Label: text` or `Label:text` where the label starts with a letter and is at most 40 characters.
 * A colon followed by `//` or a digit never ends a label, so `https://` or `at 10:30` never start a turn.
 */
const SPEAKER_LINE = /^(\p{L}[\p{L}\p{N} .'_-]{0,39}?)\s*:(?!\/\/|\p{N})\s*(.*)$/u

/**
 * Options for script parsing
 */
export interface ParseScriptOptions {
  /** Parsing configuration */
  config: ParsingConfig
  /** Optional display names for the speakers */
  speakers?: SpeakerMapping
}

/**
 * Result of parsing a script
 */
export interface ParseResult {
  /** Utterances in script order */
  utterances: Utterance[]
  /** Map of speaker ids to display names */
  speakers: Record<string, string>
  /** Lines that could not be attributed to any speaker */
  warnings: UnattributedTextWarning[]
}

/** A speaker turn still collecting continuation lines */
interface PendingTurn {
  label: string
  parts: string[]
}

/**
 * Normalize a speaker label for matching: trimmed, single-spaced and case-folded.
 */
export function normalizeLabel(label: string): string {
  return label.trim().replace(/\s+/g, ' ').toLowerCase()
}

function pickName(candidate: string | undefined, fallback: string): string {
  const name = candidate?.trim()
  return name ? name : fallback
}

/**
 * Resolve the display name of a speaker.
 * Label keys win over id keys; unmapped speakers keep their label.
 */
export function resolveSpeakerName(
  mapping: SpeakerMapping | undefined,
  speakerId: number,
  label: string,
): string {
  if (!mapping) {
    return label
  }

  if (Array.isArray(mapping)) {
    return pickName(mapping[speakerId], label)
  }

  const key = normalizeLabel(label)
  for (const [mappedLabel, name] of Object.entries(mapping)) {
    if (normalizeLabel(mappedLabel) === key) {
      return pickName(name, label)
    }
  }

  return pickName(mapping[String(speakerId)], label)
}

/**
 * Split a multi-speaker script into ordered utterances.
 *
 * Lines without a speaker prefix continue the previous turn. Speaker ids are
 * assigned in first-seen order and only live for the duration of this call.
 *
 * @throws {ScriptFormatError} when no speaker line is found and the single-speaker fallback is off,
 * or when no turn carries any text
 */
export function parseScript(
  script: string,
  options: ParseScriptOptions,
): ParseResult {
  const { config, speakers: mapping } = options
  const lines = script.split(/\r?\n/)

  const speakerIds = new Map<string, number>()
  const utterances: Utterance[] = []
  const speakers: Record<string, string> = {}
  const unattributed: UnattributedTextWarning[] = []

  const flush = (turn: PendingTurn | undefined) => {
    if (!turn) {
      return
    }
    const text = turn.parts.join(' ').replace(/\s+/g, ' ').trim()
    if (text.length === 0) {
      return
    }

    const key = normalizeLabel(turn.label)
    let speakerId = speakerIds.get(key)
    if (speakerId === undefined) {
      speakerId = speakerIds.size
      speakerIds.set(key, speakerId)
    }

    const speakerName = resolveSpeakerName(mapping, speakerId, turn.label)
    speakers[String(speakerId)] = speakerName
    utterances.push({ speakerId, speakerLabel: turn.label, speakerName, text })
  }

  let current: PendingTurn | undefined
  let sawSpeakerLine = false

  for (const [index, rawLine] of lines.entries()) {
    const line = rawLine.trim()
    if (line.length === 0) {
      continue
    }

    const match = SPEAKER_LINE.exec(line)
    if (match) {
      sawSpeakerLine = true
      flush(current)
      const text = match[2].trim()
      current = {
        label: match[1].trim().replace(/\s+/g, ' '),
        parts: text ? [text] : [],
      }
      continue
    }

    if (current) {
      current.parts.push(line)
    } else {
      unattributed.push({
        kind: 'unattributed-text',
        line: index + 1,
        text: line,
      })
    }
  }
  flush(current)

  if (!sawSpeakerLine) {
    if (unattributed.length === 0) {
      throw new ScriptFormatError('Script is empty')
    }
    if (!config.singleSpeakerFallback) {
      throw new ScriptFormatError(
        'Script contains no "Speaker: text" line. Enable parsing.singleSpeakerFallback to read it as a single speaker.',
      )
    }

    flush({
      label: config.fallbackSpeakerLabel,
      parts: unattributed.map((entry) => entry.text),
    })
    return { utterances, speakers, warnings: [] }
  }

  if (utterances.length === 0) {
    throw new ScriptFormatError('Script contains speaker lines but no text')
  }

  return { utterances, speakers, warnings: unattributed }
}
