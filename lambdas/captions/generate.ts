import type { EngineConfig, EngineConfigProcessed } from '@script-captions/config'
import { assertValidTotalDuration, resolveEngineConfig } from './config'
import { parseScript } from './steps/script-parsing'
import {
  applyCustomTiming,
  buildTimeline,
  rescaleTimeline,
  type TimelineResult,
} from './steps/timeline'
import type {
  CaptionSegment,
  CustomTiming,
  DegenerateInputWarning,
  SpeakerMapping,
  Utterance,
} from './types'
import { type DistributionStats, computeDistributionStats } from './utils/stats'
import { countWords } from './utils/words'

/**
 * Options for caption generation
 */
export interface GenerateCaptionsOptions {
  /** Display names for the speakers */
  speakers?: SpeakerMapping
  /** Audio length in seconds the timeline is rescaled to */
  totalDuration?: number
  /** One timing per utterance, used instead of estimated durations */
  customTimings?: CustomTiming[]
  /** Partial engine configuration; missing values take their defaults */
  config?: EngineConfig
}

/**
 * Stats returned alongside the generated segments
 */
export interface GenerationStats {
  /** Number of parsed utterances */
  utterances: number
  /** Number of caption segments */
  segments: number
  /** Number of extra segments created by splitting */
  splits: number
  /** End of the timeline before rescaling */
  naturalDuration: number
  /** End of the final timeline */
  finalDuration: number
  /** Factor applied by the rescale pass (1 when none was applied) */
  rescaleFactor: number
  /** Distribution stats for words per segment */
  wordsPerSegment: DistributionStats
  /** Distribution stats for seconds per segment */
  secondsPerSegment: DistributionStats
}

/**
 * Everything produced from one script
 */
export interface GenerationResult {
  utterances: Utterance[]
  /** Map of speaker ids to display names */
  speakers: Record<string, string>
  segments: CaptionSegment[]
  warnings: DegenerateInputWarning[]
  stats: GenerationStats
  /** The configuration after defaults were applied */
  config: EngineConfigProcessed
}

function buildTimedSegments(
  utterances: Utterance[],
  options: GenerateCaptionsOptions,
  config: EngineConfigProcessed,
): TimelineResult {
  if (!options.customTimings) {
    return buildTimeline(utterances, config, options.totalDuration)
  }

  const timeline = applyCustomTiming(utterances, options.customTimings, config)
  if (options.totalDuration === undefined) {
    return timeline
  }

  const rescaled = rescaleTimeline(
    timeline.segments,
    options.totalDuration,
    config,
  )
  return {
    ...timeline,
    segments: rescaled.segments,
    rescaleFactor: rescaled.factor,
    warnings: [...timeline.warnings, ...rescaled.warnings],
  }
}

/**
 * Turn a multi-speaker script into timed caption segments.
 *
 * The configuration is validated before the script is read. Identical inputs
 * always give identical segments.
 *
 * @throws {ConfigurationError} if the configuration or the total duration is invalid
 * @throws {ScriptFormatError} if the script cannot be parsed
 */
export function generateCaptions(
  script: string,
  options: GenerateCaptionsOptions = {},
): GenerationResult {
  const config = resolveEngineConfig(options.config)
  if (options.totalDuration !== undefined) {
    assertValidTotalDuration(options.totalDuration)
  }

  const parsed = parseScript(script, {
    config: config.parsing,
    speakers: options.speakers,
  })
  const timeline = buildTimedSegments(parsed.utterances, options, config)
  const { segments } = timeline
  const last = segments[segments.length - 1]

  return {
    utterances: parsed.utterances,
    speakers: parsed.speakers,
    segments,
    warnings: [...parsed.warnings, ...timeline.warnings],
    stats: {
      utterances: parsed.utterances.length,
      segments: segments.length,
      splits: timeline.splits,
      naturalDuration: timeline.naturalDuration,
      finalDuration: last ? last.endTime : 0,
      rescaleFactor: timeline.rescaleFactor,
      wordsPerSegment: computeDistributionStats(
        segments.map((segment) => countWords(segment.text)),
      ),
      secondsPerSegment: computeDistributionStats(
        segments.map((segment) => segment.endTime - segment.startTime),
      ),
    },
    config,
  }
}
