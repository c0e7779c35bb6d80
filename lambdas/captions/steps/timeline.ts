import type {
  EstimationConfig,
  TimingConfig,
  WarningsConfig,
} from '@script-captions/config'
import { assertValidTotalDuration } from '../config'
import { ConfigurationError } from '../errors'
import type {
  CaptionSegment,
  CustomTiming,
  DegenerateInputWarning,
  ExtremeRescaleWarning,
  Utterance,
} from '../types'
import { countWords } from '../utils/words'
import { estimateDuration } from './duration-estimation'
import { type SplitOptions, splitSegment } from './segment-splitting'

/**
 * Configuration consulted while building a timeline
 */
export interface TimelineConfig {
  timing: TimingConfig
  estimation: EstimationConfig
  warnings: WarningsConfig
}

/**
 * A finished timeline
 */
export interface TimelineResult {
  /** Ordered, non-overlapping caption segments */
  segments: CaptionSegment[]
  /** End of the last segment before any rescale */
  naturalDuration: number
  /** Factor applied by the rescale pass (1 when none was applied) */
  rescaleFactor: number
  /** Number of extra segments created by splitting */
  splits: number
  warnings: DegenerateInputWarning[]
}

/**
 * Result of the rescale pass
 */
export interface RescaleResult {
  segments: CaptionSegment[]
  factor: number
  warnings: ExtremeRescaleWarning[]
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max)
}

function pauseAfter(
  current: Utterance,
  next: Utterance | undefined,
  timing: TimingConfig,
): number {
  if (!next) {
    return 0
  }
  return next.speakerId !== current.speakerId
    ? timing.pauseBetweenSpeakers
    : timing.pauseBetweenSegments
}

/**
 * Time a segment, routing it through the splitter when it is over either cap.
 * Over-long segments are split, never truncated.
 */
function placeSegment(
  segment: CaptionSegment,
  config: TimelineConfig,
  options: SplitOptions = {},
): { segments: CaptionSegment[]; warnings: DegenerateInputWarning[] } {
  const duration = segment.endTime - segment.startTime
  const wordCount = countWords(segment.text)

  if (
    wordCount > config.timing.maxWordsPerSegment ||
    duration > config.timing.maxSegmentDuration
  ) {
    return splitSegment(segment, config, options)
  }

  return { segments: [segment], warnings: [] }
}

/**
 * Uniformly scale a timeline so that it ends exactly at `totalDuration`.
 *
 * Nothing is changed when the timeline already ends within `rescaleTolerance` of the
 * total without overrunning it. Ordering, contiguity and relative ratios are preserved.
 *
 * @throws {ConfigurationError} if `totalDuration` is not a positive number
 */
export function rescaleTimeline(
  segments: CaptionSegment[],
  totalDuration: number,
  config: Pick<TimelineConfig, 'timing' | 'warnings'>,
): RescaleResult {
  assertValidTotalDuration(totalDuration)

  const copies = segments.map((segment) => ({ ...segment }))
  if (copies.length === 0) {
    return { segments: copies, factor: 1, warnings: [] }
  }

  const lastIndex = copies.length - 1
  const naturalDuration = copies[lastIndex].endTime
  const overruns = naturalDuration > totalDuration
  if (
    naturalDuration <= 0 ||
    (!overruns &&
      totalDuration - naturalDuration <= config.timing.rescaleTolerance)
  ) {
    return { segments: copies, factor: 1, warnings: [] }
  }

  const factor = totalDuration / naturalDuration
  const warnings: ExtremeRescaleWarning[] = []
  if (
    factor > config.warnings.maxRescaleFactor ||
    factor < config.warnings.minRescaleFactor
  ) {
    warnings.push({
      kind: 'extreme-rescale',
      factor,
      naturalDuration,
      totalDuration,
    })
  }

  return {
    segments: copies.map((segment, index) => ({
      ...segment,
      startTime: segment.startTime * factor,
      endTime: index === lastIndex ? totalDuration : segment.endTime * factor,
    })),
    factor,
    warnings,
  }
}

/**
 * Assign start and end times to utterances from their estimated durations.
 *
 * A running cursor starts at 0; each utterance lasts its clamped estimate (or is split when
 * it is over the word or duration cap) and is followed by a pause that depends on whether
 * the next speaker differs. When `totalDuration` is given the result is rescaled to it.
 *
 * @throws {ConfigurationError} if `totalDuration` is given but is not a positive number
 */
export function buildTimeline(
  utterances: Utterance[],
  config: TimelineConfig,
  totalDuration?: number,
): TimelineResult {
  if (totalDuration !== undefined) {
    assertValidTotalDuration(totalDuration)
  }

  const { minSegmentDuration, maxSegmentDuration } = config.timing
  const segments: CaptionSegment[] = []
  const warnings: DegenerateInputWarning[] = []
  let splits = 0
  let cursor = 0

  for (let i = 0; i < utterances.length; i++) {
    const utterance = utterances[i]
    const estimate = estimateDuration(utterance.text, config)
    const wordCount = countWords(utterance.text)

    // Over-cap utterances keep their full estimate; the splitter shares it out
    const overCap =
      wordCount > config.timing.maxWordsPerSegment ||
      estimate > maxSegmentDuration
    const duration = overCap
      ? Math.max(estimate, minSegmentDuration)
      : clamp(estimate, minSegmentDuration, maxSegmentDuration)

    const placed = placeSegment(
      {
        startTime: cursor,
        endTime: cursor + duration,
        text: utterance.text,
        speakerId: utterance.speakerId,
        speakerName: utterance.speakerName,
        confidence: 1.0,
      },
      config,
    )

    segments.push(...placed.segments)
    warnings.push(...placed.warnings)
    splits += placed.segments.length - 1

    cursor =
      placed.segments[placed.segments.length - 1].endTime +
      pauseAfter(utterance, utterances[i + 1], config.timing)
  }

  const naturalDuration =
    segments.length > 0 ? segments[segments.length - 1].endTime : 0

  if (totalDuration === undefined) {
    return { segments, naturalDuration, rescaleFactor: 1, splits, warnings }
  }

  const rescaled = rescaleTimeline(segments, totalDuration, config)
  return {
    segments: rescaled.segments,
    naturalDuration,
    rescaleFactor: rescaled.factor,
    splits,
    warnings: [...warnings, ...rescaled.warnings],
  }
}

function timingEnd(timing: CustomTiming): number | undefined {
  if (timing.endTime !== undefined) {
    return timing.endTime
  }
  if (timing.duration !== undefined) {
    return timing.startTime + timing.duration
  }
  return undefined
}

/**
 * Build a timeline from caller-supplied timings, one per utterance.
 *
 * A timing without an end or duration lasts the utterance's estimate. Segments over the
 * caps are still split. When the number of timings does not match the number of utterances,
 * the automatic timeline is built instead, rescaled to the latest supplied end, and a
 * `custom-timing-mismatch` warning is reported.
 *
 * @throws {ConfigurationError} if timings are negative, empty or overlap each other
 */
export function applyCustomTiming(
  utterances: Utterance[],
  timings: CustomTiming[],
  config: TimelineConfig,
): TimelineResult {
  if (utterances.length !== timings.length) {
    const latestEnd = timings.reduce(
      (latest, timing) => Math.max(latest, timingEnd(timing) ?? 0),
      0,
    )
    const timeline = buildTimeline(
      utterances,
      config,
      latestEnd > 0 ? latestEnd : undefined,
    )
    return {
      ...timeline,
      warnings: [
        {
          kind: 'custom-timing-mismatch',
          utterances: utterances.length,
          timings: timings.length,
        },
        ...timeline.warnings,
      ],
    }
  }

  const issues: string[] = []
  const segments: CaptionSegment[] = []
  const warnings: DegenerateInputWarning[] = []
  let splits = 0
  let previousEnd = 0

  utterances.forEach((utterance, index) => {
    const timing = timings[index]
    const startTime = timing.startTime
    const endTime =
      timingEnd(timing) ?? startTime + estimateDuration(utterance.text, config)

    if (!(startTime >= 0) || !(endTime > startTime)) {
      issues.push(
        `timing ${index} must have 0 <= startTime < endTime, received ${startTime} to ${endTime}`,
      )
      return
    }
    if (startTime < previousEnd) {
      issues.push(
        `timing ${index} starts at ${startTime}, before the previous timing ends at ${previousEnd}`,
      )
    }

    const placed = placeSegment(
      {
        startTime,
        endTime,
        text: utterance.text,
        speakerId: utterance.speakerId,
        speakerName: utterance.speakerName,
        confidence: 1.0,
      },
      config,
      { fixedSpan: true },
    )
    previousEnd = placed.segments[placed.segments.length - 1].endTime
    segments.push(...placed.segments)
    warnings.push(...placed.warnings)
    splits += placed.segments.length - 1
  })

  if (issues.length > 0) {
    throw new ConfigurationError(issues)
  }

  return {
    segments,
    naturalDuration:
      segments.length > 0 ? segments[segments.length - 1].endTime : 0,
    rescaleFactor: 1,
    splits,
    warnings,
  }
}
