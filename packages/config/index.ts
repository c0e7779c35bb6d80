import { z } from 'zod'

/**
 * Output representations the caption formatter can render.
 */
export const CaptionFormatSchema = z.enum([
  'srt',
  'vtt',
  'json',
  'transcript',
  'script-timing',
])

export type CaptionFormat = z.infer<typeof CaptionFormatSchema>

/**
 * Schema for pacing, pauses and segment bounds used to build the timeline.
 */
export const TimingConfigSchema = z.object({
  /** Average speaking rate used to turn word counts into seconds (default: 150) */
  wordsPerMinute: z.number().positive().default(150),
  /** Shortest duration a caption segment may have, in seconds (default: 1.0) */
  minSegmentDuration: z.number().positive().default(1.0),
  /** Longest duration a caption segment may have, in seconds (default: 10) */
  maxSegmentDuration: z.number().positive().default(10),
  /** Pause inserted when the next utterance has a different speaker (default: 0.5) */
  pauseBetweenSpeakers: z.number().nonnegative().default(0.5),
  /** Pause inserted between consecutive utterances of the same speaker (default: 0.3) */
  pauseBetweenSegments: z.number().nonnegative().default(0.3),
  /** Maximum words per caption segment (default: 15) */
  maxWordsPerSegment: z.number().int().positive().default(15),
  /**
   * Difference in seconds between the natural timeline and the supplied total duration
   * below which no rescale is applied, as long as the timeline does not overrun it (default: 0.01)
   */
  rescaleTolerance: z.number().nonnegative().default(0.01),
})

/**
 * Configuration for timeline construction.
 */
export type TimingConfig = z.infer<typeof TimingConfigSchema>

/**
 * Technical-term patterns applied when no custom list is configured:
 * acronyms, camelCase identifiers, snake_case identifiers and dotted domain names.
 */
export const DEFAULT_TECHNICAL_TERM_PATTERNS = [
  '\\b[A-Z]{2,}s?\\b',
  '\\b[a-z]+[A-Z][A-Za-z]*\\b',
  '\\b[A-Za-z]+(?:_[A-Za-z0-9]+)+\\b',
  '\\b[a-z0-9-]+\\.(?:com|org|net|io|ai|dev)\\b',
]

/**
 * Schema for the heuristics of the duration estimator.
 */
export const EstimationConfigSchema = z.object({
  /** Seconds added per sentence-ending mark: `.`, `?` or `!` (default: 0.5) */
  sentenceEndPause: z.number().nonnegative().default(0.5),
  /** Seconds added per comma (default: 0.3) */
  commaPause: z.number().nonnegative().default(0.3),
  /** Fraction of the base estimate added when the text contains digits (default: 0.05) */
  numericUplift: z.number().nonnegative().default(0.05),
  /** Fraction of the base estimate added when a technical term is found (default: 0.05) */
  technicalTermUplift: z.number().nonnegative().default(0.05),
  /** Regular expression sources recognized as technical terms */
  technicalTermPatterns: z
    .array(z.string())
    .default(() => [...DEFAULT_TECHNICAL_TERM_PATTERNS]),
})

export type EstimationConfig = z.infer<typeof EstimationConfigSchema>

/**
 * Schema for script parsing.
 */
export const ParsingConfigSchema = z.object({
  /**
   * If true, a script without any `Speaker: text` line is read as a single utterance
   * instead of failing (default: false)
   */
  singleSpeakerFallback: z.boolean().default(false),
  /** Label given to the speaker of a fallback utterance (default: "Speaker") */
  fallbackSpeakerLabel: z.string().min(1).default('Speaker'),
})

export type ParsingConfig = z.infer<typeof ParsingConfigSchema>

/**
 * Schema for caption rendering.
 */
export const CaptionsConfigSchema = z.object({
  /** Formats rendered by `renderAll` and written by the caption package (default: all) */
  formats: z
    .array(CaptionFormatSchema)
    .default((): CaptionFormat[] => ['srt', 'vtt', 'json', 'transcript', 'script-timing']),
  /** In transcript formats, prefix each line with `[HH:MM:SS]` (default: true) */
  includeTimestamps: z.boolean().default(true),
  /** Include speaker names in every format that supports them (default: true) */
  includeSpeakerNames: z.boolean().default(true),
  /** Format identifier written in the JSON document (default: "script-captions") */
  jsonFormatId: z.string().default('script-captions'),
  /** Version string written in the JSON document (default: "1.0") */
  jsonVersion: z.string().default('1.0'),
})

export type CaptionsConfig = z.infer<typeof CaptionsConfigSchema>

/**
 * Schema for the thresholds that turn unusual input into warnings.
 */
export const WarningsConfigSchema = z.object({
  /** Rescale factors above this value are reported (default: 3) */
  maxRescaleFactor: z.number().positive().default(3),
  /** Rescale factors below this value are reported (default: 0.33) */
  minRescaleFactor: z.number().positive().default(0.33),
})

export type WarningsConfig = z.infer<typeof WarningsConfigSchema>

/** Default values for TimingConfig */
const timingDefaults: TimingConfig = {
  wordsPerMinute: 150,
  minSegmentDuration: 1.0,
  maxSegmentDuration: 10,
  pauseBetweenSpeakers: 0.5,
  pauseBetweenSegments: 0.3,
  maxWordsPerSegment: 15,
  rescaleTolerance: 0.01,
}

/** Default values for EstimationConfig */
const estimationDefaults: EstimationConfig = {
  sentenceEndPause: 0.5,
  commaPause: 0.3,
  numericUplift: 0.05,
  technicalTermUplift: 0.05,
  technicalTermPatterns: [...DEFAULT_TECHNICAL_TERM_PATTERNS],
}

/** Default values for ParsingConfig */
const parsingDefaults: ParsingConfig = {
  singleSpeakerFallback: false,
  fallbackSpeakerLabel: 'Speaker',
}

/** Default values for CaptionsConfig */
const captionsDefaults: CaptionsConfig = {
  formats: ['srt', 'vtt', 'json', 'transcript', 'script-timing'],
  includeTimestamps: true,
  includeSpeakerNames: true,
  jsonFormatId: 'script-captions',
  jsonVersion: '1.0',
}

/** Default values for WarningsConfig */
const warningsDefaults: WarningsConfig = {
  maxRescaleFactor: 3,
  minRescaleFactor: 0.33,
}

/**
 * Schema for the whole caption engine configuration.
 * Every section is optional and falls back to its defaults.
 */
export const EngineConfigSchema = z.object({
  /** Pacing, pauses and bounds of the timeline */
  timing: TimingConfigSchema.optional().transform((val) => ({
    ...timingDefaults,
    ...val,
  })),

  /** Duration estimation heuristics */
  estimation: EstimationConfigSchema.optional().transform((val) => ({
    ...estimationDefaults,
    ...val,
  })),

  /** Script parsing behaviour */
  parsing: ParsingConfigSchema.optional().transform((val) => ({
    ...parsingDefaults,
    ...val,
  })),

  /** Caption rendering options */
  captions: CaptionsConfigSchema.optional().transform((val) => ({
    ...captionsDefaults,
    ...val,
  })),

  /** Warning thresholds */
  warnings: WarningsConfigSchema.optional().transform((val) => ({
    ...warningsDefaults,
    ...val,
  })),
})

/**
 * Configuration of the caption engine, with every default applied.
 */
export type EngineConfigProcessed = z.infer<typeof EngineConfigSchema>
export type EngineConfig = z.input<typeof EngineConfigSchema>

/**
 * Lists the problems that single-field validation cannot catch, such as bounds that contradict each other.
 * An empty list means the configuration is consistent.
 */
export function findConfigContradictions(
  config: EngineConfigProcessed,
): string[] {
  const problems: string[] = []
  const { timing, estimation, warnings } = config

  if (timing.minSegmentDuration > timing.maxSegmentDuration) {
    problems.push(
      `timing.minSegmentDuration (${timing.minSegmentDuration}) is greater than timing.maxSegmentDuration (${timing.maxSegmentDuration})`,
    )
  }

  if (warnings.minRescaleFactor > warnings.maxRescaleFactor) {
    problems.push(
      `warnings.minRescaleFactor (${warnings.minRescaleFactor}) is greater than warnings.maxRescaleFactor (${warnings.maxRescaleFactor})`,
    )
  }

  for (const pattern of estimation.technicalTermPatterns) {
    try {
      new RegExp(pattern, 'u')
    } catch {
      problems.push(
        `estimation.technicalTermPatterns contains an invalid pattern: ${pattern}`,
      )
    }
  }

  return problems
}

/**
 * Allows to easily define an EngineConfig object with proper typing (even with just JavaScript).
 * @param {EngineConfig} config - The engine configuration object
 * @returns {EngineConfig}
 */
export function defineConfig(config: EngineConfig): EngineConfig {
  return config
}
