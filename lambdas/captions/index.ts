import { MetricUnit } from '@aws-lambda-powertools/metrics'
import {
  type CaptionFormat,
  CaptionFormatSchema,
  EngineConfigSchema,
} from '@script-captions/config'
import { z } from 'zod'
import { ConfigurationError } from './errors'
import { type GenerationStats, generateCaptions } from './generate'
import { logger, metrics, middify } from './lambda-common'
import type { CaptionSegment, DegenerateInputWarning } from './types'
import { renderAll } from './utils/captions'

/**
 * Schema for a caption generation request
 */
export const CaptionRequestSchema = z.object({
  /** Script with `Speaker: text` lines */
  script: z.string(),
  /** Audio length in seconds the timeline is rescaled to */
  totalDuration: z.number().optional(),
  /** Display names, keyed by label or id, or listed in order of appearance */
  speakers: z
    .union([z.record(z.string(), z.string()), z.array(z.string())])
    .optional(),
  /** One timing per utterance, used instead of estimated durations */
  customTimings: z
    .array(
      z.object({
        startTime: z.number(),
        endTime: z.number().optional(),
        duration: z.number().optional(),
      }),
    )
    .optional(),
  /** Partial engine configuration */
  config: EngineConfigSchema.optional(),
  /** Formats to render, overriding `config.captions.formats` */
  formats: z.array(CaptionFormatSchema).optional(),
})

export type CaptionRequest = z.input<typeof CaptionRequestSchema>

/**
 * Response returned by the handler
 */
export interface CaptionResponse {
  segments: CaptionSegment[]
  captions: Partial<Record<CaptionFormat, string>>
  warnings: DegenerateInputWarning[]
  stats: GenerationStats
}

function parseRequest(event: CaptionRequest) {
  const parsed = CaptionRequestSchema.safeParse(event)
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(
        (issue) => `${issue.path.map(String).join('.')}: ${issue.message}`,
      ),
    )
  }
  return parsed.data
}

/**
 * Lambda Function handler that turns a script into rendered captions
 */
export const handleEvent = middify(
  async (event: CaptionRequest): Promise<CaptionResponse> => {
    const request = parseRequest(event)

    logger.info('Generating captions', {
      scriptLength: request.script.length,
      totalDuration: request.totalDuration,
      customTimings: request.customTimings?.length ?? 0,
    })

    const result = generateCaptions(request.script, {
      speakers: request.speakers,
      totalDuration: request.totalDuration,
      customTimings: request.customTimings,
      config: request.config,
    })

    for (const warning of result.warnings) {
      logger.warn('Degenerate input', { warning })
    }

    const captions = renderAll(result.segments, {
      ...result.config.captions,
      formats: request.formats ?? result.config.captions.formats,
    })

    metrics.addMetric('CaptionSegments', MetricUnit.Count, result.stats.segments)
    metrics.addMetric('CaptionSplits', MetricUnit.Count, result.stats.splits)
    metrics.addMetric(
      'CaptionWarnings',
      MetricUnit.Count,
      result.warnings.length,
    )

    logger.info('Captions generated', { stats: result.stats })

    return {
      segments: result.segments,
      captions,
      warnings: result.warnings,
      stats: result.stats,
    }
  },
)
