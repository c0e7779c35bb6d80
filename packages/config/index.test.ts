import { describe, expect, it } from 'vitest'
import {
  CaptionFormatSchema,
  CaptionsConfigSchema,
  DEFAULT_TECHNICAL_TERM_PATTERNS,
  defineConfig,
  EngineConfigSchema,
  EstimationConfigSchema,
  findConfigContradictions,
  ParsingConfigSchema,
  TimingConfigSchema,
} from './index'

describe('TimingConfigSchema', () => {
  it('populates defaults for empty object', () => {
    const result = TimingConfigSchema.parse({})

    expect(result).toEqual({
      wordsPerMinute: 150,
      minSegmentDuration: 1.0,
      maxSegmentDuration: 10,
      pauseBetweenSpeakers: 0.5,
      pauseBetweenSegments: 0.3,
      maxWordsPerSegment: 15,
      rescaleTolerance: 0.01,
    })
  })

  it('allows overriding defaults', () => {
    const result = TimingConfigSchema.parse({
      wordsPerMinute: 180,
      maxSegmentDuration: 60,
      maxWordsPerSegment: 12,
    })

    expect(result.wordsPerMinute).toBe(180)
    expect(result.maxSegmentDuration).toBe(60)
    expect(result.maxWordsPerSegment).toBe(12)
    expect(result.minSegmentDuration).toBe(1.0)
  })

  it('rejects a non-positive word limit', () => {
    expect(() => TimingConfigSchema.parse({ maxWordsPerSegment: 0 })).toThrow()
    expect(() =>
      TimingConfigSchema.parse({ maxWordsPerSegment: -3 }),
    ).toThrow()
  })

  it('rejects a fractional word limit', () => {
    expect(() =>
      TimingConfigSchema.parse({ maxWordsPerSegment: 7.5 }),
    ).toThrow()
  })

  it('rejects a zero speaking rate', () => {
    expect(() => TimingConfigSchema.parse({ wordsPerMinute: 0 })).toThrow()
  })
})

describe('EstimationConfigSchema', () => {
  it('populates defaults for empty object', () => {
    const result = EstimationConfigSchema.parse({})

    expect(result).toEqual({
      sentenceEndPause: 0.5,
      commaPause: 0.3,
      numericUplift: 0.05,
      technicalTermUplift: 0.05,
      technicalTermPatterns: DEFAULT_TECHNICAL_TERM_PATTERNS,
    })
  })

  it('does not share the default pattern list between parses', () => {
    const first = EstimationConfigSchema.parse({})
    first.technicalTermPatterns.push('extra')
    const second = EstimationConfigSchema.parse({})

    expect(second.technicalTermPatterns).toEqual(
      DEFAULT_TECHNICAL_TERM_PATTERNS,
    )
  })
})

describe('ParsingConfigSchema', () => {
  it('populates defaults for empty object', () => {
    expect(ParsingConfigSchema.parse({})).toEqual({
      singleSpeakerFallback: false,
      fallbackSpeakerLabel: 'Speaker',
    })
  })

  it('rejects an empty fallback label', () => {
    expect(() =>
      ParsingConfigSchema.parse({ fallbackSpeakerLabel: '' }),
    ).toThrow()
  })
})

describe('CaptionsConfigSchema', () => {
  it('populates defaults for empty object', () => {
    const result = CaptionsConfigSchema.parse({})

    expect(result).toEqual({
      formats: ['srt', 'vtt', 'json', 'transcript', 'script-timing'],
      includeTimestamps: true,
      includeSpeakerNames: true,
      jsonFormatId: 'script-captions',
      jsonVersion: '1.0',
    })
  })

  it('rejects unknown formats', () => {
    expect(() => CaptionsConfigSchema.parse({ formats: ['ass'] })).toThrow()
  })

  it('accepts every known format', () => {
    for (const format of [
      'srt',
      'vtt',
      'json',
      'transcript',
      'script-timing',
    ]) {
      expect(CaptionFormatSchema.parse(format)).toBe(format)
    }
  })
})

describe('EngineConfigSchema', () => {
  it('populates all sections when empty', () => {
    const result = EngineConfigSchema.parse({})

    expect(result.timing.maxSegmentDuration).toBe(10)
    expect(result.estimation.commaPause).toBe(0.3)
    expect(result.parsing.singleSpeakerFallback).toBe(false)
    expect(result.captions.jsonVersion).toBe('1.0')
    expect(result.warnings).toEqual({
      maxRescaleFactor: 3,
      minRescaleFactor: 0.33,
    })
  })

  it('allows partial overrides of nested configs', () => {
    const result = EngineConfigSchema.parse({
      timing: { wordsPerMinute: 120 },
      captions: { formats: ['srt'] },
    })

    expect(result.timing.wordsPerMinute).toBe(120)
    expect(result.timing.pauseBetweenSpeakers).toBe(0.5)
    expect(result.captions.formats).toEqual(['srt'])
    expect(result.captions.includeTimestamps).toBe(true)
  })
})

describe('findConfigContradictions', () => {
  it('returns no problems for the defaults', () => {
    expect(findConfigContradictions(EngineConfigSchema.parse({}))).toEqual([])
  })

  it('reports a minimum duration above the maximum', () => {
    const config = EngineConfigSchema.parse({
      timing: { minSegmentDuration: 12, maxSegmentDuration: 8 },
    })

    expect(findConfigContradictions(config)).toEqual([
      'timing.minSegmentDuration (12) is greater than timing.maxSegmentDuration (8)',
    ])
  })

  it('reports inverted rescale thresholds', () => {
    const config = EngineConfigSchema.parse({
      warnings: { minRescaleFactor: 4, maxRescaleFactor: 2 },
    })

    expect(findConfigContradictions(config)).toEqual([
      'warnings.minRescaleFactor (4) is greater than warnings.maxRescaleFactor (2)',
    ])
  })

  it('reports technical-term patterns that do not compile', () => {
    const config = EngineConfigSchema.parse({
      estimation: { technicalTermPatterns: ['[unclosed'] },
    })

    expect(findConfigContradictions(config)).toEqual([
      'estimation.technicalTermPatterns contains an invalid pattern: [unclosed',
    ])
  })
})

describe('defineConfig', () => {
  it('returns the configuration unchanged', () => {
    const config = { timing: { maxWordsPerSegment: 8 } }

    expect(defineConfig(config)).toBe(config)
  })
})
