import { describe, expect, it } from 'vitest'
import { defaultConfig, twoSpeakerSegments } from './test-fixtures'
import { buildJsonDocument, generateJson } from './json'

describe('generateJson', () => {
  it('should write the document with two-space indentation', () => {
    const result = generateJson({
      segments: twoSpeakerSegments,
      config: defaultConfig,
    })

    expect(result.startsWith('{\n  "format": "script-captions",')).toBe(true)
    expect(JSON.parse(result)).toEqual(
      buildJsonDocument({ segments: twoSpeakerSegments, config: defaultConfig }),
    )
  })

  it('should describe the document and every segment', () => {
    const document = buildJsonDocument({
      segments: twoSpeakerSegments,
      config: defaultConfig,
    })

    expect(document.format).toBe('script-captions')
    expect(document.version).toBe('1.0')
    expect(document.totalSegments).toBe(2)
    expect(document.totalDuration).toBe(4.6)
    expect(document.speakers).toEqual({ '0': 'Alice', '1': 'Bob' })
    expect(document.segments[0]).toEqual({
      startTime: 0,
      endTime: 1.3,
      duration: 1.3,
      text: 'Hello there.',
      speakerId: 0,
      speakerName: 'Alice',
      confidence: 1,
      wordCount: 2,
    })
    expect(document.segments[1].wordCount).toBe(5)
    expect(document.segments[1].duration).toBeCloseTo(2.8)
  })

  it('should use the configured format id and version', () => {
    const document = buildJsonDocument({
      segments: twoSpeakerSegments,
      config: { ...defaultConfig, jsonFormatId: 'demo', jsonVersion: '2.1' },
    })

    expect(document.format).toBe('demo')
    expect(document.version).toBe('2.1')
  })

  it('should keep speaker names when they are disabled for display', () => {
    const document = buildJsonDocument({
      segments: twoSpeakerSegments,
      config: { ...defaultConfig, includeSpeakerNames: false },
    })

    expect(document.segments[0].speakerName).toBe('Alice')
  })

  it('should describe an empty timeline', () => {
    expect(buildJsonDocument({ segments: [], config: defaultConfig })).toEqual({
      format: 'script-captions',
      version: '1.0',
      totalSegments: 0,
      totalDuration: 0,
      speakers: {},
      segments: [],
    })
  })
})
