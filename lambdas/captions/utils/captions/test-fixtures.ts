import { CaptionsConfigSchema } from '@script-captions/config'
import type { CaptionSegment } from '../../types'

export const defaultConfig = CaptionsConfigSchema.parse({})

export const twoSpeakerSegments: CaptionSegment[] = [
  {
    startTime: 0,
    endTime: 1.3,
    text: 'Hello there.',
    speakerId: 0,
    speakerName: 'Alice',
    confidence: 1,
  },
  {
    startTime: 1.8,
    endTime: 4.6,
    text: 'Hi, good to be here.',
    speakerId: 1,
    speakerName: 'Bob',
    confidence: 1,
  },
]
