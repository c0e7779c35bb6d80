import { describe, expect, it } from 'vitest'
import { countWords, textToWords, wordsToText } from './words'

describe('textToWords', () => {
  it('should split on any whitespace', () => {
    expect(textToWords(' Hello\tthere,\n friend ')).toEqual([
      'Hello',
      'there,',
      'friend',
    ])
  })

  it('should return no words for blank text', () => {
    expect(textToWords('   ')).toEqual([])
  })
})

describe('countWords', () => {
  it('should count whitespace-separated tokens', () => {
    expect(countWords('Hi, good to be here.')).toBe(5)
  })
})

describe('wordsToText', () => {
  it('should join words with single spaces', () => {
    expect(wordsToText(['Hello', 'there.'])).toBe('Hello there.')
  })
})
