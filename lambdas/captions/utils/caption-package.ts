import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { CaptionFormat, CaptionsConfig } from '@script-captions/config'
import { logger } from '../lambda-common'
import type { CaptionSegment } from '../types'
import { renderCaptions } from './captions'

/** File name suffix written for each caption format */
export const CAPTION_FILE_SUFFIXES: Record<CaptionFormat, string> = {
  srt: '.srt',
  vtt: '.vtt',
  json: '.json',
  transcript: '.txt',
  'script-timing': '_timing.txt',
}

/**
 * Options for writing a caption package
 */
export interface CaptionPackageOptions {
  /** Directory the files are written to; created when missing */
  outputDir: string
  /** File name shared by every file, before its suffix */
  baseName: string
  /** Caption configuration; `formats` selects the files */
  config: CaptionsConfig
}

/**
 * Write every configured caption format to `outputDir`.
 *
 * @returns The path written for each format
 */
export async function writeCaptionPackage(
  segments: CaptionSegment[],
  options: CaptionPackageOptions,
): Promise<Partial<Record<CaptionFormat, string>>> {
  const { outputDir, baseName, config } = options
  await mkdir(outputDir, { recursive: true })

  const written: Partial<Record<CaptionFormat, string>> = {}
  for (const format of config.formats) {
    const path = join(outputDir, `${baseName}${CAPTION_FILE_SUFFIXES[format]}`)
    await writeFile(path, renderCaptions(segments, format, config), 'utf-8')
    written[format] = path
  }

  logger.info('Caption package written', {
    outputDir,
    files: Object.values(written),
  })

  return written
}
