import { Injectable } from '@nestjs/common'
import { ValidationError } from '../errors'

export const MIN_CONTENT_LENGTH = 300

export interface ResumeText {
  readonly raw: string
  readonly lines: readonly string[]
  readonly words: readonly string[]
  readonly charCount: number
  /** Alphabetic words shorter than 3 characters over all words (OCR-noise proxy) */
  readonly shortWordRatio: number
  /** Table/column symbols over all characters */
  readonly symbolRatio: number
  /** Non-blank lines shorter than 10 characters over all lines */
  readonly shortLineRatio: number
  readonly validationError: ValidationError | null
}

const SYMBOL_PATTERN = /[|_=+[\]{}]/g
const ALPHABETIC_WORD = /^[A-Za-z]+$/

/**
 * ResumeTextService
 *
 * Purpose: Clean and index raw extracted text once per evaluation.
 *
 * Allowed logic:
 * - Line/word splitting and character-class ratios
 * - Minimum-content validation (reported on the value, never thrown)
 */
@Injectable()
export class ResumeTextService {
  normalize(raw: string): ResumeText {
    const lines = raw.split(/\r?\n/).map((line) => line.trim())
    const words = raw.split(/\s+/).filter((word) => word.length > 0)
    const charCount = raw.length

    const shortWords = words.filter((word) => word.length < 3 && ALPHABETIC_WORD.test(word)).length
    const symbols = raw.match(SYMBOL_PATTERN)?.length ?? 0
    const shortLines = lines.filter((line) => line.length > 0 && line.length < 10).length

    return Object.freeze({
      raw,
      lines: Object.freeze(lines),
      words: Object.freeze(words),
      charCount,
      shortWordRatio: shortWords / Math.max(words.length, 1),
      symbolRatio: symbols / Math.max(charCount, 1),
      shortLineRatio: shortLines / Math.max(lines.length, 1),
      validationError: this.validate(raw),
    })
  }

  private validate(raw: string): ValidationError | null {
    if (raw.trim().length === 0) {
      return new ValidationError('Resume text is empty')
    }
    if (raw.length < MIN_CONTENT_LENGTH) {
      return new ValidationError(`Resume text is shorter than ${MIN_CONTENT_LENGTH} characters`)
    }
    return null
  }
}
