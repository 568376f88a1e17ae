import { Injectable } from '@nestjs/common'
import { z } from 'zod'
import { PATTERNS } from 'src/rules/ats/ats-patterns'
import type { ResumeText } from './resume-text.service'

// Declaration order is the tie-break priority for headers matching several keys
export const SectionKeySchema = z.enum([
  'contact',
  'skills',
  'experience',
  'projects',
  'education',
  'summary',
  'certifications',
])
export type SectionKey = z.infer<typeof SectionKeySchema>

export interface SectionSpan {
  /** null when the section was inferred without a header (contact preamble) */
  readonly headerLine: number | null
  /** Equals headerLine for an inline label */
  readonly startLine: number
  /** Inclusive; endLine < startLine means the section has no content lines */
  readonly endLine: number
}

export type SectionMap = Readonly<Partial<Record<SectionKey, SectionSpan>>>

export interface DateRange {
  readonly start: number
  readonly end: number | 'present'
}

interface SectionHeader {
  readonly key: SectionKey
  /** Content follows the label on the header line itself */
  readonly inline: boolean
}

export interface ResumeSections {
  readonly sections: SectionMap
  /** Every 1900-2099 year token, in text order */
  readonly years: readonly number[]
  readonly dateRanges: readonly DateRange[]
}

const MAX_HEADER_LENGTH = 50
const MAX_HEADER_WORDS = 5
const LOWERCASE_CONNECTIVES = new Set(['and', '&', 'of', '/', '-'])

/**
 * ResumeSectioningService
 *
 * Purpose: Deterministically map resume lines onto the canonical section keys.
 *
 * Allowed logic:
 * - Heuristic-only header detection (shape + alias patterns)
 * - Deterministic tie-break by key priority
 */
@Injectable()
export class ResumeSectioningService {
  // Header aliases per canonical key, tested against each lowercased header part
  private readonly sectionPatterns: ReadonlyArray<{
    key: SectionKey
    patterns: RegExp[]
  }> = [
    {
      key: 'contact',
      patterns: [/^contact(\s*(info|information|details|me))?$/, /^personal\s*(info|information|details)$/],
    },
    {
      key: 'skills',
      patterns: [
        /^(technical\s*|core\s*|key\s*)?skills?$/,
        /^(core\s*)?competenc(y|ies)$/,
        /^technologies$/,
        /^tech(nical)?\s*stack$/,
        /^tools$/,
        /^proficiencies$/,
        /^(areas\s*of\s*)?expertise$/,
      ],
    },
    {
      key: 'experience',
      patterns: [
        /^(work\s*|professional\s*|relevant\s*)?experience$/,
        /^employment(\s*history)?$/,
        /^(work|career)\s*history$/,
        /^internships?$/,
      ],
    },
    {
      key: 'projects',
      patterns: [
        /^(personal\s*|academic\s*|key\s*|selected\s*|technical\s*)?projects?$/,
        /^portfolio$/,
        /^work\s*samples$/,
      ],
    },
    {
      key: 'education',
      patterns: [
        /^education(al\s*background)?$/,
        /^academic\s*(background|qualifications)$/,
        /^academics$/,
        /^qualifications$/,
      ],
    },
    {
      key: 'summary',
      patterns: [
        /^(professional\s*|career\s*)?summary$/,
        /^(professional\s*)?profile$/,
        /^(career\s*)?objective$/,
        /^about(\s*me)?$/,
        /^introduction$/,
      ],
    },
    {
      key: 'certifications',
      patterns: [/^certifications?$/, /^certificates?$/, /^licen[cs]es?$/, /^training$/, /^courses?$/],
    },
  ]

  detect(text: ResumeText): ResumeSections {
    const { lines } = text

    // First pass: every header line is a boundary, whichever key it maps to
    const boundaries: Array<SectionHeader & { lineIndex: number }> = []
    for (let i = 0; i < lines.length; i++) {
      const header = this.detectHeader(lines[i])
      if (header) {
        boundaries.push({ ...header, lineIndex: i })
      }
    }

    // Second pass: the first header for a key opens it, the next header of any kind closes it
    const sections: Partial<Record<SectionKey, SectionSpan>> = {}
    for (let i = 0; i < boundaries.length; i++) {
      const current = boundaries[i]
      if (sections[current.key]) continue

      const next = boundaries[i + 1]
      sections[current.key] = {
        headerLine: current.lineIndex,
        startLine: current.inline ? current.lineIndex : current.lineIndex + 1,
        endLine: next ? next.lineIndex - 1 : lines.length - 1,
      }
    }

    // Contact details usually sit above the first header without one of their own
    if (!sections.contact) {
      const preambleEnd = boundaries.length > 0 ? boundaries[0].lineIndex - 1 : lines.length - 1
      const preamble = lines.slice(0, preambleEnd + 1).join('\n')
      if (preambleEnd >= 0 && this.hasContactToken(preamble)) {
        sections.contact = { headerLine: null, startLine: 0, endLine: preambleEnd }
      }
    }

    return Object.freeze({
      sections: Object.freeze(sections),
      years: Object.freeze(Array.from(text.raw.matchAll(PATTERNS.YEAR), (m) => Number(m[0]))),
      dateRanges: Object.freeze(
        Array.from(text.raw.matchAll(PATTERNS.DATE_RANGE), (m): DateRange => ({
          start: Number(m[1]),
          end: /^\d/.test(m[2]) ? Number(m[2]) : 'present',
        })),
      ),
    })
  }

  /**
   * Detect the canonical key of a header line
   * @returns Section key if the line is a header, null otherwise
   */
  detectSectionKey(line: string): SectionKey | null {
    return this.detectHeader(line)?.key ?? null
  }

  // "Skills: Python, React" labels its section and carries content on the same line
  private detectHeader(line: string): SectionHeader | null {
    const key = this.matchHeader(line)
    if (key) return { key, inline: false }

    const colon = line.indexOf(':')
    if (colon <= 0 || line.slice(colon + 1).trim().length === 0) return null

    const inlineKey = this.matchHeader(line.slice(0, colon))
    return inlineKey ? { key: inlineKey, inline: true } : null
  }

  private matchHeader(line: string): SectionKey | null {
    const cleanLine = line
      .trim()
      .replace(/^[#*\-•:]+\s*/, '') // Remove leading punctuation
      .replace(/\s*[#*\-•:]+$/, '') // Remove trailing punctuation
      .replace(/^\d+[.)]\s*/, '') // Remove numbering
      .trim()

    if (!this.isHeaderShaped(cleanLine)) return null

    // Combined headers ("Education & Certifications") match every key any part matches
    const lower = cleanLine.toLowerCase()
    const parts = [lower, ...lower.split(/\s*(?:&|\/|,|\band\b)\s*/).filter((part) => part.length > 0)]

    for (const { key, patterns } of this.sectionPatterns) {
      if (parts.some((part) => patterns.some((pattern) => pattern.test(part)))) {
        return key
      }
    }

    return null
  }

  private isHeaderShaped(line: string): boolean {
    if (line.length === 0 || line.length > MAX_HEADER_LENGTH) return false
    if (!/[A-Za-z]/.test(line)) return false

    const words = line.split(/\s+/)
    if (words.length > MAX_HEADER_WORDS) return false

    if (line === line.toUpperCase()) return true
    return words.every((word) => /^[A-Z]/.test(word) || LOWERCASE_CONNECTIVES.has(word.toLowerCase()))
  }

  private hasContactToken(text: string): boolean {
    return PATTERNS.EMAIL.test(text) || PATTERNS.PHONE.test(text) || PATTERNS.LINKEDIN.test(text)
  }
}

/**
 * Content lines of a section span (header excluded)
 */
export function sectionLines(text: ResumeText, span: SectionSpan | undefined): string[] {
  if (!span || span.endLine < span.startLine) return []
  return text.lines.slice(span.startLine, span.endLine + 1)
}
