import { PATTERNS } from 'src/rules/ats/ats-patterns'
import type { CompiledVocabulary, TermMatcher } from 'src/rules/ats/vocabulary'
import type { ResumeText } from 'src/shared/services/resume-text.service'
import { sectionLines, type ResumeSections } from 'src/shared/services/resume-sectioning.service'

/**
 * RESUME SIGNALS
 *
 * Purpose: Extract every regex/vocabulary signal the ATS rules consume, once per evaluation.
 * Rules only read these values; they never scan text themselves.
 */

// =============================================================================
// TYPES
// =============================================================================

export interface BulletAssessment {
  readonly text: string
  readonly opensWithActionVerb: boolean
  readonly opensWithWeakVerb: boolean
  readonly mentionsTool: boolean
  readonly mentionsOutcome: boolean
  /** action verb +1, tool +1, outcome/metric +2 */
  readonly points: number
  readonly weak: boolean
}

export interface ResumeSignals {
  readonly hasEmail: boolean
  readonly hasPhone: boolean
  readonly hasLinkedIn: boolean
  readonly hasLocation: boolean
  readonly firstLineWordCount: number

  /** Distinct vocabulary terms, in vocabulary order */
  readonly skills: readonly string[]
  readonly actionVerbs: readonly string[]
  readonly buzzwords: readonly string[]
  readonly metricCount: number
  /** Words over 4 letters repeated more than STUFFING_THRESHOLD times */
  readonly stuffedWords: readonly string[]
  readonly firstPersonCount: number

  readonly bullets: readonly BulletAssessment[]
  readonly weakBulletCount: number
  readonly weakVerbBulletCount: number

  readonly projectCount: number
  readonly experienceLineCount: number
  /** null when there are not enough dates to judge */
  readonly chronologyDescending: boolean | null
}

export const SCORED_BULLET_LIMIT = 10
export const STUFFING_THRESHOLD = 10
const WEAK_BULLET_POINTS = 2

// =============================================================================
// HELPERS
// =============================================================================

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0
}

export function countMetrics(text: string): number {
  return (
    countMatches(text, PATTERNS.PERCENTAGE) +
    countMatches(text, PATTERNS.CURRENCY) +
    countMatches(text, PATTERNS.MULTIPLIER) +
    countMatches(text, PATTERNS.COUNT)
  )
}

function matchedTerms(lowerText: string, matchers: readonly TermMatcher[]): string[] {
  return matchers.filter((m) => m.pattern.test(lowerText)).map((m) => m.term)
}

function opensWith(lowerText: string, matchers: readonly TermMatcher[]): boolean {
  return matchers.some((m) => lowerText.search(m.pattern) === 0)
}

function isBullet(line: string): boolean {
  return PATTERNS.BULLET.test(line)
}

export function assessBullet(line: string, vocabulary: CompiledVocabulary): BulletAssessment {
  const text = line.replace(/^[•\-*→·]+\s*/, '')
  const lower = text.toLowerCase()

  const opensWithActionVerb = opensWith(lower, vocabulary.actionVerbs)
  const mentionsTool = vocabulary.skills.some((m) => m.pattern.test(lower))
  const mentionsOutcome = vocabulary.outcomeTerms.some((m) => m.pattern.test(lower)) || countMetrics(lower) > 0
  const points = (opensWithActionVerb ? 1 : 0) + (mentionsTool ? 1 : 0) + (mentionsOutcome ? 2 : 0)

  return {
    text,
    opensWithActionVerb,
    opensWithWeakVerb: opensWith(lower, vocabulary.weakVerbs),
    mentionsTool,
    mentionsOutcome,
    points,
    weak: points < WEAK_BULLET_POINTS,
  }
}

function findStuffedWords(lowerText: string): string[] {
  const frequency = new Map<string, number>()
  for (const token of lowerText.split(/\s+/)) {
    const word = token.replace(/^[^a-z0-9+#]+|[^a-z0-9+#]+$/g, '')
    if (word.length > 4) {
      frequency.set(word, (frequency.get(word) ?? 0) + 1)
    }
  }
  return [...frequency.entries()].filter(([, count]) => count > STUFFING_THRESHOLD).map(([word]) => word)
}

/**
 * Entries start at a non-bullet line that follows the header, a blank line or a bullet.
 * A section holding only bullets counts as one entry.
 */
export function countEntries(lines: readonly string[]): number {
  let count = 0
  let previous: 'start' | 'blank' | 'bullet' | 'text' = 'start'

  for (const line of lines) {
    if (line.length === 0) {
      previous = 'blank'
    } else if (isBullet(line)) {
      previous = 'bullet'
    } else {
      if (previous !== 'text') count++
      previous = 'text'
    }
  }

  if (count === 0 && lines.some(isBullet)) return 1
  return count
}

/**
 * Most-recent-first when at least half of adjacent pairs do not increase.
 * Date-range start years are preferred; bare year tokens need at least three.
 */
export function isMostRecentFirst(sections: ResumeSections): boolean | null {
  let sequence: readonly number[]
  if (sections.dateRanges.length >= 2) {
    sequence = sections.dateRanges.map((range) => range.start)
  } else if (sections.years.length >= 3) {
    sequence = sections.years
  } else {
    return null
  }

  let descendingPairs = 0
  for (let i = 0; i < sequence.length - 1; i++) {
    if (sequence[i] >= sequence[i + 1]) descendingPairs++
  }
  return descendingPairs / (sequence.length - 1) >= 0.5
}

// =============================================================================
// EXTRACTION
// =============================================================================

export function extractSignals(
  text: ResumeText,
  sections: ResumeSections,
  vocabulary: CompiledVocabulary,
): ResumeSignals {
  const lower = text.raw.toLowerCase()

  const firstLine = text.lines.find((line) => line.length > 0)
  const bullets = text.lines.filter(isBullet).map((line) => assessBullet(line, vocabulary))
  const scoredBullets = bullets.slice(0, SCORED_BULLET_LIMIT)
  const experienceLines = sectionLines(text, sections.sections.experience).filter((line) => line.length > 0)

  return {
    hasEmail: PATTERNS.EMAIL.test(text.raw),
    hasPhone: PATTERNS.PHONE.test(text.raw),
    hasLinkedIn: PATTERNS.LINKEDIN.test(text.raw),
    hasLocation: PATTERNS.LOCATION_WORD.test(text.raw) || PATTERNS.CITY_STATE.test(text.raw),
    firstLineWordCount: firstLine ? firstLine.split(/\s+/).length : 0,

    skills: matchedTerms(lower, vocabulary.skills),
    actionVerbs: matchedTerms(lower, vocabulary.actionVerbs),
    buzzwords: matchedTerms(lower, vocabulary.buzzwords),
    metricCount: countMetrics(text.raw),
    stuffedWords: findStuffedWords(lower),
    firstPersonCount: countMatches(text.raw, PATTERNS.FIRST_PERSON),

    bullets,
    weakBulletCount: scoredBullets.filter((bullet) => bullet.weak).length,
    weakVerbBulletCount: bullets.filter((bullet) => bullet.opensWithWeakVerb).length,

    projectCount: countEntries(sectionLines(text, sections.sections.projects)),
    experienceLineCount: experienceLines.length,
    chronologyDescending: isMostRecentFirst(sections),
  }
}
