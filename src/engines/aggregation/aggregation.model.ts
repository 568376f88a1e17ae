import { z } from 'zod'
import type { StandardBreakdown } from 'src/engines/standard/standard-ats.analyzer'

// Analyzer priority order: Standard, AI, Rubric
export const AnalyzerNameSchema = z.enum(['standard', 'ai', 'rubric'])
export type AnalyzerName = z.infer<typeof AnalyzerNameSchema>
export const ANALYZER_PRIORITY: readonly AnalyzerName[] = AnalyzerNameSchema.options

export const ImprovementCategorySchema = z.enum([
  'keyword_and_skills',
  'content_and_bullets',
  'projects_and_experience',
  'structure_and_formatting',
  'ats_compatibility',
])
export type ImprovementCategory = z.infer<typeof ImprovementCategorySchema>
export const IMPROVEMENT_CATEGORIES: readonly ImprovementCategory[] = ImprovementCategorySchema.options

export const ShortlistDecisionSchema = z.enum(['Yes', 'No'])
export type ShortlistDecision = z.infer<typeof ShortlistDecisionSchema>

export interface ImprovementItem {
  readonly issue: string
  readonly fix: string
  readonly reason: string
  readonly example?: string
}

export type ImprovementMap = Readonly<Record<ImprovementCategory, readonly ImprovementItem[]>>

export interface AnalyzerResult {
  readonly score: number
  readonly strengths: readonly string[]
  readonly weaknesses: readonly string[]
  readonly improvements: ImprovementMap
}

export interface RubricFeedback {
  readonly trustedSignals: readonly string[]
  readonly redFlags: readonly string[]
  readonly learningTakeaways: readonly string[]
}

export interface RubricAnalyzerResult extends AnalyzerResult {
  readonly shortlistDecision: ShortlistDecision
  readonly feedback: RubricFeedback
}

/**
 * Contract shared by the external (network-backed) analyzers.
 * Implementations reject with ExternalAnalyzerUnavailableError, never with a partial result.
 */
export interface ExternalAnalyzer<T extends AnalyzerResult = AnalyzerResult> {
  readonly name: AnalyzerName
  isEnabled(): boolean
  analyze(resumeText: string, signal: AbortSignal): Promise<T>
}

export type AnalyzerOutcome<T extends AnalyzerResult = AnalyzerResult> =
  | { readonly status: 'available'; readonly analyzer: AnalyzerName; readonly result: T }
  | { readonly status: 'unavailable'; readonly analyzer: AnalyzerName; readonly reason: string }

export interface UnavailableAnalyzer {
  readonly analyzer: AnalyzerName
  readonly reason: string
}

export interface AggregateEvaluation {
  readonly standardScore: number | null
  readonly aiScore: number | null
  readonly rubricScore: number | null
  readonly finalScore: number
  readonly shortlistDecision?: ShortlistDecision
  readonly mergedStrengths: readonly string[]
  readonly mergedWeaknesses: readonly string[]
  readonly mergedImprovements: ImprovementMap
  readonly rubricFeedback?: RubricFeedback
  readonly standardBreakdown: StandardBreakdown | null
  readonly unavailableAnalyzers: readonly UnavailableAnalyzer[]
}

export function emptyImprovements(): Record<ImprovementCategory, ImprovementItem[]> {
  return {
    keyword_and_skills: [],
    content_and_bullets: [],
    projects_and_experience: [],
    structure_and_formatting: [],
    ats_compatibility: [],
  }
}
