import {
  emptyImprovements,
  IMPROVEMENT_CATEGORIES,
  type AnalyzerResult,
  type ImprovementMap,
} from './aggregation.model'

export const MAX_FEEDBACK_ITEMS = 10

export interface MergedFeedback {
  readonly strengths: readonly string[]
  readonly weaknesses: readonly string[]
  readonly improvements: ImprovementMap
}

/**
 * Case-insensitive dedup on trimmed text. The first occurrence wins and keeps its spelling.
 */
export function dedupeFeedback(items: readonly string[], limit = MAX_FEEDBACK_ITEMS): string[] {
  const seen = new Set<string>()
  const unique: string[] = []
  for (const item of items) {
    const text = item.trim()
    const key = text.toLowerCase()
    if (text.length === 0 || seen.has(key)) continue
    seen.add(key)
    unique.push(text)
    if (unique.length === limit) break
  }
  return unique
}

/**
 * Merge feedback from the available analyzers.
 * `results` must already be in priority order (standard, ai, rubric).
 * Improvements are concatenated per category without cross-analyzer dedup.
 */
export function mergeFeedback(results: readonly AnalyzerResult[]): MergedFeedback {
  const improvements = emptyImprovements()
  for (const category of IMPROVEMENT_CATEGORIES) {
    improvements[category] = results.flatMap((result) => result.improvements[category])
  }

  return {
    strengths: dedupeFeedback(results.flatMap((result) => result.strengths)),
    weaknesses: dedupeFeedback(results.flatMap((result) => result.weaknesses)),
    improvements,
  }
}
