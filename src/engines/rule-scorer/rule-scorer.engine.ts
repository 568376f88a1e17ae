import { Injectable } from '@nestjs/common'
import {
  ATS_CATEGORIES,
  type CategoryDefinition,
  type ImprovementHint,
  type ScoringContext,
} from 'src/rules/ats/ats-category.rules'
import { DEFAULT_VOCABULARY, type CompiledVocabulary } from 'src/rules/ats/vocabulary'
import type { ResumeSections } from 'src/shared/services/resume-sectioning.service'
import type { ResumeText } from 'src/shared/services/resume-text.service'
import { extractSignals } from './resume-signals'
import type { CategoryFlag, CategoryResult, Classification, Penalty, RuleScore } from './rule-scorer.model'

const MIN_YEARS_FOR_EXPERIENCED = 2

/**
 * Rule Scorer
 *
 * Responsibilities:
 * - Classify the candidate (FRESHER / EXPERIENCED) before any category runs
 * - Evaluate the declarative category rules in order
 * - Compute the weighted total
 *
 * Forbidden:
 * - Score caps (CapPolicy owns them)
 * - Any LLM calls
 */
@Injectable()
export class RuleScorer {
  score(
    text: ResumeText,
    sections: ResumeSections,
    categories: readonly CategoryDefinition[] = ATS_CATEGORIES,
    vocabulary: CompiledVocabulary = DEFAULT_VOCABULARY,
  ): RuleScore {
    const classification = classify(sections)
    const ctx: ScoringContext = {
      text,
      sections,
      classification,
      signals: extractSignals(text, sections, vocabulary),
    }

    const results: CategoryResult[] = []
    const hints = new Set<ImprovementHint>()

    for (const definition of categories) {
      const penalties: Penalty[] = []
      const flags = new Set<CategoryFlag>()

      for (const rule of definition.rules) {
        if (!rule.when(ctx)) continue
        penalties.push({ ruleId: rule.id, label: rule.label, points: rule.penalty })
        rule.flags?.forEach((flag) => flags.add(flag))
        hints.add(rule.improvement)
      }

      const deducted = penalties.reduce((sum, penalty) => sum + penalty.points, 0)
      results.push({
        key: definition.key,
        name: definition.name,
        weight: definition.weight,
        rawScore: Math.max(0, 100 - deducted),
        penalties,
        flags: [...flags],
      })
    }

    return {
      classification,
      categories: results,
      weightedTotal: weightedTotal(results),
      improvementHints: [...hints],
    }
  }
}

export function classify(sections: ResumeSections): Classification {
  if (!sections.sections.experience) return 'FRESHER'
  if (sections.years.length < MIN_YEARS_FOR_EXPERIENCED) return 'FRESHER'
  return 'EXPERIENCED'
}

export function weightedTotal(categories: readonly CategoryResult[]): number {
  const sum = categories.reduce((acc, category) => acc + category.rawScore * category.weight, 0)
  return Math.min(100, Math.max(0, Math.round(sum / 100)))
}
