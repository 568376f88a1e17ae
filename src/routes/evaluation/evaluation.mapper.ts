import type { AggregateEvaluation, ImprovementItem, ImprovementMap } from 'src/engines/aggregation/aggregation.model'
import type { StandardBreakdown } from 'src/engines/standard/standard-ats.analyzer'
import type { EvaluationResultType } from './evaluation.model'

type ImprovementResponse = EvaluationResultType['resume_improvements']
type BreakdownResponse = NonNullable<EvaluationResultType['standard_breakdown']>

function toImprovementItem(item: ImprovementItem): ImprovementResponse['keyword_and_skills'][number] {
  return {
    issue: item.issue,
    recommended_fix: item.fix,
    reason: item.reason,
    ...(item.example !== undefined ? { example: item.example } : {}),
  }
}

function toImprovements(improvements: ImprovementMap): ImprovementResponse {
  return {
    keyword_and_skills: improvements.keyword_and_skills.map(toImprovementItem),
    content_and_bullets: improvements.content_and_bullets.map(toImprovementItem),
    projects_and_experience: improvements.projects_and_experience.map(toImprovementItem),
    structure_and_formatting: improvements.structure_and_formatting.map(toImprovementItem),
    ats_compatibility: improvements.ats_compatibility.map(toImprovementItem),
  }
}

function toBreakdown(breakdown: StandardBreakdown): BreakdownResponse {
  return {
    classification: breakdown.classification,
    weighted_total: breakdown.weightedTotal,
    capped_score: breakdown.cappedScore,
    applied_caps: breakdown.appliedCaps.map(({ reason, cap }) => ({ reason, cap })),
    categories: breakdown.categories.map((category) => ({
      key: category.key,
      name: category.name,
      weight: category.weight,
      raw_score: category.rawScore,
      penalties: category.penalties.map(({ label, points }) => ({ label, points })),
    })),
  }
}

/**
 * AggregateEvaluation (camelCase domain) → wire contract (snake_case)
 */
export function toEvaluationResponse(evaluation: AggregateEvaluation): EvaluationResultType {
  return {
    standard_ats_score: evaluation.standardScore,
    ai_ats_score: evaluation.aiScore,
    rubric_ats_score: evaluation.rubricScore,
    final_ats_score: evaluation.finalScore,
    shortlist_decision: evaluation.shortlistDecision ?? null,
    analysis_summary: {
      strengths: [...evaluation.mergedStrengths],
      weaknesses: [...evaluation.mergedWeaknesses],
    },
    resume_improvements: toImprovements(evaluation.mergedImprovements),
    rubric_feedback: evaluation.rubricFeedback
      ? {
          trusted_signals: [...evaluation.rubricFeedback.trustedSignals],
          red_flags: [...evaluation.rubricFeedback.redFlags],
          learning_takeaways: [...evaluation.rubricFeedback.learningTakeaways],
        }
      : null,
    standard_breakdown: evaluation.standardBreakdown ? toBreakdown(evaluation.standardBreakdown) : null,
    unavailable_analyzers: evaluation.unavailableAnalyzers.map(({ analyzer, reason }) => ({ analyzer, reason })),
  }
}
