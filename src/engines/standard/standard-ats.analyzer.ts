import { Injectable } from '@nestjs/common'
import { emptyImprovements, type AnalyzerResult } from 'src/engines/aggregation/aggregation.model'
import { applyScoreCaps } from 'src/engines/rule-scorer/cap-policy'
import { RuleScorer } from 'src/engines/rule-scorer/rule-scorer.engine'
import type {
  CategoryKey,
  CategoryResult,
  Classification,
  TriggeredCap,
} from 'src/engines/rule-scorer/rule-scorer.model'
import { ResumeSectioningService } from 'src/shared/services/resume-sectioning.service'
import { ResumeTextService } from 'src/shared/services/resume-text.service'

export interface StandardBreakdown {
  readonly classification: Classification
  readonly weightedTotal: number
  readonly cappedScore: number
  readonly appliedCaps: readonly TriggeredCap[]
  readonly bindingCap: TriggeredCap | null
  readonly categories: readonly CategoryResult[]
}

export interface StandardAnalysis {
  readonly result: AnalyzerResult
  readonly breakdown: StandardBreakdown
}

type Threshold = { key: CategoryKey; min: number; message: string }

const STRENGTH_THRESHOLDS: readonly Threshold[] = [
  { key: 'parsability', min: 80, message: 'Clean, ATS-parsable format' },
  { key: 'sections', min: 80, message: 'All essential sections present' },
  { key: 'contact', min: 80, message: 'Complete contact information' },
  { key: 'keywords', min: 70, message: 'Good keyword density and relevance' },
  { key: 'bullets', min: 80, message: 'Well-structured bullet points with outcomes' },
  { key: 'dates', min: 80, message: 'Proper chronological organization' },
]

// Weakness when rawScore < min
const WEAKNESS_THRESHOLDS: readonly Threshold[] = [
  { key: 'parsability', min: 60, message: 'Text extraction issues affecting parsability' },
  { key: 'sections', min: 60, message: 'Missing critical resume sections' },
  { key: 'contact', min: 60, message: 'Incomplete contact information' },
  { key: 'keywords', min: 50, message: 'Insufficient relevant keywords and skills' },
  { key: 'experience_projects', min: 60, message: 'Weak experience/project presentation' },
  { key: 'bullets', min: 60, message: 'Bullet points lack structure and impact' },
  { key: 'dates', min: 60, message: 'Missing or inconsistent dates' },
  { key: 'language', min: 60, message: 'Generic or passive wording' },
]

/**
 * Standard ATS Analyzer
 *
 * Purpose: Deterministic scoring path. Normalizes text, detects sections,
 * scores categories, applies caps and turns the breakdown into feedback.
 *
 * Never throws and never calls out of process.
 */
@Injectable()
export class StandardAtsAnalyzer {
  constructor(
    private readonly resumeText: ResumeTextService,
    private readonly sectioning: ResumeSectioningService,
    private readonly ruleScorer: RuleScorer,
  ) {}

  analyze(raw: string): StandardAnalysis {
    const text = this.resumeText.normalize(raw)
    const sections = this.sectioning.detect(text)
    const ruleScore = this.ruleScorer.score(text, sections)
    const capped = applyScoreCaps(ruleScore.weightedTotal, ruleScore.categories, ruleScore.classification)

    const scoreOf = (key: CategoryKey): number =>
      ruleScore.categories.find((category) => category.key === key)?.rawScore ?? 0

    const strengths = STRENGTH_THRESHOLDS.filter((t) => scoreOf(t.key) >= t.min).map((t) => t.message)
    const weaknesses = WEAKNESS_THRESHOLDS.filter((t) => scoreOf(t.key) < t.min).map((t) => t.message)
    if (capped.binding) {
      weaknesses.push(`Score capped due to: ${capped.binding.reason}`)
    }

    const improvements = emptyImprovements()
    for (const hint of ruleScore.improvementHints) {
      improvements[hint.category].push({ issue: hint.issue, fix: hint.fix, reason: hint.reason })
    }

    return {
      result: { score: capped.score, strengths, weaknesses, improvements },
      breakdown: {
        classification: ruleScore.classification,
        weightedTotal: ruleScore.weightedTotal,
        cappedScore: capped.score,
        appliedCaps: capped.triggered,
        bindingCap: capped.binding,
        categories: ruleScore.categories,
      },
    }
  }
}
