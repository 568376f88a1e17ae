import { Injectable } from '@nestjs/common'
import { z } from 'zod'
import {
  emptyImprovements,
  ImprovementCategorySchema,
  ShortlistDecisionSchema,
  type ExternalAnalyzer,
  type RubricAnalyzerResult,
} from 'src/engines/aggregation/aggregation.model'
import { clampScore, parseAnalyzerResponse, toUnavailable } from 'src/engines/analyzer-response'
import envConfig from 'src/shared/config'
import { ExternalAnalyzerUnavailableError } from 'src/shared/errors'
import { GeminiService } from 'src/shared/services/gemini.service'

const MAX_RUBRIC_IMPROVEMENTS = 5

export const SHORTLIST_YES = 'Shortlist decision: would recommend for interview'
export const SHORTLIST_NO = 'Shortlist decision: would not recommend for interview'

// =============================================================================
// RESPONSE SCHEMA
// =============================================================================

const RubricIssueSchema = z.object({
  issue: z.string().min(1),
  category: ImprovementCategorySchema.catch('content_and_bullets'),
  why_it_fails_human_review: z.string().min(1),
  how_to_fix: z.string().min(1),
  example_rewrite: z.string().optional(),
})

export const RubricResponseSchema = z.object({
  rubric_ats_score: z.number().min(0).max(100),
  shortlist_decision: ShortlistDecisionSchema,
  rubric_summary: z.object({
    trusted_signals: z.array(z.string()).default([]),
    red_flags: z.array(z.string()).default([]),
  }),
  rubric_issues: z.array(RubricIssueSchema).default([]),
  learning_takeaways: z.array(z.string()).default([]),
})
export type RubricResponse = z.infer<typeof RubricResponseSchema>

/**
 * RubricAnalyzer
 *
 * Purpose: Simulate an evidence-based human reviewer: which claims are
 * backed by proof, which read as red flags, and whether the resume would be
 * shortlisted for interview.
 *
 * Forbidden logic:
 * - Returning partial or default results: every failure rejects with
 *   ExternalAnalyzerUnavailableError
 */
@Injectable()
export class RubricAnalyzer implements ExternalAnalyzer<RubricAnalyzerResult> {
  readonly name = 'rubric' as const

  constructor(private readonly gemini: GeminiService) {}

  isEnabled(): boolean {
    return envConfig.RUBRIC_ANALYZER.enabled && envConfig.RUBRIC_ANALYZER.apiKey !== null
  }

  async analyze(resumeText: string, signal: AbortSignal): Promise<RubricAnalyzerResult> {
    const apiKey = envConfig.RUBRIC_ANALYZER.apiKey
    if (!envConfig.RUBRIC_ANALYZER.enabled || apiKey === null) {
      throw new ExternalAnalyzerUnavailableError(this.name, 'analyzer disabled')
    }

    let responseText: string
    try {
      responseText = await this.gemini.generateJson(apiKey, this.buildPrompt(resumeText), {
        service: 'RubricAnalyzer',
        operation: 'analyze',
        signal,
        temperature: 0,
      })
    } catch (error) {
      throw toUnavailable(this.name, error, signal)
    }

    return mapRubricResponse(parseAnalyzerResponse(this.name, responseText, RubricResponseSchema))
  }

  private buildPrompt(resumeText: string): string {
    return `You are an experienced technical recruiter reviewing a resume before deciding on an interview.
Trust only what the resume proves. A claim without evidence (project, metric, link, named tool) is an unsupported claim.

RUBRIC:
A. Evidence: every skill or achievement should be backed by a concrete project, role or result.
B. Ownership: bullets should say what the candidate personally did, not what the team did.
C. Impact: results should be measurable; missing outcomes earn partial credit only.
D. Clarity: a reviewer should understand each project's problem, stack and result in one read.
E. Consistency: dates, titles and claimed seniority must agree with each other.
F. Red flags: vague buzzwords, unexplained gaps, copied template text, inflated titles.
G. Shortlist: decide whether you would invite this candidate to interview.

SCORING:
- rubric_ats_score is an integer from 0 to 100.
- shortlist_decision is exactly "Yes" or "No".

ISSUES:
- Report the most important issues first.
- category must be one of: keyword_and_skills, content_and_bullets, projects_and_experience, structure_and_formatting, ats_compatibility

Respond with ONLY a JSON object in this exact format:
{
  "rubric_ats_score": 0,
  "shortlist_decision": "Yes",
  "rubric_summary": {
    "trusted_signals": ["Claims backed by evidence"],
    "red_flags": ["Unsupported or concerning claims"]
  },
  "rubric_issues": [
    {
      "issue": "Short issue title",
      "category": "projects_and_experience",
      "why_it_fails_human_review": "What a reviewer would think",
      "how_to_fix": "Concrete fix",
      "example_rewrite": "Improved line"
    }
  ],
  "learning_takeaways": ["Lesson the candidate can apply to any resume"]
}

RESUME TEXT:
"""
${resumeText}
"""`
  }
}

export function mapRubricResponse(response: RubricResponse): RubricAnalyzerResult {
  const trustedSignals = response.rubric_summary.trusted_signals
  const redFlags = response.rubric_summary.red_flags

  const strengths = response.shortlist_decision === 'Yes' ? [SHORTLIST_YES, ...trustedSignals] : [...trustedSignals]
  const weaknesses = response.shortlist_decision === 'No' ? [SHORTLIST_NO, ...redFlags] : [...redFlags]

  const improvements = emptyImprovements()
  for (const issue of response.rubric_issues.slice(0, MAX_RUBRIC_IMPROVEMENTS)) {
    const example = issue.example_rewrite?.trim()
    improvements[issue.category].push({
      issue: issue.issue,
      fix: issue.how_to_fix,
      reason: `Human reviewer: ${issue.why_it_fails_human_review}`,
      ...(example ? { example } : {}),
    })
  }

  return {
    score: clampScore(response.rubric_ats_score),
    strengths,
    weaknesses,
    improvements,
    shortlistDecision: response.shortlist_decision,
    feedback: {
      trustedSignals,
      redFlags,
      learningTakeaways: response.learning_takeaways,
    },
  }
}
