import { Injectable } from '@nestjs/common'
import { z } from 'zod'
import {
  emptyImprovements,
  ImprovementCategorySchema,
  type AnalyzerResult,
  type ExternalAnalyzer,
} from 'src/engines/aggregation/aggregation.model'
import { clampScore, parseAnalyzerResponse, toUnavailable } from 'src/engines/analyzer-response'
import envConfig from 'src/shared/config'
import { ExternalAnalyzerUnavailableError } from 'src/shared/errors'
import { GeminiService } from 'src/shared/services/gemini.service'

// =============================================================================
// RESPONSE SCHEMA
// =============================================================================

const AiIssueSchema = z.object({
  label: z.string().min(1),
  category: ImprovementCategorySchema.catch('content_and_bullets'),
  severity: z.enum(['High', 'Medium', 'Low']).catch('Medium'),
  recommended_fix: z.string().min(1),
  reason: z.string().optional(),
  rewrites: z
    .object({
      concise: z.string().optional(),
      expanded: z.string().optional(),
    })
    .optional(),
})

export const AiSemanticResponseSchema = z.object({
  ai_ats_score: z.number().min(0).max(100),
  analysis_summary: z.object({
    strengths: z.array(z.string()).default([]),
    weaknesses: z.array(z.string()).default([]),
  }),
  teaching_summary: z.string().optional(),
  issues: z.array(AiIssueSchema).default([]),
})
export type AiSemanticResponse = z.infer<typeof AiSemanticResponseSchema>

/**
 * AiSemanticAnalyzer
 *
 * Purpose: Balanced, pedagogical assessment of evidence depth, impact and
 * wording, scored by Gemini.
 *
 * Allowed logic:
 * - Prompting and mapping the validated JSON onto AnalyzerResult
 *
 * Forbidden logic:
 * - Returning partial or default results: every failure rejects with
 *   ExternalAnalyzerUnavailableError
 */
@Injectable()
export class AiSemanticAnalyzer implements ExternalAnalyzer {
  readonly name = 'ai' as const

  constructor(private readonly gemini: GeminiService) {}

  isEnabled(): boolean {
    return envConfig.AI_ANALYZER.enabled && envConfig.AI_ANALYZER.apiKey !== null
  }

  async analyze(resumeText: string, signal: AbortSignal): Promise<AnalyzerResult> {
    const apiKey = envConfig.AI_ANALYZER.apiKey
    if (!envConfig.AI_ANALYZER.enabled || apiKey === null) {
      throw new ExternalAnalyzerUnavailableError(this.name, 'analyzer disabled')
    }

    let responseText: string
    try {
      responseText = await this.gemini.generateJson(apiKey, this.buildPrompt(resumeText), {
        service: 'AiSemanticAnalyzer',
        operation: 'analyze',
        signal,
      })
    } catch (error) {
      throw toUnavailable(this.name, error, signal)
    }

    return mapAiSemanticResponse(parseAnalyzerResponse(this.name, responseText, AiSemanticResponseSchema))
  }

  private buildPrompt(resumeText: string): string {
    return `You are a balanced resume assessor reviewing text extracted from a resume.
Recognize real strengths, name concrete gaps, and teach the candidate how to improve.

EVALUATE:
- Evidence depth: are listed skills backed by projects or experience?
- Impact: are results quantified (percentages, users, time saved)?
- Seniority fit: do titles match the evidence? Do not penalize students for being early-career.
- Originality: note generic template phrases, but do not over-penalize them.
- Parsing cleanliness: note broken or garbled text caused by extraction.

SCORING:
- ai_ats_score is an integer from 0 to 100.
- A solid early-career resume with real projects usually scores 60-80.

ISSUES:
- Report at most 8 issues, most important first. Use "High" severity sparingly.
- category must be one of: keyword_and_skills, content_and_bullets, projects_and_experience, structure_and_formatting, ats_compatibility
- Each issue needs a constructive recommended_fix and, where possible, a concise rewritten example.

Respond with ONLY a JSON object in this exact format:
{
  "ai_ats_score": 0,
  "analysis_summary": {
    "strengths": ["..."],
    "weaknesses": ["..."]
  },
  "teaching_summary": "2-4 encouraging sentences on the top next steps",
  "issues": [
    {
      "label": "Short issue title",
      "category": "content_and_bullets",
      "severity": "Medium",
      "recommended_fix": "Step-by-step guidance",
      "reason": "Why it matters to a reviewer",
      "rewrites": { "concise": "One-line improved example", "expanded": "Detailed example" }
    }
  ]
}

RESUME TEXT:
"""
${resumeText}
"""`
  }
}

export function mapAiSemanticResponse(response: AiSemanticResponse): AnalyzerResult {
  const weaknesses = [...response.analysis_summary.weaknesses]
  const teachingSummary = response.teaching_summary?.trim()
  if (teachingSummary) {
    weaknesses.unshift(`Learning focus: ${teachingSummary}`)
  }

  const improvements = emptyImprovements()
  for (const issue of response.issues) {
    const example = issue.rewrites?.concise?.trim()
    improvements[issue.category].push({
      issue: issue.label,
      fix: issue.recommended_fix,
      reason: issue.reason?.trim() || `${issue.severity} severity issue`,
      ...(example ? { example } : {}),
    })
  }

  return {
    score: clampScore(response.ai_ats_score),
    strengths: response.analysis_summary.strengths,
    weaknesses,
    improvements,
  }
}
