import { z } from 'zod'
import { AnalyzerNameSchema, ShortlistDecisionSchema } from 'src/engines/aggregation/aggregation.model'
import { CategoryKeySchema, ClassificationSchema } from 'src/engines/rule-scorer/rule-scorer.model'

export const MAX_RESUME_TEXT_LENGTH = 100_000

// Request
export const RunEvaluationBodySchema = z
  .object({
    text: z.string().min(1).max(MAX_RESUME_TEXT_LENGTH),
  })
  .strict()
export type RunEvaluationBodyType = z.infer<typeof RunEvaluationBodySchema>

// Improvements
export const ImprovementItemResponseSchema = z.object({
  issue: z.string(),
  recommended_fix: z.string(),
  reason: z.string(),
  example: z.string().optional(),
})

export const ResumeImprovementsSchema = z.object({
  keyword_and_skills: z.array(ImprovementItemResponseSchema),
  content_and_bullets: z.array(ImprovementItemResponseSchema),
  projects_and_experience: z.array(ImprovementItemResponseSchema),
  structure_and_formatting: z.array(ImprovementItemResponseSchema),
  ats_compatibility: z.array(ImprovementItemResponseSchema),
})

// Standard breakdown
export const CategoryBreakdownSchema = z.object({
  key: CategoryKeySchema,
  name: z.string(),
  weight: z.number().int(),
  raw_score: z.number().int().min(0).max(100),
  penalties: z.array(
    z.object({
      label: z.string(),
      points: z.number().int(),
    }),
  ),
})

export const StandardBreakdownResponseSchema = z.object({
  classification: ClassificationSchema,
  weighted_total: z.number().int().min(0).max(100),
  capped_score: z.number().int().min(0).max(100),
  applied_caps: z.array(
    z.object({
      reason: z.string(),
      cap: z.number().int(),
    }),
  ),
  categories: z.array(CategoryBreakdownSchema),
})

// Evaluation result
export const EvaluationResultSchema = z.object({
  standard_ats_score: z.number().int().min(0).max(100).nullable(),
  ai_ats_score: z.number().int().min(0).max(100).nullable(),
  rubric_ats_score: z.number().int().min(0).max(100).nullable(),
  final_ats_score: z.number().int().min(0).max(100),
  shortlist_decision: ShortlistDecisionSchema.nullable(),
  analysis_summary: z.object({
    strengths: z.array(z.string()).max(10),
    weaknesses: z.array(z.string()).max(10),
  }),
  resume_improvements: ResumeImprovementsSchema,
  rubric_feedback: z
    .object({
      trusted_signals: z.array(z.string()),
      red_flags: z.array(z.string()),
      learning_takeaways: z.array(z.string()),
    })
    .nullable(),
  standard_breakdown: StandardBreakdownResponseSchema.nullable(),
  unavailable_analyzers: z.array(
    z.object({
      analyzer: AnalyzerNameSchema,
      reason: z.string(),
    }),
  ),
})
export type EvaluationResultType = z.infer<typeof EvaluationResultSchema>
