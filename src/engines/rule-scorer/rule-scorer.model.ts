import { z } from 'zod'
import type { ImprovementHint } from 'src/rules/ats/ats-category.rules'

export const CategoryKeySchema = z.enum([
  'parsability',
  'sections',
  'contact',
  'keywords',
  'experience_projects',
  'bullets',
  'dates',
  'language',
])
export type CategoryKey = z.infer<typeof CategoryKeySchema>

export const ClassificationSchema = z.enum(['FRESHER', 'EXPERIENCED'])
export type Classification = z.infer<typeof ClassificationSchema>

export const CategoryFlagSchema = z.enum(['EMPTY_TEXT', 'NO_PROJECTS', 'INSUFFICIENT_PROJECTS', 'NO_BULLETS'])
export type CategoryFlag = z.infer<typeof CategoryFlagSchema>

export interface Penalty {
  readonly ruleId: string
  readonly label: string
  readonly points: number
}

export interface CategoryResult {
  readonly key: CategoryKey
  readonly name: string
  /** Integer percent; all category weights sum to 100 */
  readonly weight: number
  /** 0-100 after deductions */
  readonly rawScore: number
  /** Triggered penalties in rule order */
  readonly penalties: readonly Penalty[]
  /** Unique flags raised by triggered rules */
  readonly flags: readonly CategoryFlag[]
}

export interface RuleScore {
  readonly classification: Classification
  readonly categories: readonly CategoryResult[]
  readonly weightedTotal: number
  /** Improvement hints of triggered rules, rule order, each hint once */
  readonly improvementHints: readonly ImprovementHint[]
}

export interface TriggeredCap {
  readonly id: string
  readonly reason: string
  readonly cap: number
}

export interface CappedScore {
  readonly score: number
  /** Every cap whose trigger held, in policy order */
  readonly triggered: readonly TriggeredCap[]
  /** The lowest triggered cap when it actually lowered the score */
  readonly binding: TriggeredCap | null
}
