import { SCORE_CAPS, type ScoreCapRule } from 'src/rules/ats/score-caps.rules'
import type { CappedScore, CategoryResult, Classification, TriggeredCap } from './rule-scorer.model'

/**
 * Apply hard score ceilings. A cap never raises the score.
 */
export function applyScoreCaps(
  weightedTotal: number,
  categories: readonly CategoryResult[],
  classification: Classification,
  rules: readonly ScoreCapRule[] = SCORE_CAPS,
): CappedScore {
  const byKey = new Map(categories.map((category) => [category.key, category]))
  const lookup = (key: CategoryResult['key']): CategoryResult | undefined => byKey.get(key)

  const triggered: TriggeredCap[] = rules
    .filter((rule) => rule.when(lookup, classification))
    .map(({ id, reason, cap }) => ({ id, reason, cap }))

  let score = weightedTotal
  let binding: TriggeredCap | null = null
  for (const cap of triggered) {
    if (cap.cap < score) {
      score = cap.cap
      binding = cap
    }
  }

  return { score, triggered, binding }
}
