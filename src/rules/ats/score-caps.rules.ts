import type { CategoryKey, CategoryResult, Classification } from 'src/engines/rule-scorer/rule-scorer.model'

export interface ScoreCapRule {
  readonly id: string
  readonly reason: string
  readonly cap: number
  readonly when: (category: (key: CategoryKey) => CategoryResult | undefined, classification: Classification) => boolean
}

const rawScoreBelow =
  (key: CategoryKey, threshold: number): ScoreCapRule['when'] =>
  (category) => {
    const result = category(key)
    return result !== undefined && result.rawScore < threshold
  }

/**
 * Hard ceilings on the final standard score.
 * Every cap is evaluated; the lowest triggered one binds.
 */
export const SCORE_CAPS: readonly ScoreCapRule[] = [
  {
    id: 'CAP-PARSABILITY',
    reason: 'Poor parsability',
    cap: 55,
    when: rawScoreBelow('parsability', 60),
  },
  {
    id: 'CAP-FRESHER-PROJECTS',
    reason: 'Fresher with insufficient projects',
    cap: 60,
    when: (category, classification) =>
      classification === 'FRESHER' &&
      (category('experience_projects')?.flags.includes('INSUFFICIENT_PROJECTS') ?? false),
  },
  {
    id: 'CAP-BULLETS',
    reason: 'Weak bullet points',
    cap: 65,
    when: rawScoreBelow('bullets', 60),
  },
  {
    id: 'CAP-KEYWORDS',
    reason: 'Insufficient keywords',
    cap: 70,
    when: rawScoreBelow('keywords', 50),
  },
]
