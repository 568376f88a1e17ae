import { SCORE_CAPS } from 'src/rules/ats/score-caps.rules'
import { applyScoreCaps } from './cap-policy'
import type { CategoryFlag, CategoryKey, CategoryResult } from './rule-scorer.model'

function category(key: CategoryKey, rawScore: number, flags: CategoryFlag[] = []): CategoryResult {
  return { key, name: key, weight: 0, rawScore, penalties: [], flags }
}

const healthy: CategoryResult[] = [
  category('parsability', 100),
  category('keywords', 100),
  category('experience_projects', 100),
  category('bullets', 100),
]

function withCategory(override: CategoryResult): CategoryResult[] {
  return healthy.map((c) => (c.key === override.key ? override : c))
}

describe('applyScoreCaps', () => {
  it('should leave the score untouched when no cap triggers', () => {
    expect(applyScoreCaps(92, healthy, 'EXPERIENCED')).toEqual({ score: 92, triggered: [], binding: null })
  })

  it('should cap poor parsability at 55', () => {
    const capped = applyScoreCaps(90, withCategory(category('parsability', 59)), 'EXPERIENCED')

    expect(capped.score).toBe(55)
    expect(capped.binding).toEqual({ id: 'CAP-PARSABILITY', reason: 'Poor parsability', cap: 55 })
  })

  it('should not cap parsability at exactly the threshold', () => {
    expect(applyScoreCaps(90, withCategory(category('parsability', 60)), 'EXPERIENCED').score).toBe(90)
  })

  it('should cap a fresher with insufficient projects at 60', () => {
    const categories = withCategory(category('experience_projects', 60, ['INSUFFICIENT_PROJECTS']))

    expect(applyScoreCaps(85, categories, 'FRESHER').score).toBe(60)
    expect(applyScoreCaps(85, categories, 'EXPERIENCED').score).toBe(85)
  })

  it('should cap weak bullets at 65 and thin keywords at 70', () => {
    expect(applyScoreCaps(90, withCategory(category('bullets', 55)), 'EXPERIENCED').score).toBe(65)
    expect(applyScoreCaps(90, withCategory(category('keywords', 49)), 'EXPERIENCED').score).toBe(70)
  })

  it('should bind the lowest of several triggered caps', () => {
    const categories = [
      category('parsability', 40),
      category('keywords', 30),
      category('experience_projects', 40, ['NO_PROJECTS', 'INSUFFICIENT_PROJECTS']),
      category('bullets', 50),
    ]

    const capped = applyScoreCaps(95, categories, 'FRESHER')

    expect(capped.score).toBe(55)
    expect(capped.triggered.map((cap) => cap.id)).toEqual([
      'CAP-PARSABILITY',
      'CAP-FRESHER-PROJECTS',
      'CAP-BULLETS',
      'CAP-KEYWORDS',
    ])
    expect(capped.binding?.id).toBe('CAP-PARSABILITY')
  })

  it('should never raise a score that is already below the cap', () => {
    const capped = applyScoreCaps(18, withCategory(category('parsability', 25)), 'EXPERIENCED')

    expect(capped.score).toBe(18)
    expect(capped.triggered).toHaveLength(1)
    expect(capped.binding).toBeNull()
  })

  it('should accept a custom cap table', () => {
    const rules = SCORE_CAPS.filter((rule) => rule.id === 'CAP-KEYWORDS')

    expect(applyScoreCaps(90, withCategory(category('parsability', 10)), 'EXPERIENCED', rules).score).toBe(90)
  })
})
