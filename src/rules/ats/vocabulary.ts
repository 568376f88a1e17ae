import { z } from 'zod'
import vocabularyTable from './vocabulary.json'

const termList = z.array(z.string().min(1).transform((term) => term.toLowerCase()))

export const VocabularySchema = z.object({
  /** skill term → skill category */
  technicalSkills: z.record(z.string().min(1)),
  actionVerbs: termList,
  outcomeTerms: termList,
  weakVerbs: termList,
  buzzwords: termList,
})
export type Vocabulary = z.infer<typeof VocabularySchema>

export interface TermMatcher {
  readonly term: string
  readonly pattern: RegExp
}

export interface CompiledVocabulary {
  readonly skills: readonly TermMatcher[]
  readonly skillCategories: Readonly<Record<string, string>>
  readonly actionVerbs: readonly TermMatcher[]
  readonly outcomeTerms: readonly TermMatcher[]
  readonly weakVerbs: readonly TermMatcher[]
  readonly buzzwords: readonly TermMatcher[]
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Whole-term matcher on lowercased text.
 * Alphanumeric lookarounds keep "java" out of "javascript" and "git" out of "github".
 */
export function termMatcher(term: string): TermMatcher {
  const lower = term.toLowerCase()
  return { term: lower, pattern: new RegExp(`(?<![a-z0-9])${escapeRegExp(lower)}(?![a-z0-9])`) }
}

export function compileVocabulary(input: unknown): CompiledVocabulary {
  const vocabulary = VocabularySchema.parse(input)
  const skillCategories: Record<string, string> = {}
  for (const [term, category] of Object.entries(vocabulary.technicalSkills)) {
    skillCategories[term.toLowerCase()] = category
  }

  return {
    skills: Object.keys(skillCategories).map(termMatcher),
    skillCategories,
    actionVerbs: vocabulary.actionVerbs.map(termMatcher),
    outcomeTerms: vocabulary.outcomeTerms.map(termMatcher),
    weakVerbs: vocabulary.weakVerbs.map(termMatcher),
    buzzwords: vocabulary.buzzwords.map(termMatcher),
  }
}

export const DEFAULT_VOCABULARY = compileVocabulary(vocabularyTable)
