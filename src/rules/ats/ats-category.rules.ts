/**
 * ATS CATEGORY RULE SET - DETERMINISTIC SCORING
 * EVALUATION: JD-INDEPENDENT, ROLE-AGNOSTIC
 *
 * =============================================================================
 * PENALTY MODEL
 * =============================================================================
 *
 * Every category starts at 100. Each rule whose `when` holds subtracts its
 * penalty; the category floors at 0. Rules never read raw text: they consume
 * the precomputed ResumeSignals on the scoring context.
 *
 * Weights are integer percents and sum to 100. Language is informational
 * (weight 0): it feeds weaknesses and improvements but not the score.
 *
 * RULE ID PREFIXES:
 * - PAR: Parsability
 * - SEC: Sections
 * - CON: Contact
 * - KEY: Keywords
 * - EXP: Experience / Projects
 * - BUL: Bullets
 * - DAT: Dates
 * - LAN: Language
 *
 * =============================================================================
 */

import type { ImprovementCategory } from 'src/engines/aggregation/aggregation.model'
import type { ResumeSignals } from 'src/engines/rule-scorer/resume-signals'
import type { CategoryFlag, CategoryKey, Classification } from 'src/engines/rule-scorer/rule-scorer.model'
import type { ResumeSections } from 'src/shared/services/resume-sectioning.service'
import type { ResumeText } from 'src/shared/services/resume-text.service'

export const ATS_RULE_SET_VERSION = 'ats-standard@2026-10-18'

export interface ScoringContext {
  readonly text: ResumeText
  readonly sections: ResumeSections
  readonly classification: Classification
  readonly signals: ResumeSignals
}

export interface ImprovementHint {
  readonly category: ImprovementCategory
  readonly issue: string
  readonly fix: string
  readonly reason: string
}

export interface PenaltyRule {
  readonly id: string
  readonly label: string
  readonly penalty: number
  readonly flags?: readonly CategoryFlag[]
  readonly when: (ctx: ScoringContext) => boolean
  /** Tiered rules share one hint so the report lists the issue once */
  readonly improvement: ImprovementHint
}

export interface CategoryDefinition {
  readonly key: CategoryKey
  readonly name: string
  readonly weight: number
  readonly rules: readonly PenaltyRule[]
}

// =============================================================================
// HELPERS
// =============================================================================

const isFresher = (ctx: ScoringContext): boolean => ctx.classification === 'FRESHER'

const missing =
  (...keys: Array<keyof ResumeSections['sections']>) =>
  (ctx: ScoringContext): boolean =>
    keys.every((key) => ctx.sections.sections[key] === undefined)

// =============================================================================
// IMPROVEMENT HINTS
// =============================================================================

const SKILL_KEYWORDS: ImprovementHint = {
  category: 'keyword_and_skills',
  issue: 'Limited technical skill keywords',
  fix: 'List the languages, frameworks and tools you actually used in a dedicated Skills section and inside your bullets',
  reason: 'ATS filters match resumes against skill keywords from the job posting',
}

const ACTION_VERBS: ImprovementHint = {
  category: 'content_and_bullets',
  issue: 'Few strong action verbs',
  fix: 'Start bullets with verbs such as developed, implemented, optimized or led',
  reason: 'Action verbs make ownership explicit and read as accomplishments',
}

const METRICS: ImprovementHint = {
  category: 'content_and_bullets',
  issue: 'Few quantified achievements',
  fix: 'Add numbers to your results: percentages, time saved, users served, request volume',
  reason: 'Quantified outcomes are the strongest evidence of impact for both ATS and recruiters',
}

// =============================================================================
// CATEGORIES
// =============================================================================

const parsability: CategoryDefinition = {
  key: 'parsability',
  name: 'Parsability',
  weight: 15,
  rules: [
    {
      id: 'PAR-01',
      label: 'High ratio of very short words suggests broken text extraction',
      penalty: 30,
      when: (ctx) => ctx.text.shortWordRatio > 0.15,
      improvement: {
        category: 'ats_compatibility',
        issue: 'Text appears fragmented when parsed',
        fix: 'Export the resume from a text-based editor and avoid letter-spaced headings or text inside images',
        reason: 'Fragmented words cannot be matched against job keywords',
      },
    },
    {
      id: 'PAR-02',
      label: 'High ratio of table or layout symbols',
      penalty: 25,
      when: (ctx) => ctx.text.symbolRatio > 0.05,
      improvement: {
        category: 'ats_compatibility',
        issue: 'Table or layout characters detected',
        fix: 'Replace tables, columns and decorative separators with plain single-column text',
        reason: 'Many ATS parsers scramble the reading order of tables and columns',
      },
    },
    {
      id: 'PAR-03',
      label: 'Many very short lines suggest a multi-column layout',
      penalty: 20,
      when: (ctx) => ctx.text.shortLineRatio > 0.3,
      improvement: {
        category: 'structure_and_formatting',
        issue: 'Layout breaks text into many short lines',
        fix: 'Use a single-column layout with full sentences per bullet',
        reason: 'Short broken lines lose context when an ATS splits them into fields',
      },
    },
    {
      id: 'PAR-04',
      label: 'Resume content is below the minimum length',
      penalty: 45,
      when: (ctx) => ctx.text.validationError !== null,
      improvement: {
        category: 'ats_compatibility',
        issue: 'Very little readable text',
        fix: 'Make sure the resume text is selectable and covers your education, skills and projects',
        reason: 'An ATS cannot rank a resume it cannot read',
      },
    },
    {
      id: 'PAR-05',
      label: 'No readable text',
      penalty: 75,
      flags: ['EMPTY_TEXT'],
      when: (ctx) => ctx.text.raw.trim().length === 0,
      improvement: {
        category: 'ats_compatibility',
        issue: 'No text could be read from the resume',
        fix: 'Provide a text-based resume instead of a scanned image',
        reason: 'Image-only resumes are rejected by most ATS pipelines',
      },
    },
  ],
}

const sections: CategoryDefinition = {
  key: 'sections',
  name: 'Sections',
  weight: 20,
  rules: [
    {
      id: 'SEC-01',
      label: 'Missing contact section',
      penalty: 20,
      when: missing('contact'),
      improvement: {
        category: 'structure_and_formatting',
        issue: 'Contact details not found at the top',
        fix: 'Put your name, email, phone and LinkedIn at the very top of the resume',
        reason: 'Recruiters and ATS forms extract contact fields from the header',
      },
    },
    {
      id: 'SEC-02',
      label: 'Missing skills section',
      penalty: 20,
      when: missing('skills'),
      improvement: {
        category: 'keyword_and_skills',
        issue: 'No Skills section',
        fix: 'Add a Skills section grouped by languages, frameworks and tools',
        reason: 'ATS keyword matching looks for a dedicated skills block first',
      },
    },
    {
      id: 'SEC-03',
      label: 'Missing experience and projects sections',
      penalty: 20,
      when: missing('experience', 'projects'),
      improvement: {
        category: 'projects_and_experience',
        issue: 'No Experience or Projects section',
        fix: 'Add an Experience or Projects section describing what you built',
        reason: 'Practical work is the main evidence reviewers look for',
      },
    },
    {
      id: 'SEC-04',
      label: 'Missing education section',
      penalty: 20,
      when: missing('education'),
      improvement: {
        category: 'structure_and_formatting',
        issue: 'No Education section',
        fix: 'Add an Education section with degree, institution and graduation year',
        reason: 'Education is a standard ATS field and often a hard filter',
      },
    },
    {
      id: 'SEC-05',
      label: 'Missing summary section',
      penalty: 10,
      when: missing('summary'),
      improvement: {
        category: 'structure_and_formatting',
        issue: 'No professional summary',
        fix: 'Open with a two to three line summary of your focus and strongest skills',
        reason: 'A summary frames the rest of the resume for a skimming reviewer',
      },
    },
    {
      id: 'SEC-06',
      label: 'Fresher resume without a projects section',
      penalty: 10,
      when: (ctx) => isFresher(ctx) && missing('projects')(ctx),
      improvement: {
        category: 'projects_and_experience',
        issue: 'No Projects section for an early-career resume',
        fix: 'Add a Projects section with two or more projects you built',
        reason: 'Without work history, projects are the primary proof of skill',
      },
    },
    {
      id: 'SEC-07',
      label: 'Missing certifications section',
      penalty: 10,
      when: missing('certifications'),
      improvement: {
        category: 'structure_and_formatting',
        issue: 'No Certifications section',
        fix: 'List relevant certifications or completed courses in their own section',
        reason: 'Certifications add searchable keywords and third-party validation',
      },
    },
  ],
}

const contact: CategoryDefinition = {
  key: 'contact',
  name: 'Contact',
  weight: 10,
  rules: [
    {
      id: 'CON-01',
      label: 'No email address',
      penalty: 35,
      when: (ctx) => !ctx.signals.hasEmail,
      improvement: {
        category: 'ats_compatibility',
        issue: 'Email address not found',
        fix: 'Add a professional email address in the header',
        reason: 'Recruiters cannot reach you without an email',
      },
    },
    {
      id: 'CON-02',
      label: 'No phone number',
      penalty: 30,
      when: (ctx) => !ctx.signals.hasPhone,
      improvement: {
        category: 'ats_compatibility',
        issue: 'Phone number not found',
        fix: 'Add a phone number in a standard format such as 555-123-4567',
        reason: 'ATS contact fields expect a phone number',
      },
    },
    {
      id: 'CON-03',
      label: 'First line is too long to be a name',
      penalty: 10,
      when: (ctx) => ctx.signals.firstLineWordCount > 5,
      improvement: {
        category: 'structure_and_formatting',
        issue: 'Name is not on its own line',
        fix: 'Put only your full name on the first line',
        reason: 'Parsers take the first line as the candidate name',
      },
    },
    {
      id: 'CON-04',
      label: 'No LinkedIn profile',
      penalty: 15,
      when: (ctx) => !ctx.signals.hasLinkedIn,
      improvement: {
        category: 'ats_compatibility',
        issue: 'LinkedIn profile missing',
        fix: 'Add your LinkedIn profile URL to the header',
        reason: 'Recruiters routinely cross-check the resume against LinkedIn',
      },
    },
    {
      id: 'CON-05',
      label: 'No location',
      penalty: 10,
      when: (ctx) => !ctx.signals.hasLocation,
      improvement: {
        category: 'ats_compatibility',
        issue: 'Location missing',
        fix: 'Add your city and state or country, e.g. "Austin, TX"',
        reason: 'Location is used for filtering on-site and hybrid roles',
      },
    },
  ],
}

const keywords: CategoryDefinition = {
  key: 'keywords',
  name: 'Keywords',
  weight: 25,
  rules: [
    {
      id: 'KEY-01',
      label: 'Fewer than 12 technical skills',
      penalty: 10,
      when: (ctx) => ctx.signals.skills.length < 12,
      improvement: SKILL_KEYWORDS,
    },
    {
      id: 'KEY-02',
      label: 'Fewer than 8 technical skills',
      penalty: 10,
      when: (ctx) => ctx.signals.skills.length < 8,
      improvement: SKILL_KEYWORDS,
    },
    {
      id: 'KEY-03',
      label: 'Fewer than 5 technical skills',
      penalty: 10,
      when: (ctx) => ctx.signals.skills.length < 5,
      improvement: SKILL_KEYWORDS,
    },
    {
      id: 'KEY-04',
      label: 'Fewer than 3 technical skills',
      penalty: 10,
      when: (ctx) => ctx.signals.skills.length < 3,
      improvement: SKILL_KEYWORDS,
    },
    {
      id: 'KEY-05',
      label: 'Fewer than 8 action verbs',
      penalty: 10,
      when: (ctx) => ctx.signals.actionVerbs.length < 8,
      improvement: ACTION_VERBS,
    },
    {
      id: 'KEY-06',
      label: 'Fewer than 5 action verbs',
      penalty: 10,
      when: (ctx) => ctx.signals.actionVerbs.length < 5,
      improvement: ACTION_VERBS,
    },
    {
      id: 'KEY-07',
      label: 'Fewer than 3 action verbs',
      penalty: 10,
      when: (ctx) => ctx.signals.actionVerbs.length < 3,
      improvement: ACTION_VERBS,
    },
    {
      id: 'KEY-08',
      label: 'Fewer than 2 quantified results',
      penalty: 15,
      when: (ctx) => ctx.signals.metricCount < 2,
      improvement: METRICS,
    },
    {
      id: 'KEY-09',
      label: 'No quantified results',
      penalty: 15,
      when: (ctx) => ctx.signals.metricCount < 1,
      improvement: METRICS,
    },
    {
      id: 'KEY-10',
      label: 'Keyword stuffing',
      penalty: 15,
      when: (ctx) => ctx.signals.stuffedWords.length > 0,
      improvement: {
        category: 'keyword_and_skills',
        issue: 'Repeated keywords look like stuffing',
        fix: 'Mention each skill where it was used instead of repeating it',
        reason: 'ATS and reviewers penalize unnatural keyword repetition',
      },
    },
  ],
}

const experienceProjects: CategoryDefinition = {
  key: 'experience_projects',
  name: 'Experience/Projects',
  weight: 15,
  rules: [
    {
      id: 'EXP-01',
      label: 'No project entries for a fresher',
      penalty: 60,
      flags: ['NO_PROJECTS', 'INSUFFICIENT_PROJECTS'],
      when: (ctx) => isFresher(ctx) && ctx.signals.projectCount === 0,
      improvement: {
        category: 'projects_and_experience',
        issue: 'No projects listed',
        fix: 'Add at least two projects with the problem, your role, the stack and the result',
        reason: 'Early-career resumes are judged mainly on projects',
      },
    },
    {
      id: 'EXP-02',
      label: 'Only one project entry for a fresher',
      penalty: 40,
      flags: ['INSUFFICIENT_PROJECTS'],
      when: (ctx) => isFresher(ctx) && ctx.signals.projectCount === 1,
      improvement: {
        category: 'projects_and_experience',
        issue: 'Only one project listed',
        fix: 'Add a second project that shows a different skill or stack',
        reason: 'A single project gives reviewers too little evidence',
      },
    },
    {
      id: 'EXP-03',
      label: 'Experience section has no content',
      penalty: 70,
      when: (ctx) => !isFresher(ctx) && ctx.signals.experienceLineCount === 0,
      improvement: {
        category: 'projects_and_experience',
        issue: 'Experience section is empty',
        fix: 'Describe each role with title, company, dates and three to five bullets',
        reason: 'An empty experience section reads as a parsing failure',
      },
    },
    {
      id: 'EXP-04',
      label: 'No projects section',
      penalty: 20,
      when: (ctx) => !isFresher(ctx) && missing('projects')(ctx),
      improvement: {
        category: 'projects_and_experience',
        issue: 'No Projects section',
        fix: 'Add selected projects that show skills your roles do not cover',
        reason: 'Projects add searchable keywords and depth beyond job titles',
      },
    },
  ],
}

const bullets: CategoryDefinition = {
  key: 'bullets',
  name: 'Bullets',
  weight: 10,
  rules: [
    {
      id: 'BUL-01',
      label: 'No bullet points',
      penalty: 40,
      flags: ['NO_BULLETS'],
      when: (ctx) => ctx.signals.bullets.length === 0,
      improvement: {
        category: 'content_and_bullets',
        issue: 'No bullet points',
        fix: 'Describe experience and projects as bullets starting with an action verb',
        reason: 'Bullets are scanned faster and parsed more reliably than paragraphs',
      },
    },
    {
      id: 'BUL-02',
      label: 'More than 5 weak bullets',
      penalty: 30,
      when: (ctx) => ctx.signals.weakBulletCount > 5,
      improvement: {
        category: 'content_and_bullets',
        issue: 'Most bullets lack action, tools or outcomes',
        fix: 'Rewrite bullets as action verb + tool + measurable result',
        reason: 'Weak bullets describe duties instead of impact',
      },
    },
    {
      id: 'BUL-03',
      label: 'Several weak bullets',
      penalty: 15,
      when: (ctx) => ctx.signals.weakBulletCount > 2 && ctx.signals.weakBulletCount <= 5,
      improvement: {
        category: 'content_and_bullets',
        issue: 'Some bullets lack action, tools or outcomes',
        fix: 'Strengthen weaker bullets with the tool you used and the result it produced',
        reason: 'Each bullet should prove a skill',
      },
    },
  ],
}

const dates: CategoryDefinition = {
  key: 'dates',
  name: 'Dates',
  weight: 5,
  rules: [
    {
      id: 'DAT-01',
      label: 'Fewer than 2 dates',
      penalty: 40,
      when: (ctx) => ctx.sections.years.length < 2,
      improvement: {
        category: 'structure_and_formatting',
        issue: 'Dates missing',
        fix: 'Add start and end dates to education, experience and projects',
        reason: 'ATS timelines and recency filters need dates',
      },
    },
    {
      id: 'DAT-02',
      label: 'No date ranges',
      penalty: 20,
      when: (ctx) => ctx.sections.dateRanges.length === 0,
      improvement: {
        category: 'structure_and_formatting',
        issue: 'No date ranges',
        fix: 'Use ranges such as "2022 - 2024" or "2023 - Present"',
        reason: 'Ranges let parsers compute durations',
      },
    },
    {
      id: 'DAT-03',
      label: 'Entries are not in reverse chronological order',
      penalty: 15,
      when: (ctx) => ctx.signals.chronologyDescending === false,
      improvement: {
        category: 'structure_and_formatting',
        issue: 'Entries are not most-recent-first',
        fix: 'List entries in reverse chronological order',
        reason: 'Reviewers expect the most recent work first',
      },
    },
  ],
}

const language: CategoryDefinition = {
  key: 'language',
  name: 'Language',
  weight: 0,
  rules: [
    {
      id: 'LAN-01',
      label: 'Buzzwords',
      penalty: 15,
      when: (ctx) => ctx.signals.buzzwords.length >= 1,
      improvement: {
        category: 'content_and_bullets',
        issue: 'Generic buzzwords',
        fix: 'Replace phrases like "team player" or "hard-working" with a concrete example',
        reason: 'Buzzwords carry no evidence and are skipped by reviewers',
      },
    },
    {
      id: 'LAN-02',
      label: 'Heavy use of buzzwords',
      penalty: 20,
      when: (ctx) => ctx.signals.buzzwords.length >= 3,
      improvement: {
        category: 'content_and_bullets',
        issue: 'Heavy use of buzzwords',
        fix: 'Keep at most one self-description and back it with a result',
        reason: 'Many buzzwords make the resume read as filler',
      },
    },
    {
      id: 'LAN-03',
      label: 'Most bullets open with a weak verb',
      penalty: 25,
      when: (ctx) => ctx.signals.bullets.length > 0 && ctx.signals.weakVerbBulletCount * 2 > ctx.signals.bullets.length,
      improvement: {
        category: 'content_and_bullets',
        issue: 'Passive bullet openings',
        fix: 'Replace "helped", "assisted" or "responsible for" with what you actually did',
        reason: 'Weak verbs hide your contribution',
      },
    },
    {
      id: 'LAN-04',
      label: 'First-person pronouns',
      penalty: 10,
      when: (ctx) => ctx.signals.firstPersonCount >= 3,
      improvement: {
        category: 'content_and_bullets',
        issue: 'First-person writing',
        fix: 'Drop "I", "me" and "my" and start bullets with the verb',
        reason: 'Resume convention is implied first person',
      },
    },
  ],
}

/**
 * Fixed evaluation and report order
 */
export const ATS_CATEGORIES: readonly CategoryDefinition[] = [
  parsability,
  sections,
  contact,
  keywords,
  experienceProjects,
  bullets,
  dates,
  language,
]
