import { DEFAULT_VOCABULARY } from 'src/rules/ats/vocabulary'
import { EXPERIENCED_RESUME } from 'src/test/fixtures/resumes'
import { ResumeSectioningService, type ResumeSections } from 'src/shared/services/resume-sectioning.service'
import { ResumeTextService } from 'src/shared/services/resume-text.service'
import { assessBullet, countEntries, countMetrics, extractSignals, isMostRecentFirst } from './resume-signals'

function datesOnly(years: number[], dateRanges: ResumeSections['dateRanges'] = []): ResumeSections {
  return { sections: {}, years, dateRanges }
}

describe('resume signals', () => {
  describe('countMetrics', () => {
    it('should count percentages, currency, multipliers and counted nouns', () => {
      expect(countMetrics('Grew revenue by $1.2M and served 500 users at 3x speed, 20% faster')).toBe(4)
    })

    it('should return 0 for plain prose', () => {
      expect(countMetrics('Maintained the internal wiki')).toBe(0)
    })
  })

  describe('assessBullet', () => {
    it('should award action verb, tool and outcome points', () => {
      const bullet = assessBullet('• Led migration to Kubernetes, cutting deploy time by 40%', DEFAULT_VOCABULARY)

      expect(bullet.text).toBe('Led migration to Kubernetes, cutting deploy time by 40%')
      expect(bullet.opensWithActionVerb).toBe(true)
      expect(bullet.mentionsTool).toBe(true)
      expect(bullet.mentionsOutcome).toBe(true)
      expect(bullet.points).toBe(4)
      expect(bullet.weak).toBe(false)
    })

    it('should mark a bullet with a weak opening and no evidence as weak', () => {
      const bullet = assessBullet('- Responsible for the team calendar', DEFAULT_VOCABULARY)

      expect(bullet.opensWithWeakVerb).toBe(true)
      expect(bullet.opensWithActionVerb).toBe(false)
      expect(bullet.points).toBe(0)
      expect(bullet.weak).toBe(true)
    })

    it('should only credit an action verb in the opening position', () => {
      const bullet = assessBullet('• Website that I built with React', DEFAULT_VOCABULARY)

      expect(bullet.opensWithActionVerb).toBe(false)
      expect(bullet.points).toBe(1)
      expect(bullet.weak).toBe(true)
    })
  })

  describe('countEntries', () => {
    it('should count a title line after a blank line or bullet as a new entry', () => {
      expect(countEntries(['Ledger CLI', '• Built it', '', 'Metrics Exporter', '• Shipped it'])).toBe(2)
      expect(countEntries(['Ledger CLI', '• Built it', 'Metrics Exporter'])).toBe(2)
    })

    it('should treat consecutive text lines as one entry', () => {
      expect(countEntries(['Ledger CLI', 'Java, PostgreSQL'])).toBe(1)
    })

    it('should count a bullet-only section as one entry', () => {
      expect(countEntries(['• Built a CLI', '• Built a bot'])).toBe(1)
    })

    it('should return 0 for an empty section', () => {
      expect(countEntries([])).toBe(0)
      expect(countEntries(['', ''])).toBe(0)
    })
  })

  describe('isMostRecentFirst', () => {
    it('should use date range starts when there are at least two ranges', () => {
      expect(
        isMostRecentFirst(
          datesOnly([], [
            { start: 2021, end: 'present' },
            { start: 2018, end: 2021 },
          ]),
        ),
      ).toBe(true)
      expect(
        isMostRecentFirst(
          datesOnly([], [
            { start: 2014, end: 2018 },
            { start: 2018, end: 2021 },
            { start: 2021, end: 'present' },
          ]),
        ),
      ).toBe(false)
    })

    it('should pass when half of the year pairs do not increase', () => {
      expect(isMostRecentFirst(datesOnly([2023, 2019, 2021]))).toBe(true)
      expect(isMostRecentFirst(datesOnly([2017, 2019, 2021]))).toBe(false)
    })

    it('should return null without enough dates', () => {
      expect(isMostRecentFirst(datesOnly([2020, 2022]))).toBeNull()
      expect(isMostRecentFirst(datesOnly([]))).toBeNull()
    })
  })

  describe('extractSignals', () => {
    it('should extract every signal from a complete resume', () => {
      const text = new ResumeTextService().normalize(EXPERIENCED_RESUME)
      const sections = new ResumeSectioningService().detect(text)

      const signals = extractSignals(text, sections, DEFAULT_VOCABULARY)

      expect(signals).toMatchObject({
        hasEmail: true,
        hasPhone: true,
        hasLinkedIn: true,
        hasLocation: true,
        firstLineWordCount: 2,
        metricCount: 7,
        stuffedWords: [],
        firstPersonCount: 0,
        weakBulletCount: 0,
        weakVerbBulletCount: 0,
        projectCount: 2,
        experienceLineCount: 9,
        chronologyDescending: true,
      })
      expect(signals.skills).toEqual([
        'python',
        'java',
        'typescript',
        'sql',
        'react',
        'node.js',
        'aws',
        'docker',
        'kubernetes',
        'git',
        'postgresql',
        'redis',
        'kafka',
      ])
      expect(signals.actionVerbs).toEqual([
        'developed',
        'built',
        'designed',
        'implemented',
        'led',
        'optimized',
        'automated',
        'shipped',
      ])
      expect(signals.bullets).toHaveLength(7)
      expect(signals.bullets.every((bullet) => bullet.points === 4)).toBe(true)
    })

    it('should flag words repeated more than ten times', () => {
      const raw = Array.from({ length: 11 }, () => 'python developer').join(' ')
      const text = new ResumeTextService().normalize(raw)
      const sections = new ResumeSectioningService().detect(text)

      expect(extractSignals(text, sections, DEFAULT_VOCABULARY).stuffedWords).toEqual(['python', 'developer'])
    })
  })
})
