import { Test } from '@nestjs/testing'
import envConfig from 'src/shared/config'
import { ExternalAnalyzerUnavailableError } from 'src/shared/errors'
import { GeminiService, type GenerateJsonOptions } from 'src/shared/services/gemini.service'
import { AiSemanticAnalyzer } from './ai-semantic.analyzer'

const validResponse = {
  ai_ats_score: 72.6,
  analysis_summary: {
    strengths: ['Clear project descriptions'],
    weaknesses: ['Few quantified results'],
  },
  teaching_summary: ' Quantify the impact of each project. ',
  issues: [
    {
      label: 'Vague bullets',
      category: 'content_and_bullets',
      severity: 'High',
      recommended_fix: 'Name the tool and the result in each bullet',
      reason: 'Recruiters skim for evidence',
      rewrites: { concise: 'Built a React dashboard used by 200 students', expanded: 'Longer example' },
    },
    {
      label: 'Two-column layout',
      category: 'layout',
      severity: 'Critical',
      recommended_fix: 'Use a single column',
    },
  ],
}

describe('AiSemanticAnalyzer', () => {
  let analyzer: AiSemanticAnalyzer
  const gemini = { generateJson: jest.fn<Promise<string>, [string, string, GenerateJsonOptions]>() }

  beforeEach(async () => {
    gemini.generateJson.mockReset()

    const moduleRef = await Test.createTestingModule({
      providers: [AiSemanticAnalyzer, { provide: GeminiService, useValue: gemini }],
    }).compile()

    analyzer = moduleRef.get(AiSemanticAnalyzer)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('should map a valid response onto an analyzer result', async () => {
    gemini.generateJson.mockResolvedValue(JSON.stringify(validResponse))

    const result = await analyzer.analyze('resume text', new AbortController().signal)

    expect(result.score).toBe(73)
    expect(result.strengths).toEqual(['Clear project descriptions'])
    expect(result.weaknesses).toEqual([
      'Learning focus: Quantify the impact of each project.',
      'Few quantified results',
    ])
    expect(result.improvements.content_and_bullets).toEqual([
      {
        issue: 'Vague bullets',
        fix: 'Name the tool and the result in each bullet',
        reason: 'Recruiters skim for evidence',
        example: 'Built a React dashboard used by 200 students',
      },
      {
        issue: 'Two-column layout',
        fix: 'Use a single column',
        reason: 'Medium severity issue',
      },
    ])
  })

  it('should call Gemini with the configured key and the caller signal', async () => {
    gemini.generateJson.mockResolvedValue(JSON.stringify(validResponse))
    const { signal } = new AbortController()

    await analyzer.analyze('resume text', signal)

    const [apiKey, prompt, options] = gemini.generateJson.mock.calls[0]
    expect(apiKey).toBe('test-key')
    expect(prompt).toContain('resume text')
    expect(options).toEqual({ service: 'AiSemanticAnalyzer', operation: 'analyze', signal })
  })

  it('should accept a response wrapped in a code fence', async () => {
    gemini.generateJson.mockResolvedValue('```json\n' + JSON.stringify(validResponse) + '\n```')

    await expect(analyzer.analyze('resume text', new AbortController().signal)).resolves.toMatchObject({ score: 73 })
  })

  it('should reject a response that is not JSON', async () => {
    gemini.generateJson.mockResolvedValue('The resume looks good.')

    await expect(analyzer.analyze('resume text', new AbortController().signal)).rejects.toMatchObject({
      analyzer: 'ai',
      reason: 'response is not valid JSON',
    })
  })

  it('should reject a response that does not match the schema', async () => {
    gemini.generateJson.mockResolvedValue(JSON.stringify({ ai_ats_score: 'high', analysis_summary: {} }))

    const pending = analyzer.analyze('resume text', new AbortController().signal)

    await expect(pending).rejects.toBeInstanceOf(ExternalAnalyzerUnavailableError)
    await expect(pending).rejects.toMatchObject({
      reason: 'response does not match schema at ai_ats_score: Expected number, received string',
    })
  })

  it('should report a transport failure', async () => {
    gemini.generateJson.mockRejectedValue(new Error('fetch failed'))

    await expect(analyzer.analyze('resume text', new AbortController().signal)).rejects.toMatchObject({
      reason: 'request failed: fetch failed',
    })
  })

  it('should report an aborted request', async () => {
    const controller = new AbortController()
    controller.abort()
    gemini.generateJson.mockRejectedValue(new Error('This operation was aborted'))

    await expect(analyzer.analyze('resume text', controller.signal)).rejects.toMatchObject({
      reason: 'request aborted',
    })
  })

  it('should refuse to run when disabled', async () => {
    jest.replaceProperty(envConfig, 'AI_ANALYZER', { enabled: false, apiKey: null })

    expect(analyzer.isEnabled()).toBe(false)
    await expect(analyzer.analyze('resume text', new AbortController().signal)).rejects.toMatchObject({
      reason: 'analyzer disabled',
    })
    expect(gemini.generateJson).not.toHaveBeenCalled()
  })
})
