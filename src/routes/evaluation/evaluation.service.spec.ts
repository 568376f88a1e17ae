import { Test } from '@nestjs/testing'
import { emptyImprovements, type AggregateEvaluation } from 'src/engines/aggregation/aggregation.model'
import { ScoreAggregator, type AggregateOptions } from 'src/engines/aggregation/score-aggregator'
import envConfig from 'src/shared/config'
import { AllAnalyzersUnavailableError, EvaluationAbortedError } from 'src/shared/errors'
import { LoggerService } from 'src/shared/services/logger.service'
import { SharedModule } from 'src/shared/shared.module'
import { FRESHER_RESUME } from 'src/test/fixtures/resumes'
import { CLIENT_CLOSED_REQUEST, EvaluationAbortedException, EvaluationFailedException } from './evaluation.error'
import { EvaluationModule } from './evaluation.module'
import { EvaluationResultSchema } from './evaluation.model'
import { EvaluationService } from './evaluation.service'

const standardOnly: AggregateEvaluation = {
  standardScore: 70,
  aiScore: null,
  rubricScore: null,
  finalScore: 70,
  mergedStrengths: [],
  mergedWeaknesses: [],
  mergedImprovements: emptyImprovements(),
  standardBreakdown: null,
  unavailableAnalyzers: [],
}

describe('EvaluationService', () => {
  let service: EvaluationService
  const aggregator = { aggregate: jest.fn<Promise<AggregateEvaluation>, [string, AggregateOptions?]>() }
  const logger = { logError: jest.fn(), logWarning: jest.fn() }

  beforeEach(async () => {
    jest.resetAllMocks()

    const moduleRef = await Test.createTestingModule({
      providers: [
        EvaluationService,
        { provide: ScoreAggregator, useValue: aggregator },
        { provide: LoggerService, useValue: logger },
      ],
    }).compile()

    service = moduleRef.get(EvaluationService)
  })

  it('should pass the caller signal to the aggregator and map the result', async () => {
    aggregator.aggregate.mockResolvedValue(standardOnly)
    const { signal } = new AbortController()

    const response = await service.runEvaluation('resume', signal)

    expect(aggregator.aggregate).toHaveBeenCalledWith('resume', { signal })
    expect(response.final_ats_score).toBe(70)
  })

  it('should map an evaluation with no available analyzer to 422', async () => {
    aggregator.aggregate.mockRejectedValue(
      new AllAnalyzersUnavailableError([{ analyzer: 'standard', reason: 'unexpected input' }]),
    )

    await expect(service.runEvaluation('resume')).rejects.toBe(EvaluationFailedException)
    expect(EvaluationFailedException.getStatus()).toBe(422)
    expect(logger.logError).toHaveBeenCalledTimes(1)
  })

  it('should map a caller abort to 499', async () => {
    aggregator.aggregate.mockRejectedValue(new EvaluationAbortedError())

    await expect(service.runEvaluation('resume')).rejects.toBe(EvaluationAbortedException)
    expect(EvaluationAbortedException.getStatus()).toBe(CLIENT_CLOSED_REQUEST)
  })

  it('should rethrow unexpected errors', async () => {
    const error = new TypeError('boom')
    aggregator.aggregate.mockRejectedValue(error)

    await expect(service.runEvaluation('resume')).rejects.toBe(error)
  })
})

describe('EvaluationModule', () => {
  let service: EvaluationService

  beforeEach(async () => {
    jest.replaceProperty(envConfig, 'AI_ANALYZER', { enabled: false, apiKey: null })
    jest.replaceProperty(envConfig, 'RUBRIC_ANALYZER', { enabled: false, apiKey: null })
    jest.spyOn(console, 'log').mockImplementation(() => undefined)
    jest.spyOn(console, 'warn').mockImplementation(() => undefined)

    const moduleRef = await Test.createTestingModule({
      imports: [SharedModule, EvaluationModule],
    }).compile()

    service = moduleRef.get(EvaluationService)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('should score with the standard path alone when both external analyzers are disabled', async () => {
    const response = await service.runEvaluation(FRESHER_RESUME)

    expect(response.standard_ats_score).toBe(70)
    expect(response.ai_ats_score).toBeNull()
    expect(response.rubric_ats_score).toBeNull()
    expect(response.final_ats_score).toBe(70)
    expect(response.shortlist_decision).toBeNull()
    expect(response.unavailable_analyzers).toEqual([
      { analyzer: 'ai', reason: 'analyzer disabled' },
      { analyzer: 'rubric', reason: 'analyzer disabled' },
    ])
    expect(response.standard_breakdown?.applied_caps).toEqual([{ reason: 'Insufficient keywords', cap: 70 }])
    expect(EvaluationResultSchema.safeParse(response).success).toBe(true)
  })
})
