import { Injectable } from '@nestjs/common'
import { ScoreAggregator } from 'src/engines/aggregation/score-aggregator'
import { AllAnalyzersUnavailableError, EvaluationAbortedError } from 'src/shared/errors'
import { LoggerService } from 'src/shared/services/logger.service'
import { EvaluationAbortedException, EvaluationFailedException } from './evaluation.error'
import { toEvaluationResponse } from './evaluation.mapper'
import type { EvaluationResultType } from './evaluation.model'

/**
 * EvaluationService is a PURE ORCHESTRATOR.
 *
 * Allowed:
 * - Delegating to ScoreAggregator
 * - Mapping domain errors onto HTTP exceptions
 * - DTO assembly
 *
 * Forbidden:
 * - Rule evaluation
 * - Scoring
 */
@Injectable()
export class EvaluationService {
  constructor(
    private readonly scoreAggregator: ScoreAggregator,
    private readonly logger: LoggerService,
  ) {}

  async runEvaluation(text: string, signal?: AbortSignal): Promise<EvaluationResultType> {
    try {
      const evaluation = await this.scoreAggregator.aggregate(text, { signal })
      return toEvaluationResponse(evaluation)
    } catch (error) {
      if (error instanceof AllAnalyzersUnavailableError) {
        this.logger.logError(error, { service: 'EvaluationService', operation: 'runEvaluation' })
        throw EvaluationFailedException
      }
      if (error instanceof EvaluationAbortedError) {
        this.logger.logWarning('Evaluation aborted: client disconnected', { service: 'EvaluationService' })
        throw EvaluationAbortedException
      }
      throw error
    }
  }
}
