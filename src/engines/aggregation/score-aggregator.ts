import { Injectable } from '@nestjs/common'
import { RubricAnalyzer } from 'src/engines/rubric/rubric.analyzer'
import { AiSemanticAnalyzer } from 'src/engines/semantic/ai-semantic.analyzer'
import { StandardAtsAnalyzer, type StandardAnalysis } from 'src/engines/standard/standard-ats.analyzer'
import envConfig from 'src/shared/config'
import {
  AllAnalyzersUnavailableError,
  EvaluationAbortedError,
  ExternalAnalyzerUnavailableError,
} from 'src/shared/errors'
import { LoggerService } from 'src/shared/services/logger.service'
import type {
  AggregateEvaluation,
  AnalyzerOutcome,
  AnalyzerResult,
  ExternalAnalyzer,
  UnavailableAnalyzer,
} from './aggregation.model'
import { mergeFeedback } from './feedback-merger'

export interface AggregateOptions {
  /** Caller cancellation; aborts in-flight analyzer calls */
  signal?: AbortSignal
  /** Per-analyzer timeout, defaults to ANALYZER_TIMEOUT_MS */
  timeoutMs?: number
}

type StandardOutcome =
  | { status: 'available'; analysis: StandardAnalysis }
  | { status: 'unavailable'; reason: string }

function describe(error: unknown): string {
  if (error instanceof ExternalAnalyzerUnavailableError) return error.reason
  return error instanceof Error ? error.message : String(error)
}

/**
 * Score Aggregator
 *
 * Responsibilities:
 * - Run the deterministic standard path and both external analyzers
 * - External calls run concurrently, each with its own timeout and AbortController
 * - A failed or timed-out analyzer is dropped; the final score is the mean of the rest
 *
 * Forbidden:
 * - Default scores for unavailable analyzers
 * - Shared mutable state between evaluations
 */
@Injectable()
export class ScoreAggregator {
  constructor(
    private readonly standardAnalyzer: StandardAtsAnalyzer,
    private readonly aiAnalyzer: AiSemanticAnalyzer,
    private readonly rubricAnalyzer: RubricAnalyzer,
    private readonly logger: LoggerService,
  ) {}

  async aggregate(resumeText: string, options: AggregateOptions = {}): Promise<AggregateEvaluation> {
    const { signal } = options
    const timeoutMs = options.timeoutMs ?? envConfig.ANALYZER_TIMEOUT_MS
    if (signal?.aborted) throw new EvaluationAbortedError()

    const startTime = Date.now()
    const standard = this.runStandard(resumeText)

    // Fan out, fan in: total latency is bounded by the slower call
    const [ai, rubric] = await Promise.all([
      this.runExternal(this.aiAnalyzer, resumeText, timeoutMs, signal),
      this.runExternal(this.rubricAnalyzer, resumeText, timeoutMs, signal),
    ])
    if (signal?.aborted) throw new EvaluationAbortedError()

    const unavailable: UnavailableAnalyzer[] = []
    const available: AnalyzerResult[] = []

    if (standard.status === 'available') {
      available.push(standard.analysis.result)
    } else {
      unavailable.push({ analyzer: 'standard', reason: standard.reason })
    }
    for (const outcome of [ai, rubric]) {
      if (outcome.status === 'available') {
        available.push(outcome.result)
      } else {
        unavailable.push({ analyzer: outcome.analyzer, reason: outcome.reason })
      }
    }

    if (available.length === 0) {
      throw new AllAnalyzersUnavailableError(unavailable)
    }

    const finalScore = Math.round(available.reduce((sum, result) => sum + result.score, 0) / available.length)
    const merged = mergeFeedback(available)
    const rubricResult = rubric.status === 'available' ? rubric.result : null

    const evaluation: AggregateEvaluation = Object.freeze({
      standardScore: standard.status === 'available' ? standard.analysis.result.score : null,
      aiScore: ai.status === 'available' ? ai.result.score : null,
      rubricScore: rubricResult ? rubricResult.score : null,
      finalScore,
      ...(rubricResult
        ? { shortlistDecision: rubricResult.shortlistDecision, rubricFeedback: rubricResult.feedback }
        : {}),
      mergedStrengths: merged.strengths,
      mergedWeaknesses: merged.weaknesses,
      mergedImprovements: merged.improvements,
      standardBreakdown: standard.status === 'available' ? standard.analysis.breakdown : null,
      unavailableAnalyzers: unavailable,
    })

    this.logger.logInfo('Evaluation completed', {
      finalScore,
      availableAnalyzers: available.length,
      unavailableAnalyzers: unavailable.map((u) => u.analyzer),
      latencyMs: Date.now() - startTime,
    })

    return evaluation
  }

  private runStandard(resumeText: string): StandardOutcome {
    const startTime = Date.now()
    try {
      const analysis = this.standardAnalyzer.analyze(resumeText)
      this.logger.logAnalyzerCall({
        analyzer: 'standard',
        status: 'available',
        latencyMs: Date.now() - startTime,
        score: analysis.result.score,
      })
      return { status: 'available', analysis }
    } catch (error) {
      this.logger.logError(error, { service: 'ScoreAggregator', operation: 'runStandard' })
      const reason = describe(error)
      this.logger.logAnalyzerCall({
        analyzer: 'standard',
        status: 'unavailable',
        latencyMs: Date.now() - startTime,
        reason,
      })
      return { status: 'unavailable', reason }
    }
  }

  /**
   * Run one external analyzer under its own AbortController.
   * Resolves to an outcome on success, failure or timeout; rejects only when the caller aborts.
   */
  private async runExternal<T extends AnalyzerResult>(
    analyzer: ExternalAnalyzer<T>,
    resumeText: string,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<AnalyzerOutcome<T>> {
    const startTime = Date.now()

    if (!analyzer.isEnabled()) {
      return this.unavailable(analyzer, 'analyzer disabled', startTime)
    }

    const controller = new AbortController()

    let rejectAborted: (error: EvaluationAbortedError) => void = () => undefined
    const aborted = new Promise<never>((_, reject) => {
      rejectAborted = reject
    })
    const onCallerAbort = () => {
      rejectAborted(new EvaluationAbortedError())
      controller.abort()
    }
    signal?.addEventListener('abort', onCallerAbort, { once: true })

    let timer: NodeJS.Timeout | undefined
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new ExternalAnalyzerUnavailableError(analyzer.name, `timed out after ${timeoutMs}ms`))
        controller.abort()
      }, timeoutMs)
    })

    try {
      const result = await Promise.race([analyzer.analyze(resumeText, controller.signal), deadline, aborted])
      this.logger.logAnalyzerCall({
        analyzer: analyzer.name,
        status: 'available',
        latencyMs: Date.now() - startTime,
        score: result.score,
      })
      return { status: 'available', analyzer: analyzer.name, result }
    } catch (error) {
      if (error instanceof EvaluationAbortedError) throw error
      return this.unavailable(analyzer, describe(error), startTime)
    } finally {
      clearTimeout(timer)
      signal?.removeEventListener('abort', onCallerAbort)
    }
  }

  private unavailable<T extends AnalyzerResult>(
    analyzer: ExternalAnalyzer<T>,
    reason: string,
    startTime: number,
  ): AnalyzerOutcome<T> {
    this.logger.logAnalyzerCall({
      analyzer: analyzer.name,
      status: 'unavailable',
      latencyMs: Date.now() - startTime,
      reason,
    })
    return { status: 'unavailable', analyzer: analyzer.name, reason }
  }
}
