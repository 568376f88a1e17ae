import type { AnalyzerName } from 'src/engines/aggregation/aggregation.model'

/**
 * Input text is empty or under the minimum content length.
 * Carried on ResumeText and scored as a Parsability penalty, never thrown outward.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * An external analyzer could not produce a usable result
 * (disabled, timeout, abort, transport failure or response-schema mismatch).
 */
export class ExternalAnalyzerUnavailableError extends Error {
  constructor(
    readonly analyzer: AnalyzerName,
    readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`${analyzer} analyzer unavailable: ${reason}`, options)
    this.name = 'ExternalAnalyzerUnavailableError'
  }
}

/**
 * Invalid or inconsistent settings, raised once while loading configuration.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export class AllAnalyzersUnavailableError extends Error {
  constructor(readonly reasons: ReadonlyArray<{ analyzer: AnalyzerName; reason: string }>) {
    super(`No analyzer produced a score: ${reasons.map((r) => `${r.analyzer} (${r.reason})`).join(', ')}`)
    this.name = 'AllAnalyzersUnavailableError'
  }
}

export class EvaluationAbortedError extends Error {
  constructor() {
    super('Evaluation aborted by caller')
    this.name = 'EvaluationAbortedError'
  }
}
