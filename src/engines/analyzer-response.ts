import type { z } from 'zod'
import type { AnalyzerName } from 'src/engines/aggregation/aggregation.model'
import { ExternalAnalyzerUnavailableError } from 'src/shared/errors'

/**
 * Remove a markdown code fence wrapped around model output, if present
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim()
  const fenced = trimmed.match(/^```(?:json)?\s*\n?([\s\S]*?)\n?```$/)
  return fenced ? fenced[1].trim() : trimmed
}

/**
 * Parse and validate a JSON model response.
 * Any failure becomes ExternalAnalyzerUnavailableError for the given analyzer.
 */
export function parseAnalyzerResponse<S extends z.ZodTypeAny>(
  analyzer: AnalyzerName,
  responseText: string,
  schema: S,
): z.output<S> {
  let json: unknown
  try {
    json = JSON.parse(stripCodeFences(responseText))
  } catch (error) {
    throw new ExternalAnalyzerUnavailableError(analyzer, 'response is not valid JSON', { cause: error })
  }

  const parsed = schema.safeParse(json)
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : ''
    throw new ExternalAnalyzerUnavailableError(
      analyzer,
      `response does not match schema${where}: ${first?.message ?? 'invalid'}`,
      { cause: parsed.error },
    )
  }
  return parsed.data
}

/**
 * Wrap a transport/abort failure from the model call
 */
export function toUnavailable(
  analyzer: AnalyzerName,
  error: unknown,
  signal: AbortSignal,
): ExternalAnalyzerUnavailableError {
  if (error instanceof ExternalAnalyzerUnavailableError) return error
  if (signal.aborted) {
    return new ExternalAnalyzerUnavailableError(analyzer, 'request aborted', { cause: error })
  }
  const message = error instanceof Error ? error.message : String(error)
  return new ExternalAnalyzerUnavailableError(analyzer, `request failed: ${message}`, { cause: error })
}

export function clampScore(value: number): number {
  return Math.min(100, Math.max(0, Math.round(value)))
}
