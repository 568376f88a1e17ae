import { Injectable } from '@nestjs/common'

export interface TokenUsageContext {
  service: string
  operation: string
  inputTokens?: number
  outputTokens?: number
  totalTokens?: number
  model: string
}

export interface AnalyzerCallContext {
  analyzer: string
  status: 'available' | 'unavailable'
  latencyMs: number
  score?: number
  reason?: string
}

export interface ErrorContext {
  service?: string
  operation?: string
  [key: string]: unknown
}

@Injectable()
export class LoggerService {
  /**
   * Log token usage for Gemini API calls
   */
  logTokenUsage(context: TokenUsageContext) {
    console.log(
      JSON.stringify({
        type: 'TOKEN_USAGE',
        timestamp: new Date().toISOString(),
        ...context,
      }),
    )
  }

  /**
   * Log the outcome of one analyzer inside an evaluation
   */
  logAnalyzerCall(context: AnalyzerCallContext) {
    const line = JSON.stringify({
      type: 'ANALYZER_CALL',
      timestamp: new Date().toISOString(),
      ...context,
    })
    if (context.status === 'unavailable') {
      console.warn(line)
    } else {
      console.log(line)
    }
  }

  /**
   * Log errors with structured context
   */
  logError(error: unknown, context?: ErrorContext) {
    const errorObj = error instanceof Error ? error : new Error(String(error))

    console.error(
      JSON.stringify({
        type: 'ERROR',
        timestamp: new Date().toISOString(),
        name: errorObj.name,
        message: errorObj.message,
        stack: errorObj.stack,
        ...context,
      }),
    )
  }

  logInfo(message: string, context?: Record<string, unknown>) {
    console.log(
      JSON.stringify({
        type: 'INFO',
        timestamp: new Date().toISOString(),
        message,
        ...context,
      }),
    )
  }

  logWarning(message: string, context?: Record<string, unknown>) {
    console.warn(
      JSON.stringify({
        type: 'WARNING',
        timestamp: new Date().toISOString(),
        message,
        ...context,
      }),
    )
  }
}
