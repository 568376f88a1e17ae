import { Injectable } from '@nestjs/common'
import { GoogleGenerativeAI } from '@google/generative-ai'
import envConfig from '../config'
import { LoggerService } from './logger.service'

export interface GenerateJsonOptions {
  /** Caller name recorded in token usage logs */
  service: string
  operation: string
  signal: AbortSignal
  temperature?: number
  maxOutputTokens?: number
}

export interface RetryOptions {
  maxRetries: number
  baseDelayMs: number
  signal?: AbortSignal
  onRetry?: (attempt: number, delayMs: number) => void
}

export function isRateLimitError(error: unknown): boolean {
  if (typeof error === 'object' && error !== null && 'status' in error && error.status === 429) return true
  return error instanceof Error && error.message.includes('429')
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted before retry'))
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      reject(new Error('Aborted during retry backoff'))
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Retry logic with exponential backoff for rate limits.
 * Only HTTP 429 is retried; an aborted signal stops further attempts.
 */
export async function callWithRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxRetries, baseDelayMs, signal, onRetry } = options

  for (let i = 0; i < maxRetries; i++) {
    try {
      return await fn()
    } catch (error) {
      const shouldRetry = isRateLimitError(error) && i < maxRetries - 1 && !signal?.aborted
      if (!shouldRetry) throw error

      const delayMs = Math.pow(2, i) * baseDelayMs
      onRetry?.(i + 1, delayMs)
      await delay(delayMs, signal)
    }
  }
  throw new Error('Max retries exceeded')
}

/**
 * GeminiService
 *
 * Purpose: Single gateway to the Gemini API for the external analyzers.
 *
 * Allowed logic:
 * - JSON-mode generation with retry on rate limits
 * - Token usage logging
 *
 * Forbidden logic:
 * - Parsing or validating model output (analyzers own their schemas)
 * - Swallowing errors: every failure propagates to the analyzer
 */
@Injectable()
export class GeminiService {
  // One client per API key; analyzers may use different keys
  private readonly clients = new Map<string, GoogleGenerativeAI>()

  constructor(private readonly logger: LoggerService) {}

  get model(): string {
    return envConfig.GEMINI_MODEL
  }

  async generateJson(apiKey: string, prompt: string, options: GenerateJsonOptions): Promise<string> {
    const model = this.client(apiKey).getGenerativeModel({
      model: this.model,
      generationConfig: {
        temperature: options.temperature ?? 0.2,
        maxOutputTokens: options.maxOutputTokens ?? 8192,
        responseMimeType: 'application/json',
      },
    })

    const result = await callWithRetry(() => model.generateContent(prompt, { signal: options.signal }), {
      maxRetries: envConfig.ANALYZER_MAX_RETRIES,
      baseDelayMs: 1000,
      signal: options.signal,
      onRetry: (attempt, delayMs) =>
        this.logger.logWarning(`Rate limit hit, retrying in ${delayMs}ms`, {
          service: options.service,
          operation: options.operation,
          attempt,
          maxRetries: envConfig.ANALYZER_MAX_RETRIES,
        }),
    })

    const usage = result.response.usageMetadata
    if (usage) {
      this.logger.logTokenUsage({
        service: options.service,
        operation: options.operation,
        inputTokens: usage.promptTokenCount,
        outputTokens: usage.candidatesTokenCount,
        totalTokens: usage.totalTokenCount,
        model: this.model,
      })
    }

    return result.response.text()
  }

  private client(apiKey: string): GoogleGenerativeAI {
    let client = this.clients.get(apiKey)
    if (!client) {
      client = new GoogleGenerativeAI(apiKey)
      this.clients.set(apiKey, client)
    }
    return client
  }
}
