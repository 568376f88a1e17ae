import { GoogleGenerativeAI } from '@google/generative-ai'
import { Test } from '@nestjs/testing'
import envConfig from '../config'
import { callWithRetry, GeminiService, isRateLimitError } from './gemini.service'
import { LoggerService } from './logger.service'

const mockGenerateContent = jest.fn()

jest.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: jest.fn().mockImplementation(() => ({
    getGenerativeModel: () => ({ generateContent: mockGenerateContent }),
  })),
}))

describe('isRateLimitError', () => {
  it('should detect a 429 status or message', () => {
    expect(isRateLimitError({ status: 429 })).toBe(true)
    expect(isRateLimitError(new Error('[429 Too Many Requests] Resource exhausted'))).toBe(true)
  })

  it('should ignore other failures', () => {
    expect(isRateLimitError({ status: 500 })).toBe(false)
    expect(isRateLimitError(new Error('fetch failed'))).toBe(false)
    expect(isRateLimitError('429')).toBe(false)
  })
})

describe('callWithRetry', () => {
  it('should retry rate-limited calls with exponential backoff', async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce({ status: 429 })
      .mockRejectedValueOnce({ status: 429 })
      .mockResolvedValue('ok')
    const onRetry = jest.fn()

    await expect(callWithRetry(fn, { maxRetries: 3, baseDelayMs: 1, onRetry })).resolves.toBe('ok')
    expect(fn).toHaveBeenCalledTimes(3)
    expect(onRetry.mock.calls).toEqual([
      [1, 1],
      [2, 2],
    ])
  })

  it('should give up after the last attempt', async () => {
    const error = new Error('429 Too Many Requests')
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(error)

    await expect(callWithRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).rejects.toBe(error)
    expect(fn).toHaveBeenCalledTimes(3)
  })

  it('should not retry other errors', async () => {
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('fetch failed'))

    await expect(callWithRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).rejects.toThrow('fetch failed')
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('should stop retrying once the signal aborts', async () => {
    const controller = new AbortController()
    controller.abort()
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue({ status: 429 })

    await expect(callWithRetry(fn, { maxRetries: 3, baseDelayMs: 1, signal: controller.signal })).rejects.toEqual({
      status: 429,
    })
    expect(fn).toHaveBeenCalledTimes(1)
  })
})

describe('GeminiService', () => {
  let service: GeminiService
  const logger = { logTokenUsage: jest.fn(), logWarning: jest.fn() }
  const options = { service: 'TestAnalyzer', operation: 'analyze', signal: new AbortController().signal }

  beforeEach(async () => {
    jest.clearAllMocks()
    mockGenerateContent.mockResolvedValue({
      response: {
        text: () => '{"ok":true}',
        usageMetadata: { promptTokenCount: 10, candidatesTokenCount: 5, totalTokenCount: 15 },
      },
    })

    const moduleRef = await Test.createTestingModule({
      providers: [GeminiService, { provide: LoggerService, useValue: logger }],
    }).compile()

    service = moduleRef.get(GeminiService)
  })

  it('should return the response text and log token usage', async () => {
    await expect(service.generateJson('test-key', 'prompt', options)).resolves.toBe('{"ok":true}')

    expect(mockGenerateContent).toHaveBeenCalledWith('prompt', { signal: options.signal })
    expect(logger.logTokenUsage).toHaveBeenCalledWith({
      service: 'TestAnalyzer',
      operation: 'analyze',
      inputTokens: 10,
      outputTokens: 5,
      totalTokens: 15,
      model: envConfig.GEMINI_MODEL,
    })
  })

  it('should reuse one client per API key', async () => {
    await service.generateJson('test-key', 'prompt', options)
    await service.generateJson('test-key', 'prompt', options)
    await service.generateJson('other-test-key', 'prompt', options)

    expect(jest.mocked(GoogleGenerativeAI).mock.calls).toEqual([['test-key'], ['other-test-key']])
  })

  it('should propagate errors that are not rate limits', async () => {
    mockGenerateContent.mockRejectedValue(new Error('[400 Bad Request] API key not valid'))

    await expect(service.generateJson('test-key', 'prompt', options)).rejects.toThrow('API key not valid')
    expect(mockGenerateContent).toHaveBeenCalledTimes(1)
    expect(logger.logWarning).not.toHaveBeenCalled()
  })
})
