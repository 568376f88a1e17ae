import { z } from 'zod'
import { config } from 'dotenv'
import { ConfigurationError } from './errors'

config({ path: '.env' })

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined))

const optionalFlag = z
  .enum(['true', 'false', ''])
  .optional()
  .transform((value) => (value === 'true' ? true : value === 'false' ? false : undefined))

const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),

  // CORS Configuration
  CORS_ORIGIN: z.string().default('http://localhost:3000'),

  // Gemini analyzers
  GEMINI_API_KEY: optionalSecret,
  AI_GEMINI_API_KEY: optionalSecret,
  RUBRIC_GEMINI_API_KEY: optionalSecret,
  GEMINI_MODEL: z.string().default('gemini-2.5-flash'),
  AI_ANALYZER_ENABLED: optionalFlag,
  RUBRIC_ANALYZER_ENABLED: optionalFlag,
  ANALYZER_TIMEOUT_MS: z.coerce.number().int().positive().default(45000),
  ANALYZER_MAX_RETRIES: z.coerce.number().int().min(1).default(3),

  // Rate Limiting
  RATE_LIMIT_TTL: z.coerce.number().int().positive().default(60000), // 1 minute
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(10),
})

export interface AnalyzerSettings {
  enabled: boolean
  apiKey: string | null
}

export type AppConfig = z.infer<typeof configSchema> & {
  AI_ANALYZER: AnalyzerSettings
  RUBRIC_ANALYZER: AnalyzerSettings
}

/**
 * An analyzer defaults to enabled when it has a key.
 * Enabling one explicitly without a key is a start-up error.
 */
function resolveAnalyzer(name: string, explicit: boolean | undefined, apiKey: string | undefined): AnalyzerSettings {
  const enabled = explicit ?? apiKey !== undefined
  if (enabled && !apiKey) {
    throw new ConfigurationError(`${name} analyzer is enabled but no Gemini API key is configured`)
  }
  return { enabled, apiKey: apiKey ?? null }
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = configSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new ConfigurationError(`Invalid values in environment: ${details}`)
  }

  const values = parsed.data
  return {
    ...values,
    AI_ANALYZER: resolveAnalyzer('AI', values.AI_ANALYZER_ENABLED, values.AI_GEMINI_API_KEY ?? values.GEMINI_API_KEY),
    RUBRIC_ANALYZER: resolveAnalyzer(
      'Rubric',
      values.RUBRIC_ANALYZER_ENABLED,
      values.RUBRIC_GEMINI_API_KEY ?? values.GEMINI_API_KEY,
    ),
  }
}

const envConfig = loadConfig(process.env)

export default envConfig
