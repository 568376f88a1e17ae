import 'reflect-metadata'
import { NestFactory } from '@nestjs/core'
import type { NestExpressApplication } from '@nestjs/platform-express'
import { AppModule } from './app.module'
import envConfig from './shared/config'
import { LoggerService } from './shared/services/logger.service'
import { MAX_RESUME_TEXT_LENGTH } from './routes/evaluation/evaluation.model'

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule)
  const logger = app.get(LoggerService)

  // Room for the largest accepted resume text after JSON escaping
  app.useBodyParser('json', { limit: MAX_RESUME_TEXT_LENGTH * 4 })
  app.set('trust proxy', 'loopback')

  app.enableCors({
    origin: envConfig.CORS_ORIGIN,
    credentials: true,
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  })

  await app.listen(envConfig.PORT)
  logger.logInfo(`Application is running on: http://localhost:${envConfig.PORT}`, {
    aiAnalyzer: envConfig.AI_ANALYZER.enabled,
    rubricAnalyzer: envConfig.RUBRIC_ANALYZER.enabled,
  })
}

bootstrap().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
