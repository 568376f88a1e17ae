import { Global, Module } from '@nestjs/common'
import { GeminiService } from 'src/shared/services/gemini.service'
import { LoggerService } from 'src/shared/services/logger.service'
import { ResumeSectioningService } from 'src/shared/services/resume-sectioning.service'
import { ResumeTextService } from 'src/shared/services/resume-text.service'

const sharedServices = [LoggerService, GeminiService, ResumeTextService, ResumeSectioningService]
@Global()
@Module({
  providers: sharedServices,
  exports: sharedServices,
})
export class SharedModule {}
