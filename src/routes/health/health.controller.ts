import { Controller, Get } from '@nestjs/common'
import { SkipThrottle } from '@nestjs/throttler'
import { RubricAnalyzer } from 'src/engines/rubric/rubric.analyzer'
import { AiSemanticAnalyzer } from 'src/engines/semantic/ai-semantic.analyzer'

type AnalyzerStatus = 'enabled' | 'disabled'

@Controller('health')
@SkipThrottle()
export class HealthController {
  constructor(
    private readonly aiAnalyzer: AiSemanticAnalyzer,
    private readonly rubricAnalyzer: RubricAnalyzer,
  ) {}

  @Get()
  check() {
    const status = (enabled: boolean): AnalyzerStatus => (enabled ? 'enabled' : 'disabled')

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      analyzers: {
        standard: 'enabled',
        ai: status(this.aiAnalyzer.isEnabled()),
        rubric: status(this.rubricAnalyzer.isEnabled()),
      },
    }
  }
}
