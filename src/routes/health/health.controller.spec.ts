import { Test } from '@nestjs/testing'
import { RubricAnalyzer } from 'src/engines/rubric/rubric.analyzer'
import { AiSemanticAnalyzer } from 'src/engines/semantic/ai-semantic.analyzer'
import { HealthController } from './health.controller'

describe('HealthController', () => {
  it('should report which analyzers are enabled', async () => {
    const moduleRef = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: AiSemanticAnalyzer, useValue: { isEnabled: () => true } },
        { provide: RubricAnalyzer, useValue: { isEnabled: () => false } },
      ],
    }).compile()

    const health = moduleRef.get(HealthController).check()

    expect(health).toMatchObject({
      status: 'ok',
      analyzers: { standard: 'enabled', ai: 'enabled', rubric: 'disabled' },
    })
    expect(Number.isNaN(Date.parse(health.timestamp))).toBe(false)
  })
})
