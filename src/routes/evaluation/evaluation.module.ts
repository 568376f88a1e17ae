import { Module } from '@nestjs/common'
import { EvaluationController } from './evaluation.controller'
import { EvaluationService } from './evaluation.service'
import { EnginesModule } from 'src/engines/engines.module'

@Module({
  imports: [EnginesModule],
  controllers: [EvaluationController],
  providers: [EvaluationService],
})
export class EvaluationModule {}
