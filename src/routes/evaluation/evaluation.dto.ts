import { createZodDto } from 'nestjs-zod'
import { RunEvaluationBodySchema, EvaluationResultSchema } from './evaluation.model'

export class RunEvaluationBodyDTO extends createZodDto(RunEvaluationBodySchema) {}
export class EvaluationResultDTO extends createZodDto(EvaluationResultSchema) {}
