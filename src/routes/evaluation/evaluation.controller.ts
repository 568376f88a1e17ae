import { Controller, Post, Body, HttpCode, HttpStatus, Res } from '@nestjs/common'
import { ZodSerializerDto } from 'nestjs-zod'
import type { Response } from 'express'
import { EvaluationService } from './evaluation.service'
import { RunEvaluationBodyDTO, EvaluationResultDTO } from './evaluation.dto'
import type { EvaluationResultType } from './evaluation.model'

@Controller('evaluation')
export class EvaluationController {
  constructor(private readonly evaluationService: EvaluationService) {}

  @Post('run')
  @HttpCode(HttpStatus.OK)
  @ZodSerializerDto(EvaluationResultDTO)
  async runEvaluation(
    @Body() body: RunEvaluationBodyDTO,
    @Res({ passthrough: true }) res: Response,
  ): Promise<EvaluationResultType> {
    // Client disconnect cancels in-flight analyzer calls
    const controller = new AbortController()
    const onClose = () => {
      if (!res.writableFinished) controller.abort()
    }
    res.on('close', onClose)

    try {
      return await this.evaluationService.runEvaluation(body.text, controller.signal)
    } finally {
      res.off('close', onClose)
    }
  }
}
