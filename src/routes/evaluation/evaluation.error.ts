import { HttpException, UnprocessableEntityException } from '@nestjs/common'

// No analyzer produced a score
export const EvaluationFailedException = new UnprocessableEntityException([
  {
    message: 'Error.EvaluationFailed',
    path: 'evaluation',
  },
])

// nginx convention: client closed the connection before the response was written
export const CLIENT_CLOSED_REQUEST = 499

export const EvaluationAbortedException = new HttpException(
  [
    {
      message: 'Error.EvaluationAborted',
      path: 'evaluation',
    },
  ],
  CLIENT_CLOSED_REQUEST,
)
