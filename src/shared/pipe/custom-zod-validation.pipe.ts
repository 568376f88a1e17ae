import { BadRequestException } from '@nestjs/common'
import { createZodValidationPipe } from 'nestjs-zod'
import type { ZodError } from 'zod'

const CustomZodValidationPipe = createZodValidationPipe({
  // Same { message, path } shape as the domain exceptions
  createValidationException: (error: ZodError) =>
    new BadRequestException(
      error.errors.map((issue) => ({
        message: issue.message,
        path: issue.path.join('.'),
      })),
    ),
})

export default CustomZodValidationPipe
