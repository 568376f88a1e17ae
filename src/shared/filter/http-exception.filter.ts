import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common'
import type { Request, Response } from 'express'
import { LoggerService } from 'src/shared/services/logger.service'

@Catch(HttpException)
export class HttpExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: LoggerService) {}

  catch(exception: HttpException, host: ArgumentsHost) {
    const ctx = host.switchToHttp()
    const response = ctx.getResponse<Response>()
    const request = ctx.getRequest<Request>()
    const status = exception.getStatus()
    const body = exception.getResponse()

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.logError(exception, { service: 'HttpExceptionFilter', path: request.url })
    } else {
      this.logger.logWarning(exception.message, { service: 'HttpExceptionFilter', path: request.url, status })
    }

    // The client is gone; nothing to write
    if (response.headersSent || response.writableEnded || request.destroyed) return

    response.status(status).json({
      statusCode: status,
      message: typeof body === 'string' ? body : 'message' in body ? body.message : exception.message,
    })
  }
}
