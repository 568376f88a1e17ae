import { Module } from '@nestjs/common'
import { APP_FILTER, APP_GUARD, APP_INTERCEPTOR, APP_PIPE } from '@nestjs/core'
import { ThrottlerModule } from '@nestjs/throttler'
import { ZodSerializerInterceptor } from 'nestjs-zod'
import { SharedModule } from './shared/shared.module'
import CustomZodValidationPipe from 'src/shared/pipe/custom-zod-validation.pipe'
import { HttpExceptionFilter } from 'src/shared/filter/http-exception.filter'
import { ThrottlerBehindProxyGuard } from 'src/shared/guard/throttler-behind-proxy.guard'
import envConfig from 'src/shared/config'
import { EvaluationModule } from './routes/evaluation/evaluation.module'
import { HealthModule } from './routes/health/health.module'

@Module({
  imports: [
    SharedModule,
    ThrottlerModule.forRoot({
      throttlers: [
        {
          name: 'default',
          ttl: envConfig.RATE_LIMIT_TTL,
          limit: envConfig.RATE_LIMIT_MAX,
        },
      ],
    }),
    EvaluationModule,
    HealthModule,
  ],
  providers: [
    {
      provide: APP_PIPE,
      useClass: CustomZodValidationPipe,
    },
    { provide: APP_INTERCEPTOR, useClass: ZodSerializerInterceptor },
    {
      provide: APP_FILTER,
      useClass: HttpExceptionFilter,
    },
    {
      provide: APP_GUARD,
      useClass: ThrottlerBehindProxyGuard,
    },
  ],
})
export class AppModule {}
