import { Module } from '@nestjs/common'
import { EnginesModule } from 'src/engines/engines.module'
import { HealthController } from './health.controller'

@Module({
  imports: [EnginesModule],
  controllers: [HealthController],
})
export class HealthModule {}
