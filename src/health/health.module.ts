import { Module } from '@nestjs/common';
import { HealthController } from './health.controller';
import { StreamStatusService } from './stream-status.service';

@Module({
  providers: [StreamStatusService],
  controllers: [HealthController],
})
export class HealthModule {}
