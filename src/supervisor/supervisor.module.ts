import { Module } from '@nestjs/common';
import { GeyserModule } from '../geyser/geyser.module';
import { StreamModule } from '../stream/stream.module';
import { ReconnectSupervisorService } from './supervisor.service';

@Module({
  imports: [GeyserModule, StreamModule],
  providers: [ReconnectSupervisorService],
  exports: [ReconnectSupervisorService],
})
export class SupervisorModule {}
