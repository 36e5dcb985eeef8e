import { Module } from '@nestjs/common';
import { MessageDispatcherService } from './message-dispatcher.service';
import { StreamSessionService } from './stream-session.service';

@Module({
  providers: [MessageDispatcherService, StreamSessionService],
  exports: [StreamSessionService],
})
export class StreamModule {}
