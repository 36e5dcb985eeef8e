import { Module } from '@nestjs/common';
import { GeyserConnectionService } from './connection.service';

@Module({
  providers: [GeyserConnectionService],
  exports: [GeyserConnectionService],
})
export class GeyserModule {}
