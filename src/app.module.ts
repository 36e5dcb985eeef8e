import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import envConfig from './config/env.config';
import { ShutdownModule } from './shutdown/shutdown.module';
import { SupervisorModule } from './supervisor/supervisor.module';
import { HealthModule } from './health/health.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [envConfig] }),
    EventEmitterModule.forRoot(),
    ShutdownModule,
    SupervisorModule,
    HealthModule,
  ],
})
export class AppModule {}
