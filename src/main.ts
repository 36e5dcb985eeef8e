import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { errorMessage } from './common/errors';
import { AppConfig } from './config/env.config';
import { ShutdownService } from './shutdown/shutdown.service';
import { ReconnectSupervisorService } from './supervisor/supervisor.service';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { abortOnError: false });

  const shutdown = app.get(ShutdownService);
  shutdown.listen();

  const config = app.get(ConfigService<AppConfig, true>);
  const port = config.get('geyser.PORT', { infer: true });
  await app.listen(port);
  logger.log(`Geyser stream client health endpoint listening on :${port}`);

  await app.get(ReconnectSupervisorService).superviseForever(shutdown.signal);
  await app.close();
}

bootstrap()
  .then(() => process.exit(0))
  .catch((err) => {
    logger.fatal(`Fatal error: ${errorMessage(err)}`);
    process.exit(1);
  });
