import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { StreamEndedError, errorMessage } from '../common/errors';
import { delay } from '../common/delay.util';
import { AppConfig, EnvConfig } from '../config/env.config';
import { GeyserConnectionService } from '../geyser/connection.service';
import { StreamSessionService } from '../stream/stream-session.service';
import { ExponentialBackoff } from './backoff.util';
import {
  GEYSER_CONNECTED,
  GEYSER_DISCONNECTED,
  GEYSER_STOPPED,
  GeyserConnectedEvent,
  GeyserDisconnectedEvent,
} from './supervisor.events';

/**
 * Keeps a subscription alive for the whole process run.
 *
 * Every attempt connects, runs one {@link StreamSessionService} session and
 * closes the transport, whatever the outcome. Any ending other than shutdown
 * counts as a failure, including a clean server close, and is followed by an
 * exponential backoff delay. There is no cap on attempts or total time.
 */
@Injectable()
export class ReconnectSupervisorService {
  private readonly logger = new Logger(ReconnectSupervisorService.name);
  private readonly env: EnvConfig;

  constructor(
    private readonly connection: GeyserConnectionService,
    private readonly session: StreamSessionService,
    private readonly events: EventEmitter2,
    config: ConfigService<AppConfig, true>,
  ) {
    this.env = config.get('geyser', { infer: true });
  }

  /**
   * Connect, subscribe and reconnect until `shutdown` aborts. Resolves once
   * the current attempt has unwound; never rejects for stream or connect
   * failures.
   */
  async superviseForever(shutdown: AbortSignal): Promise<void> {
    const backoff = new ExponentialBackoff({
      initialMs: this.env.BACKOFF_INITIAL_MS,
      multiplier: this.env.BACKOFF_MULTIPLIER,
      maxMs: this.env.BACKOFF_MAX_MS,
    });

    while (!shutdown.aborted) {
      try {
        await this.connectAndSubscribe(shutdown);
      } catch (err) {
        if (shutdown.aborted) break;

        const delayMs = backoff.next();
        const event: GeyserDisconnectedEvent = {
          reason: errorMessage(err),
          attempt: backoff.attempt,
          delayMs,
        };
        this.logger.warn(
          `Connection failed, will retry in ${(delayMs / 1000).toFixed(1)}s... (attempt ${event.attempt}): ${event.reason}`,
        );
        this.events.emit(GEYSER_DISCONNECTED, event);
        await delay(delayMs, shutdown);
      }
    }

    this.logger.log('Reconnection loop stopped');
    this.events.emit(GEYSER_STOPPED);
  }

  /**
   * One attempt. Returns only when shutdown was requested; every other
   * ending throws so the caller backs off and retries.
   */
  private async connectAndSubscribe(shutdown: AbortSignal): Promise<void> {
    if (shutdown.aborted) return;

    const transport = await this.connection.connect(shutdown);
    try {
      const connected: GeyserConnectedEvent = { endpoint: transport.endpoint };
      this.events.emit(GEYSER_CONNECTED, connected);

      const outcome = await this.session.run(transport, shutdown);
      if (shutdown.aborted) return;

      this.logger.warn(
        outcome === 'halted'
          ? 'Stream stopped by message handler, will reconnect...'
          : 'Stream ended, will reconnect...',
      );
      await delay(this.env.STREAM_END_DELAY_MS, shutdown);
      if (shutdown.aborted) return;

      throw new StreamEndedError(`Stream ${outcome}, triggering reconnection`);
    } finally {
      transport.close();
    }
  }
}
