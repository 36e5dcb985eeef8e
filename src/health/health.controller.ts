import { Controller, Get } from '@nestjs/common';
import { ShutdownService } from '../shutdown/shutdown.service';
import { StreamStatusService } from './stream-status.service';

/** Simple health-check endpoint at `GET /health`. */
@Controller('health')
export class HealthController {
  constructor(
    private readonly status: StreamStatusService,
    private readonly shutdown: ShutdownService,
  ) {}

  /** Return upstream connection status, reconnect counters, and shutdown state. */
  @Get()
  check() {
    return {
      status: this.shutdown.isShuttingDown ? 'shutting_down' : 'ok',
      shuttingDown: this.shutdown.isShuttingDown,
      ...this.status.snapshot,
    };
  }
}
