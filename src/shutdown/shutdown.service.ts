import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

/**
 * Process-wide cooperative cancellation.
 *
 * Holds a single {@link AbortSignal} that starts un-aborted and is aborted at
 * most once, when a termination signal arrives or {@link trigger} is called.
 * Components that block (queue waits, backoff sleeps, the inbound stream)
 * receive `signal` explicitly and re-check it at bounded intervals.
 */
@Injectable()
export class ShutdownService implements OnModuleDestroy {
  private readonly logger = new Logger(ShutdownService.name);
  private readonly controller = new AbortController();
  private readonly listeners = new Map<ShutdownSignal, () => void>();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isShuttingDown(): boolean {
    return this.controller.signal.aborted;
  }

  /** Install handlers for the given process signals. Safe to call more than once. */
  listen(signals: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM']) {
    for (const sig of signals) {
      if (this.listeners.has(sig)) continue;
      const handler = () => this.trigger(`${sig} received`);
      this.listeners.set(sig, handler);
      process.on(sig, handler);
    }
  }

  /**
   * Set the shutdown flag. Only the first call has any effect.
   *
   * @returns `true` if this call performed the transition.
   */
  trigger(reason: string): boolean {
    if (this.controller.signal.aborted) return false;
    this.logger.log(`${reason}, shutting down gracefully…`);
    this.controller.abort();
    return true;
  }

  onModuleDestroy() {
    for (const [sig, handler] of this.listeners) {
      process.off(sig, handler);
    }
    this.listeners.clear();
  }
}
