import { Injectable, Logger } from '@nestjs/common';
import { StreamError, errorMessage } from '../common/errors';
import { GeyserTransport, SubscribeRequest, SubscribeStream } from '../geyser/geyser.types';
import { toInboundUpdate } from '../geyser/update.util';
import { LivenessRelay } from './liveness-relay';
import { MessageDispatcherService } from './message-dispatcher.service';

/** Name of the slot filter in the subscription request. */
export const SLOT_FILTER_NAME = 'client';

/** Upper bound on how long the send side waits before re-checking for shutdown. */
export const REPLY_POLL_MS = 1_000;

/**
 * How a session ended without a transport error:
 * - `closed`: the server finished the stream.
 * - `halted`: the dispatcher asked to stop.
 * - `shutdown`: the shutdown signal was observed.
 */
export type SessionOutcome = 'closed' | 'halted' | 'shutdown';

export function buildSubscribeRequest(): SubscribeRequest {
  return {
    slots: {
      [SLOT_FILTER_NAME]: { filter_by_commitment: true, interslot_updates: false },
    },
    commitment: 'CONFIRMED',
  };
}

export function buildPingReply(id: number): SubscribeRequest {
  return { ping: { id } };
}

/**
 * Runs one subscribe/receive cycle over a transport.
 *
 * The send side writes the subscription, then replies to server pings taken
 * from a {@link LivenessRelay}. The receive side classifies every update,
 * queues ping identifiers for the send side, and hands the rest to the
 * {@link MessageDispatcherService}. Both halves share one duplex call.
 */
@Injectable()
export class StreamSessionService {
  private readonly logger = new Logger(StreamSessionService.name);

  constructor(private readonly dispatcher: MessageDispatcherService) {}

  /**
   * Subscribe and pump messages until the stream ends.
   *
   * The send side always terminates before this returns. Closing the
   * transport is left to the caller.
   *
   * @throws {StreamError} on a transport error while `shutdown` is not aborted.
   */
  async run(transport: GeyserTransport, shutdown: AbortSignal): Promise<SessionOutcome> {
    if (shutdown.aborted) return 'shutdown';

    const relay = new LivenessRelay();
    const sendSide = new AbortController();
    const call = transport.subscribe();
    call.on('error', (err) => {
      this.logger.debug(`Subscribe stream error: ${err.message}`);
    });

    // a pending receive does not see the flag; cancelling the call fails it fast
    const onShutdown = () => {
      sendSide.abort();
      call.cancel();
    };
    shutdown.addEventListener('abort', onShutdown, { once: true });
    const outbound = this.pumpOutbound(call, relay, sendSide.signal);
    this.logger.log('Subscribed to slot updates, waiting for messages...');

    let outcome: SessionOutcome = 'closed';
    try {
      for await (const message of call) {
        if (shutdown.aborted) break;

        const update = toInboundUpdate(message);
        if (update.kind === 'ping') {
          relay.enqueue(update.id);
          this.logger.log(
            `Received ping from server (id=${update.id}) - replying to keep connection alive`,
          );
          continue;
        }

        if (this.dispatcher.dispatch(update) === 'stop') {
          outcome = 'halted';
          break;
        }
      }
      if (shutdown.aborted) outcome = 'shutdown';
    } catch (err) {
      if (!shutdown.aborted) {
        this.logger.error(`Stream error: ${errorMessage(err)}`);
        throw new StreamError(`Subscribe stream failed: ${errorMessage(err)}`, { cause: err });
      }
      outcome = 'shutdown';
    } finally {
      shutdown.removeEventListener('abort', onShutdown);
      sendSide.abort();
      await outbound;
      if (outcome !== 'closed') call.cancel();
      this.logger.log('Stream closed');
    }
    return outcome;
  }

  /**
   * Send side: the subscription first, then one ping reply per queued
   * identifier in arrival order, until `signal` aborts. Always half-closes
   * the call on the way out; never rejects.
   */
  private async pumpOutbound(call: SubscribeStream, relay: LivenessRelay, signal: AbortSignal) {
    try {
      call.write(buildSubscribeRequest());
      while (!signal.aborted) {
        const id = await relay.dequeue(REPLY_POLL_MS, signal);
        if (id === null) continue;
        call.write(buildPingReply(id));
        this.logger.debug(`Sent ping reply (id=${id})`);
      }
    } catch (err) {
      this.logger.error(`Error in request stream: ${errorMessage(err)}`);
    }

    try {
      call.end();
    } catch (err) {
      this.logger.debug(`Request stream already closed: ${errorMessage(err)}`);
    }
  }
}
