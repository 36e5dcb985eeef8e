import { StreamError } from '../common/errors';
import { GeyserTransport, SubscribeStream } from './geyser.types';

/**
 * Transport handle over one gRPC channel.
 *
 * Tracks the subscribe calls it has opened. `close()` cancels them before
 * closing the channel, since a channel close alone lets in-flight calls run
 * on and would leave a pending receive waiting.
 */
export class GrpcGeyserTransport implements GeyserTransport {
  private readonly calls = new Set<SubscribeStream>();
  private closed = false;

  constructor(
    readonly endpoint: string,
    private readonly openCall: () => SubscribeStream,
    private readonly closeChannel: () => void,
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  subscribe(): SubscribeStream {
    if (this.closed) {
      throw new StreamError(`transport to ${this.endpoint} is closed`);
    }
    const call = this.openCall();
    this.calls.add(call);
    return call;
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    for (const call of this.calls) {
      call.cancel();
    }
    this.calls.clear();
    this.closeChannel();
  }
}
