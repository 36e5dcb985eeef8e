import { InboundUpdate, SubscribeUpdate } from './geyser.types';

/** Identifier echoed back when a server ping carries none. */
export const DEFAULT_PING_ID = 1;

/**
 * Turn a decoded `SubscribeUpdate` into the {@link InboundUpdate} union.
 *
 * Cases this client knows are mapped to their own arm; any other populated
 * case becomes `unknown`, and a message with no case at all becomes `none`.
 */
export function toInboundUpdate(update: SubscribeUpdate): InboundUpdate {
  switch (update.update_oneof) {
    case 'slot':
      return update.slot ? { kind: 'slot', slot: update.slot } : { kind: 'none' };
    case 'account':
      return update.account ? { kind: 'account', account: update.account } : { kind: 'none' };
    case 'transaction':
      return update.transaction
        ? { kind: 'transaction', transaction: update.transaction }
        : { kind: 'none' };
    case 'block':
      return update.block ? { kind: 'block', block: update.block } : { kind: 'none' };
    case 'ping': {
      const id = update.ping?.id;
      return { kind: 'ping', id: typeof id === 'number' ? id : DEFAULT_PING_ID };
    }
    case 'pong':
      return { kind: 'pong', id: update.pong?.id ?? 0 };
    case undefined:
    case null:
    case '':
      return { kind: 'none' };
    default:
      return { kind: 'unknown', variant: update.update_oneof };
  }
}
