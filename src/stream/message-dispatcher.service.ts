import { Injectable, Logger } from '@nestjs/common';
import bs58 from 'bs58';
import { errorMessage } from '../common/errors';
import { InboundUpdate } from '../geyser/geyser.types';

export type DispatchResult = 'continue' | 'stop';

/**
 * Logs a one-line summary of each inbound update and tells the session
 * whether to keep reading. Holds no state.
 *
 * Only the `none` case stops the session. Failures while summarising are
 * logged and reported as `stop`; nothing is thrown.
 */
@Injectable()
export class MessageDispatcherService {
  private readonly logger = new Logger(MessageDispatcherService.name);

  dispatch(update: InboundUpdate): DispatchResult {
    try {
      return this.handle(update);
    } catch (err) {
      this.logger.error(`Error handling message: ${errorMessage(err)}`);
      return 'stop';
    }
  }

  private handle(update: InboundUpdate): DispatchResult {
    switch (update.kind) {
      case 'slot': {
        const { slot, parent, status } = update.slot;
        this.logger.log(`Slot update: slot=${slot}, parent=${parent ?? 0}, status=${status}`);
        return 'continue';
      }
      case 'account': {
        const { account, slot } = update.account;
        if (account) {
          this.logger.log(
            `Account update: pubkey=${bs58.encode(account.pubkey)}, slot=${slot}, lamports=${account.lamports}`,
          );
        }
        return 'continue';
      }
      case 'transaction': {
        const { transaction, slot } = update.transaction;
        if (transaction) {
          this.logger.log(
            `Transaction update: slot=${slot}, signature=${bs58.encode(transaction.signature)}`,
          );
        }
        return 'continue';
      }
      case 'block':
        this.logger.log(`Block update: slot=${update.block.slot}, blockhash=${update.block.blockhash}`);
        return 'continue';
      case 'ping':
        // answered by the session's liveness relay; nothing to log here
        return 'continue';
      case 'pong':
        this.logger.log(`Received pong response with id: ${update.id}`);
        return 'continue';
      case 'unknown':
        this.logger.warn(`Received unknown update type: ${update.variant}`);
        return 'continue';
      case 'none':
        this.logger.error('Update not found in the message');
        return 'stop';
    }
  }
}
