import { Logger } from '@nestjs/common';
import { SubscribeUpdateAccountInfo } from '../geyser/geyser.types';
import { MessageDispatcherService } from './message-dispatcher.service';

describe('MessageDispatcherService', () => {
  let dispatcher: MessageDispatcherService;
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    error = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    dispatcher = new MessageDispatcherService();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('logs slot number, parent and status and continues', () => {
    const result = dispatcher.dispatch({
      kind: 'slot',
      slot: { slot: '100', parent: '99', status: 'SLOT_CONFIRMED' },
    });

    expect(result).toBe('continue');
    expect(log).toHaveBeenCalledWith('Slot update: slot=100, parent=99, status=SLOT_CONFIRMED');
  });

  it('logs parent 0 when the slot has none', () => {
    dispatcher.dispatch({ kind: 'slot', slot: { slot: '5', parent: null, status: 'SLOT_PROCESSED' } });

    expect(log).toHaveBeenCalledWith('Slot update: slot=5, parent=0, status=SLOT_PROCESSED');
  });

  it('logs account updates with a base58 public key', () => {
    const result = dispatcher.dispatch({
      kind: 'account',
      account: { slot: '42', account: { pubkey: new Uint8Array(32), lamports: '5000' } },
    });

    expect(result).toBe('continue');
    expect(log).toHaveBeenCalledWith(
      `Account update: pubkey=${'1'.repeat(32)}, slot=42, lamports=5000`,
    );
  });

  it('logs transaction updates with a base58 signature', () => {
    const result = dispatcher.dispatch({
      kind: 'transaction',
      transaction: { slot: '43', transaction: { signature: new Uint8Array(64) } },
    });

    expect(result).toBe('continue');
    expect(log).toHaveBeenCalledWith(`Transaction update: slot=43, signature=${'1'.repeat(64)}`);
  });

  it('logs block updates with their hash', () => {
    const result = dispatcher.dispatch({
      kind: 'block',
      block: { slot: '44', blockhash: 'blockhash-test' },
    });

    expect(result).toBe('continue');
    expect(log).toHaveBeenCalledWith('Block update: slot=44, blockhash=blockhash-test');
  });

  it('logs pong identifiers', () => {
    expect(dispatcher.dispatch({ kind: 'pong', id: 12 })).toBe('continue');
    expect(log).toHaveBeenCalledWith('Received pong response with id: 12');
  });

  it('warns on unknown variants and continues', () => {
    expect(dispatcher.dispatch({ kind: 'unknown', variant: 'entry' })).toBe('continue');
    expect(warn).toHaveBeenCalledWith('Received unknown update type: entry');
  });

  it('stops on a message without an update', () => {
    expect(dispatcher.dispatch({ kind: 'none' })).toBe('stop');
    expect(error).toHaveBeenCalledWith('Update not found in the message');
  });

  it('reports stop instead of throwing when summarising fails', () => {
    const account: SubscribeUpdateAccountInfo = {
      get pubkey(): Uint8Array {
        throw new Error('boom');
      },
      lamports: '1',
    };

    expect(dispatcher.dispatch({ kind: 'account', account: { slot: '1', account } })).toBe('stop');
    expect(error).toHaveBeenCalledWith('Error handling message: boom');
  });
});
