import {
  GEYSER_CHANNEL_OPTIONS,
  createAuthMetadata,
  loadGeyserClient,
} from './grpc.util';
import { buildPingReply, buildSubscribeRequest } from '../stream/stream-session.service';
import { SubscribeRequest, SubscribeUpdate } from './geyser.types';
import { toInboundUpdate } from './update.util';

describe('createAuthMetadata', () => {
  it('carries the token as x-token', () => {
    const metadata = createAuthMetadata('test-secret');

    expect(metadata.get('x-token')).toEqual(['test-secret']);
    expect(Object.keys(metadata.getMap())).toEqual(['x-token']);
  });

  it('adds nothing without a token', () => {
    expect(createAuthMetadata('').getMap()).toEqual({});
  });
});

describe('GEYSER_CHANNEL_OPTIONS', () => {
  it('keeps idle streams alive', () => {
    expect(GEYSER_CHANNEL_OPTIONS).toMatchObject({
      'grpc.keepalive_time_ms': 30_000,
      'grpc.keepalive_timeout_ms': 10_000,
      'grpc.keepalive_permit_without_calls': 1,
      'grpc.http2.max_pings_without_data': 0,
    });
  });
});

describe('loadGeyserClient', () => {
  it('exposes Subscribe as a bidirectional stream', () => {
    const Geyser = loadGeyserClient();
    const subscribe = Geyser.service['Subscribe'];

    expect(subscribe.path).toBe('/geyser.Geyser/Subscribe');
    expect(subscribe.requestStream).toBe(true);
    expect(subscribe.responseStream).toBe(true);
  });

  it('serializes the subscription and ping replies', () => {
    const subscribe = loadGeyserClient().service['Subscribe'];

    expect(subscribe.requestSerialize(buildSubscribeRequest()).length).toBeGreaterThan(0);
    expect(subscribe.requestSerialize(buildPingReply(5)).length).toBeGreaterThan(0);
  });

  it('decodes the subscription it encodes', () => {
    const subscribe = loadGeyserClient().service['Subscribe'];

    const decoded: SubscribeRequest = subscribe.requestDeserialize(
      subscribe.requestSerialize(buildSubscribeRequest()),
    );

    expect(decoded).toMatchObject({
      commitment: 'CONFIRMED',
      slots: { client: { filter_by_commitment: true, interslot_updates: false } },
    });
  });

  it('fails for a proto without the service', () => {
    expect(() => loadGeyserClient(`${__dirname}/missing.proto`)).toThrow();
  });
});

describe('wire updates through toInboundUpdate', () => {
  const subscribe = loadGeyserClient().service['Subscribe'];

  function receive(update: object) {
    const decoded: SubscribeUpdate = subscribe.responseDeserialize(
      subscribe.responseSerialize(update),
    );
    return toInboundUpdate(decoded);
  }

  it('classifies a slot update', () => {
    expect(
      receive({ filters: ['client'], slot: { slot: '100', parent: '99', status: 'SLOT_CONFIRMED' } }),
    ).toEqual({
      kind: 'slot',
      slot: expect.objectContaining({ slot: '100', parent: '99', status: 'SLOT_CONFIRMED' }),
    });
  });

  it('answers an id-less ping with the default id', () => {
    expect(receive({ filters: ['client'], ping: {} })).toEqual({ kind: 'ping', id: 1 });
  });

  it('treats a filters-only message as carrying no update', () => {
    expect(receive({ filters: ['client'] })).toEqual({ kind: 'none' });
  });

  it('reports a case the client does not handle by name', () => {
    expect(receive({ entry: { slot: '7' } })).toEqual({ kind: 'unknown', variant: 'entry' });
  });
});
