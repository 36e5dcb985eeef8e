import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as grpc from '@grpc/grpc-js';
import { ConnectError, errorMessage } from '../common/errors';
import { AppConfig } from '../config/env.config';
import { resolveEndpoint } from './endpoint.util';
import { GeyserTransport, SubscribeRequest, SubscribeUpdate } from './geyser.types';
import {
  CredentialsFactory,
  GEYSER_CHANNEL_OPTIONS,
  createChannelCredentials,
  loadGeyserClient,
  waitForReady,
} from './grpc.util';
import { GrpcGeyserTransport } from './grpc-transport';

/** Injection token overriding how channel credentials are built. TLS by default. */
export const CHANNEL_CREDENTIALS = Symbol('CHANNEL_CREDENTIALS');

/**
 * Builds authenticated TLS channels to the configured Geyser endpoint.
 *
 * Each {@link connect} call yields a fresh transport; the caller owns it and
 * must close it. Failures are not retried here.
 */
@Injectable()
export class GeyserConnectionService {
  private readonly logger = new Logger(GeyserConnectionService.name);
  private readonly Geyser = loadGeyserClient();
  readonly endpoint: string;
  private readonly token: string;
  private readonly connectTimeoutMs: number;

  constructor(
    config: ConfigService<AppConfig, true>,
    @Optional()
    @Inject(CHANNEL_CREDENTIALS)
    private readonly credentials: CredentialsFactory = createChannelCredentials,
  ) {
    const env = config.get('geyser', { infer: true });
    this.endpoint = resolveEndpoint(env.GEYSER_ENDPOINT);
    this.token = env.GEYSER_ACCESS_TOKEN;
    this.connectTimeoutMs = env.CONNECT_TIMEOUT_MS;
  }

  /**
   * Open a channel and wait until it is ready.
   *
   * @throws {ConnectError} if the client cannot be created or the channel
   *         does not become ready within `CONNECT_TIMEOUT_MS` (DNS, TLS and
   *         credential failures all surface here), or if `signal` aborts
   *         while waiting.
   */
  async connect(signal?: AbortSignal): Promise<GeyserTransport> {
    this.logger.log(`Connecting to gRPC endpoint: ${this.endpoint}`);

    let client: grpc.Client;
    try {
      client = new this.Geyser(
        this.endpoint,
        this.credentials(this.token),
        GEYSER_CHANNEL_OPTIONS,
      );
    } catch (err) {
      throw new ConnectError(`Failed to create channel to ${this.endpoint}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    try {
      await waitForReady(client, this.connectTimeoutMs, signal);
    } catch (err) {
      client.close();
      throw new ConnectError(`Channel to ${this.endpoint} not ready: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    this.logger.log('Successfully connected to Yellowstone gRPC');
    const subscribe = this.Geyser.service['Subscribe'];
    return new GrpcGeyserTransport(
      this.endpoint,
      () =>
        client.makeBidiStreamRequest<SubscribeRequest, SubscribeUpdate>(
          subscribe.path,
          subscribe.requestSerialize,
          subscribe.responseDeserialize,
        ),
      () => client.close(),
    );
  }
}
