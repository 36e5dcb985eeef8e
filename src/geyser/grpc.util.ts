import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import * as path from 'path';

export const PROTO_PATH = path.join(__dirname, '../../proto/geyser.proto');

/**
 * Channel options applied to every connection. Keepalive pings go out on
 * an idle stream every 30 s, are allowed with no active call, and are not
 * capped when no data flows, so the transport's own idle detection never
 * closes a quiet subscription.
 */
export const GEYSER_CHANNEL_OPTIONS = {
  'grpc.keepalive_time_ms': 30_000,
  'grpc.keepalive_timeout_ms': 10_000,
  'grpc.keepalive_permit_without_calls': 1,
  'grpc.http2.max_pings_without_data': 0,
  'grpc.max_receive_message_length': 64 * 1024 * 1024,
} satisfies grpc.ChannelOptions;

/** Builds the channel credentials for an access token. */
export type CredentialsFactory = (token: string) => grpc.ChannelCredentials;

/** Metadata carried by every call: `x-token` when a token is set, nothing otherwise. */
export function createAuthMetadata(token: string): grpc.Metadata {
  const metadata = new grpc.Metadata();
  if (token) {
    metadata.add('x-token', token);
  }
  return metadata;
}

/**
 * TLS credentials, composed with a call-credential layer that attaches the
 * access token when one is configured.
 */
export function createChannelCredentials(token: string): grpc.ChannelCredentials {
  const ssl = grpc.credentials.createSsl();
  if (!token) return ssl;

  const callCredentials = grpc.credentials.createFromMetadataGenerator((_params, callback) => {
    callback(null, createAuthMetadata(token));
  });
  return grpc.credentials.combineChannelCredentials(ssl, callCredentials);
}

/** Load `geyser.Geyser` from the bundled proto and return its client constructor. */
export function loadGeyserClient(protoPath = PROTO_PATH): grpc.ServiceClientConstructor {
  const packageDefinition = protoLoader.loadSync(protoPath, {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
  });
  const descriptor = grpc.loadPackageDefinition(packageDefinition);

  const pkg = descriptor['geyser'];
  if (pkg && typeof pkg === 'object' && 'Geyser' in pkg) {
    const service = pkg.Geyser;
    if (isServiceClientConstructor(service)) return service;
  }
  throw new Error(`geyser.Geyser service not found in ${protoPath}`);
}

function isServiceClientConstructor(value: unknown): value is grpc.ServiceClientConstructor {
  return typeof value === 'function' && 'service' in value;
}

/**
 * Promisified `Client#waitForReady` with a relative timeout. Rejects at once
 * when `signal` aborts; the caller still owns the client and must close it.
 */
export function waitForReady(
  client: grpc.Client,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) return reject(new Error('connect aborted'));

    const onAbort = () => reject(new Error('connect aborted'));
    signal?.addEventListener('abort', onAbort, { once: true });
    client.waitForReady(Date.now() + timeoutMs, (error) => {
      signal?.removeEventListener('abort', onAbort);
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}
