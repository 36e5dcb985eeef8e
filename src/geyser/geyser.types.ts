/**
 * Shapes of the Geyser messages as decoded by `@grpc/proto-loader` with
 * `keepCase`, `longs: String`, `enums: String`, `defaults` and `oneofs`.
 * Only the fields the client reads are listed.
 */

export type CommitmentLevel = 'PROCESSED' | 'CONFIRMED' | 'FINALIZED';

export interface SubscribeRequestFilterSlots {
  filter_by_commitment?: boolean;
  interslot_updates?: boolean;
}

export interface SubscribeRequestPing {
  id: number;
}

/** Outbound message: either the initial subscription or a liveness reply. */
export interface SubscribeRequest {
  slots?: Record<string, SubscribeRequestFilterSlots>;
  commitment?: CommitmentLevel;
  ping?: SubscribeRequestPing;
}

export interface SubscribeUpdateSlot {
  slot: string;
  parent?: string | null;
  status: string;
  dead_error?: string | null;
}

export interface SubscribeUpdateAccountInfo {
  pubkey: Uint8Array;
  lamports: string;
  owner?: Uint8Array;
}

export interface SubscribeUpdateAccount {
  account?: SubscribeUpdateAccountInfo | null;
  slot: string;
}

export interface SubscribeUpdateTransactionInfo {
  signature: Uint8Array;
  is_vote?: boolean;
}

export interface SubscribeUpdateTransaction {
  transaction?: SubscribeUpdateTransactionInfo | null;
  slot: string;
}

export interface SubscribeUpdateBlock {
  slot: string;
  blockhash: string;
}

/** Server pings carry no identifier on the wire today; `id` is read when present. */
export interface SubscribeUpdatePing {
  id?: number;
}

export interface SubscribeUpdatePong {
  id: number;
}

/** Inbound message as decoded; `update_oneof` names the populated case, if any. */
export interface SubscribeUpdate {
  filters?: string[];
  update_oneof?: string | null;
  slot?: SubscribeUpdateSlot | null;
  account?: SubscribeUpdateAccount | null;
  transaction?: SubscribeUpdateTransaction | null;
  block?: SubscribeUpdateBlock | null;
  ping?: SubscribeUpdatePing | null;
  pong?: SubscribeUpdatePong | null;
}

/** Decoded inbound update with exactly one case active. */
export type InboundUpdate =
  | { kind: 'slot'; slot: SubscribeUpdateSlot }
  | { kind: 'account'; account: SubscribeUpdateAccount }
  | { kind: 'transaction'; transaction: SubscribeUpdateTransaction }
  | { kind: 'block'; block: SubscribeUpdateBlock }
  | { kind: 'ping'; id: number }
  | { kind: 'pong'; id: number }
  | { kind: 'unknown'; variant: string }
  | { kind: 'none' };

/**
 * The duplex half of one `Geyser.Subscribe` call. A grpc-js
 * `ClientDuplexStream` satisfies it; tests use an in-process fake.
 */
export interface SubscribeStream extends AsyncIterable<SubscribeUpdate> {
  write(request: SubscribeRequest): boolean;
  end(): void;
  cancel(): void;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

/** An open channel to one endpoint, handed from the establisher to a session. */
export interface GeyserTransport {
  readonly endpoint: string;
  subscribe(): SubscribeStream;
  close(): void;
}
