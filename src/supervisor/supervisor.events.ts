export const GEYSER_CONNECTED = 'geyser.connected';
export const GEYSER_DISCONNECTED = 'geyser.disconnected';
export const GEYSER_STOPPED = 'geyser.stopped';

export interface GeyserConnectedEvent {
  endpoint: string;
}

export interface GeyserDisconnectedEvent {
  reason: string;
  /** 1-based count of failures so far in this run. */
  attempt: number;
  delayMs: number;
}
