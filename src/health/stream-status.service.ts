import { Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  GEYSER_CONNECTED,
  GEYSER_DISCONNECTED,
  GEYSER_STOPPED,
  GeyserConnectedEvent,
  GeyserDisconnectedEvent,
} from '../supervisor/supervisor.events';

export interface StreamStatus {
  upstreamConnected: boolean;
  endpoint: string | null;
  connects: number;
  reconnectAttempts: number;
  lastError: string | null;
  stopped: boolean;
}

/** Tracks supervisor lifecycle events for the health endpoint. */
@Injectable()
export class StreamStatusService {
  private connected = false;
  private endpoint: string | null = null;
  private connects = 0;
  private reconnectAttempts = 0;
  private lastError: string | null = null;
  private stopped = false;

  @OnEvent(GEYSER_CONNECTED)
  handleConnected(event: GeyserConnectedEvent) {
    this.connected = true;
    this.endpoint = event.endpoint;
    this.connects++;
  }

  @OnEvent(GEYSER_DISCONNECTED)
  handleDisconnected(event: GeyserDisconnectedEvent) {
    this.connected = false;
    this.reconnectAttempts = event.attempt;
    this.lastError = event.reason;
  }

  @OnEvent(GEYSER_STOPPED)
  handleStopped() {
    this.connected = false;
    this.stopped = true;
  }

  get snapshot(): StreamStatus {
    return {
      upstreamConnected: this.connected,
      endpoint: this.endpoint,
      connects: this.connects,
      reconnectAttempts: this.reconnectAttempts,
      lastError: this.lastError,
      stopped: this.stopped,
    };
  }
}
