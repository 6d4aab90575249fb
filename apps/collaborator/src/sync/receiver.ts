/**
 * Clock-channel receiver.
 *
 * Decodes sync ticks and publishes one TickEvent per tick to independently
 * registered subscribers.
 */

import { NETWORK, decodeSyncMessage, systemClock, type Clock } from "@cuesync/shared";
import type { Datagram, DatagramTransport } from "@cuesync/net";

export interface TickEvent {
  /** Leader session time carried by the tick */
  leaderTime: number;
  /** Local clock when the tick arrived */
  receivedAt: number;
  leaderId: string;
  /** Leader wall clock at send time, when the leader supplied it */
  sentAt: number | null;
}

export type TickListener = (tick: TickEvent) => void;

export interface SyncReceiverOptions {
  transport: DatagramTransport;
  port?: number;
  now?: Clock;
}

export class SyncReceiver {
  private readonly transport: DatagramTransport;
  private readonly port: number;
  private readonly now: Clock;

  private listeners: Set<TickListener> = new Set();
  private detach: (() => void) | null = null;
  private received = 0;
  private dropped = 0;

  constructor(options: SyncReceiverOptions) {
    this.transport = options.transport;
    this.port = options.port ?? NETWORK.SYNC_PORT;
    this.now = options.now ?? systemClock;
  }

  /**
   * Bind the clock channel. Throws ChannelBindError on failure.
   */
  async start(): Promise<void> {
    if (this.detach) {
      return;
    }
    await this.transport.bind(this.port);
    this.detach = this.transport.onMessage((datagram) => this.handleDatagram(datagram));
    console.log(`[sync] listening port=${this.port}`);
  }

  async stop(): Promise<void> {
    if (this.detach) {
      this.detach();
      this.detach = null;
    }
    await this.transport.close();
  }

  isListening(): boolean {
    return this.detach !== null;
  }

  /**
   * Subscribe to ticks.
   * @returns Unsubscribe function
   */
  subscribe(listener: TickListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Deliver a tick to every subscriber; a throwing subscriber does not stop the rest */
  publish(tick: TickEvent): void {
    this.received++;
    for (const listener of this.listeners) {
      try {
        listener(tick);
      } catch (err) {
        console.error("[sync] tick subscriber failed:", err);
      }
    }
  }

  getStats(): { received: number; dropped: number } {
    return { received: this.received, dropped: this.dropped };
  }

  private handleDatagram(datagram: Datagram): void {
    const decoded = decodeSyncMessage(datagram.data);
    if (!decoded.success) {
      this.dropped++;
      console.debug(`[sync] dropped datagram from ${datagram.address}: ${decoded.error}`);
      return;
    }

    this.publish({
      leaderTime: decoded.data.time,
      receivedAt: this.now(),
      leaderId: decoded.data.leaderId,
      sentAt: decoded.data.sentAt ?? null,
    });
  }
}
