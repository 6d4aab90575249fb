/**
 * Clock broadcaster for the leader.
 *
 * While running, broadcasts the leader's elapsed session time on the clock
 * channel every tick interval. Ticks are fire-and-forget: a lost tick is
 * superseded by the next one, so nothing is retried or acknowledged.
 */

import {
  NETWORK,
  TIMING,
  clamp,
  encodeMessage,
  systemClock,
  type Clock,
  type SyncMessage,
} from "@cuesync/shared";
import { startPeriodicTask, type DatagramTransport, type TaskHandle } from "@cuesync/net";

/** Live position source (e.g. the leader's media player); null when unavailable */
export type TimeSource = () => number | null;

export interface ClockBroadcasterOptions {
  transport: DatagramTransport;
  leaderId: string;
  /** Clock channel port (default 5005) */
  port?: number;
  broadcastAddress?: string;
  /** Seconds between ticks, clamped to [0.02, 5.0] */
  tickIntervalSec?: number;
  timeSource?: TimeSource;
  now?: Clock;
}

export interface BroadcasterStats {
  ticksSent: number;
  sendFailures: number;
}

export class ClockBroadcaster {
  readonly leaderId: string;
  readonly tickIntervalSec: number;

  private readonly transport: DatagramTransport;
  private readonly port: number;
  private readonly broadcastAddress: string;
  private readonly timeSource: TimeSource | null;
  private readonly now: Clock;

  private task: TaskHandle | null = null;
  private epoch = 0;
  private ticksSent = 0;
  private sendFailures = 0;

  constructor(options: ClockBroadcasterOptions) {
    this.transport = options.transport;
    this.leaderId = options.leaderId;
    this.port = options.port ?? NETWORK.SYNC_PORT;
    this.broadcastAddress = options.broadcastAddress ?? NETWORK.BROADCAST_ADDRESS;
    this.tickIntervalSec = clamp(
      options.tickIntervalSec ?? TIMING.TICK_INTERVAL_SEC,
      TIMING.MIN_TICK_INTERVAL_SEC,
      TIMING.MAX_TICK_INTERVAL_SEC
    );
    this.timeSource = options.timeSource ?? null;
    this.now = options.now ?? systemClock;
  }

  /**
   * Start ticking against `epoch` (seconds, same clock as `now`).
   * Restarts if already running. Throws ChannelBindError when the sending
   * socket cannot be bound; the broadcaster then stays stopped.
   */
  async start(epoch: number): Promise<void> {
    if (this.task) {
      await this.stop();
    }

    await this.transport.bind(0);

    this.epoch = epoch;
    this.task = startPeriodicTask(
      "clock",
      this.tickIntervalSec * 1000,
      async () => {
        await this.tick();
      },
      { runImmediately: true }
    );

    console.log(
      `[clock] broadcasting leaderId=${this.leaderId} interval=${this.tickIntervalSec}s port=${this.port}`
    );
  }

  /** Stop ticking and release the socket */
  async stop(): Promise<void> {
    const task = this.task;
    if (!task) {
      return;
    }
    this.task = null;
    await task.stop();
    await this.transport.close();
    console.log(`[clock] stopped after ${this.ticksSent} ticks`);
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  /** Current session time: the live source when it has a value, else now - epoch */
  elapsed(): number {
    const live = this.readTimeSource();
    if (live !== null) {
      return Math.max(0, live);
    }
    return Math.max(0, this.now() - this.epoch);
  }

  /**
   * Send one tick. Returns false when the send failed; failures never
   * stop the loop.
   */
  async tick(): Promise<boolean> {
    const message: SyncMessage = {
      type: "sync",
      time: this.elapsed(),
      leaderId: this.leaderId,
      sentAt: this.now(),
    };

    try {
      await this.transport.send(encodeMessage(message), this.port, this.broadcastAddress);
      this.ticksSent++;
      return true;
    } catch (err) {
      this.sendFailures++;
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[clock] tick send failed: ${reason}`);
      return false;
    }
  }

  getStats(): BroadcasterStats {
    return { ticksSent: this.ticksSent, sendFailures: this.sendFailures };
  }

  private readTimeSource(): number | null {
    if (!this.timeSource) {
      return null;
    }
    try {
      const value = this.timeSource();
      return value !== null && Number.isFinite(value) ? value : null;
    } catch (err) {
      console.warn("[clock] time source failed, using wall clock:", err);
      return null;
    }
  }
}
