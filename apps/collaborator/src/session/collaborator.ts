/**
 * Collaborator session.
 *
 * Follows the leader's clock and commands. Each received tick is published
 * to three independent subscribers:
 * 1. sync tracking (drift, quality)
 * 2. cue processing while running
 * 3. deviation sampling while running, at most once per sample interval
 *
 * Cues are scheduled against the expected media position, so looping media
 * rewinds the scheduler on every pass. Control commands run one at a time
 * in arrival order.
 */

import {
  NETWORK,
  TIMING,
  CORRECTION,
  formatElapsed,
  systemClock,
  type Clock,
  type StartMessage,
  type UpdateScheduleMessage,
} from "@cuesync/shared";
import { CommandChannel, TaskSupervisor, type DatagramTransport } from "@cuesync/net";
import { SyncReceiver, type TickEvent } from "../sync/receiver.js";
import { SyncTracker, type SyncTrackerStats } from "../sync/tracker.js";
import { CueScheduler, type SchedulerProgress } from "../cues/scheduler.js";
import {
  PlaybackSyncCorrector,
  type CorrectionResult,
  type CorrectorOptions,
  type CorrectorStats,
} from "../playback/corrector.js";
import type { MediaPlayer, TriggerOutput } from "../media/player.js";

export type CollaboratorState = "ready" | "running" | "sync_lost";

export interface CollaboratorSessionOptions {
  deviceId: string;
  syncTransport: DatagramTransport;
  controlTransport: DatagramTransport;
  player: MediaPlayer;
  output: TriggerOutput;
  /** Media reference reported on registration */
  mediaRef?: string;
  syncPort?: number;
  controlPort?: number;
  broadcastAddress?: string;
  heartbeatIntervalSec?: number;
  syncTimeoutSec?: number;
  sampleIntervalSec?: number;
  loopThresholdSec?: number;
  correction?: Partial<CorrectorOptions>;
  debugMode?: boolean;
  /** Stop playback when the leader's clock goes silent */
  stopOnSyncLoss?: boolean;
  now?: Clock;
}

export interface CollaboratorSessionStatus {
  deviceId: string;
  state: CollaboratorState;
  running: boolean;
  debugMode: boolean;
  sync: SyncTrackerStats;
  cues: SchedulerProgress;
  corrections: CorrectorStats;
}

const WATCHDOG_INTERVAL_MS = 1000;
const DEBUG_STATUS_INTERVAL_MS = 1000;

export class CollaboratorSession {
  readonly deviceId: string;
  readonly receiver: SyncReceiver;
  readonly tracker: SyncTracker;
  readonly scheduler: CueScheduler;
  readonly corrector: PlaybackSyncCorrector;
  readonly commands: CommandChannel;

  private readonly player: MediaPlayer;
  private readonly mediaRef: string;
  private readonly heartbeatIntervalSec: number;
  private readonly syncTimeoutSec: number;
  private readonly sampleIntervalSec: number;
  private readonly stopOnSyncLoss: boolean;
  private readonly tasks = new TaskSupervisor("collaborator");

  private running = false;
  private debugMode: boolean;
  private syncLost = false;
  private lastSampleAt: number | null = null;
  private lastCorrection: CorrectionResult | null = null;
  private opened = false;
  private controlTail: Promise<void> = Promise.resolve();

  constructor(options: CollaboratorSessionOptions) {
    const now = options.now ?? systemClock;

    this.deviceId = options.deviceId;
    this.player = options.player;
    this.mediaRef = options.mediaRef ?? "";
    this.heartbeatIntervalSec = options.heartbeatIntervalSec ?? TIMING.HEARTBEAT_INTERVAL_SEC;
    this.syncTimeoutSec = options.syncTimeoutSec ?? TIMING.SYNC_TIMEOUT_SEC;
    this.sampleIntervalSec = options.sampleIntervalSec ?? CORRECTION.SAMPLE_INTERVAL_SEC;
    this.debugMode = options.debugMode ?? false;
    this.stopOnSyncLoss = options.stopOnSyncLoss ?? false;

    this.receiver = new SyncReceiver({
      transport: options.syncTransport,
      port: options.syncPort ?? NETWORK.SYNC_PORT,
      now,
    });
    this.tracker = new SyncTracker({ now });
    this.scheduler = new CueScheduler({
      output: options.output,
      loopThresholdSec: options.loopThresholdSec,
    });
    this.corrector = new PlaybackSyncCorrector(options.player, options.correction);
    this.commands = new CommandChannel({
      transport: options.controlTransport,
      port: options.controlPort ?? NETWORK.CONTROL_PORT,
      broadcastAddress: options.broadcastAddress ?? NETWORK.BROADCAST_ADDRESS,
      name: "command",
    });

    this.receiver.subscribe((tick) => {
      this.tracker.recordSync(tick.leaderTime, tick.receivedAt);
    });
    this.receiver.subscribe((tick) => {
      if (this.running) {
        this.scheduler.process(this.expectedPosition(tick.leaderTime));
      }
    });
    this.receiver.subscribe((tick) => {
      this.sampleDeviation(tick).catch((err: unknown) => {
        console.error("[collaborator] deviation check failed:", err);
      });
    });

    this.commands.registerHandler("start", (message) =>
      this.serialize(() => this.handleStart(message))
    );
    this.commands.registerHandler("stop", () => this.serialize(() => this.handleStop()));
    this.commands.registerHandler("update_schedule", (message) =>
      this.serialize(() => this.handleUpdateSchedule(message))
    );
  }

  /**
   * Bind both channels, register with the leader and start the heartbeat.
   * Throws ChannelBindError if either channel cannot be bound; nothing is
   * left running in that case.
   */
  async open(): Promise<void> {
    if (this.opened) {
      return;
    }

    await this.receiver.start();
    try {
      await this.commands.listen();
    } catch (err) {
      await this.receiver.stop();
      throw err;
    }
    this.opened = true;

    await this.commands.broadcast({
      type: "register",
      deviceId: this.deviceId,
      status: this.state(),
      mediaRef: this.mediaRef,
    });

    this.tasks.spawn("heartbeat", this.heartbeatIntervalSec * 1000, () => this.sendHeartbeat());
    this.tasks.spawn("sync-watchdog", WATCHDOG_INTERVAL_MS, () => this.checkSync());
    if (this.debugMode) {
      this.startDebugStatus();
    }

    console.log(`[collaborator] ${this.deviceId} ready media=${this.mediaRef || "(none)"}`);
  }

  /** Heartbeat status */
  state(): CollaboratorState {
    if (!this.running) {
      return "ready";
    }
    return this.tracker.isSynced(this.syncTimeoutSec) ? "running" : "sync_lost";
  }

  isRunning(): boolean {
    return this.running;
  }

  isDebugMode(): boolean {
    return this.debugMode;
  }

  /** Media position implied by a leader time; wraps for looping media */
  expectedPosition(leaderTime: number): number {
    const duration = this.player.getDuration();
    if (duration !== null && duration > 0) {
      return leaderTime % duration;
    }
    return leaderTime;
  }

  status(): CollaboratorSessionStatus {
    return {
      deviceId: this.deviceId,
      state: this.state(),
      running: this.running,
      debugMode: this.debugMode,
      sync: this.tracker.stats(),
      cues: this.scheduler.progress(),
      corrections: this.corrector.getStats(),
    };
  }

  /** Outcome of the most recent deviation check */
  lastCorrectionResult(): CorrectionResult | null {
    return this.lastCorrection;
  }

  async close(): Promise<void> {
    await this.serialize(async () => {
      if (this.running) {
        await this.stopPlayback();
      }
    });
    await this.tasks.stopAll();
    await this.commands.close();
    await this.receiver.stop();
    this.opened = false;
    console.log(`[collaborator] ${this.deviceId} closed`);
  }

  /**
   * Queue a control task behind the ones already running. A failure
   * rejects the returned promise only; later tasks still run.
   */
  private serialize(task: () => void | Promise<void>): Promise<void> {
    const run = this.controlTail.then(task);
    this.controlTail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async handleStart(message: StartMessage): Promise<void> {
    if (this.running) {
      console.log("[collaborator] already running, stopping first");
      await this.stopPlayback();
    }

    this.scheduler.load(message.schedule);

    if (message.debugMode && !this.debugMode) {
      this.debugMode = true;
      console.log("[collaborator] debug mode enabled by leader");
      if (this.opened) {
        this.startDebugStatus();
      }
    }

    this.corrector.reset();
    this.lastSampleAt = null;
    this.syncLost = false;

    try {
      await this.player.start?.();
    } catch (err) {
      console.error("[collaborator] media start failed:", err);
    }

    this.scheduler.start();
    this.running = true;
    console.log(`[collaborator] started cues=${message.schedule.length}`);
  }

  private async handleStop(): Promise<void> {
    if (!this.running) {
      return;
    }
    await this.stopPlayback();
    console.log("[collaborator] stopped by leader");
  }

  private handleUpdateSchedule(message: UpdateScheduleMessage): void {
    this.scheduler.load(message.schedule);
  }

  private async stopPlayback(): Promise<void> {
    this.running = false;
    this.scheduler.stop();
    this.corrector.reset();
    this.lastSampleAt = null;

    try {
      await this.player.stop?.();
    } catch (err) {
      console.error("[collaborator] media stop failed:", err);
    }
  }

  private async sampleDeviation(tick: TickEvent): Promise<void> {
    if (!this.running) {
      return;
    }
    if (this.lastSampleAt !== null && tick.receivedAt - this.lastSampleAt < this.sampleIntervalSec) {
      return;
    }

    let actual: number | null;
    try {
      actual = this.player.getPosition();
    } catch (err) {
      console.error("[collaborator] position query failed:", err);
      return;
    }
    if (actual === null) {
      return;
    }

    this.lastSampleAt = tick.receivedAt;
    const expected = this.expectedPosition(tick.leaderTime);
    this.lastCorrection = await this.corrector.checkAndCorrect(expected, actual, tick.receivedAt);
  }

  private async sendHeartbeat(): Promise<void> {
    await this.commands.broadcast({ type: "heartbeat", deviceId: this.deviceId, status: this.state() });
  }

  private async checkSync(): Promise<void> {
    if (!this.running) {
      return;
    }
    const synced = this.tracker.isSynced(this.syncTimeoutSec);
    if (!synced && !this.syncLost) {
      this.syncLost = true;
      console.warn(`[collaborator] lost sync with leader (quality=${this.tracker.syncQuality()})`);
      if (this.stopOnSyncLoss) {
        await this.serialize(async () => {
          if (this.running) {
            await this.stopPlayback();
            console.log("[collaborator] playback stopped after sync loss");
          }
        });
      }
    } else if (synced && this.syncLost) {
      this.syncLost = false;
      console.log("[collaborator] sync restored");
    }
  }

  private startDebugStatus(): void {
    this.tasks.spawn("debug-status", DEBUG_STATUS_INTERVAL_MS, () => {
      if (!this.running) {
        return;
      }
      const leaderTime = this.tracker.lastLeaderTime();
      const position = this.player.getPosition();
      const progress = this.scheduler.progress();
      console.log(
        `[debug] sync=${leaderTime === null ? "n/a" : formatElapsed(leaderTime)}` +
          ` media=${position === null ? "n/a" : position.toFixed(1) + "s"}` +
          ` cues=${progress.fired}/${progress.total}` +
          ` quality=${this.tracker.syncQuality()}`
      );
    });
  }
}
