/**
 * Leader session: owns the session clock, the cue schedule, the clock
 * broadcaster and the collaborator registry, and speaks the control channel.
 */

import {
  NETWORK,
  SessionClock,
  TIMING,
  formatElapsed,
  sortCues,
  systemClock,
  type Clock,
  type Cue,
  type HeartbeatMessage,
  type LeaderStatus,
  type RegisterMessage,
  type StartMessage,
} from "@cuesync/shared";
import {
  CommandChannel,
  TaskSupervisor,
  type DatagramTransport,
  type SenderInfo,
} from "@cuesync/net";
import { ClockBroadcaster, type TimeSource } from "../clock/broadcaster.js";
import { CollaboratorRegistry } from "../registry/collaborators.js";

export interface LeaderSessionOptions {
  leaderId: string;
  /** Transport for outgoing sync ticks */
  clockTransport: DatagramTransport;
  /** Transport for the control channel */
  controlTransport: DatagramTransport;
  syncPort?: number;
  controlPort?: number;
  broadcastAddress?: string;
  tickIntervalSec?: number;
  livenessTimeoutSec?: number;
  /** Forwarded to collaborators in the start command */
  debugMode?: boolean;
  timeSource?: TimeSource;
  now?: Clock;
}

export class LeaderSession {
  readonly leaderId: string;
  readonly registry: CollaboratorRegistry;
  readonly broadcaster: ClockBroadcaster;
  readonly commands: CommandChannel;

  private readonly clock: SessionClock;
  private readonly tasks = new TaskSupervisor("leader");
  private readonly debugMode: boolean;

  private schedule: Cue[] = [];
  /** Start command of the running session, replayed to late joiners */
  private startCommand: StartMessage | null = null;
  private opened = false;

  constructor(options: LeaderSessionOptions) {
    const now = options.now ?? systemClock;

    this.leaderId = options.leaderId;
    this.debugMode = options.debugMode ?? false;
    this.clock = new SessionClock(now);
    this.registry = new CollaboratorRegistry({
      livenessTimeoutSec: options.livenessTimeoutSec ?? TIMING.LIVENESS_TIMEOUT_SEC,
      now,
    });
    this.broadcaster = new ClockBroadcaster({
      transport: options.clockTransport,
      leaderId: options.leaderId,
      port: options.syncPort ?? NETWORK.SYNC_PORT,
      broadcastAddress: options.broadcastAddress ?? NETWORK.BROADCAST_ADDRESS,
      tickIntervalSec: options.tickIntervalSec,
      timeSource: options.timeSource,
      now,
    });
    this.commands = new CommandChannel({
      transport: options.controlTransport,
      port: options.controlPort ?? NETWORK.CONTROL_PORT,
      broadcastAddress: options.broadcastAddress ?? NETWORK.BROADCAST_ADDRESS,
      resolveAddress: (id) => this.registry.addressOf(id),
      name: "command",
    });

    this.commands.registerHandler("register", (message, sender) =>
      this.handleRegister(message, sender)
    );
    this.commands.registerHandler("heartbeat", (message) => this.handleHeartbeat(message));
  }

  /**
   * Listen on the control channel and start registry eviction.
   * Throws ChannelBindError if the control port cannot be bound.
   */
  async open(): Promise<void> {
    if (this.opened) {
      return;
    }
    await this.commands.listen();
    this.tasks.spawn("evict-stale", this.registry.livenessTimeoutSec * 1000, () => {
      this.registry.evictStale();
    });
    this.opened = true;
    console.log(`[leader] ${this.leaderId} ready`);
  }

  /**
   * Start a session with the given schedule (defaults to the loaded one).
   * A running session is stopped first.
   */
  async startSession(cues: readonly Cue[] = this.schedule): Promise<StartMessage> {
    if (this.clock.isRunning) {
      await this.stopSession();
    }

    this.schedule = sortCues(cues);
    const epoch = this.clock.start();

    try {
      await this.broadcaster.start(epoch);
    } catch (err) {
      this.clock.stop();
      throw err;
    }

    const command: StartMessage = {
      type: "start",
      schedule: this.schedule,
      startTime: epoch,
      debugMode: this.debugMode,
    };
    this.startCommand = command;
    await this.commands.broadcast(command);

    console.log(
      `[leader] session started cues=${this.schedule.length} collaborators=${this.registry.count()}`
    );
    return command;
  }

  /** Stop the running session; a no-op when idle */
  async stopSession(): Promise<void> {
    if (!this.clock.isRunning) {
      return;
    }

    await this.broadcaster.stop();
    const elapsed = this.clock.update();
    this.clock.stop();
    this.startCommand = null;
    await this.commands.broadcast({ type: "stop" });

    console.log(`[leader] session stopped after ${formatElapsed(elapsed)}`);
  }

  /** Replace the schedule and push it to collaborators */
  async updateSchedule(cues: readonly Cue[]): Promise<boolean> {
    this.schedule = sortCues(cues);
    if (this.startCommand) {
      this.startCommand = { ...this.startCommand, schedule: this.schedule };
    }
    const sent = await this.commands.broadcast({ type: "update_schedule", schedule: this.schedule });
    console.log(`[leader] schedule updated cues=${this.schedule.length}`);
    return sent;
  }

  /** Set the schedule used by the next `startSession()` without broadcasting */
  loadSchedule(cues: readonly Cue[]): void {
    this.schedule = sortCues(cues);
  }

  getSchedule(): Cue[] {
    return [...this.schedule];
  }

  isRunning(): boolean {
    return this.clock.isRunning;
  }

  status(): LeaderStatus {
    this.clock.update();
    return {
      leaderId: this.leaderId,
      session: this.clock.snapshot(),
      stats: this.clock.getStats(),
      cueCount: this.schedule.length,
      collaborators: this.registry.snapshot(),
      onlineCount: this.registry.onlineCount(),
    };
  }

  /** Stop the session and every background task, then release the sockets */
  async close(): Promise<void> {
    await this.stopSession();
    await this.tasks.stopAll();
    await this.commands.close();
    this.opened = false;
    console.log(`[leader] ${this.leaderId} closed`);
  }

  private async handleRegister(message: RegisterMessage, sender: SenderInfo): Promise<void> {
    this.registry.register(message.deviceId, sender.address, message.status, message.mediaRef);

    // Late joiner: hand it the running session directly
    if (this.startCommand) {
      await this.commands.sendTo(message.deviceId, this.startCommand);
    }
  }

  private handleHeartbeat(message: HeartbeatMessage): void {
    if (!this.registry.heartbeat(message.deviceId, message.status)) {
      console.debug(`[leader] heartbeat from unregistered id=${message.deviceId}`);
    }
  }
}
