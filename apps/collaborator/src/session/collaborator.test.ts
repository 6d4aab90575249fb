/**
 * Tests for the collaborator session over an in-process network.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { createNoteOnCue, encodeMessage, type Cue, type StartMessage } from "@cuesync/shared";
import {
  ChannelBindError,
  CommandChannel,
  MemoryNetwork,
  type CommandHandler,
  type MemoryTransport,
} from "@cuesync/net";
import type { MediaPlayer, TriggerOutput } from "../media/player.js";
import { CollaboratorSession, type CollaboratorSessionOptions } from "./collaborator.js";

const SYNC_PORT = 5005;
const CONTROL_PORT = 5006;
const BROADCAST = "255.255.255.255";

class FakePlayer implements MediaPlayer {
  position: number | null = null;
  duration: number | null = null;
  seeks: number[] = [];
  starts = 0;
  stops = 0;
  /** Held open to simulate media that is slow to start */
  startGate: Promise<void> | null = null;

  getPosition(): number | null {
    return this.position;
  }

  getDuration(): number | null {
    return this.duration;
  }

  setPosition(seconds: number): boolean {
    this.seeks.push(seconds);
    this.position = seconds;
    return true;
  }

  start(): Promise<void> | undefined {
    this.starts++;
    return this.startGate ?? undefined;
  }

  stop(): void {
    this.stops++;
  }
}

describe("CollaboratorSession", () => {
  let network: MemoryNetwork;
  let now: number;
  let player: FakePlayer;
  let fired: Cue[];
  let output: TriggerOutput;
  let leaderClock: MemoryTransport;
  let leaderCommands: CommandChannel;
  let onRegister: Mock<Parameters<CommandHandler<"register">>, void>;
  let onHeartbeat: Mock<Parameters<CommandHandler<"heartbeat">>, void>;
  let session: CollaboratorSession;

  const flush = () => vi.advanceTimersByTimeAsync(0);

  async function tick(time: number): Promise<void> {
    await leaderClock.send(encodeMessage({ type: "sync", time, leaderId: "leader-test" }), SYNC_PORT, BROADCAST);
  }

  async function sendStart(schedule: Cue[], debugMode = false): Promise<void> {
    await leaderCommands.broadcast({ type: "start", schedule, startTime: 1000, debugMode });
    await flush();
  }

  function createSession(overrides: Partial<CollaboratorSessionOptions> = {}): CollaboratorSession {
    return new CollaboratorSession({
      deviceId: "pi-1",
      syncTransport: network.createTransport("10.0.0.2"),
      controlTransport: network.createTransport("10.0.0.2"),
      player,
      output,
      mediaRef: "show.mp4",
      now: () => now,
      ...overrides,
    });
  }

  beforeEach(async () => {
    vi.useFakeTimers();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "debug").mockImplementation(() => {});

    network = new MemoryNetwork();
    now = 1000;
    player = new FakePlayer();
    fired = [];
    output = { send: (cue) => void fired.push(cue) };

    leaderClock = network.createTransport("10.0.0.1");
    await leaderClock.bind(0);

    leaderCommands = new CommandChannel({
      transport: network.createTransport("10.0.0.1"),
      port: CONTROL_PORT,
      broadcastAddress: BROADCAST,
      name: "leader-command",
    });
    onRegister = vi.fn();
    onHeartbeat = vi.fn();
    leaderCommands.registerHandler("register", onRegister);
    leaderCommands.registerHandler("heartbeat", onHeartbeat);
    await leaderCommands.listen();

    session = createSession();
  });

  afterEach(async () => {
    await session.close();
    await leaderCommands.close();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe("open", () => {
    it("registers with the leader", async () => {
      await session.open();

      expect(onRegister).toHaveBeenCalledWith(
        { type: "register", deviceId: "pi-1", status: "ready", mediaRef: "show.mp4" },
        { address: "10.0.0.2", port: CONTROL_PORT }
      );
    });

    it("sends a heartbeat every two seconds", async () => {
      await session.open();
      await vi.advanceTimersByTimeAsync(4000);

      expect(onHeartbeat).toHaveBeenCalledTimes(2);
      expect(onHeartbeat.mock.calls[0]?.[0]).toEqual({ type: "heartbeat", deviceId: "pi-1", status: "ready" });
    });

    it("fails without leaving the clock channel bound", async () => {
      network.refuse(CONTROL_PORT);
      const blocked = createSession();

      await expect(blocked.open()).rejects.toBeInstanceOf(ChannelBindError);
      expect(blocked.receiver.isListening()).toBe(false);
    });
  });

  describe("commands", () => {
    it("starts playback and the scheduler on start", async () => {
      await session.open();
      await sendStart([createNoteOnCue(1, 1, 60, 127)]);

      expect(session.isRunning()).toBe(true);
      expect(session.scheduler.isRunning()).toBe(true);
      expect(session.scheduler.progress().total).toBe(1);
      expect(player.starts).toBe(1);
    });

    it("stops on stop", async () => {
      await session.open();
      await sendStart([createNoteOnCue(5, 1, 60, 127)]);

      await leaderCommands.broadcast({ type: "stop" });
      await flush();
      await tick(10);

      expect(session.isRunning()).toBe(false);
      expect(player.stops).toBe(1);
      expect(fired).toEqual([]);
    });

    it("stops first when started again", async () => {
      const cue = createNoteOnCue(1, 1, 60, 127);
      await session.open();
      await sendStart([cue]);
      await tick(2);

      await sendStart([cue]);
      await tick(2);

      expect(player.stops).toBe(1);
      expect(player.starts).toBe(2);
      expect(fired).toEqual([cue, cue]);
    });

    it("stays stopped when stop arrives while media is still starting", async () => {
      let releaseStart: () => void = () => {};
      player.startGate = new Promise<void>((resolve) => {
        releaseStart = resolve;
      });
      await session.open();

      await leaderCommands.broadcast({
        type: "start",
        schedule: [createNoteOnCue(1, 1, 60, 127)],
        startTime: 1000,
        debugMode: false,
      });
      await leaderCommands.broadcast({ type: "stop" });
      releaseStart();
      await flush();
      await tick(2);

      expect(session.isRunning()).toBe(false);
      expect(player.starts).toBe(1);
      expect(player.stops).toBe(1);
      expect(fired).toEqual([]);
    });

    it("handles a duplicated start one copy at a time", async () => {
      let releaseStart: () => void = () => {};
      player.startGate = new Promise<void>((resolve) => {
        releaseStart = resolve;
      });
      await session.open();

      const start: StartMessage = { type: "start", schedule: [], startTime: 1000, debugMode: false };
      await leaderCommands.broadcast(start);
      await leaderCommands.broadcast(start);
      releaseStart();
      await flush();

      expect(session.isRunning()).toBe(true);
      expect(player.starts).toBe(2);
      expect(player.stops).toBe(1);
    });

    it("reloads the schedule on update_schedule", async () => {
      await session.open();
      await sendStart([createNoteOnCue(1, 1, 60, 127)]);

      await leaderCommands.broadcast({
        type: "update_schedule",
        schedule: [createNoteOnCue(4, 1, 61, 127), createNoteOnCue(3, 1, 62, 127)],
      });
      await flush();

      expect(session.scheduler.progress()).toEqual({ fired: 0, total: 2, loops: 0, nextCueTime: 3 });
    });

    it("turns on debug mode when the leader asks for it", async () => {
      await session.open();
      expect(session.isDebugMode()).toBe(false);

      await sendStart([], true);

      expect(session.isDebugMode()).toBe(true);
    });
  });

  describe("tick pipeline", () => {
    it("fires a cue at 1.5s exactly once, on the tick carrying 2.0", async () => {
      const cue = createNoteOnCue(1.5, 1, 60, 127);
      await session.open();
      await sendStart([cue]);

      await tick(0);
      expect(fired).toEqual([]);

      now = 1001;
      await tick(1);
      expect(fired).toEqual([]);

      now = 1002;
      await tick(2);
      expect(fired).toEqual([cue]);

      now = 1003;
      await tick(3);
      expect(fired).toEqual([cue]);
    });

    it("fires cues once per pass on looping media", async () => {
      player.duration = 10;
      const cue = createNoteOnCue(2, 1, 60, 127);
      await session.open();
      await sendStart([cue]);

      for (let t = 0; t <= 25; t++) {
        now = 1000 + t;
        await tick(t);
      }

      expect(fired).toEqual([cue, cue, cue]);
      expect(session.scheduler.progress().loops).toBe(2);
    });

    it("corrects once for five +0.6s deviations and not again a second later", async () => {
      await session.open();
      await sendStart([]);

      for (let i = 0; i < 6; i++) {
        const leaderTime = 10 + i;
        now = 1000 + i;
        player.position = leaderTime + 0.6;
        await tick(leaderTime);
        await flush();
      }

      expect(player.seeks).toEqual([14]);
      expect(session.corrector.getStats().corrections).toBe(1);
      expect(session.lastCorrectionResult()?.reason).toBe("insufficient_samples");
    });

    it("samples deviation at most once per sample interval", async () => {
      await session.open();
      await sendStart([]);

      for (let i = 0; i <= 10; i++) {
        now = 1000 + i * 0.1;
        player.position = i * 0.1;
        await tick(i * 0.1);
        await flush();
      }

      expect(session.corrector.getStats().samples).toBe(2);
    });

    it("skips sampling while the player has no position", async () => {
      await session.open();
      await sendStart([]);
      player.position = null;

      await tick(1);
      await flush();

      expect(session.corrector.getStats().samples).toBe(0);
      expect(session.lastCorrectionResult()).toBeNull();
    });

    it("tracks sync before a session starts without firing cues", async () => {
      await session.open();

      await tick(0);
      now = 1001;
      await tick(1);

      expect(session.tracker.stats().samples).toBe(2);
      expect(session.scheduler.progress().fired).toBe(0);
    });

    it("wraps the expected position for looping media", () => {
      player.duration = 60;
      expect(session.expectedPosition(130)).toBe(10);

      player.duration = null;
      expect(session.expectedPosition(130)).toBe(130);
    });
  });

  describe("state", () => {
    it("is ready, then running, then sync_lost when ticks stop", async () => {
      await session.open();
      expect(session.state()).toBe("ready");

      await tick(0);
      await sendStart([]);
      expect(session.state()).toBe("running");

      now = 1006;
      await vi.advanceTimersByTimeAsync(2000);

      expect(session.state()).toBe("sync_lost");
      expect(onHeartbeat.mock.calls.at(-1)?.[0]).toEqual({
        type: "heartbeat",
        deviceId: "pi-1",
        status: "sync_lost",
      });
      expect(console.warn).toHaveBeenCalledWith("[collaborator] lost sync with leader (quality=degraded)");
    });

    it("keeps playing through sync loss by default", async () => {
      await session.open();
      await tick(0);
      await sendStart([]);

      now = 1006;
      await vi.advanceTimersByTimeAsync(1000);

      expect(session.isRunning()).toBe(true);
      expect(player.stops).toBe(0);
    });

    it("stops playback after sync loss when configured", async () => {
      session = createSession({ stopOnSyncLoss: true });
      await session.open();
      await tick(0);
      await sendStart([]);

      now = 1006;
      await vi.advanceTimersByTimeAsync(1000);
      await flush();

      expect(session.isRunning()).toBe(false);
      expect(session.state()).toBe("ready");
      expect(player.stops).toBe(1);
      expect(console.log).toHaveBeenCalledWith("[collaborator] playback stopped after sync loss");
    });

    it("reports status", async () => {
      await session.open();
      await sendStart([createNoteOnCue(1, 1, 60, 127), createNoteOnCue(9, 1, 61, 127)]);
      await tick(2);

      const status = session.status();

      expect(status.deviceId).toBe("pi-1");
      expect(status.state).toBe("running");
      expect(status.cues).toEqual({ fired: 1, total: 2, loops: 0, nextCueTime: 9 });
      expect(status.sync.samples).toBe(1);
      expect(status.corrections.corrections).toBe(0);
    });
  });
});
