import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { encodeMessage } from "@cuesync/shared";
import { ChannelBindError, MemoryNetwork, type MemoryTransport } from "@cuesync/net";
import { SyncReceiver, type TickEvent } from "./receiver.js";

const SYNC_PORT = 5005;
const BROADCAST = "255.255.255.255";

describe("SyncReceiver", () => {
  let network: MemoryNetwork;
  let leader: MemoryTransport;
  let receiver: SyncReceiver;
  let now: number;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "debug").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});

    network = new MemoryNetwork();
    leader = network.createTransport("10.0.0.1");
    await leader.bind(0);
    now = 500;
    receiver = new SyncReceiver({
      transport: network.createTransport("10.0.0.2"),
      port: SYNC_PORT,
      now: () => now,
    });
  });

  afterEach(async () => {
    await receiver.stop();
    vi.restoreAllMocks();
  });

  it("publishes decoded ticks to every subscriber", async () => {
    await receiver.start();
    const first: TickEvent[] = [];
    const second: TickEvent[] = [];
    receiver.subscribe((tick) => first.push(tick));
    receiver.subscribe((tick) => second.push(tick));

    await leader.send(
      encodeMessage({ type: "sync", time: 12.5, leaderId: "leader-test", sentAt: 900 }),
      SYNC_PORT,
      BROADCAST
    );
    now = 501;
    await leader.send(encodeMessage({ type: "sync", time: 13.5, leaderId: "leader-test" }), SYNC_PORT, BROADCAST);

    const expected: TickEvent[] = [
      { leaderTime: 12.5, receivedAt: 500, leaderId: "leader-test", sentAt: 900 },
      { leaderTime: 13.5, receivedAt: 501, leaderId: "leader-test", sentAt: null },
    ];
    expect(first).toEqual(expected);
    expect(second).toEqual(expected);
    expect(receiver.getStats()).toEqual({ received: 2, dropped: 0 });
  });

  it("drops malformed datagrams", async () => {
    await receiver.start();
    const listener = vi.fn();
    receiver.subscribe(listener);

    await leader.send(Buffer.from("not json"), SYNC_PORT, BROADCAST);
    await leader.send(encodeMessage({ type: "stop" }), SYNC_PORT, BROADCAST);
    await leader.send(Buffer.from(JSON.stringify({ type: "sync", time: -1, leaderId: "x" })), SYNC_PORT, BROADCAST);

    expect(listener).not.toHaveBeenCalled();
    expect(receiver.getStats()).toEqual({ received: 0, dropped: 3 });
    expect(console.debug).toHaveBeenCalledTimes(3);
  });

  it("keeps delivering when a subscriber throws", async () => {
    await receiver.start();
    const after = vi.fn();
    receiver.subscribe(() => {
      throw new Error("subscriber exploded");
    });
    receiver.subscribe(after);

    await leader.send(encodeMessage({ type: "sync", time: 1, leaderId: "leader-test" }), SYNC_PORT, BROADCAST);

    expect(after).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it("stops delivering to unsubscribed listeners", async () => {
    await receiver.start();
    const listener = vi.fn();
    const unsubscribe = receiver.subscribe(listener);
    unsubscribe();

    await leader.send(encodeMessage({ type: "sync", time: 1, leaderId: "leader-test" }), SYNC_PORT, BROADCAST);

    expect(listener).not.toHaveBeenCalled();
  });

  it("stops listening on stop", async () => {
    await receiver.start();
    const listener = vi.fn();
    receiver.subscribe(listener);
    await receiver.stop();

    await leader.send(encodeMessage({ type: "sync", time: 1, leaderId: "leader-test" }), SYNC_PORT, BROADCAST);

    expect(listener).not.toHaveBeenCalled();
    expect(receiver.isListening()).toBe(false);
  });

  it("fails to start when the clock port is taken", async () => {
    network.refuse(SYNC_PORT);

    await expect(receiver.start()).rejects.toBeInstanceOf(ChannelBindError);
    expect(receiver.isListening()).toBe(false);
  });
});
