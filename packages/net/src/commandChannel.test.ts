/**
 * Tests for control-channel dispatch.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { CommandChannel } from "./commandChannel.js";
import { MemoryNetwork } from "./memory.js";
import { ChannelBindError } from "./errors.js";

const CONTROL_PORT = 5006;
const BROADCAST = "255.255.255.255";

function createChannel(
  network: MemoryNetwork,
  address: string,
  resolveAddress?: (id: string) => string | undefined
): CommandChannel {
  return new CommandChannel({
    transport: network.createTransport(address),
    port: CONTROL_PORT,
    broadcastAddress: BROADCAST,
    resolveAddress,
    name: `command:${address}`,
  });
}

describe("CommandChannel", () => {
  let network: MemoryNetwork;

  beforeEach(() => {
    network = new MemoryNetwork();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "debug").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("dispatch", () => {
    it("routes messages to the handler registered for their type", async () => {
      const leader = createChannel(network, "10.0.0.1");
      const collaborator = createChannel(network, "10.0.0.2");
      await leader.listen();
      await collaborator.listen();

      const onRegister = vi.fn();
      const onHeartbeat = vi.fn();
      leader.registerHandler("register", onRegister);
      leader.registerHandler("heartbeat", onHeartbeat);

      await collaborator.broadcast({
        type: "register",
        deviceId: "pi-1",
        status: "ready",
        mediaRef: "show.mp4",
      });

      expect(onRegister).toHaveBeenCalledTimes(1);
      expect(onRegister).toHaveBeenCalledWith(
        { type: "register", deviceId: "pi-1", status: "ready", mediaRef: "show.mp4" },
        { address: "10.0.0.2", port: CONTROL_PORT }
      );
      expect(onHeartbeat).not.toHaveBeenCalled();
    });

    it("ignores message types without a handler", async () => {
      const leader = createChannel(network, "10.0.0.1");
      const collaborator = createChannel(network, "10.0.0.2");
      await leader.listen();
      await collaborator.listen();

      const onStop = vi.fn();
      collaborator.registerHandler("stop", onStop);

      // The leader hears its own broadcast but has no start handler
      await expect(
        leader.broadcast({ type: "start", schedule: [], startTime: 0, debugMode: false })
      ).resolves.toBe(true);
      expect(onStop).not.toHaveBeenCalled();
    });

    it("drops malformed datagrams without invoking handlers", async () => {
      const leader = createChannel(network, "10.0.0.1");
      await leader.listen();
      const onRegister = vi.fn();
      leader.registerHandler("register", onRegister);

      const raw = network.createTransport("10.0.0.9");
      await raw.bind(0);
      await raw.send(Buffer.from("{oops"), CONTROL_PORT, BROADCAST);
      await raw.send(Buffer.from(JSON.stringify({ type: "register" })), CONTROL_PORT, BROADCAST);
      await raw.send(Buffer.from(JSON.stringify({ type: "reboot" })), CONTROL_PORT, BROADCAST);

      expect(onRegister).not.toHaveBeenCalled();
      expect(console.debug).toHaveBeenCalledTimes(3);
    });

    it("keeps dispatching after a handler throws", async () => {
      const collaborator = createChannel(network, "10.0.0.2");
      const leader = createChannel(network, "10.0.0.1");
      await collaborator.listen();
      await leader.listen();

      const onStop = vi.fn(() => {
        throw new Error("handler exploded");
      });
      collaborator.registerHandler("stop", onStop);

      await leader.broadcast({ type: "stop" });
      await leader.broadcast({ type: "stop" });

      expect(onStop).toHaveBeenCalledTimes(2);
      expect(console.error).toHaveBeenCalled();
    });

    it("replaces a previously registered handler", async () => {
      const collaborator = createChannel(network, "10.0.0.2");
      await collaborator.listen();
      const first = vi.fn();
      const second = vi.fn();
      collaborator.registerHandler("stop", first);
      collaborator.registerHandler("stop", second);

      await collaborator.broadcast({ type: "stop" });

      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledTimes(1);
    });
  });

  describe("sendTo", () => {
    it("sends to the resolved address only", async () => {
      const leader = createChannel(network, "10.0.0.1", (id) =>
        id === "pi-2" ? "10.0.0.3" : undefined
      );
      const a = createChannel(network, "10.0.0.2");
      const b = createChannel(network, "10.0.0.3");
      await Promise.all([leader.listen(), a.listen(), b.listen()]);

      const onStopA = vi.fn();
      const onStopB = vi.fn();
      a.registerHandler("stop", onStopA);
      b.registerHandler("stop", onStopB);

      await leader.sendTo("pi-2", { type: "stop" });

      expect(onStopA).not.toHaveBeenCalled();
      expect(onStopB).toHaveBeenCalledTimes(1);
    });

    it("falls back to broadcast for unknown ids", async () => {
      const leader = createChannel(network, "10.0.0.1");
      const a = createChannel(network, "10.0.0.2");
      const b = createChannel(network, "10.0.0.3");
      await Promise.all([leader.listen(), a.listen(), b.listen()]);

      const onStopA = vi.fn();
      const onStopB = vi.fn();
      a.registerHandler("stop", onStopA);
      b.registerHandler("stop", onStopB);

      await leader.sendTo("pi-unknown", { type: "stop" });

      expect(onStopA).toHaveBeenCalledTimes(1);
      expect(onStopB).toHaveBeenCalledTimes(1);
    });
  });

  describe("failures", () => {
    it("rejects listen() when the port cannot be bound", async () => {
      network.refuse(CONTROL_PORT);
      const leader = createChannel(network, "10.0.0.1");

      await expect(leader.listen()).rejects.toBeInstanceOf(ChannelBindError);
      expect(leader.isListening()).toBe(false);
    });

    it("reports false instead of throwing when a send fails", async () => {
      const leader = createChannel(network, "10.0.0.1");

      await expect(leader.broadcast({ type: "stop" })).resolves.toBe(false);
      expect(console.error).toHaveBeenCalledWith(
        "[command:10.0.0.1] failed to send stop to 255.255.255.255: [memory:10.0.0.1] transport is not bound"
      );
    });

    it("does not deliver datagrams the network drops", async () => {
      const leader = createChannel(network, "10.0.0.1");
      const collaborator = createChannel(network, "10.0.0.2");
      await leader.listen();
      await collaborator.listen();
      const onStop = vi.fn();
      collaborator.registerHandler("stop", onStop);

      network.filter = () => false;
      await expect(leader.broadcast({ type: "stop" })).resolves.toBe(true);

      expect(onStop).not.toHaveBeenCalled();
      expect(network.log).toHaveLength(1);
    });

    it("stops dispatching after close", async () => {
      const leader = createChannel(network, "10.0.0.1");
      const collaborator = createChannel(network, "10.0.0.2");
      await leader.listen();
      await collaborator.listen();
      const onStop = vi.fn();
      collaborator.registerHandler("stop", onStop);

      await collaborator.close();
      await leader.broadcast({ type: "stop" });

      expect(onStop).not.toHaveBeenCalled();
      expect(collaborator.isListening()).toBe(false);
    });
  });
});
