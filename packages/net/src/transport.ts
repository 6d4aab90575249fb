/**
 * Connectionless datagram transport.
 *
 * Sockets are broadcast-enabled and bound with address reuse so a leader and
 * a collaborator can share a host during development.
 */

import { createSocket, type Socket } from "dgram";
import { ChannelBindError } from "./errors.js";

/** A received datagram */
export interface Datagram {
  data: Buffer;
  /** Sender address */
  address: string;
  /** Sender port */
  port: number;
}

export type DatagramListener = (datagram: Datagram) => void;

export interface DatagramTransport {
  /** Bind the local port (0 picks any free port). Rejects with ChannelBindError. */
  bind(port: number): Promise<void>;
  send(data: Buffer, port: number, address: string): Promise<void>;
  /** Subscribe to received datagrams; returns an unsubscribe function */
  onMessage(listener: DatagramListener): () => void;
  close(): Promise<void>;
  isBound(): boolean;
}

/** Shared listener bookkeeping for transports */
export class ListenerSet {
  private listeners = new Set<DatagramListener>();

  add(listener: DatagramListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(datagram: Datagram, tag: string): void {
    for (const listener of this.listeners) {
      try {
        listener(datagram);
      } catch (err) {
        console.error(`[${tag}] datagram listener threw:`, err);
      }
    }
  }
}

/**
 * UDP/IPv4 transport on node's dgram module.
 * A closed transport can be bound again; each bind opens a fresh socket.
 */
export class UdpTransport implements DatagramTransport {
  private socket: Socket | null = null;
  private readonly listeners = new ListenerSet();

  constructor(private readonly name = "udp") {}

  async bind(port: number): Promise<void> {
    if (this.socket) {
      return;
    }

    const socket = createSocket({ type: "udp4", reuseAddr: true });

    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (err: Error) => {
          socket.removeListener("listening", onListening);
          reject(err);
        };
        const onListening = () => {
          socket.removeListener("error", onError);
          resolve();
        };
        socket.once("error", onError);
        socket.once("listening", onListening);
        socket.bind(port);
      });
    } catch (err) {
      try {
        socket.close();
      } catch (closeErr) {
        console.debug(`[${this.name}] close after failed bind:`, closeErr);
      }
      throw new ChannelBindError(port, err);
    }

    socket.setBroadcast(true);
    socket.on("message", (data, rinfo) => {
      this.listeners.emit({ data, address: rinfo.address, port: rinfo.port }, this.name);
    });
    socket.on("error", (err) => {
      console.error(`[${this.name}] socket error:`, err.message);
    });

    this.socket = socket;
    console.log(`[${this.name}] bound port=${socket.address().port}`);
  }

  send(data: Buffer, port: number, address: string): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.reject(new Error(`[${this.name}] transport is not bound`));
    }
    return new Promise((resolve, reject) => {
      socket.send(data, port, address, (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  onMessage(listener: DatagramListener): () => void {
    return this.listeners.add(listener);
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }
    this.socket = null;
    await new Promise<void>((resolve) => {
      socket.close(() => resolve());
    });
    console.log(`[${this.name}] closed`);
  }

  isBound(): boolean {
    return this.socket !== null;
  }
}
