/**
 * In-process datagram network for tests and local simulation.
 *
 * Delivery is synchronous: `send` hands the datagram to every transport
 * bound to the destination port (broadcast) or to the one host with the
 * destination address. A broadcast also reaches the sender when it is bound
 * to that port, as it would on a real LAN.
 */

import { ChannelBindError } from "./errors.js";
import { ListenerSet, type DatagramTransport, type DatagramListener } from "./transport.js";

/** A datagram in flight, as seen by the network filter */
export interface InFlightDatagram {
  data: Buffer;
  fromAddress: string;
  toAddress: string;
  toPort: number;
}

/** Return false to drop the datagram */
export type DeliveryFilter = (datagram: InFlightDatagram) => boolean;

const BROADCAST = "255.255.255.255";

export class MemoryNetwork {
  private endpoints = new Set<MemoryTransport>();
  private refusedPorts = new Set<number>();
  private nextEphemeralPort = 40000;

  /** Optional loss/reorder hook */
  filter: DeliveryFilter | null = null;

  /** Every datagram handed to the network, delivered or not */
  readonly log: InFlightDatagram[] = [];

  /** Create a transport for a host with the given address */
  createTransport(address: string): MemoryTransport {
    return new MemoryTransport(this, address);
  }

  /** Make binds on `port` fail, as if the port were taken */
  refuse(port: number): void {
    this.refusedPorts.add(port);
  }

  /** @internal */
  attach(endpoint: MemoryTransport, port: number): number {
    if (this.refusedPorts.has(port)) {
      throw new ChannelBindError(port, new Error("EADDRINUSE"));
    }
    this.endpoints.add(endpoint);
    return port === 0 ? this.nextEphemeralPort++ : port;
  }

  /** @internal */
  detach(endpoint: MemoryTransport): void {
    this.endpoints.delete(endpoint);
  }

  /** @internal */
  deliver(from: MemoryTransport, data: Buffer, port: number, address: string): void {
    const datagram: InFlightDatagram = {
      data: Buffer.from(data),
      fromAddress: from.address,
      toAddress: address,
      toPort: port,
    };
    this.log.push(datagram);

    if (this.filter && !this.filter(datagram)) {
      return;
    }

    const fromPort = from.port ?? 0;
    for (const endpoint of [...this.endpoints]) {
      if (endpoint.port !== port) {
        continue;
      }
      if (address !== BROADCAST && endpoint.address !== address) {
        continue;
      }
      endpoint.receive({ data: Buffer.from(datagram.data), address: from.address, port: fromPort });
    }
  }
}

export class MemoryTransport implements DatagramTransport {
  private readonly listeners = new ListenerSet();
  private boundPort: number | null = null;

  constructor(
    private readonly network: MemoryNetwork,
    readonly address: string
  ) {}

  get port(): number | null {
    return this.boundPort;
  }

  async bind(port: number): Promise<void> {
    if (this.boundPort !== null) {
      return;
    }
    this.boundPort = this.network.attach(this, port);
  }

  async send(data: Buffer, port: number, address: string): Promise<void> {
    if (this.boundPort === null) {
      throw new Error(`[memory:${this.address}] transport is not bound`);
    }
    this.network.deliver(this, data, port, address);
  }

  onMessage(listener: DatagramListener): () => void {
    return this.listeners.add(listener);
  }

  async close(): Promise<void> {
    this.network.detach(this);
    this.boundPort = null;
  }

  isBound(): boolean {
    return this.boundPort !== null;
  }

  /** @internal */
  receive(datagram: { data: Buffer; address: string; port: number }): void {
    this.listeners.emit(datagram, `memory:${this.address}`);
  }
}
