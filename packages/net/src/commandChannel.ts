/**
 * Control-channel dispatch shared by leader and collaborators.
 *
 * Datagrams are decoded into the closed ControlMessage union at the
 * boundary and routed by `type` to registered handlers. Malformed datagrams
 * and types without a handler are dropped. Sends are fire-and-forget: no
 * acknowledgment, no retry, failures logged and reported as `false`.
 */

import {
  decodeControlMessage,
  encodeMessage,
  type ControlMessage,
  type ControlMessageOf,
  type ControlMessageType,
} from "@cuesync/shared";
import type { Datagram, DatagramTransport } from "./transport.js";

/** Where a control message came from */
export interface SenderInfo {
  address: string;
  port: number;
}

export type CommandHandler<T extends ControlMessageType> = (
  message: ControlMessageOf<T>,
  sender: SenderInfo
) => void | Promise<void>;

type AnyCommandHandler = (message: ControlMessage, sender: SenderInfo) => void | Promise<void>;

export interface CommandChannelOptions {
  transport: DatagramTransport;
  /** Control port, used both for binding and as the destination port */
  port: number;
  broadcastAddress: string;
  /** Resolve a device id to its address for `sendTo` */
  resolveAddress?: (id: string) => string | undefined;
  /** Log tag */
  name?: string;
}

function isMessageOfType<T extends ControlMessageType>(
  message: ControlMessage,
  type: T
): message is ControlMessageOf<T> {
  return message.type === type;
}

export class CommandChannel {
  private readonly transport: DatagramTransport;
  private readonly port: number;
  private readonly broadcastAddress: string;
  private readonly resolveAddress: (id: string) => string | undefined;
  private readonly tag: string;

  private handlers = new Map<ControlMessageType, AnyCommandHandler>();
  private unsubscribe: (() => void) | null = null;

  constructor(options: CommandChannelOptions) {
    this.transport = options.transport;
    this.port = options.port;
    this.broadcastAddress = options.broadcastAddress;
    this.resolveAddress = options.resolveAddress ?? (() => undefined);
    this.tag = options.name ?? "command";
  }

  /**
   * Register the handler for a message type, replacing any previous one.
   */
  registerHandler<T extends ControlMessageType>(type: T, handler: CommandHandler<T>): void {
    this.handlers.set(type, (message, sender) => {
      if (isMessageOfType(message, type)) {
        return handler(message, sender);
      }
    });
  }

  /**
   * Bind the control port and start dispatching.
   * Throws ChannelBindError if the port cannot be bound.
   */
  async listen(): Promise<void> {
    if (this.unsubscribe) {
      return;
    }
    await this.transport.bind(this.port);
    this.unsubscribe = this.transport.onMessage((datagram) => {
      this.handleDatagram(datagram).catch((err: unknown) => {
        console.error(`[${this.tag}] dispatch failed:`, err);
      });
    });
    console.log(`[${this.tag}] listening port=${this.port}`);
  }

  isListening(): boolean {
    return this.unsubscribe !== null;
  }

  /** Broadcast to every device on the control channel */
  broadcast(command: ControlMessage): Promise<boolean> {
    return this.sendToAddress(command, this.broadcastAddress);
  }

  /**
   * Send to one device by id. Unknown ids fall back to broadcast, since
   * every handler is idempotent.
   */
  sendTo(id: string, command: ControlMessage): Promise<boolean> {
    const address = this.resolveAddress(id);
    if (!address) {
      console.log(`[${this.tag}] no address for id=${id}, broadcasting ${command.type}`);
      return this.broadcast(command);
    }
    return this.sendToAddress(command, address);
  }

  async close(): Promise<void> {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
    await this.transport.close();
  }

  private async sendToAddress(command: ControlMessage, address: string): Promise<boolean> {
    try {
      const payload = encodeMessage(command);
      await this.transport.send(payload, this.port, address);
      return true;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[${this.tag}] failed to send ${command.type} to ${address}: ${reason}`);
      return false;
    }
  }

  private async handleDatagram(datagram: Datagram): Promise<void> {
    const decoded = decodeControlMessage(datagram.data);
    if (!decoded.success) {
      console.debug(`[${this.tag}] dropped datagram from ${datagram.address}: ${decoded.error}`);
      return;
    }

    const message = decoded.data;
    const handler = this.handlers.get(message.type);
    if (!handler) {
      return;
    }

    try {
      await handler(message, { address: datagram.address, port: datagram.port });
    } catch (err) {
      console.error(`[${this.tag}] ${message.type} handler failed:`, err);
    }
  }
}
