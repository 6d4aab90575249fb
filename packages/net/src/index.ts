/**
 * @cuesync/net
 *
 * Datagram transports, control-channel dispatch and background task
 * supervision for leader and collaborator processes.
 */

export { ChannelBindError } from "./errors.js";

export { UdpTransport, ListenerSet } from "./transport.js";
export type { Datagram, DatagramListener, DatagramTransport } from "./transport.js";

export { MemoryNetwork, MemoryTransport } from "./memory.js";
export type { InFlightDatagram, DeliveryFilter } from "./memory.js";

export { CommandChannel } from "./commandChannel.js";
export type { CommandChannelOptions, CommandHandler, SenderInfo } from "./commandChannel.js";

export { startPeriodicTask, TaskSupervisor } from "./tasks.js";
export type { TaskRun, TaskHandle, PeriodicTaskOptions } from "./tasks.js";
