/**
 * Wire messages for the cuesync protocol.
 *
 * Every message is a single UTF-8 JSON datagram tagged by `type`.
 *
 * Channels:
 * - clock channel (leader -> all): `sync`
 * - control channel (broadcast, both directions):
 *   leader -> all: `start`, `stop`, `update_schedule`
 *   collaborator -> leader: `register`, `heartbeat`
 *
 * Delivery is lossy and unordered. Nothing is acknowledged or retried, so
 * every handler must tolerate duplicates.
 */

import { z } from "zod";
import { CueListSchema } from "./cues.js";

// ============================================================================
// Identifiers
// ============================================================================

export const DeviceIdSchema = z.string().min(1).max(64);
export type DeviceId = z.infer<typeof DeviceIdSchema>;

/** Free-form device status ("ready", "running", "sync_lost", ...) */
export const DeviceStatusSchema = z.string().min(1).max(32);

// ============================================================================
// Clock Channel
// ============================================================================

export const SyncMessageSchema = z.object({
  type: z.literal("sync"),
  /** Leader session time in seconds */
  time: z.number().nonnegative(),
  leaderId: DeviceIdSchema,
  /** Leader wall clock (epoch seconds) when the tick was sent */
  sentAt: z.number().optional(),
});
export type SyncMessage = z.infer<typeof SyncMessageSchema>;

// ============================================================================
// Leader Commands
// ============================================================================

export const StartMessageSchema = z.object({
  type: z.literal("start"),
  schedule: CueListSchema,
  /** Leader wall clock (epoch seconds) at session start */
  startTime: z.number(),
  debugMode: z.boolean().default(false),
});
export type StartMessage = z.infer<typeof StartMessageSchema>;

export const StopMessageSchema = z.object({
  type: z.literal("stop"),
});
export type StopMessage = z.infer<typeof StopMessageSchema>;

export const UpdateScheduleMessageSchema = z.object({
  type: z.literal("update_schedule"),
  schedule: CueListSchema,
});
export type UpdateScheduleMessage = z.infer<typeof UpdateScheduleMessageSchema>;

// ============================================================================
// Collaborator Messages
// ============================================================================

export const RegisterMessageSchema = z.object({
  type: z.literal("register"),
  deviceId: DeviceIdSchema,
  status: DeviceStatusSchema.default("ready"),
  /** Media the collaborator has loaded (file name or URL), may be empty */
  mediaRef: z.string().default(""),
});
export type RegisterMessage = z.infer<typeof RegisterMessageSchema>;

export const HeartbeatMessageSchema = z.object({
  type: z.literal("heartbeat"),
  deviceId: DeviceIdSchema,
  status: DeviceStatusSchema.default("ready"),
});
export type HeartbeatMessage = z.infer<typeof HeartbeatMessageSchema>;

// ============================================================================
// Union Types
// ============================================================================

/** Everything that travels on the control channel */
export const ControlMessageSchema = z.discriminatedUnion("type", [
  StartMessageSchema,
  StopMessageSchema,
  UpdateScheduleMessageSchema,
  RegisterMessageSchema,
  HeartbeatMessageSchema,
]);
export type ControlMessage = z.infer<typeof ControlMessageSchema>;
export type ControlMessageType = ControlMessage["type"];

/** Narrow a control message union member by its tag */
export type ControlMessageOf<T extends ControlMessageType> = Extract<ControlMessage, { type: T }>;
