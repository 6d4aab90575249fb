/**
 * @cuesync/shared
 *
 * Cue model, wire protocol and common utilities for cuesync.
 * This package is the single source of truth for the datagram protocol.
 */

// ============================================================================
// Version
// ============================================================================

export const VERSION = "0.1.0";

// ============================================================================
// Constants
// ============================================================================

/** Network defaults */
export const NETWORK = {
  /** Clock channel (leader -> all) */
  SYNC_PORT: 5005,
  /** Control channel (both directions) */
  CONTROL_PORT: 5006,
  BROADCAST_ADDRESS: "255.255.255.255",
} as const;

/** Timing defaults, in seconds */
export const TIMING = {
  TICK_INTERVAL_SEC: 0.1,
  MIN_TICK_INTERVAL_SEC: 0.02,
  MAX_TICK_INTERVAL_SEC: 5.0,
  HEARTBEAT_INTERVAL_SEC: 2,
  LIVENESS_TIMEOUT_SEC: 10,
  /** Silence after which a collaborator counts as unsynced */
  SYNC_TIMEOUT_SEC: 5,
  /** Backward jump in elapsed time treated as a loop restart */
  LOOP_THRESHOLD_SEC: 1.0,
} as const;

/** Playback correction defaults */
export const CORRECTION = {
  DEVIATION_THRESHOLD_SEC: 0.5,
  COOLDOWN_SEC: 3,
  MIN_SAMPLES: 5,
  MAX_SAMPLES: 10,
  SAMPLE_INTERVAL_SEC: 1,
} as const;

// ============================================================================
// Exports
// ============================================================================

export {
  CueChannelSchema,
  DataByteSchema,
  CueTypeSchema,
  NoteOnCueSchema,
  NoteOffCueSchema,
  ControlChangeCueSchema,
  CueSchema,
  CueListSchema,
  sortCues,
  createNoteOnCue,
  createNoteOffCue,
  createControlChangeCue,
  RELAY_OUTPUT_COUNT,
  RELAY_AUTO_OFF_SEC,
  RELAY_KEEPALIVE_SEC,
  relayNote,
  createRelayOnCue,
  createRelayOffCue,
  createRelayPulseCues,
  createSustainedRelayCues,
  describeCue,
} from "./cues.js";

export type { CueType, NoteOnCue, NoteOffCue, ControlChangeCue, Cue } from "./cues.js";

export {
  DeviceIdSchema,
  DeviceStatusSchema,
  SyncMessageSchema,
  StartMessageSchema,
  StopMessageSchema,
  UpdateScheduleMessageSchema,
  RegisterMessageSchema,
  HeartbeatMessageSchema,
  ControlMessageSchema,
} from "./messages.js";

export type {
  DeviceId,
  SyncMessage,
  StartMessage,
  StopMessage,
  UpdateScheduleMessage,
  RegisterMessage,
  HeartbeatMessage,
  ControlMessage,
  ControlMessageType,
  ControlMessageOf,
} from "./messages.js";

export {
  MAX_DATAGRAM_BYTES,
  validateSyncMessage,
  validateControlMessage,
  validateCueList,
  encodeMessage,
  parseDatagram,
  decodeSyncMessage,
  decodeControlMessage,
  formatZodError,
} from "./validators.js";

export type { ValidationResult } from "./validators.js";

export {
  SessionStateSchema,
  SessionStatsSchema,
  createDefaultSessionState,
  createDefaultSessionStats,
  SessionClock,
} from "./state.js";

export type { SessionState, SessionStats } from "./state.js";

export { CollaboratorStatusSchema, LeaderStatusSchema } from "./status.js";

export type { CollaboratorStatus, LeaderStatus } from "./status.js";

export { systemClock, clamp, formatElapsed } from "./clock.js";

export type { Clock } from "./clock.js";

export { RingBuffer, mean, median } from "./ringBuffer.js";
