/**
 * Validation and datagram codec for the cuesync protocol.
 *
 * Datagrams are decoded at the transport boundary into the closed message
 * unions from messages.ts; nothing past this point handles raw JSON.
 */

import { z } from "zod";
import {
  SyncMessageSchema,
  ControlMessageSchema,
  type SyncMessage,
  type ControlMessage,
} from "./messages.js";
import { CueListSchema, type Cue } from "./cues.js";

/** Largest payload a single UDP/IPv4 datagram can carry */
export const MAX_DATAGRAM_BYTES = 65_507;

// ============================================================================
// Validation Results
// ============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

/** Validate a sync tick */
export function validateSyncMessage(message: unknown): ValidationResult<SyncMessage> {
  const result = SyncMessageSchema.safeParse(message);
  if (!result.success) {
    return { success: false, error: formatZodError(result.error) };
  }
  return { success: true, data: result.data };
}

/** Validate any control-channel message */
export function validateControlMessage(message: unknown): ValidationResult<ControlMessage> {
  const result = ControlMessageSchema.safeParse(message);
  if (!result.success) {
    return { success: false, error: formatZodError(result.error) };
  }
  return { success: true, data: result.data };
}

/** Validate a schedule (cue array) from any source */
export function validateCueList(cues: unknown): ValidationResult<Cue[]> {
  const result = CueListSchema.safeParse(cues);
  if (!result.success) {
    return { success: false, error: formatZodError(result.error) };
  }
  return { success: true, data: result.data };
}

// ============================================================================
// Datagram Codec
// ============================================================================

/** Serialize a message into a datagram payload */
export function encodeMessage(message: SyncMessage | ControlMessage): Buffer {
  const payload = Buffer.from(JSON.stringify(message), "utf-8");
  if (payload.length > MAX_DATAGRAM_BYTES) {
    throw new RangeError(
      `${message.type} message is ${payload.length} bytes, over the ${MAX_DATAGRAM_BYTES} byte datagram limit`
    );
  }
  return payload;
}

/** Parse a datagram payload as JSON */
export function parseDatagram(data: Buffer | string): ValidationResult<unknown> {
  const text = typeof data === "string" ? data : data.toString("utf-8");
  try {
    return { success: true, data: JSON.parse(text) };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { success: false, error: `Malformed JSON: ${reason}` };
  }
}

/** Decode a clock-channel datagram */
export function decodeSyncMessage(data: Buffer | string): ValidationResult<SyncMessage> {
  const parsed = parseDatagram(data);
  if (!parsed.success) {
    return parsed;
  }
  return validateSyncMessage(parsed.data);
}

/** Decode a control-channel datagram */
export function decodeControlMessage(data: Buffer | string): ValidationResult<ControlMessage> {
  const parsed = parseDatagram(data);
  if (!parsed.success) {
    return parsed;
  }
  return validateControlMessage(parsed.data);
}

// ============================================================================
// Helpers
// ============================================================================

/** Format a zod error into a readable string */
export function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.join(".");
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join("; ");
}
