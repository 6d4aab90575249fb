/**
 * Cue model for cuesync schedules.
 *
 * A cue is a timestamped trigger event. Schedules are plain arrays of cues,
 * sorted ascending by `time`; anything that consumes a schedule works on a
 * sorted copy and never mutates the list it was handed.
 */

import { z } from "zod";

// ============================================================================
// Primitives
// ============================================================================

/** Trigger channel (1-16) */
export const CueChannelSchema = z.number().int().min(1).max(16);

/** 7-bit data byte (note number, velocity, controller, value) */
export const DataByteSchema = z.number().int().min(0).max(127);

export const CueTypeSchema = z.enum(["note_on", "note_off", "control_change"]);
export type CueType = z.infer<typeof CueTypeSchema>;

const CueBaseSchema = z.object({
  /** Seconds since session start */
  time: z.number().nonnegative(),
  channel: CueChannelSchema,
  /** Free-form label shown in logs and status output */
  description: z.string().optional(),
});

// ============================================================================
// Cue Variants
// ============================================================================

export const NoteOnCueSchema = CueBaseSchema.extend({
  type: z.literal("note_on"),
  note: DataByteSchema,
  velocity: DataByteSchema,
});
export type NoteOnCue = z.infer<typeof NoteOnCueSchema>;

export const NoteOffCueSchema = CueBaseSchema.extend({
  type: z.literal("note_off"),
  note: DataByteSchema,
  velocity: DataByteSchema.default(0),
});
export type NoteOffCue = z.infer<typeof NoteOffCueSchema>;

export const ControlChangeCueSchema = CueBaseSchema.extend({
  type: z.literal("control_change"),
  control: DataByteSchema,
  value: DataByteSchema,
});
export type ControlChangeCue = z.infer<typeof ControlChangeCueSchema>;

export const CueSchema = z.discriminatedUnion("type", [
  NoteOnCueSchema,
  NoteOffCueSchema,
  ControlChangeCueSchema,
]);
export type Cue = z.infer<typeof CueSchema>;

export const CueListSchema = z.array(CueSchema);

// ============================================================================
// Ordering
// ============================================================================

/**
 * Return a new list sorted ascending by time.
 * Cues sharing a timestamp keep their original relative order.
 */
export function sortCues(cues: readonly Cue[]): Cue[] {
  return [...cues].sort((a, b) => a.time - b.time);
}

// ============================================================================
// Factories
// ============================================================================

export function createNoteOnCue(
  time: number,
  channel: number,
  note: number,
  velocity: number
): NoteOnCue {
  return { time, type: "note_on", channel, note, velocity };
}

export function createNoteOffCue(time: number, channel: number, note: number): NoteOffCue {
  return { time, type: "note_off", channel, note, velocity: 0 };
}

export function createControlChangeCue(
  time: number,
  channel: number,
  control: number,
  value: number
): ControlChangeCue {
  return { time, type: "control_change", channel, control, value };
}

// ============================================================================
// Relay Outputs
// ============================================================================

/*
 * The relay board maps outputs 1-12 onto notes 60-71. Outputs switch off by
 * themselves after 5s without a note on, so anything held longer needs
 * keepalive notes.
 */

export const RELAY_OUTPUT_COUNT = 12;
const RELAY_BASE_NOTE = 59;
export const RELAY_AUTO_OFF_SEC = 5;
export const RELAY_KEEPALIVE_SEC = 4;

/** Note number for a relay output */
export function relayNote(output: number): number {
  if (!Number.isInteger(output) || output < 1 || output > RELAY_OUTPUT_COUNT) {
    throw new RangeError(`Relay output must be 1-${RELAY_OUTPUT_COUNT}, got ${output}`);
  }
  return RELAY_BASE_NOTE + output;
}

export function createRelayOnCue(
  time: number,
  output: number,
  velocity = 127,
  channel = 1
): NoteOnCue {
  const note = relayNote(output);
  return {
    ...createNoteOnCue(time, channel, note, velocity),
    description: `Output ${output} ON (Note ${note}, Velocity ${velocity})`,
  };
}

export function createRelayOffCue(time: number, output: number, channel = 1): NoteOffCue {
  const note = relayNote(output);
  return {
    ...createNoteOffCue(time, channel, note),
    description: `Output ${output} OFF (Note ${note})`,
  };
}

/** Relay on at `time`, off `durationSec` later */
export function createRelayPulseCues(
  time: number,
  output: number,
  durationSec = 0.5,
  velocity = 127,
  channel = 1
): Cue[] {
  if (durationSec > RELAY_AUTO_OFF_SEC) {
    console.warn(
      `[cues] pulse of ${durationSec}s on output ${output} exceeds relay auto-off (${RELAY_AUTO_OFF_SEC}s)`
    );
  }
  return [
    createRelayOnCue(time, output, velocity, channel),
    createRelayOffCue(time + durationSec, output, channel),
  ];
}

/**
 * Hold a relay on from `startTime` to `endTime`.
 * Events longer than the relay auto-off get a keepalive note every
 * `keepaliveSec` seconds.
 */
export function createSustainedRelayCues(
  startTime: number,
  endTime: number,
  output: number,
  velocity = 127,
  channel = 1,
  keepaliveSec = RELAY_KEEPALIVE_SEC
): Cue[] {
  if (endTime <= startTime) {
    throw new RangeError("End time must be after start time");
  }

  const cues: Cue[] = [createRelayOnCue(startTime, output, velocity, channel)];

  if (endTime - startTime > RELAY_AUTO_OFF_SEC) {
    const note = relayNote(output);
    let t = startTime + keepaliveSec;
    let count = 1;
    while (t < endTime) {
      cues.push({
        ...createNoteOnCue(t, channel, note, velocity),
        description: `Output ${output} Keepalive #${count} (Note ${note})`,
      });
      t += keepaliveSec;
      count++;
    }
  }

  cues.push(createRelayOffCue(endTime, output, channel));
  return cues;
}

// ============================================================================
// Display
// ============================================================================

/** One-line summary of a cue for logs */
export function describeCue(cue: Cue): string {
  const at = `${cue.time.toFixed(2)}s`;
  if (cue.description) {
    return `${at} ${cue.description}`;
  }
  switch (cue.type) {
    case "note_on":
      return `${at} note_on ch=${cue.channel} note=${cue.note} vel=${cue.velocity}`;
    case "note_off":
      return `${at} note_off ch=${cue.channel} note=${cue.note}`;
    case "control_change":
      return `${at} control_change ch=${cue.channel} cc=${cue.control} val=${cue.value}`;
  }
}
