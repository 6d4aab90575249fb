/**
 * Capabilities the collaborator core drives but never implements.
 */

import type { Cue } from "@cuesync/shared";

/** Media playback, positions in seconds */
export interface MediaPlayer {
  /** Current position, null when unknown */
  getPosition(): number | null;
  /** Media length, null when unknown */
  getDuration(): number | null;
  /** Seek; resolves false when the player refused */
  setPosition(seconds: number): boolean | Promise<boolean>;
  start?(): void | Promise<void>;
  stop?(): void | Promise<void>;
}

/** Emits the physical trigger for a due cue */
export interface TriggerOutput {
  send(cue: Cue): void | Promise<void>;
}
