/**
 * Session state shared by leader and collaborators.
 * Owned and mutated by a single process; other components read snapshots.
 */

import { z } from "zod";
import { systemClock, type Clock } from "./clock.js";

// ============================================================================
// Schemas
// ============================================================================

export const SessionStateSchema = z.object({
  isRunning: z.boolean(),
  /** Epoch seconds when the session started, null when stopped */
  startTime: z.number().nullable(),
  /** Seconds elapsed at the last update */
  currentTime: z.number().nonnegative(),
});
export type SessionState = z.infer<typeof SessionStateSchema>;

export const SessionStatsSchema = z.object({
  sessionsStarted: z.number().int().nonnegative(),
  totalRuntimeSec: z.number().nonnegative(),
  lastSessionDurationSec: z.number().nonnegative(),
});
export type SessionStats = z.infer<typeof SessionStatsSchema>;

// ============================================================================
// Factory Functions
// ============================================================================

export function createDefaultSessionState(): SessionState {
  return { isRunning: false, startTime: null, currentTime: 0 };
}

export function createDefaultSessionStats(): SessionStats {
  return { sessionsStarted: 0, totalRuntimeSec: 0, lastSessionDurationSec: 0 };
}

// ============================================================================
// Session Clock
// ============================================================================

/**
 * Tracks a session's start/stop lifecycle and elapsed time.
 */
export class SessionClock {
  private state: SessionState = createDefaultSessionState();
  private stats: SessionStats = createDefaultSessionStats();

  constructor(private readonly now: Clock = systemClock) {}

  /** Start a new session, ending the current one first. Returns the epoch. */
  start(): number {
    if (this.state.isRunning) {
      this.stop();
    }
    const epoch = this.now();
    this.state = { isRunning: true, startTime: epoch, currentTime: 0 };
    this.stats.sessionsStarted++;
    return epoch;
  }

  /** End the session; a no-op when nothing is running */
  stop(): void {
    if (this.state.isRunning && this.state.startTime !== null) {
      const duration = Math.max(0, this.now() - this.state.startTime);
      this.stats.totalRuntimeSec += duration;
      this.stats.lastSessionDurationSec = duration;
    }
    this.state = createDefaultSessionState();
  }

  /** Refresh and return the elapsed time */
  update(): number {
    if (this.state.isRunning && this.state.startTime !== null) {
      this.state.currentTime = Math.max(0, this.now() - this.state.startTime);
    }
    return this.state.currentTime;
  }

  get isRunning(): boolean {
    return this.state.isRunning;
  }

  get startTime(): number | null {
    return this.state.startTime;
  }

  snapshot(): SessionState {
    return { ...this.state };
  }

  getStats(): SessionStats {
    return { ...this.stats };
  }
}
