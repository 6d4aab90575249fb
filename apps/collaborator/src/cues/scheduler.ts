/**
 * Cue scheduler.
 *
 * Fires each cue of a time-sorted schedule once per playback pass, using a
 * monotonic cursor:
 * - a backward jump in elapsed time larger than `loopThresholdSec` is a
 *   restart (looped media) and rewinds the cursor
 * - smaller backward jitter is ignored and never re-fires a cue
 * - each call fires every not-yet-fired cue with time <= elapsed, in order
 */

import { TIMING, describeCue, sortCues, type Cue } from "@cuesync/shared";
import type { TriggerOutput } from "../media/player.js";

export interface CueSchedulerOptions {
  output: TriggerOutput;
  /** Backward jump (seconds) treated as a restart; a heuristic, tune per show */
  loopThresholdSec?: number;
}

export interface SchedulerProgress {
  /** Cues fired in the current pass */
  fired: number;
  total: number;
  /** Restarts detected since start() */
  loops: number;
  nextCueTime: number | null;
}

export class CueScheduler {
  readonly loopThresholdSec: number;

  private readonly output: TriggerOutput;
  private cues: Cue[] = [];
  private lastFiredIndex = -1;
  private lastElapsedTime = -1;
  private running = false;
  private loops = 0;

  constructor(options: CueSchedulerOptions) {
    this.output = options.output;
    this.loopThresholdSec = options.loopThresholdSec ?? TIMING.LOOP_THRESHOLD_SEC;
  }

  /** Replace the schedule and rewind the cursor */
  load(cues: readonly Cue[]): void {
    this.cues = sortCues(cues);
    this.lastFiredIndex = -1;
    console.log(`[scheduler] loaded ${this.cues.length} cues`);
  }

  start(): void {
    this.running = true;
    this.lastFiredIndex = -1;
    this.lastElapsedTime = -1;
    this.loops = 0;
  }

  stop(): void {
    this.running = false;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Fire every due cue for `elapsedTime`. Returns the cues fired by this call.
   */
  process(elapsedTime: number): Cue[] {
    if (!this.running) {
      return [];
    }

    if (
      elapsedTime < this.lastElapsedTime &&
      this.lastElapsedTime - elapsedTime > this.loopThresholdSec
    ) {
      this.loops++;
      this.lastFiredIndex = -1;
      console.log(
        `[scheduler] restart detected ${this.lastElapsedTime.toFixed(2)}s -> ${elapsedTime.toFixed(2)}s (loop ${this.loops})`
      );
    }
    this.lastElapsedTime = elapsedTime;

    const fired: Cue[] = [];
    for (let i = this.lastFiredIndex + 1; i < this.cues.length; i++) {
      const cue = this.cues[i];
      if (!cue || cue.time > elapsedTime) {
        break;
      }
      this.fire(cue);
      this.lastFiredIndex = i;
      fired.push(cue);
    }
    return fired;
  }

  progress(): SchedulerProgress {
    return {
      fired: this.lastFiredIndex + 1,
      total: this.cues.length,
      loops: this.loops,
      nextCueTime: this.cues[this.lastFiredIndex + 1]?.time ?? null,
    };
  }

  /** A failing output is logged; the cue still counts as fired */
  private fire(cue: Cue): void {
    try {
      const result = this.output.send(cue);
      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          console.error(`[scheduler] trigger failed for ${describeCue(cue)}:`, err);
        });
      }
    } catch (err) {
      console.error(`[scheduler] trigger failed for ${describeCue(cue)}:`, err);
    }
  }
}
