/**
 * Wall-clock media player for running a collaborator without real media.
 *
 * Position advances at `rate` times the clock while playing and wraps at
 * the duration when looping.
 */

import { systemClock, type Clock } from "@cuesync/shared";
import type { MediaPlayer } from "./player.js";

export interface SimulatedPlayerOptions {
  durationSec?: number | null;
  /** Playback speed relative to the clock; != 1 simulates a drifting device */
  rate?: number;
  loop?: boolean;
  now?: Clock;
}

export class SimulatedPlayer implements MediaPlayer {
  private readonly durationSec: number | null;
  private readonly rate: number;
  private readonly loop: boolean;
  private readonly now: Clock;

  private playing = false;
  /** Clock time and position at the last start or seek */
  private anchorTime = 0;
  private anchorPosition = 0;

  constructor(options: SimulatedPlayerOptions = {}) {
    this.durationSec = options.durationSec ?? null;
    this.rate = options.rate ?? 1;
    this.loop = options.loop ?? true;
    this.now = options.now ?? systemClock;
  }

  start(): void {
    this.anchorTime = this.now();
    this.anchorPosition = 0;
    this.playing = true;
    console.log("[media] playback started");
  }

  stop(): void {
    this.playing = false;
    console.log("[media] playback stopped");
  }

  isPlaying(): boolean {
    return this.playing;
  }

  getPosition(): number | null {
    if (!this.playing) {
      return null;
    }
    const raw = this.anchorPosition + (this.now() - this.anchorTime) * this.rate;
    if (this.durationSec === null) {
      return raw;
    }
    return this.loop ? raw % this.durationSec : Math.min(raw, this.durationSec);
  }

  getDuration(): number | null {
    return this.durationSec;
  }

  setPosition(seconds: number): boolean {
    if (!this.playing || seconds < 0) {
      return false;
    }
    if (this.durationSec !== null && seconds > this.durationSec) {
      return false;
    }
    this.anchorTime = this.now();
    this.anchorPosition = seconds;
    console.log(`[media] seek to ${seconds.toFixed(2)}s`);
    return true;
  }
}
