/**
 * Playback sync corrector.
 *
 * Collects deviation samples (actual - expected media position) and seeks
 * the player back to the expected position when the median of the window
 * exceeds the threshold, at most once per cooldown. The window is cleared
 * after every applied correction. While a seek is in flight no other
 * sample can start one.
 */

import { CORRECTION, RingBuffer, median } from "@cuesync/shared";
import type { MediaPlayer } from "../media/player.js";

export interface CorrectorOptions {
  deviationThresholdSec: number;
  cooldownSec: number;
  minSamples: number;
  maxSamples: number;
}

export type CorrectionReason =
  | "insufficient_samples"
  | "within_threshold"
  | "cooldown"
  | "seek_pending"
  | "seek_failed"
  | "corrected";

export interface CorrectionResult {
  applied: boolean;
  reason: CorrectionReason;
  /** Deviation of the sample just added */
  deviation: number;
  /** Window median, null until the window holds minSamples */
  medianDeviation: number | null;
  /** Seek target when a seek was attempted */
  targetPosition: number | null;
}

export interface CorrectorStats {
  corrections: number;
  failedSeeks: number;
  samples: number;
  lastCorrectionTime: number | null;
}

const DEFAULT_OPTIONS: CorrectorOptions = {
  deviationThresholdSec: CORRECTION.DEVIATION_THRESHOLD_SEC,
  cooldownSec: CORRECTION.COOLDOWN_SEC,
  minSamples: CORRECTION.MIN_SAMPLES,
  maxSamples: CORRECTION.MAX_SAMPLES,
};

export class PlaybackSyncCorrector {
  readonly options: CorrectorOptions;

  private readonly samples: RingBuffer<number>;
  private lastCorrectionTime: number | null = null;
  private seekPending = false;
  private corrections = 0;
  private failedSeeks = 0;

  constructor(
    private readonly player: MediaPlayer,
    options: Partial<CorrectorOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    if (this.options.minSamples > this.options.maxSamples) {
      throw new RangeError(
        `minSamples (${this.options.minSamples}) exceeds maxSamples (${this.options.maxSamples})`
      );
    }
    this.samples = new RingBuffer(this.options.maxSamples);
  }

  /**
   * Add a sample and correct if the window calls for it.
   * `now` is in seconds on the caller's clock.
   */
  async checkAndCorrect(
    expectedPosition: number,
    actualPosition: number,
    now: number
  ): Promise<CorrectionResult> {
    const deviation = actualPosition - expectedPosition;
    this.samples.push(deviation);

    if (this.samples.size < this.options.minSamples) {
      return { applied: false, reason: "insufficient_samples", deviation, medianDeviation: null, targetPosition: null };
    }

    const medianDeviation = median(this.samples.toArray());

    if (Math.abs(medianDeviation) <= this.options.deviationThresholdSec) {
      return { applied: false, reason: "within_threshold", deviation, medianDeviation, targetPosition: null };
    }

    if (
      this.lastCorrectionTime !== null &&
      now - this.lastCorrectionTime < this.options.cooldownSec
    ) {
      return { applied: false, reason: "cooldown", deviation, medianDeviation, targetPosition: null };
    }

    if (this.seekPending) {
      return { applied: false, reason: "seek_pending", deviation, medianDeviation, targetPosition: null };
    }

    this.seekPending = true;
    let seeked: boolean;
    try {
      seeked = await this.seek(expectedPosition);
    } finally {
      this.seekPending = false;
    }
    if (!seeked) {
      this.failedSeeks++;
      return {
        applied: false,
        reason: "seek_failed",
        deviation,
        medianDeviation,
        targetPosition: expectedPosition,
      };
    }

    this.lastCorrectionTime = now;
    this.corrections++;
    this.samples.clear();
    console.log(
      `[corrector] corrected median=${medianDeviation.toFixed(3)}s seek=${expectedPosition.toFixed(3)}s`
    );

    return { applied: true, reason: "corrected", deviation, medianDeviation, targetPosition: expectedPosition };
  }

  /** Drop samples and cooldown state (new session) */
  reset(): void {
    this.samples.clear();
    this.lastCorrectionTime = null;
  }

  isSeekPending(): boolean {
    return this.seekPending;
  }

  getStats(): CorrectorStats {
    return {
      corrections: this.corrections,
      failedSeeks: this.failedSeeks,
      samples: this.samples.size,
      lastCorrectionTime: this.lastCorrectionTime,
    };
  }

  private async seek(position: number): Promise<boolean> {
    try {
      const ok = await this.player.setPosition(position);
      if (!ok) {
        console.warn(`[corrector] player refused seek to ${position.toFixed(3)}s`);
      }
      return ok;
    } catch (err) {
      console.error(`[corrector] seek to ${position.toFixed(3)}s failed:`, err);
      return false;
    }
  }
}
