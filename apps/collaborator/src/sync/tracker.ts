/**
 * Sync tracker: drift and sync quality from received clock ticks.
 *
 * Drift is measured between consecutive samples only, so a lost or
 * duplicated tick skews one drift value and the next pair is clean again.
 */

import { RingBuffer, TIMING, mean, systemClock, type Clock } from "@cuesync/shared";

export interface SyncSample {
  leaderTime: number;
  localReceiptTime: number;
}

export type SyncQuality = "no_data" | "lost" | "degraded" | "excellent" | "good" | "fair" | "poor";

export interface SyncTrackerStats {
  samples: number;
  averageDrift: number;
  quality: SyncQuality;
  /** Seconds since the last sample, null before the first */
  timeSinceLastSample: number | null;
  lastLeaderTime: number | null;
}

export interface SyncTrackerOptions {
  capacity?: number;
  now?: Clock;
}

const DEFAULT_CAPACITY = 50;

/** Silence thresholds (seconds) */
const LOST_AFTER_SEC = 10;
const DEGRADED_AFTER_SEC = 5;

/** Absolute average drift thresholds (seconds) */
const EXCELLENT_BELOW = 0.1;
const GOOD_BELOW = 0.5;
const FAIR_BELOW = 1.0;

export class SyncTracker {
  private readonly samples: RingBuffer<SyncSample>;
  private readonly drifts: RingBuffer<number>;
  private readonly now: Clock;
  private lastRecordedAt: number | null = null;

  constructor(options: SyncTrackerOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_CAPACITY;
    this.samples = new RingBuffer(capacity);
    this.drifts = new RingBuffer(capacity);
    this.now = options.now ?? systemClock;
  }

  /**
   * Record a tick. Returns the drift against the previous sample, or null
   * for the first one.
   */
  recordSync(leaderTime: number, localReceiptTime: number = this.now()): number | null {
    const previous = this.samples.last();
    let drift: number | null = null;

    if (previous) {
      const expected = previous.leaderTime + (localReceiptTime - previous.localReceiptTime);
      drift = leaderTime - expected;
      this.drifts.push(drift);
    }

    this.samples.push({ leaderTime, localReceiptTime });
    this.lastRecordedAt = this.now();
    return drift;
  }

  timeSinceLastSample(): number | null {
    return this.lastRecordedAt === null ? null : this.now() - this.lastRecordedAt;
  }

  isSynced(timeoutSec: number = TIMING.SYNC_TIMEOUT_SEC): boolean {
    const since = this.timeSinceLastSample();
    return since !== null && since < timeoutSec;
  }

  averageDrift(): number {
    return mean(this.drifts.toArray());
  }

  syncQuality(): SyncQuality {
    const since = this.timeSinceLastSample();
    if (since === null || this.samples.size === 0) {
      return "no_data";
    }
    if (since > LOST_AFTER_SEC) {
      return "lost";
    }
    if (since > DEGRADED_AFTER_SEC) {
      return "degraded";
    }

    const drift = Math.abs(this.averageDrift());
    if (drift < EXCELLENT_BELOW) return "excellent";
    if (drift < GOOD_BELOW) return "good";
    if (drift < FAIR_BELOW) return "fair";
    return "poor";
  }

  lastLeaderTime(): number | null {
    return this.samples.last()?.leaderTime ?? null;
  }

  stats(): SyncTrackerStats {
    return {
      samples: this.samples.size,
      averageDrift: this.averageDrift(),
      quality: this.syncQuality(),
      timeSinceLastSample: this.timeSinceLastSample(),
      lastLeaderTime: this.lastLeaderTime(),
    };
  }

  /** Forget all samples */
  reset(): void {
    this.samples.clear();
    this.drifts.clear();
    this.lastRecordedAt = null;
  }
}
