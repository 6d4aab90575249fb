/**
 * Collaborator registry for the leader.
 *
 * Tracks registration and heartbeat liveness per collaborator id:
 * - `register` upserts; `registeredAt` is set once, `lastSeen` always
 * - `heartbeat` refreshes a known id only and never registers
 * - online iff now - lastSeen < livenessTimeout
 * - evicted iff now - lastSeen > 3 * livenessTimeout
 */

import { TIMING, systemClock, type Clock, type CollaboratorStatus } from "@cuesync/shared";

export interface CollaboratorRecord {
  id: string;
  address: string;
  status: string;
  mediaRef: string;
  /** Seconds, registry clock */
  lastSeen: number;
  registeredAt: number;
}

export interface CollaboratorRegistryOptions {
  livenessTimeoutSec?: number;
  now?: Clock;
}

/** Multiple of the liveness timeout after which a silent collaborator is dropped */
export const EVICTION_FACTOR = 3;

export class CollaboratorRegistry {
  readonly livenessTimeoutSec: number;

  private records: Map<string, CollaboratorRecord> = new Map();
  private readonly now: Clock;

  constructor(options: CollaboratorRegistryOptions = {}) {
    this.livenessTimeoutSec = options.livenessTimeoutSec ?? TIMING.LIVENESS_TIMEOUT_SEC;
    this.now = options.now ?? systemClock;
  }

  /**
   * Register or re-register a collaborator.
   * Returns true when the id was not known before.
   */
  register(id: string, address: string, status = "ready", mediaRef = ""): boolean {
    const now = this.now();
    const existing = this.records.get(id);

    if (existing) {
      existing.address = address;
      existing.status = status;
      existing.mediaRef = mediaRef;
      existing.lastSeen = now;
      console.log(`[registry] re-registered id=${id} address=${address}`);
      return false;
    }

    this.records.set(id, { id, address, status, mediaRef, lastSeen: now, registeredAt: now });
    console.log(
      `[registry] registered id=${id} address=${address} media=${mediaRef || "(none)"} total=${this.records.size}`
    );
    return true;
  }

  /** Refresh a known collaborator; returns false for unknown ids */
  heartbeat(id: string, status: string): boolean {
    const record = this.records.get(id);
    if (!record) {
      return false;
    }
    record.status = status;
    record.lastSeen = this.now();
    return true;
  }

  get(id: string): CollaboratorStatus | undefined {
    const record = this.records.get(id);
    return record ? this.describe(record, this.now()) : undefined;
  }

  addressOf(id: string): string | undefined {
    return this.records.get(id)?.address;
  }

  /** Status of every collaborator, keyed by id. Does not mutate. */
  snapshot(): Record<string, CollaboratorStatus> {
    const now = this.now();
    const result: Record<string, CollaboratorStatus> = {};
    for (const record of this.records.values()) {
      result[record.id] = this.describe(record, now);
    }
    return result;
  }

  /** Drop collaborators silent for more than 3x the liveness timeout */
  evictStale(): string[] {
    const now = this.now();
    const limit = EVICTION_FACTOR * this.livenessTimeoutSec;
    const evicted: string[] = [];

    for (const [id, record] of this.records) {
      if (now - record.lastSeen > limit) {
        this.records.delete(id);
        evicted.push(id);
      }
    }

    if (evicted.length > 0) {
      console.log(`[registry] evicted ${evicted.join(", ")} remaining=${this.records.size}`);
    }
    return evicted;
  }

  count(): number {
    return this.records.size;
  }

  onlineCount(): number {
    const now = this.now();
    let online = 0;
    for (const record of this.records.values()) {
      if (this.isOnline(record, now)) {
        online++;
      }
    }
    return online;
  }

  private isOnline(record: CollaboratorRecord, now: number): boolean {
    return now - record.lastSeen < this.livenessTimeoutSec;
  }

  private describe(record: CollaboratorRecord, now: number): CollaboratorStatus {
    return {
      ...record,
      online: this.isOnline(record, now),
      secondsSinceSeen: Math.max(0, now - record.lastSeen),
    };
  }
}
