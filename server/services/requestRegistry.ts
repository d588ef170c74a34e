/**
 * Request Registry
 *
 * Tracks request ids seen by the handler so transport retries are answered
 * once and cancellations reported before processing starts are honoured.
 *
 * Design:
 * - In-memory, bounded; entries older than the TTL are pruned when the map
 *   grows past its limit
 * - A cancel may arrive before the message itself; the id is remembered
 */

import { HANDLER_CONSTANTS } from "../config/constants";

export type AdmitResult = "accepted" | "duplicate";

type RequestState = "pending" | "started" | "completed";

type RequestEntry = {
  state: RequestState;
  arrived: boolean;
  cancelled: boolean;
  touchedAt: number;
};

export interface RequestRegistryOptions {
  maxSize?: number;
  ttlMs?: number;
  now?: () => number;
}

export class RequestRegistry {
  private readonly entries = new Map<string, RequestEntry>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: RequestRegistryOptions = {}) {
    this.maxSize = options.maxSize ?? HANDLER_CONSTANTS.REQUEST_REGISTRY_MAX_SIZE;
    this.ttlMs = options.ttlMs ?? HANDLER_CONSTANTS.REQUEST_REGISTRY_TTL_MINUTES * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Registers an inbound request. A second arrival of the same id is a duplicate.
   */
  admit(requestId: string): AdmitResult {
    this.maybePrune();
    const existing = this.entries.get(requestId);
    if (existing?.arrived) {
      console.log(`[RequestRegistry] Duplicate detected: ${requestId}`);
      return "duplicate";
    }
    if (existing) {
      existing.arrived = true;
      existing.touchedAt = this.now();
    } else {
      this.entries.set(requestId, { state: "pending", arrived: true, cancelled: false, touchedAt: this.now() });
    }
    return "accepted";
  }

  /**
   * Returns false when processing already started; the request then runs to
   * completion.
   */
  cancel(requestId: string): boolean {
    this.maybePrune();
    const existing = this.entries.get(requestId);
    if (existing && existing.state !== "pending") {
      return false;
    }
    if (existing) {
      existing.cancelled = true;
      existing.touchedAt = this.now();
    } else {
      this.entries.set(requestId, { state: "pending", arrived: false, cancelled: true, touchedAt: this.now() });
    }
    console.log(`[RequestRegistry] Cancelled before start: ${requestId}`);
    return true;
  }

  isCancelled(requestId: string): boolean {
    return this.entries.get(requestId)?.cancelled ?? false;
  }

  markStarted(requestId: string): void {
    const entry = this.entries.get(requestId);
    if (entry) {
      entry.state = "started";
      entry.touchedAt = this.now();
    }
  }

  markCompleted(requestId: string): void {
    const entry = this.entries.get(requestId);
    if (entry) {
      entry.state = "completed";
      entry.touchedAt = this.now();
    }
  }

  size(): number {
    return this.entries.size;
  }

  private maybePrune(): void {
    if (this.entries.size < this.maxSize) return;
    const cutoff = this.now() - this.ttlMs;
    this.entries.forEach((entry, key) => {
      if (entry.touchedAt < cutoff && entry.state !== "started") this.entries.delete(key);
    });
    // Still full: drop oldest finished entries first
    if (this.entries.size >= this.maxSize) {
      const finished = Array.from(this.entries.entries())
        .filter(([, entry]) => entry.state === "completed")
        .sort((a, b) => a[1].touchedAt - b[1].touchedAt);
      const excess = this.entries.size - this.maxSize + 1;
      for (const [key] of finished.slice(0, excess)) {
        this.entries.delete(key);
      }
    }
  }
}
