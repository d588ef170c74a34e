/**
 * Conversation Context Store
 *
 * Per-user sliding window of recent turns plus the last captured lead.
 * In-memory only. A context idle for longer than the TTL is dropped on next
 * access, and all expired contexts are swept every `pruneEvery` writes.
 *
 * Callers serialize access per user (see services/concurrency.ts); the store
 * itself does no locking.
 *
 * Layer: Decision Layer (Context)
 */

import { HANDLER_CONSTANTS } from "../config/constants";
import type { Lead } from "../agents/dealflow/types";
import type { Entity, IntentLabel } from "./intent";

export type ConversationTurn = Readonly<{
  timestamp: number;
  text: string;
  intent: IntentLabel;
  confidence: number;
  entities: readonly Entity[];
}>;

export type ConversationSnapshot = Readonly<{
  userId: string;
  turns: readonly ConversationTurn[];
  lastLead: Lead | null;
  lastActivity: number;
}>;

type ContextEntry = {
  turns: ConversationTurn[];
  lastLead: Lead | null;
  lastActivity: number;
};

export interface ConversationContextOptions {
  windowSize?: number;
  ttlMs?: number;
  pruneEvery?: number;
  now?: () => number;
}

export class ConversationContextStore {
  private readonly contexts = new Map<string, ContextEntry>();
  private readonly windowSize: number;
  private readonly ttlMs: number;
  private readonly pruneEvery: number;
  private readonly now: () => number;
  private writesSincePrune = 0;

  constructor(options: ConversationContextOptions = {}) {
    this.windowSize = options.windowSize ?? HANDLER_CONSTANTS.CONTEXT_WINDOW_SIZE;
    this.ttlMs = options.ttlMs ?? HANDLER_CONSTANTS.CONTEXT_TTL_MINUTES * 60 * 1000;
    this.pruneEvery = options.pruneEvery ?? HANDLER_CONSTANTS.CONTEXT_PRUNE_EVERY_WRITES;
    this.now = options.now ?? Date.now;
  }

  private getLive(userId: string): ContextEntry | undefined {
    const entry = this.contexts.get(userId);
    if (!entry) return undefined;
    if (this.now() - entry.lastActivity > this.ttlMs) {
      this.contexts.delete(userId);
      return undefined;
    }
    return entry;
  }

  private getOrCreate(userId: string): ContextEntry {
    this.writesSincePrune++;
    if (this.writesSincePrune >= this.pruneEvery) {
      this.prune();
    }
    const existing = this.getLive(userId);
    if (existing) return existing;
    const created: ContextEntry = { turns: [], lastLead: null, lastActivity: this.now() };
    this.contexts.set(userId, created);
    return created;
  }

  get(userId: string): ConversationSnapshot | undefined {
    const entry = this.getLive(userId);
    if (!entry) return undefined;
    return {
      userId,
      turns: [...entry.turns],
      lastLead: entry.lastLead,
      lastActivity: entry.lastActivity,
    };
  }

  previousIntent(userId: string): IntentLabel | undefined {
    const entry = this.getLive(userId);
    if (!entry || entry.turns.length === 0) return undefined;
    return entry.turns[entry.turns.length - 1].intent;
  }

  recentLead(userId: string): Lead | null {
    return this.getLive(userId)?.lastLead ?? null;
  }

  appendTurn(userId: string, turn: Omit<ConversationTurn, "timestamp">): void {
    const entry = this.getOrCreate(userId);
    const timestamp = this.now();
    entry.turns.push({ ...turn, timestamp });
    if (entry.turns.length > this.windowSize) {
      entry.turns.splice(0, entry.turns.length - this.windowSize);
    }
    entry.lastActivity = timestamp;
  }

  setLastLead(userId: string, lead: Lead): void {
    const entry = this.getOrCreate(userId);
    entry.lastLead = lead;
    entry.lastActivity = this.now();
  }

  clear(userId: string): void {
    this.contexts.delete(userId);
  }

  /**
   * Drops expired contexts. Returns how many were removed.
   */
  prune(): number {
    this.writesSincePrune = 0;
    const cutoff = this.now() - this.ttlMs;
    let removed = 0;
    this.contexts.forEach((entry, userId) => {
      if (entry.lastActivity < cutoff) {
        this.contexts.delete(userId);
        removed++;
      }
    });
    return removed;
  }

  activeUserCount(): number {
    this.prune();
    return this.contexts.size;
  }
}
