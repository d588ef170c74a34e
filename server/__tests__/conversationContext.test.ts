import { describe, it, expect } from "vitest";
import { ConversationContextStore } from "../decisionLayer/conversationContext";
import type { Lead } from "../agents/dealflow/types";

const LEAD: Lead = {
  name: "Jane Doe",
  company: "Globex",
  email: "jane@globex.com",
  phone: "unknown",
  intent: "Demo request",
  budget: "$20k",
  timeline: "unknown",
  notes: "Jane Doe from Globex wants a demo, budget $20k, jane@globex.com",
  normalizedDomain: "globex.com",
  emailValidity: true,
  phoneValidity: false,
  qualityScore: 1,
};

function turn(text: string, intent: "smalltalk" | "next_step" | "lead_capture" = "smalltalk") {
  return { text, intent, confidence: 0.5, entities: [] };
}

describe("ConversationContextStore", () => {
  it("has no context for an unseen user", () => {
    const store = new ConversationContextStore();
    expect(store.get("u1")).toBeUndefined();
    expect(store.previousIntent("u1")).toBeUndefined();
    expect(store.recentLead("u1")).toBeNull();
  });

  it("returns the intent of the most recent turn", () => {
    const store = new ConversationContextStore();
    store.appendTurn("u1", turn("hi"));
    store.appendTurn("u1", turn("book a call", "next_step"));
    expect(store.previousIntent("u1")).toBe("next_step");
  });

  it("keeps only the last windowSize turns", () => {
    const store = new ConversationContextStore({ windowSize: 3 });
    for (const text of ["one", "two", "three", "four", "five"]) {
      store.appendTurn("u1", turn(text));
    }
    expect(store.get("u1")?.turns.map(t => t.text)).toEqual(["three", "four", "five"]);
  });

  it("keeps users separate", () => {
    const store = new ConversationContextStore();
    store.appendTurn("u1", turn("book a call", "next_step"));
    store.setLastLead("u2", LEAD);
    expect(store.previousIntent("u2")).toBeUndefined();
    expect(store.recentLead("u1")).toBeNull();
    expect(store.recentLead("u2")).toEqual(LEAD);
  });

  it("expires a context idle for longer than the TTL", () => {
    let now = 1_000;
    const store = new ConversationContextStore({ ttlMs: 500, now: () => now });
    store.appendTurn("u1", turn("book a call", "next_step"));
    store.setLastLead("u1", LEAD);

    now = 1_500;
    expect(store.previousIntent("u1")).toBe("next_step");

    now = 1_501;
    expect(store.previousIntent("u1")).toBeUndefined();
    expect(store.recentLead("u1")).toBeNull();
  });

  it("prunes expired users and reports active ones", () => {
    let now = 0;
    const store = new ConversationContextStore({ ttlMs: 100, now: () => now });
    store.appendTurn("old", turn("hi"));
    now = 80;
    store.appendTurn("fresh", turn("hi"));
    now = 150;
    expect(store.activeUserCount()).toBe(1);
    expect(store.get("fresh")).toBeDefined();
  });

  it("sweeps expired users during writes without a metrics read", () => {
    let now = 0;
    const store = new ConversationContextStore({ ttlMs: 1_000, pruneEvery: 100, now: () => now });
    for (let i = 0; i < 5_000; i++) {
      store.appendTurn(`user-${i}`, turn("hi"));
    }

    now = 10_000;
    for (let i = 0; i < 100; i++) {
      store.appendTurn("late-user", turn("hi"));
    }

    expect(store.prune()).toBe(0);
    expect(store.activeUserCount()).toBe(1);
  });

  it("leaves expired users in place until the write threshold is reached", () => {
    let now = 0;
    const store = new ConversationContextStore({ ttlMs: 1_000, pruneEvery: 100, now: () => now });
    for (let i = 0; i < 50; i++) {
      store.appendTurn(`user-${i}`, turn("hi"));
    }

    now = 10_000;
    store.appendTurn("late-user", turn("hi"));

    expect(store.prune()).toBe(50);
  });

  it("snapshots are copies", () => {
    const store = new ConversationContextStore();
    store.appendTurn("u1", turn("hi"));
    const snapshot = store.get("u1");
    store.appendTurn("u1", turn("again"));
    expect(snapshot?.turns).toHaveLength(1);
  });

  it("clear forgets a user", () => {
    const store = new ConversationContextStore();
    store.appendTurn("u1", turn("hi"));
    store.clear("u1");
    expect(store.get("u1")).toBeUndefined();
  });
});
