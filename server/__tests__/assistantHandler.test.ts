import { describe, it, expect, vi } from "vitest";
import { buildAssistant } from "../composition";
import { loadConfig } from "../config/env";
import { CANCELLED_REQUEST_MESSAGE, DUPLICATE_REQUEST_MESSAGE } from "../dispatcher/assistantHandler";
import { CANNED_REPLIES } from "../dispatcher/smalltalk";
import type { Message } from "../dispatcher/types";
import type { PersistedEntity, PersistenceSink } from "../services/collaborators";
import { MemoryKnowledgeStore } from "../services/memoryKnowledgeStore";

// Wednesday, 15 January 2025, 09:00 local time
const NOW = new Date(2025, 0, 15, 9, 0);
const LEAD_TEXT = "John Smith from Acme Corp wants a PoC in September, budget around 10k";

function setup(sink?: PersistenceSink) {
  const store = new MemoryKnowledgeStore();
  const config = loadConfig({ NODE_ENV: "test", LLM_ENABLED: "false" });
  const assistant = buildAssistant(config, {
    chunkStore: store,
    retriever: store,
    persistence: sink ?? store,
    now: () => NOW,
  });
  return { ...assistant, store };
}

function message(text: string, requestId: string, userId = "user-1", extra: Partial<Message> = {}): Message {
  return { text, requestId, userId, hasAttachment: false, ...extra };
}

describe("AssistantHandler", () => {
  it("answers a knowledge question from an uploaded document", async () => {
    const { handler } = setup();
    const policy = "Our refund policy: refunds are issued within 30 days of purchase.";

    const upload = await handler.handle(
      message("", "req-up", "user-1", { hasAttachment: true, attachment: { filename: "refunds.txt", text: policy } }),
    );
    expect(upload.intent).toBe("knowledge_qa");
    expect(upload.confidence).toBe(0.95);
    expect(upload.payload).toEqual({ kind: "ingest_result", ingest: { chunkCount: 1, tokenCount: 11, status: "stored" } });

    const response = await handler.handle(message("What is your refund policy?", "req-q", "user-2"));
    expect(response.intent).toBe("knowledge_qa");
    expect(response.confidence).toBeCloseTo(0.6);
    expect(response.error).toBeNull();
    expect(response.payload).toEqual({
      kind: "knowledge_answer",
      answer: {
        answer: `Based on the knowledge base: ${policy}`,
        citations: [{ title: "refunds.txt", sourceId: "refunds-txt-req-up", snippet: policy }],
        confidence: 0.2,
      },
    });
  });

  it("captures a lead and drafts a proposal from it", async () => {
    const { handler, contextStore } = setup();

    const lead = await handler.handle(message(LEAD_TEXT, "req-lead"));
    expect(lead.intent).toBe("lead_capture");
    expect(lead.confidence).toBe(1);
    expect(lead.payload).toMatchObject({
      kind: "lead",
      lead: { name: "John Smith", company: "Acme Corp", qualityScore: 0.9 },
    });
    expect(contextStore.recentLead("user-1")?.company).toBe("Acme Corp");

    const proposal = await handler.handle(message("Draft a proposal for them", "req-prop"));
    expect(proposal.intent).toBe("proposal_request");
    expect(proposal.payload).toMatchObject({
      kind: "proposal",
      basedOnLead: true,
      proposal: { title: "Proposal for Acme Corp" },
    });
  });

  it("keeps the captured lead when the user only acknowledges it", async () => {
    const { handler, contextStore } = setup();
    await handler.handle(message(LEAD_TEXT, "req-lead"));

    const ack = await handler.handle(message("yes", "req-ack"));
    expect(ack.intent).toBe("lead_capture");
    expect(ack.confidence).toBeCloseTo(0.6);
    expect(ack.payload).toMatchObject({ kind: "lead", lead: { company: "Acme Corp" } });
    expect(contextStore.recentLead("user-1")?.company).toBe("Acme Corp");

    const proposal = await handler.handle(message("Draft a proposal for them", "req-prop"));
    expect(proposal.payload).toMatchObject({
      kind: "proposal",
      basedOnLead: true,
      proposal: { title: "Proposal for Acme Corp" },
    });
  });

  it("schedules against the injected clock", async () => {
    const { handler } = setup();
    const response = await handler.handle(message("Schedule a call next Tue at 10:00 with Dana about refunds", "req-sched"));

    expect(response.intent).toBe("next_step");
    expect(response.confidence).toBe(1);
    expect(response.payload).toEqual({
      kind: "schedule",
      schedule: {
        title: "Call with Dana about refunds",
        startTimestamp: new Date(2025, 0, 21, 10, 0),
        endTimestamp: new Date(2025, 0, 21, 11, 0),
        attendees: ["Dana"],
      },
    });
  });

  it("falls back to a canned reply for unmatched chatter", async () => {
    const { handler } = setup();
    const response = await handler.handle(message("I like pizza", "req-pizza"));

    expect(response).toEqual({
      intent: "smalltalk",
      confidence: 0.5,
      entities: [],
      requestId: "req-pizza",
      payload: { kind: "reply", message: CANNED_REPLIES.fallback },
      error: null,
    });
  });

  it("serialises messages from the same user", async () => {
    const { handler } = setup();
    const [lead, proposal] = await Promise.all([
      handler.handle(message(LEAD_TEXT, "req-1")),
      handler.handle(message("Draft a proposal for them", "req-2")),
    ]);

    expect(lead.payload.kind).toBe("lead");
    expect(proposal.payload).toMatchObject({ kind: "proposal", basedOnLead: true });
  });

  it("keeps conversations separate per user", async () => {
    const { handler } = setup();
    await handler.handle(message(LEAD_TEXT, "req-1", "user-1"));
    const proposal = await handler.handle(message("Draft a proposal for them", "req-2", "user-2"));
    expect(proposal.payload).toMatchObject({ kind: "proposal", basedOnLead: false });
  });

  it("answers a repeated request id without re-running it", async () => {
    const { handler } = setup();
    await handler.handle(message(LEAD_TEXT, "req-dup"));
    const repeat = await handler.handle(message(LEAD_TEXT, "req-dup"));

    expect(repeat).toEqual({
      intent: "unknown",
      confidence: 0,
      entities: [],
      requestId: "req-dup",
      payload: { kind: "skipped", reason: "duplicate" },
      error: { code: "duplicate_request", message: DUPLICATE_REQUEST_MESSAGE, fatal: true },
    });
    expect(handler.getMetrics()).toMatchObject({ totalRequests: 1, duplicates: 1 });
  });

  it("skips a request cancelled before it started", async () => {
    const { handler } = setup();
    expect(handler.cancel("req-c")).toBe(true);

    const response = await handler.handle(message(LEAD_TEXT, "req-c"));
    expect(response.payload).toEqual({ kind: "skipped", reason: "cancelled" });
    expect(response.error).toEqual({ code: "cancelled", message: CANCELLED_REQUEST_MESSAGE, fatal: true });
    expect(handler.cancel("req-c")).toBe(false);
  });

  it("skips a request cancelled while queued behind the same user", async () => {
    const { handler } = setup();
    const first = handler.handle(message(LEAD_TEXT, "req-1"));
    const second = handler.handle(message("Draft a proposal for them", "req-2"));
    expect(handler.cancel("req-2")).toBe(true);

    expect((await first).payload.kind).toBe("lead");
    expect((await second).payload).toEqual({ kind: "skipped", reason: "cancelled" });
    expect(handler.getMetrics().cancelled).toBe(1);
  });

  it("persists the interaction and the captured lead", async () => {
    const { handler, store } = setup();
    await handler.handle(message(LEAD_TEXT, "req-lead"));
    await handler.flushPersistence();

    const records = store.getRecords();
    expect(records.map(r => r.kind)).toEqual(["interaction", "lead"]);
    expect(records[0]).toMatchObject({
      kind: "interaction",
      requestId: "req-lead",
      userId: "user-1",
      intent: "lead_capture",
      responseKind: "lead",
      errorCode: null,
    });
  });

  it("never lets a persistence failure reach the response", async () => {
    const record = vi.fn<(entity: PersistedEntity) => Promise<void>>().mockRejectedValue(new Error("db down"));
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const { handler } = setup({ record });

    const response = await handler.handle(message(LEAD_TEXT, "req-lead"));
    await handler.flushPersistence();

    expect(response.payload.kind).toBe("lead");
    expect(response.error).toBeNull();
    expect(record).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenCalled();
    errorSpy.mockRestore();
  });

  it("reports metrics across requests", async () => {
    const { handler } = setup();
    await handler.handle(message("I like pizza", "req-1", "user-1"));
    await handler.handle(message("What is your refund policy?", "req-2", "user-2"));

    const metrics = handler.getMetrics();
    expect(metrics).toMatchObject({
      totalRequests: 2,
      byIntent: { smalltalk: 1, knowledge_qa: 1 },
      errorsByCode: {},
      duplicates: 0,
      cancelled: 0,
      activeUsers: 2,
    });
    expect(metrics.averageLatencyMs).toBeGreaterThanOrEqual(0);
  });
});
