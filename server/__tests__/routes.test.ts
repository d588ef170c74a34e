import { describe, it, expect } from "vitest";
import { inboundMessageSchema } from "@shared/schema";
import { toMessage } from "../routes";

describe("toMessage", () => {
  it("keeps the caller's request id", () => {
    const message = toMessage(inboundMessageSchema.parse({ text: "hi", userId: "user-1", requestId: "req-1" }));
    expect(message).toEqual({ text: "hi", userId: "user-1", requestId: "req-1", hasAttachment: false });
  });

  it("generates a request id when none is given", () => {
    const message = toMessage(inboundMessageSchema.parse({ text: "hi", userId: "user-1" }));
    expect(message.requestId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it("treats an attached document as an attachment even without the flag", () => {
    const message = toMessage(inboundMessageSchema.parse({
      userId: "user-1",
      requestId: "req-2",
      attachment: { filename: "notes.md", text: "# Notes" },
    }));
    expect(message.hasAttachment).toBe(true);
    expect(message.text).toBe("");
    expect(message.attachment).toEqual({ filename: "notes.md", text: "# Notes" });
  });
});
