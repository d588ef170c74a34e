/**
 * Canned replies for smalltalk and unknown messages. No pipeline, no model.
 */

export const CANNED_REPLIES = {
  greeting: "Hi! I can answer questions from your documents, capture leads, draft proposals and schedule meetings. What do you need?",
  thanks: "You're welcome! Let me know if there's anything else.",
  capabilities: [
    "Here's what I can do:",
    "- Answer questions from the knowledge base (upload a document to add to it)",
    "- Capture a lead: \"Jane Doe from Globex wants a demo, budget $20k\"",
    "- Draft a proposal for the last lead you captured",
    "- Schedule a meeting: \"call with Sam tomorrow at 2pm\"",
    "- Log a deal outcome: \"we lost the Initech deal because of pricing\"",
  ].join("\n"),
  farewell: "Talk soon!",
  fallback: "I'm not sure I understand. Try asking about documents, capturing leads, or scheduling meetings!",
} as const;

export type CannedReplyKind = keyof typeof CANNED_REPLIES;

const REPLY_RULES: ReadonlyArray<[CannedReplyKind, RegExp]> = [
  ["capabilities", /\b(what can you do|help|who are you|what do you do)\b/i],
  ["thanks", /\b(thanks|thank you|thx|cheers|appreciate it)\b/i],
  ["farewell", /^\s*(bye|goodbye|see you|later)\b/i],
  ["greeting", /^\s*(hi|hello|hey|yo|good (morning|afternoon|evening))\b/i],
];

export function pickCannedReply(text: string): { kind: CannedReplyKind; message: string } {
  for (const [kind, pattern] of REPLY_RULES) {
    if (pattern.test(text)) return { kind, message: CANNED_REPLIES[kind] };
  }
  return { kind: "fallback", message: CANNED_REPLIES.fallback };
}
