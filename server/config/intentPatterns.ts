/**
 * Intent Pattern Table
 *
 * Keyword/regex rules for the pattern scorer. Patterns run against the
 * lowercased message. Each match adds its weight (default
 * CLASSIFICATION_CONSTANTS.PATTERN_MATCH_INCREMENT) to the label's score.
 *
 * This is tuning data: pass a different table to PatternScorer rather than
 * editing call sites.
 */

import type { IntentLabel } from "@shared/schema";

export interface IntentPattern {
  pattern: RegExp;
  description: string;
  weight?: number;
}

export type IntentPatternTable = Record<IntentLabel, readonly IntentPattern[]>;

const WEEKDAY = "(?:mon|tue|tues|wed|thu|thur|thurs|fri|sat|sun)(?:day|nesday|sday|urday)?";

export const DEFAULT_INTENT_PATTERNS: IntentPatternTable = {
  knowledge_qa: [
    { pattern: /^(what|how|where|when|why|who|which|is|are|does|do|can)\b/, description: "question opener" },
    { pattern: /\b(policy|policies|procedure|guideline|terms)\b/, description: "policy term" },
    { pattern: /\b(document|documents|docs|manual|handbook|faq|knowledge base|pdf)\b/, description: "document reference" },
    { pattern: /\b(tell me about|explain|look up|find out)\b/, description: "information request" },
  ],
  lead_capture: [
    { pattern: /\b[a-z]+ from [a-z0-9]/, description: "person from company" },
    { pattern: /\b(budget|budgeted)\b/, description: "budget mention" },
    { pattern: /\b(poc|proof of concept|pilot|trial|demo)\b/, description: "engagement request" },
    { pattern: /\$\s?\d|\b\d+(?:\.\d+)?\s?k\b/, description: "money amount" },
    { pattern: /\b(new lead|prospect|interested in|reached out)\b/, description: "lead vocabulary" },
    { pattern: /[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/, description: "email address" },
  ],
  proposal_request: [
    { pattern: /\bproposal\b/, description: "proposal" },
    { pattern: /\b(quote|quotation|pitch|offer)\b/, description: "quote or pitch" },
    { pattern: /\b(draft|write|prepare|send|generate|put together)\b.*\b(proposal|quote|pitch|offer)\b/, description: "drafting verb" },
  ],
  next_step: [
    { pattern: /\b(schedule|book|set up|arrange|reschedule)\b/, description: "scheduling verb" },
    { pattern: /\b(call|meeting|sync|catch[- ]up|follow[- ]up|demo)\b/, description: "meeting noun" },
    { pattern: new RegExp(`\\b(today|tomorrow|next week|(?:next\\s+)?${WEEKDAY})\\b`), description: "relative day" },
    { pattern: /\b\d{1,2}(:\d{2})?\s?(am|pm)\b|\bat \d{1,2}(:\d{2})?\b/, description: "clock time" },
  ],
  status_update: [
    { pattern: /\b(won|lost|signed)\b/, description: "outcome verb" },
    { pattern: /\bclosed[- ](won|lost)\b|\bdeal\b/, description: "deal outcome" },
    { pattern: /\b(on hold|paused|postponed|delayed|stalled)\b/, description: "deal paused" },
    { pattern: /\bstatus\b/, description: "status" },
  ],
  smalltalk: [
    { pattern: /^(hi|hello|hey|yo|good (morning|afternoon|evening))\b/, description: "greeting" },
    { pattern: /\b(thanks|thank you|thx|cheers)\b/, description: "thanks" },
    { pattern: /\b(how are you|what can you do|who are you|help me)\b/, description: "chit-chat" },
    { pattern: /^(bye|goodbye|see you)\b/, description: "farewell" },
  ],
  unknown: [],
};
