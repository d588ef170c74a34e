/**
 * Deal Status Classifier
 *
 * Maps a Won / Lost / On Hold label plus a free-text reason to one reason
 * category. Keyword rules first; an optional model pass may override them
 * when it returns an allowed category.
 *
 * Layer: Agents (dealflow)
 */

import { z } from "zod";
import { STATUS_LABELS, type StatusLabel } from "@shared/schema";
import { DEALFLOW_CONSTANTS } from "../../config/constants";
import { buildStatusReasonPrompt } from "../../config/prompts";
import type { TextCompletion } from "../../services/collaborators";
import { ContractViolationError, getErrorMessage } from "../../utils/errorHandler";
import { parseModelJson } from "../../utils/jsonResponse";
import { withTimeout } from "../../utils/timeout";
import {
  STATUS_REASON_CATEGORIES,
  type StatusClassification,
  type StatusReasonCategory,
} from "./types";

const SUMMARY_MAX_CHARS = 200;

const CATEGORY_KEYWORDS: ReadonlyArray<[StatusReasonCategory, RegExp]> = [
  ["price", /\b(price|pricing|expensive|cost|costs|cheaper|discount)\b/i],
  ["budget", /\b(budget|budgets|funding|afford|money)\b/i],
  ["timeline", /\b(timeline|timing|deadline|too late|next quarter|next year)\b/i],
  ["competition", /\b(competitor|competitors|competition|went with|chose|alternative|another vendor)\b/i],
  ["features", /\b(feature|features|functionality|capabilit(?:y|ies)|integration|missing)\b/i],
  ["fit", /\b(fit|requirements?|use case|not a match)\b/i],
  ["relationship", /\b(relationship|trust|rapport|champion|loved the team|liked the team)\b/i],
  ["internal_approval", /\b(approval|approve|legal|procurement|sign-?off|board|security review)\b/i],
  ["priorities", /\b(priority|priorities|reorg|reorganization|focus|shifted)\b/i],
];

const DEFAULT_CATEGORY: Record<StatusLabel, StatusReasonCategory> = {
  "Won": "relationship",
  "Lost": "fit",
  "On Hold": "priorities",
};

const LABEL_PHRASE: Record<StatusLabel, string> = {
  "Won": "Deal won",
  "Lost": "Deal lost",
  "On Hold": "Deal put on hold",
};

const LABEL_RULES: ReadonlyArray<[StatusLabel, RegExp]> = [
  ["Lost", /\bclosed[- ]lost\b/i],
  ["Won", /\bclosed[- ]won\b/i],
  ["On Hold", /\b(on hold|paused|postponed|delayed|stalled|pushed (?:back|out)|on ice)\b/i],
  ["Lost", /\b(lost|cancell?ed|rejected|declined|went with|passed on|walked away)\b/i],
  ["Won", /\b(won|signed|closed|awarded)\b/i],
];

/**
 * Reads a Won / Lost / On Hold label out of free text, or null.
 */
export function inferStatusLabel(text: string): StatusLabel | null {
  for (const [label, pattern] of LABEL_RULES) {
    if (pattern.test(text)) return label;
  }
  return null;
}

/**
 * The part of a status message that explains why, if it says.
 */
export function extractStatusReason(text: string): string {
  const match = /\b(?:because(?: of)?|due to|since|reason:?)\s+(.+)$/i.exec(text.trim());
  return (match ? match[1] : text).trim();
}

export function categorizeReason(label: StatusLabel, reasonText: string): StatusReasonCategory {
  let best: StatusReasonCategory | null = null;
  let bestHits = 0;
  for (const [category, pattern] of CATEGORY_KEYWORDS) {
    const hits = reasonText.match(new RegExp(pattern.source, "gi"))?.length ?? 0;
    if (hits > bestHits) {
      best = category;
      bestHits = hits;
    }
  }
  return best ?? DEFAULT_CATEGORY[label];
}

export function summarizeReason(label: StatusLabel, reasonText: string): string {
  const firstSentence = reasonText.trim().split(/(?<=[.!?])\s+/)[0]?.replace(/[.!?]+$/, "") ?? "";
  if (!firstSentence) {
    return `${LABEL_PHRASE[label]}; no reason given.`;
  }
  const summary = `${LABEL_PHRASE[label]}: ${firstSentence}`;
  return summary.length > SUMMARY_MAX_CHARS ? `${summary.slice(0, SUMMARY_MAX_CHARS - 3)}...` : summary;
}

const statusReasonSchema = z.object({
  reasonCategory: z.enum(STATUS_REASON_CATEGORIES),
  reasonSummary: z.string().min(1),
});

const statusLabelSchema = z.enum(STATUS_LABELS);

export async function classifyStatus(
  label: StatusLabel,
  reasonText: string,
  completion: TextCompletion | undefined,
  timeoutMs: number,
): Promise<StatusClassification> {
  const labelCheck = statusLabelSchema.safeParse(label);
  if (!labelCheck.success) {
    throw new ContractViolationError("classifyStatus", `unsupported status label "${String(label)}"`);
  }
  const checkedLabel = labelCheck.data;

  const fallback: StatusClassification = {
    label: checkedLabel,
    reasonCategory: categorizeReason(checkedLabel, reasonText),
    reasonSummary: summarizeReason(checkedLabel, reasonText),
  };

  if (!completion || !reasonText.trim()) {
    return fallback;
  }

  try {
    const content = await withTimeout(
      () => completion.complete(
        buildStatusReasonPrompt({ label: checkedLabel, reasonText, categories: STATUS_REASON_CATEGORIES }),
        DEALFLOW_CONSTANTS.STATUS_MAX_TOKENS,
      ),
      timeoutMs,
      "status classification",
    );
    const parsed = parseModelJson(content, statusReasonSchema);
    if (!parsed.success) {
      console.warn(`[StatusClassifier] Unusable model output, using keywords: ${parsed.error}`);
      return fallback;
    }
    return {
      label: checkedLabel,
      reasonCategory: parsed.data.reasonCategory,
      reasonSummary: parsed.data.reasonSummary.trim() || fallback.reasonSummary,
    };
  } catch (error) {
    console.warn(`[StatusClassifier] Model call failed, using keywords: ${getErrorMessage(error)}`);
    return fallback;
  }
}
