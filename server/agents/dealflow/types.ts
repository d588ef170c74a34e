import type { StatusLabel } from "@shared/schema";

export type { StatusLabel } from "@shared/schema";

/**
 * Placeholder for a lead field nobody provided. Pipeline steps always receive
 * a string; they compare against this instead of guessing at blanks.
 */
export const UNKNOWN = "unknown";

export function isKnown(value: string | null | undefined): value is string {
  return typeof value === "string" && value.trim() !== "" && value.trim().toLowerCase() !== UNKNOWN;
}

export type ParsedLead = {
  name: string;
  company: string;
  email: string;
  phone: string;
  intent: string;
  budget: string;
  timeline: string;
  notes: string;
};

export type Lead = ParsedLead & {
  normalizedDomain: string | null;
  emailValidity: boolean;
  phoneValidity: boolean;
  qualityScore: number;
};

export type ProposalContent = {
  title: string;
  summary: string;
  bulletPoints: string[];
};

export type ScheduleInfo = {
  title: string;
  startTimestamp: Date;
  endTimestamp: Date;
  attendees: string[];
};

export const STATUS_REASON_CATEGORIES = [
  "price",
  "budget",
  "timeline",
  "competition",
  "features",
  "fit",
  "relationship",
  "internal_approval",
  "priorities",
] as const;
export type StatusReasonCategory = typeof STATUS_REASON_CATEGORIES[number];

export type StatusClassification = {
  label: StatusLabel;
  reasonCategory: StatusReasonCategory;
  reasonSummary: string;
};
