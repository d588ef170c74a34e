/**
 * Lead Parsing and Enrichment
 *
 * parse: rule-based field extraction from free text, every missing field
 * set to UNKNOWN. An optional model pass may fill fields the rules missed.
 * enrich: domain guess, contact validation and the quality score.
 *
 * Layer: Agents (dealflow)
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { DEALFLOW_CONSTANTS } from "../../config/constants";
import { buildLeadExtractionPrompt } from "../../config/prompts";
import type { EntityExtractor } from "../../decisionLayer/entityExtractor";
import type { Entity } from "../../decisionLayer/intent";
import type { TextCompletion } from "../../services/collaborators";
import { ContractViolationError, getErrorMessage } from "../../utils/errorHandler";
import { parseModelJson } from "../../utils/jsonResponse";
import { withTimeout } from "../../utils/timeout";
import { UNKNOWN, isKnown, type Lead, type ParsedLead } from "./types";

const NOTES_MAX_CHARS = 500;

const INTENT_KEYWORDS: ReadonlyArray<[RegExp, string]> = [
  [/\b(poc|proof of concept)\b/i, "PoC request"],
  [/\bpilot\b/i, "Pilot request"],
  [/\bdemo\b/i, "Demo request"],
  [/\btrial\b/i, "Trial request"],
  [/\b(proposal|quote|quotation)\b/i, "Proposal request"],
  [/\bintegrat(e|ion)\b/i, "Integration inquiry"],
  [/\b(pricing|price)\b/i, "Pricing inquiry"],
];

const MONTHS = "january|february|march|april|may|june|july|august|september|october|november|december";

const TIMELINE_RULES: ReadonlyArray<{ pattern: RegExp; format: (m: RegExpExecArray) => string }> = [
  {
    pattern: new RegExp(`\\b(?:in|by|before|until|starting|from|early|mid|late|end of)\\s+(${MONTHS})(?:\\s+(\\d{4}))?\\b`, "i"),
    format: m => [capitalize(m[1]), m[2]].filter(Boolean).join(" "),
  },
  {
    pattern: /\bq([1-4])(?:\s+(\d{4}))?\b/i,
    format: m => [`Q${m[1]}`, m[2]].filter(Boolean).join(" "),
  },
  {
    pattern: /\b(asap|as soon as possible|immediately)\b/i,
    format: () => "ASAP",
  },
  {
    pattern: /\b((?:this|next) (?:week|month|quarter|year)|end of (?:the )?(?:month|quarter|year))\b/i,
    format: m => m[1].toLowerCase(),
  },
  {
    pattern: /\bin (\d+) (days?|weeks?|months?)\b/i,
    format: m => `in ${m[1]} ${m[2].toLowerCase()}`,
  },
];

const SELF_INTRO_NAME = /\b(?:my name is|this is|i am|i'm)\s+([A-Z][a-z]+(?:\s+[A-Z][a-z]+)?)/;
const COMPANY_AFFILIATION = /\b(?:at|works? for|working at|representing)\s+([A-Z][A-Za-z0-9&'-]*(?:\s+[A-Z][A-Za-z0-9&'-]*){0,3})/;

const EMAIL_VALID = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)*\.[A-Za-z]{2,}$/;

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

function firstEntity(entities: readonly Entity[], type: Entity["type"]): string | undefined {
  return entities.find(e => e.type === type)?.value;
}

export function detectLeadIntent(text: string): string {
  for (const [pattern, label] of INTENT_KEYWORDS) {
    if (pattern.test(text)) return label;
  }
  return UNKNOWN;
}

export function detectTimeline(text: string): string {
  for (const rule of TIMELINE_RULES) {
    const match = rule.pattern.exec(text);
    if (match) return rule.format(match);
  }
  return UNKNOWN;
}

/**
 * Rule-only lead parse.
 */
export function extractLeadFields(text: string, extractor: EntityExtractor): ParsedLead {
  const entities = extractor.extract(text);

  const name = firstEntity(entities, "name") ?? SELF_INTRO_NAME.exec(text)?.[1];
  const company = firstEntity(entities, "company") ?? COMPANY_AFFILIATION.exec(text)?.[1];

  return {
    name: name ?? UNKNOWN,
    company: company ?? UNKNOWN,
    email: firstEntity(entities, "email") ?? UNKNOWN,
    phone: firstEntity(entities, "phone") ?? UNKNOWN,
    intent: detectLeadIntent(text),
    budget: firstEntity(entities, "money") ?? UNKNOWN,
    timeline: detectTimeline(text),
    notes: text.trim().slice(0, NOTES_MAX_CHARS),
  };
}

const FILLABLE_FIELDS = ["name", "company", "intent", "budget", "timeline"] as const;
type FillableField = typeof FILLABLE_FIELDS[number];

const leadFillSchema = z.object({
  name: z.string().nullable().optional(),
  company: z.string().nullable().optional(),
  intent: z.string().nullable().optional(),
  budget: z.string().nullable().optional(),
  timeline: z.string().nullable().optional(),
});

function acceptFill(field: FillableField, value: string, sourceText: string): boolean {
  if (!isKnown(value)) return false;
  // Names and companies must appear verbatim; anything else is a guess
  if (field === "name" || field === "company") {
    return sourceText.toLowerCase().includes(value.toLowerCase());
  }
  if (field === "budget") {
    return /\d/.test(value);
  }
  return true;
}

/**
 * Asks the model only for fields the rules left UNKNOWN. Any failure leaves
 * the lead as it was.
 */
export async function fillMissingLeadFields(
  lead: ParsedLead,
  text: string,
  completion: TextCompletion,
  timeoutMs: number,
): Promise<ParsedLead> {
  const missing = FILLABLE_FIELDS.filter(field => !isKnown(lead[field]));
  if (missing.length === 0) return lead;

  let content: string;
  try {
    content = await withTimeout(
      () => completion.complete(buildLeadExtractionPrompt({ text, missingFields: [...missing] }), DEALFLOW_CONSTANTS.LEAD_PARSE_MAX_TOKENS),
      timeoutMs,
      "lead extraction",
    );
  } catch (error) {
    console.warn(`[LeadEnrichment] Model fill skipped: ${getErrorMessage(error)}`);
    return lead;
  }

  const parsed = parseModelJson(content, leadFillSchema);
  if (!parsed.success) {
    console.warn(`[LeadEnrichment] Model fill unusable: ${parsed.error}`);
    return lead;
  }

  const filled: ParsedLead = { ...lead };
  for (const field of missing) {
    const value = parsed.data[field]?.trim();
    if (value && acceptFill(field, value, text)) {
      filled[field] = value;
    }
  }
  return filled;
}

// Always dropped when trailing; "corp"/"co" only when written formally
const LEGAL_SUFFIXES = new Set(["inc", "llc", "ltd", "incorporated", "corporation", "gmbh", "plc", "limited", "llp"]);
const FORMAL_ONLY_SUFFIXES = new Set(["corp", "co"]);

/**
 * Company name → guessed domain. "Acme Corp" → "acmecorp.com",
 * "Acme, Inc." → "acme.com", "" → null.
 */
export function normalizeDomain(company: string): string | null {
  if (!isKnown(company)) return null;

  const tokens = company.trim().split(/\s+/);
  while (tokens.length > 1) {
    const last = tokens[tokens.length - 1];
    const bare = last.toLowerCase().replace(/[^a-z0-9]/g, "");
    const previous = tokens[tokens.length - 2];
    const formal = last.endsWith(".") || previous.endsWith(",");
    if (LEGAL_SUFFIXES.has(bare) || (FORMAL_ONLY_SUFFIXES.has(bare) && formal)) {
      tokens.pop();
      continue;
    }
    break;
  }

  const base = tokens.join("").toLowerCase().replace(/[^a-z0-9]/g, "");
  return base ? `${base}.com` : null;
}

export function isValidEmail(email: string): boolean {
  return isKnown(email) && EMAIL_VALID.test(email.trim()) && !email.includes("..");
}

/**
 * North American numbers only: ten digits (optional leading 1), area code and
 * exchange starting 2-9.
 */
export function isValidPhone(phone: string): boolean {
  if (!isKnown(phone)) return false;
  let digits = phone.replace(/\D/g, "");
  if (digits.length === 11 && digits.startsWith("1")) digits = digits.slice(1);
  return /^[2-9]\d{2}[2-9]\d{6}$/.test(digits);
}

export function computeQualityScore(lead: ParsedLead): number {
  const w = DEALFLOW_CONSTANTS.QUALITY_WEIGHTS;
  let score = 0;
  if (isKnown(lead.name)) score += w.name;
  if (isKnown(lead.company)) score += w.company;
  if (isKnown(lead.email) || isKnown(lead.phone)) score += w.contact;
  if (isKnown(lead.intent)) score += w.intent;
  if (isKnown(lead.budget)) score += w.budget;
  if (isKnown(lead.timeline)) score += w.timeline;
  return Math.round(Math.min(1, score) * 100) / 100;
}

const parsedLeadSchema = z.object({
  name: z.string().min(1),
  company: z.string().min(1),
  email: z.string().min(1),
  phone: z.string().min(1),
  intent: z.string().min(1),
  budget: z.string().min(1),
  timeline: z.string().min(1),
  notes: z.string(),
});

/**
 * Throws ContractViolationError when a required field is missing or blank:
 * absent values must arrive as UNKNOWN.
 */
export function enrichLead(input: ParsedLead): Lead {
  const result = parsedLeadSchema.safeParse(input);
  if (!result.success) {
    throw new ContractViolationError("enrichLead", fromZodError(result.error).message);
  }
  const lead = result.data;

  return {
    ...lead,
    normalizedDomain: normalizeDomain(lead.company),
    emailValidity: isValidEmail(lead.email),
    phoneValidity: isValidPhone(lead.phone),
    qualityScore: computeQualityScore(lead),
  };
}
