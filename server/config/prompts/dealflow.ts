/**
 * Dealflow Prompts
 *
 * Lead field extraction, proposal drafting and deal status reasoning.
 * Every prompt asks for JSON; responses are validated before use.
 */

export function buildLeadExtractionPrompt(params: {
  text: string;
  missingFields: string[];
}): string {
  return `Extract prospect details from the message below.
Only fill these fields: ${params.missingFields.join(", ")}.
Use null for anything not stated in the message. Do not guess.

Respond with JSON only:
{ ${params.missingFields.map((f) => `"${f}": string | null`).join(", ")} }

MESSAGE:
"""
${params.text}
"""`;
}

export function buildProposalPrompt(params: {
  company: string;
  name: string;
  intent: string;
  budget: string;
  timeline: string;
  maxSummaryChars: number;
}): string {
  return `Draft a short sales proposal outline for a prospect.

PROSPECT:
- Company: ${params.company}
- Contact: ${params.name}
- Interest: ${params.intent}
- Budget: ${params.budget}
- Timeline: ${params.timeline}

Values marked "unknown" were not provided; do not invent them.

Respond with JSON only:
{
  "title": "<must include the company name>",
  "summary": "<at most ${params.maxSummaryChars} characters>",
  "bulletPoints": ["<3 to 6 concise bullets>"]
}`;
}

export function buildStatusReasonPrompt(params: {
  label: string;
  reasonText: string;
  categories: readonly string[];
}): string {
  return `A deal was marked "${params.label}". Classify the reason.

Allowed categories: ${params.categories.join(", ")}

REASON GIVEN:
"""
${params.reasonText}
"""

Respond with JSON only:
{ "reasonCategory": "<one allowed category>", "reasonSummary": "<one sentence>" }`;
}
