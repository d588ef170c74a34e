/**
 * Proposal Generator
 *
 * Template proposal from a lead (or a generic one without a lead), with an
 * optional model draft. Whatever the model returns is forced back into shape:
 * title names the company, summary is bounded, at least three bullets.
 *
 * Layer: Agents (dealflow)
 */

import { z } from "zod";
import { DEALFLOW_CONSTANTS } from "../../config/constants";
import { buildProposalPrompt } from "../../config/prompts";
import type { TextCompletion } from "../../services/collaborators";
import { getErrorMessage } from "../../utils/errorHandler";
import { parseModelJson } from "../../utils/jsonResponse";
import { withTimeout } from "../../utils/timeout";
import { UNKNOWN, isKnown, type Lead, type ProposalContent } from "./types";

export const GENERIC_PROPOSAL: ProposalContent = {
  title: "Custom Business Proposal",
  summary: "A tailored proposal outlining how we can support your business goals. Share the prospect's details to personalize it.",
  bulletPoints: [
    "Tailored solution for your business needs",
    "Dedicated project manager",
    "Flexible implementation timeline",
  ],
};

function truncateSummary(summary: string): string {
  const max = DEALFLOW_CONSTANTS.PROPOSAL_SUMMARY_MAX_CHARS;
  const trimmed = summary.trim();
  if (trimmed.length <= max) return trimmed;
  return `${trimmed.slice(0, max - 3).trimEnd()}...`;
}

export function buildTemplateProposal(lead: Lead | null): ProposalContent {
  if (!lead || !isKnown(lead.company)) {
    return { ...GENERIC_PROPOSAL, bulletPoints: [...GENERIC_PROPOSAL.bulletPoints] };
  }

  const company = lead.company;
  const recipient = isKnown(lead.name) ? `${lead.name} at ${company}` : company;
  const summaryParts = [
    `Prepared for ${recipient}.`,
    isKnown(lead.intent)
      ? `This proposal responds to your ${lead.intent.toLowerCase()} and outlines a tailored engagement.`
      : "This proposal outlines a tailored engagement for your team.",
  ];
  if (isKnown(lead.timeline)) summaryParts.push(`Target timeline: ${lead.timeline}.`);

  const bulletPoints = [
    `Tailored solution aligned to ${company}'s goals`,
    "Dedicated project manager for the engagement",
    isKnown(lead.timeline) ? `Delivery plan targeting ${lead.timeline}` : "30-day implementation timeline",
    "24/7 support",
    "Flexible payment terms",
  ];
  if (isKnown(lead.budget)) bulletPoints.push(`Scope sized to a budget of ${lead.budget}`);

  return {
    title: `Proposal for ${company}`,
    summary: truncateSummary(summaryParts.join(" ")),
    bulletPoints,
  };
}

/**
 * Repairs a drafted proposal so it satisfies the proposal contract, using the
 * template to fill gaps.
 */
export function enforceProposalShape(draft: ProposalContent, lead: Lead | null): ProposalContent {
  const template = buildTemplateProposal(lead);
  const company = lead && isKnown(lead.company) ? lead.company : null;

  let title = draft.title.trim() || template.title;
  if (company && !title.toLowerCase().includes(company.toLowerCase())) {
    title = `${company}: ${title}`;
  }

  const summary = truncateSummary(draft.summary.trim() || template.summary);

  const bulletPoints = draft.bulletPoints.map(b => b.trim()).filter(b => b.length > 0);
  for (const bullet of template.bulletPoints) {
    if (bulletPoints.length >= DEALFLOW_CONSTANTS.PROPOSAL_MIN_BULLETS) break;
    if (!bulletPoints.includes(bullet)) bulletPoints.push(bullet);
  }

  return { title, summary, bulletPoints };
}

const proposalDraftSchema = z.object({
  title: z.string(),
  summary: z.string(),
  bulletPoints: z.array(z.string()),
});

export async function generateProposal(
  lead: Lead | null,
  completion: TextCompletion | undefined,
  timeoutMs: number,
): Promise<ProposalContent> {
  const template = buildTemplateProposal(lead);
  if (!completion || !lead || !isKnown(lead.company)) {
    return template;
  }

  const prompt = buildProposalPrompt({
    company: lead.company,
    name: lead.name || UNKNOWN,
    intent: lead.intent || UNKNOWN,
    budget: lead.budget || UNKNOWN,
    timeline: lead.timeline || UNKNOWN,
    maxSummaryChars: DEALFLOW_CONSTANTS.PROPOSAL_SUMMARY_MAX_CHARS,
  });

  try {
    const content = await withTimeout(
      () => completion.complete(prompt, DEALFLOW_CONSTANTS.PROPOSAL_MAX_TOKENS),
      timeoutMs,
      "proposal generation",
    );
    const parsed = parseModelJson(content, proposalDraftSchema);
    if (!parsed.success) {
      console.warn(`[ProposalGenerator] Unusable draft, using template: ${parsed.error}`);
      return template;
    }
    return enforceProposalShape(parsed.data, lead);
  } catch (error) {
    console.warn(`[ProposalGenerator] Draft failed, using template: ${getErrorMessage(error)}`);
    return template;
  }
}
