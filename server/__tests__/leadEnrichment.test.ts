import { describe, it, expect, vi } from "vitest";
import {
  computeQualityScore,
  detectLeadIntent,
  detectTimeline,
  enrichLead,
  extractLeadFields,
  fillMissingLeadFields,
  isValidEmail,
  isValidPhone,
  normalizeDomain,
} from "../agents/dealflow/leadEnrichment";
import { DealflowPipeline } from "../agents/dealflow/dealflowPipeline";
import { UNKNOWN, type ParsedLead } from "../agents/dealflow/types";
import { EntityExtractor } from "../decisionLayer/entityExtractor";
import { ContractViolationError } from "../utils/errorHandler";

const EMPTY_LEAD: ParsedLead = {
  name: UNKNOWN,
  company: UNKNOWN,
  email: UNKNOWN,
  phone: UNKNOWN,
  intent: UNKNOWN,
  budget: UNKNOWN,
  timeline: UNKNOWN,
  notes: "",
};

describe("extractLeadFields", () => {
  const extractor = new EntityExtractor();

  it("parses the classic lead sentence", () => {
    const lead = extractLeadFields("John Smith from Acme Corp wants a PoC in September, budget around 10k", extractor);
    expect(lead).toMatchObject({
      name: "John Smith",
      company: "Acme Corp",
      email: UNKNOWN,
      phone: UNKNOWN,
      intent: "PoC request",
      budget: "10k",
      timeline: "September",
    });
  });

  it("falls back to self-introductions and affiliations", () => {
    const lead = extractLeadFields("Hi, my name is Priya Patel and I work for Umbrella Health. Call 212-555-0142.", extractor);
    expect(lead.name).toBe("Priya Patel");
    expect(lead.company).toBe("Umbrella Health");
    expect(lead.phone).toBe("(212) 555-0142");
  });

  it("marks everything it cannot find as unknown", () => {
    const lead = extractLeadFields("someone might be interested", extractor);
    expect(lead).toEqual({ ...EMPTY_LEAD, notes: "someone might be interested" });
  });
});

describe("detectLeadIntent / detectTimeline", () => {
  it("maps engagement keywords", () => {
    expect(detectLeadIntent("they want a pilot")).toBe("Pilot request");
    expect(detectLeadIntent("asked for a quote")).toBe("Proposal request");
    expect(detectLeadIntent("nothing here")).toBe(UNKNOWN);
  });

  it("reads months, quarters and relative periods", () => {
    expect(detectTimeline("go live by march 2026")).toBe("March 2026");
    expect(detectTimeline("targeting Q3")).toBe("Q3");
    expect(detectTimeline("need it ASAP")).toBe("ASAP");
    expect(detectTimeline("start Next Quarter")).toBe("next quarter");
    expect(detectTimeline("kickoff in 3 weeks")).toBe("in 3 weeks");
    expect(detectTimeline("we may do it")).toBe(UNKNOWN);
  });
});

describe("normalizeDomain", () => {
  it("keeps informal Corp in the name", () => {
    expect(normalizeDomain("Acme Corp")).toBe("acmecorp.com");
  });

  it("drops formal legal designators", () => {
    expect(normalizeDomain("Acme, Inc.")).toBe("acme.com");
    expect(normalizeDomain("Globex LLC")).toBe("globex.com");
    expect(normalizeDomain("Acme Corp.")).toBe("acme.com");
    expect(normalizeDomain("Initech, Co")).toBe("initech.com");
    expect(normalizeDomain("Stark Industries GmbH")).toBe("starkindustries.com");
  });

  it("strips punctuation and case", () => {
    expect(normalizeDomain("Ben & Jerry's")).toBe("benjerrys.com");
  });

  it("returns null for empty or unknown companies", () => {
    expect(normalizeDomain("")).toBeNull();
    expect(normalizeDomain(UNKNOWN)).toBeNull();
    expect(normalizeDomain("!!!")).toBeNull();
  });
});

describe("contact validation", () => {
  it("validates emails", () => {
    expect(isValidEmail("jane@globex.com")).toBe(true);
    expect(isValidEmail("jane@@globex.com")).toBe(false);
    expect(isValidEmail("jane..doe@globex.com")).toBe(false);
    expect(isValidEmail(UNKNOWN)).toBe(false);
  });

  it("validates North American phone numbers", () => {
    expect(isValidPhone("(212) 555-0142")).toBe(true);
    expect(isValidPhone("+1 212 555 0142")).toBe(true);
    expect(isValidPhone("(112) 555-0142")).toBe(false);
    expect(isValidPhone("555-0142")).toBe(false);
  });
});

describe("computeQualityScore", () => {
  it("is zero for an empty lead and capped at one", () => {
    expect(computeQualityScore(EMPTY_LEAD)).toBe(0);
    expect(computeQualityScore({
      name: "Jane", company: "Globex", email: "jane@globex.com", phone: "(212) 555-0142",
      intent: "Demo request", budget: "$20k", timeline: "Q3", notes: "",
    })).toBe(1);
  });

  it("never decreases when a field is added", () => {
    const fields = ["name", "company", "email", "intent", "budget", "timeline"] as const;
    let lead: ParsedLead = { ...EMPTY_LEAD };
    let previous = computeQualityScore(lead);
    for (const field of fields) {
      lead = { ...lead, [field]: "present" };
      const next = computeQualityScore(lead);
      expect(next).toBeGreaterThanOrEqual(previous);
      previous = next;
    }
  });

  it("counts email or phone once as contact", () => {
    const withEmail = computeQualityScore({ ...EMPTY_LEAD, email: "a@b.com" });
    const withBoth = computeQualityScore({ ...EMPTY_LEAD, email: "a@b.com", phone: "(212) 555-0142" });
    expect(withEmail).toBe(0.2);
    expect(withBoth).toBe(0.2);
  });
});

describe("enrichLead", () => {
  it("adds domain, validity flags and score", () => {
    const lead = enrichLead({ ...EMPTY_LEAD, name: "Jane Doe", company: "Globex, Inc.", email: "jane@globex.com" });
    expect(lead.normalizedDomain).toBe("globex.com");
    expect(lead.emailValidity).toBe(true);
    expect(lead.phoneValidity).toBe(false);
    expect(lead.qualityScore).toBe(0.65);
  });

  it("rejects blank fields as a contract violation", () => {
    expect(() => enrichLead({ ...EMPTY_LEAD, company: "" })).toThrow(ContractViolationError);
  });
});

describe("fillMissingLeadFields", () => {
  const text = "Talked to someone at Hooli about a rollout, roughly $40k";

  it("only fills fields that were unknown, and only with grounded values", async () => {
    const complete = vi.fn<(prompt: string, maxTokens: number) => Promise<string>>().mockResolvedValue(
      JSON.stringify({ name: "Gavin Belson", company: "Hooli", intent: "Rollout", budget: "n/a", timeline: null }),
    );
    const lead = { ...EMPTY_LEAD, budget: "$40k" };

    const filled = await fillMissingLeadFields(lead, text, { complete }, 1000);

    expect(filled.company).toBe("Hooli");
    expect(filled.name).toBe(UNKNOWN);
    expect(filled.intent).toBe("Rollout");
    expect(filled.budget).toBe("$40k");
    expect(filled.timeline).toBe(UNKNOWN);
    expect(complete.mock.calls[0][0]).toContain("Only fill these fields: name, company, intent, timeline.");
  });

  it("returns the lead unchanged when the model fails", async () => {
    const complete = vi.fn<(prompt: string, maxTokens: number) => Promise<string>>().mockRejectedValue(new Error("down"));
    const filled = await fillMissingLeadFields(EMPTY_LEAD, text, { complete }, 1000);
    expect(filled).toEqual(EMPTY_LEAD);
  });
});

describe("DealflowPipeline.captureLead", () => {
  it("scores the classic lead sentence above 0.8", async () => {
    const lead = await new DealflowPipeline().captureLead(
      "John Smith from Acme Corp wants a PoC in September, budget around 10k",
    );
    expect(lead.name).toBe("John Smith");
    expect(lead.company).toBe("Acme Corp");
    expect(lead.budget).toContain("10k");
    expect(lead.normalizedDomain).toBe("acmecorp.com");
    expect(lead.qualityScore).toBe(0.9);
  });
});
