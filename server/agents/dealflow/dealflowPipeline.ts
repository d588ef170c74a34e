/**
 * Dealflow Pipeline
 *
 * Purpose:
 * The sales-side steps behind lead_capture, proposal_request, next_step and
 * status_update. Each step takes typed input and returns a typed result;
 * the dispatcher chains them.
 *
 * Steps:
 * - parseLead → enrichLead
 * - generateProposal
 * - parseSchedule
 * - classifyStatus
 *
 * Layer: Agents (dealflow)
 */

import { TIMEOUT_CONSTANTS } from "../../config/constants";
import { EntityExtractor } from "../../decisionLayer/entityExtractor";
import type { TextCompletion } from "../../services/collaborators";
import { enrichLead, extractLeadFields, fillMissingLeadFields } from "./leadEnrichment";
import { generateProposal } from "./proposalGenerator";
import { parseSchedule } from "./scheduleParser";
import { classifyStatus } from "./statusClassifier";
import type {
  Lead,
  ParsedLead,
  ProposalContent,
  ScheduleInfo,
  StatusClassification,
  StatusLabel,
} from "./types";

export interface DealflowPipelineDeps {
  extractor?: EntityExtractor;
  textCompletion?: TextCompletion;
  timeoutMs?: number;
  now?: () => Date;
}

export class DealflowPipeline {
  private readonly extractor: EntityExtractor;
  private readonly textCompletion?: TextCompletion;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(deps: DealflowPipelineDeps = {}) {
    this.extractor = deps.extractor ?? new EntityExtractor();
    this.textCompletion = deps.textCompletion;
    this.timeoutMs = deps.timeoutMs ?? TIMEOUT_CONSTANTS.COLLABORATOR_TIMEOUT_MS;
    this.now = deps.now ?? (() => new Date());
  }

  async parseLead(text: string): Promise<ParsedLead> {
    const lead = extractLeadFields(text, this.extractor);
    if (!this.textCompletion) return lead;
    return fillMissingLeadFields(lead, text, this.textCompletion, this.timeoutMs);
  }

  enrichLead(lead: ParsedLead): Lead {
    return enrichLead(lead);
  }

  /**
   * parseLead → enrichLead
   */
  async captureLead(text: string): Promise<Lead> {
    return this.enrichLead(await this.parseLead(text));
  }

  generateProposal(lead: Lead | null): Promise<ProposalContent> {
    return generateProposal(lead, this.textCompletion, this.timeoutMs);
  }

  parseSchedule(text: string, now: Date = this.now()): ScheduleInfo {
    return parseSchedule(text, now);
  }

  classifyStatus(label: StatusLabel, reasonText: string): Promise<StatusClassification> {
    return classifyStatus(label, reasonText, this.textCompletion, this.timeoutMs);
  }
}
