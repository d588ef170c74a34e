/**
 * Dispatcher
 *
 * Purpose:
 * Routes a classified message to exactly one pipeline entry point and wraps
 * the result in the response envelope. Nothing thrown by a pipeline step
 * escapes: it becomes an error response that still carries the attempted
 * intent and request id.
 *
 * Routing:
 * - knowledge_qa      → ingest (attachment) or ask
 * - lead_capture      → parseLead → enrichLead (a follow-up reuses the lead in context)
 * - proposal_request  → generateProposal (most recent lead, else generic)
 * - next_step         → parseSchedule
 * - status_update     → classifyStatus (clarification when no label found)
 * - smalltalk/unknown → canned reply
 *
 * Layer: Dispatcher
 */

import type { DealflowPipeline } from "../agents/dealflow/dealflowPipeline";
import { extractStatusReason, inferStatusLabel } from "../agents/dealflow/statusClassifier";
import type { Lead } from "../agents/dealflow/types";
import type { KnowledgePipeline } from "../agents/knowledge/knowledgePipeline";
import type { KnowledgeDocument } from "../agents/knowledge/types";
import type { IntentResult } from "../decisionLayer/intent";
import { classifyPipelineError } from "../utils/errorHandler";
import { pickCannedReply } from "./smalltalk";
import type { AssistantResponse, Message, ResponseError, ResponsePayload } from "./types";

export const STATUS_CLARIFICATION =
  "Was the deal won, lost, or put on hold? Tell me the outcome and the reason, e.g. \"we lost Initech because of pricing\".";

const INGEST_UNAVAILABLE_MESSAGE = "I couldn't store that document right now. Please try uploading it again later.";
const EMPTY_DOCUMENT_MESSAGE = "That document didn't contain any text I could read.";

export interface DispatchContext {
  recentLead: Lead | null;
}

export interface DispatchOutcome {
  response: AssistantResponse;
  capturedLead?: Lead;
}

type StepResult = {
  payload: ResponsePayload;
  error?: ResponseError;
  capturedLead?: Lead;
};

export interface DispatcherDeps {
  knowledge: KnowledgePipeline;
  dealflow: DealflowPipeline;
  now?: () => Date;
}

function slugify(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-|-$/g, "");
}

export class Dispatcher {
  private readonly knowledge: KnowledgePipeline;
  private readonly dealflow: DealflowPipeline;
  private readonly now: () => Date;

  constructor(deps: DispatcherDeps) {
    this.knowledge = deps.knowledge;
    this.dealflow = deps.dealflow;
    this.now = deps.now ?? (() => new Date());
  }

  async dispatch(result: IntentResult, message: Message, context: DispatchContext): Promise<DispatchOutcome> {
    const envelope = {
      intent: result.intent,
      confidence: result.confidence,
      entities: [...result.entities],
      requestId: message.requestId,
    };

    try {
      const step = await this.runStep(result, message, context);
      return {
        response: { ...envelope, payload: step.payload, error: step.error ?? null },
        capturedLead: step.capturedLead,
      };
    } catch (error) {
      const classified = classifyPipelineError(error);
      console.error(`[Dispatcher] ${result.intent} failed for ${message.requestId}: ${classified.errorMessage}`);
      return {
        response: {
          ...envelope,
          payload: { kind: "error", message: classified.userMessage },
          error: { code: classified.type, message: classified.userMessage, fatal: true },
        },
      };
    }
  }

  private async runStep(result: IntentResult, message: Message, context: DispatchContext): Promise<StepResult> {
    switch (result.intent) {
      case "knowledge_qa":
        return message.hasAttachment ? this.ingest(message) : this.ask(message);

      case "lead_capture": {
        // An acknowledgement ("yes", "sounds good") confirms the lead already in context.
        if (result.decisionMetadata.isFollowUp && context.recentLead) {
          return { payload: { kind: "lead", lead: context.recentLead } };
        }
        const lead = await this.dealflow.captureLead(message.text);
        return { payload: { kind: "lead", lead }, capturedLead: lead };
      }

      case "proposal_request": {
        const proposal = await this.dealflow.generateProposal(context.recentLead);
        return { payload: { kind: "proposal", proposal, basedOnLead: context.recentLead !== null } };
      }

      case "next_step":
        return { payload: { kind: "schedule", schedule: this.dealflow.parseSchedule(message.text, this.now()) } };

      case "status_update": {
        const label = inferStatusLabel(message.text);
        if (!label) {
          return { payload: { kind: "clarification", message: STATUS_CLARIFICATION } };
        }
        const status = await this.dealflow.classifyStatus(label, extractStatusReason(message.text));
        return { payload: { kind: "status", status } };
      }

      case "smalltalk":
      case "unknown":
        return { payload: { kind: "reply", message: pickCannedReply(message.text).message } };
    }
  }

  private async ingest(message: Message): Promise<StepResult> {
    const document: KnowledgeDocument = message.attachment
      ? {
          text: message.attachment.text,
          title: message.attachment.filename,
          sourceId: `${slugify(message.attachment.filename) || "document"}-${message.requestId}`,
        }
      : { text: message.text };

    const ingest = await this.knowledge.ingest(document, message.requestId);
    if (ingest.status === "unavailable") {
      return {
        payload: { kind: "ingest_result", ingest },
        error: { code: "ingest_unavailable", message: INGEST_UNAVAILABLE_MESSAGE, fatal: false },
      };
    }
    if (ingest.status === "empty") {
      return {
        payload: { kind: "ingest_result", ingest },
        error: { code: "empty_document", message: EMPTY_DOCUMENT_MESSAGE, fatal: false },
      };
    }
    return { payload: { kind: "ingest_result", ingest } };
  }

  private async ask(message: Message): Promise<StepResult> {
    const answer = await this.knowledge.ask(message.text, message.requestId);
    return { payload: { kind: "knowledge_answer", answer } };
  }
}
