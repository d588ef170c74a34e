/**
 * Dispatcher Types
 *
 * The inbound Message and the Response envelope every message gets back.
 *
 * Layer: Dispatcher
 */

import type { Entity, IntentLabel } from "../decisionLayer/intent";
import type { IngestResult, KnowledgeResponse } from "../agents/knowledge/types";
import type { Lead, ProposalContent, ScheduleInfo, StatusClassification } from "../agents/dealflow/types";

export type MessageAttachment = {
  filename: string;
  text: string;
};

export type Message = Readonly<{
  text: string;
  hasAttachment: boolean;
  userId: string;
  requestId: string;
  attachment?: MessageAttachment;
}>;

export type ResponsePayload =
  | { kind: "knowledge_answer"; answer: KnowledgeResponse }
  | { kind: "ingest_result"; ingest: IngestResult }
  | { kind: "lead"; lead: Lead }
  | { kind: "proposal"; proposal: ProposalContent; basedOnLead: boolean }
  | { kind: "schedule"; schedule: ScheduleInfo }
  | { kind: "status"; status: StatusClassification }
  | { kind: "clarification"; message: string }
  | { kind: "reply"; message: string }
  | { kind: "error"; message: string }
  | { kind: "skipped"; reason: "duplicate" | "cancelled" };

export type ResponseErrorCode =
  | "llm_quota"
  | "llm_auth"
  | "timeout"
  | "contract_violation"
  | "invalid_input"
  | "internal"
  | "ingest_unavailable"
  | "empty_document"
  | "duplicate_request"
  | "cancelled";

export type ResponseError = {
  code: ResponseErrorCode;
  message: string;
  /** false: the payload is still usable (degraded), true: it is not */
  fatal: boolean;
};

export type AssistantResponse = {
  intent: IntentLabel;
  confidence: number;
  entities: Entity[];
  payload: ResponsePayload;
  requestId: string;
  error: ResponseError | null;
};
