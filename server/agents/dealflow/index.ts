export { DealflowPipeline, type DealflowPipelineDeps } from "./dealflowPipeline";
export {
  computeQualityScore,
  detectLeadIntent,
  detectTimeline,
  enrichLead,
  extractLeadFields,
  isValidEmail,
  isValidPhone,
  normalizeDomain,
} from "./leadEnrichment";
export { GENERIC_PROPOSAL, buildTemplateProposal, enforceProposalShape } from "./proposalGenerator";
export { parseSchedule, extractAttendees, buildMeetingTitle } from "./scheduleParser";
export { inferStatusLabel, extractStatusReason, categorizeReason, summarizeReason } from "./statusClassifier";
export {
  UNKNOWN,
  isKnown,
  STATUS_REASON_CATEGORIES,
  type Lead,
  type ParsedLead,
  type ProposalContent,
  type ScheduleInfo,
  type StatusClassification,
  type StatusLabel,
  type StatusReasonCategory,
} from "./types";
