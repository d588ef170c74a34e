export { AssistantHandler, type AssistantHandlerDeps, type HandlerMetrics } from "./assistantHandler";
export { Dispatcher, STATUS_CLARIFICATION, type DispatchContext, type DispatchOutcome, type DispatcherDeps } from "./dispatcher";
export { CANNED_REPLIES, pickCannedReply } from "./smalltalk";
export type {
  AssistantResponse,
  Message,
  MessageAttachment,
  ResponseError,
  ResponseErrorCode,
  ResponsePayload,
} from "./types";
