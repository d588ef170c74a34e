import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class TimeoutError extends Error implements AppError {
  statusCode = 504;
  code = "timeout";
  isOperational = true;
  operation: string;
  timeoutMs: number;
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A pipeline step received input that breaks its contract (a required field
 * missing or malformed). Indicates a bug upstream, not bad user input.
 */
export class ContractViolationError extends Error implements AppError {
  statusCode = 500;
  code = "contract_violation";
  isOperational = false;
  step: string;
  constructor(step: string, message: string) {
    super(`${step}: ${message}`);
    this.name = "ContractViolationError";
    this.step = step;
  }
}

function readProperty(error: unknown, key: "statusCode" | "status" | "code"): unknown {
  if (typeof error === "object" && error !== null && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  const statusCode = readProperty(error, "statusCode");
  if (typeof statusCode === "number") {
    return statusCode;
  }
  return 500;
}

export function handleRouteError(
  res: Response,
  error: unknown,
  context?: string,
): void {
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessage(error);

  if (statusCode >= 500 && context) {
    console.error(`[${context}] Error:`, error);
  }

  res.status(statusCode).json({ error: message });
}

export function logError(context: string, error: unknown): void {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;
  console.error(`[${context}] ${message}`, stack ? `\n${stack}` : "");
}

export type PipelineErrorType =
  | "llm_quota"
  | "llm_auth"
  | "timeout"
  | "contract_violation"
  | "invalid_input"
  | "internal";

export interface ClassifiedError {
  type: PipelineErrorType;
  userMessage: string;
  errorMessage: string;
  errorCode: string | number | undefined;
  stack: string | undefined;
}

/**
 * Maps anything thrown inside a pipeline to a stable error type and a
 * message that is safe to show the user.
 */
export function classifyPipelineError(err: unknown): ClassifiedError {
  const errorMessage = getErrorMessage(err);
  const rawCode = readProperty(err, "code") ?? readProperty(err, "statusCode") ?? readProperty(err, "status");
  const errorCode = typeof rawCode === "string" || typeof rawCode === "number" ? rawCode : undefined;
  const stack = err instanceof Error ? err.stack : undefined;

  if (err instanceof ContractViolationError) {
    return {
      type: "contract_violation",
      userMessage: "Sorry, something went wrong while processing that request.",
      errorMessage, errorCode, stack,
    };
  }

  if (err instanceof ValidationError || err instanceof ZodError) {
    return {
      type: "invalid_input",
      userMessage: "I couldn't make sense of that input. Could you rephrase it?",
      errorMessage, errorCode, stack,
    };
  }

  if (err instanceof TimeoutError) {
    return {
      type: "timeout",
      userMessage: "That took too long to process. Please try again in a moment.",
      errorMessage, errorCode, stack,
    };
  }

  if (errorCode === "insufficient_quota" || errorCode === 429 ||
    errorMessage.includes("exceeded your current quota") ||
    errorMessage.includes("rate limit")) {
    return {
      type: "llm_quota",
      userMessage: "I can't process this right now because the AI service quota has been exceeded. Please contact an admin.",
      errorMessage, errorCode, stack,
    };
  }

  if (errorCode === 401 || errorMessage.includes("Incorrect API key") ||
    errorMessage.includes("invalid_api_key")) {
    return {
      type: "llm_auth",
      userMessage: "I can't process this right now because the AI service is misconfigured. Please contact an admin.",
      errorMessage, errorCode, stack,
    };
  }

  return {
    type: "internal",
    userMessage: "Sorry, I hit an internal error while processing that request.",
    errorMessage, errorCode, stack,
  };
}
