import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

// ============================================================================
// HTTP errors
// ============================================================================

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  isOperational = true;
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

export class ExternalServiceError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  service: string;
  constructor(service: string, message: string) {
    super(`${service} error: ${message}`);
    this.name = "ExternalServiceError";
    this.service = service;
  }
}

// ============================================================================
// Collaborator errors
// ============================================================================

export type DataStoreErrorKind = "syntax" | "permission" | "timeout" | "connection" | "unknown";

export class DataStoreError extends Error implements AppError {
  kind: DataStoreErrorKind;
  code?: string;
  constructor(kind: DataStoreErrorKind, message: string, code?: string) {
    super(message);
    this.name = "DataStoreError";
    this.kind = kind;
    this.code = code;
  }
}

/**
 * Transport failure or timeout of a text completion call.
 */
export class TextCompletionError extends ExternalServiceError {
  constructor(provider: string, message: string) {
    super(provider, message);
    this.name = "TextCompletionError";
  }
}

/**
 * The completion call succeeded but its output did not match the requested schema.
 */
export class StructuredOutputError extends Error implements AppError {
  rawText: string;
  constructor(message: string, rawText: string) {
    super(message);
    this.name = "StructuredOutputError";
    this.rawText = rawText;
  }
}

// ============================================================================
// Pipeline errors
// ============================================================================

/**
 * The supervisor could not produce one of the known routes.
 * Recovered by falling back to the conversational route.
 */
export class RoutingAnomaly extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RoutingAnomaly";
  }
}

/**
 * A candidate query was rejected by the validator. The violations are fed back
 * to the next generation attempt.
 */
export class ValidationFailure extends Error {
  violations: string[];
  constructor(violations: string[]) {
    super(violations.join("; "));
    this.name = "ValidationFailure";
    this.violations = violations;
  }
}

export class ExecutionFailure extends Error {
  kind: DataStoreErrorKind;
  cause: DataStoreError;
  constructor(cause: DataStoreError) {
    super(cause.message);
    this.name = "ExecutionFailure";
    this.kind = cause.kind;
    this.cause = cause;
  }
}

export class GenerationFailure extends Error {
  cause: unknown;
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "GenerationFailure";
    this.cause = cause;
  }
}

export class RetryExhausted extends Error {
  attempts: number;
  lastFeedback: string;
  constructor(attempts: number, lastFeedback: string) {
    super(`Query failed after ${attempts} attempts: ${lastFeedback}`);
    this.name = "RetryExhausted";
    this.attempts = attempts;
    this.lastFeedback = lastFeedback;
  }
}

export class SynthesisFailure extends Error {
  cause: unknown;
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "SynthesisFailure";
    this.cause = cause;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function readStatusCode(error: unknown): number | undefined {
  if (error instanceof Error && "statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  if (error instanceof Error && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

function readErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
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
  return readStatusCode(error) ?? 500;
}

export function handleRouteError(res: Response, error: unknown, context?: string): void {
  const statusCode = getErrorStatusCode(error);
  const message = statusCode >= 500 ? classifyPipelineError(error).userMessage : getErrorMessage(error);

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

export interface ClassifiedError {
  type: "llm_quota" | "llm_auth" | "data_store" | "internal";
  userMessage: string;
  errorMessage: string;
  errorCode: string | number | undefined;
  stack: string | undefined;
}

/**
 * Maps an unexpected pipeline error to a message that is safe to show a user.
 * Never includes stack traces or raw driver output.
 */
export function classifyPipelineError(err: unknown): ClassifiedError {
  const errorMessage = err instanceof Error ? err.message : String(err);
  const errorCode = readErrorCode(err) ?? readStatusCode(err);
  const stack = err instanceof Error ? err.stack : undefined;

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
    errorMessage.includes("invalid_api_key") || errorMessage.includes("API_KEY is not set")) {
    return {
      type: "llm_auth",
      userMessage: "I can't process this right now because of an issue with the AI service configuration. Please contact an admin.",
      errorMessage, errorCode, stack,
    };
  }

  if (err instanceof DataStoreError || errorMessage.includes("DATABASE_URL")) {
    return {
      type: "data_store",
      userMessage: "I couldn't reach the communications database. Please try again shortly.",
      errorMessage, errorCode, stack,
    };
  }

  return {
    type: "internal",
    userMessage: "Sorry, I hit an internal error while processing that request.",
    errorMessage, errorCode, stack,
  };
}
