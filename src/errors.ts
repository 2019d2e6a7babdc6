// PitchScoop - Error taxonomy
// Every failure surfaced through a tool carries a machine-readable code and the
// HTTP status the server answers with. Anything that is not a PitchScoopError
// is reported as INTERNAL_ERROR with its message hidden.

import type { ToolErrorBody } from "./types.js";

export class PitchScoopError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = "PitchScoopError";
    this.statusCode = statusCode;
    this.code = code;
  }

  toJSON(): ToolErrorBody {
    return { code: this.code, message: this.message };
  }
}

/** 400: missing or malformed arguments. */
export class ValidationError extends PitchScoopError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 400, "VALIDATION_ERROR");
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/** 403: a record was addressed under an event it does not belong to. */
export class IsolationError extends PitchScoopError {
  constructor(message: string) {
    super(message, 403, "ISOLATION_VIOLATION");
    this.name = "IsolationError";
  }
}

export type NotFoundCode =
  | "SESSION_NOT_FOUND"
  | "EVENT_NOT_FOUND"
  | "SCORES_NOT_FOUND"
  | "AUDIO_NOT_FOUND";

/** 404: unknown session, event, score or audio. */
export class NotFoundError extends PitchScoopError {
  constructor(code: NotFoundCode, message: string) {
    super(message, 404, code);
    this.name = "NotFoundError";
  }
}

export type StateErrorCode =
  | "INVALID_SESSION_STATE"
  | "INVALID_EVENT_STATE"
  | "SESSION_NOT_COMPLETED"
  | "EVENT_NOT_ACTIVE"
  | "MISSING_TRANSCRIPT";

/** 409: the operation is not valid in the resource's current lifecycle state. */
export class StateError extends PitchScoopError {
  constructor(code: StateErrorCode, message: string) {
    super(message, 409, code);
    this.name = "StateError";
  }
}

/** 422: completion output was not strict JSON or lacked required fields. */
export class ParseError extends PitchScoopError {
  readonly path: string | null;

  constructor(message: string, path: string | null = null) {
    super(message, 422, "PARSE_ERROR");
    this.name = "ParseError";
    this.path = path;
  }
}

/** 502: the completion client failed, timed out or returned nothing. */
export class ExternalServiceError extends PitchScoopError {
  readonly service: string;

  constructor(service: string, message: string, options?: { cause?: unknown }) {
    super(message, 502, "COMPLETION_FAILED");
    this.name = "ExternalServiceError";
    this.service = service;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Normalizes any thrown value into the error body returned to callers.
 * Unknown errors never leak their message.
 */
export function toErrorBody(err: unknown): { statusCode: number; body: ToolErrorBody } {
  if (err instanceof PitchScoopError) {
    return { statusCode: err.statusCode, body: err.toJSON() };
  }
  return {
    statusCode: 500,
    body: { code: "INTERNAL_ERROR", message: "Internal server error" },
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
