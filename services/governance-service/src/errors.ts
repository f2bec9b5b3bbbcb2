import type { ZodIssue } from "zod";

export type GovernanceErrorCode = "VALIDATION" | "NOT_FOUND" | "CONFLICT";

export class GovernanceError extends Error {
  constructor(
    message: string,
    public readonly code: GovernanceErrorCode,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = "GovernanceError";
  }
}

export class ValidationError extends GovernanceError {
  constructor(
    message: string,
    public readonly issues: ZodIssue[] = []
  ) {
    super(message, "VALIDATION", 400);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends GovernanceError {
  constructor(message: string) {
    super(message, "NOT_FOUND", 404);
    this.name = "NotFoundError";
  }
}

export class ConflictError extends GovernanceError {
  constructor(message: string) {
    super(message, "CONFLICT", 409);
    this.name = "ConflictError";
  }
}

export type ErrorResult = {
  status: "ERROR";
  code: GovernanceErrorCode;
  message: string;
  issues?: ZodIssue[];
};

export function toErrorResult(error: GovernanceError): ErrorResult {
  if (error instanceof ValidationError && error.issues.length > 0) {
    return { status: "ERROR", code: error.code, message: error.message, issues: error.issues };
  }
  return { status: "ERROR", code: error.code, message: error.message };
}

export function statusCodeFor(code: GovernanceErrorCode): number {
  switch (code) {
    case "VALIDATION":
      return 400;
    case "NOT_FOUND":
      return 404;
    case "CONFLICT":
      return 409;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
