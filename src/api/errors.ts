import type { ZodIssue } from "zod";

export class ChmsApiError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    readonly body?: unknown
  ) {
    super(message);
    this.name = "ChmsApiError";
  }
}

export class BadParameterError extends Error {
  constructor(readonly parameters: string[]) {
    super(`Unexpected parameter(s): ${parameters.join(",")}`);
    this.name = "BadParameterError";
  }
}

export class PayloadValidationError extends Error {
  constructor(
    readonly payload: string,
    readonly issues: ZodIssue[]
  ) {
    const first = issues[0];
    const where = first ? ` at ${first.path.join(".") || "<root>"}: ${first.message}` : "";
    super(`Invalid ${payload} payload${where}`);
    this.name = "PayloadValidationError";
  }
}
