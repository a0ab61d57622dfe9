import type { RunId } from "./ids.js";

/** Bad or missing input detected before anything is executed. Never retried. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class PolicyDeniedError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = "PolicyDeniedError";
  }
}

export class ConflictError extends Error {
  constructor(
    message: string,
    readonly activeRunId: RunId
  ) {
    super(message);
    this.name = "ConflictError";
  }
}

/** The strategy could not start the runner process or container. */
export class ExecutionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExecutionError";
  }
}

export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
