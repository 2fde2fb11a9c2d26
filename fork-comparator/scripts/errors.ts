import type { FailKind } from "./types";

export abstract class ComparatorError extends Error {
  abstract readonly kind: FailKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The model process could not be started (missing binary, bad cwd, permissions). */
export class SpawnError extends ComparatorError {
  readonly kind = "SPAWN_ERROR" as const;
  command: string;

  constructor(command: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to start model process "${command}": ${reason}`, { cause });
    this.command = command;
  }
}

export class InvocationTimeoutError extends ComparatorError {
  readonly kind = "INVOCATION_TIMEOUT" as const;
  timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Model invocation timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class InvocationAbortedError extends ComparatorError {
  readonly kind = "INVOCATION_ABORTED" as const;

  constructor() {
    super("Model invocation aborted");
  }
}

export class NoPayloadFoundError extends ComparatorError {
  readonly kind = "NO_PAYLOAD_FOUND" as const;

  constructor() {
    super("No JSON found in LLM output");
  }
}

export class PayloadParseError extends ComparatorError {
  readonly kind = "PARSE_ERROR" as const;

  constructor(detail: string, cause?: unknown) {
    super(`Invalid JSON payload: ${detail}`, { cause });
  }
}

export class MalformedFieldError extends ComparatorError {
  readonly kind = "MALFORMED_FIELD" as const;
  field: string;

  constructor(field: string, detail: string) {
    super(`Malformed field "${field}": ${detail}`);
    this.field = field;
  }
}

export class BudgetExceededError extends ComparatorError {
  readonly kind = "BUDGET_CUTOFF" as const;

  constructor(reason: string) {
    super(`Stopped by budget policy: ${reason}`);
  }
}
