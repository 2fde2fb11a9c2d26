import { ComparatorError } from "./errors";
import type { FailKind, FailureInfo } from "./types";

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function classifyFailure(error: unknown): FailureInfo {
  if (error instanceof ComparatorError) {
    return { kind: error.kind, message: error.message };
  }
  const message = errorMessage(error);
  const lowered = message.toLowerCase();
  if (error instanceof SyntaxError) {
    return { kind: "PARSE_ERROR", message };
  }
  if (lowered.includes("github api") || lowered.includes("fetch failed")) {
    return { kind: "FETCH_FAILED", message };
  }
  return { kind: "UNKNOWN", message };
}

export function emptyFailTaxonomy(): Record<FailKind, number> {
  return {
    SPAWN_ERROR: 0,
    INVOCATION_TIMEOUT: 0,
    INVOCATION_ABORTED: 0,
    NO_PAYLOAD_FOUND: 0,
    PARSE_ERROR: 0,
    MALFORMED_FIELD: 0,
    FETCH_FAILED: 0,
    BUDGET_CUTOFF: 0,
    UNKNOWN: 0,
  };
}

export function failureHints(kind: FailKind): string[] {
  switch (kind) {
    case "SPAWN_ERROR":
      return ["Check that the model command is installed and on PATH"];
    case "INVOCATION_TIMEOUT":
      return ["Raise llm.compareTimeoutMs", "Lower forkConcurrency so the model is not oversubscribed"];
    case "NO_PAYLOAD_FOUND":
    case "PARSE_ERROR":
      return ["Inspect raw model output in analysis.log", "Try llm.extraction=balanced"];
    case "MALFORMED_FIELD":
      return ["The model returned a field of the wrong type; tighten the prompt or switch models"];
    case "FETCH_FAILED":
      return ["Check GITHUB_TOKEN scopes", "Check API rate limit", "Retry later"];
    case "BUDGET_CUTOFF":
      return ["Increase budget limits or reduce maxForks"];
    default:
      return [];
  }
}
