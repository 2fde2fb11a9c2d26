import type { ZodError } from "zod";
import { MalformedFieldError, PayloadParseError } from "../errors";
import type { ComparisonResult, ExtractionMode, QualityAnalysis } from "../types";
import { extractPayload } from "./extract";
import { ComparisonPayloadSchema, QualityPayloadSchema } from "./schemas";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function parsePayload(text: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new PayloadParseError(error instanceof Error ? error.message : String(error), error);
  }
  if (!isPlainObject(parsed)) {
    throw new PayloadParseError(`expected a JSON object, got ${Array.isArray(parsed) ? "array" : typeof parsed}`);
  }
  return parsed;
}

function firstIssueAsError(error: ZodError): MalformedFieldError {
  const issue = error.issues[0];
  const field = issue?.path.map(String).join(".") || "(root)";
  return new MalformedFieldError(field, issue?.message ?? error.message);
}

/**
 * Fills absent fields with their defaults. A present field of the wrong type
 * is rejected rather than passed through, so a normalized result always has
 * the declared types.
 */
export function normalizeComparison(payload: Record<string, unknown>): ComparisonResult {
  const parsed = ComparisonPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw firstIssueAsError(parsed.error);
  }
  return parsed.data;
}

export function normalizeQuality(payload: Record<string, unknown>): QualityAnalysis {
  const parsed = QualityPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw firstIssueAsError(parsed.error);
  }
  return parsed.data;
}

export function failureComparison(cause: string): ComparisonResult {
  return {
    similarity_percentage: 0,
    refactoring_level: "unknown",
    added_features: false,
    removed_features: false,
    notes: `Error in analysis: ${cause}`,
    quality_issues: [],
  };
}

/** Raw model stdout to a normalized comparison. Throws the typed pipeline errors. */
export function comparisonFromOutput(raw: string, mode: ExtractionMode = "greedy"): ComparisonResult {
  return normalizeComparison(parsePayload(extractPayload(raw.trim(), mode)));
}

export function qualityFromOutput(raw: string, mode: ExtractionMode = "greedy"): QualityAnalysis {
  return normalizeQuality(parsePayload(extractPayload(raw.trim(), mode)));
}
