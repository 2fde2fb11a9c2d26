import assert from "node:assert/strict";
import { test } from "node:test";
import { MalformedFieldError, NoPayloadFoundError, PayloadParseError } from "../errors";
import {
  comparisonFromOutput,
  failureComparison,
  normalizeComparison,
  parsePayload,
  qualityFromOutput,
} from "./normalize";

const MODEL_OUTPUT =
  'Sure! {"similarity_percentage": 85, "refactoring_level": "low", "added_features": true, ' +
  '"removed_features": false, "notes": "minor rename"}';

test("model output with prose is extracted and default-filled", () => {
  assert.deepEqual(comparisonFromOutput(MODEL_OUTPUT), {
    similarity_percentage: 85,
    refactoring_level: "low",
    added_features: true,
    removed_features: false,
    notes: "minor rename",
    quality_issues: [],
  });
});

test("an empty object gets every default", () => {
  assert.deepEqual(normalizeComparison({}), {
    similarity_percentage: 0,
    refactoring_level: "unknown",
    added_features: false,
    removed_features: false,
    notes: "No analysis available",
    quality_issues: [],
  });
});

test("enum values are case-folded and unknown keys dropped", () => {
  const result = normalizeComparison({
    refactoring_level: " MEDIUM ",
    confidence: 0.9,
    quality_issues: [{ severity: "High", description: "global state" }],
  });
  assert.equal(result.refactoring_level, "medium");
  assert.equal("confidence" in result, false);
  assert.deepEqual(result.quality_issues, [
    { issue_type: "general", severity: "high", description: "global state", suggestion: "" },
  ]);
});

test("wrong-typed fields are rejected as MalformedField", () => {
  assert.throws(
    () => normalizeComparison({ similarity_percentage: "85" }),
    (error: unknown) => error instanceof MalformedFieldError && error.field === "similarity_percentage",
  );
  assert.throws(
    () => normalizeComparison({ refactoring_level: "extreme" }),
    (error: unknown) => error instanceof MalformedFieldError && error.field === "refactoring_level",
  );
  assert.throws(
    () => normalizeComparison({ quality_issues: [{ description: 5 }] }),
    (error: unknown) => error instanceof MalformedFieldError && error.field === "quality_issues.0.description",
  );
});

test("an unrecognised severity falls back to low", () => {
  const result = comparisonFromOutput(
    '{"similarity_percentage": 90, "quality_issues": [{"severity": "critical", "description": "n+1 query"}]}',
  );
  assert.equal(result.similarity_percentage, 90);
  assert.deepEqual(result.quality_issues, [
    { issue_type: "general", severity: "low", description: "n+1 query", suggestion: "" },
  ]);
  assert.equal(qualityFromOutput('{"issues": [{"type": "smell", "severity": 3}]}').issues[0].severity, "low");
});

test("parsePayload rejects invalid JSON and non-objects", () => {
  assert.throws(() => parsePayload("{not json}"), PayloadParseError);
  assert.throws(
    () => parsePayload("[1]"),
    (error: unknown) =>
      error instanceof PayloadParseError && error.message === "Invalid JSON payload: expected a JSON object, got array",
  );
});

test("garbage text raises NoPayloadFound", () => {
  assert.throws(() => comparisonFromOutput("I'm sorry, I can't compare these."), NoPayloadFoundError);
});

test("quality output is normalized per issue", () => {
  assert.deepEqual(qualityFromOutput('Result: {"issues": [{"type": "smell", "severity": "HIGH"}]}'), {
    issues: [{ type: "smell", severity: "high", description: "", recommendation: "", tool_missed: false }],
  });
  assert.deepEqual(qualityFromOutput("{}"), { issues: [] });
});

test("failure record has the full shape", () => {
  const failure = failureComparison("boom");
  assert.deepEqual(failure, {
    similarity_percentage: 0,
    refactoring_level: "unknown",
    added_features: false,
    removed_features: false,
    notes: "Error in analysis: boom",
    quality_issues: [],
  });
});
