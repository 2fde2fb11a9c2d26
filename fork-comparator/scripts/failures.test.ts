import assert from "node:assert/strict";
import { test } from "node:test";
import { InvocationTimeoutError, MalformedFieldError } from "./errors";
import { classifyFailure, emptyFailTaxonomy, failureHints } from "./failures";
import { GitHubRequestError } from "./github";

test("typed errors keep their kind", () => {
  assert.deepEqual(classifyFailure(new InvocationTimeoutError(50)), {
    kind: "INVOCATION_TIMEOUT",
    message: "Model invocation timed out after 50ms",
  });
  assert.equal(classifyFailure(new MalformedFieldError("notes", "Expected string")).kind, "MALFORMED_FIELD");
  assert.equal(classifyFailure(new GitHubRequestError("GitHub API 403 Forbidden")).kind, "FETCH_FAILED");
});

test("untyped errors are classified by shape", () => {
  assert.equal(classifyFailure(new SyntaxError("Unexpected token")).kind, "PARSE_ERROR");
  assert.equal(classifyFailure(new TypeError("fetch failed")).kind, "FETCH_FAILED");
  assert.deepEqual(classifyFailure("boom"), { kind: "UNKNOWN", message: "boom" });
});

test("taxonomy starts at zero for every kind", () => {
  const taxonomy = emptyFailTaxonomy();
  assert.equal(Object.keys(taxonomy).length, 9);
  assert.ok(Object.values(taxonomy).every((count) => count === 0));
  assert.deepEqual(failureHints("UNKNOWN"), []);
});
