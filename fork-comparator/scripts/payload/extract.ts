import { NoPayloadFoundError } from "../errors";
import type { ExtractionMode } from "../types";

/**
 * Returns the span from the first `{` to the last `}` inclusive, whether or
 * not it is valid JSON. Prose around a single object is tolerated; stray
 * braces in that prose widen the span (`blah {"a":1} blah {"b":2}` yields
 * `{"a":1} blah {"b":2}`).
 */
export function extractGreedyPayload(raw: string): string {
  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start === -1 || end < start) {
    throw new NoPayloadFoundError();
  }
  return raw.slice(start, end + 1);
}

/** End index of the object opening at `start`, or -1 when it never closes. */
function findBalancedEnd(raw: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < raw.length; i += 1) {
    const ch = raw[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth += 1;
    else if (ch === "}") {
      depth -= 1;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * First balanced object starting at the first `{`, skipping braces inside
 * string literals. Falls back to the greedy span when that object never closes.
 */
export function extractBalancedPayload(raw: string): string {
  const start = raw.indexOf("{");
  if (start === -1) {
    throw new NoPayloadFoundError();
  }
  const end = findBalancedEnd(raw, start);
  if (end === -1) {
    return extractGreedyPayload(raw);
  }
  return raw.slice(start, end + 1);
}

export function extractPayload(raw: string, mode: ExtractionMode = "greedy"): string {
  return mode === "balanced" ? extractBalancedPayload(raw) : extractGreedyPayload(raw);
}
