import { appendFileSync, mkdirSync } from "node:fs";
import path from "node:path";
import type { ComparatorEvent } from "./types";

function truncate(value: string, maxChars = 200): string {
  if (value.length <= maxChars) {
    return value;
  }
  return `${value.slice(0, maxChars)}…`;
}

function isSensitiveKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return (
    normalized.includes("authorization") ||
    normalized.includes("token") ||
    normalized.includes("prompt") ||
    normalized.endsWith("_text")
  );
}

export function safeData(input: unknown): Record<string, unknown> | undefined {
  if (!input || typeof input !== "object" || Array.isArray(input)) {
    return undefined;
  }

  const sanitize = (value: unknown, depth: number): unknown => {
    if (depth > 3) {
      return "[truncated-depth]";
    }
    if (typeof value === "string") {
      return truncate(value);
    }
    if (typeof value === "number" || typeof value === "boolean" || value === null) {
      return value;
    }
    if (Array.isArray(value)) {
      return value.slice(0, 20).map((item) => sanitize(item, depth + 1));
    }
    if (typeof value === "object") {
      const out: Record<string, unknown> = {};
      for (const [key, child] of Object.entries(value)) {
        out[key] = isSensitiveKey(key) ? "[redacted]" : sanitize(child, depth + 1);
      }
      return out;
    }
    return String(value);
  };

  const out: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(input)) {
    out[key] = isSensitiveKey(key) ? "[redacted]" : sanitize(child, 1);
  }
  return out;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS`. */
export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export interface DiagnosticLog {
  readonly path: string;
  error: (message: string) => void;
}

/**
 * Append-only, timestamped error log. The only place where raw failure detail
 * is kept untruncated.
 */
export function createDiagnosticLog(
  filePath: string,
  options: { now?: () => Date; echo?: boolean } = {},
): DiagnosticLog {
  const now = options.now ?? (() => new Date());
  mkdirSync(path.dirname(filePath), { recursive: true });
  return {
    path: filePath,
    error(message) {
      const line = `[${formatLogTimestamp(now())}] ERROR: ${message}`;
      if (options.echo ?? true) console.error(line);
      appendFileSync(filePath, `${line}\n`, "utf-8");
    },
  };
}

function diagnosticDetail(event: Omit<ComparatorEvent, "ts" | "run_id">): string {
  const scope = event.repo ? ` [${event.repo}]` : "";
  const error = event.data?.error;
  if (typeof error === "string") {
    const raw = event.data?.raw_output;
    const suffix = typeof raw === "string" ? ` | raw output: ${JSON.stringify(raw)}` : "";
    return `${event.event}${scope}: ${error}${suffix}`;
  }
  return event.data ? `${event.event}${scope}: ${JSON.stringify(event.data)}` : `${event.event}${scope}`;
}

export type ComparatorLogger = ReturnType<typeof createLogger>;

export function createLogger(
  runId: string,
  options: { diagnostics?: DiagnosticLog } = {},
): {
  log: (event: Omit<ComparatorEvent, "ts" | "run_id">) => void;
  getEvents: () => ComparatorEvent[];
} {
  const events: ComparatorEvent[] = [];

  return {
    log(event) {
      events.push({
        ts: new Date().toISOString(),
        run_id: runId,
        node: event.node,
        repo: event.repo ?? null,
        level: event.level,
        event: event.event,
        data: safeData(event.data),
      });
      if (event.level === "error") {
        options.diagnostics?.error(diagnosticDetail(event));
      }
    },
    getEvents() {
      return [...events];
    },
  };
}
