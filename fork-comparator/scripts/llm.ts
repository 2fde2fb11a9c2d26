import { createHash } from "node:crypto";
import { runProcess, type SpawnFn } from "./subprocess";
import type { ComparatorConfig, LlmAudit } from "./types";

export interface ModelRequest {
  prompt: string;
  role: LlmAudit["role"];
  timeoutMs: number | null;
  signal?: AbortSignal;
  context?: { repo?: string | null; file_path?: string | null };
}

/** Returns raw model stdout; throws `SpawnError`, `InvocationTimeoutError` or `InvocationAbortedError`. */
export type ModelInvoker = (request: ModelRequest) => Promise<string>;

type LlmConfig = Pick<ComparatorConfig["llm"], "command" | "args" | "model" | "promptVia">;

export function buildModelArgv(config: LlmConfig, prompt: string): string[] {
  const argv = [config.command, ...config.args.map((arg) => arg.replace("{model}", config.model))];
  if (config.promptVia === "argv") argv.push(prompt);
  return argv;
}

export function promptHash(prompt: string): string {
  return createHash("sha256").update(prompt).digest("hex");
}

export function createProcessModelInvoker(
  config: LlmConfig,
  options: {
    runId: string;
    onAudit?: (audit: LlmAudit) => void;
    spawnImpl?: SpawnFn;
  },
): ModelInvoker {
  return async (request) => {
    const startedAt = Date.now();
    const argv = buildModelArgv(config, request.prompt);
    const emitAudit = (fields: { completionChars: number; exitCode: number | null; error?: string }) => {
      options.onAudit?.({
        ts: new Date().toISOString(),
        run_id: options.runId,
        role: request.role,
        repo: request.context?.repo ?? null,
        file_path: request.context?.file_path ?? null,
        model: config.model,
        prompt_hash: promptHash(request.prompt),
        prompt_chars: request.prompt.length,
        completion_chars: fields.completionChars,
        exit_code: fields.exitCode,
        duration_ms: Date.now() - startedAt,
        ...(fields.error ? { error: fields.error.slice(0, 200) } : {}),
      });
    };

    try {
      const result = await runProcess(argv, {
        input: config.promptVia === "stdin" ? request.prompt : "",
        timeoutMs: request.timeoutMs,
        signal: request.signal,
        spawnImpl: options.spawnImpl,
      });
      const output = result.stdout.trim();
      emitAudit({
        completionChars: output.length,
        exitCode: result.exit_code,
        ...(result.exit_code !== 0 && result.stderr ? { error: result.stderr.trim() } : {}),
      });
      return output;
    } catch (error) {
      emitAudit({
        completionChars: 0,
        exitCode: null,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  };
}
