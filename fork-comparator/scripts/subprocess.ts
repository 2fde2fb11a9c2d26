import { spawn, type SpawnOptions } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import { InvocationAbortedError, InvocationTimeoutError, SpawnError } from "./errors";

/** The slice of `ChildProcess` that `runProcess` relies on. */
export interface ChildHandle {
  readonly pid?: number | undefined;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly stdin: Writable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: "error", listener: (err: Error) => void): this;
  once(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildHandle;

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exit_code: number | null;
}

export interface RunProcessOptions {
  input?: string;
  timeoutMs?: number | null;
  signal?: AbortSignal;
  spawnImpl?: SpawnFn;
}

const defaultSpawn: SpawnFn = (command, args, options) => spawn(command, args, options);

function killTree(child: ChildHandle): void {
  if (child.pid !== undefined && process.platform !== "win32") {
    try {
      // negative pid targets the whole process group created by `detached`
      process.kill(-child.pid, "SIGKILL");
      return;
    } catch (error) {
      const gone = error instanceof Error && "code" in error && error.code === "ESRCH";
      if (!gone) {
        child.kill("SIGKILL");
      }
      return;
    }
  }
  child.kill("SIGKILL");
}

/**
 * Runs `argv` to completion and captures its output. A non-zero exit code is
 * not an error: the model may still have printed a usable answer.
 */
export function runProcess(argv: readonly string[], options: RunProcessOptions = {}): Promise<ProcessResult> {
  const [command, ...args] = argv;
  if (!command) {
    return Promise.reject(new SpawnError("", new Error("empty argv")));
  }
  const spawnImpl = options.spawnImpl ?? defaultSpawn;
  const signal = options.signal;
  if (signal?.aborted) {
    return Promise.reject(new InvocationAbortedError());
  }

  return new Promise<ProcessResult>((resolve, reject) => {
    let child: ChildHandle;
    try {
      child = spawnImpl(command, args, {
        stdio: ["pipe", "pipe", "pipe"],
        detached: process.platform !== "win32",
      });
    } catch (error) {
      reject(new SpawnError(command, error));
      return;
    }

    const stdout: string[] = [];
    const stderr: string[] = [];
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const finish = (outcome: { ok: true; value: ProcessResult } | { ok: false; error: Error }) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      if (outcome.ok) resolve(outcome.value);
      else reject(outcome.error);
    };

    const onAbort = () => {
      killTree(child);
      finish({ ok: false, error: new InvocationAbortedError() });
    };

    child.stdout?.setEncoding("utf-8");
    child.stderr?.setEncoding("utf-8");
    child.stdout?.on("data", (chunk: string) => stdout.push(chunk));
    child.stderr?.on("data", (chunk: string) => stderr.push(chunk));

    child.once("error", (error) => {
      finish({ ok: false, error: new SpawnError(command, error) });
    });
    child.once("close", (code) => {
      finish({ ok: true, value: { stdout: stdout.join(""), stderr: stderr.join(""), exit_code: code } });
    });

    const timeoutMs = options.timeoutMs;
    if (typeof timeoutMs === "number" && timeoutMs > 0) {
      timer = setTimeout(() => {
        killTree(child);
        finish({ ok: false, error: new InvocationTimeoutError(timeoutMs) });
      }, timeoutMs);
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    if (child.stdin) {
      // a model that exits before reading stdin closes the pipe under us
      child.stdin.on("error", (error: Error) => stderr.push(`[stdin] ${error.message}`));
      child.stdin.end(options.input ?? "");
    }
  });
}
