import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { ComparatorConfig } from "./types";

export const DEFAULT_CONFIG_PATH = path.join("fork-comparator", "config", "comparator.config.json");

const RepoNameSchema = z.string().regex(/^[\w.-]+\/[\w.-]+$/, "expected owner/repo");
const TimeoutSchema = z.number().int().positive().nullable();

export const ComparatorConfigSchema = z.object({
  baseRepo: RepoNameSchema,
  maxForks: z.number().int().positive().default(5),
  forkSort: z.enum(["newest", "oldest", "stargazers", "watchers"]).default("newest"),
  forkConcurrency: z.number().int().min(1).max(16).default(2),
  fileConcurrency: z.number().int().min(1).max(16).default(1),
  contentsPaths: z.array(z.string()).min(1).default([""]),
  includeExtensions: z.array(z.string()).default([]),
  maxFilesPerFork: z.number().int().positive().nullable().default(null),
  pageDelayMs: z.number().int().min(0).default(700),
  llm: z
    .object({
      command: z.string().min(1).default("ollama"),
      args: z.array(z.string()).default(["run", "{model}"]),
      model: z.string().min(1).default("mistral"),
      promptVia: z.enum(["argv", "stdin"]).default("argv"),
      compareTimeoutMs: TimeoutSchema.default(120_000),
      qualityTimeoutMs: TimeoutSchema.default(300_000),
      maxPromptChars: z.number().int().positive().default(10_000),
      extraction: z.enum(["greedy", "balanced"]).default("greedy"),
    })
    .default({}),
  qualityScan: z
    .object({
      enabled: z.boolean().default(false),
      repo: RepoNameSchema.default("apache/flink"),
      path: z.string().default(""),
      sampleSize: z.number().int().positive().default(20),
    })
    .default({}),
  cache: z
    .object({
      maxEntries: z.number().int().positive().default(100),
    })
    .default({}),
  budget: z
    .object({
      enabled: z.boolean().default(false),
      maxLlmCallsPerRun: z.number().int().positive().default(200),
      maxWallTimeSeconds: z.number().int().positive().default(3600),
    })
    .default({}),
  output: z
    .object({
      dir: z.string().min(1).default("output"),
      runsDir: z.string().min(1).default("runs"),
    })
    .default({}),
});

export function parseConfig(raw: unknown): ComparatorConfig {
  const result = ComparatorConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid comparator config: ${details}`);
  }
  return result.data;
}

export function withEnvOverrides(config: ComparatorConfig, env: NodeJS.ProcessEnv = process.env): ComparatorConfig {
  return {
    ...config,
    baseRepo: env.COMPARATOR_BASE_REPO?.trim() || config.baseRepo,
    llm: {
      ...config.llm,
      model: env.OLLAMA_MODEL?.trim() || config.llm.model,
    },
  };
}

export async function loadConfig(configPath: string): Promise<ComparatorConfig> {
  const raw = await readFile(configPath, "utf-8");
  return withEnvOverrides(parseConfig(JSON.parse(raw)));
}
