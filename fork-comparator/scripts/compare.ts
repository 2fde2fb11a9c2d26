import { BudgetExceededError } from "./errors";
import { classifyFailure } from "./failures";
import type { BudgetManager } from "./budget";
import type { ModelInvoker } from "./llm";
import type { ComparatorLogger } from "./logger";
import { comparisonFromOutput, failureComparison, qualityFromOutput } from "./payload/normalize";
import { DEFAULT_MAX_PROMPT_CHARS, buildComparisonPrompt, buildQualityPrompt } from "./prompts";
import type {
  AggregateSummary,
  ComparisonResult,
  ExtractionMode,
  FailKind,
  FailureInfo,
  QualityAnalysis,
} from "./types";

const RAW_OUTPUT_LOG_CHARS = 2000;
const PAYLOAD_FAILURES: ReadonlySet<FailKind> = new Set(["NO_PAYLOAD_FOUND", "PARSE_ERROR"]);

export interface ComparatorSettings {
  maxPromptChars: number;
  extraction: ExtractionMode;
  compareTimeoutMs: number | null;
  qualityTimeoutMs: number | null;
}

export const DEFAULT_COMPARATOR_SETTINGS: ComparatorSettings = {
  maxPromptChars: DEFAULT_MAX_PROMPT_CHARS,
  extraction: "greedy",
  compareTimeoutMs: 120_000,
  qualityTimeoutMs: 300_000,
};

export interface CallContext {
  repo?: string | null;
  file_path?: string | null;
  signal?: AbortSignal;
}

export interface Comparator {
  compare: (originalText: string, variantText: string, context?: CallContext) => Promise<ComparisonResult>;
  compareDetailed: (
    originalText: string,
    variantText: string,
    context?: CallContext,
  ) => Promise<{ result: ComparisonResult; failure: FailureInfo | null }>;
  analyzeQuality: (code: string, language?: string, context?: CallContext) => Promise<QualityAnalysis>;
}

export function aggregate(results: readonly ComparisonResult[]): AggregateSummary {
  const distribution = { none: 0, low: 0, medium: 0, high: 0 };
  let total = 0;
  for (const result of results) {
    total += result.similarity_percentage;
    if (result.refactoring_level !== "unknown") {
      distribution[result.refactoring_level] += 1;
    }
  }
  return {
    average_similarity: results.length > 0 ? total / results.length : 0,
    refactoring_distribution: distribution,
    files_compared: results.length,
  };
}

export function createComparator(deps: {
  invoke: ModelInvoker;
  settings?: Partial<ComparatorSettings>;
  logger?: ComparatorLogger;
  budget?: BudgetManager;
}): Comparator {
  const settings: ComparatorSettings = { ...DEFAULT_COMPARATOR_SETTINGS, ...deps.settings };

  const reportFailure = (event: string, failure: FailureInfo, context: CallContext, output?: string) => {
    const data: Record<string, unknown> = {
      kind: failure.kind,
      file_path: context.file_path ?? null,
      error: failure.message,
    };
    if (output !== undefined && PAYLOAD_FAILURES.has(failure.kind)) {
      data.raw_output = output.slice(0, RAW_OUTPUT_LOG_CHARS);
    }
    deps.logger?.log({ node: "comparator", repo: context.repo ?? null, level: "error", event, data });
  };

  const invokeWithBudget = async (
    prompt: string,
    role: "compare" | "quality",
    timeoutMs: number | null,
    context: CallContext,
  ): Promise<string> => {
    if (deps.budget) {
      const verdict = deps.budget.shouldStopRun();
      if (verdict.stop) throw new BudgetExceededError(verdict.reason ?? "budget exhausted");
      deps.budget.recordLlmCall(context.repo ?? "", prompt.length);
    }
    return deps.invoke({
      prompt,
      role,
      timeoutMs,
      signal: context.signal,
      context: { repo: context.repo ?? null, file_path: context.file_path ?? null },
    });
  };

  const compareDetailed: Comparator["compareDetailed"] = async (originalText, variantText, context = {}) => {
    let output: string | undefined;
    try {
      const prompt = buildComparisonPrompt(originalText, variantText, settings.maxPromptChars);
      output = await invokeWithBudget(prompt, "compare", settings.compareTimeoutMs, context);
      return { result: comparisonFromOutput(output, settings.extraction), failure: null };
    } catch (error) {
      const failure = classifyFailure(error);
      reportFailure("COMPARE_FAILED", failure, context, output);
      return { result: failureComparison(failure.message), failure };
    }
  };

  return {
    compareDetailed,
    async compare(originalText, variantText, context) {
      return (await compareDetailed(originalText, variantText, context)).result;
    },
    async analyzeQuality(code, language = "", context = {}) {
      let output: string | undefined;
      try {
        const prompt = buildQualityPrompt(code, language, settings.maxPromptChars);
        output = await invokeWithBudget(prompt, "quality", settings.qualityTimeoutMs, context);
        return qualityFromOutput(output, settings.extraction);
      } catch (error) {
        reportFailure("QUALITY_ANALYSIS_FAILED", classifyFailure(error), context, output);
        return { issues: [] };
      }
    },
  };
}
