import type { ComparatorLogger } from "./logger";
import type { ComparatorConfig } from "./types";

export type BudgetConfig = ComparatorConfig["budget"];

export interface BudgetState {
  runStartMs: number;
  llmCallsTotal: number;
  llmCallsPerRepo: Record<string, number>;
  promptCharsTotal: number;
  stopReason: string | null;
}

export interface BudgetManager {
  recordLlmCall: (repoFullName: string, promptChars: number) => void;
  shouldStopRun: () => { stop: boolean; reason?: string };
  snapshot: () => BudgetState;
}

export function createBudgetManager(
  configBudget: BudgetConfig,
  logger?: ComparatorLogger,
  now: () => number = Date.now,
): BudgetManager {
  const state: BudgetState = {
    runStartMs: now(),
    llmCallsTotal: 0,
    llmCallsPerRepo: {},
    promptCharsTotal: 0,
    stopReason: null,
  };

  const stopWith = (reason: string): { stop: true; reason: string } => {
    if (!state.stopReason) {
      state.stopReason = reason;
      logger?.log({
        node: "fork_comparer",
        level: "warn",
        event: "BUDGET_STOP_RUN",
        data: { reason, llm_calls_total: state.llmCallsTotal },
      });
    }
    return { stop: true, reason };
  };

  return {
    recordLlmCall(repoFullName, promptChars) {
      state.llmCallsTotal += 1;
      state.llmCallsPerRepo[repoFullName] = (state.llmCallsPerRepo[repoFullName] ?? 0) + 1;
      state.promptCharsTotal += promptChars;
    },
    shouldStopRun() {
      if (!configBudget.enabled) return { stop: false };
      if (state.llmCallsTotal >= configBudget.maxLlmCallsPerRun) {
        return stopWith("maxLlmCallsPerRun reached");
      }
      if (now() - state.runStartMs > configBudget.maxWallTimeSeconds * 1000) {
        return stopWith("maxWallTimeSeconds exceeded");
      }
      return { stop: false };
    },
    snapshot() {
      return { ...state, llmCallsPerRepo: { ...state.llmCallsPerRepo } };
    },
  };
}
