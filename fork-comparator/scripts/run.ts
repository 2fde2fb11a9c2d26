import "dotenv/config";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { createBudgetManager } from "./budget";
import { createLruCache } from "./cache";
import { createComparator } from "./compare";
import { DEFAULT_CONFIG_PATH, loadConfig } from "./config";
import { emptyFailTaxonomy, errorMessage } from "./failures";
import { createComparatorGraph, createInitialState, emptyStats } from "./graph";
import type { CachedContent } from "./github";
import { createProcessModelInvoker } from "./llm";
import { createDiagnosticLog, createLogger } from "./logger";
import type { ComparatorConfig, LlmAudit } from "./types";

function formatRunId(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
}

function abortOnSignals(controller: AbortController): void {
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    console.error(`Received ${signal}, cancelling run...`);
    controller.abort(new Error(`Run cancelled by ${signal}`));
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

async function main() {
  const startedAt = new Date();
  const runId = formatRunId(startedAt);
  const configPath = process.env.COMPARATOR_CONFIG?.trim() || DEFAULT_CONFIG_PATH;
  let logger: ReturnType<typeof createLogger> | null = null;
  let config: ComparatorConfig | null = null;
  const audits: LlmAudit[] = [];
  const controller = new AbortController();
  abortOnSignals(controller);

  try {
    config = await loadConfig(configPath);
    const diagnostics = createDiagnosticLog(path.join(config.output.dir, "analysis.log"));
    logger = createLogger(runId, { diagnostics });

    const budget = createBudgetManager(config.budget, logger);
    const comparator = createComparator({
      invoke: createProcessModelInvoker(config.llm, {
        runId,
        onAudit: (audit) => audits.push(audit),
      }),
      settings: {
        maxPromptChars: config.llm.maxPromptChars,
        extraction: config.llm.extraction,
        compareTimeoutMs: config.llm.compareTimeoutMs,
        qualityTimeoutMs: config.llm.qualityTimeoutMs,
      },
      logger,
      budget,
    });
    const graph = createComparatorGraph({
      comparator,
      logger,
      github: {
        token: process.env.GITHUB_TOKEN,
        cache: createLruCache<CachedContent>(config.cache.maxEntries),
      },
      signal: controller.signal,
    });

    const finalState = await graph.invoke(createInitialState(runId, startedAt, config));
    const budgetSnapshotEnd = budget.snapshot();
    logger.log({
      node: "bootstrap",
      level: "info",
      event: "RUN_FAIL_TAXONOMY_SUMMARY",
      data: finalState.fail_taxonomy_summary,
    });
    logger.log({
      node: "bootstrap",
      level: "info",
      event: "RUN_DONE",
      data: { ...finalState.stats },
    });

    await mkdir(config.output.runsDir, { recursive: true });
    const outPath = path.join(config.output.runsDir, `${runId}.json`);
    const payload = {
      run_id: finalState.run_id,
      generated_at: finalState.generated_at,
      config_path: configPath,
      config: finalState.config,
      status: finalState.status,
      repo_info: finalState.repo_info,
      stats: finalState.stats,
      comparisons_summary: finalState.comparisons.map((item) => ({
        fork: item.fork,
        ...item.summary,
      })),
      quality_summary: finalState.quality
        ? { repo: finalState.quality.repo, files: finalState.quality.files.length }
        : null,
      fail_taxonomy_summary: finalState.fail_taxonomy_summary,
      budget_snapshot_end: budgetSnapshotEnd,
      llm_audits: audits,
      artifacts: finalState.artifacts,
      diagnostic_log: diagnostics.path,
      logs: finalState.logs,
      events: logger.getEvents(),
      ...(finalState.errors ? { errors: finalState.errors } : {}),
    };

    await writeFile(outPath, `${JSON.stringify(payload, null, 2)}\n`, "utf-8");
    console.log(`Run written: ${outPath}`);
  } catch (error) {
    const runsDir = config?.output.runsDir ?? "runs";
    await mkdir(runsDir, { recursive: true });
    const outPath = path.join(runsDir, `${runId}.json`);
    const message = errorMessage(error);

    const payload = {
      run_id: runId,
      generated_at: startedAt.toISOString(),
      config_path: configPath,
      ...(config ? { config } : {}),
      status: "error",
      stats: emptyStats(),
      fail_taxonomy_summary: emptyFailTaxonomy(),
      llm_audits: audits,
      artifacts: [],
      logs: [],
      events: logger?.getEvents() ?? [],
      errors: [message],
    };

    await writeFile(outPath, `${JSON.stringify(payload, null, 2)}\n`, "utf-8");
    console.error(`Run failed: ${message}. Log written: ${outPath}`);
    process.exitCode = 1;
  }
}

void main();
