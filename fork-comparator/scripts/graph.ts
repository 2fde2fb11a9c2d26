import path from "node:path";
import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import { formatReportTimestamp, writeForkArtifacts, writeQualityArtifact, writeRunReports } from "./artifacts";
import { aggregate, type Comparator } from "./compare";
import { mapLimit } from "./concurrency";
import { classifyFailure, emptyFailTaxonomy, failureHints } from "./failures";
import {
  fetchFileText,
  fetchForks,
  fetchRepoContents,
  fetchRepoInfo,
  type GitHubOptions,
} from "./github";
import type { ComparatorLogger } from "./logger";
import { languageForPath } from "./prompts";
import type {
  ComparatorConfig,
  ComparatorState,
  ComparatorStats,
  FailKind,
  FileComparison,
  ForkComparison,
  ForkRepo,
  QualityFileResult,
  RepoContentItem,
} from "./types";

export interface ComparatorGraphDeps {
  comparator: Comparator;
  logger?: ComparatorLogger;
  github?: Omit<GitHubOptions, "signal" | "onCacheEvent" | "onRetryEvent">;
  signal?: AbortSignal;
  random?: () => number;
}

type EmitFn = ComparatorLogger["log"];

function matchesExtensions(filePath: string, extensions: string[]): boolean {
  if (extensions.length === 0) return true;
  const lowered = filePath.toLowerCase();
  return extensions.some((ext) => lowered.endsWith(ext.toLowerCase()));
}

function filesByPath(items: RepoContentItem[]): Map<string, RepoContentItem> {
  return new Map(items.filter((item) => item.type === "file").map((item) => [item.path, item]));
}

/** Fisher-Yates over a copy; `random` is injectable for reproducible samples. */
export function sampleItems<T>(items: readonly T[], size: number, random: () => number = Math.random): T[] {
  const pool = [...items];
  for (let i = pool.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, Math.min(size, pool.length));
}

export function emptyForkComparison(fork: ForkRepo): ForkComparison {
  return { fork: fork.full_name, fork_url: fork.html_url, files: [], summary: aggregate([]) };
}

export function emptyStats(): ComparatorStats {
  return {
    forks_found: 0,
    forks_compared: 0,
    file_pairs_found: 0,
    files_compared: 0,
    files_skipped: 0,
    comparisons_failed: 0,
    quality_files_analyzed: 0,
  };
}

export function createInitialState(
  runId: string,
  startedAt: Date,
  config: ComparatorConfig,
): ComparatorState {
  return {
    run_id: runId,
    generated_at: startedAt.toISOString(),
    timestamp: formatReportTimestamp(startedAt),
    config,
    repo_info: null,
    forks: [],
    comparisons: [],
    quality: null,
    fail_taxonomy_summary: emptyFailTaxonomy(),
    stats: emptyStats(),
    artifacts: [],
    logs: [],
    status: "ok",
  };
}

export function createComparatorGraph(deps: ComparatorGraphDeps) {
  const emit: EmitFn = deps.logger?.log ?? (() => undefined);
  const signal = deps.signal;

  const githubOptions = (node: string): GitHubOptions => ({
    ...deps.github,
    signal,
    onCacheEvent: (event, data) => {
      emit({ node, repo: data.repo, level: "info", event, data: { key: data.key } });
    },
    onRetryEvent: (event, data) => {
      emit({ node, repo: data.repo, level: event === "GITHUB_RETRY" ? "warn" : "error", event, data });
    },
  });

  async function listFiles(repo: string, dirs: string[], options: GitHubOptions): Promise<RepoContentItem[]> {
    const listings = await Promise.all(dirs.map((dir) => fetchRepoContents(repo, dir, options)));
    return listings.flat();
  }

  async function compareFork(
    state: ComparatorState,
    fork: ForkRepo,
    taxonomy: Record<FailKind, number>,
  ): Promise<{ comparison: ForkComparison; pairs: number; skipped: number; failed: number }> {
    const { config } = state;
    const options = githubOptions("fork_comparer");
    let baseFiles: Map<string, RepoContentItem>;
    let forkFiles: Map<string, RepoContentItem>;
    try {
      [baseFiles, forkFiles] = await Promise.all([
        listFiles(config.baseRepo, config.contentsPaths, options).then(filesByPath),
        listFiles(fork.full_name, config.contentsPaths, options).then(filesByPath),
      ]);
    } catch (error) {
      signal?.throwIfAborted();
      const failure = classifyFailure(error);
      taxonomy[failure.kind] += 1;
      emit({
        node: "fork_comparer",
        repo: fork.full_name,
        level: "error",
        event: "CONTENTS_FETCH_FAIL",
        data: { kind: failure.kind, error: failure.message, hints: failureHints(failure.kind) },
      });
      return { comparison: emptyForkComparison(fork), pairs: 0, skipped: 0, failed: 0 };
    }

    let common = [...baseFiles.keys()]
      .filter((filePath) => forkFiles.has(filePath) && matchesExtensions(filePath, config.includeExtensions))
      .sort();
    if (config.maxFilesPerFork !== null) common = common.slice(0, config.maxFilesPerFork);

    let skipped = 0;
    let failed = 0;
    const compared = await mapLimit(
      common,
      config.fileConcurrency,
      async (filePath): Promise<FileComparison | null> => {
        let baseText: string | null;
        let forkText: string | null;
        try {
          [baseText, forkText] = await Promise.all([
            fetchFileText(config.baseRepo, filePath, options),
            fetchFileText(fork.full_name, filePath, options),
          ]);
        } catch (error) {
          signal?.throwIfAborted();
          const failure = classifyFailure(error);
          taxonomy[failure.kind] += 1;
          skipped += 1;
          emit({
            node: "fork_comparer",
            repo: fork.full_name,
            level: "error",
            event: "FILE_FETCH_FAIL",
            data: { file_path: filePath, kind: failure.kind, error: failure.message },
          });
          return null;
        }
        if (!baseText || !forkText) {
          skipped += 1;
          emit({
            node: "fork_comparer",
            repo: fork.full_name,
            level: "info",
            event: "FILE_SKIPPED_EMPTY",
            data: { file_path: filePath },
          });
          return null;
        }
        const { result, failure } = await deps.comparator.compareDetailed(baseText, forkText, {
          repo: fork.full_name,
          file_path: filePath,
          signal,
        });
        if (failure) {
          taxonomy[failure.kind] += 1;
          if (failure.kind === "BUDGET_CUTOFF" || failure.kind === "INVOCATION_ABORTED") {
            skipped += 1;
            return null;
          }
          failed += 1;
        }
        return { file_path: filePath, comparison: result };
      },
      signal,
    );

    const files = compared.filter((item): item is FileComparison => item !== null);
    return {
      comparison: {
        fork: fork.full_name,
        fork_url: fork.html_url,
        files,
        summary: aggregate(files.map((file) => file.comparison)),
      },
      pairs: common.length,
      skipped,
      failed,
    };
  }

  const ComparatorStateAnnotation = Annotation.Root({
    run_id: Annotation<ComparatorState["run_id"]>(),
    generated_at: Annotation<ComparatorState["generated_at"]>(),
    timestamp: Annotation<ComparatorState["timestamp"]>(),
    config: Annotation<ComparatorState["config"]>(),
    repo_info: Annotation<ComparatorState["repo_info"]>(),
    forks: Annotation<ComparatorState["forks"]>(),
    comparisons: Annotation<ComparatorState["comparisons"]>(),
    quality: Annotation<ComparatorState["quality"]>(),
    fail_taxonomy_summary: Annotation<ComparatorState["fail_taxonomy_summary"]>(),
    stats: Annotation<ComparatorState["stats"]>(),
    artifacts: Annotation<ComparatorState["artifacts"]>(),
    logs: Annotation<ComparatorState["logs"]>(),
    status: Annotation<ComparatorState["status"]>(),
    errors: Annotation<ComparatorState["errors"]>(),
  });

  return new StateGraph(ComparatorStateAnnotation)
    .addNode("bootstrap", (state: ComparatorState): ComparatorState => {
      emit({
        node: "bootstrap",
        level: "info",
        event: "RUN_START",
        data: {
          run_id: state.run_id,
          base_repo: state.config.baseRepo,
          model: state.config.llm.model,
          max_forks: state.config.maxForks,
        },
      });
      return {
        ...state,
        forks: state.forks ?? [],
        comparisons: state.comparisons ?? [],
        quality: state.quality ?? null,
        fail_taxonomy_summary: state.fail_taxonomy_summary ?? emptyFailTaxonomy(),
        artifacts: state.artifacts ?? [],
        logs: state.logs ?? [],
        status: "ok",
      };
    })
    .addNode("repo_lookup", async (state: ComparatorState): Promise<ComparatorState> => {
      try {
        const info = await fetchRepoInfo(state.config.baseRepo, githubOptions("repo_lookup"));
        emit({
          node: "repo_lookup",
          repo: info.full_name,
          level: "info",
          event: "REPO_INFO_OK",
          data: { forks_count: info.forks_count, stargazers_count: info.stargazers_count },
        });
        return {
          ...state,
          repo_info: info,
          logs: [...state.logs, `[repo_lookup] ${info.full_name} forks=${info.forks_count} url=${info.html_url}`],
        };
      } catch (error) {
        signal?.throwIfAborted();
        const message = classifyFailure(error).message;
        emit({
          node: "repo_lookup",
          repo: state.config.baseRepo,
          level: "warn",
          event: "REPO_INFO_FAIL",
          data: { error: message },
        });
        return { ...state, repo_info: null, logs: [...state.logs, `[repo_lookup] unavailable: ${message}`] };
      }
    })
    .addNode("fork_finder", async (state: ComparatorState): Promise<ComparatorState> => {
      const { forks, error } = await fetchForks(
        state.config.baseRepo,
        { maxForks: state.config.maxForks, sort: state.config.forkSort, pageDelayMs: state.config.pageDelayMs },
        githubOptions("fork_finder"),
      );
      const taxonomy = { ...state.fail_taxonomy_summary };
      const logs = [...state.logs];
      if (error !== undefined) {
        const failure = classifyFailure(error);
        taxonomy[failure.kind] += 1;
        emit({
          node: "fork_finder",
          repo: state.config.baseRepo,
          level: "error",
          event: "FORKS_FETCH_FAIL",
          data: { kind: failure.kind, kept: forks.length, error: failure.message, hints: failureHints(failure.kind) },
        });
        logs.push(`[fork_finder] listing stopped early: ${failure.message}`);
      }
      emit({
        node: "fork_finder",
        repo: state.config.baseRepo,
        level: "info",
        event: "FORKS_FOUND",
        data: { count: forks.length, limit: state.config.maxForks },
      });
      return {
        ...state,
        forks,
        fail_taxonomy_summary: taxonomy,
        stats: { ...state.stats, forks_found: forks.length },
        logs: [...logs, `[fork_finder] found=${forks.length} limit=${state.config.maxForks}`],
      };
    })
    .addNode("fork_comparer", async (state: ComparatorState): Promise<ComparatorState> => {
      const taxonomy = { ...state.fail_taxonomy_summary };
      const outcomes = await mapLimit(
        state.forks,
        state.config.forkConcurrency,
        async (fork, index) => {
          console.log(`[fork_comparer] ${index + 1}/${state.forks.length} ${fork.full_name}`);
          emit({ node: "fork_comparer", repo: fork.full_name, level: "info", event: "FORK_COMPARE_START" });
          const outcome = await compareFork(state, fork, taxonomy);
          emit({
            node: "fork_comparer",
            repo: fork.full_name,
            level: "info",
            event: "FORK_COMPARE_DONE",
            data: { ...outcome.comparison.summary, failed: outcome.failed, skipped: outcome.skipped },
          });
          return outcome;
        },
        signal,
      );
      const comparisons = outcomes.map((outcome) => outcome.comparison);
      return {
        ...state,
        comparisons,
        fail_taxonomy_summary: taxonomy,
        stats: {
          ...state.stats,
          forks_compared: comparisons.length,
          file_pairs_found: outcomes.reduce((sum, outcome) => sum + outcome.pairs, 0),
          files_compared: comparisons.reduce((sum, item) => sum + item.summary.files_compared, 0),
          files_skipped: outcomes.reduce((sum, outcome) => sum + outcome.skipped, 0),
          comparisons_failed: outcomes.reduce((sum, outcome) => sum + outcome.failed, 0),
        },
        logs: [
          ...state.logs,
          ...comparisons.map(
            (item) =>
              `[fork_comparer] ${item.fork} files=${item.summary.files_compared} avg_similarity=${item.summary.average_similarity}`,
          ),
        ],
      };
    })
    .addNode("quality_scanner", async (state: ComparatorState): Promise<ComparatorState> => {
      const scan = state.config.qualityScan;
      if (!scan.enabled) return state;
      const options = githubOptions("quality_scanner");
      let candidates: RepoContentItem[];
      try {
        candidates = (await fetchRepoContents(scan.repo, scan.path, options)).filter((item) => item.type === "file");
      } catch (error) {
        signal?.throwIfAborted();
        const failure = classifyFailure(error);
        emit({
          node: "quality_scanner",
          repo: scan.repo,
          level: "error",
          event: "QUALITY_CONTENTS_FAIL",
          data: { kind: failure.kind, error: failure.message },
        });
        return { ...state, quality: { repo: scan.repo, files: [] } };
      }
      const selected = sampleItems(candidates, scan.sampleSize, deps.random);
      const analyzed = await mapLimit(
        selected,
        state.config.fileConcurrency,
        async (item): Promise<QualityFileResult | null> => {
          const code = await fetchFileText(scan.repo, item.path, options).catch((error: unknown) => {
            signal?.throwIfAborted();
            emit({
              node: "quality_scanner",
              repo: scan.repo,
              level: "error",
              event: "QUALITY_FILE_FETCH_FAIL",
              data: { file_path: item.path, error: classifyFailure(error).message },
            });
            return null;
          });
          if (!code) return null;
          const analysis = await deps.comparator.analyzeQuality(code, languageForPath(item.path), {
            repo: scan.repo,
            file_path: item.path,
            signal,
          });
          return { file: item.path, analysis };
        },
        signal,
      );
      const files = analyzed.filter((item): item is QualityFileResult => item !== null);
      emit({
        node: "quality_scanner",
        repo: scan.repo,
        level: "info",
        event: "QUALITY_SCAN_DONE",
        data: { sampled: selected.length, analyzed: files.length },
      });
      return {
        ...state,
        quality: { repo: scan.repo, files },
        stats: { ...state.stats, quality_files_analyzed: files.length },
      };
    })
    .addNode("reporter", (state: ComparatorState): ComparatorState => {
      const outputDir = path.resolve(process.cwd(), state.config.output.dir);
      const artifacts = [...state.artifacts];
      for (const comparison of state.comparisons) {
        artifacts.push(...writeForkArtifacts(outputDir, comparison, state.timestamp));
      }
      artifacts.push(...writeRunReports(outputDir, state));
      if (state.quality) {
        artifacts.push(writeQualityArtifact(outputDir, state.quality, state.timestamp));
      }
      emit({
        node: "reporter",
        level: "info",
        event: "REPORTS_WRITTEN",
        data: { count: artifacts.length, output_dir: outputDir },
      });
      return {
        ...state,
        artifacts,
        logs: [...state.logs, ...artifacts.map((file) => `[reporter] wrote ${file}`)],
      };
    })
    .addEdge(START, "bootstrap")
    .addEdge("bootstrap", "repo_lookup")
    .addEdge("repo_lookup", "fork_finder")
    .addEdge("fork_finder", "fork_comparer")
    .addEdge("fork_comparer", "quality_scanner")
    .addEdge("quality_scanner", "reporter")
    .addEdge("reporter", END)
    .compile();
}
