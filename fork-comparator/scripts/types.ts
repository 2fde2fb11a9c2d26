export type RefactoringLevel = "none" | "low" | "medium" | "high" | "unknown";

export type IssueSeverity = "low" | "medium" | "high";

export type ExtractionMode = "greedy" | "balanced";

export interface ComparatorConfig {
  baseRepo: string;
  maxForks: number;
  forkSort: "newest" | "oldest" | "stargazers" | "watchers";
  forkConcurrency: number;
  fileConcurrency: number;
  contentsPaths: string[];
  includeExtensions: string[];
  maxFilesPerFork: number | null;
  pageDelayMs: number;
  llm: {
    command: string;
    args: string[];
    model: string;
    promptVia: "argv" | "stdin";
    compareTimeoutMs: number | null;
    qualityTimeoutMs: number | null;
    maxPromptChars: number;
    extraction: ExtractionMode;
  };
  qualityScan: {
    enabled: boolean;
    repo: string;
    path: string;
    sampleSize: number;
  };
  cache: {
    maxEntries: number;
  };
  budget: {
    enabled: boolean;
    maxLlmCallsPerRun: number;
    maxWallTimeSeconds: number;
  };
  output: {
    dir: string;
    runsDir: string;
  };
}

export interface RepoInfo {
  full_name: string;
  name: string;
  description: string | null;
  html_url: string;
  forks_count: number;
  stargazers_count: number;
  default_branch: string;
}

export interface ForkRepo {
  full_name: string;
  html_url: string;
  default_branch: string;
  pushed_at: string | null;
  stargazers_count: number;
}

export interface RepoContentItem {
  name: string;
  path: string;
  type: "file" | "dir" | "symlink" | "submodule";
  size: number;
  download_url: string | null;
}

export interface ComparisonQualityIssue {
  issue_type: string;
  severity: IssueSeverity;
  description: string;
  suggestion: string;
}

export interface ComparisonResult {
  similarity_percentage: number;
  refactoring_level: RefactoringLevel;
  added_features: boolean;
  removed_features: boolean;
  notes: string;
  quality_issues: ComparisonQualityIssue[];
}

export interface QualityIssue {
  type: string;
  severity: IssueSeverity;
  description: string;
  recommendation: string;
  tool_missed: boolean;
}

export interface QualityAnalysis {
  issues: QualityIssue[];
}

export interface AggregateSummary {
  average_similarity: number;
  refactoring_distribution: Record<Exclude<RefactoringLevel, "unknown">, number>;
  files_compared: number;
}

export interface FileComparison {
  file_path: string;
  comparison: ComparisonResult;
}

export interface ForkComparison {
  fork: string;
  fork_url: string;
  files: FileComparison[];
  summary: AggregateSummary;
}

export interface QualityFileResult {
  file: string;
  analysis: QualityAnalysis;
}

export interface QualityScanResult {
  repo: string;
  files: QualityFileResult[];
}

export type FailKind =
  | "SPAWN_ERROR"
  | "INVOCATION_TIMEOUT"
  | "INVOCATION_ABORTED"
  | "NO_PAYLOAD_FOUND"
  | "PARSE_ERROR"
  | "MALFORMED_FIELD"
  | "FETCH_FAILED"
  | "BUDGET_CUTOFF"
  | "UNKNOWN";

export interface FailureInfo {
  kind: FailKind;
  message: string;
}

export type EventLevel = "info" | "warn" | "error";

export interface ComparatorEvent {
  ts: string;
  run_id: string;
  node: string;
  repo?: string | null;
  level: EventLevel;
  event: string;
  data?: Record<string, unknown>;
}

export interface LlmAudit {
  ts: string;
  run_id: string;
  role: "compare" | "quality";
  repo?: string | null;
  file_path?: string | null;
  model: string;
  prompt_hash: string;
  prompt_chars: number;
  completion_chars: number;
  exit_code: number | null;
  duration_ms: number;
  error?: string;
}

export interface ComparatorStats {
  forks_found: number;
  forks_compared: number;
  file_pairs_found: number;
  files_compared: number;
  files_skipped: number;
  comparisons_failed: number;
  quality_files_analyzed: number;
}

export interface ComparatorState {
  run_id: string;
  generated_at: string;
  timestamp: string;
  config: ComparatorConfig;
  repo_info: RepoInfo | null;
  forks: ForkRepo[];
  comparisons: ForkComparison[];
  quality: QualityScanResult | null;
  fail_taxonomy_summary: Record<FailKind, number>;
  stats: ComparatorStats;
  artifacts: string[];
  logs: string[];
  status: "ok" | "error";
  errors?: string[];
}
