import { mkdirSync, writeFileSync } from "node:fs";
import path from "node:path";
import type { ComparatorState, ForkComparison, QualityScanResult } from "./types";

type CsvCell = string | number | boolean | null;

export function ensureDir(dirPath: string): void {
  mkdirSync(dirPath, { recursive: true });
}

export function writeJsonPretty(filePath: string, data: unknown): void {
  ensureDir(path.dirname(filePath));
  writeFileSync(filePath, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
}

export function toSafeRepoFileName(fullName: string): string {
  return fullName.replace(/\//g, "_").replace(/[^a-zA-Z0-9_.-]/g, "_");
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `YYYYMMDD_HHMMSS` in local time, used to tag every file of one run. */
export function formatReportTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function csvCell(value: CsvCell): string {
  const text = value === null ? "" : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(rows: readonly (readonly CsvCell[])[]): string {
  return rows.map((row) => `${row.map(csvCell).join(",")}\r\n`).join("");
}

export function writeCsv(filePath: string, rows: readonly (readonly CsvCell[])[]): void {
  ensureDir(path.dirname(filePath));
  writeFileSync(filePath, toCsv(rows), "utf-8");
}

export const FORK_REPORT_HEADER = [
  "File",
  "Similarity",
  "Refactoring",
  "Changes",
  "Added Features",
  "Removed Features",
  "Quality Issues",
] as const;

export function forkReportRows(comparison: ForkComparison): CsvCell[][] {
  return [
    [...FORK_REPORT_HEADER],
    ...comparison.files.map(({ file_path, comparison: result }) => [
      file_path,
      result.similarity_percentage,
      result.refactoring_level,
      result.notes,
      result.added_features,
      result.removed_features,
      JSON.stringify(result.quality_issues),
    ]),
  ];
}

export const MAIN_REPORT_HEADER = [
  "fork_name",
  "fork_url",
  "files_compared",
  "avg_similarity",
  "refactoring_none",
  "refactoring_low",
  "refactoring_medium",
  "refactoring_high",
] as const;

export function mainReportRows(comparisons: readonly ForkComparison[]): CsvCell[][] {
  return [
    [...MAIN_REPORT_HEADER],
    ...comparisons.map((item) => [
      item.fork,
      item.fork_url,
      item.summary.files_compared,
      item.summary.average_similarity,
      item.summary.refactoring_distribution.none,
      item.summary.refactoring_distribution.low,
      item.summary.refactoring_distribution.medium,
      item.summary.refactoring_distribution.high,
    ]),
  ];
}

export const QUALITY_REPORT_HEADER = [
  "fork_name",
  "files_compared",
  "avg_similarity",
  "status",
  "has_high_refactoring",
  "has_removed_features",
] as const;

export function qualityReportRows(comparisons: readonly ForkComparison[]): CsvCell[][] {
  return [
    [...QUALITY_REPORT_HEADER],
    ...comparisons.map((item) => [
      item.fork,
      item.summary.files_compared,
      item.summary.average_similarity,
      item.summary.files_compared > 0 ? "PASS" : "FAIL",
      item.summary.refactoring_distribution.high > 0,
      item.files.some((file) => file.comparison.removed_features),
    ]),
  ];
}

export function writeForkArtifacts(outputDir: string, comparison: ForkComparison, timestamp: string): string[] {
  const safe = toSafeRepoFileName(comparison.fork);
  const jsonPath = path.join(outputDir, `comp_${safe}_${timestamp}.json`);
  const csvPath = path.join(outputDir, `report_${safe}_${timestamp}.csv`);
  writeJsonPretty(jsonPath, comparison);
  writeCsv(csvPath, forkReportRows(comparison));
  return [jsonPath, csvPath];
}

export function writeRunReports(
  outputDir: string,
  state: Pick<ComparatorState, "config" | "timestamp" | "comparisons" | "forks">,
): string[] {
  const summaryPath = path.join(outputDir, `full_analysis_${state.timestamp}.json`);
  writeJsonPretty(summaryPath, {
    base_repository: state.config.baseRepo,
    analysis_date: state.timestamp,
    forks_analyzed: state.forks.length,
    comparisons: state.comparisons,
  });
  const csvDir = path.join(outputDir, "csv_reports");
  const mainPath = path.join(csvDir, `main_report_${state.timestamp}.csv`);
  const qaPath = path.join(csvDir, `quality_report_${state.timestamp}.csv`);
  writeCsv(mainPath, mainReportRows(state.comparisons));
  writeCsv(qaPath, qualityReportRows(state.comparisons));
  return [summaryPath, mainPath, qaPath];
}

export function writeQualityArtifact(outputDir: string, scan: QualityScanResult, timestamp: string): string {
  const filePath = path.join(outputDir, `quality_${toSafeRepoFileName(scan.repo)}_${timestamp}.json`);
  writeJsonPretty(filePath, scan.files);
  return filePath;
}
