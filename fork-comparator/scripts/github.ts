import { repoPathCacheKey, type LruCache } from "./cache";
import { ComparatorError } from "./errors";
import { sleep, withRetry } from "./retry";
import type { ComparatorConfig, ForkRepo, RepoContentItem, RepoInfo } from "./types";

const API_ROOT = "https://api.github.com";

export type CachedContent =
  | { kind: "listing"; items: RepoContentItem[] }
  | { kind: "file"; text: string | null };

export interface GitHubOptions {
  token?: string;
  cache?: LruCache<CachedContent>;
  signal?: AbortSignal;
  retryBaseDelayMs?: number;
  onCacheEvent?: (event: "CACHE_HIT" | "CACHE_MISS", data: { repo: string; key: string }) => void;
  onRetryEvent?: (
    event: "GITHUB_RETRY" | "GITHUB_RETRY_GIVEUP",
    data: { repo: string; endpoint: string; attempt: number; status?: number; reason?: string },
  ) => void;
}

interface GitHubRepoResponse {
  full_name: string;
  name: string;
  description: string | null;
  html_url: string;
  forks_count: number;
  stargazers_count: number;
  default_branch: string;
  pushed_at?: string | null;
}

interface ContentsItemResponse {
  name: string;
  path: string;
  type: string;
  size?: number;
  download_url?: string | null;
}

interface ContentsFileResponse extends ContentsItemResponse {
  content?: string;
  encoding?: string;
}

export class GitHubRequestError extends ComparatorError {
  readonly kind = "FETCH_FAILED" as const;
  status?: number;
  endpoint?: string;
  repo?: string;
}

function buildHeaders(token?: string, accept = "application/vnd.github+json"): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: accept,
    "User-Agent": "fork-comparator",
    "X-GitHub-Api-Version": "2022-11-28",
  };
  if (token) {
    headers.Authorization = `Bearer ${token}`;
  }
  return headers;
}

function isRetriableGitHubError(error: unknown): boolean {
  if (error instanceof GitHubRequestError && typeof error.status === "number") {
    return error.status === 429 || (error.status >= 500 && error.status <= 599);
  }
  return !(error instanceof Error && error.name === "AbortError");
}

function encodePath(filePath: string): string {
  return filePath
    .split("/")
    .filter((segment) => segment.length > 0)
    .map(encodeURIComponent)
    .join("/");
}

async function fetchWithRetry(params: {
  url: string;
  repo: string;
  endpoint: string;
  options?: GitHubOptions;
  accept?: string;
}): Promise<Response> {
  const { options } = params;
  return withRetry(
    async () => {
      const response = await fetch(params.url, {
        method: "GET",
        headers: buildHeaders(options?.token, params.accept),
        signal: options?.signal,
      });
      if (!response.ok) {
        const body = await response.text();
        const error = new GitHubRequestError(
          `GitHub API ${response.status} ${response.statusText}: ${body.slice(0, 300)}`,
        );
        error.status = response.status;
        error.endpoint = params.endpoint;
        error.repo = params.repo;
        throw error;
      }
      return response;
    },
    {
      retries: 2,
      baseDelayMs: options?.retryBaseDelayMs ?? 500,
      maxDelayMs: 4000,
      jitter: true,
      retryOn: isRetriableGitHubError,
      signal: options?.signal,
      onRetry: ({ attempt, error }) => {
        options?.onRetryEvent?.("GITHUB_RETRY", {
          repo: params.repo,
          endpoint: params.endpoint,
          attempt,
          status: error instanceof GitHubRequestError ? error.status : undefined,
        });
      },
      onGiveup: ({ attempt, error }) => {
        options?.onRetryEvent?.("GITHUB_RETRY_GIVEUP", {
          repo: params.repo,
          endpoint: params.endpoint,
          attempt,
          status: error instanceof GitHubRequestError ? error.status : undefined,
          reason: error instanceof Error ? error.message : String(error),
        });
      },
    },
  );
}

function cached(
  options: GitHubOptions | undefined,
  repo: string,
  key: string,
): CachedContent | undefined {
  const hit = options?.cache?.get(key);
  options?.onCacheEvent?.(hit ? "CACHE_HIT" : "CACHE_MISS", { repo, key });
  return hit;
}

function toContentType(type: string): RepoContentItem["type"] {
  return type === "dir" || type === "symlink" || type === "submodule" ? type : "file";
}

export async function fetchRepoInfo(fullName: string, options?: GitHubOptions): Promise<RepoInfo> {
  const response = await fetchWithRetry({
    url: `${API_ROOT}/repos/${fullName}`,
    repo: fullName,
    endpoint: "repo",
    options,
  });
  const item = (await response.json()) as GitHubRepoResponse;
  return {
    full_name: item.full_name,
    name: item.name,
    description: item.description,
    html_url: item.html_url,
    forks_count: item.forks_count,
    stargazers_count: item.stargazers_count,
    default_branch: item.default_branch,
  };
}

export interface ForkListing {
  forks: ForkRepo[];
  /** Set when a page failed; `forks` then holds the pages fetched before it. */
  error?: unknown;
}

export async function fetchForks(
  fullName: string,
  params: { maxForks: number; sort?: ComparatorConfig["forkSort"]; pageDelayMs?: number },
  options?: GitHubOptions,
): Promise<ForkListing> {
  const forks: ForkRepo[] = [];
  const perPage = 100;
  try {
    for (let page = 1; forks.length < params.maxForks; page += 1) {
      if (page > 1 && (params.pageDelayMs ?? 0) > 0) {
        await sleep(params.pageDelayMs ?? 0, options?.signal);
      }
      const url = new URL(`${API_ROOT}/repos/${fullName}/forks`);
      url.searchParams.set("sort", params.sort ?? "newest");
      url.searchParams.set("per_page", String(perPage));
      url.searchParams.set("page", String(page));
      const response = await fetchWithRetry({
        url: url.toString(),
        repo: fullName,
        endpoint: `forks_page_${page}`,
        options,
      });
      const items = (await response.json()) as GitHubRepoResponse[];
      if (!Array.isArray(items) || items.length === 0) break;
      forks.push(
        ...items.map((item) => ({
          full_name: item.full_name,
          html_url: item.html_url,
          default_branch: item.default_branch,
          pushed_at: item.pushed_at ?? null,
          stargazers_count: item.stargazers_count,
        })),
      );
      if (items.length < perPage) break;
    }
  } catch (error) {
    options?.signal?.throwIfAborted();
    return { forks: forks.slice(0, params.maxForks), error };
  }
  return { forks: forks.slice(0, params.maxForks) };
}

/** Directory listing at `dirPath` (repository root when empty). */
export async function fetchRepoContents(
  fullName: string,
  dirPath = "",
  options?: GitHubOptions,
): Promise<RepoContentItem[]> {
  const key = repoPathCacheKey("contents", fullName, dirPath);
  const hit = cached(options, fullName, key);
  if (hit?.kind === "listing") return hit.items;

  const suffix = encodePath(dirPath);
  const response = await fetchWithRetry({
    url: `${API_ROOT}/repos/${fullName}/contents${suffix ? `/${suffix}` : ""}`,
    repo: fullName,
    endpoint: `contents_${dirPath || "root"}`,
    options,
  });
  const data = (await response.json()) as ContentsItemResponse[] | ContentsItemResponse;
  if (!Array.isArray(data)) {
    throw new GitHubRequestError(`Contents of ${fullName}/${dirPath} is not a directory`);
  }
  const items = data.map((item) => ({
    name: item.name,
    path: item.path,
    type: toContentType(item.type),
    size: item.size ?? 0,
    download_url: item.download_url ?? null,
  }));
  options?.cache?.set(key, { kind: "listing", items });
  return items;
}

/**
 * Text of one file, or null when the path does not exist or is not a file.
 * Small files arrive inline as base64; larger ones only carry a download_url.
 */
export async function fetchFileText(
  fullName: string,
  filePath: string,
  options?: GitHubOptions,
): Promise<string | null> {
  const key = repoPathCacheKey("file", fullName, filePath);
  const hit = cached(options, fullName, key);
  if (hit?.kind === "file") return hit.text;

  let data: ContentsFileResponse | ContentsFileResponse[];
  try {
    const response = await fetchWithRetry({
      url: `${API_ROOT}/repos/${fullName}/contents/${encodePath(filePath)}`,
      repo: fullName,
      endpoint: `contents_${filePath}`,
      options,
    });
    data = (await response.json()) as ContentsFileResponse | ContentsFileResponse[];
  } catch (error) {
    if (error instanceof GitHubRequestError && error.status === 404) {
      options?.cache?.set(key, { kind: "file", text: null });
      return null;
    }
    throw error;
  }

  let text: string | null = null;
  if (!Array.isArray(data) && data.type === "file") {
    if (data.content && data.encoding === "base64") {
      text = Buffer.from(data.content, "base64").toString("utf-8");
    } else if (data.download_url) {
      const raw = await fetchWithRetry({
        url: data.download_url,
        repo: fullName,
        endpoint: `raw_${filePath}`,
        options,
        accept: "application/vnd.github.raw",
      });
      text = await raw.text();
    }
  }
  options?.cache?.set(key, { kind: "file", text });
  return text;
}

