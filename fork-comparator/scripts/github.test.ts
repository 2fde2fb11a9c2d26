import assert from "node:assert/strict";
import { afterEach, test } from "node:test";
import { createLruCache } from "./cache";
import {
  GitHubRequestError,
  fetchFileText,
  fetchForks,
  fetchRepoContents,
  type CachedContent,
} from "./github";

const originalFetch = global.fetch;

afterEach(() => {
  global.fetch = originalFetch;
});

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function fileResponse(text: string): Response {
  return jsonResponse({
    name: "app.py",
    path: "src/app.py",
    type: "file",
    size: text.length,
    encoding: "base64",
    content: Buffer.from(text, "utf-8").toString("base64"),
    download_url: "https://raw.example.test/src/app.py",
  });
}

function urlOf(input: string | URL | Request): string {
  return typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
}

test("5xx responses are retried", async () => {
  let calls = 0;
  let retryEvents = 0;
  global.fetch = (async () => {
    calls += 1;
    if (calls === 1) return jsonResponse({ message: "server err" }, 500);
    return jsonResponse([{ name: "app.py", path: "app.py", type: "file", size: 3, download_url: null }]);
  }) as typeof fetch;

  const items = await fetchRepoContents("test-owner/repo-500", "", {
    retryBaseDelayMs: 1,
    onRetryEvent: (event) => {
      if (event === "GITHUB_RETRY") retryEvents += 1;
    },
  });

  assert.deepEqual(items, [{ name: "app.py", path: "app.py", type: "file", size: 3, download_url: null }]);
  assert.equal(calls, 2);
  assert.equal(retryEvents, 1);
});

test("403 is not retried", async () => {
  let calls = 0;
  const events: string[] = [];
  global.fetch = (async () => {
    calls += 1;
    return jsonResponse({ message: "forbidden" }, 403);
  }) as typeof fetch;

  await assert.rejects(
    () =>
      fetchRepoContents("test-owner/repo-403", "", {
        retryBaseDelayMs: 1,
        onRetryEvent: (event) => events.push(event),
      }),
    (error: unknown) => error instanceof GitHubRequestError && error.status === 403 && error.kind === "FETCH_FAILED",
  );
  assert.equal(calls, 1);
  assert.deepEqual(events, ["GITHUB_RETRY_GIVEUP"]);
});

test("a missing file is null and the miss is cached", async () => {
  let calls = 0;
  global.fetch = (async () => {
    calls += 1;
    return jsonResponse({ message: "Not Found" }, 404);
  }) as typeof fetch;
  const cache = createLruCache<CachedContent>(10);
  const cacheEvents: string[] = [];
  const options = { cache, onCacheEvent: (event: string) => cacheEvents.push(event) };

  assert.equal(await fetchFileText("test-owner/repo", "missing.py", options), null);
  assert.equal(await fetchFileText("test-owner/repo", "missing.py", options), null);
  assert.equal(calls, 1);
  assert.deepEqual(cacheEvents, ["CACHE_MISS", "CACHE_HIT"]);
});

test("inline base64 content is decoded and the token is sent", async () => {
  const seen: Array<{ url: string; auth: string | null }> = [];
  global.fetch = (async (input: string | URL | Request, init?: RequestInit) => {
    seen.push({ url: urlOf(input), auth: new Headers(init?.headers).get("Authorization") });
    return fileResponse("print('hi')\n");
  }) as typeof fetch;

  const text = await fetchFileText("test-owner/repo", "src/app.py", { token: "test-secret" });
  assert.equal(text, "print('hi')\n");
  assert.deepEqual(seen, [
    { url: "https://api.github.com/repos/test-owner/repo/contents/src/app.py", auth: "Bearer test-secret" },
  ]);
});

test("large files fall back to the download url", async () => {
  const urls: string[] = [];
  global.fetch = (async (input: string | URL | Request) => {
    const url = urlOf(input);
    urls.push(url);
    if (url.startsWith("https://api.github.com/")) {
      return jsonResponse({
        name: "big.py",
        path: "big.py",
        type: "file",
        size: 2_000_000,
        encoding: "none",
        content: "",
        download_url: "https://raw.example.test/big.py",
      });
    }
    return new Response("x = 1\n", { status: 200 });
  }) as typeof fetch;

  assert.equal(await fetchFileText("test-owner/repo", "big.py"), "x = 1\n");
  assert.deepEqual(urls, ["https://api.github.com/repos/test-owner/repo/contents/big.py", "https://raw.example.test/big.py"]);
});

test("directories are not file text", async () => {
  global.fetch = (async () =>
    jsonResponse([{ name: "a.py", path: "src/a.py", type: "file", size: 1, download_url: null }])) as typeof fetch;
  assert.equal(await fetchFileText("test-owner/repo", "src"), null);
});

test("forks are paginated until the limit", async () => {
  const urls: string[] = [];
  const forkPage = (page: number, count: number) =>
    Array.from({ length: count }, (_, i) => ({
      full_name: `user${page}-${i}/repo`,
      html_url: `https://github.com/user${page}-${i}/repo`,
      default_branch: "main",
      pushed_at: "2024-01-01T00:00:00Z",
      stargazers_count: i,
    }));
  global.fetch = (async (input: string | URL | Request) => {
    const url = urlOf(input);
    urls.push(url);
    return jsonResponse(url.endsWith("page=1") ? forkPage(1, 100) : forkPage(2, 60));
  }) as typeof fetch;

  const { forks, error } = await fetchForks("test-owner/repo", { maxForks: 150, pageDelayMs: 0 });
  assert.equal(error, undefined);
  assert.equal(forks.length, 150);
  assert.equal(forks[100].full_name, "user2-0/repo");
  assert.deepEqual(urls, [
    "https://api.github.com/repos/test-owner/repo/forks?sort=newest&per_page=100&page=1",
    "https://api.github.com/repos/test-owner/repo/forks?sort=newest&per_page=100&page=2",
  ]);
});

test("a short fork page ends pagination", async () => {
  let calls = 0;
  global.fetch = (async () => {
    calls += 1;
    return jsonResponse(
      ["a", "b", "c", "d", "e"].map((owner) => ({
        full_name: `${owner}/repo`,
        html_url: `https://github.com/${owner}/repo`,
        default_branch: "main",
        stargazers_count: 0,
      })),
    );
  }) as typeof fetch;

  const { forks } = await fetchForks("test-owner/repo", { maxForks: 3, sort: "stargazers" });
  assert.deepEqual(
    forks.map((fork) => fork.full_name),
    ["a/repo", "b/repo", "c/repo"],
  );
  assert.equal(forks[0].pushed_at, null);
  assert.equal(calls, 1);
});

test("a failing later page keeps the forks already listed", async () => {
  const urls: string[] = [];
  global.fetch = (async (input: string | URL | Request) => {
    const url = urlOf(input);
    urls.push(url);
    if (url.endsWith("page=2")) return jsonResponse({ message: "bad gateway" }, 502);
    return jsonResponse(
      Array.from({ length: 100 }, (_, i) => ({
        full_name: `user-${i}/repo`,
        html_url: `https://github.com/user-${i}/repo`,
        default_branch: "main",
        stargazers_count: 0,
      })),
    );
  }) as typeof fetch;

  const { forks, error } = await fetchForks(
    "test-owner/repo",
    { maxForks: 150, pageDelayMs: 0 },
    { retryBaseDelayMs: 1 },
  );
  assert.equal(forks.length, 100);
  assert.equal(forks[99].full_name, "user-99/repo");
  assert.ok(error instanceof GitHubRequestError && error.status === 502);
  assert.equal(urls.filter((url) => url.endsWith("page=2")).length, 3);
});

test("an aborted fork listing rejects instead of returning partial results", async () => {
  const controller = new AbortController();
  controller.abort(new Error("Run cancelled by SIGTERM"));
  global.fetch = (async () => jsonResponse([])) as typeof fetch;
  await assert.rejects(
    () => fetchForks("test-owner/repo", { maxForks: 5 }, { signal: controller.signal }),
    /Run cancelled by SIGTERM/,
  );
});
