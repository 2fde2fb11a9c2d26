import assert from "node:assert/strict";
import { readFileSync } from "node:fs";
import path from "node:path";
import { test } from "node:test";
import { fileURLToPath } from "node:url";
import { parseConfig, withEnvOverrides } from "./config";

const here = path.dirname(fileURLToPath(import.meta.url));

test("missing sections get their defaults", () => {
  const config = parseConfig({ baseRepo: "octo/repo" });
  assert.equal(config.maxForks, 5);
  assert.equal(config.forkSort, "newest");
  assert.deepEqual(config.contentsPaths, [""]);
  assert.equal(config.maxFilesPerFork, null);
  assert.deepEqual(config.llm, {
    command: "ollama",
    args: ["run", "{model}"],
    model: "mistral",
    promptVia: "argv",
    compareTimeoutMs: 120_000,
    qualityTimeoutMs: 300_000,
    maxPromptChars: 10_000,
    extraction: "greedy",
  });
  assert.deepEqual(config.cache, { maxEntries: 100 });
  assert.deepEqual(config.output, { dir: "output", runsDir: "runs" });
});

test("invalid config lists the failing fields", () => {
  assert.throws(() => parseConfig({}), /^Error: Invalid comparator config: baseRepo: Required$/);
  assert.throws(
    () => parseConfig({ baseRepo: "not-a-repo", maxForks: 0 }),
    /Invalid comparator config: baseRepo: expected owner\/repo; maxForks: /,
  );
});

test("environment overrides base repo and model", () => {
  const config = parseConfig({ baseRepo: "octo/repo" });
  const overridden = withEnvOverrides(config, { COMPARATOR_BASE_REPO: " other/repo ", OLLAMA_MODEL: "llama3" });
  assert.equal(overridden.baseRepo, "other/repo");
  assert.equal(overridden.llm.model, "llama3");
  assert.equal(overridden.llm.command, "ollama");

  assert.deepEqual(withEnvOverrides(config, { OLLAMA_MODEL: "" }), config);
});

test("the shipped config file is valid", () => {
  const raw = readFileSync(path.join(here, "..", "config", "comparator.config.json"), "utf-8");
  const config = parseConfig(JSON.parse(raw));
  assert.equal(config.baseRepo, "pallets/click");
  assert.equal(config.qualityScan.enabled, false);
});
