import assert from "node:assert/strict";
import { test } from "node:test";
import { createBudgetManager } from "./budget";
import { createLogger } from "./logger";

test("disabled budget never stops", () => {
  const budget = createBudgetManager({ enabled: false, maxLlmCallsPerRun: 1, maxWallTimeSeconds: 1 });
  budget.recordLlmCall("octo/fork", 10);
  budget.recordLlmCall("octo/fork", 10);
  assert.deepEqual(budget.shouldStopRun(), { stop: false });
});

test("call limit stops the run and logs once", () => {
  const logger = createLogger("run-1");
  const budget = createBudgetManager({ enabled: true, maxLlmCallsPerRun: 2, maxWallTimeSeconds: 3600 }, logger);
  budget.recordLlmCall("octo/a", 100);
  assert.deepEqual(budget.shouldStopRun(), { stop: false });
  budget.recordLlmCall("octo/b", 50);

  assert.deepEqual(budget.shouldStopRun(), { stop: true, reason: "maxLlmCallsPerRun reached" });
  assert.deepEqual(budget.shouldStopRun(), { stop: true, reason: "maxLlmCallsPerRun reached" });
  assert.deepEqual(
    logger.getEvents().map((event) => event.event),
    ["BUDGET_STOP_RUN"],
  );

  const snapshot = budget.snapshot();
  assert.equal(snapshot.llmCallsTotal, 2);
  assert.equal(snapshot.promptCharsTotal, 150);
  assert.deepEqual(snapshot.llmCallsPerRepo, { "octo/a": 1, "octo/b": 1 });
  assert.equal(snapshot.stopReason, "maxLlmCallsPerRun reached");
});

test("wall time limit stops the run", () => {
  let now = 1_000;
  const budget = createBudgetManager(
    { enabled: true, maxLlmCallsPerRun: 100, maxWallTimeSeconds: 10 },
    undefined,
    () => now,
  );
  now += 10_000;
  assert.deepEqual(budget.shouldStopRun(), { stop: false });
  now += 1;
  assert.deepEqual(budget.shouldStopRun(), { stop: true, reason: "maxWallTimeSeconds exceeded" });
});
